import type { Task, TaskStatus } from "./task-model.js";

export type OrderChange = {
  task_id: number;
  name: string;
  old_order: number;
  new_order: number;
};

// Work already in flight first; finished work last.
const STATUS_RANK: Record<TaskStatus, number> = {
  in_progress: 0,
  review: 1,
  approved: 2,
  pending: 3,
  blocked: 4,
  completed: 5,
  failed: 6,
};

export function statusRank(status: TaskStatus): number {
  return STATUS_RANK[status];
}

/**
 * Computes the order changes that sort tasks by status rank, keeping the current
 * relative order within a rank. Tasks already at their position are omitted, so a
 * second run after applying the changes returns nothing.
 */
export function planReprioritization(tasks: Task[]): OrderChange[] {
  const current = [...tasks].sort(compareByCurrentOrder);
  const ranked = current
    .map((task, position) => ({ task, position }))
    .sort((a, b) => statusRank(a.task.status) - statusRank(b.task.status) || a.position - b.position)
    .map(({ task }) => task);

  const changes: OrderChange[] = [];
  ranked.forEach((task, newOrder) => {
    if (task.order !== newOrder) {
      changes.push({
        task_id: task.id,
        name: task.name,
        old_order: task.order,
        new_order: newOrder,
      });
    }
  });

  return changes;
}

function compareByCurrentOrder(a: Task, b: Task): number {
  return a.order - b.order || a.id - b.id;
}
