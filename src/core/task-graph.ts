import type { SchedulingConfig } from "./config.js";
import { ProjectScopeError } from "./errors.js";
import type { Task, TaskDependency, TaskStatus } from "./task-model.js";

// =============================================================================
// TYPES
// =============================================================================

export type GraphNode = {
  id: number;
  name: string;
  duration: number;
  status: TaskStatus;
  requiresApproval: boolean;
  order: number;
  estimateHours: number | null;
};

/**
 * Arena graph for one project. Nodes are sorted by ascending task id and addressed by
 * index; `successors[i]` holds the dependents of node i (prerequisite -> dependent) and
 * `predecessors[i]` its prerequisites, both ascending and free of duplicates.
 */
export type DependencyGraph = {
  projectId: number;
  nodes: GraphNode[];
  successors: number[][];
  predecessors: number[][];
  indexById: Map<number, number>;
};

export type GraphEdge = { from: number; to: number };

// =============================================================================
// BUILDER
// =============================================================================

export function buildDependencyGraph(
  projectId: number,
  tasks: Task[],
  dependencies: TaskDependency[],
  scheduling: Pick<SchedulingConfig, "default_estimate_hours">,
): DependencyGraph {
  const sorted = [...tasks].sort((a, b) => a.id - b.id);
  const indexById = new Map<number, number>();
  const nodes: GraphNode[] = [];

  for (const task of sorted) {
    if (task.project_id !== projectId) {
      throw new ProjectScopeError(
        `Task ${task.id} belongs to project ${task.project_id}, not project ${projectId}.`,
      );
    }
    if (indexById.has(task.id)) continue;

    indexById.set(task.id, nodes.length);
    nodes.push({
      id: task.id,
      name: task.name,
      duration: task.estimate_hours ?? scheduling.default_estimate_hours,
      status: task.status,
      requiresApproval: task.requires_approval,
      order: task.order,
      estimateHours: task.estimate_hours,
    });
  }

  const successorSets = nodes.map(() => new Set<number>());
  const predecessorSets = nodes.map(() => new Set<number>());

  for (const dep of dependencies) {
    const from = indexById.get(dep.depends_on_task_id);
    const to = indexById.get(dep.task_id);
    if (from === undefined || to === undefined) {
      throw new ProjectScopeError(
        `Dependency ${dep.task_id} -> ${dep.depends_on_task_id} references a task outside project ${projectId}.`,
      );
    }

    successorSets[from].add(to);
    predecessorSets[to].add(from);
  }

  return {
    projectId,
    nodes,
    successors: successorSets.map(toSortedArray),
    predecessors: predecessorSets.map(toSortedArray),
    indexById,
  };
}

export function listGraphEdges(graph: DependencyGraph): GraphEdge[] {
  const edges: GraphEdge[] = [];
  graph.successors.forEach((targets, from) => {
    for (const to of targets) {
      edges.push({ from: graph.nodes[from].id, to: graph.nodes[to].id });
    }
  });
  return edges;
}

/**
 * Kahn's algorithm. Returns node indices in topological order, or null when a cycle
 * leaves some nodes with unresolved prerequisites. Ready nodes are taken lowest index
 * first so the order is deterministic.
 */
export function topologicalOrder(graph: DependencyGraph): number[] | null {
  const inDegree = graph.predecessors.map((preds) => preds.length);
  const ready: number[] = [];
  inDegree.forEach((degree, index) => {
    if (degree === 0) ready.push(index);
  });

  const order: number[] = [];
  while (ready.length > 0) {
    ready.sort((a, b) => a - b);
    const next = ready.shift();
    if (next === undefined) break;
    order.push(next);

    for (const succ of graph.successors[next]) {
      inDegree[succ] -= 1;
      if (inDegree[succ] === 0) ready.push(succ);
    }
  }

  return order.length === graph.nodes.length ? order : null;
}

/**
 * Finds a path of task ids from `fromId` to `toId` following prerequisite -> dependent
 * edges, or null when `toId` is unreachable.
 */
export function findPath(graph: DependencyGraph, fromId: number, toId: number): number[] | null {
  const start = graph.indexById.get(fromId);
  const goal = graph.indexById.get(toId);
  if (start === undefined || goal === undefined) return null;

  const parent = new Map<number, number>([[start, start]]);
  const queue = [start];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    if (current === goal) {
      const path = [current];
      let cursor = current;
      while (cursor !== start) {
        const prev = parent.get(cursor);
        if (prev === undefined) break;
        path.unshift(prev);
        cursor = prev;
      }
      return path.map((index) => graph.nodes[index].id);
    }

    for (const succ of graph.successors[current]) {
      if (parent.has(succ)) continue;
      parent.set(succ, current);
      queue.push(succ);
    }
  }

  return null;
}

function toSortedArray(values: Set<number>): number[] {
  return [...values].sort((a, b) => a - b);
}
