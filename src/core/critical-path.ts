import type { TaskStatus } from "./task-model.js";
import { topologicalOrder, type DependencyGraph } from "./task-graph.js";

export type CriticalPathStep = {
  task_id: number;
  name: string;
  duration: number;
  status: TaskStatus;
};

export type CriticalPathResult = {
  path: CriticalPathStep[];
  total_hours: number;
  error?: "circular_dependency";
};

/**
 * Longest duration-weighted path through the graph, summing node durations.
 *
 * Every (start, end) pair is considered, starts and ends in ascending task id order,
 * and a later pair replaces the current best only when strictly longer. A graph with
 * no edges yields its single longest task. Cycles are reported, never thrown.
 */
export function computeCriticalPath(graph: DependencyGraph): CriticalPathResult {
  if (graph.nodes.length === 0) {
    return { path: [], total_hours: 0 };
  }

  const order = topologicalOrder(graph);
  if (!order) {
    return { path: [], total_hours: 0, error: "circular_dependency" };
  }

  const startNodes = graph.nodes.map((_, i) => i).filter((i) => graph.predecessors[i].length === 0);
  const endNodes = graph.nodes.map((_, i) => i).filter((i) => graph.successors[i].length === 0);

  let bestPath: number[] | null = null;
  let bestTotal = 0;

  for (const start of startNodes) {
    const { totals, previous } = longestPathsFrom(graph, order, start);

    for (const end of endNodes) {
      const total = totals[end];
      if (total === undefined) continue;
      if (bestPath === null || total > bestTotal) {
        bestTotal = total;
        bestPath = tracePath(previous, start, end);
      }
    }
  }

  const path = (bestPath ?? []).map((index) => {
    const node = graph.nodes[index];
    return { task_id: node.id, name: node.name, duration: node.duration, status: node.status };
  });

  return { path, total_hours: bestTotal };
}

function longestPathsFrom(
  graph: DependencyGraph,
  order: number[],
  start: number,
): { totals: Array<number | undefined>; previous: Array<number | undefined> } {
  const totals: Array<number | undefined> = new Array(graph.nodes.length).fill(undefined);
  const previous: Array<number | undefined> = new Array(graph.nodes.length).fill(undefined);
  totals[start] = graph.nodes[start].duration;

  for (const index of order) {
    const total = totals[index];
    if (total === undefined) continue;

    for (const succ of graph.successors[index]) {
      const candidate = total + graph.nodes[succ].duration;
      const current = totals[succ];
      if (current === undefined || candidate > current) {
        totals[succ] = candidate;
        previous[succ] = index;
      }
    }
  }

  return { totals, previous };
}

function tracePath(previous: Array<number | undefined>, start: number, end: number): number[] {
  const path = [end];
  let cursor = end;
  while (cursor !== start) {
    const prev = previous[cursor];
    if (prev === undefined) break;
    path.unshift(prev);
    cursor = prev;
  }
  return path;
}
