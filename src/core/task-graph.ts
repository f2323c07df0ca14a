/**
 * TaskGraph indexes roadmap tasks by dependency for O(1) lookups.
 * Purpose: derive layers, roots/leaves and dependency sets once per roadmap load.
 * Assumptions: ids are unique; unknown dependency ids are ignored here (validation reports them).
 * Usage: const graph = buildTaskGraph(tasks); const order = layers(graph);
 */

import { CycleError } from "./errors.js";
import type { RoadmapTask } from "./roadmap-schema.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskGraph = {
  tasks: ReadonlyMap<number, RoadmapTask>;
  ids: readonly number[];
  dependencyIndex: ReadonlyMap<number, ReadonlySet<number>>;
  dependentIndex: ReadonlyMap<number, ReadonlySet<number>>;
};

const EMPTY_SET: ReadonlySet<number> = new Set();

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function buildTaskGraph(tasks: RoadmapTask[]): TaskGraph {
  const sorted = [...tasks].sort((a, b) => a.id - b.id);
  const byId = new Map<number, RoadmapTask>();
  for (const task of sorted) {
    byId.set(task.id, task);
  }

  const dependencyIndex = new Map<number, Set<number>>();
  const dependentIndex = new Map<number, Set<number>>();
  for (const task of sorted) {
    dependencyIndex.set(task.id, new Set());
    dependentIndex.set(task.id, new Set());
  }

  for (const task of sorted) {
    for (const dep of task.depends_on) {
      if (!byId.has(dep)) continue;
      dependencyIndex.get(task.id)?.add(dep);
      dependentIndex.get(dep)?.add(task.id);
    }
  }

  return {
    tasks: byId,
    ids: sorted.map((task) => task.id),
    dependencyIndex,
    dependentIndex,
  };
}

// =============================================================================
// QUERIES
// =============================================================================

export function dependencies(graph: TaskGraph, id: number): ReadonlySet<number> {
  return graph.dependencyIndex.get(id) ?? EMPTY_SET;
}

export function dependents(graph: TaskGraph, id: number): ReadonlySet<number> {
  return graph.dependentIndex.get(id) ?? EMPTY_SET;
}

export function roots(graph: TaskGraph): number[] {
  return graph.ids.filter((id) => dependencies(graph, id).size === 0);
}

export function leaves(graph: TaskGraph): number[] {
  return graph.ids.filter((id) => dependents(graph, id).size === 0);
}

export function requireTask(graph: TaskGraph, id: number): RoadmapTask {
  const task = graph.tasks.get(id);
  if (!task) {
    throw new Error(`Unknown task id ${id}`);
  }
  return task;
}

// Tasks that share a dependency set are parallel-eligible with each other.
export function dependencyKey(graph: TaskGraph, id: number): string {
  return [...dependencies(graph, id)].sort((a, b) => a - b).join(",");
}

// =============================================================================
// LAYERS
// =============================================================================

export function layerIndex(graph: TaskGraph): Map<number, number> {
  const depth = new Map<number, number>();
  for (const id of graph.ids) {
    depth.set(id, 0);
  }

  // An acyclic graph settles after at most |tasks| passes; anything still moving is on a cycle.
  const maxPasses = graph.ids.length + 1;
  for (let pass = 0; pass < maxPasses; pass += 1) {
    const changed: number[] = [];

    for (const id of graph.ids) {
      const deps = dependencies(graph, id);
      let next = 0;
      for (const dep of deps) {
        next = Math.max(next, (depth.get(dep) ?? 0) + 1);
      }
      if (next !== depth.get(id)) {
        depth.set(id, next);
        changed.push(id);
      }
    }

    if (changed.length === 0) {
      return depth;
    }
    if (pass === maxPasses - 1) {
      throw new CycleError(findCycleMembers(graph));
    }
  }

  return depth;
}

export function layers(graph: TaskGraph): number[][] {
  const depth = layerIndex(graph);
  const result: number[][] = [];

  for (const id of graph.ids) {
    const layer = depth.get(id) ?? 0;
    while (result.length <= layer) {
      result.push([]);
    }
    result[layer]?.push(id);
  }

  return result;
}

export function criticalPath(graph: TaskGraph): number[] {
  const depth = layerIndex(graph);
  let current: number | undefined;
  for (const id of graph.ids) {
    if (current === undefined || (depth.get(id) ?? 0) > (depth.get(current) ?? 0)) {
      current = id;
    }
  }

  const path: number[] = [];
  while (current !== undefined) {
    path.unshift(current);
    const currentDepth = depth.get(current) ?? 0;
    let previous: number | undefined;
    for (const dep of dependencies(graph, current)) {
      if ((depth.get(dep) ?? 0) === currentDepth - 1) {
        previous = previous === undefined ? dep : Math.min(previous, dep);
      }
    }
    current = previous;
  }

  return path;
}

// Kahn's algorithm: whatever cannot be peeled off is on (or behind) a cycle.
function findCycleMembers(graph: TaskGraph): number[] {
  const remaining = new Map<number, number>();
  for (const id of graph.ids) {
    remaining.set(id, dependencies(graph, id).size);
  }

  const queue = graph.ids.filter((id) => remaining.get(id) === 0);
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    remaining.delete(id);
    for (const dependent of dependents(graph, id)) {
      const count = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, count);
      if (count === 0) {
        queue.push(dependent);
      }
    }
  }

  return [...remaining.keys()].sort((a, b) => a - b);
}
