import { GraphError } from "../errors.js";
import type { DependencyGraph, Task, Wave } from "./types.js";

const byId = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Build the dependency map of a task list. */
export function buildGraph(tasks: readonly Task[]): DependencyGraph {
  return new Map(tasks.map((t) => [t.id, new Set(t.dependsOn)]));
}

/** Invert the dependency map: node → nodes that depend on it. Dangling references are ignored. */
export function dependentsOf(graph: DependencyGraph): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const id of graph.keys()) dependents.set(id, []);
  for (const [id, deps] of graph) {
    for (const dep of deps) {
      dependents.get(dep)?.push(id);
    }
  }
  for (const list of dependents.values()) list.sort(byId);
  return dependents;
}

/** Nodes nothing depends on, sorted by id. */
export function findSinks(graph: DependencyGraph): string[] {
  return [...dependentsOf(graph)]
    .filter(([, dependents]) => dependents.length === 0)
    .map(([id]) => id)
    .sort(byId);
}

/**
 * Find cycles by depth-first search along dependency edges, keeping the
 * current recursion stack so a back edge yields the cycle's path.
 * Each cycle is reported once, starting and ending at the same node.
 */
export function findCycles(graph: DependencyGraph): string[][] {
  const done = new Set<string>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];
  const seen = new Set<string>();

  function visit(id: string): void {
    stack.push(id);
    onStack.add(id);
    for (const dep of [...(graph.get(id) ?? [])].sort(byId)) {
      if (!graph.has(dep) || done.has(dep)) continue;
      if (onStack.has(dep)) {
        const cycle = [...stack.slice(stack.indexOf(dep)), dep];
        const key = [...new Set(cycle)].sort(byId).join("\u0000");
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(cycle);
        }
        continue;
      }
      visit(dep);
    }
    stack.pop();
    onStack.delete(id);
    done.add(id);
  }

  for (const id of [...graph.keys()].sort(byId)) {
    if (!done.has(id)) visit(id);
  }
  return cycles;
}

/**
 * Check the workflow invariants and return every violation found:
 * dangling references, sink count, cycles, and nodes that cannot reach the sink.
 */
export function validateDag(graph: DependencyGraph): GraphError[] {
  const errors: GraphError[] = [];
  const ids = [...graph.keys()].sort(byId);

  for (const id of ids) {
    for (const dep of [...(graph.get(id) ?? [])].sort(byId)) {
      if (!graph.has(dep)) {
        errors.push(new GraphError("dangling", [id, dep], `Task "${id}" depends on unknown task "${dep}"`));
      }
    }
  }

  if (ids.length === 0) return errors;

  const sinks = findSinks(graph);
  if (sinks.length === 0) {
    errors.push(new GraphError("no_sink", [], "Workflow has no sink: every task has a dependent, so the graph contains a cycle"));
  } else if (sinks.length > 1) {
    errors.push(
      new GraphError(
        "multiple_sinks",
        sinks,
        `Workflow has ${sinks.length} sinks (${sinks.join(", ")}); expected exactly one convergence point`,
      ),
    );
  }

  for (const cycle of findCycles(graph)) {
    errors.push(new GraphError("cycle", cycle, `Dependency cycle: ${cycle.join(" -> ")}`));
  }

  if (sinks.length === 1) {
    const [sink] = sinks;
    // Walking dependencies backwards from the sink finds every node with a forward path to it.
    const reaches = new Set<string>([sink]);
    const queue = [sink];
    while (queue.length > 0) {
      const id = queue.pop();
      if (id === undefined) break;
      for (const dep of graph.get(id) ?? []) {
        if (graph.has(dep) && !reaches.has(dep)) {
          reaches.add(dep);
          queue.push(dep);
        }
      }
    }
    const unreachable = ids.filter((id) => !reaches.has(id));
    if (unreachable.length > 0) {
      errors.push(
        new GraphError("unreachable", unreachable, `Tasks cannot reach sink "${sink}": ${unreachable.join(", ")}`),
      );
    }
  }

  return errors;
}

/**
 * Level the graph into waves: each wave holds every unscheduled node whose
 * dependencies are all in earlier waves, so a node's wave index is one plus
 * the deepest wave among its dependencies. Ids within a wave are sorted.
 */
export function computeWaves(graph: DependencyGraph): Wave[] {
  const remaining = new Set(graph.keys());
  const scheduled = new Set<string>();
  const waves: Wave[] = [];

  while (remaining.size > 0) {
    const ready = [...remaining]
      .filter((id) => [...(graph.get(id) ?? [])].every((dep) => scheduled.has(dep)))
      .sort(byId);

    if (ready.length === 0) {
      const [cycle] = findCycles(graph);
      if (cycle) {
        throw new GraphError("cycle", cycle, `Dependency cycle: ${cycle.join(" -> ")}`);
      }
      const stuck = [...remaining].sort(byId);
      throw new GraphError("unresolved", stuck, `Cannot resolve dependencies for: ${stuck.join(", ")}`);
    }

    waves.push(ready);
    for (const id of ready) {
      scheduled.add(id);
      remaining.delete(id);
    }
  }

  return waves;
}

/** Return task ids in dependency order (dependencies first, peers by id). */
export function topologicalSort(graph: DependencyGraph): string[] {
  return computeWaves(graph).flat();
}

/** Map each task id to the index of its wave. */
export function waveIndex(waves: readonly Wave[]): Map<string, number> {
  const index = new Map<string, number>();
  waves.forEach((wave, i) => {
    for (const id of wave) index.set(id, i);
  });
  return index;
}
