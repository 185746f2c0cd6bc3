import type { StepId } from "../types/contracts.js";
import { ConfigError } from "../errors.js";

/**
 * Kahn's algorithm over `deps` (step → prerequisites). Ties are broken by
 * declared order. Throws ConfigError(CyclicDependency) naming one cycle.
 */
export function topoSort(order: StepId[], deps: Record<StepId, StepId[]>): StepId[] {
  const indeg: Record<string, number> = {};
  const adj: Record<string, string[]> = {};
  for (const id of order) {
    indeg[id] = 0; adj[id] = [];
  }
  for (const id of order) {
    for (const dep of deps[id] ?? []) {
      indeg[id] += 1;
      adj[dep].push(id);
    }
  }
  const q: string[] = order.filter(k => indeg[k] === 0);
  const out: string[] = [];
  while (q.length) {
    const u = q.shift();
    if (u === undefined) break;
    out.push(u);
    for (const v of adj[u]) {
      indeg[v] -= 1;
      if (indeg[v] === 0) q.push(v);
    }
  }
  if (out.length !== order.length) {
    const placed = new Set(out);
    const cycle = findCycle(order.filter(id => !placed.has(id)), deps);
    throw new ConfigError("CyclicDependency", `Dependency cycle: ${cycle.join(" -> ")}`, cycle);
  }
  return out;
}

/** Walks prerequisites from the first unplaced node until a node repeats. */
function findCycle(remaining: StepId[], deps: Record<StepId, StepId[]>): StepId[] {
  const left = new Set(remaining);
  const path: StepId[] = [];
  const onPath = new Map<StepId, number>();
  let node: StepId | undefined = remaining[0];
  while (node !== undefined && !onPath.has(node)) {
    onPath.set(node, path.length);
    path.push(node);
    // Every node left after Kahn's pass has at least one prerequisite also left.
    node = (deps[node] ?? []).find(d => left.has(d));
  }
  if (node === undefined) return remaining;
  const start = onPath.get(node) ?? 0;
  // path holds the walk in prerequisite direction; report it in execution direction.
  const loop = path.slice(start).reverse();
  return [...loop, loop[0]];
}
