import type { FlowGraph, StepId } from "../types/contracts.js";
import type { Session } from "../session/index.js";
import { InvariantError } from "../errors.js";

export type StepView = "completed" | "running" | "failed" | "eligible" | "blocked";

export interface StepClassification {
  id: StepId;
  view: StepView;
  /** Incomplete prerequisites; empty unless blocked. */
  waitingOn: StepId[];
}

/** A completed step with an incomplete prerequisite means the driver broke the write contract. */
function assertConsistent(graph: FlowGraph, done: Set<StepId>) {
  for (const id of done) {
    for (const dep of graph.dependencies[id] ?? []) {
      if (!done.has(dep)) {
        throw new InvariantError(`Step '${id}' is completed but its dependency '${dep}' is not`);
      }
    }
  }
}

/**
 * Steps whose prerequisites are all completed and which are not completed
 * themselves, in declared order. Manual steps are reported, never run.
 */
export function eligibleSteps(graph: FlowGraph, state: Session): StepId[] {
  const done = state.completed();
  assertConsistent(graph, done);
  return graph.order.filter(id =>
    !done.has(id) && (graph.dependencies[id] ?? []).every(dep => done.has(dep))
  );
}

export function classifySteps(graph: FlowGraph, state: Session): StepClassification[] {
  const eligible = new Set(eligibleSteps(graph, state));
  return graph.order.map((id): StepClassification => {
    const status = state.status(id);
    if (status === "completed" || status === "running" || status === "failed") {
      return { id, view: status, waitingOn: [] };
    }
    if (eligible.has(id)) return { id, view: "eligible", waitingOn: [] };
    return { id, view: "blocked", waitingOn: (graph.dependencies[id] ?? []).filter(d => !state.isCompleted(d)) };
  });
}
