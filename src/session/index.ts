import type { FlowGraph, Scalar, StepFields, StepId } from "../types/contracts.js";
import type { HttpResponse, RenderedRequest } from "../types/http.js";
import { InvariantError, type StepError } from "../errors.js";
import { own } from "../records.js";

export type StepStatus = "pending" | "running" | "completed" | "failed";

export interface StepResult {
  status: StepStatus;
  origin: "http" | "manual";
  fields: StepFields;
  request?: RenderedRequest;
  response?: HttpResponse;
  error?: StepError;
  at: string; // ISO timestamp
  durationMs?: number;
}

export interface SessionInit {
  serverUrl?: string;
  discovered?: Record<string, string>;
  variables?: Record<string, string>;
}

/**
 * Per-session progress. Writes go through markRunning/record (the executor)
 * and completeManual (the external signal); restart is the only way back.
 */
export class Session {
  readonly graph: FlowGraph;
  serverUrl?: string;
  discovered: Record<string, string>;
  readonly variables: Record<string, string>;
  private readonly results = new Map<StepId, StepResult>();

  constructor(graph: FlowGraph, init: SessionInit = {}) {
    this.graph = graph;
    this.serverUrl = init.serverUrl;
    this.discovered = { ...(init.discovered ?? {}) };
    this.variables = { ...(init.variables ?? {}) };
  }

  /** A copy; writes go through record/completeManual only. */
  get(stepId: StepId): Readonly<StepResult> | undefined {
    const r = this.results.get(stepId);
    return r && copyResult(r);
  }

  status(stepId: StepId): StepStatus {
    return this.results.get(stepId)?.status ?? "pending";
  }

  isCompleted(stepId: StepId): boolean {
    return this.status(stepId) === "completed";
  }

  completed(): Set<StepId> {
    const out = new Set<StepId>();
    for (const [id, r] of this.results) if (r.status === "completed") out.add(id);
    return out;
  }

  field(stepId: StepId, name: string): Scalar | undefined {
    const r = this.results.get(stepId);
    if (!r || r.status !== "completed") return undefined;
    return own(r.fields, name);
  }

  private step(stepId: StepId) {
    const def = own(this.graph.steps, stepId);
    if (!def) throw new InvariantError(`Unknown step '${stepId}'`);
    return def;
  }

  private assertDepsCompleted(stepId: StepId) {
    const missing = (own(this.graph.dependencies, stepId) ?? []).filter(d => !this.isCompleted(d));
    if (missing.length) {
      throw new InvariantError(`Step '${stepId}' is not eligible: waiting on ${missing.join(", ")}`);
    }
  }

  markRunning(stepId: StepId, request: RenderedRequest): void {
    const def = this.step(stepId);
    if (def.manual) throw new InvariantError(`Manual step '${stepId}' cannot run over HTTP`);
    if (this.isCompleted(stepId)) throw new InvariantError(`Step '${stepId}' already completed; restart it first`);
    if (this.status(stepId) === "running") throw new InvariantError(`Step '${stepId}' is already running`);
    this.assertDepsCompleted(stepId);
    this.results.set(stepId, { status: "running", origin: "http", fields: {}, request, at: new Date().toISOString() });
  }

  record(stepId: StepId, result: StepResult): void {
    this.step(stepId);
    if (this.isCompleted(stepId)) throw new InvariantError(`Step '${stepId}' already has a completed result`);
    if (result.status === "completed") this.assertDepsCompleted(stepId);
    this.results.set(stepId, copyResult(result));
  }

  /** External completion signal for a manual step. */
  completeManual(stepId: StepId, fields: StepFields = {}): StepResult {
    const def = this.step(stepId);
    if (!def.manual) throw new InvariantError(`Step '${stepId}' is not a manual step`);
    if (this.isCompleted(stepId)) throw new InvariantError(`Manual step '${stepId}' is already completed`);
    this.assertDepsCompleted(stepId);
    const result: StepResult = { status: "completed", origin: "manual", fields: { ...fields }, at: new Date().toISOString() };
    this.results.set(stepId, result);
    return copyResult(result);
  }

  /**
   * Clears a step and every step that consumes it, by dependency edge or by
   * substitution rule, transitively. Returns the cleared ids in declared order.
   */
  restart(stepId: StepId): StepId[] {
    this.step(stepId);
    const consumers = consumerIndex(this.graph);
    const hit = new Set<StepId>([stepId]);
    const stack = [stepId];
    while (stack.length) {
      const cur = stack.pop();
      if (cur === undefined) break;
      for (const c of consumers.get(cur) ?? []) {
        if (!hit.has(c)) { hit.add(c); stack.push(c); }
      }
    }
    const cleared = this.graph.order.filter(id => hit.has(id) && this.results.has(id));
    for (const id of cleared) this.results.delete(id);
    return cleared;
  }

  snapshot(): Record<StepId, Readonly<StepResult>> {
    return Object.fromEntries([...this.results].map(([id, r]) => [id, copyResult(r)]));
  }
}

function copyResult(r: StepResult): StepResult {
  return { ...r, fields: { ...r.fields } };
}

function consumerIndex(graph: FlowGraph): Map<StepId, Set<StepId>> {
  const idx = new Map<StepId, Set<StepId>>();
  const add = (from: StepId, to: StepId) => {
    const set = idx.get(from) ?? new Set<StepId>();
    set.add(to);
    idx.set(from, set);
  };
  for (const id of graph.order) {
    for (const dep of graph.dependencies[id] ?? []) add(dep, id);
    for (const rule of graph.rules[id] ?? []) {
      if (rule.ref.kind === "step") add(rule.ref.stepId, id);
    }
  }
  return idx;
}
