// src/orchestrator/run.ts
// Scheduling loop: ask the resolver what is eligible, run automatic steps one
// at a time in declared order, hand manual steps to the caller. Stops when
// nothing eligible is left to attempt; steps parked behind a manual step are
// waiting, not failed.

import type { StepDefinition, StepFields, StepId } from "../types/contracts.js";
import type { Session } from "../session/index.js";
import { COLOR, fmtMs, log } from "../log.js";
import { classifySteps, eligibleSteps } from "./resolver.js";
import { runStep, type ExecuteOptions } from "./executor.js";

export interface RunOptions extends ExecuteOptions {
  /** Called once per eligible manual step. Return fields to complete it, undefined to leave it waiting. */
  onManual?: (step: StepDefinition, session: Session) => Promise<StepFields | undefined>;
}

export interface RunSummary {
  executed: StepId[];
  completed: StepId[];
  failed: StepId[];
  /** Eligible manual steps nobody has completed. */
  waiting: StepId[];
  blocked: StepId[];
}

export async function runFlow(session: Session, opts: RunOptions): Promise<RunSummary> {
  const { graph } = session;
  const attempted = new Set<StepId>();
  const asked = new Set<StepId>();
  const executed: StepId[] = [];
  const runStart = Date.now();

  for (;;) {
    const eligible = eligibleSteps(graph, session);

    const next = eligible.find(id => !graph.steps[id].manual && !attempted.has(id));
    if (next !== undefined) {
      attempted.add(next);
      executed.push(next);
      await runStep(session, next, opts);
      continue;
    }

    const manual = eligible.find(id => graph.steps[id].manual && !asked.has(id));
    if (manual !== undefined && opts.onManual) {
      asked.add(manual);
      const fields = await opts.onManual(graph.steps[manual], session);
      if (fields) {
        session.completeManual(manual, fields);
        log.info(`${COLOR.green("✓ done")} ${manual} ${COLOR.gray("(manual)")}`);
      }
      continue;
    }
    break;
  }

  const summary: RunSummary = { executed, completed: [], failed: [], waiting: [], blocked: [] };
  for (const c of classifySteps(graph, session)) {
    if (c.view === "completed") summary.completed.push(c.id);
    else if (c.view === "failed") summary.failed.push(c.id);
    else if (c.view === "eligible" && graph.steps[c.id].manual) summary.waiting.push(c.id);
    else if (c.view === "blocked") summary.blocked.push(c.id);
  }

  log.info(COLOR.gray(
    `\nrun: ${executed.length} executed, ${summary.completed.length}/${graph.order.length} completed, ` +
    `${summary.failed.length} failed, ${summary.waiting.length} waiting (${fmtMs(Date.now() - runStart)})`
  ));
  return summary;
}
