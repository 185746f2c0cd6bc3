import type { Scalar, StepDefinition, StepFields, StepId } from "../types/contracts.js";
import type { HttpResponse, RenderedRequest } from "../types/http.js";
import type { Session, StepResult } from "../session/index.js";
import { HttpError, InvariantError, TransportError, describeError } from "../errors.js";
import { sendRequest } from "../http/request.js";
import { renderStep } from "../template/renderer.js";
import { COLOR, fmtMs, log } from "../log.js";
import { eligibleSteps } from "./resolver.js";
import { writeJson, type ArtifactTarget } from "./materialize.js";
import { own } from "../records.js";

export interface ExecuteOptions {
  timeoutMs: number;
  /** Base for making relative `url_fields` absolute. */
  serverUrl?: string;
  artifacts?: ArtifactTarget;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isScalar(v: unknown): v is Scalar {
  return typeof v === "string" || typeof v === "number" || typeof v === "boolean";
}

export function getPath(obj: unknown, path: string): unknown {
  let cur: unknown = obj;
  for (const part of path.split(".")) {
    if (Array.isArray(cur) && /^\d+$/.test(part)) cur = cur[Number(part)];
    else if (isRecord(cur)) cur = own(cur, part);
    else return undefined;
  }
  return cur;
}

/**
 * Declared keys are looked up by dot path; a key that is absent or not a
 * scalar stays unset. Without declared keys every top-level scalar is kept.
 */
export function extractFields(step: StepDefinition, json: unknown): StepFields {
  const fields: StepFields = {};
  if (step.extract.length) {
    for (const key of step.extract) {
      const v = getPath(json, key);
      if (isScalar(v)) fields[key] = v;
    }
    return fields;
  }
  if (isRecord(json)) {
    for (const [k, v] of Object.entries(json)) if (isScalar(v)) fields[k] = v;
  }
  return fields;
}

/** Relative URLs in the named fields become absolute against the server base. */
export function absolutizeUrls(step: StepDefinition, json: unknown, serverUrl?: string): unknown {
  if (!serverUrl || !step.url_fields.length || !isRecord(json)) return json;
  const base = serverUrl.replace(/\/+$/, "");
  const out: Record<string, unknown> = { ...json };
  for (const f of step.url_fields) {
    const v = out[f];
    if (typeof v === "string" && v.startsWith("/")) out[f] = base + v;
  }
  return out;
}

/** Issues a rendered request and classifies the outcome. Never throws for per-step failures. */
export async function execute(step: StepDefinition, request: RenderedRequest, opts: ExecuteOptions): Promise<StepResult> {
  const at = new Date().toISOString();
  const t0 = Date.now();
  let response: HttpResponse;
  try {
    response = await sendRequest(request, { timeoutMs: opts.timeoutMs });
  } catch (e) {
    if (!(e instanceof TransportError)) throw e;
    return { status: "failed", origin: "http", fields: {}, request, error: e, at, durationMs: Date.now() - t0 };
  }
  const durationMs = Date.now() - t0;

  if (response.status < 200 || response.status > 299) {
    return {
      status: "failed", origin: "http", fields: {}, request, response,
      error: new HttpError(response.status, response.statusText), at, durationMs,
    };
  }

  const json = absolutizeUrls(step, response.json, opts.serverUrl);
  if (json !== undefined) response.json = json;
  return { status: "completed", origin: "http", fields: extractFields(step, json), request, response, at, durationMs };
}

/**
 * Render, execute and record one automatic step. The only path by which an
 * HTTP result reaches the session.
 */
export async function runStep(session: Session, stepId: StepId, opts: ExecuteOptions): Promise<StepResult> {
  const step = own(session.graph.steps, stepId);
  if (!step) throw new InvariantError(`Unknown step '${stepId}'`);
  if (step.manual) throw new InvariantError(`Step '${stepId}' is manual; complete it instead of running it`);
  if (session.isCompleted(stepId)) throw new InvariantError(`Step '${stepId}' already completed; restart it first`);
  if (!eligibleSteps(session.graph, session).includes(stepId)) {
    throw new InvariantError(`Step '${stepId}' is not eligible yet`);
  }

  log.info(`\n${COLOR.cyan("▶ step")} ${stepId} ${COLOR.gray(step.title)}`);

  const outcome = renderStep(session, stepId);
  if (!outcome.ok) {
    const result: StepResult = { status: "failed", origin: "http", fields: {}, error: outcome.error, at: new Date().toISOString() };
    session.record(stepId, result);
    log.info(`${COLOR.red("✗ failed")} ${stepId} ${COLOR.gray(describeError(outcome.error))}`);
    return result;
  }

  const request = outcome.request;
  log.debug(`${request.method} ${request.url}`);
  session.markRunning(stepId, request);
  const result = await execute(step, request, opts);
  session.record(stepId, result);

  if (opts.artifacts) {
    writeJson(opts.artifacts, stepId, "request.json", request);
    if (result.response) writeJson(opts.artifacts, stepId, "response.json", result.response);
  }

  const took = COLOR.gray("(" + fmtMs(result.durationMs ?? 0) + ")");
  if (result.status === "completed") {
    const keys = Object.keys(result.fields);
    log.info(`${COLOR.green("✓ done")} ${stepId} ${took}${keys.length ? " " + COLOR.gray("fields: " + keys.join(", ")) : ""}`);
  } else {
    log.info(`${COLOR.red("✗ failed")} ${stepId} ${took} ${COLOR.gray(result.error ? describeError(result.error) : "")}`);
  }
  return result;
}
