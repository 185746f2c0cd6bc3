import type { FlowGraph, RuleScope, StepId, SubstitutionRule } from "../types/contracts.js";
import type { RenderedRequest } from "../types/http.js";
import type { Session } from "../session/index.js";
import { InvariantError, SubstitutionError } from "../errors.js";
import { own } from "../records.js";

export interface EndpointContext {
  discovered: Record<string, string>;
  defaults: Record<string, string>;
  /** Base for defaults given as paths, e.g. `/token`. */
  baseUrl?: string;
  variables: Record<string, string>;
}

export type RenderOutcome =
  | { ok: true; request: RenderedRequest }
  | { ok: false; error: SubstitutionError };

const ENDPOINT_RE = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const PLACEHOLDER_RE = /<[A-Za-z0-9][\w.:-]*>/g;

const escapeRe = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export function endpointContext(session: Session): EndpointContext {
  return {
    discovered: session.discovered,
    defaults: session.graph.endpointDefaults,
    baseUrl: session.serverUrl,
    variables: session.variables,
  };
}

function lookupEndpoint(name: string, ctx: EndpointContext): string | undefined {
  const found = own(ctx.discovered, name);
  if (found) return found;
  const fallback = own(ctx.defaults, name);
  if (fallback) {
    if (!fallback.startsWith("/")) return fallback;
    if (ctx.baseUrl) return ctx.baseUrl.replace(/\/+$/, "") + fallback;
  }
  return own(ctx.variables, name);
}

function fillEndpoints(text: string, ctx: EndpointContext): string {
  for (const m of text.matchAll(ENDPOINT_RE)) {
    if (lookupEndpoint(m[1], ctx) === undefined) {
      throw new SubstitutionError("UnresolvedEndpoint", m[1], `No discovered or default value for {${m[1]}}`);
    }
  }
  return text.replace(ENDPOINT_RE, (_m, name: string) => lookupEndpoint(name, ctx) ?? "");
}

function resolveRule(rule: SubstitutionRule, state: Session, ctx: EndpointContext): string {
  if (rule.ref.kind === "var") {
    const v = own(ctx.variables, rule.ref.name);
    if (v === undefined) {
      throw new SubstitutionError("MissingUpstreamValue", rule.token, `${rule.token}: session variable '${rule.ref.name}' is not set`);
    }
    return v;
  }
  const { stepId, field } = rule.ref;
  if (!state.isCompleted(stepId)) {
    throw new SubstitutionError("MissingUpstreamValue", rule.token, `${rule.token}: step '${stepId}' has not completed`);
  }
  const v = state.field(stepId, field);
  if (v === undefined) {
    throw new SubstitutionError("MissingUpstreamValue", rule.token, `${rule.token}: step '${stepId}' produced no field '${field}'`);
  }
  return String(v);
}

/** Literal, single-pass replacement: inserted values are never scanned again. */
function substitute(text: string, scope: RuleScope, rules: SubstitutionRule[], values: Map<SubstitutionRule, string>): string {
  const byToken = new Map<string, string>();
  for (const r of rules) {
    if (r.scope === undefined || r.scope === scope) {
      const v = values.get(r);
      if (v !== undefined) byToken.set(r.token, v);
    }
  }

  let stripped = text;
  if (byToken.size) {
    const tokens = [...byToken.keys()].sort((a, b) => b.length - a.length);
    const re = new RegExp(tokens.map(escapeRe).join("|"), "g");
    stripped = text.replace(re, "");
    text = text.replace(re, m => byToken.get(m) ?? m);
  }

  const leftover = stripped.match(PLACEHOLDER_RE);
  if (leftover) {
    throw new SubstitutionError("UnboundPlaceholder", leftover[0], `${leftover[0]} in ${scope} has no substitution rule`);
  }
  return text;
}

/**
 * Renders a step's request template. Pure: reads the graph, the session and
 * the endpoint context; writes nothing.
 */
export function renderRequest(graph: FlowGraph, stepId: StepId, state: Session, ctx: EndpointContext): RenderOutcome {
  const tpl = own(graph.templates, stepId);
  if (!tpl) throw new InvariantError(`Step '${stepId}' has no request template`);
  const rules = own(graph.rules, stepId) ?? [];

  try {
    const url = fillEndpoints(tpl.url, ctx);
    const headers = tpl.headers.map(([k, v]): [string, string] => [k, fillEndpoints(v, ctx)]);
    const body = tpl.body !== undefined ? fillEndpoints(tpl.body, ctx) : undefined;
    const auth = tpl.auth
      ? { username: fillEndpoints(tpl.auth.username, ctx), password: fillEndpoints(tpl.auth.password, ctx) }
      : undefined;

    const values = new Map<SubstitutionRule, string>();
    for (const rule of rules) values.set(rule, resolveRule(rule, state, ctx));

    const request: RenderedRequest = {
      method: tpl.method,
      url: substitute(url, "url", rules, values),
      headers: headers.map(([k, v]): [string, string] => [k, substitute(v, "headers", rules, values)]),
    };
    if (body !== undefined) request.body = substitute(body, "data", rules, values);
    if (auth) {
      request.auth = {
        username: substitute(auth.username, "auth", rules, values),
        password: substitute(auth.password, "auth", rules, values),
      };
    }
    return { ok: true, request };
  } catch (e) {
    if (e instanceof SubstitutionError) return { ok: false, error: e };
    throw e;
  }
}

export function renderStep(session: Session, stepId: StepId): RenderOutcome {
  return renderRequest(session.graph, stepId, session, endpointContext(session));
}
