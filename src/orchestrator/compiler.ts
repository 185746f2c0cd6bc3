import type {
  FlowGraph,
  RequestTemplate,
  RuleReference,
  RuleScope,
  StepDefinition,
  StepId,
  SubstitutionRule,
} from "../types/contracts.js";
import { ConfigError } from "../errors.js";
import { own } from "../records.js";
import { parseCurl } from "../template/curl.js";
import { topoSort } from "./topo.js";

const SCOPES: RuleScope[] = ["url", "headers", "data", "auth"];

type Doc = Record<string, unknown>;

function isRecord(v: unknown): v is Doc {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isScope(k: string): k is RuleScope {
  return SCOPES.some(scope => scope === k);
}

function invalid(source: string, msg: string): ConfigError {
  return new ConfigError("InvalidDocument", `${source}: ${msg}`);
}

function stringList(v: unknown, what: string, source: string): string[] {
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v) || !v.every((x): x is string => typeof x === "string")) {
    throw invalid(source, `${what} must be a list of strings`);
  }
  return v.slice();
}

function stringMap(v: unknown, what: string, source: string): Record<string, string> {
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) throw invalid(source, `${what} must be a mapping`);
  const out: Record<string, string> = {};
  for (const [k, val] of Object.entries(v)) {
    if (typeof val !== "string") throw invalid(source, `${what}.${k} must be a string`);
    out[k] = val;
  }
  return out;
}

function parseSteps(raw: unknown, source: string): StepDefinition[] {
  if (!Array.isArray(raw) || raw.length === 0) throw invalid(source, "'steps' must be a non-empty list");
  const seen = new Set<string>();
  return raw.map((s, i) => {
    if (!isRecord(s)) throw invalid(source, `steps[${i}] must be a mapping`);
    const id = s.id;
    if (typeof id !== "string" || !id.trim()) throw invalid(source, `steps[${i}] needs a string 'id'`);
    if (seen.has(id)) throw new ConfigError("DuplicateStepId", `${source}: step '${id}' is declared twice`);
    seen.add(id);
    if (s.manual !== undefined && typeof s.manual !== "boolean") throw invalid(source, `step '${id}': 'manual' must be a boolean`);
    return {
      id,
      title: typeof s.title === "string" ? s.title : id,
      description: typeof s.description === "string" ? s.description : "",
      manual: s.manual === true,
      extract: stringList(s.extract, `step '${id}' extract`, source),
      url_fields: stringList(s.url_fields, `step '${id}' url_fields`, source),
    };
  });
}

function known(ids: Set<string>, id: string, where: string, source: string) {
  if (!ids.has(id)) {
    throw new ConfigError("UnknownStepReference", `${source}: ${where} references unknown step '${id}'`);
  }
}

function parseRequest(raw: unknown, label: string): RequestTemplate {
  if (!isRecord(raw)) throw new ConfigError("InvalidDocument", `${label} must be a mapping`);
  const url = raw.url;
  if (typeof url !== "string" || !url) throw new ConfigError("InvalidDocument", `${label} needs a 'url'`);

  const headers: Array<[string, string]> = [];
  if (isRecord(raw.headers)) {
    for (const [k, v] of Object.entries(raw.headers)) {
      if (typeof v !== "string") throw new ConfigError("InvalidDocument", `${label} header '${k}' must be a string`);
      headers.push([k, v]);
    }
  } else if (raw.headers !== undefined && raw.headers !== null) {
    throw new ConfigError("InvalidDocument", `${label} headers must be a mapping`);
  }

  let body: string | undefined;
  if (typeof raw.body === "string") body = raw.body;
  else if (raw.body !== undefined && raw.body !== null) body = JSON.stringify(raw.body, null, 2);

  const req: RequestTemplate = {
    method: typeof raw.method === "string" ? raw.method.toUpperCase() : (body !== undefined ? "POST" : "GET"),
    url,
    headers,
  };
  if (body !== undefined) req.body = body;
  const auth = raw.auth;
  if (auth !== undefined && auth !== null) {
    const username = isRecord(auth) ? auth.username : undefined;
    if (!isRecord(auth) || typeof username !== "string") {
      throw new ConfigError("InvalidDocument", `${label} auth needs a 'username'`);
    }
    req.auth = { username, password: typeof auth.password === "string" ? auth.password : "" };
  }
  return req;
}

export function parseReference(ref: string, where: string): RuleReference {
  const step = /^step\.([^.]+)\.(.+)$/.exec(ref);
  if (step) return { kind: "step", stepId: step[1], field: step[2] };
  const v = /^var\.(.+)$/.exec(ref);
  if (v) return { kind: "var", name: v[1] };
  throw new ConfigError("InvalidReference", `${where}: '${ref}' is not of the form step.<id>.<field> or var.<name>`);
}

function parseRules(stepId: StepId, raw: unknown, ids: Set<string>, source: string): SubstitutionRule[] {
  if (raw === null || raw === undefined) return [];
  if (!isRecord(raw)) throw invalid(source, `substitution_rules.${stepId} must be a mapping`);
  const rules: SubstitutionRule[] = [];

  const add = (token: string, ref: unknown, scope?: RuleScope) => {
    const where = `${source}: substitution_rules.${stepId}${scope ? "." + scope : ""}['${token}']`;
    if (typeof ref !== "string") throw new ConfigError("InvalidDocument", `${where} must be a string reference`);
    if (!token) throw new ConfigError("InvalidDocument", `${where}: empty placeholder token`);
    const parsed = parseReference(ref, where);
    if (parsed.kind === "step") known(ids, parsed.stepId, where, source);
    rules.push({ token, ref: parsed, source: ref, ...(scope ? { scope } : {}) });
  };

  for (const [key, value] of Object.entries(raw)) {
    if (isScope(key) && isRecord(value)) {
      for (const [token, ref] of Object.entries(value)) add(token, ref, key);
    } else {
      add(key, value);
    }
  }
  return rules;
}

/** Steps reachable by following prerequisites from `id`. */
function ancestorsOf(id: StepId, deps: Record<StepId, StepId[]>): Set<StepId> {
  const seen = new Set<StepId>();
  const stack = [...(deps[id] ?? [])];
  while (stack.length) {
    const cur = stack.pop();
    if (cur === undefined || seen.has(cur)) continue;
    seen.add(cur);
    stack.push(...(deps[cur] ?? []));
  }
  return seen;
}

/**
 * Validates a parsed flow document and builds the immutable graph.
 * Pure: all failures surface as ConfigError.
 */
export function compileFlow(doc: unknown, source = "<flow>"): FlowGraph {
  if (!isRecord(doc)) throw invalid(source, "document must be a mapping");

  const defs = parseSteps(doc.steps, source);
  const order = defs.map(d => d.id);
  const ids = new Set(order);
  const steps: Record<StepId, StepDefinition> = Object.fromEntries(defs.map(d => [d.id, d]));

  const dependencies: Record<StepId, StepId[]> = Object.fromEntries(order.map((id): [StepId, StepId[]] => [id, []]));
  if (doc.dependencies !== undefined && doc.dependencies !== null) {
    if (!isRecord(doc.dependencies)) throw invalid(source, "'dependencies' must be a mapping");
    for (const [id, list] of Object.entries(doc.dependencies)) {
      known(ids, id, `dependencies.${id}`, source);
      for (const dep of stringList(list, `dependencies.${id}`, source)) {
        known(ids, dep, `dependencies.${id}`, source);
        if (!dependencies[id].includes(dep)) dependencies[id].push(dep);
      }
    }
  }

  const templates: Record<StepId, RequestTemplate> = {};
  const curl = stringMap(doc.curl_templates, "curl_templates", source);
  for (const [id, cmd] of Object.entries(curl)) {
    known(ids, id, `curl_templates.${id}`, source);
    if (!cmd.trim()) continue;
    templates[id] = parseCurl(cmd, `${source}: curl_templates.${id}`);
  }
  if (doc.requests !== undefined && doc.requests !== null) {
    if (!isRecord(doc.requests)) throw invalid(source, "'requests' must be a mapping");
    for (const [id, raw] of Object.entries(doc.requests)) {
      known(ids, id, `requests.${id}`, source);
      if (own(templates, id)) throw invalid(source, `step '${id}' has both a curl template and a request`);
      templates[id] = parseRequest(raw, `${source}: requests.${id}`);
    }
  }
  for (const id of order) {
    const template = own(templates, id);
    if (steps[id].manual && template) throw invalid(source, `manual step '${id}' cannot have a request template`);
    if (!steps[id].manual && !template) {
      throw new ConfigError("MissingTemplate", `${source}: step '${id}' has no request template`);
    }
  }

  const rules: Record<StepId, SubstitutionRule[]> = Object.fromEntries(order.map((id): [StepId, SubstitutionRule[]] => [id, []]));
  if (doc.substitution_rules !== undefined && doc.substitution_rules !== null) {
    if (!isRecord(doc.substitution_rules)) throw invalid(source, "'substitution_rules' must be a mapping");
    for (const [id, raw] of Object.entries(doc.substitution_rules)) {
      known(ids, id, `substitution_rules.${id}`, source);
      rules[id] = parseRules(id, raw, ids, source);
    }
  }

  const endpointDefaults = {
    ...stringMap(doc.endpoint_defaults, "endpoint_defaults", source),
    ...stringMap(doc.endpoints, "endpoints", source),
  };

  const topo = topoSort(order, dependencies);

  const warnings: string[] = [];
  for (const id of order) {
    const ancestors = ancestorsOf(id, dependencies);
    for (const rule of rules[id]) {
      if (rule.ref.kind === "step" && !ancestors.has(rule.ref.stepId)) {
        warnings.push(`step '${id}' substitutes ${rule.token} from '${rule.ref.stepId}', which it does not depend on`);
      }
    }
  }

  return { order, steps, dependencies, templates, rules, endpointDefaults, topo, warnings };
}
