export type StepId = string;

export type Scalar = string | number | boolean;

export type StepFields = Record<string, Scalar>;

export interface StepDefinition {
  id: StepId;
  title: string;
  description: string;
  manual: boolean;
  /** Response keys (dot paths) to keep as fields; for manual steps, the fields asked of the user. */
  extract: string[];
  /** Response fields holding URLs that should be made absolute against the server base URL. */
  url_fields: string[];
}

export interface BasicAuth {
  username: string;
  password: string;
}

export interface RequestTemplate {
  method: string;
  url: string;
  headers: Array<[string, string]>;
  body?: string;
  auth?: BasicAuth;
}

export type RuleScope = "url" | "headers" | "data" | "auth";

export type RuleReference =
  | { kind: "step"; stepId: StepId; field: string }
  | { kind: "var"; name: string };

export interface SubstitutionRule {
  token: string;
  ref: RuleReference;
  /** Raw reference text as written in the document, e.g. `step.a.client_id`. */
  source: string;
  /** Undefined means the rule applies to every part of the request. */
  scope?: RuleScope;
}

export interface FlowGraph {
  /** Declared order; the resolver reports eligible steps in this order. */
  order: StepId[];
  steps: Record<StepId, StepDefinition>;
  dependencies: Record<StepId, StepId[]>;
  templates: Record<StepId, RequestTemplate>;
  rules: Record<StepId, SubstitutionRule[]>;
  endpointDefaults: Record<string, string>;
  /** Topological order, computed once at load. */
  topo: StepId[];
  warnings: string[];
}
