import type { StepId } from "./types/contracts.js";

export abstract class TokenflowError extends Error {
  abstract readonly kind: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type ConfigErrorKind =
  | "InvalidDocument"
  | "DuplicateStepId"
  | "UnknownStepReference"
  | "CyclicDependency"
  | "InvalidReference"
  | "MissingTemplate";

/** Load-time, fatal. No partial graph is ever returned alongside one. */
export class ConfigError extends TokenflowError {
  constructor(
    readonly kind: ConfigErrorKind,
    message: string,
    readonly cycle?: StepId[]
  ) {
    super(message);
  }
}

export type SubstitutionErrorKind = "UnresolvedEndpoint" | "MissingUpstreamValue" | "UnboundPlaceholder";

export class SubstitutionError extends TokenflowError {
  constructor(
    readonly kind: SubstitutionErrorKind,
    readonly token: string,
    message: string
  ) {
    super(message);
  }
}

export class TransportError extends TokenflowError {
  constructor(
    readonly kind: "timeout" | "network",
    message: string
  ) {
    super(message);
  }
}

export class HttpError extends TokenflowError {
  readonly kind = "HttpError";

  constructor(
    readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status}${statusText ? " " + statusText : ""}`);
  }
}

/** Engine state corruption or misuse by the driver. Fatal to the session. */
export class InvariantError extends TokenflowError {
  readonly kind = "InvariantError";
}

export class DiscoveryError extends TokenflowError {
  readonly kind = "DiscoveryError";
}

export type StepError = SubstitutionError | TransportError | HttpError;

export function describeError(err: unknown): string {
  if (err instanceof TokenflowError) return `${err.name}(${err.kind}): ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
