import { isLogLevel, type LogLevel } from "../log.js";

export interface Settings {
  flowPath: string;
  serverUrl?: string;
  apiKey?: string;
  timeoutMs: number;
  runId?: string;
  logLevel?: LogLevel;
}

export const DEFAULT_FLOW = "flows/token-exchange.yaml";
export const DEFAULT_TIMEOUT_MS = 10_000;

type Env = Record<string, string | undefined>;

function nonEmpty(v: string | undefined): string | undefined {
  const t = v?.trim();
  return t ? t : undefined;
}

/** Reads settings from the environment. Call after `dotenv/config` has been imported. */
export function loadSettings(env: Env = process.env): Settings {
  const rawTimeout = nonEmpty(env.HTTP_TIMEOUT_MS);
  let timeoutMs = DEFAULT_TIMEOUT_MS;
  if (rawTimeout !== undefined) {
    const n = Number(rawTimeout);
    if (!Number.isFinite(n) || n <= 0) {
      throw new Error(`HTTP_TIMEOUT_MS must be a positive number, got '${rawTimeout}'`);
    }
    timeoutMs = n;
  }

  const level = nonEmpty(env.LOG_LEVEL)?.toLowerCase();

  return {
    flowPath: nonEmpty(env.FLOW_CONFIG) ?? DEFAULT_FLOW,
    serverUrl: nonEmpty(env.OAUTH_SERVER_URL),
    apiKey: nonEmpty(env.API_KEY),
    timeoutMs,
    runId: nonEmpty(env.RUN_ID),
    logLevel: level && isLogLevel(level) ? level : undefined,
  };
}
