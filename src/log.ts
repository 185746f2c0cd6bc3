// src/log.ts
// Console logging with ANSI colours. QUIET=1 silences everything but errors;
// LOG_LEVEL=debug|info|warn|error sets the floor.

export type LogLevel = "debug" | "info" | "warn" | "error";

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
};

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

function isLevel(v: string): v is LogLevel {
  return LEVELS.some(level => level === v);
}

function levelFromEnv(): LogLevel {
  if (process.env.QUIET === "1") return "error";
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLevel(raw) ? raw : "info";
}

let floor: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel) {
  floor = level;
}

const enabled = (level: LogLevel) => LEVELS.indexOf(level) >= LEVELS.indexOf(floor);

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export const log = {
  debug(msg: string) {
    if (enabled("debug")) console.log(COLOR.gray(`  ${msg}`));
  },
  info(msg: string) {
    if (enabled("info")) console.log(msg);
  },
  warn(msg: string) {
    if (enabled("warn")) console.warn(COLOR.yellow(`[warn] ${msg}`));
  },
  error(msg: string) {
    if (enabled("error")) console.error(COLOR.red(`[error] ${msg}`));
  },
};

export { isLevel as isLogLevel };
