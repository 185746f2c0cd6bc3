import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { log } from "../log.js";
import { describeError } from "../errors.js";

export interface ArtifactTarget {
  runId: string;
  /** Defaults to `runs` under the working directory. */
  baseDir?: string;
}

/** Writes `<baseDir>/<runId>/<stepId>/<name>`. A failed write is logged, never thrown. */
export function writeJson(target: ArtifactTarget, stepId: string, name: string, obj: unknown): string | undefined {
  const dir = join(target.baseDir ?? "runs", target.runId, stepId);
  const file = join(dir, name);
  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(file, JSON.stringify(obj, null, 2), "utf-8");
    return file;
  } catch (e) {
    log.warn(`could not write ${file}: ${describeError(e)}`);
    return undefined;
  }
}
