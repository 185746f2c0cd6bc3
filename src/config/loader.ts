import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import type { FlowGraph } from "../types/contracts.js";
import { ConfigError } from "../errors.js";
import { compileFlow } from "../orchestrator/compiler.js";

/** Parse and validate a flow document given as YAML (or JSON) text. */
export function parseFlowString(raw: string, source = "<string>"): FlowGraph {
  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (e) {
    if (e instanceof YAMLParseError) throw new ConfigError("InvalidDocument", `${source}: ${e.message}`);
    throw e;
  }
  return compileFlow(doc, source);
}

/** Read a flow file from disk, relative paths resolved against `cwd`. */
export async function loadFlowFile(filePath: string, cwd = process.cwd()): Promise<FlowGraph> {
  const absPath = path.resolve(cwd, filePath);
  const raw = await readFile(absPath, "utf-8");
  return parseFlowString(raw, absPath);
}
