// src/template/curl.ts
// Turns a curl command template into a RequestTemplate. Placeholders such as
// {token_endpoint} or <client-id> pass through untouched; they are resolved at
// render time.
import type { BasicAuth, RequestTemplate } from "../types/contracts.js";
import type { RenderedRequest } from "../types/http.js";
import { ConfigError } from "../errors.js";

const IGNORED_FLAGS = new Set(["-s", "--silent", "-S", "--show-error", "--compressed", "-i", "--include"]);

const DATA_FLAGS = new Set(["-d", "--data", "--data-raw", "--data-binary"]);

/** Shell-style word splitting: quotes, backslash escapes and line continuations. */
export function tokenize(cmd: string, label = "curl template"): string[] {
  const out: string[] = [];
  let cur = "";
  let inWord = false;
  let i = 0;

  const flush = () => {
    if (inWord) out.push(cur);
    cur = "";
    inWord = false;
  };

  while (i < cmd.length) {
    const ch = cmd[i];
    if (ch === "'") {
      const end = cmd.indexOf("'", i + 1);
      if (end === -1) throw new ConfigError("InvalidDocument", `${label}: unterminated single quote`);
      cur += cmd.slice(i + 1, end);
      inWord = true;
      i = end + 1;
      continue;
    }
    if (ch === '"') {
      i++;
      let closed = false;
      while (i < cmd.length) {
        const c = cmd[i];
        if (c === '"') { closed = true; i++; break; }
        if (c === "\\" && i + 1 < cmd.length) {
          const nx = cmd[i + 1];
          if (nx === "\n") { i += 2; continue; }
          if (nx === '"' || nx === "\\" || nx === "$" || nx === "`") { cur += nx; i += 2; continue; }
        }
        cur += c;
        i++;
      }
      if (!closed) throw new ConfigError("InvalidDocument", `${label}: unterminated double quote`);
      inWord = true;
      continue;
    }
    if (ch === "\\") {
      if (cmd[i + 1] === "\n") { i += 2; continue; }
      if (cmd[i + 1] === "\r" && cmd[i + 2] === "\n") { i += 3; continue; }
      if (i + 1 < cmd.length) {
        cur += cmd[i + 1];
        inWord = true;
        i += 2;
        continue;
      }
      i++;
      continue;
    }
    if (/\s/.test(ch)) {
      flush();
      i++;
      continue;
    }
    cur += ch;
    inWord = true;
    i++;
  }
  flush();
  return out;
}

function splitOnce(s: string, sep: string): [string, string | undefined] {
  const ix = s.indexOf(sep);
  if (ix === -1) return [s, undefined];
  return [s.slice(0, ix), s.slice(ix + sep.length)];
}

export function parseCurl(cmd: string, label = "curl template"): RequestTemplate {
  const words = tokenize(cmd, label);
  if (words[0] !== "curl") {
    throw new ConfigError("InvalidDocument", `${label}: command must start with 'curl'`);
  }

  let method: string | undefined;
  let url: string | undefined;
  const headers: Array<[string, string]> = [];
  const data: string[] = [];
  let auth: BasicAuth | undefined;

  for (let i = 1; i < words.length; i++) {
    let flag = words[i];
    let inline: string | undefined;

    if (flag.startsWith("--") && flag.includes("=")) {
      [flag, inline] = splitOnce(flag, "=");
    } else if (/^-[XHdu]./.test(flag)) {
      inline = flag.slice(2);
      flag = flag.slice(0, 2);
    }

    const value = (): string => {
      if (inline !== undefined) return inline;
      const v = words[++i];
      if (v === undefined) throw new ConfigError("InvalidDocument", `${label}: ${flag} needs a value`);
      return v;
    };

    if (flag === "-X" || flag === "--request") {
      method = value().toUpperCase();
    } else if (flag === "-H" || flag === "--header") {
      const [name, rest] = splitOnce(value(), ":");
      if (rest === undefined) throw new ConfigError("InvalidDocument", `${label}: malformed header '${name}'`);
      headers.push([name.trim(), rest.trim()]);
    } else if (DATA_FLAGS.has(flag)) {
      data.push(value());
    } else if (flag === "-u" || flag === "--user") {
      const [username, password] = splitOnce(value(), ":");
      auth = { username, password: password ?? "" };
    } else if (IGNORED_FLAGS.has(flag)) {
      continue;
    } else if (flag.startsWith("-")) {
      throw new ConfigError("InvalidDocument", `${label}: unsupported curl option '${flag}'`);
    } else {
      if (url !== undefined) throw new ConfigError("InvalidDocument", `${label}: more than one URL ('${url}', '${flag}')`);
      url = flag;
    }
  }

  if (url === undefined) throw new ConfigError("InvalidDocument", `${label}: no URL given`);

  const body = data.length ? data.join("&") : undefined;
  return {
    method: method ?? (body !== undefined ? "POST" : "GET"),
    url,
    headers,
    ...(body !== undefined ? { body } : {}),
    ...(auth ? { auth } : {}),
  };
}

const shellQuote = (s: string) => (/^[\w@%+=:,./-]+$/.test(s) ? s : `'${s.replace(/'/g, `'\\''`)}'`);

/** A rendered request as a copy-pasteable curl command, one option per line. */
export function toCurl(req: RenderedRequest): string {
  const parts = [`curl -X ${req.method} ${shellQuote(req.url)}`];
  for (const [k, v] of req.headers) parts.push(`-H ${shellQuote(`${k}: ${v}`)}`);
  if (req.auth) parts.push(`-u ${shellQuote(`${req.auth.username}:${req.auth.password}`)}`);
  if (req.body !== undefined) parts.push(`-d ${shellQuote(req.body)}`);
  return parts.join(" \\\n  ");
}
