import type { RenderedRequest, HttpResponse } from "../types/http.js";
import { TransportError } from "../errors.js";

export interface RequestOptions {
  timeoutMs: number;
}

function hasHeader(headers: Array<[string, string]>, name: string): boolean {
  const n = name.toLowerCase();
  return headers.some(([k]) => k.toLowerCase() === n);
}

/** Headers as sent: basic auth folded in, curl's default form content type for bodies. */
export function wireHeaders(req: RenderedRequest): Array<[string, string]> {
  const out = req.headers.slice();
  if (req.auth && !hasHeader(out, "authorization")) {
    const token = Buffer.from(`${req.auth.username}:${req.auth.password}`, "utf-8").toString("base64");
    out.push(["Authorization", `Basic ${token}`]);
  }
  if (req.body !== undefined && !hasHeader(out, "content-type")) {
    out.push(["Content-Type", "application/x-www-form-urlencoded"]);
  }
  return out;
}

function parseJson(text: string): unknown {
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Sends the request. Any HTTP status resolves; only transport failures and
 * timeouts reject, as TransportError.
 */
export async function sendRequest(req: RenderedRequest, opts: RequestOptions): Promise<HttpResponse> {
  let res: Response;
  try {
    res = await fetch(req.url, {
      method: req.method,
      headers: wireHeaders(req),
      body: req.body,
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
  } catch (e) {
    throw toTransportError(e, req, opts.timeoutMs);
  }

  let text: string;
  try {
    text = await res.text();
  } catch (e) {
    throw toTransportError(e, req, opts.timeoutMs);
  }
  const hdrs: Record<string, string> = {};
  res.headers.forEach((v, k) => { hdrs[k] = v; });
  const json = parseJson(text);
  return {
    status: res.status,
    statusText: res.statusText,
    headers: hdrs,
    body: text,
    ...(json !== undefined ? { json } : {}),
  };
}

function toTransportError(e: unknown, req: RenderedRequest, timeoutMs: number): TransportError {
  const name = typeof e === "object" && e !== null && "name" in e ? String(e.name) : "";
  if (name === "TimeoutError" || name === "AbortError") {
    return new TransportError("timeout", `${req.method} ${req.url} timed out after ${timeoutMs}ms`);
  }
  const cause = e instanceof Error && e.cause instanceof Error ? `: ${e.cause.message}` : "";
  const msg = e instanceof Error ? e.message : String(e);
  return new TransportError("network", `${req.method} ${req.url} failed: ${msg}${cause}`);
}
