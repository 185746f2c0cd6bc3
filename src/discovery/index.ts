import { DiscoveryError, TransportError } from "../errors.js";
import { sendRequest } from "../http/request.js";
import type { HttpResponse } from "../types/http.js";

export const WELL_KNOWN_PATH = "/.well-known/openid-configuration";

export const REQUIRED_METADATA = ["issuer", "registration_endpoint", "authorization_endpoint", "token_endpoint"];

const SUMMARY_ENDPOINTS = [
  "issuer",
  "registration_endpoint",
  "device_authorization_endpoint",
  "token_endpoint",
  "introspection_endpoint",
  "userinfo_endpoint",
];

export interface DiscoveredServer {
  /** Endpoint name → absolute URL, e.g. token_endpoint. Also issuer and jwks_uri. */
  endpoints: Record<string, string>;
  scopes_supported: string[];
  response_types_supported: string[];
  grant_types_supported: string[];
}

function stringArray(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}

export function discoveryUrl(serverUrl: string): string {
  return serverUrl.replace(/\/+$/, "") + WELL_KNOWN_PATH;
}

/** Reads the server's OIDC metadata document and keeps its endpoints. */
export async function discoverEndpoints(serverUrl: string, opts: { timeoutMs: number }): Promise<DiscoveredServer> {
  const url = discoveryUrl(serverUrl);
  let res: HttpResponse;
  try {
    res = await sendRequest({ method: "GET", url, headers: [["Accept", "application/json"]] }, opts);
  } catch (e) {
    if (e instanceof TransportError) throw new DiscoveryError(`Discovery failed (${e.kind}): ${e.message}`);
    throw e;
  }
  if (res.status < 200 || res.status > 299) {
    throw new DiscoveryError(`Discovery endpoint ${url} answered HTTP ${res.status}`);
  }
  const doc = res.json;
  if (typeof doc !== "object" || doc === null || Array.isArray(doc)) {
    throw new DiscoveryError(`Discovery endpoint ${url} did not return a JSON object`);
  }
  const meta: Record<string, unknown> = { ...doc };

  const missing = REQUIRED_METADATA.filter(k => typeof meta[k] !== "string" || !meta[k]);
  if (missing.length) {
    throw new DiscoveryError(`Missing required endpoints: ${missing.join(", ")}`);
  }

  const endpoints: Record<string, string> = {};
  for (const [k, v] of Object.entries(meta)) {
    if (typeof v !== "string" || !v) continue;
    if (k.endsWith("_endpoint") || k === "issuer" || k === "jwks_uri") endpoints[k] = v;
  }

  return {
    endpoints,
    scopes_supported: stringArray(meta.scopes_supported),
    response_types_supported: stringArray(meta.response_types_supported),
    grant_types_supported: stringArray(meta.grant_types_supported),
  };
}

/** Issuer, the endpoints a token exchange walk uses, and what the server says it supports. */
export function describeServer(server: DiscoveredServer): string[] {
  const lines: string[] = [];
  for (const name of SUMMARY_ENDPOINTS) {
    const url = server.endpoints[name];
    if (url) lines.push(`  ${name}: ${url}`);
  }
  if (server.scopes_supported.length) lines.push(`  scopes: ${server.scopes_supported.join(", ")}`);
  if (server.grant_types_supported.length) lines.push(`  grant types: ${server.grant_types_supported.join(", ")}`);
  if (server.response_types_supported.length) lines.push(`  response types: ${server.response_types_supported.join(", ")}`);
  return lines;
}
