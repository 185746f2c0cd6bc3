import type { BasicAuth } from "./contracts.js";

export interface RenderedRequest {
  method: string;
  url: string;
  headers: Array<[string, string]>;
  body?: string;
  auth?: BasicAuth;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
  /** Parsed body when it is JSON, otherwise undefined. */
  json?: unknown;
}
