// apps/runner/src/httpClient.ts
//
// The one HTTP client every flow shares. Global fetch pools connections
// through undici's dispatcher, so concurrent use needs no coordination.

import { TransportError } from "./errors";

export type HttpReply = {
  status: number;
  /** Full response body; reading it is part of the request. */
  text: string;
};

export interface HttpClient {
  /** POST `body` as JSON. Rejects with TransportError only. */
  postJson(url: string, body: unknown): Promise<HttpReply>;
}

export type FetchClientOptions = {
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

// Node's fetch (undici) has no overall timeout of its own.
export const DEFAULT_TIMEOUT_MS = 300_000;

async function fetchWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<HttpReply> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchImpl(url, { ...init, signal: controller.signal });
    const text = await res.text();
    return { status: res.status, text };
  } finally {
    clearTimeout(t);
  }
}

export function createFetchClient(opts: FetchClientOptions): HttpClient {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const timeoutMs = opts.timeoutMs > 0 ? opts.timeoutMs : DEFAULT_TIMEOUT_MS;

  return {
    async postJson(url, body) {
      try {
        return await fetchWithTimeout(
          fetchImpl,
          url,
          { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) },
          timeoutMs
        );
      } catch (e) {
        throw TransportError.from(e);
      }
    },
  };
}

export function normalizeDomain(url: string): string {
  return url.replace(/\/+$/, "");
}

export function submissionUrl(domain: string): string {
  return `${domain}/api/request_processing_location`;
}

export function pollUrl(domain: string): string {
  return `${domain}/api/get_features`;
}
