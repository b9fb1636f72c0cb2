// src/system/net.ts
//
// Sable `http` / `network` module
// -------------------------------
//   http_get(url, timeout = 5)          response body as text
//   http_post(url, data, timeout = 5)   posts `data` as JSON, returns body text
//
// Failures (network errors, timeouts, non-2xx status) come back as
// "Error: ..." strings rather than raised errors.
//
// Uses an injected fetch so tests never touch the network.

import { arg, expectString, optionalNumber } from "../core/builtins";
import { makeBuiltin, makeModule, toJson } from "../core/values";
import type { ModuleValue, Value } from "../core/values";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type NetEnv = {
  fetch: FetchLike;
  /** Seconds, when the script passes none. Default: 5 */
  defaultTimeoutSeconds?: number;
  defaultHeaders?: Record<string, string>;
};

export function createNetModule(env: NetEnv, name = "network"): ModuleValue {
  const defaultTimeout = env.defaultTimeoutSeconds ?? 5;
  const defaultHeaders = normalizeHeaders(env.defaultHeaders ?? {});

  const request = async (url: string, timeoutSeconds: number, init: RequestInit): Promise<string> => {
    try {
      const res = await env.fetch(url, { ...init, signal: AbortSignal.timeout(Math.max(0, timeoutSeconds * 1000)) });
      if (!res.ok) return `Error: HTTP Error ${res.status}: ${res.statusText}`;
      return await res.text();
    } catch (err) {
      return `Error: ${describeFetchError(err)}`;
    }
  };

  return makeModule(name, {
    http_get: makeBuiltin(`${name}.http_get`, (args) =>
      request(expectString("http_get", arg(args, 0)), optionalNumber("http_get", arg(args, 1), defaultTimeout), {
        method: "GET",
        headers: defaultHeaders,
      })
    ),

    http_post: makeBuiltin(`${name}.http_post`, (args) =>
      request(expectString("http_post", arg(args, 0)), optionalNumber("http_post", arg(args, 2), defaultTimeout), {
        method: "POST",
        headers: { ...defaultHeaders, "content-type": "application/json" },
        body: encodeBody(arg(args, 1)),
      })
    ),
  });
}

/* =========================================================
   Helpers
   ========================================================= */

function encodeBody(data: Value): string {
  return JSON.stringify(toJson(data));
}

function describeFetchError(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === "TimeoutError" || err.name === "AbortError") return "timed out";
    // undici wraps the socket error in `cause`
    if (err.cause instanceof Error && err.cause.message) return `${err.message}: ${err.cause.message}`;
    return err.message;
  }
  return String(err);
}

export function normalizeHeaders(h: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(h)) {
    const key = k.trim();
    if (!key) continue;
    out[key.toLowerCase()] = v;
  }
  return out;
}
