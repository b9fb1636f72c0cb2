// src/system/time.ts
//
// Sable `time` and `datetime` modules
// -----------------------------------
//   time.time()          seconds since the epoch (float)
//   time.sleep(0.5)      also accepts duration strings: "120ms", "1s", "2m", "1h"
//   time.monotonic()     milliseconds from a monotonic clock (float)
//
//   datetime.now()               ISO-8601 string (UTC)
//   datetime.today()             "YYYY-MM-DD"
//   datetime.timestamp()         same as time.time()
//   datetime.format(ts, "%Y-%m-%d %H:%M:%S")
//   datetime.parse("2024-01-02T03:04:05Z")   seconds (float)
//
// Clocks are injected so tests can pin them.

import { arg, expectNumber, expectString } from "../core/builtins";
import { SableRuntimeError } from "../core/errors";
import { makeBuiltin, makeFloat, makeModule, numberOf } from "../core/values";
import type { ModuleValue, Value } from "../core/values";

export type TimeEnv = {
  sleep: (ms: number) => Promise<void>;
  /** Wall clock in epoch milliseconds. Default: Date.now */
  now?: () => number;
  /** Monotonic clock in milliseconds. Default: performance.now */
  monotonic?: () => number;
};

export function createTimeModule(env: TimeEnv): ModuleValue {
  const now = env.now ?? Date.now;
  const monotonic = env.monotonic ?? (() => performance.now());

  return makeModule("time", {
    time: makeBuiltin("time.time", () => makeFloat(now() / 1000)),
    sleep: makeBuiltin("time.sleep", async (args) => {
      await env.sleep(toDelayMs(arg(args, 0)));
      return null;
    }),
    monotonic: makeBuiltin("time.monotonic", () => makeFloat(monotonic())),
  });
}

export function createDatetimeModule(env: Pick<TimeEnv, "now">): ModuleValue {
  const now = env.now ?? Date.now;

  return makeModule("datetime", {
    now: makeBuiltin("datetime.now", () => new Date(now()).toISOString()),
    today: makeBuiltin("datetime.today", () => new Date(now()).toISOString().slice(0, 10)),
    timestamp: makeBuiltin("datetime.timestamp", () => makeFloat(now() / 1000)),
    format: makeBuiltin("datetime.format", (args) => {
      const ts = expectNumber("format", arg(args, 0));
      const pattern = args.length > 1 ? expectString("format", args[1]) : "%Y-%m-%d %H:%M:%S";
      return formatTimestamp(ts, pattern);
    }),
    parse: makeBuiltin("datetime.parse", (args) => makeFloat(parseIsoSeconds(expectString("parse", arg(args, 0))))),
  });
}

/* =========================================================
   Durations
   ========================================================= */

function toDelayMs(v: Value): number {
  const seconds = numberOf(v);
  if (seconds !== null) return Math.max(0, Math.round(seconds * 1000));
  if (typeof v === "string") return parseDurationMs(v);
  throw new SableRuntimeError("TypeError", "sleep() expects seconds or a duration string");
}

/**
 * "120ms", "1s", "0.5s", "2m", "1h". A bare number is read as seconds.
 * Throws ValueError on anything else.
 */
export function parseDurationMs(input: string): number {
  const s = input.trim();
  const m = s.match(/^([0-9]+(?:\.[0-9]+)?)\s*(ms|s|m|h)?$/i);
  if (!m) throw new SableRuntimeError("ValueError", `invalid duration: '${input}'`);

  const n = Number(m[1]);
  const unit = (m[2] ?? "s").toLowerCase();

  const mult =
    unit === "ms" ? 1 :
    unit === "s" ? 1000 :
    unit === "m" ? 60_000 :
    3_600_000;

  return Math.round(n * mult);
}

/* =========================================================
   Date formatting (UTC)
   ========================================================= */

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatTimestamp(seconds: number, pattern: string): string {
  const d = new Date(seconds * 1000);
  if (Number.isNaN(d.getTime())) throw new SableRuntimeError("ValueError", "timestamp out of range");

  return pattern.replace(/%([YmdHMS%])/g, (_, code: string) => {
    switch (code) {
      case "Y":
        return pad(d.getUTCFullYear(), 4);
      case "m":
        return pad(d.getUTCMonth() + 1);
      case "d":
        return pad(d.getUTCDate());
      case "H":
        return pad(d.getUTCHours());
      case "M":
        return pad(d.getUTCMinutes());
      case "S":
        return pad(d.getUTCSeconds());
      default:
        return "%";
    }
  });
}

export function parseIsoSeconds(text: string): number {
  // ISO dates without a zone are read as UTC
  const iso = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?)?$/.test(text) && text.includes("T") ? `${text}Z` : text;
  const ms = Date.parse(iso);
  if (!/^\d{4}-\d{2}-\d{2}/.test(text) || Number.isNaN(ms)) {
    throw new SableRuntimeError("ValueError", `Invalid isoformat string: '${text}'`);
  }
  return ms / 1000;
}
