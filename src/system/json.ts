// src/system/json.ts
//
// Sable `json` module: dumps(value, indent?) and loads(text).
// Dict keys are written as strings; non-finite numbers become null.

import { arg, expectInt, expectString } from "../core/builtins";
import { SableRuntimeError } from "../core/errors";
import { fromJson, makeBuiltin, makeModule, toJson } from "../core/values";
import type { ModuleValue, Value } from "../core/values";

export function dumps(value: Value, indent: number | null = null): string {
  return JSON.stringify(toJson(value), null, indent === null ? undefined : indent);
}

export function loads(text: string): Value {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SableRuntimeError("ValueError", `Invalid JSON: ${message}`);
  }
  return fromJson(parsed);
}

export function createJsonModule(): ModuleValue {
  return makeModule("json", {
    dumps: makeBuiltin("json.dumps", (args) => {
      const indent = arg(args, 1);
      return dumps(arg(args, 0), indent === null ? null : expectInt("dumps", indent));
    }),
    loads: makeBuiltin("json.loads", (args) => loads(expectString("loads", arg(args, 0)))),
  });
}
