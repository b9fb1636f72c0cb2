// src/core/methods.ts
//
// Methods reachable with `.name` on built-in values:
//
//   str     upper lower strip split replace join startswith endswith find
//   list    append push pop extend insert index remove
//   dict    keys values items get has pop
//   future  result done wait
//
// Each lookup returns a fresh builtin closed over the receiver, or null when
// the receiver has no such method.

import { arg, expectInt, expectList, expectString, optionalNumber } from "./builtins";
import { SableRuntimeError } from "./errors";
import { FutureTimeoutError } from "./taskpool";
import { display, isDict, makeBuiltin, toDictKey, typeName, valuesEqual } from "./values";
import type { BuiltinFunction, DictValue, FutureValue, Value } from "./values";

type MethodImpl<T> = (self: T, args: Value[]) => Value | Promise<Value>;

/* =========================================================
   Strings
   ========================================================= */

const STRING_METHODS: Record<string, MethodImpl<string>> = {
  upper: (s) => s.toUpperCase(),
  lower: (s) => s.toLowerCase(),
  strip: (s) => s.trim(),
  split: (s, args) => {
    const sep = arg(args, 0);
    if (sep === null) return s.split(/\s+/).filter((part) => part.length > 0);
    const text = expectString("split", sep);
    if (text.length === 0) throw new SableRuntimeError("ValueError", "empty separator");
    return s.split(text);
  },
  replace: (s, args) => s.split(expectString("replace", arg(args, 0))).join(expectString("replace", arg(args, 1))),
  join: (s, args) => expectList("join", arg(args, 0)).map(display).join(s),
  startswith: (s, args) => s.startsWith(expectString("startswith", arg(args, 0))),
  endswith: (s, args) => s.endsWith(expectString("endswith", arg(args, 0))),
  find: (s, args) => s.indexOf(expectString("find", arg(args, 0))),
};

/* =========================================================
   Lists
   ========================================================= */

function normalizeIndex(list: Value[], i: number): number {
  const idx = i < 0 ? list.length + i : i;
  if (idx < 0 || idx >= list.length) throw new SableRuntimeError("IndexError", "list index out of range");
  return idx;
}

const LIST_METHODS: Record<string, MethodImpl<Value[]>> = {
  append: (list, args) => {
    list.push(arg(args, 0));
    return null;
  },
  push: (list, args) => {
    list.push(arg(args, 0));
    return null;
  },
  pop: (list, args) => {
    if (list.length === 0) throw new SableRuntimeError("IndexError", "pop from empty list");
    const idx = normalizeIndex(list, args.length > 0 ? expectInt("pop", args[0]) : -1);
    return list.splice(idx, 1)[0];
  },
  extend: (list, args) => {
    list.push(...expectList("extend", arg(args, 0)));
    return null;
  },
  insert: (list, args) => {
    const i = expectInt("insert", arg(args, 0));
    const idx = Math.max(0, Math.min(list.length, i < 0 ? list.length + i : i));
    list.splice(idx, 0, arg(args, 1));
    return null;
  },
  index: (list, args) => {
    const target = arg(args, 0);
    const idx = list.findIndex((x) => valuesEqual(x, target));
    if (idx < 0) throw new SableRuntimeError("ValueError", `${display(target)} is not in list`);
    return idx;
  },
  remove: (list, args) => {
    const target = arg(args, 0);
    const idx = list.findIndex((x) => valuesEqual(x, target));
    if (idx < 0) throw new SableRuntimeError("ValueError", "list.remove(x): x not in list");
    list.splice(idx, 1);
    return null;
  },
};

/* =========================================================
   Dicts
   ========================================================= */

const DICT_METHODS: Record<string, MethodImpl<DictValue>> = {
  keys: (d) => [...d.entries.keys()],
  values: (d) => [...d.entries.values()],
  items: (d) => [...d.entries].map(([k, v]): Value => [k, v]),
  get: (d, args) => d.entries.get(toDictKey(arg(args, 0))) ?? arg(args, 1),
  has: (d, args) => d.entries.has(toDictKey(arg(args, 0))),
  pop: (d, args) => {
    const key = toDictKey(arg(args, 0));
    const value = d.entries.get(key);
    if (value === undefined) {
      if (args.length > 1) return args[1];
      throw new SableRuntimeError("KeyError", display(key));
    }
    d.entries.delete(key);
    return value;
  },
};

/* =========================================================
   Futures
   ========================================================= */

function secondsToMs(fn: string, v: Value): number | undefined {
  return v === null ? undefined : optionalNumber(fn, v, 0) * 1000;
}

/** Wait for a future's value; timeouts are given in seconds. */
export async function joinFuture(f: FutureValue, timeoutSeconds: Value = null): Promise<Value> {
  try {
    return await f.future.result(secondsToMs("result", timeoutSeconds));
  } catch (err) {
    if (err instanceof FutureTimeoutError) {
      throw new SableRuntimeError("TimeoutError", `Future did not complete within ${display(timeoutSeconds)} seconds`);
    }
    throw err;
  }
}

const FUTURE_METHODS: Record<string, MethodImpl<FutureValue>> = {
  result: (f, args) => joinFuture(f, arg(args, 0)),
  done: (f) => f.future.done(),
  wait: (f, args) => f.future.wait(secondsToMs("wait", arg(args, 0))),
};

/* =========================================================
   Lookup
   ========================================================= */

function bind<T>(table: Record<string, MethodImpl<T>>, owner: string, self: T, name: string): BuiltinFunction | null {
  if (!Object.prototype.hasOwnProperty.call(table, name)) return null;
  const impl = table[name];
  return makeBuiltin(`${owner}.${name}`, (args) => impl(self, args));
}

export function getBuiltinMethod(receiver: Value, name: string): BuiltinFunction | null {
  if (typeof receiver === "string") return bind(STRING_METHODS, "str", receiver, name);
  if (Array.isArray(receiver)) return bind(LIST_METHODS, "list", receiver, name);
  if (isDict(receiver)) return bind(DICT_METHODS, "dict", receiver, name);
  if (receiver !== null && typeof receiver === "object" && receiver.kind === "future") {
    return bind(FUTURE_METHODS, "future", receiver, name);
  }
  return null;
}

export function methodNamesFor(receiverType: "str" | "list" | "dict" | "future"): string[] {
  switch (receiverType) {
    case "str":
      return Object.keys(STRING_METHODS);
    case "list":
      return Object.keys(LIST_METHODS);
    case "dict":
      return Object.keys(DICT_METHODS);
    case "future":
      return Object.keys(FUTURE_METHODS);
  }
}

export function noAttribute(receiver: Value, name: string): SableRuntimeError {
  return new SableRuntimeError("AttributeError", `'${typeName(receiver)}' object has no attribute '${name}'`);
}
