// src/core/builtins.ts
//
// Global functions available to every program without an import.
//
// Conversions (str/int/float/bool/list/dict), collection helpers
// (len/range/map/filter/reduce/sorted/...), numeric helpers (sum/min/max/abs/
// round) and host I/O (print/input/random). The `__ternary__` entry is what
// `c ? a : b` desugars to; the evaluator short-circuits the lazy form, the
// eager function here serves direct calls.

import { TERNARY_BUILTIN } from "./ast";
import { SableRuntimeError } from "./errors";
import type { HostServices } from "./evaluator";
import { arithmetic, checkedInt, isNumeric, numericValue } from "./numbers";
import type { NumericValue } from "./numbers";
import {
  compareValues,
  display,
  isCallable,
  isDict,
  isObjectValue,
  isTruthy,
  iterate,
  makeBuiltin,
  makeDict,
  makeFloat,
  matchesTypeTag,
  numberOf,
  toDictKey,
  typeName,
} from "./values";
import type { BuiltinFunction, CallContext, DictKey, DictValue, Value } from "./values";

/* =========================================================
   Argument helpers
   ========================================================= */

export function arg(args: Value[], i: number): Value {
  return i < args.length ? args[i] : null;
}

export function expectNumeric(fn: string, v: Value): NumericValue {
  if (isNumeric(v)) return v;
  throw new SableRuntimeError("TypeError", `${fn}() expects a number, got ${typeName(v)}`);
}

/** An int or a float, as a plain number. */
export function expectNumber(fn: string, v: Value): number {
  return numericValue(expectNumeric(fn, v));
}

export function expectInt(fn: string, v: Value): number {
  if (typeof v === "number") return v;
  throw new SableRuntimeError("TypeError", `${fn}() expects an integer, got ${typeName(v)}`);
}

export function expectString(fn: string, v: Value): string {
  if (typeof v === "string") return v;
  throw new SableRuntimeError("TypeError", `${fn}() expects a string, got ${typeName(v)}`);
}

export function expectList(fn: string, v: Value): Value[] {
  if (Array.isArray(v)) return v;
  throw new SableRuntimeError("TypeError", `${fn}() expects a list, got ${typeName(v)}`);
}

export function expectDict(fn: string, v: Value): DictValue {
  if (isDict(v)) return v;
  throw new SableRuntimeError("TypeError", `${fn}() expects a dict, got ${typeName(v)}`);
}

export function optionalNumber(fn: string, v: Value, fallback: number): number {
  return v === null ? fallback : expectNumber(fn, v);
}

/**
 * map/filter/reduce accept both `(fn, items)` and `(items, fn)`.
 */
function splitCallable(fn: string, args: Value[]): { callee: Value; items: Value[] } {
  const [a, b] = [arg(args, 0), arg(args, 1)];
  if (isCallable(a)) return { callee: a, items: iterate(b) };
  if (isCallable(b)) return { callee: b, items: iterate(a) };
  throw new SableRuntimeError("TypeError", `${fn}() expects a function and an iterable`);
}

/** Round half away from zero. */
export function roundHalfAway(x: number, digits = 0): number {
  const f = 10 ** digits;
  return (Math.sign(x) * Math.round(Math.abs(x) * f)) / f;
}

function extremum(fn: "min" | "max", args: Value[]): Value {
  const items = args.length === 1 ? iterate(args[0]) : args;
  if (items.length === 0) throw new SableRuntimeError("ValueError", `${fn}() arg is an empty sequence`);

  let best = items[0];
  for (const item of items.slice(1)) {
    const c = compareValues(item, best);
    if ((fn === "min" && c < 0) || (fn === "max" && c > 0)) best = item;
  }
  return best;
}

async function sortedCopy(items: Value[], key: Value, reverse: boolean, ctx: CallContext): Promise<Value[]> {
  const keyed: Array<{ key: Value; item: Value }> = [];
  for (const item of items) {
    keyed.push({ key: isCallable(key) ? await ctx.call(key, [item]) : item, item });
  }
  keyed.sort((a, b) => compareValues(a.key, b.key));
  const out = keyed.map((k) => k.item);
  return reverse ? out.reverse() : out;
}

/* =========================================================
   Conversions
   ========================================================= */

export function toInt(v: Value): number {
  if (typeof v === "number") return v;
  const n = numberOf(v);
  if (n !== null) {
    if (!Number.isFinite(n)) throw new SableRuntimeError("ValueError", `cannot convert ${display(v)} to int`);
    return checkedInt(Math.trunc(n));
  }
  if (typeof v === "boolean") return v ? 1 : 0;
  if (typeof v === "string") {
    const t = v.trim();
    if (/^[+-]?\d+$/.test(t)) return Number.parseInt(t, 10);
    throw new SableRuntimeError("ValueError", `invalid literal for int(): '${v}'`);
  }
  throw new SableRuntimeError("TypeError", `int() argument must be a string or a number, not '${typeName(v)}'`);
}

export function toFloat(v: Value): number {
  const n = numberOf(v);
  if (n !== null) return n;
  if (typeof v === "boolean") return v ? 1 : 0;
  if (typeof v === "string") {
    const t = v.trim().toLowerCase();
    if (t === "inf" || t === "+inf") return Infinity;
    if (t === "-inf") return -Infinity;
    if (t === "nan") return NaN;
    const n = Number(t);
    if (t.length > 0 && !Number.isNaN(n)) return n;
    throw new SableRuntimeError("ValueError", `could not convert string to float: '${v}'`);
  }
  throw new SableRuntimeError("TypeError", `float() argument must be a string or a number, not '${typeName(v)}'`);
}

function toDict(v: Value): DictValue {
  if (v === null) return makeDict();
  if (isDict(v)) return makeDict(v.entries);
  if (Array.isArray(v)) {
    const pairs: Array<[DictKey, Value]> = [];
    for (const pair of v) {
      if (!Array.isArray(pair) || pair.length !== 2) {
        throw new SableRuntimeError("ValueError", "dict() expects a list of [key, value] pairs");
      }
      pairs.push([toDictKey(pair[0]), pair[1]]);
    }
    return makeDict(pairs);
  }
  throw new SableRuntimeError("TypeError", `'${typeName(v)}' object is not convertible to dict`);
}

function rangeOf(args: Value[]): number[] {
  let start = 0;
  let stop: number;
  let step = 1;

  if (args.length <= 1) {
    stop = expectInt("range", arg(args, 0));
  } else {
    start = expectInt("range", args[0]);
    stop = expectInt("range", args[1]);
    if (args.length > 2) step = expectInt("range", args[2]);
  }
  if (step === 0) throw new SableRuntimeError("ValueError", "range() arg 3 must not be zero");

  const out: number[] = [];
  for (let i = start; step > 0 ? i < stop : i > stop; i += step) out.push(i);
  return out;
}

function isInstanceOf(v: Value, target: Value): boolean {
  if (typeof target === "string") return matchesTypeTag(v, target);
  if (isObjectValue(target)) {
    if (target.kind === "class") return isObjectValue(v) && v.kind === "instance" && v.cls === target;
    // conversion builtins double as type names: isinstance(x, int)
    if (target.kind === "builtin") return matchesTypeTag(v, target.name);
  }
  if (Array.isArray(target)) return target.some((t) => isInstanceOf(v, t));
  throw new SableRuntimeError("TypeError", "isinstance() arg 2 must be a class, a type name or a list of them");
}

/* =========================================================
   Table
   ========================================================= */

export function createBuiltins(host: HostServices): Map<string, BuiltinFunction> {
  const defs: Array<[string, BuiltinFunction["call"]]> = [
    [
      "print",
      (args) => {
        if (args.length === 0) host.print("");
        for (const a of args) host.print(display(a));
        return null;
      },
    ],
    [
      "len",
      (args) => {
        const v = arg(args, 0);
        if (typeof v === "string" || Array.isArray(v)) return v.length;
        if (isDict(v)) return v.entries.size;
        throw new SableRuntimeError("TypeError", `object of type '${typeName(v)}' has no len()`);
      },
    ],
    ["type", (args) => typeName(arg(args, 0))],
    ["str", (args) => (args.length === 0 ? "" : display(args[0]))],
    ["int", (args) => (args.length === 0 ? 0 : toInt(args[0]))],
    ["float", (args) => makeFloat(args.length === 0 ? 0 : toFloat(args[0]))],
    ["bool", (args) => isTruthy(arg(args, 0))],
    ["list", (args) => (args.length === 0 ? [] : iterate(args[0]))],
    ["dict", (args) => toDict(arg(args, 0))],
    ["range", (args) => rangeOf(args)],

    [
      "map",
      async (args, ctx) => {
        const { callee, items } = splitCallable("map", args);
        const out: Value[] = [];
        for (const item of items) out.push(await ctx.call(callee, [item]));
        return out;
      },
    ],
    [
      "filter",
      async (args, ctx) => {
        const { callee, items } = splitCallable("filter", args);
        const out: Value[] = [];
        for (const item of items) {
          if (isTruthy(await ctx.call(callee, [item]))) out.push(item);
        }
        return out;
      },
    ],
    [
      "reduce",
      async (args, ctx) => {
        const { callee, items } = splitCallable("reduce", args);
        let rest = items;
        let acc: Value;
        if (args.length > 2) {
          acc = args[2];
        } else {
          if (items.length === 0) {
            throw new SableRuntimeError("TypeError", "reduce() of empty sequence with no initial value");
          }
          acc = items[0];
          rest = items.slice(1);
        }
        for (const item of rest) acc = await ctx.call(callee, [acc, item]);
        return acc;
      },
    ],

    [
      "sum",
      (args) => {
        const start = arg(args, 1);
        let total: NumericValue = start === null ? 0 : expectNumeric("sum", start);
        for (const item of iterate(arg(args, 0))) total = arithmetic("+", total, expectNumeric("sum", item));
        return total;
      },
    ],
    ["min", (args) => extremum("min", args)],
    ["max", (args) => extremum("max", args)],
    [
      "abs",
      (args) => {
        const x = expectNumeric("abs", arg(args, 0));
        return typeof x === "number" ? Math.abs(x) : makeFloat(Math.abs(x.value));
      },
    ],
    [
      "round",
      (args) => {
        // round(x) gives an int; round(float, n) keeps the float
        const x = expectNumeric("round", arg(args, 0));
        const digits = arg(args, 1) === null ? null : expectInt("round", args[1]);
        const r = roundHalfAway(numericValue(x), digits ?? 0);
        return digits === null || typeof x === "number" ? checkedInt(r) : makeFloat(r);
      },
    ],
    [TERNARY_BUILTIN, (args) => (isTruthy(arg(args, 0)) ? arg(args, 1) : arg(args, 2))],

    [
      "sorted",
      (args, ctx) => sortedCopy(iterate(arg(args, 0)), arg(args, 1), isTruthy(arg(args, 2)), ctx),
    ],
    [
      "reversed",
      (args) => {
        const v = arg(args, 0);
        if (typeof v === "string") return Array.from(v).reverse().join("");
        return iterate(v).reverse();
      },
    ],
    [
      "enumerate",
      (args) => {
        const start = arg(args, 1) === null ? 0 : expectInt("enumerate", args[1]);
        return iterate(arg(args, 0)).map((item, i): Value => [start + i, item]);
      },
    ],
    [
      "zip",
      (args) => {
        const lists = args.map(iterate);
        const n = lists.length === 0 ? 0 : Math.min(...lists.map((l) => l.length));
        const out: Value[] = [];
        for (let i = 0; i < n; i++) out.push(lists.map((l) => l[i]));
        return out;
      },
    ],
    ["isinstance", (args) => isInstanceOf(arg(args, 0), arg(args, 1))],
    ["callable", (args) => isCallable(arg(args, 0))],

    ["input", async (args) => host.input(args.length === 0 ? "" : display(args[0]))],
    ["random", () => makeFloat(host.random())],
    [
      "random_int",
      (args) => host.randomInt(expectInt("random_int", arg(args, 0)), expectInt("random_int", arg(args, 1))),
    ],
    [
      "random_choice",
      (args) => {
        const items = iterate(arg(args, 0));
        if (items.length === 0) throw new SableRuntimeError("IndexError", "Cannot choose from an empty sequence");
        return items[host.randomInt(0, items.length - 1)];
      },
    ],

    ["keys", (args) => [...expectDict("keys", arg(args, 0)).entries.keys()]],
    ["values", (args) => [...expectDict("values", arg(args, 0)).entries.values()]],
    [
      "append",
      (args) => {
        const list = expectList("append", arg(args, 0));
        list.push(arg(args, 1));
        return list;
      },
    ],
  ];

  return new Map(defs.map(([name, call]) => [name, makeBuiltin(name, call)]));
}
