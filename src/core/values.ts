// src/core/values.ts
//
// Sable runtime values
// --------------------
// The closed set of values a program can observe, plus the operations every
// other part of the runtime needs on them:
//
//   - display / repr     (print, str(), containers)
//   - truthiness         (if, while, and/or, filter)
//   - equality           (==, match, in)
//   - type names         (type(), type tags, error messages)
//
// Integers are plain numbers kept inside the safe-integer range; floats are
// boxed so that `2.0` stays a float. Lists are plain arrays and mutate in
// place. Dicts keep insertion order and only accept primitive or float keys.

import type { Block, Expression, Parameter, Range, TypeTag } from "./ast";
import type { Environment } from "./environment";
import { SableRuntimeError } from "./errors";
import type { Future } from "./taskpool";

/* =========================================================
   Value union
   ========================================================= */

export type FloatValue = {
  kind: "float";
  value: number;
};

/** Float keys are interned, so equal floats map to the same key object. */
export type DictKey = null | boolean | number | string | FloatValue;

export type ListValue = Value[];

export type DictValue = {
  kind: "dict";
  entries: Map<DictKey, Value>;
};

export type FunctionValue = {
  kind: "function";
  name: string;
  params: Parameter[];
  body: Block | Expression;
  closure: Environment;
  isAsync: boolean;
  returnTag: TypeTag | null;
};

/** Services a builtin may use while it runs. */
export interface CallContext {
  /** Location of the call expression. */
  readonly range: Range;
  /** Invoke any callable value (user functions, builtins, classes). */
  call(fn: Value, args: Value[]): Promise<Value>;
}

export type BuiltinFunction = {
  kind: "builtin";
  name: string;
  call: (args: Value[], ctx: CallContext) => Value | Promise<Value>;
};

export type BoundMethod = {
  kind: "bound";
  self: InstanceValue;
  method: FunctionValue;
};

export type ClassValue = {
  kind: "class";
  name: string;
  methods: Map<string, FunctionValue>;
};

export type InstanceValue = {
  kind: "instance";
  cls: ClassValue;
  attrs: Map<string, Value>;
};

export type ModuleValue = {
  kind: "module";
  name: string;
  exports: Map<string, Value>;
};

export type FutureValue = {
  kind: "future";
  future: Future<Value>;
};

export type Value =
  | null
  | boolean
  | number
  | FloatValue
  | string
  | ListValue
  | DictValue
  | FunctionValue
  | BuiltinFunction
  | BoundMethod
  | ClassValue
  | InstanceValue
  | ModuleValue
  | FutureValue;

export type ObjectValue = Exclude<Value, null | boolean | number | string | ListValue>;
export type Callable = FunctionValue | BuiltinFunction | BoundMethod | ClassValue;

/* =========================================================
   Constructors & guards
   ========================================================= */

export function makeBuiltin(name: string, call: BuiltinFunction["call"]): BuiltinFunction {
  return { kind: "builtin", name, call };
}

export function makeDict(entries?: Iterable<readonly [DictKey, Value]>): DictValue {
  return { kind: "dict", entries: new Map(entries ?? []) };
}

export function makeModule(name: string, exports: Record<string, Value>): ModuleValue {
  return { kind: "module", name, exports: new Map(Object.entries(exports)) };
}

export function makeFloat(value: number): FloatValue {
  return { kind: "float", value };
}

export function isFloat(v: Value): v is FloatValue {
  return isObjectValue(v) && v.kind === "float";
}

/** The numeric value of an int or float; null for everything else. */
export function numberOf(v: Value): number | null {
  if (typeof v === "number") return v;
  return isFloat(v) ? v.value : null;
}

export function isObjectValue(v: Value): v is ObjectValue {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function isDict(v: Value): v is DictValue {
  return isObjectValue(v) && v.kind === "dict";
}

export function isCallable(v: Value): v is Callable {
  if (!isObjectValue(v)) return false;
  return v.kind === "function" || v.kind === "builtin" || v.kind === "bound" || v.kind === "class";
}

const floatKeys = new Map<number, FloatValue>();

/** Canonical key for `v`; integral floats share the int key. Undefined when unhashable. */
export function dictKeyOf(v: Value): DictKey | undefined {
  if (v === null || typeof v === "boolean" || typeof v === "number" || typeof v === "string") return v;
  if (!isFloat(v)) return undefined;
  if (Number.isInteger(v.value)) return v.value;

  let key = floatKeys.get(v.value);
  if (!key) {
    key = makeFloat(v.value);
    floatKeys.set(v.value, key);
  }
  return key;
}

export function toDictKey(v: Value): DictKey {
  const key = dictKeyOf(v);
  if (key !== undefined) return key;
  throw new SableRuntimeError("TypeError", `unhashable type: '${typeName(v)}'`);
}

/* =========================================================
   Type names
   ========================================================= */

export function typeName(v: Value): string {
  if (v === null) return "null";
  if (typeof v === "boolean") return "bool";
  if (typeof v === "number") return "int";
  if (typeof v === "string") return "str";
  if (Array.isArray(v)) return "list";

  switch (v.kind) {
    case "float":
      return "float";
    case "dict":
      return "dict";
    case "function":
    case "builtin":
    case "bound":
      return "function";
    case "class":
      return "class";
    case "instance":
      return v.cls.name;
    case "module":
      return "module";
    case "future":
      return "future";
  }
}

/**
 * Does `v` satisfy a declared type tag? Unknown tags are compared against
 * the class name of instances.
 */
export function matchesTypeTag(v: Value, tag: string): boolean {
  switch (tag) {
    case "any":
      return true;
    case "int":
      return typeof v === "number";
    case "float":
      return isFloat(v);
    case "number":
      return numberOf(v) !== null;
    case "str":
    case "string":
      return typeof v === "string";
    case "bool":
    case "boolean":
      return typeof v === "boolean";
    case "list":
      return Array.isArray(v);
    case "dict":
      return isDict(v);
    case "func":
    case "function":
      return isCallable(v);
    case "null":
    case "None":
      return v === null;
    case "module":
    case "future":
    case "class":
      return isObjectValue(v) && v.kind === tag;
    default:
      return isObjectValue(v) && v.kind === "instance" && v.cls.name === tag;
  }
}

/* =========================================================
   Truthiness & equality
   ========================================================= */

export function isTruthy(v: Value): boolean {
  if (v === null) return false;
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v === "string") return v.length > 0;
  if (Array.isArray(v)) return v.length > 0;
  if (v.kind === "float") return v.value !== 0 && !Number.isNaN(v.value);
  if (v.kind === "dict") return v.entries.size > 0;
  return true;
}

export function valuesEqual(a: Value, b: Value): boolean {
  const x = numberOf(a);
  const y = numberOf(b);
  if (x !== null && y !== null) return x === y;
  if (a === b) return true;

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }

  if (isDict(a) && isDict(b)) {
    if (a.entries.size !== b.entries.size) return false;
    for (const [k, v] of a.entries) {
      if (!b.entries.has(k)) return false;
      const other = b.entries.get(k);
      if (other === undefined || !valuesEqual(v, other)) return false;
    }
    return true;
  }

  return false;
}

/* =========================================================
   Display
   ========================================================= */

export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  return String(n);
}

/** Floats always show a fraction or an exponent: `2.0`, `0.5`, `1e+21`. */
export function formatFloat(n: number): string {
  if (Number.isInteger(n) && Math.abs(n) < 1e16) return `${n}.0`;
  return formatNumber(n);
}

/** Text used by print() and str(). */
export function display(v: Value): string {
  if (typeof v === "string") return v;
  return repr(v);
}

/** Text used inside containers: strings are quoted. */
export function repr(v: Value, seen: Set<object> = new Set()): string {
  if (v === null) return "null";
  if (typeof v === "boolean") return v ? "true" : "false";
  if (typeof v === "number") return formatNumber(v);
  if (typeof v === "string") return JSON.stringify(v);

  if (Array.isArray(v)) {
    if (seen.has(v)) return "[...]";
    seen.add(v);
    const out = `[${v.map((item) => repr(item, seen)).join(", ")}]`;
    seen.delete(v);
    return out;
  }

  switch (v.kind) {
    case "float":
      return formatFloat(v.value);
    case "dict": {
      if (seen.has(v)) return "{...}";
      seen.add(v);
      const parts: string[] = [];
      for (const [k, item] of v.entries) parts.push(`${repr(k, seen)}: ${repr(item, seen)}`);
      seen.delete(v);
      return `{${parts.join(", ")}}`;
    }
    case "function":
      return `<function ${v.name}>`;
    case "builtin":
      return `<builtin ${v.name}>`;
    case "bound":
      return `<bound method ${v.self.cls.name}.${v.method.name}>`;
    case "class":
      return `<class ${v.name}>`;
    case "instance":
      return `<${v.cls.name} object>`;
    case "module":
      return `<module ${v.name}>`;
    case "future":
      return `<future ${v.future.done() ? "done" : "pending"}>`;
  }
}

/* =========================================================
   Host conversion (json, csv, http payloads)
   ========================================================= */

export type JsonLike = null | boolean | number | string | JsonLike[] | { [key: string]: JsonLike };

export function fromJson(value: unknown): Value {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isSafeInteger(value) ? value : makeFloat(value);
  if (typeof value === "boolean" || typeof value === "string") return value;
  if (Array.isArray(value)) return value.map(fromJson);
  if (typeof value === "object") {
    return makeDict(Object.entries(value).map(([k, v]): [DictKey, Value] => [k, fromJson(v)]));
  }
  return String(value);
}

export function toJson(v: Value): JsonLike {
  if (v === null || typeof v === "boolean" || typeof v === "string") return v;
  if (typeof v === "number") return v;
  if (Array.isArray(v)) return v.map(toJson);
  if (v.kind === "float") return Number.isFinite(v.value) ? v.value : null;
  if (v.kind === "dict") {
    const out: { [key: string]: JsonLike } = {};
    for (const [k, item] of v.entries) out[typeof k === "string" ? k : repr(k)] = toJson(item);
    return out;
  }
  if (v.kind === "instance") {
    const out: { [key: string]: JsonLike } = {};
    for (const [k, item] of v.attrs) out[k] = toJson(item);
    return out;
  }
  throw new SableRuntimeError("TypeError", `Object of type ${typeName(v)} is not JSON serializable`);
}

/* =========================================================
   Iteration & ordering
   ========================================================= */

/** Elements visited by `for`, comprehensions and list(): list items, characters, dict keys. */
export function iterate(v: Value): Value[] {
  if (Array.isArray(v)) return [...v];
  if (typeof v === "string") return Array.from(v);
  if (isDict(v)) return [...v.entries.keys()];
  throw new SableRuntimeError("TypeError", `'${typeName(v)}' object is not iterable`);
}

export function compareValues(a: Value, b: Value, op = "<"): number {
  const x = numberOf(a);
  const y = numberOf(b);
  if (x !== null && y !== null) return x - y;
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  throw new SableRuntimeError(
    "TypeError",
    `'${op}' not supported between instances of '${typeName(a)}' and '${typeName(b)}'`
  );
}

/** Membership test behind `in`. */
export function containsValue(container: Value, item: Value): boolean {
  if (Array.isArray(container)) return container.some((x) => valuesEqual(x, item));
  if (typeof container === "string") {
    if (typeof item !== "string") {
      throw new SableRuntimeError("TypeError", `'in <string>' requires string as left operand, not ${typeName(item)}`);
    }
    return container.includes(item);
  }
  if (isDict(container)) {
    const key = dictKeyOf(item);
    return key !== undefined && container.entries.has(key);
  }
  throw new SableRuntimeError("TypeError", `argument of type '${typeName(container)}' is not iterable`);
}
