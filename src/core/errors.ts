// src/core/errors.ts
//
// Runtime errors raised while evaluating a program.
//
// `kind` is the name the language sees in `except Kind as e`; the message is
// what the bound name receives.

import type { Range } from "./ast";

export const RUNTIME_ERROR_KINDS = [
  "NameError",
  "TypeError",
  "AttributeError",
  "ConstError",
  "ControlFlowError",
  "ZeroDivisionError",
  "IndexError",
  "KeyError",
  "ValueError",
  "OverflowError",
  "AssertionError",
  "ImportError",
  "TimeoutError",
  "RecursionError",
  "RuntimeError",
] as const;

export type RuntimeErrorKind = (typeof RUNTIME_ERROR_KINDS)[number];

/** Catches every kind in an except clause. */
export const CATCH_ALL_KIND = "Exception";

export class SableRuntimeError extends Error {
  public readonly kind: RuntimeErrorKind;
  public range?: Range;

  constructor(kind: RuntimeErrorKind, message: string, range?: Range) {
    super(message);
    this.name = "SableRuntimeError";
    this.kind = kind;
    this.range = range;
  }

  /** Attach a location if the thrower had none. */
  public at(range: Range): this {
    if (!this.range) this.range = range;
    return this;
  }
}

/** Host exceptions escaping module code become `RuntimeError`. */
export function toRuntimeError(err: unknown, range?: Range): SableRuntimeError {
  if (err instanceof SableRuntimeError) return range ? err.at(range) : err;
  const message = err instanceof Error ? err.message : String(err);
  return new SableRuntimeError("RuntimeError", message, range);
}
