// src/core/numbers.ts
//
// Numeric operators
// -----------------
// int op int stays an int (checked against the safe-integer range), anything
// involving a float gives a float, and `/` always gives a float. Bitwise
// operators run on BigInt so operands wider than 32 bits are not truncated.

import { SableRuntimeError } from "./errors";
import { isFloat, makeFloat } from "./values";
import type { FloatValue, Value } from "./values";

export type NumericValue = number | FloatValue;
export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%" | "**";
export type BitwiseOperator = "&" | "^" | "<<" | ">>";

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

function overflow(): SableRuntimeError {
  return new SableRuntimeError("OverflowError", "integer result too large to represent exactly");
}

export function isNumeric(v: Value): v is NumericValue {
  return typeof v === "number" || isFloat(v);
}

/** An int result, or OverflowError once precision would be lost. */
export function checkedInt(n: number): number {
  if (!Number.isSafeInteger(n)) throw overflow();
  return n;
}

export function numericValue(v: NumericValue): number {
  return typeof v === "number" ? v : v.value;
}

export function arithmetic(op: ArithmeticOperator, a: NumericValue, b: NumericValue): NumericValue {
  const x = numericValue(a);
  const y = numericValue(b);
  const float = isFloat(a) || isFloat(b);

  switch (op) {
    case "+":
      return float ? makeFloat(x + y) : checkedInt(x + y);
    case "-":
      return float ? makeFloat(x - y) : checkedInt(x - y);
    case "*":
      return float ? makeFloat(x * y) : checkedInt(x * y);

    case "/":
      if (y === 0) throw new SableRuntimeError("ZeroDivisionError", "division by zero");
      return makeFloat(x / y);

    case "%": {
      if (y === 0) throw new SableRuntimeError("ZeroDivisionError", "modulo by zero");
      // sign follows the divisor
      const r = x - y * Math.floor(x / y);
      return float ? makeFloat(r) : r;
    }

    case "**":
      if (!float && y >= 0) return checkedInt(x ** y);
      if (x === 0 && y < 0) throw new SableRuntimeError("ZeroDivisionError", "0 cannot be raised to a negative power");
      return makeFloat(x ** y);
  }
}

function fromBigInt(n: bigint): number {
  if (n > MAX_SAFE || n < MIN_SAFE) throw overflow();
  return Number(n);
}

export function bitwise(op: BitwiseOperator, a: number, b: number): number {
  const x = BigInt(a);
  const y = BigInt(b);

  switch (op) {
    case "&":
      return fromBigInt(x & y);
    case "^":
      return fromBigInt(x ^ y);
    case "<<":
      if (y < BigInt(0)) throw new SableRuntimeError("ValueError", "negative shift count");
      if (x === BigInt(0)) return 0;
      if (y > BigInt(53)) throw overflow();
      return fromBigInt(x << y);
    case ">>":
      if (y < BigInt(0)) throw new SableRuntimeError("ValueError", "negative shift count");
      return fromBigInt(x >> y);
  }
}

/** `~n`, i.e. `-n - 1`. */
export function invert(n: number): number {
  return checkedInt(-n - 1);
}

export function negate(v: NumericValue): NumericValue {
  return typeof v === "number" ? 0 - v : makeFloat(-v.value);
}
