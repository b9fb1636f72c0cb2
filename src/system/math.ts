// src/system/math.ts
//
// Sable `math` module
// -------------------
//   import "math"
//   print(math.sqrt(16))     // 4.0
//   print(math.log(8, 2))    // 3.0
//   print(math.floor(2.7))   // 2
//
// Results are floats, except floor/ceil (ints) and abs (keeps the type).

import { arg, expectNumber, expectNumeric } from "../core/builtins";
import { SableRuntimeError } from "../core/errors";
import { checkedInt } from "../core/numbers";
import { makeBuiltin, makeFloat, makeModule } from "../core/values";
import type { ModuleValue, Value } from "../core/values";

type Unary = (x: number) => number;

function domainError(): SableRuntimeError {
  return new SableRuntimeError("ValueError", "math domain error");
}

function unary(name: string, f: Unary): Value {
  return makeBuiltin(`math.${name}`, (args) => makeFloat(f(expectNumber(name, arg(args, 0)))));
}

function rounding(name: string, f: Unary): Value {
  return makeBuiltin(`math.${name}`, (args) => {
    const x = expectNumber(name, arg(args, 0));
    if (Number.isNaN(x)) throw new SableRuntimeError("ValueError", "cannot convert float nan to integer");
    if (!Number.isFinite(x)) throw new SableRuntimeError("OverflowError", "cannot convert float infinity to integer");
    return checkedInt(f(x));
  });
}

export function createMathModule(): ModuleValue {
  return makeModule("math", {
    pi: makeFloat(Math.PI),
    e: makeFloat(Math.E),
    inf: makeFloat(Infinity),

    sqrt: unary("sqrt", (x) => {
      if (x < 0) throw domainError();
      return Math.sqrt(x);
    }),
    sin: unary("sin", Math.sin),
    cos: unary("cos", Math.cos),
    tan: unary("tan", Math.tan),
    exp: unary("exp", Math.exp),
    floor: rounding("floor", Math.floor),
    ceil: rounding("ceil", Math.ceil),
    abs: makeBuiltin("math.abs", (args) => {
      const x = expectNumeric("abs", arg(args, 0));
      return typeof x === "number" ? Math.abs(x) : makeFloat(Math.abs(x.value));
    }),

    log: makeBuiltin("math.log", (args) => {
      const x = expectNumber("log", arg(args, 0));
      if (x <= 0) throw domainError();
      if (args.length < 2 || args[1] === null) return makeFloat(Math.log(x));

      const base = expectNumber("log", args[1]);
      if (base <= 0 || base === 1) throw domainError();
      // exact for powers of 2 and 10
      if (base === 2) return makeFloat(Math.log2(x));
      if (base === 10) return makeFloat(Math.log10(x));
      return makeFloat(Math.log(x) / Math.log(base));
    }),

    pow: makeBuiltin("math.pow", (args) =>
      makeFloat(expectNumber("pow", arg(args, 0)) ** expectNumber("pow", arg(args, 1)))
    ),
  });
}
