import { describe, expect, test } from "vitest";

import { roundHalfAway, toFloat, toInt } from "./builtins";
import { SableRuntimeError } from "./errors";
import { Evaluator } from "./evaluator";
import { parseSource } from "./parser";
import { display, makeFloat } from "./values";

async function evalText(source: string, printed: string[] = []): Promise<string> {
  const { program } = parseSource(source);
  if (!program) throw new Error(`cannot parse: ${source}`);
  const evaluator = new Evaluator({ host: { print: (line) => printed.push(line) } });
  try {
    return display(await evaluator.evaluate(program));
  } finally {
    await evaluator.shutdown();
  }
}

async function errorOf(source: string): Promise<string> {
  try {
    await evalText(source);
  } catch (err) {
    if (err instanceof SableRuntimeError) return `${err.kind}: ${err.message}`;
    throw err;
  }
  throw new Error(`expected ${source} to fail`);
}

describe("conversions", () => {
  test("toInt", () => {
    expect(toInt(makeFloat(3.9))).toBe(3);
    expect(toInt(makeFloat(-3.9))).toBe(-3);
    expect(() => toInt(makeFloat(Infinity))).toThrow("cannot convert inf to int");
    expect(toInt(" 42 ")).toBe(42);
    expect(toInt(true)).toBe(1);
    expect(() => toInt("4.2")).toThrow("invalid literal for int(): '4.2'");
  });

  test("toFloat", () => {
    expect(toFloat("2.5")).toBe(2.5);
    expect(toFloat("-inf")).toBe(-Infinity);
    expect(() => toFloat("abc")).toThrow("could not convert string to float: 'abc'");
  });

  test("str, bool, list and dict", async () => {
    expect(await evalText('str([1, "a"])')).toBe('[1, "a"]');
    expect(await evalText("bool([])")).toBe("false");
    expect(await evalText('list("ab")')).toBe('["a", "b"]');
    expect(await evalText('dict([["a", 1], ["b", 2]])')).toBe('{"a": 1, "b": 2}');
    expect(await errorOf("dict([1, 2])")).toBe("ValueError: dict() expects a list of [key, value] pairs");
  });

  test("float() and int() switch the number type", async () => {
    expect(await evalText("float(2)")).toBe("2.0");
    expect(await evalText("type(float(2))")).toBe("float");
    expect(await evalText("int(7.9)")).toBe("7");
    expect(await evalText("type(int(7.9))")).toBe("int");
  });

  test("type names", async () => {
    expect(await evalText("type(1.5)")).toBe("float");
    expect(await evalText("type(2.0)")).toBe("float");
    expect(await evalText("type(2)")).toBe("int");
    expect(await evalText("type(null)")).toBe("null");
  });
});

describe("collections", () => {
  test("len", async () => {
    expect(await evalText('len({"a": 1, "b": 2})')).toBe("2");
    expect(await errorOf("len(5)")).toBe("TypeError: object of type 'int' has no len()");
  });

  test("range", async () => {
    expect(await evalText("range(1, 10, 3)")).toBe("[1, 4, 7]");
    expect(await evalText("range(5, 0, -2)")).toBe("[5, 3, 1]");
    expect(await errorOf("range(1, 2, 0)")).toBe("ValueError: range() arg 3 must not be zero");
  });

  test("map and filter take their arguments in either order", async () => {
    expect(await evalText("map(x -> x * 2, [1, 2])")).toBe("[2, 4]");
    expect(await evalText("filter([1, 2, 3, 4], x -> x % 2 == 0)")).toBe("[2, 4]");
    expect(await errorOf("map([1], [2])")).toBe("TypeError: map() expects a function and an iterable");
  });

  test("reduce with and without an initial value", async () => {
    expect(await evalText("reduce((a, b) -> a + b, [1, 2, 3])")).toBe("6");
    expect(await evalText("reduce((a, b) -> a + b, [1, 2, 3], 10)")).toBe("16");
    expect(await errorOf("reduce((a, b) -> a + b, [])")).toBe(
      "TypeError: reduce() of empty sequence with no initial value"
    );
  });

  test("sorted with a key and reverse", async () => {
    expect(await evalText("sorted([3, 1, 2])")).toBe("[1, 2, 3]");
    expect(await evalText('sorted(["bb", "a", "ccc"], s -> len(s))')).toBe('["a", "bb", "ccc"]');
    expect(await evalText("sorted([1, 3, 2], null, true)")).toBe("[3, 2, 1]");
  });

  test("reversed, enumerate and zip", async () => {
    expect(await evalText('reversed("abc")')).toBe("cba");
    expect(await evalText('enumerate(["a", "b"], 1)')).toBe('[[1, "a"], [2, "b"]]');
    expect(await evalText('zip([1, 2, 3], ["a", "b"])')).toBe('[[1, "a"], [2, "b"]]');
  });

  test("keys, values and append", async () => {
    expect(await evalText('keys({"a": 1, "b": 2})')).toBe('["a", "b"]');
    expect(await evalText('values({"a": 1, "b": 2})')).toBe("[1, 2]");
    expect(await evalText("append([1], 2)")).toBe("[1, 2]");
  });
});

describe("numbers", () => {
  test("sum, min and max", async () => {
    expect(await evalText("sum([1, 2, 3])")).toBe("6");
    expect(await evalText("sum([1], 10)")).toBe("11");
    expect(await evalText("max(3, 9, 2)")).toBe("9");
    expect(await evalText("min([4, 1])")).toBe("1");
    expect(await errorOf("max([])")).toBe("ValueError: max() arg is an empty sequence");
  });

  test("round goes half away from zero", () => {
    expect(roundHalfAway(2.5)).toBe(3);
    expect(roundHalfAway(-2.5)).toBe(-3);
    expect(roundHalfAway(3.14159, 2)).toBe(3.14);
  });

  test("round gives an int unless digits are asked for", async () => {
    expect(await evalText("round(2.5)")).toBe("3");
    expect(await evalText("type(round(2.5))")).toBe("int");
    expect(await evalText("round(3.14159, 2)")).toBe("3.14");
    expect(await evalText("round(2.0, 1)")).toBe("2.0");
  });

  test("sum keeps ints as ints and widens to float", async () => {
    expect(await evalText("sum([1, 2])")).toBe("3");
    expect(await evalText("sum([1, 2.0])")).toBe("3.0");
    expect(await evalText("abs(-2.5)")).toBe("2.5");
  });

  test("abs rejects strings", async () => {
    expect(await evalText("abs(-4)")).toBe("4");
    expect(await errorOf('abs("x")')).toBe("TypeError: abs() expects a number, got str");
  });
});

describe("isinstance and callable", () => {
  test("type names, conversion builtins and classes", async () => {
    expect(await evalText("isinstance(1, int)")).toBe("true");
    expect(await evalText('isinstance("s", ["int", "str"])')).toBe("true");
    expect(await evalText("class A { }\nclass B { }\nisinstance(A(), B)")).toBe("false");
    expect(await evalText("class A { }\nisinstance(new A(), A)")).toBe("true");
  });

  test("callable", async () => {
    expect(await evalText("callable(len)")).toBe("true");
    expect(await evalText("callable(3)")).toBe("false");
  });
});

describe("print", () => {
  test("writes one line per argument", async () => {
    const printed: string[] = [];
    await evalText('print(1, "two", [3])\nprint()', printed);
    expect(printed).toEqual(["1", "two", "[3]", ""]);
  });
});
