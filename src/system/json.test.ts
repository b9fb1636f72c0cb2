import { describe, expect, test } from "vitest";

import { SableRuntimeError } from "../core/errors";
import { display, makeDict, makeFloat } from "../core/values";
import { dumps, loads } from "./json";

describe("json module", () => {
  test("dumps is compact unless an indent is given", () => {
    const v = makeDict([
      ["a", [1, null]],
      ["b", true],
    ]);
    expect(dumps(v)).toBe('{"a":[1,null],"b":true}');
    expect(dumps([1], 2)).toBe("[\n  1\n]");
  });

  test("non-finite numbers become null", () => {
    expect(dumps([makeFloat(Infinity), makeFloat(NaN)])).toBe("[null,null]");
  });

  test("loads builds dicts and lists", () => {
    expect(display(loads('{"x": [1, 2.5, "s"], "y": null}'))).toBe('{"x": [1, 2.5, "s"], "y": null}');
  });

  test("loads rejects bad input with ValueError", () => {
    let caught: unknown = null;
    try {
      loads("{bad");
    } catch (err) {
      caught = err;
    }
    expect(caught instanceof SableRuntimeError && caught.kind).toBe("ValueError");
    expect(caught instanceof SableRuntimeError && caught.message.startsWith("Invalid JSON: ")).toBe(true);
  });
});
