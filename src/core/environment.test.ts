import { describe, expect, test } from "vitest";
import { Environment } from "./environment";
import { SableRuntimeError } from "./errors";

function errorOf(fn: () => void): SableRuntimeError | null {
  try {
    fn();
    return null;
  } catch (err) {
    if (err instanceof SableRuntimeError) return err;
    throw err;
  }
}

describe("Environment", () => {
  test("lookup walks outward", () => {
    const globals = new Environment();
    globals.define("x", 1);
    const inner = globals.child().child();
    expect(inner.get("x")).toBe(1);
    expect(inner.has("x")).toBe(true);
    expect(inner.ownNames()).toEqual([]);
  });

  test("set updates the nearest binding", () => {
    const globals = new Environment();
    globals.define("x", 1);
    const fn = globals.child();
    fn.define("x", 10);
    fn.set("x", 11);
    expect(fn.get("x")).toBe(11);
    expect(globals.get("x")).toBe(1);
  });

  test("inner frames shadow without touching outer bindings", () => {
    const globals = new Environment();
    globals.define("n", "outer");
    const block = globals.child();
    block.define("n", "inner");
    expect(block.names()).toEqual(["n"]);
    expect(globals.get("n")).toBe("outer");
  });

  test("undefined names raise NameError", () => {
    const env = new Environment();
    const err = errorOf(() => env.get("missing"));
    expect(err?.kind).toBe("NameError");
    expect(err?.message).toBe("Undefined name 'missing'");
    expect(errorOf(() => env.set("missing", 1))?.kind).toBe("NameError");
  });

  test("implicit globals create the binding in the outermost frame", () => {
    const globals = new Environment(null, { implicitGlobals: true });
    const inner = globals.child().child();
    inner.set("fresh", 5);
    expect(globals.ownNames()).toEqual(["fresh"]);
    expect(globals.get("fresh")).toBe(5);
  });

  test("constants cannot be reassigned or redefined", () => {
    const env = new Environment();
    env.define("PI", 3.14, true);

    const err = errorOf(() => env.set("PI", 3));
    expect(err?.kind).toBe("ConstError");
    expect(err?.message).toBe("Cannot reassign constant 'PI'");
    expect(errorOf(() => env.define("PI", 3))?.kind).toBe("ConstError");
    expect(env.get("PI")).toBe(3.14);
  });

  test("type tags are checked on define and on set", () => {
    const env = new Environment();
    env.define("n", 1, false, "int");

    const err = errorOf(() => env.set("n", "one"));
    expect(err?.kind).toBe("TypeError");
    expect(err?.message).toBe("Type mismatch for 'n': expected int, got str");
    expect(env.get("n")).toBe(1);

    expect(errorOf(() => env.define("s", 2, false, "str"))?.message).toBe(
      "Type mismatch for 's': expected str, got int"
    );
  });
});
