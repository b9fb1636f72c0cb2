import { describe, expect, test } from "vitest";

import { TERNARY_BUILTIN } from "../core/ast";
import { createBuiltins } from "../core/builtins";
import { defaultHostServices } from "../core/evaluator";
import { BUILTIN_MODULE_NAMES, createDefaultModuleProvider } from "./modules";
import { GLOBAL_NAMES, isModuleName, listChildren, MODULE_NAMES, paramsFromSignature, resolveBuiltin } from "./registry";

describe("registry", () => {
  test("documents every global builtin", () => {
    const runtime = [...createBuiltins(defaultHostServices()).keys()].filter((n) => n !== TERNARY_BUILTIN);
    expect([...GLOBAL_NAMES].sort()).toEqual(runtime.sort());
  });

  test("documents every module and every export", () => {
    expect([...MODULE_NAMES].sort()).toEqual([...BUILTIN_MODULE_NAMES].sort());

    const provider = createDefaultModuleProvider({ sleep: async () => undefined });
    for (const name of BUILTIN_MODULE_NAMES) {
      const exports = [...(provider.load(name)?.exports.keys() ?? [])].sort();
      expect(listChildren([name]).map((e) => e.name).sort()).toEqual(exports);
    }
  });

  test("resolveBuiltin walks modules", () => {
    const log = resolveBuiltin(["math", "log"]);
    expect(log?.kind).toBe("function");
    expect(log?.kind === "function" && log.params).toEqual(["x", "base"]);
    expect(resolveBuiltin(["math", "pi"])?.kind).toBe("value");
    expect(resolveBuiltin(["math", "nope"])).toBe(null);
    expect(resolveBuiltin(["len", "x"])).toBe(null);
    expect(resolveBuiltin(["toString"])).toBe(null);
  });

  test("aliases are rewritten to their own name", () => {
    const get = resolveBuiltin(["network", "http_get"]);
    expect(get?.module).toBe("network");
    expect(get?.signature?.startsWith("network.http_get(")).toBe(true);
    expect(isModuleName("io")).toBe(true);
    expect(isModuleName("print")).toBe(false);
  });

  test("paramsFromSignature", () => {
    expect(paramsFromSignature("math.log(x, base?) -> float")).toEqual(["x", "base"]);
    expect(paramsFromSignature("print(...values)")).toEqual(["values"]);
    expect(paramsFromSignature("uuid() -> str")).toEqual([]);
  });
});
