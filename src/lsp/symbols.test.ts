import { describe, expect, test } from "vitest";

import { analyzeText } from "../language/sable.language";
import { getDocumentSymbols } from "./symbols";

const index = analyzeText(
  ['func b() { let inner = 1 }', 'import "math"', "class A { func m(self) { } }", "let z = 1"].join("\n")
).symbols;

describe("getDocumentSymbols", () => {
  test("everything, ordered by position", () => {
    const symbols = getDocumentSymbols(index);
    expect(symbols.map((s) => s.name)).toEqual(["b", "math", "A", "z"]);
    expect(symbols[0].children.map((c) => c.name)).toEqual(["inner"]);
    expect(symbols[2].children.map((c) => c.name)).toEqual(["m"]);
  });

  test("without locals or imports", () => {
    const symbols = getDocumentSymbols(index, { includeLocals: false, includeImports: false });
    expect(symbols.map((s) => s.name)).toEqual(["b", "A", "z"]);
    expect(symbols[0].children).toEqual([]);
  });
});
