import { describe, expect, test } from "vitest";
import { CompletionItemKind, DiagnosticSeverity, InsertTextFormat, SymbolKind } from "vscode-languageserver/node";

import type { Range } from "../core/ast";
import { readSettings, toLspCompletionItem, toLspDiagnostic, toLspDocumentSymbol, toLspRange } from "./server";

function range(line: number, column: number, endLine: number, endColumn: number): Range {
  return {
    start: { offset: 0, line, column },
    end: { offset: 0, line: endLine, column: endColumn },
  };
}

describe("toLspRange", () => {
  test("copies lines and columns", () => {
    expect(toLspRange(range(1, 2, 1, 5))).toEqual({ start: { line: 1, character: 2 }, end: { line: 1, character: 5 } });
  });

  test("collapses an inverted range onto its start", () => {
    expect(toLspRange(range(2, 4, 2, 1))).toEqual({ start: { line: 2, character: 4 }, end: { line: 2, character: 4 } });
  });
});

describe("toLspDiagnostic", () => {
  test("maps severity and source and appends the hint", () => {
    const d = toLspDiagnostic({
      severity: "warning",
      code: "X",
      message: "careful",
      range: range(0, 0, 0, 1),
      source: "parser",
      hint: "add a brace",
    });
    expect(d.severity).toBe(DiagnosticSeverity.Warning);
    expect(d.source).toBe("sable-parser");
    expect(d.message).toBe("careful\nHint: add a brace");
    expect(d.code).toBe("X");
  });

  test("defaults the source", () => {
    expect(toLspDiagnostic({ severity: "error", code: "E", message: "m", range: range(0, 0, 0, 0) }).source).toBe("sable");
  });
});

describe("toLspCompletionItem", () => {
  test("snippets keep their format", () => {
    const item = toLspCompletionItem({ label: "len", kind: "function", insertText: "len(${1:value})", isSnippet: true });
    expect(item.kind).toBe(CompletionItemKind.Function);
    expect(item.insertTextFormat).toBe(InsertTextFormat.Snippet);
  });

  test("plain items insert their label", () => {
    const item = toLspCompletionItem({ label: "while", kind: "keyword" });
    expect(item.insertText).toBe("while");
    expect(item.insertTextFormat).toBe(InsertTextFormat.PlainText);
  });
});

describe("toLspDocumentSymbol", () => {
  test("converts nested symbols", () => {
    const sym = toLspDocumentSymbol({
      name: "A",
      kind: "class",
      range: range(0, 0, 2, 1),
      selectionRange: range(0, 6, 0, 7),
      children: [{ name: "go", kind: "method", range: range(1, 2, 1, 20), selectionRange: range(1, 7, 1, 9), children: [] }],
    });
    expect(sym.kind).toBe(SymbolKind.Class);
    expect(sym.children?.map((c) => [c.name, c.kind])).toEqual([["go", SymbolKind.Method]]);
  });
});

describe("readSettings", () => {
  test("defaults", () => {
    expect(readSettings(null)).toEqual({ maxNumberOfProblems: 200, maxCompletionItems: 250, useProjectConfig: true });
  });

  test("takes valid values and ignores the rest", () => {
    expect(readSettings({ sable: { maxNumberOfProblems: 10, maxCompletionItems: "many", useProjectConfig: false } })).toEqual({
      maxNumberOfProblems: 10,
      maxCompletionItems: 250,
      useProjectConfig: false,
    });
  });
});
