// src/diagnostics/errors.ts
//
// Sable diagnostics model + helpers
// ---------------------------------
// One shared format for:
// - Lexer errors
// - Parser errors
// - Runtime failures that escape the program
//
// The runner renders these for the terminal, the LSP server converts them to
// protocol diagnostics.
//
// Design goals:
// - Stable codes (LEX_ERROR, PARSE_ERROR, RUN_RUNTIME_ERROR, ...)
// - Range-based (offset+line+col, 0-based)
// - Convenience factories + merging + sorting

import type { Position, Range } from "../core/ast";

export type { Position, Range };

export type Severity = "error" | "warning" | "info";

export type Diagnostic = {
  severity: Severity;
  code: string; // stable ID, e.g. "LEX_ERROR"
  message: string;
  range: Range;

  // Optional metadata
  source?: "lexer" | "parser" | "runtime" | "runner";
  hint?: string;
};

/* =========================================================
   Factories
   ========================================================= */

export function diag(
  severity: Severity,
  code: string,
  message: string,
  range: Range,
  source?: Diagnostic["source"],
  hint?: string
): Diagnostic {
  const d: Diagnostic = { severity, code, message, range };
  if (source) d.source = source;
  if (hint) d.hint = hint;
  return d;
}

export function error(code: string, message: string, range: Range, source?: Diagnostic["source"], hint?: string): Diagnostic {
  return diag("error", code, message, range, source, hint);
}

/* =========================================================
   Merging & sorting
   ========================================================= */

export function mergeDiagnostics(...lists: Array<Diagnostic[] | undefined | null>): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const l of lists) {
    if (!l) continue;
    out.push(...l);
  }
  return sortDiagnostics(out);
}

export function sortDiagnostics(list: Diagnostic[]): Diagnostic[] {
  return [...list].sort((a, b) => {
    const ao = a.range.start.offset;
    const bo = b.range.start.offset;
    if (ao !== bo) return ao - bo;

    // error > warning > info
    const sa = severityRank(a.severity);
    const sb = severityRank(b.severity);
    if (sa !== sb) return sb - sa;

    return a.code.localeCompare(b.code);
  });
}

function severityRank(s: Severity): number {
  switch (s) {
    case "error":
      return 3;
    case "warning":
      return 2;
    case "info":
      return 1;
  }
}

/* =========================================================
   Range utils
   ========================================================= */

export const ZERO_RANGE: Range = {
  start: { offset: 0, line: 0, column: 0 },
  end: { offset: 0, line: 0, column: 0 },
};

/* =========================================================
   De-duplication
   ========================================================= */

export function dedupeDiagnostics(list: Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  const out: Diagnostic[] = [];

  for (const d of sortDiagnostics(list)) {
    const key = `${d.code}|${d.severity}|${d.range.start.offset}|${d.range.end.offset}|${d.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(d);
  }

  return out;
}

/* =========================================================
   Converters
   ========================================================= */

// Lexer and parser report {message, range}; normalize them here.
export type BasicError = { message: string; range: Range };

export function fromLexerErrors(errors: BasicError[]): Diagnostic[] {
  return errors.map((e) => error("LEX_ERROR", e.message, e.range, "lexer"));
}

export function fromParserErrors(errors: BasicError[]): Diagnostic[] {
  return errors.map((e) => error("PARSE_ERROR", e.message, e.range, "parser"));
}

export function fromRuntimeError(kind: string, message: string, range: Range | undefined): Diagnostic {
  return error("RUN_RUNTIME_ERROR", `${kind}: ${message}`, range ?? ZERO_RANGE, "runtime");
}

/* =========================================================
   Rendering
   ========================================================= */

const SOURCE_LABEL: Record<NonNullable<Diagnostic["source"]>, string> = {
  lexer: "Lexical error",
  parser: "Syntax error",
  runtime: "Runtime error",
  runner: "Error",
};

/**
 * One-line rendering used by the runner's error sink:
 * `Syntax error at 3:7: Expected ')' after call arguments.`
 */
export function formatDiagnostic(d: Diagnostic): string {
  const loc = `${d.range.start.line + 1}:${d.range.start.column + 1}`;
  const label = d.source ? SOURCE_LABEL[d.source] : d.severity === "error" ? "Error" : d.severity;
  const hint = d.hint ? ` (${d.hint})` : "";
  return `${label} at ${loc}: ${d.message}${hint}`;
}

export function formatDiagnostics(list: Diagnostic[]): string {
  return sortDiagnostics(list).map(formatDiagnostic).join("\n");
}
