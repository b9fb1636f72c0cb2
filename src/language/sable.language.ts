// src/language/sable.language.ts
//
// Sable Language Service (high-level)
// -----------------------------------
// The single entry point for editor features. One call runs:
// - Lexer
// - Parser
// - Symbol collection (outline, completion, hover)
//
// The LSP server calls only this layer, so the internals can change freely.
//
// Exports:
//   - analyzeText(source, options): SableLanguageResult
//   - collectSymbols(program): SymbolIndex
//
// Pure TS over the core; configuration and file access stay in the callers.

import type { AnyNode, FunctionDef, Program, Range, Statement } from "../core/ast";
import { walkAst } from "../core/ast";
import type { LexResult, Token } from "../core/lexer";
import { tokenize } from "../core/lexer";
import { parseTokens, SableSyntaxError } from "../core/parser";
import type { Diagnostic } from "../diagnostics/errors";
import { dedupeDiagnostics, error, fromLexerErrors, fromParserErrors, mergeDiagnostics, ZERO_RANGE } from "../diagnostics/errors";

/* =========================================================
   Public types
   ========================================================= */

export type SymbolKind = "function" | "class" | "method" | "variable" | "constant" | "module";

export type SymbolInfo = {
  name: string;
  kind: SymbolKind;
  /** Whole declaration. */
  range: Range;
  /** The name itself. */
  selectionRange: Range;
  detail?: string;
  children: SymbolInfo[];
};

export type SymbolIndex = {
  /** Top-level declarations, with methods and locals nested. */
  symbols: SymbolInfo[];
  /** Binding name -> module name, for `import "m"` and `import "m" as a`. */
  imports: Map<string, string>;
  /** `from "m" import f` bindings: name -> [module, member]. */
  fromImports: Map<string, [string, string]>;
  /** Every name declared anywhere in the file. */
  declaredNames: Set<string>;
};

export type SableLanguageOptions = {
  /** Default: true */
  collectSymbols?: boolean;
};

export type SableLanguageStageTimings = {
  lexMs: number;
  parseMs: number;
  symbolsMs: number;
  totalMs: number;
};

export type SableLanguageResult = {
  ok: boolean;
  tokens: Token[];
  program: Program | null;
  diagnostics: Diagnostic[];
  symbols: SymbolIndex;
  timings: SableLanguageStageTimings;
};

/* =========================================================
   Main entrypoint
   ========================================================= */

export function analyzeText(source: string, options: SableLanguageOptions = {}): SableLanguageResult {
  const started = performance.now();

  // -------- LEX --------
  const t0 = performance.now();
  const lex = safeLex(source);
  const lexMs = performance.now() - t0;

  // -------- PARSE --------
  const t1 = performance.now();
  const parsed = lex.errors.length === 0 ? safeParse(lex.tokens) : { program: null, diagnostics: [] };
  const parseMs = performance.now() - t1;

  // -------- SYMBOLS --------
  const t2 = performance.now();
  const symbols =
    parsed.program && (options.collectSymbols ?? true) ? collectSymbols(parsed.program) : emptySymbolIndex();
  const symbolsMs = performance.now() - t2;

  const diagnostics = dedupeDiagnostics(mergeDiagnostics(fromLexerErrors(lex.errors), parsed.diagnostics));

  return {
    ok: diagnostics.every((d) => d.severity !== "error"),
    tokens: lex.tokens,
    program: parsed.program,
    diagnostics,
    symbols,
    timings: { lexMs, parseMs, symbolsMs, totalMs: performance.now() - started },
  };
}

/* =========================================================
   Safe wrappers (never throw)
   ========================================================= */

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function safeLex(source: string): LexResult {
  try {
    return tokenize(source);
  } catch (err) {
    return {
      tokens: [],
      errors: [{ message: `Internal lexer error: ${describe(err)}`, range: ZERO_RANGE, char: "" }],
    };
  }
}

function safeParse(tokens: Token[]): { program: Program | null; diagnostics: Diagnostic[] } {
  try {
    return { program: parseTokens(tokens), diagnostics: [] };
  } catch (err) {
    if (err instanceof SableSyntaxError) {
      return { program: null, diagnostics: fromParserErrors([{ message: err.message, range: err.range }]) };
    }
    return {
      program: null,
      diagnostics: [error("PARSE_INTERNAL", `Internal parser error: ${describe(err)}`, ZERO_RANGE, "parser")],
    };
  }
}

/* =========================================================
   Symbols
   ========================================================= */

export function emptySymbolIndex(): SymbolIndex {
  return { symbols: [], imports: new Map(), fromImports: new Map(), declaredNames: new Set() };
}

function functionDetail(fn: FunctionDef): string {
  const params = fn.params.map((p) => (p.typeTag ? `${p.name.name}: ${p.typeTag.name}` : p.name.name)).join(", ");
  const ret = fn.returnTag ? ` -> ${fn.returnTag.name}` : "";
  return `${fn.isAsync ? "async " : ""}func ${fn.name.name}(${params})${ret}`;
}

function symbolForFunction(fn: FunctionDef, kind: "function" | "method"): SymbolInfo {
  return {
    name: fn.name.name,
    kind,
    range: fn.range,
    selectionRange: fn.name.range,
    detail: functionDetail(fn),
    children: fn.body.flatMap((st) => (st.kind === "LetDecl" ? symbolsFor(st) : [])),
  };
}

function symbolsFor(st: Statement): SymbolInfo[] {
  switch (st.kind) {
    case "FunctionDef":
      return [symbolForFunction(st, "function")];

    case "ClassDef":
      return [
        {
          name: st.name.name,
          kind: "class",
          range: st.range,
          selectionRange: st.name.range,
          detail: `class ${st.name.name}`,
          children: st.methods.map((m) => symbolForFunction(m, "method")),
        },
      ];

    case "LetDecl":
      return [
        {
          name: st.name.name,
          kind: st.isConst ? "constant" : "variable",
          range: st.range,
          selectionRange: st.name.range,
          detail: st.typeTag ? `${st.isConst ? "const" : "let"} ${st.name.name}: ${st.typeTag.name}` : undefined,
          children: [],
        },
      ];

    case "ImportStmt":
      if (st.names.length > 0) {
        return st.names.map((id): SymbolInfo => ({
          name: id.name,
          kind: "variable",
          range: st.range,
          selectionRange: id.range,
          detail: `from "${st.module}"`,
          children: [],
        }));
      }
      return [
        {
          name: st.alias?.name ?? st.module,
          kind: "module",
          range: st.range,
          selectionRange: st.alias?.range ?? st.moduleRange,
          detail: `import "${st.module}"`,
          children: [],
        },
      ];

    default:
      return [];
  }
}

function declaredNamesOf(node: AnyNode): string[] {
  switch (node.kind) {
    case "LetDecl":
      return [node.name.name];
    case "FunctionDef":
      return [node.name.name, ...node.params.map((p) => p.name.name)];
    case "ClassDef":
      return [node.name.name];
    case "ForStmt":
      return [node.variable.name];
    case "ListComprehension":
      return [node.variable.name];
    case "LambdaExpr":
      return node.params.map((p) => p.name.name);
    case "ImportStmt":
      return node.names.length > 0 ? node.names.map((n) => n.name) : [node.alias?.name ?? node.module];
    case "TryExcept":
      return node.handlers.flatMap((h) => (h.binding ? [h.binding.name] : []));
    default:
      return [];
  }
}

export function collectSymbols(program: Program): SymbolIndex {
  const index = emptySymbolIndex();

  for (const st of program.body) index.symbols.push(...symbolsFor(st));

  walkAst(program, {
    enter: (node) => {
      for (const name of declaredNamesOf(node)) index.declaredNames.add(name);

      if (node.kind === "ImportStmt") {
        if (node.names.length === 0) index.imports.set(node.alias?.name ?? node.module, node.module);
        for (const id of node.names) index.fromImports.set(id.name, [node.module, id.name]);
      }
    },
  });

  return index;
}
