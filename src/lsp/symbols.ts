// src/lsp/symbols.ts
//
// Sable Document Symbols
// ----------------------
// Outline / breadcrumbs / "Go to Symbol in File". The symbol index already
// nests methods under classes and locals under functions; this module orders
// the tree by position and drops the parts an outline should not show.
//
// Exported API:
//   - getDocumentSymbols(index, options?): SymbolInfo[]

import type { SymbolIndex, SymbolInfo } from "../language/sable.language";

export type DocumentSymbolOptions = {
  /** Show `let`s declared inside functions. Default: true */
  includeLocals?: boolean;
  /** Show `import` bindings. Default: true */
  includeImports?: boolean;
};

export function getDocumentSymbols(index: SymbolIndex, options: DocumentSymbolOptions = {}): SymbolInfo[] {
  const includeLocals = options.includeLocals ?? true;
  const includeImports = options.includeImports ?? true;

  const keep = (s: SymbolInfo): boolean =>
    includeImports || (s.kind !== "module" && !(s.detail ?? "").startsWith("from "));

  return sortByPosition(index.symbols.filter(keep)).map((s) => normalize(s, includeLocals));
}

function normalize(sym: SymbolInfo, includeLocals: boolean): SymbolInfo {
  const children =
    sym.kind === "function" || sym.kind === "method"
      ? includeLocals
        ? sym.children
        : []
      : sym.children.map((c) => normalize(c, includeLocals));
  return { ...sym, children: sortByPosition(children) };
}

function sortByPosition(list: SymbolInfo[]): SymbolInfo[] {
  return [...list].sort((a, b) => a.range.start.offset - b.range.start.offset || a.name.localeCompare(b.name));
}
