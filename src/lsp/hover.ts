// src/lsp/hover.ts
//
// Sable Hover Provider
// --------------------
// Given source + offset and the document's symbol index, return hover text.
// server.ts maps this into an LSP Hover.
//
// No parse at hover time: the word under the cursor (and an optional
// `receiver.` before it) is read straight from the text.
//
// Resolution order:
//   1. `mod.member` where `mod` is an imported module binding
//   2. a name bound by `from "m" import name`
//   3. a module binding itself
//   4. a top-level declaration (or a method of a top-level class)
//   5. a global builtin
//
// Exports:
//   - getHover(req): HoverResult | null

import type { SymbolIndex, SymbolInfo } from "../language/sable.language";
import type { BuiltinEntry } from "../system/registry";
import { resolveBuiltin } from "../system/registry";

export type HoverResult = {
  markdown: string;
};

export type HoverRequest = {
  source: string;
  offset: number;
  symbols: SymbolIndex;
};

export function getHover(req: HoverRequest): HoverResult | null {
  const target = extractTargetAt(req.source, req.offset);
  if (!target) return null;

  const { receiver, word } = target;
  const { symbols } = req;

  if (receiver) {
    const moduleName = symbols.imports.get(receiver);
    if (!moduleName) return null;
    const entry = resolveBuiltin([moduleName, word]);
    return entry ? entryHover(entry) : null;
  }

  const fromImport = symbols.fromImports.get(word);
  if (fromImport) {
    const entry = resolveBuiltin(fromImport);
    if (entry) return entryHover(entry);
  }

  const moduleName = symbols.imports.get(word);
  if (moduleName) {
    const entry = resolveBuiltin([moduleName]);
    if (entry) return entryHover(entry);
  }

  const declared = findDeclared(symbols.symbols, word);
  if (declared) return symbolHover(declared);

  const builtin = resolveBuiltin([word]);
  if (builtin && builtin.kind !== "namespace") return entryHover(builtin);

  return null;
}

/* =========================================================
   Rendering
   ========================================================= */

function entryHover(entry: BuiltinEntry): HoverResult {
  const title = entry.module && entry.kind !== "namespace" ? `${entry.module}.${entry.name}` : entry.name;
  const lines = [`### ${title}`, ""];
  if (entry.signature) lines.push("```sable", entry.signature, "```");
  if (entry.doc) lines.push("", entry.doc);
  return { markdown: lines.join("\n") };
}

function symbolHover(sym: SymbolInfo): HoverResult {
  const lines = [`### ${sym.name}`, "", `**Kind:** \`${sym.kind}\``];
  if (sym.detail) lines.push("", "```sable", sym.detail, "```");
  return { markdown: lines.join("\n") };
}

function findDeclared(list: SymbolInfo[], name: string): SymbolInfo | null {
  for (const s of list) {
    if (s.name === name) return s;
  }
  for (const s of list) {
    if (s.kind !== "class") continue;
    const method = s.children.find((c) => c.name === name);
    if (method) return method;
  }
  return null;
}

/* =========================================================
   Text extraction
   ========================================================= */

const WORD_CHAR = /[A-Za-z0-9_]/;

type HoverTarget = { receiver: string | null; word: string };

export function extractTargetAt(source: string, offset: number): HoverTarget | null {
  if (offset < 0 || offset > source.length) return null;

  let start = offset;
  while (start > 0 && WORD_CHAR.test(source[start - 1])) start--;
  let end = offset;
  while (end < source.length && WORD_CHAR.test(source[end])) end++;

  const word = source.slice(start, end);
  if (!/^[A-Za-z_]\w*$/.test(word)) return null;

  if (start > 0 && source[start - 1] === ".") {
    let rs = start - 1;
    while (rs > 0 && WORD_CHAR.test(source[rs - 1])) rs--;
    const receiver = source.slice(rs, start - 1);
    if (/^[A-Za-z_]\w*$/.test(receiver)) return { receiver, word };
  }

  return { receiver: null, word };
}
