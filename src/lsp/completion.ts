// src/lsp/completion.ts
//
// Sable Completions Engine
// ------------------------
// Takes the source text, the cursor offset and the document's symbol index and
// returns completion items (a generic structure; server.ts maps it to LSP).
//
// Context is read from the text left of the cursor, no parse at completion time:
//   import "ma|            module names
//   math.|                 members of the module bound to `math`
//   name.|                 built-in methods (str, list, dict, future)
//   anything else          keywords, globals, declared names, snippets
//
// Exports:
//   - getCompletions(req)

import { methodNamesFor } from "../core/methods";
import { KEYWORDS } from "../core/lexer";
import type { SymbolIndex } from "../language/sable.language";
import type { BuiltinEntry } from "../system/registry";
import { BUILTIN_REGISTRY, listChildren, MODULE_NAMES } from "../system/registry";

export type CompletionKind = "keyword" | "variable" | "function" | "module" | "property" | "snippet" | "value" | "class";

export type CompletionItem = {
  label: string;
  kind: CompletionKind;
  detail?: string;
  documentation?: string;
  insertText?: string;
  /** insertText uses ${1:placeholder} snippet syntax */
  isSnippet?: boolean;
  sortText?: string;
};

export type CompletionRequest = {
  source: string;
  offset: number;
  symbols: SymbolIndex;
  /** Default: 200 */
  maxItems?: number;
};

export function getCompletions(req: CompletionRequest): CompletionItem[] {
  const maxItems = req.maxItems ?? 200;
  const left = req.source.slice(0, Math.max(0, Math.min(req.offset, req.source.length)));
  const ctx = detectContext(left);

  switch (ctx.kind) {
    case "moduleName":
      return limit(
        MODULE_NAMES.filter((m) => m.startsWith(ctx.prefix)).map((m) => moduleItem(m)),
        maxItems
      );

    case "member":
      return limit(filterPrefix(memberItems(ctx.receiver, req.symbols), ctx.prefix), maxItems);

    case "general": {
      const out: CompletionItem[] = [
        ...keywordItems(),
        ...globalItems(),
        ...declaredItems(req.symbols),
        ...snippetItems(),
      ];
      return limit(filterPrefix(dedupe(out), ctx.prefix), maxItems);
    }
  }
}

/* =========================================================
   Context detection
   ========================================================= */

type DetectedContext =
  | { kind: "moduleName"; prefix: string }
  | { kind: "member"; receiver: string; prefix: string }
  | { kind: "general"; prefix: string };

export function detectContext(leftOfCursor: string): DetectedContext {
  const importMatch = leftOfCursor.match(/\b(?:import|from)\s+"([A-Za-z_]*)$/);
  if (importMatch) return { kind: "moduleName", prefix: importMatch[1] };

  const memberMatch = leftOfCursor.match(/([A-Za-z_][A-Za-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_]*)?$/);
  if (memberMatch) return { kind: "member", receiver: memberMatch[1], prefix: memberMatch[2] ?? "" };

  const wordMatch = leftOfCursor.match(/([A-Za-z_][A-Za-z0-9_]*)$/);
  return { kind: "general", prefix: wordMatch ? wordMatch[1] : "" };
}

/* =========================================================
   Items
   ========================================================= */

function moduleItem(name: string): CompletionItem {
  const entry = BUILTIN_REGISTRY.children[name];
  return { label: name, kind: "module", detail: "Sable module", documentation: entry?.doc, insertText: name };
}

function entryItem(entry: BuiltinEntry): CompletionItem {
  if (entry.kind === "function") {
    const placeholders = entry.params.map((p, i) => `\${${i + 1}:${p}}`).join(", ");
    return {
      label: entry.name,
      kind: "function",
      detail: entry.signature,
      documentation: entry.doc,
      insertText: `${entry.name}(${placeholders})`,
      isSnippet: true,
    };
  }
  if (entry.kind === "value") {
    return { label: entry.name, kind: "value", detail: entry.signature, documentation: entry.doc, insertText: entry.name };
  }
  return moduleItem(entry.name);
}

function memberItems(receiver: string, symbols: SymbolIndex): CompletionItem[] {
  const moduleName = symbols.imports.get(receiver);
  if (moduleName) return listChildren([moduleName]).map(entryItem);

  // Type unknown without inference: offer every built-in method.
  const out: CompletionItem[] = [];
  for (const type of ["str", "list", "dict", "future"] as const) {
    for (const name of methodNamesFor(type)) {
      out.push({ label: name, kind: "property", detail: `${type} method`, insertText: name });
    }
  }
  return dedupe(out);
}

function keywordItems(): CompletionItem[] {
  return Object.keys(KEYWORDS).map((k): CompletionItem => ({ label: k, kind: "keyword", insertText: k, sortText: `3_${k}` }));
}

function globalItems(): CompletionItem[] {
  return Object.values(BUILTIN_REGISTRY.children)
    .filter((e) => e.kind !== "namespace")
    .map((e) => ({ ...entryItem(e), sortText: `2_${e.name}` }));
}

function declaredItems(symbols: SymbolIndex): CompletionItem[] {
  const out: CompletionItem[] = [];
  const kinds = new Map<string, CompletionKind>();

  for (const s of symbols.symbols) {
    if (s.kind === "function") kinds.set(s.name, "function");
    else if (s.kind === "class") kinds.set(s.name, "class");
    else if (s.kind === "module") kinds.set(s.name, "module");
  }

  for (const name of symbols.declaredNames) {
    out.push({ label: name, kind: kinds.get(name) ?? "variable", insertText: name, sortText: `1_${name}` });
  }
  return out;
}

function snippetItems(): CompletionItem[] {
  return [
    {
      label: "func",
      kind: "snippet",
      detail: "Function definition",
      insertText: "func ${1:name}(${2:args}) {\n    ${3}\n}\n",
      isSnippet: true,
      sortText: "4_func",
    },
    {
      label: "try / except / finally",
      kind: "snippet",
      detail: "Error handling",
      insertText: "try {\n    ${1}\n} except ${2:Exception} as ${3:e} {\n    print(${3:e})\n} finally {\n    ${4}\n}\n",
      isSnippet: true,
      sortText: "4_try",
    },
    {
      label: "for / in",
      kind: "snippet",
      detail: "Loop over a list",
      insertText: "for ${1:item} in ${2:items} {\n    ${3}\n}\n",
      isSnippet: true,
      sortText: "4_for",
    },
  ];
}

/* =========================================================
   Helpers
   ========================================================= */

function filterPrefix(items: CompletionItem[], prefix: string): CompletionItem[] {
  if (!prefix) return items;
  const p = prefix.toLowerCase();
  return items.filter((i) => i.label.toLowerCase().startsWith(p));
}

function dedupe(items: CompletionItem[]): CompletionItem[] {
  const seen = new Set<string>();
  const out: CompletionItem[] = [];
  for (const it of items) {
    const key = `${it.kind}:${it.label}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(it);
  }
  return out;
}

function limit<T>(items: T[], max: number): T[] {
  return items.length > max ? items.slice(0, max) : items;
}
