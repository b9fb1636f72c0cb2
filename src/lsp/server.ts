// src/lsp/server.ts
//
// Sable Language Server (LSP)
// ---------------------------
// Runs in its own Node.js process, spoken to over stdio by any LSP client.
// It provides:
// - Diagnostics (lexer + parser)
// - Completions (keywords, builtins, modules, members, declared names)
// - Hover (builtin docs + declaration details)
// - Document symbols (outline)
//
// Every feature goes through the language service in
// src/language/sable.language.ts; this file only converts between the core
// model and protocol types.

import {
  createConnection,
  ProposedFeatures,
  TextDocuments,
  TextDocumentSyncKind,
  DiagnosticSeverity,
  CompletionItemKind,
  InsertTextFormat,
  MarkupKind,
  SymbolKind,
} from "vscode-languageserver/node";
import type {
  CompletionItem,
  Connection,
  Diagnostic as LspDiagnostic,
  DocumentSymbol,
  Hover,
  InitializeResult,
  Range as LspRange,
} from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";

import type { Range } from "../core/ast";
import type { Diagnostic as CoreDiagnostic } from "../diagnostics/errors";
import type { ResolvedSableConfig } from "../language/configuration";
import { loadSableConfig } from "../language/configuration";
import type { SableLanguageResult, SymbolInfo } from "../language/sable.language";
import { analyzeText } from "../language/sable.language";
import { createLogger } from "../utils/logger";
import type { LogSink } from "../utils/logger";
import { hasExtension } from "../utils/paths";
import type { CompletionItem as CoreCompletionItem } from "./completion";
import { getCompletions } from "./completion";
import { getHover } from "./hover";
import { getDocumentSymbols } from "./symbols";

/* =========================================================
   Settings
   ========================================================= */

export type ServerSettings = {
  maxNumberOfProblems: number;
  maxCompletionItems: number;
  /** Look for sable.config.json above each document. */
  useProjectConfig: boolean;
};

const DEFAULT_SETTINGS: ServerSettings = {
  maxNumberOfProblems: 200,
  maxCompletionItems: 250,
  useProjectConfig: true,
};

export function readSettings(raw: unknown): ServerSettings {
  if (!raw || typeof raw !== "object" || !("sable" in raw)) return DEFAULT_SETTINGS;
  const s = raw.sable;
  if (!s || typeof s !== "object") return DEFAULT_SETTINGS;

  const num = (key: string, fallback: number): number => {
    const v: unknown = key in s ? Reflect.get(s, key) : undefined;
    return typeof v === "number" && Number.isFinite(v) && v >= 0 ? v : fallback;
  };
  const useProjectConfig: unknown = "useProjectConfig" in s ? s.useProjectConfig : undefined;

  return {
    maxNumberOfProblems: num("maxNumberOfProblems", DEFAULT_SETTINGS.maxNumberOfProblems),
    maxCompletionItems: num("maxCompletionItems", DEFAULT_SETTINGS.maxCompletionItems),
    useProjectConfig: typeof useProjectConfig === "boolean" ? useProjectConfig : DEFAULT_SETTINGS.useProjectConfig,
  };
}

/* =========================================================
   Server
   ========================================================= */

type DocCache = {
  version: number;
  result: SableLanguageResult;
  config: ResolvedSableConfig | null;
};

export function startServer(connection: Connection = createConnection(ProposedFeatures.all)): void {
  const documents = new TextDocuments(TextDocument);
  const cache = new Map<string, DocCache>();
  let settings: ServerSettings = DEFAULT_SETTINGS;

  const consoleSink: LogSink = {
    error: (m) => connection.console.error(m),
    warn: (m) => connection.console.warn(m),
    info: (m) => connection.console.info(m),
    debug: (m) => connection.console.log(m),
  };
  const log = createLogger({ name: "sable-lsp", level: "info", sink: consoleSink });

  connection.onInitialize(
    (): InitializeResult => ({
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Incremental,
        completionProvider: {
          resolveProvider: false,
          triggerCharacters: [".", '"'],
        },
        hoverProvider: true,
        documentSymbolProvider: true,
      },
    })
  );

  connection.onDidChangeConfiguration(async (change) => {
    settings = readSettings(change.settings);
    cache.clear();
    for (const doc of documents.all()) await validate(doc);
  });

  documents.onDidClose((e) => {
    cache.delete(e.document.uri);
    connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] }).catch((err: unknown) => {
      log.error(`clear diagnostics failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  });

  documents.onDidChangeContent(async (change) => {
    await validate(change.document);
  });

  async function analyze(doc: TextDocument): Promise<DocCache> {
    const existing = cache.get(doc.uri);
    if (existing && existing.version === doc.version) return existing;

    let config: ResolvedSableConfig | null = null;
    if (settings.useProjectConfig) {
      try {
        config = await loadSableConfig(uriToFsPath(doc.uri));
        for (const w of config.warnings) log.logOnce("warn", `${config.configPath}:${w}`, w);
      } catch (err) {
        log.warn(`Config load failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    const timer = log.time(`analyze ${doc.uri}`);
    const result = analyzeText(doc.getText());
    timer.end();

    const entry: DocCache = { version: doc.version, result, config };
    cache.set(doc.uri, entry);
    return entry;
  }

  async function validate(doc: TextDocument): Promise<void> {
    try {
      const { result, config } = await analyze(doc);
      // Untitled buffers have no extension and are always checked.
      const fsPath = uriToFsPath(doc.uri);
      const extensions = config?.files.extensions;
      if (extensions && /\.[^\\/]+$/.test(fsPath) && !hasExtension(fsPath, extensions)) {
        await connection.sendDiagnostics({ uri: doc.uri, diagnostics: [] });
        return;
      }

      const limited = result.diagnostics.slice(0, settings.maxNumberOfProblems);
      await connection.sendDiagnostics({ uri: doc.uri, diagnostics: limited.map((d) => toLspDiagnostic(d)) });
    } catch (err) {
      log.error(`validate failed: ${err instanceof Error ? err.message : String(err)}`);
      await connection.sendDiagnostics({ uri: doc.uri, diagnostics: [] });
    }
  }

  connection.onCompletion(async (params) => {
    const doc = documents.get(params.textDocument.uri);
    if (!doc) return [];
    const { result } = await analyze(doc);

    return getCompletions({
      source: doc.getText(),
      offset: doc.offsetAt(params.position),
      symbols: result.symbols,
      maxItems: settings.maxCompletionItems,
    }).map(toLspCompletionItem);
  });

  connection.onHover(async (params): Promise<Hover | null> => {
    const doc = documents.get(params.textDocument.uri);
    if (!doc) return null;
    const { result } = await analyze(doc);

    const h = getHover({ source: doc.getText(), offset: doc.offsetAt(params.position), symbols: result.symbols });
    return h ? { contents: { kind: MarkupKind.Markdown, value: h.markdown } } : null;
  });

  connection.onDocumentSymbol(async (params) => {
    const doc = documents.get(params.textDocument.uri);
    if (!doc) return [];
    const { result } = await analyze(doc);
    return getDocumentSymbols(result.symbols).map(toLspDocumentSymbol);
  });

  documents.listen(connection);
  connection.listen();
}

/* =========================================================
   Converters
   ========================================================= */

export function toLspRange(r: Range): LspRange {
  const start = { line: Math.max(0, r.start.line), character: Math.max(0, r.start.column) };
  const end = { line: Math.max(0, r.end.line), character: Math.max(0, r.end.column) };
  if (end.line < start.line || (end.line === start.line && end.character < start.character)) {
    return { start, end: start };
  }
  return { start, end };
}

export function toLspDiagnostic(d: CoreDiagnostic): LspDiagnostic {
  return {
    severity: toLspSeverity(d.severity),
    range: toLspRange(d.range),
    message: d.hint ? `${d.message}\nHint: ${d.hint}` : d.message,
    code: d.code,
    source: d.source ? `sable-${d.source}` : "sable",
  };
}

function toLspSeverity(sev: CoreDiagnostic["severity"]): DiagnosticSeverity {
  switch (sev) {
    case "error":
      return DiagnosticSeverity.Error;
    case "warning":
      return DiagnosticSeverity.Warning;
    case "info":
      return DiagnosticSeverity.Information;
  }
}

export function toLspCompletionItem(item: CoreCompletionItem): CompletionItem {
  return {
    label: item.label,
    kind: toLspCompletionKind(item.kind),
    detail: item.detail,
    documentation: item.documentation,
    insertText: item.insertText ?? item.label,
    insertTextFormat: item.isSnippet ? InsertTextFormat.Snippet : InsertTextFormat.PlainText,
    sortText: item.sortText,
  };
}

function toLspCompletionKind(kind: CoreCompletionItem["kind"]): CompletionItemKind {
  switch (kind) {
    case "keyword":
      return CompletionItemKind.Keyword;
    case "module":
      return CompletionItemKind.Module;
    case "function":
      return CompletionItemKind.Function;
    case "class":
      return CompletionItemKind.Class;
    case "property":
      return CompletionItemKind.Property;
    case "snippet":
      return CompletionItemKind.Snippet;
    case "value":
      return CompletionItemKind.Value;
    case "variable":
      return CompletionItemKind.Variable;
  }
}

export function toLspDocumentSymbol(sym: SymbolInfo): DocumentSymbol {
  return {
    name: sym.name,
    detail: sym.detail,
    kind: toLspSymbolKind(sym.kind),
    range: toLspRange(sym.range),
    selectionRange: toLspRange(sym.selectionRange),
    children: sym.children.map(toLspDocumentSymbol),
  };
}

function toLspSymbolKind(kind: SymbolInfo["kind"]): SymbolKind {
  switch (kind) {
    case "function":
      return SymbolKind.Function;
    case "class":
      return SymbolKind.Class;
    case "method":
      return SymbolKind.Method;
    case "variable":
      return SymbolKind.Variable;
    case "constant":
      return SymbolKind.Constant;
    case "module":
      return SymbolKind.Module;
  }
}

/* =========================================================
   URI helpers
   ========================================================= */

function uriToFsPath(uri: string): string {
  try {
    return URI.parse(uri).fsPath;
  } catch {
    return uri;
  }
}

if (require.main === module) {
  startServer();
}
