// src/index.ts
//
// Sable Public API
// ----------------
// Embedding hosts and tools import from here:
//
//   import { runSource, analyzeText } from "sable-lang";
//   const result = await runSource('print("hi")', { io });

export { walkAst, UNKNOWN_RANGE } from "./core/ast";
export type { Program, Statement, Expression, AnyNode, Range, Position } from "./core/ast";
export { tokenize, KEYWORDS, TokenKind } from "./core/lexer";
export type { Token, LexResult, LexerError } from "./core/lexer";
export { parseSource, parseTokens, SableSyntaxError } from "./core/parser";
export type { ParseResult, ParseError } from "./core/parser";
export { Evaluator, defaultHostServices } from "./core/evaluator";
export type { EvaluatorOptions, HostServices } from "./core/evaluator";
export { Environment } from "./core/environment";
export { SableRuntimeError, RUNTIME_ERROR_KINDS, CATCH_ALL_KIND } from "./core/errors";
export type { RuntimeErrorKind } from "./core/errors";
export { TaskPool, Future, FutureTimeoutError, PoolClosedError } from "./core/taskpool";
export { display, repr, typeName, makeBuiltin, makeModule, makeDict, makeFloat, fromJson, toJson } from "./core/values";
export type { Value, ModuleValue, BuiltinFunction, FutureValue, FloatValue } from "./core/values";
export { arithmetic, bitwise } from "./core/numbers";
export type { NumericValue } from "./core/numbers";

export { formatDiagnostic, formatDiagnostics } from "./diagnostics";
export type { Diagnostic, Severity } from "./diagnostics";

export { analyzeText, collectSymbols } from "./language/sable.language";
export type { SableLanguageResult, SymbolIndex, SymbolInfo } from "./language/sable.language";
export { loadSableConfig, DEFAULT_CONFIG, CONFIG_FILE_NAME } from "./language/configuration";
export type { SableConfig, ResolvedSableConfig, RuntimeConfig } from "./language/configuration";

export { createDefaultModuleProvider, FactoryModuleProvider, BUILTIN_MODULE_NAMES } from "./system/modules";
export type { ModuleProvider, ModuleFactory, ModuleDeps } from "./system/modules";

export { runSource, run, runFile, createDefaultNodeIO } from "./runner/run";
export type { RunOptions, RunResult, SableIO } from "./runner/run";

export { createLogger, silentLogger, Logger } from "./utils/logger";
export type { LogLevel } from "./utils/logger";
