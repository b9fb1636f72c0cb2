// src/runner/run.ts
//
// Sable Runner (Node)
// -------------------
// Runs Sable source end-to-end:
//
// 1) analyzeText()  -> lex + parse diagnostics
// 2) Evaluator      -> executes the AST with injected host services
//
// Used by the CLI, by tests (capture stdout/stderr) and by any embedding host.
// Script failures never throw out of here: they are rendered to the error sink
// and reported through the result.
//
// Exports:
//   - runSource(source, options): Promise<RunResult>
//   - run(source, options): Promise<boolean>
//   - runFile(path, options): Promise<boolean>
//   - createDefaultNodeIO(args?): SableIO

import * as fs from "fs";
import * as path from "path";
import * as readline from "readline/promises";

import type { Value } from "../core/values";
import { display } from "../core/values";
import { Evaluator } from "../core/evaluator";
import type { HostServices } from "../core/evaluator";
import { SableRuntimeError } from "../core/errors";
import type { TaskPool } from "../core/taskpool";
import type { Diagnostic } from "../diagnostics/errors";
import { error as mkError, formatDiagnostic, fromRuntimeError, mergeDiagnostics, ZERO_RANGE } from "../diagnostics/errors";
import type { RuntimeConfig } from "../language/configuration";
import { DEFAULT_CONFIG, definedOnly } from "../language/configuration";
import { analyzeText } from "../language/sable.language";
import { createDefaultModuleProvider } from "../system/modules";
import type { ModuleProvider } from "../system/modules";
import type { FetchLike } from "../system/net";
import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";

/* =========================================================
   Public types
   ========================================================= */

export type SableIO = {
  /** One line of program output, without the trailing newline. */
  print: (line: string) => void;
  /** One line for the error sink. */
  error: (line: string) => void;
  readLine: (prompt: string) => Promise<string>;
  /** Release anything the IO holds open (a readline interface). */
  close?: () => void;
};

export type RunOptions = {
  /** For messages and relative paths. */
  filename?: string;
  /** Base for relative paths in file/io/os. Default: the file's directory, else process.cwd() */
  cwd?: string;

  io?: SableIO;
  runtime?: Partial<RuntimeConfig>;

  /** Replaces the built-in modules entirely. */
  modules?: ModuleProvider;
  /** Used by the default http/network modules. */
  fetch?: FetchLike;
  /** Share a pool across runs; the runner then leaves it open. */
  pool?: TaskPool;
  /** sleep / random overrides; print and input come from `io`. */
  host?: Partial<Pick<HostServices, "sleep" | "random" | "randomInt">>;

  logger?: Logger;
};

export type RunResult = {
  ok: boolean;
  exitCode: number;

  /** Everything printed by the program, newline-terminated lines. */
  stdout: string;
  /** Everything sent to the error sink. */
  stderr: string;

  diagnostics: Diagnostic[];
  /** Value of the last top-level statement. */
  value: Value;

  timings: {
    analysisMs: number;
    execMs: number;
    totalMs: number;
  };
};

/* =========================================================
   Entry points
   ========================================================= */

export async function runSource(source: string, options: RunOptions = {}): Promise<RunResult> {
  const started = performance.now();
  const log = options.logger ?? silentLogger();

  const stdoutBuf: string[] = [];
  const stderrBuf: string[] = [];
  const io = capturing(options.io ?? createDefaultNodeIO(), stdoutBuf, stderrBuf);

  const finish = (ok: boolean, diagnostics: Diagnostic[], value: Value, analysisMs: number, execMs: number): RunResult => ({
    ok,
    exitCode: ok ? 0 : 1,
    stdout: stdoutBuf.join(""),
    stderr: stderrBuf.join(""),
    diagnostics,
    value,
    timings: { analysisMs, execMs, totalMs: performance.now() - started },
  });

  // --- ANALYSIS ---
  const a0 = performance.now();
  const analysis = analyzeText(source, { collectSymbols: false });
  const analysisMs = performance.now() - a0;
  log.debug(`analysis took ${analysisMs.toFixed(2)}ms`, { file: options.filename ?? "<inline>" });

  if (!analysis.ok || !analysis.program) {
    const diagnostics = analysis.program
      ? analysis.diagnostics
      : mergeDiagnostics(
          analysis.diagnostics,
          analysis.diagnostics.length === 0 ? [mkError("RUN_NO_AST", "Cannot execute: no program", ZERO_RANGE, "runner")] : []
        );
    for (const d of diagnostics) if (d.severity === "error") io.error(formatDiagnostic(d));
    io.close?.();
    return finish(false, diagnostics, null, analysisMs, 0);
  }

  // --- EXECUTION ---
  const runtime: RuntimeConfig = { ...DEFAULT_CONFIG.runtime, ...definedOnly(options.runtime ?? {}) };
  const cwd = options.cwd ?? (options.filename ? path.dirname(path.resolve(options.filename)) : process.cwd());
  const sleep = options.host?.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, Math.max(0, ms))));

  const evaluator = new Evaluator({
    host: { ...options.host, sleep, print: io.print, input: io.readLine },
    modules:
      options.modules ??
      createDefaultModuleProvider({ sleep, fetch: options.fetch, cwd, defaultTimeoutSeconds: runtime.defaultTimeoutSeconds }),
    pool: options.pool,
    workers: runtime.workers,
    logger: log.child("eval"),
    maxCallDepth: runtime.maxCallDepth,
    strictArity: runtime.strictArity,
    implicitGlobals: runtime.implicitGlobals,
  });

  const e0 = performance.now();
  let ok = true;
  let value: Value = null;
  const diagnostics = [...analysis.diagnostics];

  try {
    value = await evaluator.evaluate(analysis.program);
  } catch (err) {
    ok = false;
    const d =
      err instanceof SableRuntimeError
        ? fromRuntimeError(err.kind, err.message, err.range)
        : mkError("RUN_INTERNAL", `Internal error: ${err instanceof Error ? err.message : String(err)}`, ZERO_RANGE, "runner");
    diagnostics.push(d);
    io.error(formatDiagnostic(d));
  } finally {
    await evaluator.shutdown();
    io.close?.();
  }

  const execMs = performance.now() - e0;
  log.debug(`execution took ${execMs.toFixed(2)}ms`, { ok, value: ok ? display(value) : null });

  return finish(ok, diagnostics, value, analysisMs, execMs);
}

/** Run source; true when it completed without an uncaught error. */
export async function run(source: string, options: RunOptions = {}): Promise<boolean> {
  return (await runSource(source, options)).ok;
}

export async function runFile(filePath: string, options: RunOptions = {}): Promise<boolean> {
  let source: string;
  try {
    source = await fs.promises.readFile(filePath, "utf8");
  } catch (err) {
    const io = options.io ?? createDefaultNodeIO();
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    io.error(code === "ENOENT" ? `File not found: ${filePath}` : `Cannot read ${filePath}: ${String(err)}`);
    io.close?.();
    return false;
  }
  return run(source, { ...options, filename: options.filename ?? filePath });
}

/* =========================================================
   IO
   ========================================================= */

export function createDefaultNodeIO(
  args: { stdout?: NodeJS.WritableStream; stderr?: NodeJS.WritableStream; stdin?: NodeJS.ReadableStream } = {}
): SableIO {
  const out = args.stdout ?? process.stdout;
  const err = args.stderr ?? process.stderr;
  let rl: readline.Interface | null = null;

  return {
    print: (line) => {
      out.write(line + "\n");
    },
    error: (line) => {
      err.write(line + "\n");
    },
    readLine: async (prompt) => {
      // Created on first use so a script that never reads keeps stdin untouched.
      rl ??= readline.createInterface({ input: args.stdin ?? process.stdin, output: out, terminal: false });
      if (prompt) out.write(prompt);
      return rl.question("");
    },
    close: () => {
      rl?.close();
      rl = null;
    },
  };
}

/** Tee every line into the result buffers. */
function capturing(io: SableIO, stdoutBuf: string[], stderrBuf: string[]): SableIO {
  return {
    print: (line) => {
      stdoutBuf.push(line + "\n");
      io.print(line);
    },
    error: (line) => {
      stderrBuf.push(line + "\n");
      io.error(line);
    },
    readLine: async (prompt) => {
      if (prompt) stdoutBuf.push(prompt);
      return io.readLine(prompt);
    },
    close: io.close,
  };
}
