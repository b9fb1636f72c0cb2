#!/usr/bin/env node
/**
 * Command line runner for Sable scripts.
 *
 * Usage:
 *   sable run <file> [options]
 *   sable <file> [options]
 *   sable -e "<code>" [options]
 *
 * Options:
 *   -e, --eval <code>        Run inline code
 *   --log-level <level>      silent | error | warn | info | debug | trace
 *   --workers <n>            Worker loops in the thread pool
 *   --strict-arity           Argument count must match parameter count
 *   --implicit-globals       Assigning an undefined name creates a global
 *   -h, --help               Show help
 *
 * Exit code: 0 on success, 1 on any failure.
 */

import * as path from "path";

import type { SableConfigInput } from "./language/configuration";
import { loadSableConfig } from "./language/configuration";
import type { SableIO } from "./runner/run";
import { createDefaultNodeIO, run, runFile } from "./runner/run";
import type { LogLevel } from "./utils/logger";
import { createLogger, parseLogLevel } from "./utils/logger";

export type CliOptions = {
  file: string | null;
  code: string | null;
  help: boolean;
  overrides: SableConfigInput;
};

export const HELP_TEXT = `Sable

Usage:
  sable run <file> [options]
  sable <file> [options]
  sable -e "<code>" [options]

Options:
  -e, --eval <code>        Run inline code
  --log-level <level>      silent | error | warn | info | debug | trace
  --workers <n>            Worker loops in the thread pool
  --strict-arity           Argument count must match parameter count
  --implicit-globals       Assigning an undefined name creates a global
  -h, --help               Show this help
`;

/** Parse argv (without node and the script). Returns an error message on bad input. */
export function parseCliArgs(args: string[]): CliOptions | string {
  const options: CliOptions = { file: null, code: null, help: false, overrides: {} };
  const runtime: NonNullable<SableConfigInput["runtime"]> = {};
  let level: LogLevel | undefined;

  const valueAfter = (i: number): string | null => (i + 1 < args.length ? args[i + 1] : null);

  let i = 0;
  if (args[0] === "run") i = 1;

  for (; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      options.help = true;
    } else if (arg === "-e" || arg === "--eval") {
      const code = valueAfter(i);
      if (code === null) return `${arg} requires code`;
      options.code = code;
      i++;
    } else if (arg === "--log-level") {
      const raw = valueAfter(i);
      const parsed = parseLogLevel(raw ?? undefined);
      if (!parsed) return `--log-level must be one of silent, error, warn, info, debug, trace`;
      level = parsed;
      i++;
    } else if (arg === "--workers") {
      const raw = valueAfter(i);
      const n = raw !== null && /^\d+$/.test(raw) ? Number(raw) : NaN;
      if (!Number.isInteger(n) || n < 1) return "--workers must be an integer >= 1";
      runtime.workers = n;
      i++;
    } else if (arg === "--strict-arity") {
      runtime.strictArity = true;
    } else if (arg === "--implicit-globals") {
      runtime.implicitGlobals = true;
    } else if (arg.startsWith("-")) {
      return `Unknown option: ${arg}`;
    } else if (options.file === null) {
      options.file = arg;
    } else {
      return `Unexpected argument: ${arg}`;
    }
  }

  if (!options.help && options.file === null && options.code === null) return "No input file";
  if (options.file !== null && options.code !== null) return "Give either a file or -e <code>, not both";

  if (Object.keys(runtime).length > 0) options.overrides.runtime = runtime;
  if (level) options.overrides.logging = { level };
  return options;
}

export async function main(argv: string[], io: SableIO = createDefaultNodeIO()): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (typeof parsed === "string") {
    io.error(`Error: ${parsed}`);
    io.error(HELP_TEXT);
    return 1;
  }
  if (parsed.help) {
    io.print(HELP_TEXT);
    return 0;
  }

  const cwd = process.cwd();
  const anchor = parsed.file ? path.resolve(cwd, parsed.file) : path.join(cwd, "<eval>");
  const config = await loadSableConfig(anchor, { workspaceRoot: cwd, overrides: parsed.overrides });

  const logger = createLogger({ name: "sable", level: config.logging.level });
  for (const w of config.warnings) logger.warn(w);
  if (config.configPath) logger.debug(`using ${config.configPath}`);

  const options = { io, runtime: config.runtime, logger };
  const ok = parsed.file !== null ? await runFile(parsed.file, options) : await run(parsed.code ?? "", options);
  return ok ? 0 : 1;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    }
  );
}
