// src/utils/logger.ts
//
// Sable Logger
// ------------
// Leveled logger shared by the runner, the task pool, the CLI and the LSP server.
//
// Exported API:
//   - Logger
//   - createLogger(options)
//   - parseLogLevel(text)
//
// Usage:
//   const log = createLogger({ name: "sable", level: "info" });
//   log.info("Hello", { x: 1 });
//   const t = log.time("parse"); ... t.end();
//
// Levels:
//   silent < error < warn < info < debug < trace

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export type LogSink = {
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  debug: (msg: string) => void;
};

export type LoggerOptions = {
  name?: string; // prefix
  level?: LogLevel;

  // Custom sink. Defaults to stderr, so script output on stdout stays clean.
  sink?: LogSink;

  timestamp?: boolean;

  // Append the JSON payload after the message
  includePayload?: boolean;
};

export type Timer = {
  end: (payload?: unknown) => number;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

function stderrSink(): LogSink {
  const write = (msg: string) => {
    process.stderr.write(msg + "\n");
  };
  return { error: write, warn: write, info: write, debug: write };
}

export class Logger {
  private readonly name: string;
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly timestamp: boolean;
  private readonly includePayload: boolean;

  private onceKeys = new Set<string>();

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? "sable";
    this.level = options.level ?? "warn";
    this.timestamp = options.timestamp ?? false;
    this.includePayload = options.includePayload ?? true;
    this.sink = options.sink ?? stderrSink();
  }

  /** Child logger with a dotted name, same level and sink. */
  public child(name: string): Logger {
    return new Logger({
      name: `${this.name}.${name}`,
      level: this.level,
      sink: this.sink,
      timestamp: this.timestamp,
      includePayload: this.includePayload,
    });
  }

  public error(msg: string, payload?: unknown): void {
    this.emit("error", msg, payload);
  }

  public warn(msg: string, payload?: unknown): void {
    this.emit("warn", msg, payload);
  }

  public info(msg: string, payload?: unknown): void {
    this.emit("info", msg, payload);
  }

  public debug(msg: string, payload?: unknown): void {
    this.emit("debug", msg, payload);
  }

  public trace(msg: string, payload?: unknown): void {
    this.emit("trace", msg, payload);
  }

  public logOnce(level: Exclude<LogLevel, "silent">, key: string, msg: string, payload?: unknown): void {
    if (this.onceKeys.has(key)) return;
    this.onceKeys.add(key);
    this.emit(level, msg, payload);
  }

  public time(label: string): Timer {
    const start = nowMs();
    this.trace(`start ${label}`);

    return {
      end: (payload?: unknown) => {
        const ms = nowMs() - start;
        this.debug(`${label} took ${ms.toFixed(2)}ms`, payload);
        return ms;
      },
    };
  }

  public isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  private emit(level: Exclude<LogLevel, "silent">, msg: string, payload?: unknown): void {
    if (!this.isEnabled(level)) return;

    const line = this.formatLine(level, msg, payload);

    if (level === "error") this.sink.error(line);
    else if (level === "warn") this.sink.warn(line);
    else if (level === "info") this.sink.info(line);
    else this.sink.debug(line);
  }

  private formatLine(level: string, msg: string, payload?: unknown): string {
    const ts = this.timestamp ? `${isoTime()} ` : "";
    const prefix = `[${this.name}]`;
    const lv = level.toUpperCase();

    if (payload === undefined || !this.includePayload) {
      return `${ts}${prefix} ${lv}: ${msg}`;
    }

    return `${ts}${prefix} ${lv}: ${msg} ${safeStringify(payload)}`;
  }
}

/* =========================================================
   Factory
   ========================================================= */

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/** A logger that drops everything; the default for library callers. */
export function silentLogger(): Logger {
  return new Logger({ level: "silent" });
}

export function parseLogLevel(text: string | undefined): LogLevel | null {
  const t = String(text ?? "").trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === t) ?? null;
}

/* =========================================================
   Utilities
   ========================================================= */

export function safeStringify(value: unknown): string {
  try {
    if (typeof value === "string") return JSON.stringify(value);
    return JSON.stringify(value) ?? String(value);
  } catch {
    return "[unserializable]";
  }
}

function nowMs(): number {
  return performance.now();
}

function isoTime(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, "Z");
}
