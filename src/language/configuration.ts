// src/language/configuration.ts
//
// Sable Project Configuration
// ---------------------------
// Reads `sable.config.json` and produces the one normalized config object the
// runner, the CLI and the language server work from.
//
//   {
//     "name": "my-scripts",
//     "runtime": { "workers": 4, "maxCallDepth": 1000, "strictArity": false,
//                  "implicitGlobals": false, "defaultTimeoutSeconds": 5 },
//     "logging": { "level": "warn" },
//     "files":   { "extensions": [".sbl"] }
//   }
//
// The file is found by walking up from the script's directory and stopping at
// the first directory holding either the config or a `.git` folder. Unknown
// keys and values of the wrong type are reported as warnings and ignored.
//
// Exports:
//   - SableConfig / SableConfigInput (types)
//   - DEFAULT_CONFIG
//   - loadSableConfig(filePath, options?)
//   - parseConfigObject(raw)
//   - mergeConfig(base, override)

import * as fs from "fs";
import * as path from "path";

import type { LogLevel } from "../utils/logger";
import { parseLogLevel } from "../utils/logger";
import { exists, tryResolveWorkspaceRoot } from "../utils/paths";

export const CONFIG_FILE_NAME = "sable.config.json";

export type RuntimeConfig = {
  workers: number;
  maxCallDepth: number;
  strictArity: boolean;
  implicitGlobals: boolean;
  /** Default timeout for http_get / http_post, in seconds. */
  defaultTimeoutSeconds: number;
};

export type SableConfig = {
  name: string;
  runtime: RuntimeConfig;
  logging: { level: LogLevel };
  files: { extensions: string[] };
};

/** A config layer: the file's contents or CLI flags. */
export type SableConfigInput = {
  name?: string;
  runtime?: Partial<RuntimeConfig>;
  logging?: { level?: LogLevel };
  files?: { extensions?: string[] };
};

export type ResolvedSableConfig = SableConfig & {
  projectRoot: string | null;
  configPath: string | null;
  warnings: string[];
};

export const DEFAULT_CONFIG: SableConfig = {
  name: "sable-project",
  runtime: {
    workers: 4,
    maxCallDepth: 1000,
    strictArity: false,
    implicitGlobals: false,
    defaultTimeoutSeconds: 5,
  },
  logging: { level: "warn" },
  files: { extensions: [".sbl"] },
};

/* =========================================================
   Public API
   ========================================================= */

export type LoadConfigOptions = {
  /** Used when no project marker is found above the file. */
  workspaceRoot?: string;
  /** Applied last (CLI flags). */
  overrides?: SableConfigInput;
};

export async function loadSableConfig(filePath: string, options: LoadConfigOptions = {}): Promise<ResolvedSableConfig> {
  const projectRoot = (await tryResolveWorkspaceRoot(filePath)) ?? options.workspaceRoot ?? null;
  const candidate = projectRoot ? path.join(projectRoot, CONFIG_FILE_NAME) : null;
  const configPath = candidate && (await exists(candidate)) ? candidate : null;

  const warnings: string[] = [];
  let fromFile: SableConfigInput = {};

  if (configPath) {
    const raw = await readJson(configPath, warnings);
    const parsed = parseConfigObject(raw);
    fromFile = parsed.config;
    warnings.push(...parsed.warnings.map((w) => `${CONFIG_FILE_NAME}: ${w}`));
  }

  const merged = mergeConfig(mergeConfig(DEFAULT_CONFIG, fromFile), options.overrides ?? {});
  return { ...merged, projectRoot, configPath, warnings };
}

export function mergeConfig(base: SableConfig, override: SableConfigInput): SableConfig {
  return {
    name: override.name ?? base.name,
    runtime: { ...base.runtime, ...definedOnly(override.runtime ?? {}) },
    logging: { level: override.logging?.level ?? base.logging.level },
    files: {
      extensions: override.files?.extensions
        ? uniqueStrings(override.files.extensions.map(normalizeExt))
        : base.files.extensions,
    },
  };
}

/* =========================================================
   Validation
   ========================================================= */

type Issues = string[];

function isRecord(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function readInt(obj: Record<string, unknown>, key: string, min: number, issues: Issues, where: string): number | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  if (typeof v === "number" && Number.isInteger(v) && v >= min) return v;
  issues.push(`${where}.${key} must be an integer >= ${min}`);
  return undefined;
}

function readNumber(obj: Record<string, unknown>, key: string, issues: Issues, where: string): number | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  if (typeof v === "number" && Number.isFinite(v) && v > 0) return v;
  issues.push(`${where}.${key} must be a positive number`);
  return undefined;
}

function readBool(obj: Record<string, unknown>, key: string, issues: Issues, where: string): boolean | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  if (typeof v === "boolean") return v;
  issues.push(`${where}.${key} must be a boolean`);
  return undefined;
}

function checkKeys(obj: Record<string, unknown>, known: readonly string[], issues: Issues, where: string): void {
  for (const key of Object.keys(obj)) {
    if (!known.includes(key)) issues.push(`unknown key ${where ? `${where}.` : ""}${key}`);
  }
}

/** Validate a parsed config file. Never throws. */
export function parseConfigObject(raw: unknown): { config: SableConfigInput; warnings: string[] } {
  const warnings: Issues = [];
  const config: SableConfigInput = {};

  if (raw === null || raw === undefined) return { config, warnings };
  if (!isRecord(raw)) {
    warnings.push("expected a JSON object");
    return { config, warnings };
  }

  checkKeys(raw, ["name", "runtime", "logging", "files"], warnings, "");

  if (raw.name !== undefined) {
    if (typeof raw.name === "string" && raw.name.trim()) config.name = raw.name.trim();
    else warnings.push("name must be a non-empty string");
  }

  if (raw.runtime !== undefined) {
    if (isRecord(raw.runtime)) {
      const r = raw.runtime;
      checkKeys(r, ["workers", "maxCallDepth", "strictArity", "implicitGlobals", "defaultTimeoutSeconds"], warnings, "runtime");
      config.runtime = definedOnly({
        workers: readInt(r, "workers", 1, warnings, "runtime"),
        maxCallDepth: readInt(r, "maxCallDepth", 1, warnings, "runtime"),
        strictArity: readBool(r, "strictArity", warnings, "runtime"),
        implicitGlobals: readBool(r, "implicitGlobals", warnings, "runtime"),
        defaultTimeoutSeconds: readNumber(r, "defaultTimeoutSeconds", warnings, "runtime"),
      });
    } else {
      warnings.push("runtime must be an object");
    }
  }

  if (raw.logging !== undefined) {
    if (isRecord(raw.logging)) {
      checkKeys(raw.logging, ["level"], warnings, "logging");
      const level = raw.logging.level;
      if (level !== undefined) {
        const parsed = typeof level === "string" ? parseLogLevel(level) : null;
        if (parsed) config.logging = { level: parsed };
        else warnings.push(`logging.level must be one of silent, error, warn, info, debug, trace`);
      }
    } else {
      warnings.push("logging must be an object");
    }
  }

  if (raw.files !== undefined) {
    if (isRecord(raw.files)) {
      checkKeys(raw.files, ["extensions"], warnings, "files");
      const ext = raw.files.extensions;
      if (ext !== undefined) {
        if (Array.isArray(ext) && ext.length > 0 && ext.every((e): e is string => typeof e === "string")) {
          config.files = { extensions: ext };
        } else {
          warnings.push("files.extensions must be a non-empty list of strings");
        }
      }
    } else {
      warnings.push("files must be an object");
    }
  }

  return { config, warnings };
}

/* =========================================================
   Helpers
   ========================================================= */

async function readJson(p: string, warnings: Issues): Promise<unknown> {
  try {
    const raw: unknown = JSON.parse(await fs.promises.readFile(p, "utf8"));
    return raw;
  } catch (err) {
    warnings.push(`${CONFIG_FILE_NAME}: could not be read (${err instanceof Error ? err.message : String(err)})`);
    return null;
  }
}

export function definedOnly<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj)) {
    if (!isKeyOf(obj, key)) continue;
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

function uniqueStrings(list: string[]): string[] {
  const set = new Set<string>();
  for (const s of list) {
    const t = s.trim();
    if (t) set.add(t);
  }
  return [...set.values()];
}

function normalizeExt(ext: string): string {
  const e = ext.trim().toLowerCase();
  return e.startsWith(".") ? e : `.${e}`;
}
