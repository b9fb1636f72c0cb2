// src/system/modules.ts
//
// Sable Module Provider
// ---------------------
// `import "math"` asks a ModuleProvider for a module by name. The default
// provider builds each built-in module from its factory, injecting the Node
// adapters it needs (fs, path, os, crypto, fetch, sleep). Hosts and tests pass
// their own adapters through `ModuleDeps`, or a provider of their own.
//
//   const modules = createDefaultModuleProvider({ sleep, fetch: fakeFetch });
//   modules.load("json");     // ModuleValue
//   modules.load("nope");     // null -> ImportError at the import site

import * as nodeCrypto from "crypto";
import * as nodeFs from "fs";
import * as nodeOs from "os";
import * as nodePath from "path";

import type { ModuleValue } from "../core/values";
import { createCryptoModule } from "./crypto";
import { createCsvModule } from "./csv";
import { createFileModule } from "./file";
import { createJsonModule } from "./json";
import { createMathModule } from "./math";
import type { FetchLike } from "./net";
import { createNetModule } from "./net";
import { createOsModule } from "./os";
import { createRegexModule } from "./regex";
import { createDatetimeModule, createTimeModule } from "./time";

export interface ModuleProvider {
  /** Build or look up a module; null when the name is unknown. */
  load(name: string): ModuleValue | null;
  /** Every name `load` accepts. */
  names(): string[];
}

export type ModuleFactory = () => ModuleValue;

/** Provider over a fixed table of factories. Each `load` builds a fresh module. */
export class FactoryModuleProvider implements ModuleProvider {
  private readonly factories: ReadonlyMap<string, ModuleFactory>;

  constructor(factories: Iterable<readonly [string, ModuleFactory]>) {
    this.factories = new Map(factories);
  }

  public load(name: string): ModuleValue | null {
    const factory = this.factories.get(name);
    return factory ? factory() : null;
  }

  public names(): string[] {
    return [...this.factories.keys()];
  }

  /** A provider that also knows `extra`; entries in `extra` win. */
  public with(extra: Record<string, ModuleFactory>): FactoryModuleProvider {
    return new FactoryModuleProvider([...this.factories, ...Object.entries(extra)]);
  }
}

export type ModuleDeps = {
  sleep: (ms: number) => Promise<void>;
  fetch?: FetchLike;
  /** Base for relative paths in file/io/os. Default: process.cwd() */
  cwd?: string;
  homeDir?: string;
  env?: Record<string, string | undefined>;
  /** Wall clock in epoch milliseconds. */
  now?: () => number;
  /** Seconds, for http_get/http_post calls that pass none. */
  defaultTimeoutSeconds?: number;

  fs?: typeof import("fs");
  path?: typeof import("path");
  os?: typeof import("os");
  crypto?: typeof import("crypto");
};

export const BUILTIN_MODULE_NAMES = [
  "math",
  "json",
  "time",
  "datetime",
  "crypto",
  "regex",
  "os",
  "csv",
  "http",
  "network",
  "file",
  "io",
] as const;

export type BuiltinModuleName = (typeof BUILTIN_MODULE_NAMES)[number];

export function createDefaultModuleProvider(deps: ModuleDeps): FactoryModuleProvider {
  const fs = deps.fs ?? nodeFs;
  const path = deps.path ?? nodePath;
  const os = deps.os ?? nodeOs;
  const crypto = deps.crypto ?? nodeCrypto;
  const cwd = deps.cwd ?? process.cwd();
  const fetchImpl: FetchLike = deps.fetch ?? ((input, init) => fetch(input, init));

  const fileEnv = { fs, path, cwd, homeDir: deps.homeDir };
  const netEnv = { fetch: fetchImpl, defaultTimeoutSeconds: deps.defaultTimeoutSeconds };

  const factories: Record<BuiltinModuleName, ModuleFactory> = {
    math: () => createMathModule(),
    json: () => createJsonModule(),
    time: () => createTimeModule({ sleep: deps.sleep, now: deps.now }),
    datetime: () => createDatetimeModule({ now: deps.now }),
    crypto: () => createCryptoModule(crypto),
    regex: () => createRegexModule(),
    os: () => createOsModule({ os, fs, path, cwd, env: deps.env ?? process.env, homeDir: deps.homeDir }),
    csv: () => createCsvModule(),
    http: () => createNetModule(netEnv, "http"),
    network: () => createNetModule(netEnv, "network"),
    file: () => createFileModule(fileEnv, "file"),
    io: () => createFileModule(fileEnv, "io"),
  };

  return new FactoryModuleProvider(Object.entries(factories));
}
