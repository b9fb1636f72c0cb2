// src/system/os.ts
//
// Sable `os` module (Node adapters)
// ---------------------------------
//   os.name            "posix" or "nt"
//   os.sep             path separator
//   os.cwd()
//   os.getenv(name, default = null)
//   os.listdir(path?)  sorted entry names; raises on a missing directory
//   os.cpu_count()
//   os.hostname()

import { arg, expectString } from "../core/builtins";
import { display, makeBuiltin, makeModule } from "../core/values";
import type { ModuleValue } from "../core/values";
import { resolveUserPath } from "../utils/paths";

export type OsEnv = {
  os: typeof import("os");
  fs: typeof import("fs");
  path: typeof import("path");
  cwd: string;
  env: Record<string, string | undefined>;
  homeDir?: string;
};

export function createOsModule(env: OsEnv): ModuleValue {
  return makeModule("os", {
    name: env.os.platform() === "win32" ? "nt" : "posix",
    sep: env.path.sep,

    cwd: makeBuiltin("os.cwd", () => env.cwd),

    getenv: makeBuiltin("os.getenv", (args) => env.env[expectString("getenv", arg(args, 0))] ?? arg(args, 1)),

    listdir: makeBuiltin("os.listdir", async (args) => {
      const dir = args.length === 0 ? env.cwd : resolveUserPath(display(args[0]), env);
      const entries = await env.fs.promises.readdir(dir);
      return entries.sort();
    }),

    cpu_count: makeBuiltin("os.cpu_count", () => Math.max(1, env.os.availableParallelism())),
    hostname: makeBuiltin("os.hostname", () => env.os.hostname()),
  });
}
