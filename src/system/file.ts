// src/system/file.ts
//
// Sable `file` / `io` module (Node adapters)
// ------------------------------------------
// Text, JSON and CSV helpers over an injected fs/path pair:
//
//   file.read(path)              contents as text
//   file.write(path, content)    true
//   file.append(path, content)   true
//   file.exists(path)            bool
//   file.delete(path)            true
//   file.read_json / write_json
//   file.read_csv / write_csv
//   file.list_dir(path?)         sorted entry names
//
// Relative paths resolve against `cwd`, `~` against the home directory.
// A failing operation returns "Error: <message>" instead of raising.

import { arg, expectList } from "../core/builtins";
import { display, fromJson, makeBuiltin, makeModule, toJson } from "../core/values";
import type { BuiltinFunction, ModuleValue, Value } from "../core/values";
import { resolveUserPath } from "../utils/paths";
import { parseCsv, stringifyCsv } from "./csv";

export type FileEnv = {
  fs: typeof import("fs");
  path: typeof import("path");
  cwd: string;
  homeDir?: string;
};

export function createFileModule(env: FileEnv, name = "file"): ModuleValue {
  const fs = env.fs.promises;

  const full = (p: Value): string => resolveUserPath(display(p), env);

  // Every operation reports failure as a string result.
  const op = (member: string, impl: (args: Value[]) => Promise<Value>): BuiltinFunction =>
    makeBuiltin(`${name}.${member}`, async (args) => {
      try {
        return await impl(args);
      } catch (err) {
        return `Error: ${err instanceof Error ? err.message : String(err)}`;
      }
    });

  const writeText = async (p: Value, text: string, mode: "w" | "a"): Promise<true> => {
    const target = full(p);
    await fs.mkdir(env.path.dirname(target), { recursive: true });
    if (mode === "a") await fs.appendFile(target, text, "utf8");
    else await fs.writeFile(target, text, "utf8");
    return true;
  };

  return makeModule(name, {
    read: op("read", (args) => fs.readFile(full(arg(args, 0)), "utf8")),
    write: op("write", (args) => writeText(arg(args, 0), display(arg(args, 1)), "w")),
    append: op("append", (args) => writeText(arg(args, 0), display(arg(args, 1)), "a")),

    exists: makeBuiltin(`${name}.exists`, async (args) => {
      try {
        await fs.access(full(arg(args, 0)));
        return true;
      } catch {
        return false;
      }
    }),

    delete: op("delete", async (args) => {
      await fs.unlink(full(arg(args, 0)));
      return true;
    }),

    read_json: op("read_json", async (args) => {
      const text = await fs.readFile(full(arg(args, 0)), "utf8");
      return fromJson(JSON.parse(text));
    }),
    write_json: op("write_json", (args) =>
      writeText(arg(args, 0), JSON.stringify(toJson(arg(args, 1)), null, 2), "w")
    ),

    read_csv: op("read_csv", async (args) => parseCsv(await fs.readFile(full(arg(args, 0)), "utf8"))),
    write_csv: op("write_csv", (args) =>
      writeText(arg(args, 0), stringifyCsv(expectList("write_csv", arg(args, 1))), "w")
    ),

    list_dir: op("list_dir", async (args) => {
      const entries = await fs.readdir(args.length === 0 ? env.cwd : full(args[0]));
      return entries.sort();
    }),
  });
}
