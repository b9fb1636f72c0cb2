import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { UNKNOWN_RANGE } from "../core/ast";
import { display, makeDict } from "../core/values";
import type { ModuleValue, Value } from "../core/values";
import { createFileModule } from "./file";

async function call(mod: ModuleValue, name: string, ...args: Value[]): Promise<Value> {
  const fn = mod.exports.get(name);
  if (!fn || typeof fn !== "object" || Array.isArray(fn) || fn.kind !== "builtin") throw new Error(`no function ${name}`);
  return fn.call(args, { range: UNKNOWN_RANGE, call: async () => null });
}

describe("file module", () => {
  let dir: string;
  let file: ModuleValue;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "sable-file-"));
    file = createFileModule({ fs, path, cwd: dir, homeDir: dir });
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  test("write creates parent directories; read and append", async () => {
    expect(await call(file, "write", "notes/a.txt", "one")).toBe(true);
    expect(await call(file, "append", "notes/a.txt", "\ntwo")).toBe(true);
    expect(await call(file, "read", "notes/a.txt")).toBe("one\ntwo");
    expect(await fs.promises.readFile(path.join(dir, "notes", "a.txt"), "utf8")).toBe("one\ntwo");
  });

  test("exists and delete", async () => {
    await call(file, "write", "x.txt", 1);
    expect(await call(file, "exists", "x.txt")).toBe(true);
    expect(await call(file, "delete", "x.txt")).toBe(true);
    expect(await call(file, "exists", "x.txt")).toBe(false);
  });

  test("failures come back as error strings", async () => {
    const result = await call(file, "read", "missing.txt");
    expect(typeof result === "string" && result.startsWith("Error: ENOENT")).toBe(true);
  });

  test("json files are pretty-printed", async () => {
    await call(file, "write_json", "data.json", makeDict([["a", [1, 2]]]));
    expect(await fs.promises.readFile(path.join(dir, "data.json"), "utf8")).toBe('{\n  "a": [\n    1,\n    2\n  ]\n}');
    expect(display(await call(file, "read_json", "data.json"))).toBe('{"a": [1, 2]}');
  });

  test("csv files", async () => {
    await call(file, "write_csv", "t.csv", [["id", "name"], [1, "a,b"]]);
    expect(await fs.promises.readFile(path.join(dir, "t.csv"), "utf8")).toBe('id,name\n1,"a,b"\n');
    expect(await call(file, "read_csv", "t.csv")).toEqual([
      ["id", "name"],
      ["1", "a,b"],
    ]);
  });

  test("list_dir is sorted; ~ is the home directory", async () => {
    await call(file, "write", "~/b.txt", "");
    await call(file, "write", "a.txt", "");
    expect(await call(file, "list_dir")).toEqual(["a.txt", "b.txt"]);
  });

  test("the io alias reports its own name", () => {
    expect(createFileModule({ fs, path, cwd: dir }, "io").name).toBe("io");
  });
});
