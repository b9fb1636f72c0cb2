import * as fs from "fs";
import * as nodeOs from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { UNKNOWN_RANGE } from "../core/ast";
import type { ModuleValue, Value } from "../core/values";
import { createOsModule } from "./os";

async function call(mod: ModuleValue, name: string, ...args: Value[]): Promise<Value> {
  const fn = mod.exports.get(name);
  if (!fn || typeof fn !== "object" || Array.isArray(fn) || fn.kind !== "builtin") throw new Error(`no function ${name}`);
  return fn.call(args, { range: UNKNOWN_RANGE, call: async () => null });
}

describe("os module", () => {
  let dir: string;
  let os: ModuleValue;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(nodeOs.tmpdir(), "sable-os-"));
    os = createOsModule({ os: nodeOs, fs, path, cwd: dir, env: { SABLE_MODE: "test" } });
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  test("values", () => {
    expect(["posix", "nt"]).toContain(os.exports.get("name"));
    expect(os.exports.get("sep")).toBe(path.sep);
  });

  test("getenv reads the injected environment", async () => {
    expect(await call(os, "getenv", "SABLE_MODE")).toBe("test");
    expect(await call(os, "getenv", "MISSING")).toBe(null);
    expect(await call(os, "getenv", "MISSING", "fallback")).toBe("fallback");
  });

  test("cwd and listdir", async () => {
    await fs.promises.writeFile(path.join(dir, "b"), "");
    await fs.promises.mkdir(path.join(dir, "a"));
    expect(await call(os, "cwd")).toBe(dir);
    expect(await call(os, "listdir")).toEqual(["a", "b"]);
    expect(await call(os, "listdir", "a")).toEqual([]);
  });

  test("listdir raises on a missing directory", async () => {
    await expect(call(os, "listdir", "nowhere")).rejects.toThrow(/ENOENT/);
  });

  test("cpu_count is at least one", async () => {
    const n = await call(os, "cpu_count");
    expect(typeof n === "number" && n >= 1).toBe(true);
  });
});
