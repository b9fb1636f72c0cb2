import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { CONFIG_FILE_NAME, DEFAULT_CONFIG, definedOnly, loadSableConfig, mergeConfig, parseConfigObject } from "./configuration";

describe("parseConfigObject", () => {
  test("accepts a full config", () => {
    const { config, warnings } = parseConfigObject({
      name: " demo ",
      runtime: { workers: 2, strictArity: true, defaultTimeoutSeconds: 1.5 },
      logging: { level: "DEBUG" },
      files: { extensions: [".sbl", ".sable"] },
    });
    expect(warnings).toEqual([]);
    expect(config).toEqual({
      name: "demo",
      runtime: { workers: 2, strictArity: true, defaultTimeoutSeconds: 1.5 },
      logging: { level: "debug" },
      files: { extensions: [".sbl", ".sable"] },
    });
  });

  test("reports unknown keys and bad values, keeping nothing of them", () => {
    const { config, warnings } = parseConfigObject({ colour: 1, runtime: { workers: 0, strictArity: "yes", extra: 1 } });
    expect(warnings).toEqual([
      "unknown key colour",
      "unknown key runtime.extra",
      "runtime.workers must be an integer >= 1",
      "runtime.strictArity must be a boolean",
    ]);
    expect(config).toEqual({ runtime: {} });
  });

  test("non-objects", () => {
    expect(parseConfigObject("x").warnings).toEqual(["expected a JSON object"]);
    expect(parseConfigObject(null).warnings).toEqual([]);
    expect(parseConfigObject({ files: { extensions: [] } }).warnings).toEqual([
      "files.extensions must be a non-empty list of strings",
    ]);
  });
});

describe("mergeConfig", () => {
  test("normalizes extensions and keeps unset runtime fields", () => {
    const merged = mergeConfig(DEFAULT_CONFIG, {
      runtime: { workers: 8 },
      files: { extensions: ["SBL", ".sable", "sbl"] },
    });
    expect(merged.files.extensions).toEqual([".sbl", ".sable"]);
    expect(merged.runtime).toEqual({ ...DEFAULT_CONFIG.runtime, workers: 8 });
  });

  test("definedOnly drops undefined fields", () => {
    expect(definedOnly({ a: 1, b: undefined })).toEqual({ a: 1 });
  });
});

describe("loadSableConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "sable-config-"));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  test("finds the config above the script and applies overrides last", async () => {
    await fs.promises.writeFile(
      path.join(dir, CONFIG_FILE_NAME),
      JSON.stringify({ name: "demo", runtime: { workers: 2, maxCallDepth: 64 }, logging: { level: "debug" } })
    );
    const config = await loadSableConfig(path.join(dir, "src", "main.sbl"), { overrides: { runtime: { workers: 8 } } });

    expect(config.projectRoot).toBe(dir);
    expect(config.configPath).toBe(path.join(dir, CONFIG_FILE_NAME));
    expect(config.warnings).toEqual([]);
    expect(config.name).toBe("demo");
    expect(config.runtime.workers).toBe(8);
    expect(config.runtime.maxCallDepth).toBe(64);
    expect(config.logging.level).toBe("debug");
  });

  test("a .git folder marks the root when there is no config", async () => {
    await fs.promises.mkdir(path.join(dir, ".git"));
    const config = await loadSableConfig(path.join(dir, "main.sbl"));
    expect(config.projectRoot).toBe(dir);
    expect(config.configPath).toBe(null);
    expect(config.runtime).toEqual(DEFAULT_CONFIG.runtime);
  });

  test("an unreadable config is a warning, not a failure", async () => {
    await fs.promises.writeFile(path.join(dir, CONFIG_FILE_NAME), "{ nope");
    const config = await loadSableConfig(path.join(dir, "main.sbl"));
    expect(config.warnings).toHaveLength(1);
    expect(config.warnings[0].startsWith(`${CONFIG_FILE_NAME}: could not be read (`)).toBe(true);
    expect(config.name).toBe(DEFAULT_CONFIG.name);
  });

  test("file warnings name the config file", async () => {
    await fs.promises.writeFile(path.join(dir, CONFIG_FILE_NAME), JSON.stringify({ logging: { level: "loud" } }));
    const config = await loadSableConfig(path.join(dir, "main.sbl"));
    expect(config.warnings).toEqual([
      `${CONFIG_FILE_NAME}: logging.level must be one of silent, error, warn, info, debug, trace`,
    ]);
  });
});
