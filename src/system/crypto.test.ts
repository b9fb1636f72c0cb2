import * as nodeCrypto from "crypto";
import { describe, expect, test } from "vitest";

import { UNKNOWN_RANGE } from "../core/ast";
import type { Value } from "../core/values";
import { base64Decode, base64Encode, createCryptoModule, hashHex } from "./crypto";

const mod = createCryptoModule(nodeCrypto);

async function call(name: string, ...args: Value[]): Promise<Value> {
  const fn = mod.exports.get(name);
  if (!fn || typeof fn !== "object" || Array.isArray(fn) || fn.kind !== "builtin") throw new Error(`no function ${name}`);
  return fn.call(args, { range: UNKNOWN_RANGE, call: async () => null });
}

describe("crypto module", () => {
  test("hex digests", () => {
    expect(hashHex(nodeCrypto, "md5", "")).toBe("d41d8cd98f00b204e9800998ecf8427e");
    expect(hashHex(nodeCrypto, "sha256", "abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
  });

  test("hash functions take the display form of any value", async () => {
    expect(await call("sha1", 123)).toBe(hashHex(nodeCrypto, "sha1", "123"));
  });

  test("base64", () => {
    expect(base64Encode("hello")).toBe("aGVsbG8=");
    expect(base64Decode("aGVsbG8=")).toBe("hello");
    expect(base64Decode("abc")).toBe("Error: Invalid base64");
    expect(base64Decode("****")).toBe("Error: Invalid base64");
  });

  test("uuid and random_hex", async () => {
    expect(await call("uuid")).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(await call("random_hex", 4)).toMatch(/^[0-9a-f]{8}$/);
    await expect(call("random_hex", -1)).rejects.toThrow("random_hex() takes 0..4096 bytes");
  });
});
