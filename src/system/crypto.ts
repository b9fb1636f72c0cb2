// src/system/crypto.ts
//
// Sable `crypto` module (Node adapter)
// ------------------------------------
//   md5 / sha1 / sha256      hex digest of the text (UTF-8)
//   base64_encode / decode   decode returns "Error: Invalid base64" on bad input
//   uuid()                   random UUID v4
//   random_hex(bytes)        hex string of `bytes` random bytes
//
// Built over an injected `crypto` so hosts without Node's module can swap it.

import { arg, expectInt } from "../core/builtins";
import { SableRuntimeError } from "../core/errors";
import { display, makeBuiltin, makeModule } from "../core/values";
import type { ModuleValue } from "../core/values";

export type HashAlgorithm = "md5" | "sha1" | "sha256";

export function createCryptoModule(crypto: typeof import("crypto")): ModuleValue {
  const hash = (alg: HashAlgorithm) =>
    makeBuiltin(`crypto.${alg}`, (args) => hashHex(crypto, alg, display(arg(args, 0))));

  return makeModule("crypto", {
    md5: hash("md5"),
    sha1: hash("sha1"),
    sha256: hash("sha256"),
    base64_encode: makeBuiltin("crypto.base64_encode", (args) => base64Encode(display(arg(args, 0)))),
    base64_decode: makeBuiltin("crypto.base64_decode", (args) => base64Decode(display(arg(args, 0)))),
    uuid: makeBuiltin("crypto.uuid", () => crypto.randomUUID()),
    random_hex: makeBuiltin("crypto.random_hex", (args) => {
      const bytes = args.length === 0 ? 16 : expectInt("random_hex", args[0]);
      if (bytes < 0 || bytes > 4096) throw new SableRuntimeError("ValueError", "random_hex() takes 0..4096 bytes");
      return crypto.randomBytes(bytes).toString("hex");
    }),
  });
}

/* =========================================================
   Hashing
   ========================================================= */

export function hashHex(crypto: typeof import("crypto"), alg: HashAlgorithm, text: string): string {
  return crypto.createHash(alg).update(text, "utf8").digest("hex");
}

/* =========================================================
   Base64
   ========================================================= */

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;
const INVALID_BASE64 = "Error: Invalid base64";

export function base64Encode(text: string): string {
  return Buffer.from(text, "utf8").toString("base64");
}

export function base64Decode(textB64: string): string {
  const s = textB64.trim();
  if (s.length % 4 !== 0 || !BASE64_RE.test(s)) return INVALID_BASE64;

  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(Buffer.from(s, "base64"));
  } catch {
    return INVALID_BASE64;
  }
}
