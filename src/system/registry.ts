// src/system/registry.ts
//
// Sable Builtins Registry
// -----------------------
// Editor-side description of the global functions and the built-in modules:
// names, signatures and docs, used by completion and hover. The runtime
// implementations live in src/core/builtins.ts and src/system/*.ts; the data
// itself is registry.json.
//
// Exported API:
//   - BUILTIN_REGISTRY (tree)
//   - resolveBuiltin(pathParts): BuiltinEntry | null
//   - listChildren(pathParts): BuiltinEntry[]
//   - GLOBAL_NAMES, MODULE_NAMES
//   - paramsFromSignature(signature)

import registryData from "./registry.json";

export type BuiltinKind = "namespace" | "function" | "value";

export type BuiltinEntryBase = {
  kind: BuiltinKind;
  name: string;
  /** Providing module; null for globals. */
  module: string | null;
  doc?: string;
  signature?: string;
};

export type BuiltinNamespace = BuiltinEntryBase & {
  kind: "namespace";
  children: Record<string, BuiltinEntry>;
};

export type BuiltinFunctionEntry = BuiltinEntryBase & {
  kind: "function";
  /** Parameter names, for snippet completion. */
  params: string[];
};

export type BuiltinValueEntry = BuiltinEntryBase & {
  kind: "value";
};

export type BuiltinEntry = BuiltinNamespace | BuiltinFunctionEntry | BuiltinValueEntry;

/* =========================================================
   Loading
   ========================================================= */

function isRecord(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function optionalString(x: unknown): string | undefined {
  return typeof x === "string" ? x : undefined;
}

/**
 * `math.log(x, base?) -> float`  ->  ["x", "base"]
 * `print(...values)`             ->  ["values"]
 */
export function paramsFromSignature(signature: string): string[] {
  const m = signature.match(/\(([^)]*)\)/);
  if (!m || !m[1].trim()) return [];
  return m[1]
    .split(",")
    .map((p) => p.trim().replace(/^\.\.\./, "").replace(/\?$/, ""))
    .filter((p) => /^[A-Za-z_]\w*$/.test(p));
}

function entryFrom(name: string, module: string | null, raw: unknown): BuiltinFunctionEntry | BuiltinValueEntry {
  const meta = isRecord(raw) ? raw : {};
  const signature = optionalString(meta.signature);
  const doc = optionalString(meta.doc);

  if (meta.kind === "value") return { kind: "value", name, module, signature, doc };
  return { kind: "function", name, module, signature, doc, params: signature ? paramsFromSignature(signature) : [] };
}

function moduleFrom(name: string, raw: Record<string, unknown>): BuiltinNamespace {
  const children: Record<string, BuiltinEntry> = {};
  const members = isRecord(raw.members) ? raw.members : {};
  for (const [member, meta] of Object.entries(members)) {
    children[member] = entryFrom(member, name, meta);
  }
  return { kind: "namespace", name, module: name, doc: optionalString(raw.doc), signature: `import "${name}"`, children };
}

function buildRegistry(data: unknown): BuiltinNamespace {
  const root: BuiltinNamespace = { kind: "namespace", name: "<root>", module: null, children: {} };
  if (!isRecord(data)) return root;

  const globals = isRecord(data.globals) ? data.globals : {};
  for (const [name, meta] of Object.entries(globals)) {
    root.children[name] = entryFrom(name, null, meta);
  }

  const modules = isRecord(data.modules) ? data.modules : {};
  const aliases: Array<[string, string]> = [];

  for (const [name, raw] of Object.entries(modules)) {
    if (!isRecord(raw)) continue;
    const target = optionalString(raw.aliasOf);
    if (target) aliases.push([name, target]);
    else root.children[name] = moduleFrom(name, raw);
  }

  // `import "network"` gives the same members as `import "http"`
  for (const [alias, target] of aliases) {
    const base = root.children[target];
    if (!base || base.kind !== "namespace") continue;

    const children: Record<string, BuiltinEntry> = {};
    for (const [member, entry] of Object.entries(base.children)) {
      children[member] = {
        ...entry,
        module: alias,
        signature: entry.signature?.replace(`${target}.`, `${alias}.`),
      };
    }
    root.children[alias] = { ...base, name: alias, module: alias, signature: `import "${alias}"`, children };
  }

  return root;
}

export const BUILTIN_REGISTRY: BuiltinNamespace = buildRegistry(registryData);

export const MODULE_NAMES: readonly string[] = Object.values(BUILTIN_REGISTRY.children)
  .filter((e) => e.kind === "namespace")
  .map((e) => e.name);

export const GLOBAL_NAMES: readonly string[] = Object.values(BUILTIN_REGISTRY.children)
  .filter((e) => e.kind !== "namespace")
  .map((e) => e.name);

/* =========================================================
   Public helpers
   ========================================================= */

export function resolveBuiltin(pathParts: string[]): BuiltinEntry | null {
  let node: BuiltinEntry = BUILTIN_REGISTRY;
  for (const p of pathParts) {
    if (node.kind !== "namespace") return null;
    if (!Object.prototype.hasOwnProperty.call(node.children, p)) return null;
    node = node.children[p];
  }
  return node;
}

export function listChildren(pathParts: string[]): BuiltinEntry[] {
  const node = resolveBuiltin(pathParts);
  if (!node || node.kind !== "namespace") return [];
  return Object.values(node.children);
}

export function isModuleName(name: string): boolean {
  return MODULE_NAMES.includes(name);
}
