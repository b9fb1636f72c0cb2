// src/system/regex.ts
//
// Sable `regex` module over JavaScript RegExp.
//
//   match(p, s)        pattern matches at the start of s
//   search(p, s)       pattern matches anywhere
//   findall(p, s)      every match; with groups, the group values instead
//   sub(p, repl, s)    replace all; \1 and $1 both refer to groups
//   split(p, s)

import { arg, expectString } from "../core/builtins";
import { SableRuntimeError } from "../core/errors";
import { makeBuiltin, makeModule } from "../core/values";
import type { ModuleValue, Value } from "../core/values";

export function compilePattern(pattern: string, flags = ""): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SableRuntimeError("ValueError", `invalid regex: ${message}`);
  }
}

export function regexMatch(pattern: string, text: string): boolean {
  const re = compilePattern(pattern, "y");
  re.lastIndex = 0;
  return re.test(text);
}

export function regexSearch(pattern: string, text: string): boolean {
  return compilePattern(pattern).test(text);
}

export function regexFindAll(pattern: string, text: string): Value[] {
  const out: Value[] = [];
  for (const m of text.matchAll(compilePattern(pattern, "g"))) {
    const groups = m.slice(1).map((g): Value => g ?? "");
    if (groups.length === 0) out.push(m[0]);
    else if (groups.length === 1) out.push(groups[0]);
    else out.push(groups);
  }
  return out;
}

export function regexSub(pattern: string, repl: string, text: string): string {
  const jsRepl = repl.replace(/\\(\d+)/g, "$$$1");
  return text.replace(compilePattern(pattern, "g"), jsRepl);
}

export function regexSplit(pattern: string, text: string): string[] {
  return text.split(compilePattern(pattern));
}

export function createRegexModule(): ModuleValue {
  const two = (name: string, f: (p: string, s: string) => Value) =>
    makeBuiltin(`regex.${name}`, (args) => f(expectString(name, arg(args, 0)), expectString(name, arg(args, 1))));

  return makeModule("regex", {
    match: two("match", regexMatch),
    search: two("search", regexSearch),
    findall: two("findall", regexFindAll),
    split: two("split", regexSplit),
    sub: makeBuiltin("regex.sub", (args) =>
      regexSub(expectString("sub", arg(args, 0)), expectString("sub", arg(args, 1)), expectString("sub", arg(args, 2)))
    ),
  });
}
