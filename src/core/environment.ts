// src/core/environment.ts
//
// Lexical scopes. Each frame maps names to bindings and points at its parent;
// lookup and assignment walk outward from the innermost frame.
//
// Frames are created per call, per loop iteration, per comprehension element and
// per block body, so closures capture exactly the bindings visible where they
// were created.

import { SableRuntimeError } from "./errors";
import { matchesTypeTag, typeName } from "./values";
import type { Value } from "./values";

export type Binding = {
  value: Value;
  isConst: boolean;
  /** Declared tag (`let x: int`); later assignments are checked against it. */
  typeTag: string | null;
};

export type EnvironmentOptions = {
  /**
   * Assigning an undefined name creates it in the outermost frame instead of
   * raising NameError.
   */
  implicitGlobals?: boolean;
};

export class Environment {
  public readonly parent: Environment | null;
  private readonly vars = new Map<string, Binding>();
  private readonly implicitGlobals: boolean;

  constructor(parent: Environment | null = null, options?: EnvironmentOptions) {
    this.parent = parent;
    this.implicitGlobals = options?.implicitGlobals ?? parent?.implicitGlobals ?? false;
  }

  public child(): Environment {
    return new Environment(this);
  }

  public root(): Environment {
    let env: Environment = this;
    while (env.parent) env = env.parent;
    return env;
  }

  /** Create or overwrite a binding in this frame. */
  public define(name: string, value: Value, isConst = false, typeTag: string | null = null): void {
    const existing = this.vars.get(name);
    if (existing?.isConst) {
      throw new SableRuntimeError("ConstError", `Cannot reassign constant '${name}'`);
    }
    if (typeTag) checkTypeTag(name, value, typeTag);
    this.vars.set(name, { value, isConst, typeTag });
  }

  public get(name: string): Value {
    const binding = this.lookup(name);
    if (!binding) throw new SableRuntimeError("NameError", `Undefined name '${name}'`);
    return binding.value;
  }

  /** Update the nearest binding of `name`. */
  public set(name: string, value: Value): void {
    const binding = this.lookup(name);

    if (!binding) {
      if (!this.implicitGlobals) {
        throw new SableRuntimeError("NameError", `Undefined name '${name}'`);
      }
      this.root().vars.set(name, { value, isConst: false, typeTag: null });
      return;
    }

    if (binding.isConst) {
      throw new SableRuntimeError("ConstError", `Cannot reassign constant '${name}'`);
    }
    if (binding.typeTag) checkTypeTag(name, value, binding.typeTag);
    binding.value = value;
  }

  public has(name: string): boolean {
    return this.lookup(name) !== null;
  }

  public lookup(name: string): Binding | null {
    for (let env: Environment | null = this; env; env = env.parent) {
      const binding = env.vars.get(name);
      if (binding) return binding;
    }
    return null;
  }

  /** Names visible from this frame, innermost first, without duplicates. */
  public names(): string[] {
    const out = new Set<string>();
    for (let env: Environment | null = this; env; env = env.parent) {
      for (const name of env.vars.keys()) out.add(name);
    }
    return [...out];
  }

  public ownNames(): string[] {
    return [...this.vars.keys()];
  }
}

export function checkTypeTag(name: string, value: Value, tag: string): void {
  if (!matchesTypeTag(value, tag)) {
    throw new SableRuntimeError("TypeError", `Type mismatch for '${name}': expected ${tag}, got ${typeName(value)}`);
  }
}
