// src/core/evaluator.ts
//
// Sable Evaluator (Interpreter Runtime)
// -------------------------------------
// Executes a parsed Sable AST (see src/core/ast.ts).
//
// - Statements produce a Completion (normal / return / break / continue);
//   control flow never travels as an exception.
// - Failures are SableRuntimeError values, catchable with try/except.
// - The walk is async: builtins may sleep or do I/O, and `thread` tasks run on
//   the task pool between the main program's await points.
//
// Host interaction (print, input, sleep, randomness) goes through
// HostServices so the runner and tests can capture or fake it.

import { constructorNameFor, UNKNOWN_RANGE } from "./ast";
import type {
  Assignment,
  AssignTarget,
  BinaryOperator,
  Block,
  ClassDef,
  Expression,
  ForStmt,
  FunctionCall,
  FunctionDef,
  IfStmt,
  ImportStmt,
  LambdaExpr,
  ListComprehension,
  MatchStmt,
  Program,
  Range,
  Statement,
  ThreadStmt,
  TryExcept,
  UnaryOp,
  WhileStmt,
} from "./ast";
import { createBuiltins } from "./builtins";
import { Environment } from "./environment";
import { CATCH_ALL_KIND, SableRuntimeError, toRuntimeError } from "./errors";
import { getBuiltinMethod, joinFuture, noAttribute } from "./methods";
import { arithmetic, bitwise, checkedInt, invert, isNumeric, negate } from "./numbers";
import { TaskPool } from "./taskpool";
import {
  compareValues,
  containsValue,
  display,
  isCallable,
  isDict,
  isObjectValue,
  isTruthy,
  iterate,
  makeDict,
  makeFloat,
  matchesTypeTag,
  repr,
  toDictKey,
  typeName,
  valuesEqual,
} from "./values";
import type {
  CallContext,
  ClassValue,
  DictKey,
  FunctionValue,
  InstanceValue,
  ModuleValue,
  Value,
} from "./values";
import { createDefaultModuleProvider } from "../system/modules";
import type { ModuleProvider } from "../system/modules";
import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";

/* =========================================================
   Host Services (pluggable I/O)
   ========================================================= */

export type HostServices = {
  /** Print one line (stdout, a capture buffer, an output channel...). */
  print: (line: string) => void;

  /** Read a line of input. Return empty string if none is available. */
  input: (prompt: string) => Promise<string>;

  /** Sleep in milliseconds. */
  sleep: (ms: number) => Promise<void>;

  /** Random int in [min, max]. */
  randomInt: (min: number, max: number) => number;

  /** Random float in [0, 1). */
  random: () => number;
};

export function defaultHostServices(): HostServices {
  return {
    print: (line) => {
      process.stdout.write(line + "\n");
    },
    input: async () => "",
    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms))),
    randomInt: (min, max) => {
      const a = Math.ceil(Math.min(min, max));
      const b = Math.floor(Math.max(min, max));
      return a + Math.floor(Math.random() * (b - a + 1));
    },
    random: () => Math.random(),
  };
}

/* =========================================================
   Options & results
   ========================================================= */

export type EvaluatorOptions = {
  host?: Partial<HostServices>;
  /** Module source for `import`. Defaults to the built-in modules. */
  modules?: ModuleProvider;
  /** Shared pool for `thread`. One with `workers` workers is created otherwise. */
  pool?: TaskPool;
  workers?: number;
  logger?: Logger;
  /** Calls nested deeper than this raise RecursionError. Default: 1000 */
  maxCallDepth?: number;
  /** Argument count must equal parameter count. Default: false */
  strictArity?: boolean;
  /** Assignment to an undefined name creates a global. Default: false */
  implicitGlobals?: boolean;
};

export type Completion =
  | { type: "normal"; value: Value }
  | { type: "return"; value: Value }
  | { type: "break" }
  | { type: "continue" };

const NORMAL_NULL: Completion = Object.freeze({ type: "normal", value: null });

function normal(value: Value): Completion {
  return { type: "normal", value };
}

/** Per-call bookkeeping: loops open in the current function, call nesting. */
type ExecState = {
  loopDepth: number;
  depth: number;
};

const COMPOUND_OPS: Record<Exclude<Assignment["operator"], "=">, BinaryOperator> = {
  "+=": "+",
  "-=": "-",
  "*=": "*",
  "/=": "/",
  "%=": "%",
  "**=": "**",
};

type TargetRef = {
  read: () => Value;
  write: (value: Value) => void;
};

/* =========================================================
   Evaluator
   ========================================================= */

export class Evaluator {
  public readonly globals: Environment;
  public readonly pool: TaskPool;

  private readonly host: HostServices;
  private readonly modules: ModuleProvider;
  private readonly moduleCache = new Map<string, ModuleValue>();
  private readonly ownsPool: boolean;
  private readonly log: Logger;
  private readonly maxCallDepth: number;
  private readonly strictArity: boolean;

  constructor(options: EvaluatorOptions = {}) {
    this.host = { ...defaultHostServices(), ...(options.host ?? {}) };
    this.log = options.logger ?? silentLogger();
    this.maxCallDepth = options.maxCallDepth ?? 1000;
    this.strictArity = options.strictArity ?? false;
    this.modules = options.modules ?? createDefaultModuleProvider({ sleep: this.host.sleep });

    this.ownsPool = !options.pool;
    this.pool = options.pool ?? new TaskPool({ workers: options.workers, logger: this.log.child("pool") });

    this.globals = new Environment(null, { implicitGlobals: options.implicitGlobals ?? false });
    for (const [name, fn] of createBuiltins(this.host)) {
      this.globals.define(name, fn);
    }
  }

  /** Run a program in the global frame; yields the value of the last statement. */
  public async evaluate(program: Program): Promise<Value> {
    const state: ExecState = { loopDepth: 0, depth: 0 };
    let last: Value = null;

    for (const st of program.body) {
      const c = await this.evalStatement(st, this.globals, state);
      if (c.type === "return") return c.value;
      if (c.type === "normal") last = c.value;
    }

    return last;
  }

  /** Call any callable value from the host side. */
  public callFunction(fn: Value, args: Value[], range?: Range): Promise<Value> {
    return this.callValue(fn, args, { loopDepth: 0, depth: 0 }, range);
  }

  /** Wait for outstanding `thread` tasks when this evaluator created the pool. */
  public async shutdown(): Promise<void> {
    if (this.ownsPool) await this.pool.shutdown();
  }

  /* =========================================================
     Statements
     ========================================================= */

  private async evalStatement(st: Statement, env: Environment, state: ExecState): Promise<Completion> {
    try {
      return await this.evalStatementInner(st, env, state);
    } catch (err) {
      throw toRuntimeError(err, st.range);
    }
  }

  private async evalStatementInner(st: Statement, env: Environment, state: ExecState): Promise<Completion> {
    switch (st.kind) {
      case "ExpressionStmt":
        return normal(await this.evalExpression(st.expression, env, state));

      case "LetDecl": {
        const value = await this.evalExpression(st.value, env, state);
        env.define(st.name.name, value, st.isConst, st.typeTag?.name ?? null);
        return NORMAL_NULL;
      }

      case "Assignment":
        await this.evalAssignment(st, env, state);
        return NORMAL_NULL;

      case "IfStmt":
        return this.evalIf(st, env, state);

      case "WhileStmt":
        return this.evalWhile(st, env, state);

      case "ForStmt":
        return this.evalFor(st, env, state);

      case "FunctionDef":
        await this.evalFunctionDef(st, env, state);
        return NORMAL_NULL;

      case "ReturnStmt":
        return { type: "return", value: st.argument ? await this.evalExpression(st.argument, env, state) : null };

      case "ClassDef":
        this.evalClassDef(st, env);
        return NORMAL_NULL;

      case "ImportStmt":
        this.evalImport(st, env);
        return NORMAL_NULL;

      case "BreakStmt":
        if (state.loopDepth === 0) throw new SableRuntimeError("ControlFlowError", "'break' outside loop");
        return { type: "break" };

      case "ContinueStmt":
        if (state.loopDepth === 0) throw new SableRuntimeError("ControlFlowError", "'continue' outside loop");
        return { type: "continue" };

      case "TryExcept":
        return this.evalTry(st, env, state);

      case "MatchStmt":
        return this.evalMatch(st, env, state);

      case "AssertStmt": {
        if (isTruthy(await this.evalExpression(st.test, env, state))) return NORMAL_NULL;
        const message = st.message ? display(await this.evalExpression(st.message, env, state)) : "Assertion failed";
        throw new SableRuntimeError("AssertionError", message);
      }

      default:
        return assertNeverNode(st);
    }
  }

  private async evalBlock(body: Block, env: Environment, state: ExecState): Promise<Completion> {
    let last: Value = null;
    for (const st of body) {
      const c = await this.evalStatement(st, env, state);
      if (c.type !== "normal") return c;
      last = c.value;
    }
    return normal(last);
  }

  private async evalAssignment(st: Assignment, env: Environment, state: ExecState): Promise<void> {
    if (st.operator === "=") {
      const value = await this.evalExpression(st.value, env, state);
      const ref = await this.resolveTarget(st.target, env, state);
      ref.write(value);
      return;
    }

    const ref = await this.resolveTarget(st.target, env, state);
    const current = ref.read();
    const rhs = await this.evalExpression(st.value, env, state);
    ref.write(binaryOp(COMPOUND_OPS[st.operator], current, rhs));
  }

  // Evaluates the target's sub-expressions exactly once.
  private async resolveTarget(target: AssignTarget, env: Environment, state: ExecState): Promise<TargetRef> {
    switch (target.kind) {
      case "Identifier":
        return {
          read: () => env.get(target.name),
          write: (v) => env.set(target.name, v),
        };

      case "MemberAccess": {
        const obj = await this.evalExpression(target.object, env, state);
        const name = target.property.name;
        return {
          read: () => this.getMember(obj, name),
          write: (v) => setMember(obj, name, v),
        };
      }

      case "IndexAccess": {
        const obj = await this.evalExpression(target.object, env, state);
        const index = await this.evalExpression(target.index, env, state);
        return {
          read: () => getIndex(obj, index),
          write: (v) => setIndex(obj, index, v),
        };
      }
    }
  }

  private async evalIf(st: IfStmt, env: Environment, state: ExecState): Promise<Completion> {
    if (isTruthy(await this.evalExpression(st.test, env, state))) {
      return this.evalBlock(st.consequent, env.child(), state);
    }

    for (const clause of st.elifs) {
      if (isTruthy(await this.evalExpression(clause.test, env, state))) {
        return this.evalBlock(clause.body, env.child(), state);
      }
    }

    return st.alternate ? this.evalBlock(st.alternate, env.child(), state) : NORMAL_NULL;
  }

  private async evalWhile(st: WhileStmt, env: Environment, state: ExecState): Promise<Completion> {
    state.loopDepth++;
    try {
      while (isTruthy(await this.evalExpression(st.test, env, state))) {
        const c = await this.evalBlock(st.body, env.child(), state);
        if (c.type === "break") break;
        if (c.type === "return") return c;
      }
      return NORMAL_NULL;
    } finally {
      state.loopDepth--;
    }
  }

  private async evalFor(st: ForStmt, env: Environment, state: ExecState): Promise<Completion> {
    const items = iterate(await this.evalExpression(st.iterable, env, state));

    state.loopDepth++;
    try {
      for (const item of items) {
        const frame = env.child();
        frame.define(st.variable.name, item);
        const c = await this.evalBlock(st.body, frame, state);
        if (c.type === "break") break;
        if (c.type === "return") return c;
      }
      return NORMAL_NULL;
    } finally {
      state.loopDepth--;
    }
  }

  private async evalFunctionDef(st: FunctionDef, env: Environment, state: ExecState): Promise<void> {
    const name = st.name.name;
    let value: Value = makeFunction(name, st, env);
    env.define(name, value);

    // @outer @inner func f  ==>  f = outer(inner(f))
    for (const deco of [...st.decorators].reverse()) {
      const decorator = env.get(deco.name);
      value = await this.callValue(decorator, [value], state, deco.range);
      env.define(name, value);
    }
  }

  private evalClassDef(st: ClassDef, env: Environment): void {
    const methods = new Map<string, FunctionValue>();
    for (const m of st.methods) methods.set(m.name.name, makeFunction(m.name.name, m, env));

    const cls: ClassValue = { kind: "class", name: st.name.name, methods };
    env.define(cls.name, cls);
    env.define(constructorNameFor(cls.name), cls);
  }

  private evalImport(st: ImportStmt, env: Environment): void {
    const mod = this.loadModule(st.module, st.alias?.name ?? null);

    if (st.names.length === 0) {
      env.define(st.alias?.name ?? st.module, mod);
      return;
    }

    for (const id of st.names) {
      const value = mod.exports.get(id.name);
      if (value === undefined) {
        throw new SableRuntimeError("ImportError", `cannot import name '${id.name}' from '${st.module}'`, id.range);
      }
      env.define(id.name, value);
    }
  }

  private loadModule(name: string, alias: string | null): ModuleValue {
    const key = `${name}\u0000${alias ?? ""}`;
    const cached = this.moduleCache.get(key);
    if (cached) return cached;

    const mod = this.modules.load(name);
    if (!mod) throw new SableRuntimeError("ImportError", `Unknown module '${name}'`);

    this.log.debug(`module '${name}' loaded`);
    this.moduleCache.set(key, mod);
    return mod;
  }

  private async evalTry(st: TryExcept, env: Environment, state: ExecState): Promise<Completion> {
    let outcome: { ok: true; completion: Completion } | { ok: false; error: unknown };
    try {
      outcome = { ok: true, completion: await this.evalTryBody(st, env, state) };
    } catch (err) {
      outcome = { ok: false, error: err };
    }

    if (st.finalizer) {
      const fin = await this.evalBlock(st.finalizer, env.child(), state);
      if (fin.type !== "normal") return fin;
    }

    if (!outcome.ok) throw outcome.error;
    return outcome.completion;
  }

  private async evalTryBody(st: TryExcept, env: Environment, state: ExecState): Promise<Completion> {
    let completion: Completion;
    try {
      completion = await this.evalBlock(st.body, env.child(), state);
    } catch (err) {
      const error = toRuntimeError(err, st.range);
      const handler = st.handlers.find(
        (h) => !h.errorKind || h.errorKind.name === error.kind || h.errorKind.name === CATCH_ALL_KIND
      );
      if (!handler) throw error;

      const frame = env.child();
      if (handler.binding) frame.define(handler.binding.name, error.message);
      return this.evalBlock(handler.body, frame, state);
    }

    if (st.orelse && completion.type === "normal") {
      return this.evalBlock(st.orelse, env.child(), state);
    }
    return completion;
  }

  private async evalMatch(st: MatchStmt, env: Environment, state: ExecState): Promise<Completion> {
    const subject = await this.evalExpression(st.subject, env, state);

    for (const c of st.cases) {
      if (c.pattern && !valuesEqual(subject, await this.evalExpression(c.pattern, env, state))) continue;
      if (c.guard && !isTruthy(await this.evalExpression(c.guard, env, state))) continue;
      return this.evalBlock(c.body, env.child(), state);
    }

    return st.defaultCase ? this.evalBlock(st.defaultCase, env.child(), state) : NORMAL_NULL;
  }

  /* =========================================================
     Expressions
     ========================================================= */

  private async evalExpression(expr: Expression, env: Environment, state: ExecState): Promise<Value> {
    try {
      return await this.evalExpressionInner(expr, env, state);
    } catch (err) {
      throw toRuntimeError(err, expr.range);
    }
  }

  private async evalExpressionInner(expr: Expression, env: Environment, state: ExecState): Promise<Value> {
    switch (expr.kind) {
      case "Literal":
        if (typeof expr.value !== "number") return expr.value;
        return expr.isFloat ? makeFloat(expr.value) : checkedInt(expr.value);

      case "Identifier":
        return env.get(expr.name);

      case "BinaryOp": {
        const left = await this.evalExpression(expr.left, env, state);
        if (expr.operator === "and") return isTruthy(left) ? this.evalExpression(expr.right, env, state) : left;
        if (expr.operator === "or") return isTruthy(left) ? left : this.evalExpression(expr.right, env, state);
        const right = await this.evalExpression(expr.right, env, state);
        return binaryOp(expr.operator, left, right);
      }

      case "UnaryOp":
        return unaryOp(expr, await this.evalExpression(expr.argument, env, state));

      case "FunctionCall":
        return this.evalCall(expr, env, state);

      case "MemberAccess":
        return this.getMember(await this.evalExpression(expr.object, env, state), expr.property.name);

      case "IndexAccess": {
        const obj = await this.evalExpression(expr.object, env, state);
        const index = await this.evalExpression(expr.index, env, state);
        return getIndex(obj, index);
      }

      case "ListLiteral": {
        const out: Value[] = [];
        for (const el of expr.elements) out.push(await this.evalExpression(el, env, state));
        return out;
      }

      case "DictLiteral": {
        const dict = makeDict();
        for (const entry of expr.entries) {
          const key = toDictKey(await this.evalExpression(entry.key, env, state));
          dict.entries.set(key, await this.evalExpression(entry.value, env, state));
        }
        return dict;
      }

      case "AwaitExpr": {
        const value = await this.evalExpression(expr.argument, env, state);
        if (!isObjectValue(value)) return value;
        if (value.kind === "future") return joinFuture(value);
        if (value.kind === "function" && value.isAsync) return this.callValue(value, [], state, expr.range);
        return value;
      }

      case "ListComprehension":
        return this.evalComprehension(expr, env, state);

      case "ThreadStmt":
        return this.evalThread(expr, env, state);

      case "LambdaExpr":
        return makeLambda(expr, env);

      default:
        return assertNeverNode(expr);
    }
  }

  private async evalCall(expr: FunctionCall, env: Environment, state: ExecState): Promise<Value> {
    // desugared `c ? a : b`
    if (expr.lazy) {
      const [test, whenTrue, whenFalse] = expr.args;
      const branch = isTruthy(await this.evalExpression(test, env, state)) ? whenTrue : whenFalse;
      return this.evalExpression(branch, env, state);
    }

    const callee = await this.evalExpression(expr.callee, env, state);
    const args: Value[] = [];
    for (const a of expr.args) args.push(await this.evalExpression(a, env, state));

    return this.callValue(callee, args, state, expr.range);
  }

  private async evalComprehension(expr: ListComprehension, env: Environment, state: ExecState): Promise<Value> {
    const items = iterate(await this.evalExpression(expr.iterable, env, state));
    const out: Value[] = [];

    for (const item of items) {
      const frame = env.child();
      frame.define(expr.variable.name, item);
      if (expr.condition && !isTruthy(await this.evalExpression(expr.condition, frame, state))) continue;
      out.push(await this.evalExpression(expr.element, frame, state));
    }

    return out;
  }

  private async evalThread(expr: ThreadStmt, env: Environment, state: ExecState): Promise<Value> {
    const callee = await this.evalExpression(expr.call.callee, env, state);
    const args: Value[] = [];
    for (const a of expr.call.args) args.push(await this.evalExpression(a, env, state));

    if (!isCallable(callee)) {
      throw new SableRuntimeError("TypeError", `'${typeName(callee)}' object is not callable`);
    }

    const taskState: ExecState = { loopDepth: 0, depth: state.depth };
    const future = this.pool.submit(
      (fn: Value, fnArgs: Value[]) => this.callValue(fn, fnArgs, taskState, expr.range),
      [callee, args]
    );
    return { kind: "future", future };
  }

  /* =========================================================
     Calls
     ========================================================= */

  private async callValue(fn: Value, args: Value[], state: ExecState, range?: Range): Promise<Value> {
    if (!isObjectValue(fn)) {
      throw new SableRuntimeError("TypeError", `'${typeName(fn)}' object is not callable`);
    }

    switch (fn.kind) {
      case "function":
        return this.callUser(fn, args, state);

      case "bound":
        return this.callUser(fn.method, [fn.self, ...args], state);

      case "builtin": {
        const ctx: CallContext = {
          range: range ?? UNKNOWN_RANGE,
          call: (target, targetArgs) => this.callValue(target, targetArgs, state, range),
        };
        return fn.call(args, ctx);
      }

      case "class":
        return this.instantiate(fn, args, state);

      default:
        throw new SableRuntimeError("TypeError", `'${typeName(fn)}' object is not callable`);
    }
  }

  private async callUser(fn: FunctionValue, args: Value[], state: ExecState): Promise<Value> {
    if (state.depth + 1 > this.maxCallDepth) {
      throw new SableRuntimeError("RecursionError", "maximum recursion depth exceeded");
    }

    if (this.strictArity && args.length !== fn.params.length) {
      throw new SableRuntimeError(
        "TypeError",
        `${fn.name}() takes ${fn.params.length} argument${fn.params.length === 1 ? "" : "s"} but ${args.length} ${
          args.length === 1 ? "was" : "were"
        } given`
      );
    }

    const frame = fn.closure.child();
    fn.params.forEach((p, i) => {
      const value = i < args.length ? args[i] : null;
      frame.define(p.name.name, value, false, p.typeTag?.name ?? null);
    });

    const inner: ExecState = { loopDepth: 0, depth: state.depth + 1 };
    let result: Value;

    if (Array.isArray(fn.body)) {
      const c = await this.evalBlock(fn.body, frame, inner);
      result = c.type === "return" ? c.value : null;
    } else {
      result = await this.evalExpression(fn.body, frame, inner);
    }

    if (fn.returnTag && !matchesTypeTag(result, fn.returnTag.name)) {
      throw new SableRuntimeError(
        "TypeError",
        `Type mismatch for return value of '${fn.name}': expected ${fn.returnTag.name}, got ${typeName(result)}`
      );
    }
    return result;
  }

  private async instantiate(cls: ClassValue, args: Value[], state: ExecState): Promise<InstanceValue> {
    const instance: InstanceValue = { kind: "instance", cls, attrs: new Map() };

    const init = cls.methods.get("__init__");
    if (init) {
      await this.callUser(init, [instance, ...args], state);
    } else if (this.strictArity && args.length > 0) {
      throw new SableRuntimeError("TypeError", `${cls.name}() takes no arguments`);
    }

    return instance;
  }

  /* =========================================================
     Member access
     ========================================================= */

  private getMember(obj: Value, name: string): Value {
    if (isObjectValue(obj)) {
      switch (obj.kind) {
        case "instance": {
          const attr = obj.attrs.get(name);
          if (attr !== undefined) return attr;
          const method = obj.cls.methods.get(name);
          if (method) return { kind: "bound", self: obj, method };
          throw noAttribute(obj, name);
        }

        case "class": {
          const method = obj.methods.get(name);
          if (method) return method;
          throw new SableRuntimeError("AttributeError", `class '${obj.name}' has no attribute '${name}'`);
        }

        case "module": {
          const value = obj.exports.get(name);
          if (value !== undefined) return value;
          throw new SableRuntimeError("AttributeError", `module '${obj.name}' has no attribute '${name}'`);
        }

        case "dict": {
          const value = obj.entries.get(name);
          if (value !== undefined) return value;
          return getBuiltinMethod(obj, name) ?? null;
        }

        default:
          break;
      }
    }

    const method = getBuiltinMethod(obj, name);
    if (method) return method;
    throw noAttribute(obj, name);
  }
}

/* =========================================================
   Function values
   ========================================================= */

function makeFunction(name: string, def: FunctionDef, env: Environment): FunctionValue {
  return {
    kind: "function",
    name,
    params: def.params,
    body: def.body,
    closure: env,
    isAsync: def.isAsync,
    returnTag: def.returnTag,
  };
}

function makeLambda(expr: LambdaExpr, env: Environment): FunctionValue {
  return {
    kind: "function",
    name: "<lambda>",
    params: expr.params,
    body: expr.body,
    closure: env,
    isAsync: false,
    returnTag: null,
  };
}

/* =========================================================
   Operators
   ========================================================= */

function unsupported(op: string, a: Value, b: Value): SableRuntimeError {
  return new SableRuntimeError(
    "TypeError",
    `unsupported operand type(s) for ${op}: '${typeName(a)}' and '${typeName(b)}'`
  );
}

function repeat<T>(items: T[], times: number): T[] {
  const out: T[] = [];
  for (let i = 0; i < times; i++) out.push(...items);
  return out;
}

function repeatCount(n: number): number {
  return Math.max(0, n);
}

export function binaryOp(op: BinaryOperator, a: Value, b: Value): Value {
  switch (op) {
    case "+":
      if (isNumeric(a) && isNumeric(b)) return arithmetic(op, a, b);
      if (typeof a === "string" && typeof b === "string") return a + b;
      if (Array.isArray(a) && Array.isArray(b)) return [...a, ...b];
      throw unsupported(op, a, b);

    case "-":
    case "/":
    case "%":
    case "**":
      if (isNumeric(a) && isNumeric(b)) return arithmetic(op, a, b);
      throw unsupported(op, a, b);

    case "*":
      if (isNumeric(a) && isNumeric(b)) return arithmetic(op, a, b);
      if (typeof a === "string" && typeof b === "number") return a.repeat(repeatCount(b));
      if (typeof a === "number" && typeof b === "string") return b.repeat(repeatCount(a));
      if (Array.isArray(a) && typeof b === "number") return repeat(a, repeatCount(b));
      if (typeof a === "number" && Array.isArray(b)) return repeat(b, repeatCount(a));
      throw unsupported(op, a, b);

    case "==":
      return valuesEqual(a, b);
    case "!=":
      return !valuesEqual(a, b);

    case "<":
      return compareValues(a, b, op) < 0;
    case "<=":
      return compareValues(a, b, op) <= 0;
    case ">":
      return compareValues(a, b, op) > 0;
    case ">=":
      return compareValues(a, b, op) >= 0;

    case "in":
      return containsValue(b, a);
    case "not in":
      return !containsValue(b, a);

    case "&":
    case "^":
    case "<<":
    case ">>":
      if (typeof a === "number" && typeof b === "number") return bitwise(op, a, b);
      throw unsupported(op, a, b);

    // short-circuit forms are handled by the evaluator; these are the plain results
    case "and":
      return isTruthy(a) ? b : a;
    case "or":
      return isTruthy(a) ? a : b;
  }
}

function unaryOp(expr: UnaryOp, v: Value): Value {
  switch (expr.operator) {
    case "-":
      if (isNumeric(v)) return negate(v);
      throw new SableRuntimeError("TypeError", `bad operand type for unary -: '${typeName(v)}'`);
    case "not":
      return !isTruthy(v);
    case "~":
      if (typeof v === "number") return invert(v);
      throw new SableRuntimeError("TypeError", `bad operand type for unary ~: '${typeName(v)}'`);
  }
}

/* =========================================================
   Indexing & attribute assignment
   ========================================================= */

function listIndex(kind: "list" | "string", length: number, index: Value): number {
  if (typeof index !== "number") {
    throw new SableRuntimeError("TypeError", `${kind} indices must be integers, not ${typeName(index)}`);
  }
  const i = index < 0 ? length + index : index;
  if (i < 0 || i >= length) throw new SableRuntimeError("IndexError", `${kind} index out of range`);
  return i;
}

function getIndex(obj: Value, index: Value): Value {
  if (Array.isArray(obj)) return obj[listIndex("list", obj.length, index)];
  if (typeof obj === "string") return obj[listIndex("string", obj.length, index)];
  if (isDict(obj)) {
    const key: DictKey = toDictKey(index);
    const value = obj.entries.get(key);
    if (value === undefined) throw new SableRuntimeError("KeyError", repr(key));
    return value;
  }
  throw new SableRuntimeError("TypeError", `'${typeName(obj)}' object is not subscriptable`);
}

function setIndex(obj: Value, index: Value, value: Value): void {
  if (Array.isArray(obj)) {
    obj[listIndex("list", obj.length, index)] = value;
    return;
  }
  if (isDict(obj)) {
    obj.entries.set(toDictKey(index), value);
    return;
  }
  throw new SableRuntimeError("TypeError", `'${typeName(obj)}' object does not support item assignment`);
}

function setMember(obj: Value, name: string, value: Value): void {
  if (isObjectValue(obj)) {
    if (obj.kind === "instance") {
      obj.attrs.set(name, value);
      return;
    }
    if (obj.kind === "dict") {
      obj.entries.set(name, value);
      return;
    }
  }
  throw new SableRuntimeError("AttributeError", `cannot set attribute '${name}' on '${typeName(obj)}' object`);
}

function assertNeverNode(node: never): never {
  throw new SableRuntimeError("RuntimeError", `Unsupported AST node: ${JSON.stringify(node)}`);
}
