import { describe, expect, test } from "vitest";
import type { Expression, Program, Statement } from "./ast";
import { TERNARY_BUILTIN } from "./ast";
import { parseSource } from "./parser";

function parse(source: string): Program {
  const result = parseSource(source);
  if (!result.program) {
    throw new Error(`parse failed: ${[...result.lexErrors, ...result.errors].map((e) => e.message).join("; ")}`);
  }
  return result.program;
}

function first(source: string): Statement {
  return parse(source).body[0];
}

/** Compact prefix form of an expression, enough to check shape and precedence. */
function sexpr(e: Expression): string {
  switch (e.kind) {
    case "Literal":
      return typeof e.value === "string" ? JSON.stringify(e.value) : String(e.value);
    case "Identifier":
      return e.name;
    case "BinaryOp":
      return `(${e.operator} ${sexpr(e.left)} ${sexpr(e.right)})`;
    case "UnaryOp":
      return `(${e.operator} ${sexpr(e.argument)})`;
    case "FunctionCall":
      return `(call${e.lazy ? "?" : ""} ${sexpr(e.callee)}${e.args.map((a) => " " + sexpr(a)).join("")})`;
    case "MemberAccess":
      return `(. ${sexpr(e.object)} ${e.property.name})`;
    case "IndexAccess":
      return `([] ${sexpr(e.object)} ${sexpr(e.index)})`;
    case "ListLiteral":
      return `[${e.elements.map(sexpr).join(" ")}]`;
    case "DictLiteral":
      return `{${e.entries.map((en) => `${sexpr(en.key)}:${sexpr(en.value)}`).join(" ")}}`;
    case "AwaitExpr":
      return `(await ${sexpr(e.argument)})`;
    case "ListComprehension":
      return `(comp ${sexpr(e.element)} ${e.variable.name} ${sexpr(e.iterable)}${e.condition ? " " + sexpr(e.condition) : ""})`;
    case "ThreadStmt":
      return `(thread ${sexpr(e.call)})`;
    case "LambdaExpr":
      return `(lambda (${e.params.map((p) => p.name.name).join(" ")}) ${Array.isArray(e.body) ? "{...}" : sexpr(e.body)})`;
  }
}

function expr(source: string): string {
  const st = first(source);
  if (st.kind !== "ExpressionStmt") throw new Error(`expected an expression, got ${st.kind}`);
  return sexpr(st.expression);
}

describe("parseSource", () => {
  describe("precedence", () => {
    test("multiplication binds tighter than addition", () => {
      expect(expr("1 + 2 * 3")).toBe("(+ 1 (* 2 3))");
    });

    test("power is right associative", () => {
      expect(expr("2 ** 3 ** 2")).toBe("(** 2 (** 3 2))");
    });

    test("comparison sits between arithmetic and logic", () => {
      expect(expr("a + 1 < b and c or d")).toBe("(or (and (< (+ a 1) b) c) d)");
    });

    test("&& and || are the same as and / or", () => {
      expect(expr("a && b || c")).toBe("(or (and a b) c)");
    });

    test("not in is one operator", () => {
      expect(expr("x not in xs")).toBe("(not in x xs)");
    });

    test("unary operators", () => {
      expect(expr("-x + !y")).toBe("(+ (- x) (not y))");
    });
  });

  describe("desugaring", () => {
    test("ternary becomes a lazy builtin call", () => {
      expect(expr("c ? 1 : 2")).toBe(`(call? ${TERNARY_BUILTIN} c 1 2)`);
    });

    test("pipe calls the right side with the left", () => {
      expect(expr("xs | len")).toBe("(call len xs)");
    });

    test("new C(args) calls the constructor name", () => {
      expect(expr("new Point(1, 2)")).toBe("(call new Point 1 2)");
    });
  });

  describe("expressions", () => {
    test("calls, members and indexes chain", () => {
      expect(expr("a.b(1)[0].c")).toBe("(. ([] (call (. a b) 1) 0) c)");
    });

    test("keywords are allowed as property names", () => {
      expect(expr("re.match")).toBe("(. re match)");
    });

    test("list comprehension with a filter", () => {
      expect(expr("[n * 2 for n in range(5) if n % 2 == 0]")).toBe(
        "(comp (* n 2) n (call range 5) (== (% n 2) 0))"
      );
    });

    test("dict literal", () => {
      expect(expr('{"a": 1, "b": [2, 3]}')).toBe('{"a":1 "b":[2 3]}');
    });

    test("lambdas with and without parentheses", () => {
      expect(expr("x -> x + 1")).toBe("(lambda (x) (+ x 1))");
      expect(expr("(a, b) -> a * b")).toBe("(lambda (a b) (* a b))");
      expect(expr("() -> { return 1 }")).toBe("(lambda () {...})");
    });

    test("a parenthesized expression is not a lambda", () => {
      expect(expr("(a + b) * c")).toBe("(* (+ a b) c)");
    });

    test("thread and await", () => {
      expect(expr("await thread work(1)")).toBe("(await (thread (call work 1)))");
    });
  });

  describe("statements", () => {
    test("let, let const and const", () => {
      const [a, b, c] = parse("let x = 1; let const y: int = 2\nconst z = 3").body;
      expect(a.kind === "LetDecl" && a.isConst).toBe(false);
      expect(b.kind === "LetDecl" && b.isConst).toBe(true);
      expect(b.kind === "LetDecl" && b.typeTag?.name).toBe("int");
      expect(c.kind === "LetDecl" && c.isConst).toBe(true);
    });

    test("compound assignment", () => {
      const st = first("xs[0] += 2");
      expect(st.kind).toBe("Assignment");
      if (st.kind === "Assignment") {
        expect(st.operator).toBe("+=");
        expect(sexpr(st.target)).toBe("([] xs 0)");
      }
    });

    test("function with decorators, tags and async", () => {
      const st = first("@trace\n@cache\nasync func add(a: int, b) -> int { return a + b }");
      expect(st.kind).toBe("FunctionDef");
      if (st.kind === "FunctionDef") {
        expect(st.name.name).toBe("add");
        expect(st.isAsync).toBe(true);
        expect(st.decorators.map((d) => d.name)).toEqual(["trace", "cache"]);
        expect(st.params.map((p) => [p.name.name, p.typeTag?.name ?? null])).toEqual([
          ["a", "int"],
          ["b", null],
        ]);
        expect(st.returnTag?.name).toBe("int");
      }
    });

    test("bare return before a closing brace", () => {
      const st = first("func f() { return }");
      const ret = st.kind === "FunctionDef" ? st.body[0] : null;
      expect(ret?.kind).toBe("ReturnStmt");
      expect(ret?.kind === "ReturnStmt" && ret.argument).toBe(null);
    });

    test("class with methods", () => {
      const st = first("class Dog { func __init__(self, name) { self.name = name } func bark(self) { return 1 } }");
      expect(st.kind === "ClassDef" && st.methods.map((m) => m.name.name)).toEqual(["__init__", "bark"]);
    });

    test("if / elif / else if / else", () => {
      const st = first("if a { 1 } elif b { 2 } else if c { 3 } else { 4 }");
      expect(st.kind).toBe("IfStmt");
      if (st.kind === "IfStmt") {
        expect(st.elifs).toHaveLength(1);
        const nested = st.alternate?.[0];
        expect(nested?.kind).toBe("IfStmt");
        expect(nested?.kind === "IfStmt" && nested.alternate?.length).toBe(1);
      }
    });

    test("imports", () => {
      const [a, b, c] = parse('import "math"\nimport "json" as j\nfrom "math" import sqrt, pi').body;
      expect(a.kind === "ImportStmt" && [a.module, a.alias, a.names.length]).toEqual(["math", null, 0]);
      expect(b.kind === "ImportStmt" && b.alias?.name).toBe("j");
      expect(c.kind === "ImportStmt" && c.names.map((n) => n.name)).toEqual(["sqrt", "pi"]);
    });

    test("try with several handlers, else and finally", () => {
      const st = first("try { f() } except ValueError as e { 1 } except { 2 } else { 3 } finally { 4 }");
      expect(st.kind).toBe("TryExcept");
      if (st.kind === "TryExcept") {
        expect(st.handlers.map((h) => [h.errorKind?.name ?? null, h.binding?.name ?? null])).toEqual([
          ["ValueError", "e"],
          [null, null],
        ]);
        expect(st.orelse).toHaveLength(1);
        expect(st.finalizer).toHaveLength(1);
      }
    });

    test("match with guard, wildcard and default", () => {
      const st = first("match x { case 1 { a() } case n if n > 5 { b() } case _ { c() } default { d() } }");
      expect(st.kind).toBe("MatchStmt");
      if (st.kind === "MatchStmt") {
        expect(st.cases).toHaveLength(3);
        expect(st.cases[1].guard && sexpr(st.cases[1].guard)).toBe("(> n 5)");
        expect(st.cases[2].pattern).toBe(null);
        expect(st.defaultCase).toHaveLength(1);
      }
    });

    test("assert with a message", () => {
      const st = first('assert x > 0, "positive"');
      expect(st.kind === "AssertStmt" && st.message && sexpr(st.message)).toBe('"positive"');
    });
  });

  describe("errors", () => {
    test("reports the first syntax error with its location", () => {
      const result = parseSource("let x = (1 + 2");
      expect(result.program).toBe(null);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].message).toBe("Expected ')' after expression, found end of input");
    });

    test("try needs a handler or finally", () => {
      const result = parseSource("try { 1 }");
      expect(result.errors[0].message).toBe("Expected 'except' or 'finally' after try block");
    });

    test("rejects assignment to a call", () => {
      const result = parseSource("f() = 1");
      expect(result.errors[0].message).toBe("Invalid assignment target");
      expect(result.errors[0].range.start.column).toBe(4);
    });

    test("thread needs a call", () => {
      expect(parseSource("thread x").errors[0].message).toBe("Expected a function call after 'thread'");
    });

    test("lexer errors stop before parsing", () => {
      const result = parseSource("let a = 1 $");
      expect(result.lexErrors).toHaveLength(1);
      expect(result.errors).toEqual([]);
    });
  });
});
