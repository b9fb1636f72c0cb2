import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import type { RunOptions, SableIO } from "./run";
import { runFile, runSource } from "./run";

type FakeIO = SableIO & { out: string[]; err: string[] };

function fakeIO(inputs: string[] = []): FakeIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    print: (line) => {
      out.push(line);
    },
    error: (line) => {
      err.push(line);
    },
    readLine: async () => inputs.shift() ?? "",
  };
}

async function stdoutOf(source: string, options: RunOptions = {}): Promise<string> {
  const result = await runSource(source, { io: fakeIO(), ...options });
  if (!result.ok) throw new Error(`run failed: ${result.stderr}`);
  return result.stdout;
}

async function failureOf(source: string, options: RunOptions = {}): Promise<string> {
  const result = await runSource(source, { io: fakeIO(), ...options });
  expect(result.ok).toBe(false);
  expect(result.exitCode).toBe(1);
  return result.stderr;
}

describe("runSource", () => {
  describe("expressions", () => {
    test("list comprehension with a filter", async () => {
      expect(await stdoutOf("let xs = [n * 2 for n in range(5) if n % 2 == 0]\nprint(xs)")).toBe("[0, 4, 8]\n");
    });

    test("power is right associative", async () => {
      expect(await stdoutOf("print(2 ** 3 ** 2)")).toBe("512\n");
    });

    test("modulo takes the sign of the divisor", async () => {
      expect(await stdoutOf("print(-7 % 3)\nprint(7 % -3)")).toBe("2\n-2\n");
    });

    test("repetition and concatenation", async () => {
      expect(await stdoutOf('print("ab" * 3)\nprint([1] * 3)\nprint([1] + [2])')).toBe("ababab\n[1, 1, 1]\n[1, 2]\n");
    });

    test("ternary only evaluates the chosen branch", async () => {
      expect(await stdoutOf("let x = true ? 1 : 1 / 0\nprint(x)")).toBe("1\n");
    });

    test("pipe passes the left side to the function", async () => {
      expect(await stdoutOf("print([1, 2, 3] | len)")).toBe("3\n");
    });

    test("negative indexes count from the end", async () => {
      expect(await stdoutOf('let xs = [1, 2, 3]\nprint(xs[-1])\nprint("abc"[-2])')).toBe("3\nb\n");
    });

    test("value of the last statement", async () => {
      const result = await runSource("let a = 2\na * 21", { io: fakeIO() });
      expect(result.value).toBe(42);
    });
  });

  describe("numbers", () => {
    test("a decimal point makes a float", async () => {
      expect(await stdoutOf("print(type(2.0))\nprint(2.0)\nprint(type(2))")).toBe("float\n2.0\nint\n");
    });

    test("division always gives a float", async () => {
      expect(await stdoutOf("print(10 / 2)\nprint(7 / 7)\nprint(1 / 4)")).toBe("5.0\n1.0\n0.25\n");
    });

    test("mixing ints and floats gives a float", async () => {
      expect(await stdoutOf("print(1 + 2.5)\nprint(2 * 3)\nprint(2 * 3.0)\nprint(1 == 1.0)")).toBe(
        "3.5\n6\n6.0\ntrue\n"
      );
    });

    test("int type tags reject floats", async () => {
      expect(await failureOf("let x: int = 3.0")).toContain("TypeError: Type mismatch for 'x': expected int, got float");
      expect(await stdoutOf("let y: number = 1\nlet z: number = 1.5\nprint(y + z)")).toBe("2.5\n");
    });

    test("bitwise operators keep integers wider than 32 bits", async () => {
      const src = "print(1 << 40)\nprint(2 ** 40 & 2 ** 40)\nprint(2 ** 40 ^ 1)\nprint(~5)\nprint(-8 >> 1)";
      expect(await stdoutOf(src)).toBe("1099511627776\n1099511627776\n1099511627777\n-6\n-4\n");
    });

    test("bitwise operators reject floats", async () => {
      expect(await failureOf("print(1.0 << 2)")).toContain("TypeError: unsupported operand type(s) for <<: 'float' and 'int'");
    });

    test("integers stop at the exact range instead of losing precision", async () => {
      expect(await stdoutOf("print(9007199254740990 + 1)")).toBe("9007199254740991\n");
      expect(await failureOf("print(9007199254740991 + 1)")).toContain(
        "OverflowError: integer result too large to represent exactly"
      );
      expect(await failureOf("print(2 ** 53 + 1)")).toContain("OverflowError");
      expect(await failureOf("print(1 << 60)")).toContain("OverflowError");
    });
  });

  describe("scoping", () => {
    test("closures keep their own counter", async () => {
      const src = [
        "func counter() {",
        "  let n = 0",
        "  func inc() { n = n + 1; return n }",
        "  return inc",
        "}",
        "let c = counter()",
        "print(c())",
        "print(c())",
        "print(c())",
      ].join("\n");
      expect(await stdoutOf(src)).toBe("1\n2\n3\n");
    });

    test("let inside a block shadows, assignment reaches out", async () => {
      const src = "let x = 1\nif true { let x = 2 }\nprint(x)\nif true { x = 3 }\nprint(x)";
      expect(await stdoutOf(src)).toBe("1\n3\n");
    });

    test("a constant keeps its value after a failed reassignment", async () => {
      const src = 'const x = 1\ntry { x = 2 } except ConstError as e { print(e) }\nprint(x)';
      expect(await stdoutOf(src)).toBe("Cannot reassign constant 'x'\n1\n");
    });

    test("closures made in a loop capture that iteration", async () => {
      const src = "let fs = []\nfor i in [1, 2, 3] { fs.append(() -> i) }\nfor f in fs { print(f()) }";
      expect(await stdoutOf(src)).toBe("1\n2\n3\n");
    });

    test("reassigning a constant fails the run", async () => {
      expect(await failureOf("const x = 1\nx = 2")).toContain("ConstError: Cannot reassign constant 'x'");
    });

    test("assigning an undefined name is a NameError by default", async () => {
      const stderr = await failureOf("func setup() { counter = 10 }\nsetup()\nprint(counter)");
      expect(stderr).toContain("NameError: Undefined name 'counter'");
    });

    test("implicitGlobals creates the global instead", async () => {
      const src = "func setup() { counter = 10 }\nsetup()\nprint(counter)";
      expect(await stdoutOf(src, { runtime: { implicitGlobals: true } })).toBe("10\n");
    });
  });

  describe("control flow", () => {
    test("break and continue", async () => {
      const src = [
        "for i in range(10) {",
        "  if i == 5 { break }",
        "  if i % 2 == 0 { continue }",
        "  print(i)",
        "}",
      ].join("\n");
      expect(await stdoutOf(src)).toBe("1\n3\n");
    });

    test("break leaves only the inner loop", async () => {
      const src = [
        "for i in range(2) {",
        "  for j in range(5) {",
        "    if j == 1 { break }",
        "    print(i * 10 + j)",
        "  }",
        "}",
      ].join("\n");
      expect(await stdoutOf(src)).toBe("0\n10\n");
    });

    test("continue outside a loop fails", async () => {
      const stderr = await failureOf("continue");
      expect(stderr).toBe("Runtime error at 1:1: ControlFlowError: 'continue' outside loop\n");
    });

    test("while with compound assignment", async () => {
      expect(await stdoutOf("let n = 0\nwhile n < 3 { n += 1 }\nprint(n)")).toBe("3\n");
    });

    test("break outside a loop fails", async () => {
      const stderr = await failureOf("break");
      expect(stderr).toBe("Runtime error at 1:1: ControlFlowError: 'break' outside loop\n");
    });

    test("match with guard and default", async () => {
      const src = [
        "func describe(x) {",
        "  match x {",
        '    case 0 { return "zero" }',
        '    case _ if x > 100 { return "big" }',
        '    default { return "other" }',
        "  }",
        "}",
        "print(describe(0))",
        "print(describe(500))",
        "print(describe(7))",
      ].join("\n");
      expect(await stdoutOf(src)).toBe("zero\nbig\nother\n");
    });
  });

  describe("try / except", () => {
    test("finally runs before a return leaves the function", async () => {
      const src = 'func f() {\n  try { return "body" } finally { print("cleanup") }\n}\nprint(f())';
      expect(await stdoutOf(src)).toBe("cleanup\nbody\n");
    });

    test("finally runs when the failure is not caught", async () => {
      const result = await runSource('try { 1 / 0 } finally { print("cleanup") }', { io: fakeIO() });
      expect(result.ok).toBe(false);
      expect(result.stdout).toBe("cleanup\n");
      expect(result.stderr).toContain("ZeroDivisionError: division by zero");
    });

    test("finally runs after a handler caught the failure", async () => {
      const src = 'try { 1 / 0 } except { print("handled") } finally { print("cleanup") }\nprint("after")';
      expect(await stdoutOf(src)).toBe("handled\ncleanup\nafter\n");
    });

    test("handlers are matched by kind in order", async () => {
      const src = [
        "try {",
        '  let d = {"a": 1}',
        '  print(d["b"])',
        "} except IndexError {",
        '  print("index")',
        "} except KeyError as e {",
        '  print("key " + e)',
        "}",
      ].join("\n");
      expect(await stdoutOf(src)).toBe('key "b"\n');
    });

    test("Exception catches every kind", async () => {
      expect(await stdoutOf("try { missing } except Exception as e { print(e) }")).toBe("Undefined name 'missing'\n");
    });

    test("else runs only when nothing was raised", async () => {
      const src = 'try { let x = 1 } except { print("no") } else { print("else") }\ntry { 1 / 0 } except { print("caught") } else { print("else") }';
      expect(await stdoutOf(src)).toBe("else\ncaught\n");
    });

    test("uncaught errors are reported with their location", async () => {
      const stderr = await failureOf("let x = 1\nlet y = 10 / 0");
      expect(stderr).toBe("Runtime error at 2:9: ZeroDivisionError: division by zero\n");
    });

    test("operand type errors", async () => {
      const stderr = await failureOf('print(1 + "a")');
      expect(stderr).toBe("Runtime error at 1:7: TypeError: unsupported operand type(s) for +: 'int' and 'str'\n");
    });

    test("assert failures carry the message", async () => {
      const result = await runSource('assert 1 > 2, "math is broken"', { io: fakeIO() });
      expect(result.diagnostics.map((d) => d.message)).toEqual(["AssertionError: math is broken"]);
    });
  });

  describe("functions and classes", () => {
    test("missing arguments are null by default", async () => {
      expect(await stdoutOf("func g(a, b) { return b }\nprint(g(1))")).toBe("null\n");
    });

    test("strictArity rejects a wrong argument count", async () => {
      const stderr = await failureOf("func f(a, b) { return a }\nf(1)", { runtime: { strictArity: true } });
      expect(stderr).toBe("Runtime error at 2:1: TypeError: f() takes 2 arguments but 1 was given\n");
    });

    test("deep recursion stops at the configured depth", async () => {
      const result = await runSource("func f(n) { return f(n + 1) }\nf(0)", {
        io: fakeIO(),
        runtime: { maxCallDepth: 50 },
      });
      expect(result.diagnostics.map((d) => d.message)).toEqual(["RecursionError: maximum recursion depth exceeded"]);
    });

    test("return type tags are checked", async () => {
      const stderr = await failureOf('func f() -> int { return "x" }\nf()');
      expect(stderr).toContain("TypeError: Type mismatch for return value of 'f': expected int, got str");
    });

    test("decorators apply bottom-up", async () => {
      const src = [
        'func tag(fn) { return x -> fn(x) + "_end" }',
        "func shout(fn) { return x -> fn(x).upper() }",
        "@tag",
        "@shout",
        'func greet(name) { return "hi " + name }',
        'print(greet("bo"))',
      ].join("\n");
      expect(await stdoutOf(src)).toBe("HI BO_end\n");
    });

    test("classes with __init__ and methods", async () => {
      const src = [
        "class Point {",
        "  func __init__(self, x, y) { self.x = x; self.y = y }",
        "  func sum(self) { return self.x + self.y }",
        "}",
        "let p = new Point(1, 2)",
        "print(p.sum())",
        "print(Point(3, 4).x)",
        "print(p)",
      ].join("\n");
      expect(await stdoutOf(src)).toBe("3\n3\n<Point object>\n");
    });
  });

  describe("threads and await", () => {
    test("await joins a future", async () => {
      const src = "func square(n) { return n * n }\nlet f = thread square(7)\nprint(await f)\nprint(f.done())";
      expect(await stdoutOf(src)).toBe("49\ntrue\n");
    });

    test("result() joins too", async () => {
      expect(await stdoutOf("func square(n) { return n * n }\nlet g = thread square(3)\nprint(g.result())")).toBe("9\n");
    });

    test("failures surface on join", async () => {
      const src = "func bad() { return 1 / 0 }\nlet f = thread bad()\ntry { await f } except ZeroDivisionError as e { print(e) }";
      expect(await stdoutOf(src)).toBe("division by zero\n");
    });

    test("await calls an async function", async () => {
      expect(await stdoutOf("async func load() { return 5 }\nprint(await load)")).toBe("5\n");
    });
  });

  describe("imports", () => {
    test("module and from-imports", async () => {
      expect(await stdoutOf('import "math"\nfrom "math" import sqrt\nprint(math.sqrt(16))\nprint(sqrt(9))')).toBe("4.0\n3.0\n");
    });

    test("unknown module", async () => {
      expect(await failureOf('import "nope"')).toBe("Runtime error at 1:1: ImportError: Unknown module 'nope'\n");
    });

    test("unknown name in a module", async () => {
      expect(await failureOf('from "math" import nothing')).toContain(
        "ImportError: cannot import name 'nothing' from 'math'"
      );
    });
  });

  describe("diagnostics before execution", () => {
    test("syntax errors abort the run", async () => {
      const io = fakeIO();
      const result = await runSource('print("never")\nlet x = (1 + 2', { io });
      expect(result.ok).toBe(false);
      expect(io.out).toEqual([]);
      expect(io.err).toEqual(["Syntax error at 2:15: Expected ')' after expression, found end of input"]);
    });

    test("lexical errors", async () => {
      expect(await failureOf("let a = $")).toBe("Lexical error at 1:9: Unexpected character '$'\n");
    });
  });

  describe("host services", () => {
    test("input writes the prompt and reads a line", async () => {
      const result = await runSource('let name = input("name? ")\nprint("hi " + name)', { io: fakeIO(["Ada"]) });
      expect(result.stdout).toBe("name? hi Ada\n");
    });

    test("random can be replaced", async () => {
      expect(await stdoutOf("print(random_int(1, 6))", { host: { randomInt: () => 4 } })).toBe("4\n");
    });

    test("random_choice picks through randomInt", async () => {
      const host = { randomInt: (_min: number, max: number) => max };
      expect(await stdoutOf('print(random_choice(["a", "b", "c"]))', { host })).toBe("c\n");
      expect(await failureOf("random_choice([])", { host })).toContain("IndexError: Cannot choose from an empty sequence");
    });
  });
});

describe("runFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "sable-run-"));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  test("runs a script from disk", async () => {
    const file = path.join(dir, "hello.sbl");
    await fs.promises.writeFile(file, 'print("hello")\n', "utf8");
    const io = fakeIO();
    expect(await runFile(file, { io })).toBe(true);
    expect(io.out).toEqual(["hello"]);
  });

  test("reports a missing file", async () => {
    const file = path.join(dir, "missing.sbl");
    const io = fakeIO();
    expect(await runFile(file, { io })).toBe(false);
    expect(io.err).toEqual([`File not found: ${file}`]);
  });
});
