// src/core/ast.ts
//
// Sable AST (Abstract Syntax Tree)
// --------------------------------
// Canonical AST types used by the toolchain:
//
//   Lexer  -> tokens
//   Parser -> AST (this file)
//   Evaluator/Runner -> execution
//   LSP -> symbols, hover, completion
//   Diagnostics -> error ranges
//
// Every construct is one variant of a closed union keyed by `kind`, so the
// evaluator can switch exhaustively. Nodes own their children and are never
// mutated after the parser returns them.
//
// Desugared forms do not get their own kinds:
//   a ? b : c      -> FunctionCall(__ternary__, [a, b, c], lazy)
//   a | f          -> FunctionCall(f, [a])
//   new C(args)    -> FunctionCall(Identifier("new C"), args)

export type Integer = number;

/* =========================================================
   Source locations
   ========================================================= */

export type Position = {
  /** Absolute offset from file start (0-based). */
  offset: Integer;
  /** Line index (0-based). */
  line: Integer;
  /** Column index (0-based). */
  column: Integer;
};

export type Range = {
  start: Position;
  end: Position;
};

export const UNKNOWN_POSITION: Position = Object.freeze({
  offset: 0,
  line: 0,
  column: 0,
});

export const UNKNOWN_RANGE: Range = Object.freeze({
  start: UNKNOWN_POSITION,
  end: UNKNOWN_POSITION,
});

/* =========================================================
   Node kinds
   ========================================================= */

export const NODE_KINDS = [
  "Program",

  // Statements
  "ExpressionStmt",
  "LetDecl",
  "Assignment",
  "IfStmt",
  "WhileStmt",
  "ForStmt",
  "FunctionDef",
  "ReturnStmt",
  "ClassDef",
  "ImportStmt",
  "BreakStmt",
  "ContinueStmt",
  "TryExcept",
  "MatchStmt",
  "AssertStmt",

  // Expressions
  "Literal",
  "Identifier",
  "BinaryOp",
  "UnaryOp",
  "FunctionCall",
  "MemberAccess",
  "IndexAccess",
  "ListLiteral",
  "DictLiteral",
  "AwaitExpr",
  "ListComprehension",
  "ThreadStmt",
  "LambdaExpr",
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

export type NodeBase = {
  kind: NodeKind;
  range: Range;
};

/** Reserved callee emitted for `?:`; evaluated lazily by the evaluator. */
export const TERNARY_BUILTIN = "__ternary__";

/** Identifier bound by a class definition and called by `new Name(...)`. */
export function constructorNameFor(className: string): string {
  return `new ${className}`;
}

/* =========================================================
   Shared pieces
   ========================================================= */

export type Block = Statement[];

/** Runtime type tag written after a name: `let x: int`, `func f(a: str) -> bool`. */
export type TypeTag = {
  name: string;
  range: Range;
};

export type Parameter = {
  name: Identifier;
  typeTag: TypeTag | null;
};

/* =========================================================
   Program
   ========================================================= */

export type Program = NodeBase & {
  kind: "Program";
  body: Statement[];
};

/* =========================================================
   Statements
   ========================================================= */

export type ExpressionStmt = NodeBase & {
  kind: "ExpressionStmt";
  expression: Expression;
};

export type LetDecl = NodeBase & {
  kind: "LetDecl";
  name: Identifier;
  isConst: boolean;
  typeTag: TypeTag | null;
  value: Expression;
};

export type AssignmentOperator = "=" | "+=" | "-=" | "*=" | "/=" | "%=" | "**=";

export type AssignTarget = Identifier | MemberAccess | IndexAccess;

export type Assignment = NodeBase & {
  kind: "Assignment";
  operator: AssignmentOperator;
  target: AssignTarget;
  value: Expression;
};

export type ElifClause = {
  test: Expression;
  body: Block;
  range: Range;
};

export type IfStmt = NodeBase & {
  kind: "IfStmt";
  test: Expression;
  consequent: Block;
  elifs: ElifClause[];
  alternate: Block | null;
};

export type WhileStmt = NodeBase & {
  kind: "WhileStmt";
  test: Expression;
  body: Block;
};

export type ForStmt = NodeBase & {
  kind: "ForStmt";
  variable: Identifier;
  iterable: Expression;
  body: Block;
};

export type FunctionDef = NodeBase & {
  kind: "FunctionDef";
  name: Identifier;
  params: Parameter[];
  returnTag: TypeTag | null;
  body: Block;
  isAsync: boolean;
  /** `@name` lines in declaration order. */
  decorators: Identifier[];
};

export type ReturnStmt = NodeBase & {
  kind: "ReturnStmt";
  argument: Expression | null;
};

export type ClassDef = NodeBase & {
  kind: "ClassDef";
  name: Identifier;
  methods: FunctionDef[];
};

export type ImportStmt = NodeBase & {
  kind: "ImportStmt";
  module: string;
  moduleRange: Range;
  /** `import "m" as alias` */
  alias: Identifier | null;
  /** `from "m" import a, b` — empty for whole-module imports */
  names: Identifier[];
};

export type BreakStmt = NodeBase & { kind: "BreakStmt" };
export type ContinueStmt = NodeBase & { kind: "ContinueStmt" };

export type ExceptClause = {
  /** Error kind to match; null catches everything. */
  errorKind: Identifier | null;
  binding: Identifier | null;
  body: Block;
  range: Range;
};

export type TryExcept = NodeBase & {
  kind: "TryExcept";
  body: Block;
  handlers: ExceptClause[];
  orelse: Block | null;
  finalizer: Block | null;
};

export type MatchCase = {
  /** null for the `_` wildcard */
  pattern: Expression | null;
  guard: Expression | null;
  body: Block;
  range: Range;
};

export type MatchStmt = NodeBase & {
  kind: "MatchStmt";
  subject: Expression;
  cases: MatchCase[];
  defaultCase: Block | null;
};

export type AssertStmt = NodeBase & {
  kind: "AssertStmt";
  test: Expression;
  message: Expression | null;
};

export type Statement =
  | ExpressionStmt
  | LetDecl
  | Assignment
  | IfStmt
  | WhileStmt
  | ForStmt
  | FunctionDef
  | ReturnStmt
  | ClassDef
  | ImportStmt
  | BreakStmt
  | ContinueStmt
  | TryExcept
  | MatchStmt
  | AssertStmt;

/* =========================================================
   Expressions
   ========================================================= */

export type LiteralValue = null | boolean | number | string;

export type Literal = NodeBase & {
  kind: "Literal";
  value: LiteralValue;
  /** number written with a decimal point */
  isFloat: boolean;
  raw: string;
};

export type Identifier = NodeBase & {
  kind: "Identifier";
  name: string;
};

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "**"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "in"
  | "not in"
  | "and"
  | "or"
  | "&"
  | "^"
  | "<<"
  | ">>";

export type BinaryOp = NodeBase & {
  kind: "BinaryOp";
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
};

export type UnaryOperator = "-" | "not" | "~";

export type UnaryOp = NodeBase & {
  kind: "UnaryOp";
  operator: UnaryOperator;
  argument: Expression;
};

export type FunctionCall = NodeBase & {
  kind: "FunctionCall";
  callee: Expression;
  args: Expression[];
  /** Arguments are evaluated on demand (only the desugared ternary). */
  lazy: boolean;
};

export type MemberAccess = NodeBase & {
  kind: "MemberAccess";
  object: Expression;
  property: Identifier;
};

export type IndexAccess = NodeBase & {
  kind: "IndexAccess";
  object: Expression;
  index: Expression;
};

export type ListLiteral = NodeBase & {
  kind: "ListLiteral";
  elements: Expression[];
};

export type DictEntry = {
  key: Expression;
  value: Expression;
};

export type DictLiteral = NodeBase & {
  kind: "DictLiteral";
  entries: DictEntry[];
};

export type AwaitExpr = NodeBase & {
  kind: "AwaitExpr";
  argument: Expression;
};

export type ListComprehension = NodeBase & {
  kind: "ListComprehension";
  element: Expression;
  variable: Identifier;
  iterable: Expression;
  condition: Expression | null;
};

/** `thread f(args)` — submits the call to the task pool and yields the future. */
export type ThreadStmt = NodeBase & {
  kind: "ThreadStmt";
  call: FunctionCall;
};

export type LambdaExpr = NodeBase & {
  kind: "LambdaExpr";
  params: Parameter[];
  body: Expression | Block;
};

export type Expression =
  | Literal
  | Identifier
  | BinaryOp
  | UnaryOp
  | FunctionCall
  | MemberAccess
  | IndexAccess
  | ListLiteral
  | DictLiteral
  | AwaitExpr
  | ListComprehension
  | ThreadStmt
  | LambdaExpr;

export type AnyNode = Program | Statement | Expression;

/* =========================================================
   Constructors (used by the parser and tests)
   ========================================================= */

export function identifier(name: string, range: Range = UNKNOWN_RANGE): Identifier {
  return { kind: "Identifier", range, name };
}

export function literal(value: LiteralValue, range: Range = UNKNOWN_RANGE, raw: string = String(value)): Literal {
  return { kind: "Literal", range, value, isFloat: typeof value === "number" && raw.includes("."), raw };
}

export function call(callee: Expression, args: Expression[], range: Range, lazy = false): FunctionCall {
  return { kind: "FunctionCall", range, callee, args, lazy };
}

/* =========================================================
   Guards
   ========================================================= */

export function isBlockBody(body: Expression | Block): body is Block {
  return Array.isArray(body);
}

/* =========================================================
   Walker
   ========================================================= */

export type Visitor = {
  /** Return false to skip the node's children. */
  enter?: (node: AnyNode, parent: AnyNode | null) => void | boolean;
  leave?: (node: AnyNode, parent: AnyNode | null) => void;
};

export function childrenOf(node: AnyNode): AnyNode[] {
  switch (node.kind) {
    case "Program":
      return node.body;

    case "ExpressionStmt":
      return [node.expression];
    case "LetDecl":
      return [node.name, node.value];
    case "Assignment":
      return [node.target, node.value];
    case "IfStmt": {
      const out: AnyNode[] = [node.test, ...node.consequent];
      for (const e of node.elifs) out.push(e.test, ...e.body);
      if (node.alternate) out.push(...node.alternate);
      return out;
    }
    case "WhileStmt":
      return [node.test, ...node.body];
    case "ForStmt":
      return [node.variable, node.iterable, ...node.body];
    case "FunctionDef":
      return [node.name, ...node.decorators, ...node.params.map((p) => p.name), ...node.body];
    case "ReturnStmt":
      return node.argument ? [node.argument] : [];
    case "ClassDef":
      return [node.name, ...node.methods];
    case "ImportStmt":
      return [...(node.alias ? [node.alias] : []), ...node.names];
    case "BreakStmt":
    case "ContinueStmt":
      return [];
    case "TryExcept": {
      const out: AnyNode[] = [...node.body];
      for (const h of node.handlers) {
        if (h.errorKind) out.push(h.errorKind);
        if (h.binding) out.push(h.binding);
        out.push(...h.body);
      }
      if (node.orelse) out.push(...node.orelse);
      if (node.finalizer) out.push(...node.finalizer);
      return out;
    }
    case "MatchStmt": {
      const out: AnyNode[] = [node.subject];
      for (const c of node.cases) {
        if (c.pattern) out.push(c.pattern);
        if (c.guard) out.push(c.guard);
        out.push(...c.body);
      }
      if (node.defaultCase) out.push(...node.defaultCase);
      return out;
    }
    case "AssertStmt":
      return node.message ? [node.test, node.message] : [node.test];

    case "Literal":
    case "Identifier":
      return [];
    case "BinaryOp":
      return [node.left, node.right];
    case "UnaryOp":
      return [node.argument];
    case "FunctionCall":
      return [node.callee, ...node.args];
    case "MemberAccess":
      return [node.object, node.property];
    case "IndexAccess":
      return [node.object, node.index];
    case "ListLiteral":
      return node.elements;
    case "DictLiteral":
      return node.entries.flatMap((e) => [e.key, e.value]);
    case "AwaitExpr":
      return [node.argument];
    case "ListComprehension":
      return node.condition
        ? [node.element, node.variable, node.iterable, node.condition]
        : [node.element, node.variable, node.iterable];
    case "ThreadStmt":
      return [node.call];
    case "LambdaExpr": {
      const params: AnyNode[] = node.params.map((p) => p.name);
      return isBlockBody(node.body) ? [...params, ...node.body] : [...params, node.body];
    }
  }
}

export function walkAst(root: AnyNode, visitor: Visitor): void {
  const visitNode = (node: AnyNode, parent: AnyNode | null) => {
    const descend = visitor.enter?.(node, parent);
    if (descend !== false) {
      for (const child of childrenOf(node)) visitNode(child, node);
    }
    visitor.leave?.(node, parent);
  };

  visitNode(root, null);
}
