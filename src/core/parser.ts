// src/core/parser.ts
//
// Sable Parser
// ------------
// Turns tokens (from src/core/lexer.ts) into an AST (src/core/ast.ts).
//
// Recursive descent for statements, precedence climbing for binary operators.
// There is no error recovery: the first problem throws a SableSyntaxError that
// carries the message, the offending token kind and its range.
//
// Desugaring done here:
//   c ? a : b     -> __ternary__(c, a, b) with lazy arguments
//   a | f         -> f(a)
//   new C(args)   -> call of the identifier "new C"
//
// Exports:
//   - parseSource(source): ParseResult   (never throws)
//   - parseTokens(tokens): Program       (throws SableSyntaxError)
//   - Parser class (advanced usage)

import {
  call,
  constructorNameFor,
  identifier,
  TERNARY_BUILTIN,
} from "./ast";
import type {
  AssertStmt,
  AssignmentOperator,
  AssignTarget,
  BinaryOperator,
  Block,
  ClassDef,
  DictEntry,
  ElifClause,
  ExceptClause,
  Expression,
  FunctionDef,
  Identifier,
  IfStmt,
  ImportStmt,
  LambdaExpr,
  LetDecl,
  MatchCase,
  MatchStmt,
  Parameter,
  Position,
  Program,
  Range,
  ReturnStmt,
  Statement,
  TryExcept,
  TypeTag,
  UnaryOperator,
} from "./ast";
import { isNumberToken, isStringToken, tokenize, TokenKind } from "./lexer";
import type { LexerError, Token } from "./lexer";

/* =========================================================
   Errors & results
   ========================================================= */

export class SableSyntaxError extends Error {
  public readonly range: Range;
  public readonly tokenKind: TokenKind;

  constructor(message: string, token: Token) {
    super(message);
    this.name = "SableSyntaxError";
    this.range = token.range;
    this.tokenKind = token.kind;
  }
}

export type ParseError = {
  message: string;
  range: Range;
};

export type ParseResult = {
  /** null when lexing or parsing failed */
  program: Program | null;
  lexErrors: LexerError[];
  errors: ParseError[];
};

/* =========================================================
   Public helpers
   ========================================================= */

export function parseSource(source: string): ParseResult {
  const lex = tokenize(source);
  if (lex.errors.length > 0) {
    return { program: null, lexErrors: lex.errors, errors: [] };
  }

  try {
    return { program: parseTokens(lex.tokens), lexErrors: [], errors: [] };
  } catch (err) {
    if (err instanceof SableSyntaxError) {
      return { program: null, lexErrors: [], errors: [{ message: err.message, range: err.range }] };
    }
    throw err;
  }
}

export function parseTokens(tokens: Token[]): Program {
  return new Parser(tokens).parseProgram();
}

/* =========================================================
   Operator tables
   ========================================================= */

type Assoc = "left" | "right";

type BinOpInfo = {
  precedence: number;
  assoc: Assoc;
  op: BinaryOperator | "|";
};

// `**` binds tighter than everything here and is handled by parsePower.
const BIN_OP_TABLE: Partial<Record<TokenKind, BinOpInfo>> = {
  [TokenKind.KW_OR]: { precedence: 1, assoc: "left", op: "or" },
  [TokenKind.OR_OR]: { precedence: 1, assoc: "left", op: "or" },

  [TokenKind.KW_AND]: { precedence: 2, assoc: "left", op: "and" },
  [TokenKind.AND_AND]: { precedence: 2, assoc: "left", op: "and" },

  [TokenKind.EQ]: { precedence: 3, assoc: "left", op: "==" },
  [TokenKind.NEQ]: { precedence: 3, assoc: "left", op: "!=" },

  [TokenKind.LT]: { precedence: 4, assoc: "left", op: "<" },
  [TokenKind.LTE]: { precedence: 4, assoc: "left", op: "<=" },
  [TokenKind.GT]: { precedence: 4, assoc: "left", op: ">" },
  [TokenKind.GTE]: { precedence: 4, assoc: "left", op: ">=" },
  [TokenKind.KW_IN]: { precedence: 4, assoc: "left", op: "in" },

  [TokenKind.PIPE]: { precedence: 5, assoc: "left", op: "|" },

  [TokenKind.AMP]: { precedence: 6, assoc: "left", op: "&" },
  [TokenKind.CARET]: { precedence: 6, assoc: "left", op: "^" },
  [TokenKind.SHL]: { precedence: 6, assoc: "left", op: "<<" },
  [TokenKind.SHR]: { precedence: 6, assoc: "left", op: ">>" },

  [TokenKind.PLUS]: { precedence: 7, assoc: "left", op: "+" },
  [TokenKind.MINUS]: { precedence: 7, assoc: "left", op: "-" },

  [TokenKind.STAR]: { precedence: 8, assoc: "left", op: "*" },
  [TokenKind.SLASH]: { precedence: 8, assoc: "left", op: "/" },
  [TokenKind.PERCENT]: { precedence: 8, assoc: "left", op: "%" },
};

const NOT_IN: BinOpInfo = { precedence: 4, assoc: "left", op: "not in" };

const ASSIGN_OPS: Partial<Record<TokenKind, AssignmentOperator>> = {
  [TokenKind.ASSIGN]: "=",
  [TokenKind.PLUS_ASSIGN]: "+=",
  [TokenKind.MINUS_ASSIGN]: "-=",
  [TokenKind.STAR_ASSIGN]: "*=",
  [TokenKind.SLASH_ASSIGN]: "/=",
  [TokenKind.PERCENT_ASSIGN]: "%=",
  [TokenKind.POW_ASSIGN]: "**=",
};

const UNARY_OPS: Partial<Record<TokenKind, UnaryOperator>> = {
  [TokenKind.MINUS]: "-",
  [TokenKind.KW_NOT]: "not",
  [TokenKind.BANG]: "not",
  [TokenKind.TILDE]: "~",
};

/* =========================================================
   Parser
   ========================================================= */

export class Parser {
  private readonly tokens: Token[];
  private idx = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens.length > 0 ? tokens : [eofToken()];
  }

  /* =========================================================
     Top-level
     ========================================================= */

  public parseProgram(): Program {
    const start = this.current().range.start;
    const body: Statement[] = [];

    while (!this.isAtEnd()) {
      body.push(this.parseStatement());
    }

    return { kind: "Program", range: { start, end: this.current().range.end }, body };
  }

  /* =========================================================
     Statements
     ========================================================= */

  private parseStatement(): Statement {
    const stmt = this.parseStatementInner();
    this.match(TokenKind.SEMICOLON);
    return stmt;
  }

  private parseStatementInner(): Statement {
    const t = this.current();

    switch (t.kind) {
      case TokenKind.KW_LET:
      case TokenKind.KW_CONST:
        return this.parseLetDecl();
      case TokenKind.AT:
      case TokenKind.KW_FUNC:
      case TokenKind.KW_ASYNC:
        return this.parseFunctionDef();
      case TokenKind.KW_CLASS:
        return this.parseClassDef();
      case TokenKind.KW_IF:
        return this.parseIf();
      case TokenKind.KW_WHILE: {
        this.advance();
        const test = this.parseExpression();
        const body = this.parseBlock("'{' after while condition");
        return { kind: "WhileStmt", range: this.rangeFrom(t.range.start), test, body };
      }
      case TokenKind.KW_FOR: {
        this.advance();
        const variable = this.parseIdentifier("loop variable name");
        this.expect(TokenKind.KW_IN, "'in' after loop variable");
        const iterable = this.parseExpression();
        const body = this.parseBlock("'{' after for header");
        return { kind: "ForStmt", range: this.rangeFrom(t.range.start), variable, iterable, body };
      }
      case TokenKind.KW_RETURN:
        return this.parseReturn();
      case TokenKind.KW_BREAK:
        this.advance();
        return { kind: "BreakStmt", range: t.range };
      case TokenKind.KW_CONTINUE:
        this.advance();
        return { kind: "ContinueStmt", range: t.range };
      case TokenKind.KW_IMPORT:
        return this.parseImport();
      case TokenKind.KW_FROM:
        return this.parseFromImport();
      case TokenKind.KW_TRY:
        return this.parseTry();
      case TokenKind.KW_MATCH:
        return this.parseMatch();
      case TokenKind.KW_ASSERT:
        return this.parseAssert();
      default:
        return this.parseExpressionOrAssignment();
    }
  }

  private parseLetDecl(): LetDecl {
    const start = this.current().range.start;
    let isConst = false;

    if (this.match(TokenKind.KW_LET)) {
      isConst = this.match(TokenKind.KW_CONST);
    } else {
      this.expect(TokenKind.KW_CONST, "'let' or 'const'");
      isConst = true;
    }

    const name = this.parseIdentifier("variable name");
    const typeTag = this.match(TokenKind.COLON) ? this.parseTypeTag() : null;
    this.expect(TokenKind.ASSIGN, `'=' after '${name.name}'`);
    const value = this.parseExpression();

    return { kind: "LetDecl", range: this.rangeFrom(start), name, isConst, typeTag, value };
  }

  private parseExpressionOrAssignment(): Statement {
    const start = this.current().range.start;
    const expr = this.parseExpression();

    const op = ASSIGN_OPS[this.current().kind];
    if (!op) {
      return { kind: "ExpressionStmt", range: expr.range, expression: expr };
    }

    const opTok = this.advance();
    if (!isAssignTarget(expr)) {
      throw new SableSyntaxError("Invalid assignment target", opTok);
    }

    const value = this.parseExpression();
    return { kind: "Assignment", range: this.rangeFrom(start), operator: op, target: expr, value };
  }

  private parseIf(): IfStmt {
    const start = this.advance().range.start; // if
    const test = this.parseExpression();
    const consequent = this.parseBlock("'{' after if condition");

    const elifs: ElifClause[] = [];
    while (this.is(TokenKind.KW_ELIF)) {
      const elifStart = this.advance().range.start;
      const elifTest = this.parseExpression();
      const body = this.parseBlock("'{' after elif condition");
      elifs.push({ test: elifTest, body, range: this.rangeFrom(elifStart) });
    }

    let alternate: Block | null = null;
    if (this.match(TokenKind.KW_ELSE)) {
      // `else if` reads as a nested if
      alternate = this.is(TokenKind.KW_IF) ? [this.parseIf()] : this.parseBlock("'{' after else");
    }

    return { kind: "IfStmt", range: this.rangeFrom(start), test, consequent, elifs, alternate };
  }

  private parseFunctionDef(): FunctionDef {
    const start = this.current().range.start;

    const decorators: Identifier[] = [];
    while (this.match(TokenKind.AT)) {
      decorators.push(this.parseIdentifier("decorator name"));
    }

    const isAsync = this.match(TokenKind.KW_ASYNC);
    this.expect(TokenKind.KW_FUNC, "'func'");
    const name = this.parseIdentifier("function name");

    this.expect(TokenKind.LPAREN, "'(' after function name");
    const params = this.parseParameters();
    this.expect(TokenKind.RPAREN, "')' after parameters");

    const returnTag = this.match(TokenKind.ARROW) ? this.parseTypeTag() : null;
    const body = this.parseBlock("'{' before function body");

    return { kind: "FunctionDef", range: this.rangeFrom(start), name, params, returnTag, body, isAsync, decorators };
  }

  private parseParameters(): Parameter[] {
    const params: Parameter[] = [];
    if (this.is(TokenKind.RPAREN)) return params;

    do {
      const name = this.parseIdentifier("parameter name");
      const typeTag = this.match(TokenKind.COLON) ? this.parseTypeTag() : null;
      params.push({ name, typeTag });
    } while (this.match(TokenKind.COMMA));

    return params;
  }

  private parseTypeTag(): TypeTag {
    const t = this.current();
    if (t.kind === TokenKind.IDENTIFIER || t.kind === TokenKind.NULL) {
      this.advance();
      return { name: t.lexeme, range: t.range };
    }
    throw this.errorExpected("type name");
  }

  private parseClassDef(): ClassDef {
    const start = this.advance().range.start; // class
    const name = this.parseIdentifier("class name");
    this.expect(TokenKind.LBRACE, "'{' after class name");

    const methods: FunctionDef[] = [];
    while (!this.is(TokenKind.RBRACE)) {
      if (this.match(TokenKind.SEMICOLON)) continue;
      const k = this.current().kind;
      if (k !== TokenKind.KW_FUNC && k !== TokenKind.KW_ASYNC && k !== TokenKind.AT) {
        throw this.errorExpected("method definition in class body");
      }
      methods.push(this.parseFunctionDef());
    }
    this.expect(TokenKind.RBRACE, "'}' after class body");

    return { kind: "ClassDef", range: this.rangeFrom(start), name, methods };
  }

  private parseReturn(): ReturnStmt {
    const kw = this.advance();
    const next = this.current();

    const bare =
      next.kind === TokenKind.RBRACE ||
      next.kind === TokenKind.SEMICOLON ||
      next.kind === TokenKind.EOF ||
      next.range.start.line > kw.range.end.line;

    const argument = bare ? null : this.parseExpression();
    return { kind: "ReturnStmt", range: this.rangeFrom(kw.range.start), argument };
  }

  private parseModuleName(): { name: string; range: Range } {
    const t = this.current();
    if (isStringToken(t)) {
      this.advance();
      return { name: t.value, range: t.range };
    }
    if (t.kind === TokenKind.IDENTIFIER) {
      this.advance();
      return { name: t.lexeme, range: t.range };
    }
    throw this.errorExpected("module name");
  }

  private parseImport(): ImportStmt {
    const start = this.advance().range.start; // import
    const mod = this.parseModuleName();
    const alias = this.match(TokenKind.KW_AS) ? this.parseIdentifier("alias after 'as'") : null;

    return {
      kind: "ImportStmt",
      range: this.rangeFrom(start),
      module: mod.name,
      moduleRange: mod.range,
      alias,
      names: [],
    };
  }

  private parseFromImport(): ImportStmt {
    const start = this.advance().range.start; // from
    const mod = this.parseModuleName();
    this.expect(TokenKind.KW_IMPORT, "'import' after module name");

    const names: Identifier[] = [];
    do {
      names.push(this.parseIdentifier("imported name"));
    } while (this.match(TokenKind.COMMA));

    return {
      kind: "ImportStmt",
      range: this.rangeFrom(start),
      module: mod.name,
      moduleRange: mod.range,
      alias: null,
      names,
    };
  }

  private parseTry(): TryExcept {
    const kw = this.advance();
    const body = this.parseBlock("'{' after try");

    const handlers: ExceptClause[] = [];
    while (this.is(TokenKind.KW_EXCEPT)) {
      const exceptStart = this.advance().range.start;
      const errorKind = this.is(TokenKind.IDENTIFIER) ? this.parseIdentifier("error kind") : null;
      const binding = this.match(TokenKind.KW_AS) ? this.parseIdentifier("name after 'as'") : null;
      const handlerBody = this.parseBlock("'{' after except");
      handlers.push({ errorKind, binding, body: handlerBody, range: this.rangeFrom(exceptStart) });
    }

    const orelse = this.match(TokenKind.KW_ELSE) ? this.parseBlock("'{' after else") : null;
    const finalizer = this.match(TokenKind.KW_FINALLY) ? this.parseBlock("'{' after finally") : null;

    if (handlers.length === 0 && !finalizer) {
      throw new SableSyntaxError("Expected 'except' or 'finally' after try block", kw);
    }

    return { kind: "TryExcept", range: this.rangeFrom(kw.range.start), body, handlers, orelse, finalizer };
  }

  private parseMatch(): MatchStmt {
    const start = this.advance().range.start; // match
    const subject = this.parseExpression();
    this.expect(TokenKind.LBRACE, "'{' after match subject");

    const cases: MatchCase[] = [];
    let defaultCase: Block | null = null;

    while (!this.is(TokenKind.RBRACE)) {
      if (this.match(TokenKind.SEMICOLON)) continue;

      if (this.match(TokenKind.KW_DEFAULT)) {
        defaultCase = this.parseBlock("'{' after default");
        continue;
      }

      const caseStart = this.expect(TokenKind.KW_CASE, "'case' or 'default'").range.start;
      let pattern: Expression | null;
      if (this.is(TokenKind.IDENTIFIER) && this.current().lexeme === "_") {
        this.advance();
        pattern = null;
      } else {
        pattern = this.parseExpression();
      }
      const guard = this.match(TokenKind.KW_IF) ? this.parseExpression() : null;
      const body = this.parseBlock("'{' after case pattern");
      cases.push({ pattern, guard, body, range: this.rangeFrom(caseStart) });
    }
    this.expect(TokenKind.RBRACE, "'}' after match cases");

    return { kind: "MatchStmt", range: this.rangeFrom(start), subject, cases, defaultCase };
  }

  private parseAssert(): AssertStmt {
    const start = this.advance().range.start; // assert
    const test = this.parseExpression();
    const message = this.match(TokenKind.COMMA) ? this.parseExpression() : null;
    return { kind: "AssertStmt", range: this.rangeFrom(start), test, message };
  }

  private parseBlock(what: string): Block {
    this.expect(TokenKind.LBRACE, what);
    const body: Statement[] = [];
    while (!this.is(TokenKind.RBRACE)) {
      if (this.isAtEnd()) throw this.errorExpected("'}' to close block");
      body.push(this.parseStatement());
    }
    this.advance(); // }
    return body;
  }

  /* =========================================================
     Expressions (precedence climbing)
     ========================================================= */

  public parseExpression(): Expression {
    return this.parseTernary();
  }

  private parseTernary(): Expression {
    const test = this.parseBinary(1);
    if (!this.match(TokenKind.QUESTION)) return test;

    const whenTrue = this.parseTernary();
    this.expect(TokenKind.COLON, "':' in conditional expression");
    const whenFalse = this.parseTernary();

    const range = { start: test.range.start, end: whenFalse.range.end };
    return call(identifier(TERNARY_BUILTIN, range), [test, whenTrue, whenFalse], range, true);
  }

  private parseBinary(minPrec: number): Expression {
    let left = this.parsePower();

    while (true) {
      const opInfo = this.getBinaryOpInfo();
      if (!opInfo || opInfo.precedence < minPrec) break;

      this.advance();
      if (opInfo.op === "not in") this.advance(); // in

      const nextMinPrec = opInfo.assoc === "left" ? opInfo.precedence + 1 : opInfo.precedence;
      const right = this.parseBinary(nextMinPrec);
      const range = { start: left.range.start, end: right.range.end };

      left =
        opInfo.op === "|"
          ? call(right, [left], range)
          : { kind: "BinaryOp", range, operator: opInfo.op, left, right };
    }

    return left;
  }

  private parsePower(): Expression {
    const base = this.parseUnary();
    if (!this.match(TokenKind.POW)) return base;

    const exponent = this.parsePower(); // right associative
    return {
      kind: "BinaryOp",
      range: { start: base.range.start, end: exponent.range.end },
      operator: "**",
      left: base,
      right: exponent,
    };
  }

  private parseUnary(): Expression {
    const t = this.current();

    if (t.kind === TokenKind.KW_AWAIT) {
      this.advance();
      const argument = this.parseUnary();
      return { kind: "AwaitExpr", range: this.rangeFrom(t.range.start), argument };
    }

    const op = UNARY_OPS[t.kind];
    if (op) {
      this.advance();
      const argument = this.parseUnary();
      return { kind: "UnaryOp", range: this.rangeFrom(t.range.start), operator: op, argument };
    }

    return this.parsePostfix();
  }

  private parsePostfix(): Expression {
    let expr = this.parsePrimary();

    while (true) {
      if (this.match(TokenKind.LPAREN)) {
        const args = this.parseArguments();
        expr = call(expr, args, this.rangeFrom(expr.range.start));
        continue;
      }

      if (this.match(TokenKind.DOT)) {
        const property = this.parsePropertyName();
        expr = { kind: "MemberAccess", range: this.rangeFrom(expr.range.start), object: expr, property };
        continue;
      }

      if (this.match(TokenKind.LBRACKET)) {
        const index = this.parseExpression();
        this.expect(TokenKind.RBRACKET, "']' after index");
        expr = { kind: "IndexAccess", range: this.rangeFrom(expr.range.start), object: expr, index };
        continue;
      }

      return expr;
    }
  }

  private parseArguments(): Expression[] {
    const args: Expression[] = [];
    if (!this.is(TokenKind.RPAREN)) {
      do {
        if (this.is(TokenKind.RPAREN)) break; // trailing comma
        args.push(this.parseExpression());
      } while (this.match(TokenKind.COMMA));
    }
    this.expect(TokenKind.RPAREN, "')' after arguments");
    return args;
  }

  private parsePrimary(): Expression {
    const t = this.current();

    if (isNumberToken(t)) {
      this.advance();
      return { kind: "Literal", range: t.range, value: t.value, isFloat: t.isFloat, raw: t.lexeme };
    }

    if (isStringToken(t)) {
      this.advance();
      return { kind: "Literal", range: t.range, value: t.value, isFloat: false, raw: t.lexeme };
    }

    switch (t.kind) {
      case TokenKind.TRUE:
      case TokenKind.FALSE:
      case TokenKind.NULL: {
        this.advance();
        const value = t.kind === TokenKind.NULL ? null : t.kind === TokenKind.TRUE;
        return { kind: "Literal", range: t.range, value, isFloat: false, raw: t.lexeme };
      }

      case TokenKind.IDENTIFIER: {
        if (this.peekKind(1) === TokenKind.ARROW) {
          const name = this.parseIdentifier("parameter name");
          return this.parseLambdaBody(t.range.start, [{ name, typeTag: null }]);
        }
        this.advance();
        return identifier(t.lexeme, t.range);
      }

      case TokenKind.LPAREN: {
        const params = this.tryParseLambdaParameters();
        if (params) return this.parseLambdaBody(t.range.start, params);

        this.advance();
        const inner = this.parseExpression();
        this.expect(TokenKind.RPAREN, "')' after expression");
        return inner;
      }

      case TokenKind.LBRACKET:
        return this.parseListOrComprehension();

      case TokenKind.LBRACE:
        return this.parseDictLiteral();

      case TokenKind.KW_NEW: {
        this.advance();
        const cls = this.parseIdentifier("class name after 'new'");
        const callee = identifier(constructorNameFor(cls.name), cls.range);
        const args = this.match(TokenKind.LPAREN) ? this.parseArguments() : [];
        return call(callee, args, this.rangeFrom(t.range.start));
      }

      case TokenKind.KW_THREAD: {
        this.advance();
        const target = this.parsePostfix();
        if (target.kind !== "FunctionCall") {
          throw new SableSyntaxError("Expected a function call after 'thread'", t);
        }
        return { kind: "ThreadStmt", range: this.rangeFrom(t.range.start), call: target };
      }

      default:
        throw this.errorExpected("expression");
    }
  }

  private parseListOrComprehension(): Expression {
    const start = this.advance().range.start; // [

    if (this.match(TokenKind.RBRACKET)) {
      return { kind: "ListLiteral", range: this.rangeFrom(start), elements: [] };
    }

    const first = this.parseExpression();

    if (this.match(TokenKind.KW_FOR)) {
      const variable = this.parseIdentifier("comprehension variable");
      this.expect(TokenKind.KW_IN, "'in' in list comprehension");
      const iterable = this.parseBinary(1);
      const condition = this.match(TokenKind.KW_IF) ? this.parseExpression() : null;
      this.expect(TokenKind.RBRACKET, "']' after list comprehension");
      return { kind: "ListComprehension", range: this.rangeFrom(start), element: first, variable, iterable, condition };
    }

    const elements: Expression[] = [first];
    while (this.match(TokenKind.COMMA)) {
      if (this.is(TokenKind.RBRACKET)) break; // trailing comma
      elements.push(this.parseExpression());
    }
    this.expect(TokenKind.RBRACKET, "']' after list elements");

    return { kind: "ListLiteral", range: this.rangeFrom(start), elements };
  }

  private parseDictLiteral(): Expression {
    const start = this.advance().range.start; // {
    const entries: DictEntry[] = [];

    while (!this.is(TokenKind.RBRACE)) {
      const key = this.parseExpression();
      this.expect(TokenKind.COLON, "':' after dict key");
      const value = this.parseExpression();
      entries.push({ key, value });
      if (!this.match(TokenKind.COMMA)) break;
    }
    this.expect(TokenKind.RBRACE, "'}' after dict entries");

    return { kind: "DictLiteral", range: this.rangeFrom(start), entries };
  }

  /* =========================================================
     Lambdas
     ========================================================= */

  // Speculative: `( ident (: tag)?, ... ) ->`. Rewinds and returns null otherwise.
  private tryParseLambdaParameters(): Parameter[] | null {
    const save = this.idx;
    const fail = (): null => {
      this.idx = save;
      return null;
    };

    this.advance(); // (
    const params: Parameter[] = [];

    if (!this.is(TokenKind.RPAREN)) {
      do {
        const t = this.current();
        if (t.kind !== TokenKind.IDENTIFIER) return fail();
        this.advance();

        let typeTag: TypeTag | null = null;
        if (this.match(TokenKind.COLON)) {
          const tag = this.current();
          if (tag.kind !== TokenKind.IDENTIFIER && tag.kind !== TokenKind.NULL) return fail();
          this.advance();
          typeTag = { name: tag.lexeme, range: tag.range };
        }

        params.push({ name: identifier(t.lexeme, t.range), typeTag });
      } while (this.match(TokenKind.COMMA));
    }

    if (!this.match(TokenKind.RPAREN) || !this.is(TokenKind.ARROW)) return fail();
    return params;
  }

  private parseLambdaBody(start: Position, params: Parameter[]): LambdaExpr {
    this.expect(TokenKind.ARROW, "'->' in lambda");
    const body = this.is(TokenKind.LBRACE) ? this.parseBlock("'{'") : this.parseExpression();
    return { kind: "LambdaExpr", range: this.rangeFrom(start), params, body };
  }

  /* =========================================================
     Token helpers
     ========================================================= */

  private parseIdentifier(what: string): Identifier {
    const t = this.current();
    if (t.kind !== TokenKind.IDENTIFIER) throw this.errorExpected(what);
    this.advance();
    return identifier(t.lexeme, t.range);
  }

  // Keywords are allowed after '.', e.g. `config.default` or `m.match`.
  private parsePropertyName(): Identifier {
    const t = this.current();
    if (t.kind === TokenKind.IDENTIFIER || /^[A-Za-z_][A-Za-z0-9_]*$/.test(t.lexeme)) {
      this.advance();
      return identifier(t.lexeme, t.range);
    }
    throw this.errorExpected("property name after '.'");
  }

  private current(): Token {
    return this.tokens[this.idx] ?? this.tokens[this.tokens.length - 1];
  }

  private previous(): Token {
    return this.tokens[Math.max(0, this.idx - 1)] ?? this.tokens[0];
  }

  private peekKind(ahead: number): TokenKind {
    const t: Token | undefined = this.tokens[this.idx + ahead];
    return t ? t.kind : TokenKind.EOF;
  }

  private isAtEnd(): boolean {
    return this.current().kind === TokenKind.EOF;
  }

  private is(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (this.is(kind)) {
      this.advance();
      return true;
    }
    return false;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.idx++;
    return this.previous();
  }

  private expect(kind: TokenKind, what: string): Token {
    if (this.is(kind)) return this.advance();
    throw this.errorExpected(what);
  }

  private errorExpected(what: string): SableSyntaxError {
    const t = this.current();
    return new SableSyntaxError(`Expected ${what}, found ${describeToken(t)}`, t);
  }

  private rangeFrom(start: Position): Range {
    return { start, end: this.previous().range.end };
  }

  private getBinaryOpInfo(): BinOpInfo | null {
    const k = this.current().kind;
    if (k === TokenKind.KW_NOT && this.peekKind(1) === TokenKind.KW_IN) return NOT_IN;
    return BIN_OP_TABLE[k] ?? null;
  }
}

/* =========================================================
   Utilities
   ========================================================= */

function isAssignTarget(expr: Expression): expr is AssignTarget {
  return expr.kind === "Identifier" || expr.kind === "MemberAccess" || expr.kind === "IndexAccess";
}

function describeToken(t: Token): string {
  if (t.kind === TokenKind.EOF) return "end of input";
  return `'${t.lexeme}'`;
}

function eofToken(): Token {
  const p = { offset: 0, line: 0, column: 0 };
  return { kind: TokenKind.EOF, lexeme: "", range: { start: p, end: { ...p } } };
}
