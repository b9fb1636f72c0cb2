// src/core/lexer.ts
//
// Sable Lexer (Tokenizer)
// -----------------------
// Converts raw source text into a stream of tokens with precise source ranges.
//
// Syntax covered:
// - Comments: // line, # line, /* block */ (no nesting, first */ closes)
// - Strings: 'single' and "double", multiline, escapes \n \t \r \0 \\ \" \'
//   (any other escaped character stands for itself)
// - Numbers: 123, 12.34
// - Keywords incl. aliases True / False / None
// - Operators, longest match first: **= ** == != <= >= += -= *= /= %= -> && || << >>
// - Punctuation: ( ) { } [ ] , ; . : ? @ | & ^ ~
//
// Notes:
// - Newlines separate tokens but are only emitted with `emitNewlines` (tooling).
// - Unterminated strings and block comments run to end of input without error.
// - An unknown character is fatal: it is recorded in `errors`, an ERROR token is
//   emitted and lexing stops (unless `stopOnError` is false).

import type { Position, Range } from "./ast";

/* =========================================================
   Token Kinds
   ========================================================= */

export enum TokenKind {
  // Meta
  EOF = "EOF",
  ERROR = "ERROR",
  NEWLINE = "NEWLINE",
  COMMENT = "COMMENT",

  // Literals
  IDENTIFIER = "IDENTIFIER",
  STRING = "STRING",
  NUMBER = "NUMBER",

  // Keywords
  KW_LET = "KW_LET",
  KW_CONST = "KW_CONST",
  KW_FUNC = "KW_FUNC",
  KW_ASYNC = "KW_ASYNC",
  KW_AWAIT = "KW_AWAIT",
  KW_RETURN = "KW_RETURN",
  KW_IF = "KW_IF",
  KW_ELIF = "KW_ELIF",
  KW_ELSE = "KW_ELSE",
  KW_WHILE = "KW_WHILE",
  KW_FOR = "KW_FOR",
  KW_IN = "KW_IN",
  KW_BREAK = "KW_BREAK",
  KW_CONTINUE = "KW_CONTINUE",
  KW_CLASS = "KW_CLASS",
  KW_NEW = "KW_NEW",
  KW_IMPORT = "KW_IMPORT",
  KW_AS = "KW_AS",
  KW_FROM = "KW_FROM",
  KW_TRY = "KW_TRY",
  KW_EXCEPT = "KW_EXCEPT",
  KW_FINALLY = "KW_FINALLY",
  KW_MATCH = "KW_MATCH",
  KW_CASE = "KW_CASE",
  KW_DEFAULT = "KW_DEFAULT",
  KW_THREAD = "KW_THREAD",
  KW_ASSERT = "KW_ASSERT",
  KW_AND = "KW_AND",
  KW_OR = "KW_OR",
  KW_NOT = "KW_NOT",

  // Constants
  TRUE = "TRUE",
  FALSE = "FALSE",
  NULL = "NULL",

  // Operators
  ASSIGN = "ASSIGN", // =
  PLUS_ASSIGN = "PLUS_ASSIGN", // +=
  MINUS_ASSIGN = "MINUS_ASSIGN", // -=
  STAR_ASSIGN = "STAR_ASSIGN", // *=
  SLASH_ASSIGN = "SLASH_ASSIGN", // /=
  PERCENT_ASSIGN = "PERCENT_ASSIGN", // %=
  POW_ASSIGN = "POW_ASSIGN", // **=
  EQ = "EQ", // ==
  NEQ = "NEQ", // !=
  LT = "LT",
  LTE = "LTE",
  GT = "GT",
  GTE = "GTE",
  PLUS = "PLUS",
  MINUS = "MINUS",
  STAR = "STAR",
  SLASH = "SLASH",
  PERCENT = "PERCENT",
  POW = "POW", // **
  AND_AND = "AND_AND", // &&
  OR_OR = "OR_OR", // ||
  BANG = "BANG", // !
  ARROW = "ARROW", // ->
  PIPE = "PIPE", // |
  AMP = "AMP", // &
  CARET = "CARET", // ^
  TILDE = "TILDE", // ~
  SHL = "SHL", // <<
  SHR = "SHR", // >>
  QUESTION = "QUESTION", // ?
  AT = "AT", // @

  // Punctuation
  LPAREN = "LPAREN",
  RPAREN = "RPAREN",
  LBRACE = "LBRACE",
  RBRACE = "RBRACE",
  LBRACKET = "LBRACKET",
  RBRACKET = "RBRACKET",
  COMMA = "COMMA",
  SEMICOLON = "SEMICOLON",
  DOT = "DOT",
  COLON = "COLON",
}

/* =========================================================
   Token Types
   ========================================================= */

export type TokenBase = {
  kind: TokenKind;
  lexeme: string;
  range: Range;
};

export type IdentifierToken = TokenBase & {
  kind: TokenKind.IDENTIFIER;
  value: string;
};

export type StringToken = TokenBase & {
  kind: TokenKind.STRING;
  value: string; // unescaped
  quote: "'" | '"';
  terminated: boolean;
};

export type NumberToken = TokenBase & {
  kind: TokenKind.NUMBER;
  value: number;
  isFloat: boolean;
};

export type ErrorToken = TokenBase & {
  kind: TokenKind.ERROR;
  message: string;
};

export type Token = TokenBase | IdentifierToken | StringToken | NumberToken | ErrorToken;

export function isStringToken(t: Token): t is StringToken {
  return t.kind === TokenKind.STRING && "quote" in t;
}

export function isNumberToken(t: Token): t is NumberToken {
  return t.kind === TokenKind.NUMBER && "isFloat" in t;
}

/* =========================================================
   Lexer Options
   ========================================================= */

export type LexerOptions = {
  /** Emit NEWLINE tokens. Default: false */
  emitNewlines?: boolean;
  /** Include COMMENT tokens. Default: false */
  includeComments?: boolean;
  /** Stop at the first unknown character. Default: true */
  stopOnError?: boolean;
};

export const DEFAULT_LEXER_OPTIONS: Required<LexerOptions> = {
  emitNewlines: false,
  includeComments: false,
  stopOnError: true,
};

export type LexerError = {
  message: string;
  range: Range;
  /** offending character */
  char: string;
};

export type LexResult = {
  tokens: Token[];
  errors: LexerError[];
};

/* =========================================================
   Keywords and operators
   ========================================================= */

export const KEYWORDS: Readonly<Record<string, TokenKind>> = Object.freeze({
  let: TokenKind.KW_LET,
  const: TokenKind.KW_CONST,
  func: TokenKind.KW_FUNC,
  async: TokenKind.KW_ASYNC,
  await: TokenKind.KW_AWAIT,
  return: TokenKind.KW_RETURN,
  if: TokenKind.KW_IF,
  elif: TokenKind.KW_ELIF,
  else: TokenKind.KW_ELSE,
  while: TokenKind.KW_WHILE,
  for: TokenKind.KW_FOR,
  in: TokenKind.KW_IN,
  break: TokenKind.KW_BREAK,
  continue: TokenKind.KW_CONTINUE,
  class: TokenKind.KW_CLASS,
  new: TokenKind.KW_NEW,
  import: TokenKind.KW_IMPORT,
  as: TokenKind.KW_AS,
  from: TokenKind.KW_FROM,
  try: TokenKind.KW_TRY,
  except: TokenKind.KW_EXCEPT,
  finally: TokenKind.KW_FINALLY,
  match: TokenKind.KW_MATCH,
  case: TokenKind.KW_CASE,
  default: TokenKind.KW_DEFAULT,
  thread: TokenKind.KW_THREAD,
  assert: TokenKind.KW_ASSERT,
  and: TokenKind.KW_AND,
  or: TokenKind.KW_OR,
  not: TokenKind.KW_NOT,
  true: TokenKind.TRUE,
  false: TokenKind.FALSE,
  null: TokenKind.NULL,
  True: TokenKind.TRUE,
  False: TokenKind.FALSE,
  None: TokenKind.NULL,
});

export function keywordKind(text: string): TokenKind | null {
  return Object.prototype.hasOwnProperty.call(KEYWORDS, text) ? KEYWORDS[text] : null;
}

// Longest first; the scanner takes the first entry that matches.
const OPERATORS: ReadonlyArray<readonly [string, TokenKind]> = [
  ["**=", TokenKind.POW_ASSIGN],

  ["**", TokenKind.POW],
  ["==", TokenKind.EQ],
  ["!=", TokenKind.NEQ],
  ["<=", TokenKind.LTE],
  [">=", TokenKind.GTE],
  ["+=", TokenKind.PLUS_ASSIGN],
  ["-=", TokenKind.MINUS_ASSIGN],
  ["*=", TokenKind.STAR_ASSIGN],
  ["/=", TokenKind.SLASH_ASSIGN],
  ["%=", TokenKind.PERCENT_ASSIGN],
  ["->", TokenKind.ARROW],
  ["&&", TokenKind.AND_AND],
  ["||", TokenKind.OR_OR],
  ["<<", TokenKind.SHL],
  [">>", TokenKind.SHR],

  ["+", TokenKind.PLUS],
  ["-", TokenKind.MINUS],
  ["*", TokenKind.STAR],
  ["/", TokenKind.SLASH],
  ["%", TokenKind.PERCENT],
  ["=", TokenKind.ASSIGN],
  ["<", TokenKind.LT],
  [">", TokenKind.GT],
  ["!", TokenKind.BANG],
  ["?", TokenKind.QUESTION],
  [":", TokenKind.COLON],
  [".", TokenKind.DOT],
  [",", TokenKind.COMMA],
  [";", TokenKind.SEMICOLON],
  ["(", TokenKind.LPAREN],
  [")", TokenKind.RPAREN],
  ["[", TokenKind.LBRACKET],
  ["]", TokenKind.RBRACKET],
  ["{", TokenKind.LBRACE],
  ["}", TokenKind.RBRACE],
  ["@", TokenKind.AT],
  ["|", TokenKind.PIPE],
  ["&", TokenKind.AMP],
  ["^", TokenKind.CARET],
  ["~", TokenKind.TILDE],
];

/* =========================================================
   Core Lexer
   ========================================================= */

export class Lexer {
  private readonly src: string;
  private readonly opts: Required<LexerOptions>;

  private i = 0; // offset
  private line = 0; // 0-based
  private col = 0; // 0-based

  private tokens: Token[] = [];
  private errors: LexerError[] = [];

  constructor(source: string, options?: LexerOptions) {
    this.src = source;
    this.opts = { ...DEFAULT_LEXER_OPTIONS, ...(options ?? {}) };
  }

  public lex(): LexResult {
    while (!this.isEOF()) {
      const c = this.peek();

      if (c === "\n") {
        this.lexNewline();
        continue;
      }

      if (c === " " || c === "\t" || c === "\r") {
        this.advance();
        continue;
      }

      if (c === "#" || (c === "/" && this.peek(1) === "/")) {
        this.lexLineComment();
        continue;
      }

      if (c === "/" && this.peek(1) === "*") {
        this.lexBlockComment();
        continue;
      }

      if (c === "'" || c === '"') {
        this.lexString(c);
        continue;
      }

      if (isDigit(c)) {
        this.lexNumber();
        continue;
      }

      if (isIdentStart(c)) {
        this.lexIdentifierOrKeyword();
        continue;
      }

      if (this.lexOperator()) continue;

      const ch = this.currentCodePoint();
      this.errorHere(`Unexpected character '${printable(ch)}'`, ch);
      if (this.opts.stopOnError) break;
      for (let k = 0; k < ch.length; k++) this.advance();
    }

    this.tokens.push({ kind: TokenKind.EOF, lexeme: "", range: this.rangeAtCurrent() });
    return { tokens: this.tokens, errors: this.errors };
  }

  /* =========================================================
     Basics
     ========================================================= */

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  private peek(ahead = 0): string {
    const idx = this.i + ahead;
    if (idx < 0 || idx >= this.src.length) return "\0";
    return this.src[idx];
  }

  /** The whole character at the cursor; astral characters span two code units. */
  private currentCodePoint(): string {
    const cp = this.src.codePointAt(this.i);
    return cp === undefined ? "\0" : String.fromCodePoint(cp);
  }

  private advance(): string {
    const c = this.peek();
    this.i++;
    if (c === "\n") {
      this.line++;
      this.col = 0;
    } else {
      this.col++;
    }
    return c;
  }

  private position(): Position {
    return { offset: this.i, line: this.line, column: this.col };
  }

  private rangeAtCurrent(): Range {
    const p = this.position();
    return { start: { ...p }, end: { ...p } };
  }

  private errorHere(message: string, char: string): void {
    const start = this.position();
    const end = { ...start, offset: start.offset + char.length, column: start.column + char.length };
    const range = { start, end };

    this.errors.push({ message, range, char });
    this.tokens.push({ kind: TokenKind.ERROR, lexeme: char, range, message } satisfies ErrorToken);
  }

  /* =========================================================
     Trivia
     ========================================================= */

  private lexNewline(): void {
    const start = this.position();
    this.advance();
    if (this.opts.emitNewlines) {
      this.tokens.push({ kind: TokenKind.NEWLINE, lexeme: "\n", range: { start, end: this.position() } });
    }
  }

  private lexLineComment(): void {
    const start = this.position();
    let text = "";
    while (!this.isEOF() && this.peek() !== "\n") text += this.advance();

    if (this.opts.includeComments) {
      this.tokens.push({ kind: TokenKind.COMMENT, lexeme: text, range: { start, end: this.position() } });
    }
  }

  private lexBlockComment(): void {
    const start = this.position();
    let text = this.advance() + this.advance(); // "/*"

    while (!this.isEOF()) {
      if (this.peek() === "*" && this.peek(1) === "/") {
        text += this.advance() + this.advance();
        break;
      }
      text += this.advance();
    }

    if (this.opts.includeComments) {
      this.tokens.push({ kind: TokenKind.COMMENT, lexeme: text, range: { start, end: this.position() } });
    }
  }

  /* =========================================================
     Literals
     ========================================================= */

  private lexString(quote: "'" | '"'): void {
    const start = this.position();
    this.advance(); // opening quote

    let value = "";
    let terminated = false;

    while (!this.isEOF()) {
      const c = this.advance();

      if (c === quote) {
        terminated = true;
        break;
      }

      if (c === "\\") {
        if (this.isEOF()) break;
        value += decodeEscape(this.advance());
        continue;
      }

      value += c;
    }

    const end = this.position();
    const token: StringToken = {
      kind: TokenKind.STRING,
      lexeme: this.src.slice(start.offset, end.offset),
      range: { start, end },
      value,
      quote,
      terminated,
    };
    this.tokens.push(token);
  }

  private lexNumber(): void {
    const start = this.position();
    let text = "";
    while (isDigit(this.peek())) text += this.advance();

    let isFloat = false;
    if (this.peek() === "." && isDigit(this.peek(1))) {
      isFloat = true;
      text += this.advance();
      while (isDigit(this.peek())) text += this.advance();
    }

    const token: NumberToken = {
      kind: TokenKind.NUMBER,
      lexeme: text,
      range: { start, end: this.position() },
      value: Number(text),
      isFloat,
    };
    this.tokens.push(token);
  }

  private lexIdentifierOrKeyword(): void {
    const start = this.position();
    let text = "";
    while (isIdentPart(this.peek())) text += this.advance();

    const range = { start, end: this.position() };
    const kw = keywordKind(text);
    if (kw) {
      this.tokens.push({ kind: kw, lexeme: text, range });
      return;
    }

    const token: IdentifierToken = { kind: TokenKind.IDENTIFIER, lexeme: text, range, value: text };
    this.tokens.push(token);
  }

  /* =========================================================
     Operators / punctuation
     ========================================================= */

  private lexOperator(): boolean {
    for (const [text, kind] of OPERATORS) {
      if (!this.src.startsWith(text, this.i)) continue;

      const start = this.position();
      for (let k = 0; k < text.length; k++) this.advance();
      this.tokens.push({ kind, lexeme: text, range: { start, end: this.position() } });
      return true;
    }
    return false;
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

export function tokenize(source: string, options?: LexerOptions): LexResult {
  return new Lexer(source, options).lex();
}

/* =========================================================
   Character utilities
   ========================================================= */

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function isIdentStart(c: string): boolean {
  return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
}

function isIdentPart(c: string): boolean {
  return isIdentStart(c) || isDigit(c);
}

function decodeEscape(c: string): string {
  switch (c) {
    case "n":
      return "\n";
    case "t":
      return "\t";
    case "r":
      return "\r";
    case "0":
      return "\0";
    default:
      // \\ \" \' and any other character stand for themselves
      return c;
  }
}

function printable(c: string): string {
  if (c === "\t") return "\\t";
  if (c === "\0") return "\\0";
  return c;
}
