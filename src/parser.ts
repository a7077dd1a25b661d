// Overpass QL Parser - Types and Implementation

import { QuerySyntaxError } from "./errors.js";

// ============================================================================
// AST Types
// ============================================================================

export type EntityKind = "node" | "way" | "relation" | "area" | "nwr";

export type SelectorOperator = "=" | "!=" | "~" | "!~";

/**
 * A selector value keeps the form it was written in: numbers are not coerced,
 * `[lanes=2]` and `[lanes="2"]` differ only in how they print.
 */
export type SelectorValue =
  | { type: "string"; value: string }
  | { type: "number"; raw: string };

export interface Selector {
  key: string;
  not: boolean;
  operator?: SelectorOperator;
  value?: SelectorValue;
  caseInsensitive?: boolean;
}

export interface BboxFilter {
  type: "bbox";
  south: number;
  west: number;
  north: number;
  east: number;
}

export interface PolyFilter {
  type: "poly";
  coordinates: string;
}

export interface IdFilter {
  type: "id";
  id: number;
}

export interface IdListFilter {
  type: "ids";
  ids: number[];
}

export interface AreaFilter {
  type: "area";
  input?: string;
}

export interface AroundFilter {
  type: "around";
  input?: string;
  radius: number;
}

export type Filter =
  | BboxFilter
  | PolyFilter
  | IdFilter
  | IdListFilter
  | AreaFilter
  | AroundFilter;

export interface QueryStatement {
  type: "query";
  kind: EntityKind;
  input?: string;
  selectors: Selector[];
  filters: Filter[];
  assign?: string;
}

export interface UnionStatement {
  type: "union";
  statements: SetStatement[];
  assign?: string;
}

// up = `<`, up-all = `<<`, down = `>`, down-all = `>>`
export type RecurseDirection = "up" | "up-all" | "down" | "down-all";

export interface RecurseStatement {
  type: "recurse";
  direction: RecurseDirection;
  input?: string;
  assign?: string;
}

export type GeometryMode = "none" | "geom" | "center" | "bb";

export type DetailLevel = "ids" | "skel" | "body" | "tags" | "meta";

export interface OutStatement {
  type: "out";
  input?: string;
  geometry: GeometryMode;
  detail: DetailLevel;
}

export type SetStatement = QueryStatement | UnionStatement | RecurseStatement;

export type Statement = SetStatement | OutStatement;

export interface Settings {
  format?: "json";
  timeout?: number;
}

export interface Request {
  settings: Settings;
  statements: Statement[];
}

export interface ParseError {
  message: string;
  position: number;
  line: number;
  column: number;
  expected: string[];
}

export type ParseResult =
  | { success: true; request: Request }
  | { success: false; error: ParseError };

// ============================================================================
// Keywords
// ============================================================================

const ENTITY_KINDS: Record<string, EntityKind> = {
  node: "node",
  way: "way",
  rel: "relation",
  relation: "relation",
  area: "area",
  nwr: "nwr",
};

const GEOMETRY_MODES: readonly GeometryMode[] = ["geom", "center", "bb"];

const DETAIL_LEVELS: readonly DetailLevel[] = ["ids", "skel", "body", "tags", "meta"];

function isGeometryMode(value: string): value is GeometryMode {
  return GEOMETRY_MODES.some((mode) => mode === value);
}

function isDetailLevel(value: string): value is DetailLevel {
  return DETAIL_LEVELS.some((level) => level === value);
}

const SET_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const INTEGER = /^[0-9]+$/;

// ============================================================================
// Tokenizer
// ============================================================================

type TokenType =
  | "WORD"
  | "NUMBER"
  | "STRING"
  | "LPAREN"
  | "RPAREN"
  | "LBRACKET"
  | "RBRACKET"
  | "COMMA"
  | "COLON"
  | "SEMICOLON"
  | "DOT"
  | "EQUALS"
  | "NOT_EQUALS"
  | "TILDE"
  | "NOT_TILDE"
  | "BANG"
  | "ARROW"
  | "LT"
  | "LT_LT"
  | "GT"
  | "GT_GT"
  | "EOF";

interface Token {
  type: TokenType;
  value: string;
  position: number;
  line: number;
  column: number;
}

const TOKEN_DESCRIPTIONS: Record<TokenType, string> = {
  WORD: "word",
  NUMBER: "number",
  STRING: "string",
  LPAREN: "'('",
  RPAREN: "')'",
  LBRACKET: "'['",
  RBRACKET: "']'",
  COMMA: "','",
  COLON: "':'",
  SEMICOLON: "';'",
  DOT: "'.'",
  EQUALS: "'='",
  NOT_EQUALS: "'!='",
  TILDE: "'~'",
  NOT_TILDE: "'!~'",
  BANG: "'!'",
  ARROW: "'->'",
  LT: "'<'",
  LT_LT: "'<<'",
  GT: "'>'",
  GT_GT: "'>>'",
  EOF: "end of input",
};

class Tokenizer {
  private input: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    while (this.pos < this.input.length) {
      this.skipWhitespaceAndComments();
      if (this.pos >= this.input.length) break;

      this.tokens.push(this.nextToken());
    }

    this.tokens.push({
      type: "EOF",
      value: "",
      position: this.pos,
      line: this.line,
      column: this.column,
    });

    return this.tokens;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.input.length) {
      const char = this.input[this.pos];
      const next = this.input[this.pos + 1];

      if (char === " " || char === "\t" || char === "\n" || char === "\r") {
        this.advanceChar();
      } else if (char === "/" && next === "/") {
        while (this.pos < this.input.length && this.input[this.pos] !== "\n") {
          this.advanceChar();
        }
      } else if (char === "/" && next === "*") {
        const start = this.location();
        this.advanceChar();
        this.advanceChar();
        while (!(this.input[this.pos] === "*" && this.input[this.pos + 1] === "/")) {
          if (this.pos >= this.input.length) {
            throw new QuerySyntaxError("Unterminated block comment", start, ["'*/'"]);
          }
          this.advanceChar();
        }
        this.advanceChar();
        this.advanceChar();
      } else {
        break;
      }
    }
  }

  private nextToken(): Token {
    const start = this.location();
    const char = this.input[this.pos];
    const next = this.input[this.pos + 1];

    // Two-character operators
    const twoChars: Record<string, TokenType> = {
      "->": "ARROW",
      "!=": "NOT_EQUALS",
      "!~": "NOT_TILDE",
      "<<": "LT_LT",
      ">>": "GT_GT",
    };
    const pair = twoChars[char + next];
    if (next !== undefined && pair) {
      this.advanceChar();
      this.advanceChar();
      return { type: pair, value: char + next, ...start };
    }

    // Single character tokens
    const singleCharTokens: Record<string, TokenType> = {
      "(": "LPAREN",
      ")": "RPAREN",
      "[": "LBRACKET",
      "]": "RBRACKET",
      ",": "COMMA",
      ":": "COLON",
      ";": "SEMICOLON",
      ".": "DOT",
      "=": "EQUALS",
      "~": "TILDE",
      "!": "BANG",
      "<": "LT",
      ">": "GT",
    };
    const single = singleCharTokens[char];
    if (single) {
      this.advanceChar();
      return { type: single, value: char, ...start };
    }

    if (char === "'" || char === '"') {
      return this.readString(char, start);
    }

    if (this.isDigit(char) || (char === "-" && this.isDigit(next))) {
      return this.readNumberOrWord(start);
    }

    if (this.isWordChar(char)) {
      return { type: "WORD", value: this.readWord(), ...start };
    }

    throw new QuerySyntaxError(`Unexpected character '${char}'`, start);
  }

  private readString(quote: string, start: Location): Token {
    this.advanceChar();
    let value = "";

    while (this.pos < this.input.length) {
      const char = this.input[this.pos];
      if (char === quote) {
        this.advanceChar();
        return { type: "STRING", value, ...start };
      }
      // Only the delimiter can be escaped; other backslashes belong to the value
      if (char === "\\" && this.input[this.pos + 1] === quote) {
        value += quote;
        this.advanceChar();
        this.advanceChar();
      } else {
        value += char;
        this.advanceChar();
      }
    }

    throw new QuerySyntaxError("Unterminated string", start, [quote === '"' ? "'\"'" : `"'"`]);
  }

  private readNumberOrWord(start: Location): Token {
    let value = "";

    if (this.input[this.pos] === "-") {
      value += "-";
      this.advanceChar();
    }

    while (this.pos < this.input.length && this.isDigit(this.input[this.pos])) {
      value += this.input[this.pos];
      this.advanceChar();
    }

    if (this.input[this.pos] === "." && this.isDigit(this.input[this.pos + 1])) {
      value += ".";
      this.advanceChar();
      while (this.pos < this.input.length && this.isDigit(this.input[this.pos])) {
        value += this.input[this.pos];
        this.advanceChar();
      }
      return { type: "NUMBER", value, ...start };
    }

    // `4wd`, `2-3`: a word that happens to start with a digit
    if (!value.startsWith("-") && this.atWordChar()) {
      return { type: "WORD", value: value + this.readWord(), ...start };
    }

    return { type: "NUMBER", value, ...start };
  }

  private readWord(): string {
    let value = "";
    while (this.atWordChar()) {
      value += this.input[this.pos];
      this.advanceChar();
    }
    return value;
  }

  // `-` followed by `>` is an assignment arrow, never part of a word
  private atWordChar(): boolean {
    const char = this.input[this.pos];
    if (this.pos >= this.input.length || !this.isWordChar(char)) return false;
    return !(char === "-" && this.input[this.pos + 1] === ">");
  }

  private advanceChar(): void {
    if (this.input[this.pos] === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.pos++;
  }

  private location(): Location {
    return { position: this.pos, line: this.line, column: this.column };
  }

  private isDigit(char: string | undefined): boolean {
    return char !== undefined && char >= "0" && char <= "9";
  }

  private isWordChar(char: string): boolean {
    return (
      (char >= "a" && char <= "z") ||
      (char >= "A" && char <= "Z") ||
      this.isDigit(char) ||
      char === "_" ||
      char === "-"
    );
  }
}

interface Location {
  position: number;
  line: number;
  column: number;
}

// ============================================================================
// Parser
// ============================================================================

const STATEMENT_START = ["node", "way", "rel", "relation", "area", "nwr", "'('", "'.'", "'<'", "'<<'", "'>'", "'>>'", "out"];

export class Parser {
  private tokens: Token[] = [];
  private pos: number = 0;

  parse(input: string): ParseResult {
    try {
      const tokenizer = new Tokenizer(input);
      this.tokens = tokenizer.tokenize();
      this.pos = 0;

      return { success: true, request: this.parseRequest() };
    } catch (e) {
      if (e instanceof QuerySyntaxError) {
        return {
          success: false,
          error: {
            message: e.message,
            position: e.position,
            line: e.line,
            column: e.column,
            expected: e.expected,
          },
        };
      }
      throw e;
    }
  }

  private parseRequest(): Request {
    const settings = this.check("LBRACKET") ? this.parseSettings() : {};
    const statements: Statement[] = [];

    do {
      statements.push(this.parseStatement());
    } while (!this.check("EOF"));

    return { settings, statements };
  }

  private parseSettings(): Settings {
    const settings: Settings = {};

    while (this.check("LBRACKET")) {
      this.advance();
      const name = this.peek();
      this.expectWord(["out", "timeout"]);
      this.expect("COLON");

      if (name.value === "out") {
        if (settings.format !== undefined) {
          this.fail("Duplicate setting [out:...]", name);
        }
        this.expectWord(["json"]);
        settings.format = "json";
      } else {
        if (settings.timeout !== undefined) {
          this.fail("Duplicate setting [timeout:...]", name);
        }
        settings.timeout = this.expectInteger();
      }

      this.expect("RBRACKET");
    }

    this.expect("SEMICOLON");
    return settings;
  }

  private parseStatement(): Statement {
    if (this.checkOut()) {
      const input = this.check("DOT") ? this.parseSetReference() : undefined;
      const statement = this.parseOut(input);
      this.expect("SEMICOLON");
      return statement;
    }
    return this.parseSetStatement(true);
  }

  // Statements that produce a set: everything but `out`
  private parseSetStatement(topLevel: boolean): SetStatement {
    const token = this.peek();
    let statement: SetStatement;

    if (token.type === "LPAREN") {
      statement = this.parseUnion();
    } else if (token.type === "DOT") {
      const input = this.parseSetReference();
      if (!this.checkRecurse()) {
        this.fail(
          this.checkWord("out")
            ? "'out' is not allowed inside a union"
            : `Unexpected ${this.describe(this.peek())} after set reference`,
          this.peek(),
          topLevel ? ["out", "'<'", "'<<'", "'>'", "'>>'"] : ["'<'", "'<<'", "'>'", "'>>'"]
        );
      }
      statement = this.parseRecurse(input);
    } else if (this.checkRecurse()) {
      statement = this.parseRecurse(undefined);
    } else if (token.type === "WORD" && token.value === "out") {
      this.fail("'out' is not allowed inside a union", token);
    } else if (token.type === "WORD" && ENTITY_KINDS[token.value] !== undefined) {
      statement = this.parseQuery();
    } else {
      this.fail(
        `Unexpected ${this.describe(token)}, expected a statement`,
        token,
        topLevel ? STATEMENT_START : STATEMENT_START.filter((start) => start !== "out")
      );
    }

    this.expect("SEMICOLON");
    return statement;
  }

  private parseQuery(): QueryStatement {
    const kind = ENTITY_KINDS[this.advance().value];
    const statement: QueryStatement = { type: "query", kind, selectors: [], filters: [] };

    if (this.check("DOT")) {
      statement.input = this.parseSetReference();
    }

    while (this.check("LBRACKET")) {
      statement.selectors.push(this.parseSelector());
    }

    while (this.check("LPAREN")) {
      statement.filters.push(this.parseFilter());
    }

    if (this.check("ARROW")) {
      statement.assign = this.parseAssignment();
    }

    return statement;
  }

  private parseSelector(): Selector {
    this.expect("LBRACKET");
    const selector: Selector = { key: "", not: false };

    if (this.check("BANG")) {
      this.advance();
      selector.not = true;
    }

    const key = this.peek();
    if (key.type !== "STRING" && key.type !== "WORD" && key.type !== "NUMBER") {
      this.fail(`Expected tag key, got ${this.describe(key)}`, key, ["string", "word"]);
    }
    selector.key = this.advance().value;

    const operators: Partial<Record<TokenType, SelectorOperator>> = {
      EQUALS: "=",
      NOT_EQUALS: "!=",
      TILDE: "~",
      NOT_TILDE: "!~",
    };
    const operator = operators[this.peek().type];

    if (operator) {
      this.advance();
      selector.operator = operator;
      selector.value = this.parseSelectorValue();

      if (this.check("COMMA")) {
        const comma = this.advance();
        if (operator !== "~" && operator !== "!~") {
          this.fail("Case-insensitive flag is only allowed on regular expressions", comma);
        }
        this.expectWord(["i"]);
        selector.caseInsensitive = true;
      }
    } else if (!this.check("RBRACKET")) {
      this.fail(
        `Unexpected ${this.describe(this.peek())} in tag selector`,
        this.peek(),
        ["'='", "'!='", "'~'", "'!~'", "']'"]
      );
    }

    this.expect("RBRACKET");
    return selector;
  }

  private parseSelectorValue(): SelectorValue {
    const token = this.peek();

    if (token.type === "STRING" || token.type === "WORD") {
      this.advance();
      return { type: "string", value: token.value };
    }

    if (token.type === "NUMBER") {
      this.advance();
      return { type: "number", raw: token.value };
    }

    this.fail(`Expected tag value, got ${this.describe(token)}`, token, ["string", "word", "number"]);
  }

  private parseFilter(): Filter {
    this.expect("LPAREN");
    const token = this.peek();
    let filter: Filter;

    if (token.type === "NUMBER") {
      filter = this.parseNumericFilter();
    } else if (this.checkWord("id")) {
      this.advance();
      this.expect("COLON");
      const ids = [this.expectInteger()];
      while (this.check("COMMA")) {
        this.advance();
        ids.push(this.expectInteger());
      }
      filter = { type: "ids", ids };
    } else if (this.checkWord("poly")) {
      this.advance();
      this.expect("COLON");
      filter = { type: "poly", coordinates: this.expect("STRING").value };
    } else if (this.checkWord("area")) {
      this.advance();
      filter = this.check("DOT") ? { type: "area", input: this.parseSetReference() } : { type: "area" };
    } else if (this.checkWord("around")) {
      this.advance();
      const input = this.check("DOT") ? this.parseSetReference() : undefined;
      this.expect("COLON");
      const radius = this.expectNumber();
      filter = input === undefined ? { type: "around", radius } : { type: "around", input, radius };
    } else {
      this.fail(
        `Unexpected ${this.describe(token)} in filter`,
        token,
        ["number", "id", "poly", "area", "around"]
      );
    }

    this.expect("RPAREN");
    return filter;
  }

  // (123) or (south, west, north, east)
  private parseNumericFilter(): Filter {
    const first = this.peek();
    const values = [this.expectNumber()];

    while (this.check("COMMA") && values.length < 4) {
      this.advance();
      values.push(this.expectNumber());
    }

    if (values.length === 1) {
      if (!INTEGER.test(first.value)) {
        this.fail(`Expected element id, got ${this.describe(first)}`, first, ["integer"]);
      }
      if (!this.check("RPAREN")) {
        this.fail(`Unexpected ${this.describe(this.peek())} in filter`, this.peek(), ["','", "')'"]);
      }
      return { type: "id", id: this.toInteger(first) };
    }

    if (values.length < 4) {
      this.fail(
        `Bounding box needs 4 numbers, got ${values.length}`,
        this.peek(),
        ["','"]
      );
    }

    const [south, west, north, east] = values;
    return { type: "bbox", south, west, north, east };
  }

  private parseUnion(): UnionStatement {
    this.expect("LPAREN");
    const statements: SetStatement[] = [];

    do {
      statements.push(this.parseSetStatement(false));
    } while (!this.check("RPAREN"));

    this.advance();
    const statement: UnionStatement = { type: "union", statements };

    if (this.check("ARROW")) {
      statement.assign = this.parseAssignment();
    }

    return statement;
  }

  private parseRecurse(input: string | undefined): RecurseStatement {
    const directions: Partial<Record<TokenType, RecurseDirection>> = {
      LT: "up",
      LT_LT: "up-all",
      GT: "down",
      GT_GT: "down-all",
    };
    const token = this.advance();
    const direction = directions[token.type];
    if (direction === undefined) {
      this.fail(`Expected recurse operator, got ${this.describe(token)}`, token, ["'<'", "'<<'", "'>'", "'>>'"]);
    }

    const statement: RecurseStatement = { type: "recurse", direction };
    if (input !== undefined) {
      statement.input = input;
    }
    if (this.check("ARROW")) {
      statement.assign = this.parseAssignment();
    }

    return statement;
  }

  private parseOut(input: string | undefined): OutStatement {
    this.expectWord(["out"]);
    const statement: OutStatement = { type: "out", geometry: "none", detail: "body" };
    if (input !== undefined) {
      statement.input = input;
    }

    let geometrySeen = false;
    let detailSeen = false;

    while (this.check("WORD")) {
      const token = this.peek();

      if (isGeometryMode(token.value) && !geometrySeen) {
        statement.geometry = token.value;
        geometrySeen = true;
      } else if (isDetailLevel(token.value) && !detailSeen) {
        statement.detail = token.value;
        detailSeen = true;
      } else {
        const expected = [
          ...(geometrySeen ? [] : [...GEOMETRY_MODES]),
          ...(detailSeen ? [] : [...DETAIL_LEVELS]),
          "';'",
        ];
        this.fail(`Unexpected output modifier '${token.value}'`, token, expected);
      }

      this.advance();
    }

    return statement;
  }

  private parseAssignment(): string {
    this.expect("ARROW");
    return this.parseSetReference();
  }

  private parseSetReference(): string {
    this.expect("DOT");
    const token = this.peek();

    if (token.type !== "WORD" || !SET_NAME.test(token.value)) {
      this.fail(`Expected set name, got ${this.describe(token)}`, token, ["set name"]);
    }

    return this.advance().value;
  }

  // Token helpers

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private advance(): Token {
    const token = this.tokens[this.pos];
    if (token.type !== "EOF") {
      this.pos++;
    }
    return token;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private checkWord(word: string): boolean {
    const token = this.peek();
    return token.type === "WORD" && token.value === word;
  }

  // `out` or `.name out`
  private checkOut(): boolean {
    if (this.checkWord("out")) return true;
    const name = this.tokens[this.pos + 1];
    const word = this.tokens[this.pos + 2];
    return (
      this.check("DOT") &&
      name !== undefined &&
      name.type === "WORD" &&
      word !== undefined &&
      word.type === "WORD" &&
      word.value === "out"
    );
  }

  private checkRecurse(): boolean {
    const type = this.peek().type;
    return type === "LT" || type === "LT_LT" || type === "GT" || type === "GT_GT";
  }

  private expect(type: TokenType): Token {
    const token = this.peek();
    if (token.type !== type) {
      this.fail(
        `Expected ${TOKEN_DESCRIPTIONS[type]}, got ${this.describe(token)}`,
        token,
        [TOKEN_DESCRIPTIONS[type]]
      );
    }
    return this.advance();
  }

  private expectWord(words: string[]): Token {
    const token = this.peek();
    if (token.type !== "WORD" || !words.includes(token.value)) {
      this.fail(
        `Expected ${words.map((w) => `'${w}'`).join(" or ")}, got ${this.describe(token)}`,
        token,
        words
      );
    }
    return this.advance();
  }

  private expectNumber(): number {
    return Number(this.expect("NUMBER").value);
  }

  private expectInteger(): number {
    const token = this.peek();
    if (token.type !== "NUMBER" || !INTEGER.test(token.value)) {
      this.fail(`Expected integer, got ${this.describe(token)}`, token, ["integer"]);
    }
    return this.toInteger(this.advance());
  }

  private toInteger(token: Token): number {
    const value = Number(token.value);
    if (!Number.isSafeInteger(value)) {
      this.fail(`Integer ${token.value} is too large (maximum ${Number.MAX_SAFE_INTEGER})`, token, ["integer"]);
    }
    return value;
  }

  private describe(token: Token): string {
    if (token.type === "EOF") return TOKEN_DESCRIPTIONS.EOF;
    if (token.type === "STRING") return `string "${token.value}"`;
    if (token.type === "NUMBER") return `number ${token.value}`;
    if (token.type === "WORD") return `'${token.value}'`;
    return TOKEN_DESCRIPTIONS[token.type];
  }

  private fail(message: string, token: Token, expected: string[] = []): never {
    throw new QuerySyntaxError(message, token, expected);
  }
}

// Convenience function
export function parse(input: string): ParseResult {
  return new Parser().parse(input);
}
