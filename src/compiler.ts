// Compiler - Full pipeline: Overpass QL → Parse → Translate → SQL

import { getDialect } from "./dialects/index.js";
import { OverpassSqlError, QuerySyntaxError, type ErrorKind } from "./errors.js";
import { parse } from "./parser.js";
import { Translator, type SqlStatement, type TranslateOptions } from "./translator.js";

// ============================================================================
// Types
// ============================================================================

export interface CompileResult {
  success: true;
  /** Every statement, in execution order, separated by newlines */
  sql: string;
  statements: SqlStatement[];
}

export interface CompileError {
  success: false;
  error: {
    kind: ErrorKind;
    message: string;
    position?: number;
    line?: number;
    column?: number;
    expected?: string[];
  };
}

export type CompileResponse = CompileResult | CompileError;

// ============================================================================
// Compiler
// ============================================================================

/**
 * Compile a query for a dialect. Query errors come back as a failed
 * response; anything else is thrown.
 */
export function compile(query: string, dialect: string, options: TranslateOptions = {}): CompileResponse {
  try {
    return { success: true, ...run(query, dialect, options) };
  } catch (e) {
    if (e instanceof OverpassSqlError) {
      return { success: false, error: describeError(e) };
    }
    throw e;
  }
}

/**
 * Same pipeline as `compile`, throwing the typed error on failure.
 */
export function toSql(query: string, dialect: string, options: TranslateOptions = {}): string {
  return run(query, dialect, options).sql;
}

function run(query: string, dialectName: string, options: TranslateOptions): Omit<CompileResult, "success"> {
  // 1. Resolve the dialect before looking at the query
  const dialect = getDialect(dialectName);

  // 2. Parse
  const parseResult = parse(query);
  if (!parseResult.success) {
    const { message, expected } = parseResult.error;
    throw new QuerySyntaxError(message, parseResult.error, expected);
  }

  // 3. Translate
  const translation = new Translator(dialect, options).translate(parseResult.request);
  const statements = translation.statements;

  return {
    sql: statements.map((statement) => statement.sql).join("\n"),
    statements,
  };
}

export function describeError(error: OverpassSqlError): CompileError["error"] {
  if (error instanceof QuerySyntaxError) {
    return {
      kind: error.kind,
      message: error.message,
      position: error.position,
      line: error.line,
      column: error.column,
      expected: error.expected,
    };
  }
  return { kind: error.kind, message: error.message };
}

/**
 * One-line diagnostic, plus the location for syntax errors.
 */
export function formatDiagnostic(error: CompileError["error"]): string {
  let text = `Error [${error.kind}]: ${error.message}`;
  if (error.position !== undefined && error.line !== undefined && error.column !== undefined) {
    text += `\n  at position ${error.position} (line ${error.line}, column ${error.column})`;
  }
  return text;
}
