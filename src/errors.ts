// Overpass SQL - Error Classes

// ============================================================================
// Base
// ============================================================================

export type ErrorKind =
  | "syntax"
  | "unbound-name"
  | "unsupported-dialect"
  | "filter-applicability";

/**
 * Base class of every failure the compiler reports.
 * Anything else thrown from the pipeline is a bug, not a query error.
 */
export class OverpassSqlError extends Error {
  public readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = "OverpassSqlError";
    this.kind = kind;
  }
}

// ============================================================================
// Concrete Errors
// ============================================================================

/**
 * The query text does not match the grammar.
 */
export class QuerySyntaxError extends OverpassSqlError {
  public readonly position: number;
  public readonly line: number;
  public readonly column: number;
  public readonly expected: string[];

  constructor(
    message: string,
    location: { position: number; line: number; column: number },
    expected: string[] = []
  ) {
    super("syntax", message);
    this.name = "QuerySyntaxError";
    this.position = location.position;
    this.line = location.line;
    this.column = location.column;
    this.expected = expected;
  }
}

export class UnboundNameError extends OverpassSqlError {
  public readonly binding: string;

  constructor(binding: string) {
    super("unbound-name", `Set '.${binding}' is used before it is assigned`);
    this.name = "UnboundNameError";
    this.binding = binding;
  }
}

export class UnsupportedDialectError extends OverpassSqlError {
  public readonly dialect: string;
  public readonly supported: readonly string[];

  constructor(dialect: string, supported: readonly string[]) {
    super(
      "unsupported-dialect",
      `Unsupported SQL dialect: '${dialect}'. Expected one of: ${supported.join(", ")}`
    );
    this.name = "UnsupportedDialectError";
    this.dialect = dialect;
    this.supported = supported;
  }
}

/**
 * A filter cannot be applied where it appears, e.g. `(area.x)` where `.x`
 * never held areas.
 */
export class FilterApplicabilityError extends OverpassSqlError {
  public readonly filter: string;

  constructor(filter: string, message: string) {
    super("filter-applicability", message);
    this.name = "FilterApplicabilityError";
    this.filter = filter;
  }
}
