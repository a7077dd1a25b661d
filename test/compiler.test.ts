import { describe, it, expect } from "vitest";
import { compile, formatDiagnostic, toSql } from "../src/compiler.js";
import { QuerySyntaxError, UnsupportedDialectError } from "../src/errors.js";

describe("compile", () => {
  it("joins every statement into one script", () => {
    const result = compile("node(1);out ids;", "postgres");
    if (!result.success) throw new Error(result.error.message);

    expect(result.statements.map((s) => s.role)).toEqual(["setup", "output"]);
    expect(result.sql).toBe(result.statements.map((s) => s.sql).join("\n"));
    expect(result.sql.startsWith("SET statement_timeout = 180000;\nWITH\n_default AS (")).toBe(true);
  });

  it("passes options to the translator", () => {
    const result = compile("node;", "postgres", { defaultTimeout: 5 });
    if (!result.success) throw new Error(result.error.message);
    expect(result.statements[0].sql).toBe("SET statement_timeout = 5000;");
  });

  it("reports syntax errors with their location", () => {
    expect(compile("node[", "postgres")).toEqual({
      success: false,
      error: {
        kind: "syntax",
        message: "Expected tag key, got end of input",
        position: 5,
        line: 1,
        column: 6,
        expected: ["string", "word"],
      },
    });
  });

  it("reports an unsupported dialect before parsing", () => {
    expect(compile("not a query", "sqlite")).toEqual({
      success: false,
      error: {
        kind: "unsupported-dialect",
        message: "Unsupported SQL dialect: 'sqlite'. Expected one of: postgres, duckdb",
      },
    });
  });

  it("reports unbound names", () => {
    expect(compile(".a out;", "duckdb")).toEqual({
      success: false,
      error: { kind: "unbound-name", message: "Set '.a' is used before it is assigned" },
    });
  });

  it("reports inapplicable filters", () => {
    const result = compile("node(area);", "postgres");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("filter-applicability");
    }
  });

  it("rethrows errors that are not query errors", () => {
    expect(() => compile("node;", "postgres", { srid: "web-mercator" })).toThrow(RangeError);
  });
});

describe("toSql", () => {
  it("returns the script", () => {
    expect(toSql("node(1);out ids;", "duckdb")).toBe(
      [
        "CREATE OR REPLACE TEMP TABLE _default AS",
        "SELECT",
        "    node.*",
        "FROM",
        "    node",
        "WHERE",
        "    (node.id = 1) AND node.id_range IN (0)",
        ";",
        "SELECT",
        "    id,",
        "    osm_type",
        "FROM",
        "    _default",
        ";",
      ].join("\n")
    );
  });

  it("throws typed errors", () => {
    expect(() => toSql("node", "postgres")).toThrow(QuerySyntaxError);
    expect(() => toSql("node;", "oracle")).toThrow(UnsupportedDialectError);
  });
});

describe("formatDiagnostic", () => {
  it("adds the location of syntax errors", () => {
    expect(
      formatDiagnostic({ kind: "syntax", message: "Expected ';', got end of input", position: 4, line: 1, column: 5 })
    ).toBe("Error [syntax]: Expected ';', got end of input\n  at position 4 (line 1, column 5)");
  });

  it("prints other errors on one line", () => {
    expect(formatDiagnostic({ kind: "unbound-name", message: "Set '.a' is used before it is assigned" })).toBe(
      "Error [unbound-name]: Set '.a' is used before it is assigned"
    );
  });
});
