import { describe, it, expect } from "vitest";
import { parse, type Request, type Statement } from "../src/parser.js";

// Helper to assert success and get the request
function expectSuccess(input: string): Request {
  const result = parse(input);
  if (!result.success) {
    throw new Error(`Parse failed: ${result.error.message} at position ${result.error.position}`);
  }
  return result.request;
}

// Helper to assert failure and get error
function expectError(input: string) {
  const result = parse(input);
  if (result.success) {
    throw new Error(`Expected parse to fail, but got: ${JSON.stringify(result.request)}`);
  }
  return result.error;
}

function firstStatement(input: string): Statement {
  return expectSuccess(input).statements[0];
}

describe("Parser", () => {
  describe("entity queries", () => {
    it("parses a kind with one tag selector", () => {
      const request = expectSuccess("node[amenity=cafe];");

      expect(request).toEqual({
        settings: {},
        statements: [
          {
            type: "query",
            kind: "node",
            selectors: [{ key: "amenity", not: false, operator: "=", value: { type: "string", value: "cafe" } }],
            filters: [],
          },
        ],
      });
    });

    it("normalizes rel and relation to the same kind", () => {
      expect(firstStatement("rel;")).toMatchObject({ kind: "relation" });
      expect(firstStatement("relation;")).toMatchObject({ kind: "relation" });
    });

    it("parses every entity kind", () => {
      for (const kind of ["node", "way", "area", "nwr"]) {
        expect(firstStatement(`${kind};`)).toMatchObject({ type: "query", kind });
      }
    });

    it("parses an input set and an assignment", () => {
      expect(firstStatement('nwr.a["tourism"="information"]->.info;')).toEqual({
        type: "query",
        kind: "nwr",
        input: "a",
        selectors: [
          { key: "tourism", not: false, operator: "=", value: { type: "string", value: "information" } },
        ],
        filters: [],
        assign: "info",
      });
    });

    it("accepts underscores in set names", () => {
      expect(firstStatement("way->._tmp_1;")).toMatchObject({ assign: "_tmp_1" });
    });

    it("parses several statements", () => {
      const request = expectSuccess("node;\nway;\nrel;");
      expect(request.statements.map((s) => s.type)).toEqual(["query", "query", "query"]);
    });
  });

  describe("tag selectors", () => {
    it("parses key existence and its negation", () => {
      expect(firstStatement("node[name][!fixme];")).toMatchObject({
        selectors: [
          { key: "name", not: false },
          { key: "fixme", not: true },
        ],
      });
    });

    it("parses every comparison operator", () => {
      const statement = firstStatement('way[a="1"][b!="2"][c~"^x"][d!~"y$"];');
      expect(statement).toMatchObject({
        selectors: [
          { key: "a", operator: "=", value: { type: "string", value: "1" } },
          { key: "b", operator: "!=", value: { type: "string", value: "2" } },
          { key: "c", operator: "~", value: { type: "string", value: "^x" } },
          { key: "d", operator: "!~", value: { type: "string", value: "y$" } },
        ],
      });
    });

    it("keeps unquoted numbers in their written form", () => {
      expect(firstStatement("way[lanes=2][ele=-3.50];")).toMatchObject({
        selectors: [
          { key: "lanes", value: { type: "number", raw: "2" } },
          { key: "ele", value: { type: "number", raw: "-3.50" } },
        ],
      });
    });

    it("reads words starting with digits as words", () => {
      expect(firstStatement("way[4wd_only=yes];")).toMatchObject({
        selectors: [{ key: "4wd_only", value: { type: "string", value: "yes" } }],
      });
    });

    it("parses the case-insensitive flag on regular expressions", () => {
      expect(firstStatement('node[name~"^foo",i];')).toMatchObject({
        selectors: [{ key: "name", operator: "~", caseInsensitive: true }],
      });
    });

    it("rejects the case-insensitive flag on equality", () => {
      const error = expectError('node[name="foo",i];');
      expect(error.message).toBe("Case-insensitive flag is only allowed on regular expressions");
      expect(error.position).toBe(15);
    });

    it("decodes an escaped delimiter and keeps other backslashes", () => {
      expect(firstStatement("node[name='it\\'s'];")).toMatchObject({
        selectors: [{ key: "name", value: { type: "string", value: "it's" } }],
      });
      expect(firstStatement('node["x\\y"];')).toMatchObject({
        selectors: [{ key: "x\\y" }],
      });
    });
  });

  describe("filters", () => {
    it("parses a bounding box as south, west, north, east", () => {
      expect(firstStatement("node(50.6,7.0,-50.8,7.3);")).toMatchObject({
        filters: [{ type: "bbox", south: 50.6, west: 7, north: -50.8, east: 7.3 }],
      });
    });

    it("parses a single id and an id list", () => {
      expect(firstStatement("way(123);")).toMatchObject({ filters: [{ type: "id", id: 123 }] });
      expect(firstStatement("way(id:1, 2,3);")).toMatchObject({ filters: [{ type: "ids", ids: [1, 2, 3] }] });
    });

    it("accepts ids up to the largest exact integer", () => {
      expect(firstStatement("node(9007199254740991);")).toMatchObject({
        filters: [{ type: "id", id: 9007199254740991 }],
      });
    });

    it("rejects ids that cannot be represented exactly", () => {
      const error = expectError("node(9007199254740993);");
      expect(error.message).toBe("Integer 9007199254740993 is too large (maximum 9007199254740991)");
      expect(error.position).toBe(5);
      expect(error.column).toBe(6);
      expect(error.expected).toEqual(["integer"]);

      expect(expectError("way(id:1,9007199254740993);").position).toBe(9);
      expect(expectError("[timeout:99999999999999999];node;").message).toBe(
        "Integer 99999999999999999 is too large (maximum 9007199254740991)"
      );
    });

    it("parses a polygon", () => {
      expect(firstStatement('node(poly:"1 2 3 4 5 6");')).toMatchObject({
        filters: [{ type: "poly", coordinates: "1 2 3 4 5 6" }],
      });
    });

    it("parses area filters with and without a set", () => {
      expect(firstStatement("node(area.a)(area);")).toEqual({
        type: "query",
        kind: "node",
        selectors: [],
        filters: [{ type: "area", input: "a" }, { type: "area" }],
      });
    });

    it("parses around filters with and without a set", () => {
      expect(firstStatement("node(around.b:100)(around:12.5);")).toMatchObject({
        filters: [
          { type: "around", input: "b", radius: 100 },
          { type: "around", radius: 12.5 },
        ],
      });
    });

    it("rejects a fractional element id", () => {
      const error = expectError("node(1.5);");
      expect(error.message).toBe("Expected element id, got number 1.5");
      expect(error.expected).toEqual(["integer"]);
    });

    it("rejects a bounding box with three numbers", () => {
      expect(expectError("node(1,2,3);").message).toBe("Bounding box needs 4 numbers, got 3");
    });
  });

  describe("union and recurse", () => {
    it("parses a union with an assignment", () => {
      expect(firstStatement("(node[a]; way[b];)->.u;")).toEqual({
        type: "union",
        statements: [
          { type: "query", kind: "node", selectors: [{ key: "a", not: false }], filters: [] },
          { type: "query", kind: "way", selectors: [{ key: "b", not: false }], filters: [] },
        ],
        assign: "u",
      });
    });

    it("parses nested unions", () => {
      const statement = firstStatement("((node;);way;);");
      expect(statement).toMatchObject({
        type: "union",
        statements: [{ type: "union", statements: [{ type: "query", kind: "node" }] }, { type: "query", kind: "way" }],
      });
    });

    it("parses the four recurse operators", () => {
      expect(firstStatement(">;")).toEqual({ type: "recurse", direction: "down" });
      expect(firstStatement(">>;")).toEqual({ type: "recurse", direction: "down-all" });
      expect(firstStatement("<;")).toEqual({ type: "recurse", direction: "up" });
      expect(firstStatement("<<->.p;")).toEqual({ type: "recurse", direction: "up-all", assign: "p" });
    });

    it("parses a recurse with an input set", () => {
      expect(firstStatement(".a >->.b;")).toEqual({ type: "recurse", direction: "down", input: "a", assign: "b" });
    });

    it("rejects out inside a union", () => {
      expect(expectError("(out;);").message).toBe("'out' is not allowed inside a union");
      expect(expectError("(.a out;);").message).toBe("'out' is not allowed inside a union");
    });
  });

  describe("out", () => {
    it("uses body detail and no geometry by default", () => {
      expect(firstStatement("out;")).toEqual({ type: "out", geometry: "none", detail: "body" });
    });

    it("accepts modifiers in any order", () => {
      expect(firstStatement(".x out center meta;")).toEqual({
        type: "out",
        input: "x",
        geometry: "center",
        detail: "meta",
      });
      expect(firstStatement("out ids geom;")).toEqual({ type: "out", geometry: "geom", detail: "ids" });
    });

    it("rejects a repeated modifier", () => {
      const error = expectError("out geom bb;");
      expect(error.message).toBe("Unexpected output modifier 'bb'");
      expect(error.expected).toEqual(["ids", "skel", "body", "tags", "meta", "';'"]);
    });
  });

  describe("settings", () => {
    it("parses output format and timeout in either order", () => {
      expect(expectSuccess("[out:json][timeout:25];node;").settings).toEqual({ format: "json", timeout: 25 });
      expect(expectSuccess("[timeout:25][out:json];node;").settings).toEqual({ format: "json", timeout: 25 });
    });

    it("rejects a repeated setting", () => {
      expect(expectError("[timeout:1][timeout:2];node;").message).toBe("Duplicate setting [timeout:...]");
    });

    it("rejects an unknown output format", () => {
      expect(expectError("[out:xml];node;").message).toBe("Expected 'json', got 'xml'");
    });
  });

  describe("comments and whitespace", () => {
    it("skips line and block comments", () => {
      const request = expectSuccess("// cafes\nnode /* all of them */ [amenity];\n");
      expect(request.statements).toHaveLength(1);
    });

    it("reports an unterminated block comment at its start", () => {
      const error = expectError("node; /* open");
      expect(error.message).toBe("Unterminated block comment");
      expect(error.position).toBe(6);
    });
  });

  describe("errors", () => {
    it("reports a missing terminator at the end of input", () => {
      const error = expectError("node[amenity=cafe]");
      expect(error).toEqual({
        message: "Expected ';', got end of input",
        position: 18,
        line: 1,
        column: 19,
        expected: ["';'"],
      });
    });

    it("reports line and column on later lines", () => {
      const error = expectError("node;\nway[;");
      expect(error.message).toBe("Expected tag key, got ';'");
      expect(error.position).toBe(10);
      expect(error.line).toBe(2);
      expect(error.column).toBe(5);
    });

    it("reports an unterminated string at its opening quote", () => {
      const error = expectError('node["abc];');
      expect(error.message).toBe("Unterminated string");
      expect(error.position).toBe(5);
    });

    it("reports an unexpected character", () => {
      expect(expectError("node#;").message).toBe("Unexpected character '#'");
    });

    it("requires at least one statement", () => {
      const error = expectError("");
      expect(error.message).toBe("Unexpected end of input, expected a statement");
      expect(error.expected).toContain("node");
      expect(error.expected).toContain("out");
    });

    it("returns an error instead of throwing for arbitrary input", () => {
      for (const input of ["]", "node[", "((", "->.", "out out;", "node(poly:);", "'", "[timeout:x];"]) {
        expect(parse(input).success).toBe(false);
      }
    });
  });
});
