import { describe, it, expect } from "vitest";
import { toSql } from "../src/compiler.js";
import { createApp, createServer } from "../src/routes.js";

function post(body: string) {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  };
}

describe("Routes", () => {
  const app = createApp();

  describe("GET /health", () => {
    it("reports ok", async () => {
      const res = await app.request("/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "ok" });
    });
  });

  describe("GET /dialects", () => {
    it("lists the supported dialects", async () => {
      const res = await app.request("/dialects");
      expect(await res.json()).toEqual({ success: true, data: { dialects: ["postgres", "duckdb"] } });
    });
  });

  describe("POST /translate/:dialect", () => {
    it("compiles a query", async () => {
      const res = await app.request("/translate/duckdb", post(JSON.stringify({ query: "node(1);out ids;" })));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        data: {
          sql: toSql("node(1);out ids;", "duckdb"),
          statements: [
            { sql: expect.stringContaining("CREATE OR REPLACE TEMP TABLE _default AS"), role: "setup" },
            { sql: "SELECT\n    id,\n    osm_type\nFROM\n    _default\n;", role: "output" },
          ],
        },
      });
    });

    it("applies the SRID from the body", async () => {
      const res = await app.request(
        "/translate/postgres",
        post(JSON.stringify({ query: "node;out geom;", srid: "3857" }))
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { sql: expect.stringContaining("    ST_Transform(geom, 4326) AS geom\n") },
      });
    });

    it("applies the app defaults", async () => {
      const configured = createApp({ translate: { defaultTimeout: 10 } });
      const res = await configured.request("/translate/postgres", post(JSON.stringify({ query: "node;" })));

      expect(await res.json()).toMatchObject({
        data: { sql: expect.stringMatching(/^SET statement_timeout = 10000;\n/) },
      });
    });

    it("returns 404 for an unsupported dialect", async () => {
      const res = await app.request("/translate/mysql", post(JSON.stringify({ query: "node;" })));

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: {
          kind: "unsupported-dialect",
          message: "Unsupported SQL dialect: 'mysql'. Expected one of: postgres, duckdb",
        },
      });
    });

    it("returns 400 for invalid JSON", async () => {
      const res = await app.request("/translate/postgres", post("{"));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ success: false, error: { message: "Invalid JSON body" } });
    });

    it("returns 400 when the query is missing", async () => {
      const res = await app.request("/translate/postgres", post(JSON.stringify({ srid: "4326" })));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ success: false, error: { message: "Missing or invalid 'query' field" } });
    });

    it("returns 400 for a non-numeric SRID", async () => {
      const res = await app.request(
        "/translate/postgres",
        post(JSON.stringify({ query: "node;", srid: "abc" }))
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: { message: "Invalid 'srid' field: expected a numeric EPSG code" },
      });
    });

    it("returns 400 with the compile error", async () => {
      const res = await app.request("/translate/postgres", post(JSON.stringify({ query: "node" })));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: {
          kind: "syntax",
          message: "Expected ';', got end of input",
          position: 4,
          line: 1,
          column: 5,
          expected: ["';'"],
        },
      });
    });
  });
});

describe("createServer", () => {
  it("uses the default port and host", () => {
    const server = createServer();
    expect(server.port).toBe(3000);
    expect(server.host).toBe("localhost");
  });
});
