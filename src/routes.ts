// HTTP Routes using Hono

import { Hono } from "hono";
import { compile } from "./compiler.js";
import { isDialectName, listDialects } from "./dialects/index.js";
import { UnsupportedDialectError } from "./errors.js";
import type { TranslateOptions } from "./translator.js";

// ============================================================================
// Types
// ============================================================================

export interface TranslateRequest {
  query: string;
  srid?: string;
}

export interface AppOptions {
  /** Defaults applied to every request */
  translate?: TranslateOptions;
}

function readTranslateRequest(body: unknown): TranslateRequest | string {
  if (typeof body !== "object" || body === null || !("query" in body)) {
    return "Missing or invalid 'query' field";
  }
  const { query } = body;
  if (typeof query !== "string" || query.trim() === "") {
    return "Missing or invalid 'query' field";
  }
  if (!("srid" in body) || body.srid === undefined) {
    return { query };
  }
  if (typeof body.srid !== "string" || !/^[0-9]+$/.test(body.srid)) {
    return "Invalid 'srid' field: expected a numeric EPSG code";
  }
  return { query, srid: body.srid };
}

// ============================================================================
// Create App
// ============================================================================

export function createApp(options: AppOptions = {}): Hono {
  const app = new Hono();
  const defaults = options.translate ?? {};

  // ============================================================================
  // Health Check
  // ============================================================================

  app.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.get("/dialects", (c) => {
    return c.json({ success: true, data: { dialects: listDialects() } });
  });

  // ============================================================================
  // Translate Endpoint
  // ============================================================================

  app.post("/translate/:dialect", async (c) => {
    const dialect = c.req.param("dialect");

    if (!isDialectName(dialect)) {
      const error = new UnsupportedDialectError(dialect, listDialects());
      return c.json(
        {
          success: false,
          error: { kind: error.kind, message: error.message },
        },
        404
      );
    }

    // Parse request body
    let body: unknown;
    try {
      body = await c.req.json<unknown>();
    } catch {
      return c.json(
        {
          success: false,
          error: { message: "Invalid JSON body" },
        },
        400
      );
    }

    const request = readTranslateRequest(body);
    if (typeof request === "string") {
      return c.json(
        {
          success: false,
          error: { message: request },
        },
        400
      );
    }

    const result = compile(request.query, dialect, {
      ...defaults,
      ...(request.srid !== undefined ? { srid: request.srid } : {}),
    });

    if (!result.success) {
      return c.json(result, 400);
    }

    return c.json({
      success: true,
      data: { sql: result.sql, statements: result.statements },
    });
  });

  return app;
}

// ============================================================================
// Server
// ============================================================================

export interface ServerOptions extends AppOptions {
  port?: number;
  host?: string;
}

export function createServer(options: ServerOptions = {}) {
  const { port = 3000, host = "localhost" } = options;
  const app = createApp(options);

  return {
    app,
    port,
    host,
    fetch: app.fetch,
  };
}
