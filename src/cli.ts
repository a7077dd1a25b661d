#!/usr/bin/env node

import { Command } from "commander";
import { serve } from "@hono/node-server";
import {
  compile,
  createServer,
  formatDiagnostic,
  getDialect,
  OverpassSqlError,
  VERSION,
} from "./index.js";
import { ConfigError, describeDialects, resolveConfig, type Config, type ConfigOptions } from "./config.js";

const program = new Command();

program
  .name("overpass-sql")
  .description("Compile Overpass QL queries to SQL for PostgreSQL/PostGIS or DuckDB")
  .version(VERSION)
  .enablePositionalOptions();

function loadConfig(options: ConfigOptions): Config {
  try {
    return resolveConfig(options, process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

// ============================================================================
// Default - Compile standard input
// ============================================================================

program
  .argument("[dialect]", `SQL dialect (${describeDialects()})`)
  .option("-s, --srid <srid>", "SRID of the stored geometries")
  .option("--timeout <seconds>", "Statement timeout when the query sets none")
  .option("--json", "Print the compile result as JSON")
  .action(async (dialect: string | undefined, options: { srid?: string; timeout?: string; json?: boolean }) => {
    const config = loadConfig({ dialect, ...options });

    // Reject the dialect before waiting on input
    try {
      getDialect(config.dialect);
    } catch (err) {
      if (err instanceof OverpassSqlError) {
        console.error(formatDiagnostic({ kind: err.kind, message: err.message }));
        process.exit(1);
      }
      throw err;
    }

    const query = await readStdin();
    const result = compile(query, config.dialect, {
      srid: config.srid,
      defaultTimeout: config.defaultTimeout,
    });

    if (!result.success) {
      if (config.json) {
        console.log(JSON.stringify(result, null, 2));
      }
      console.error(formatDiagnostic(result.error));
      process.exit(1);
    }

    console.log(config.json ? JSON.stringify(result, null, 2) : result.sql);
  });

// ============================================================================
// serve - Start the HTTP translation service
// ============================================================================

program
  .command("serve")
  .description("Start the HTTP translation service")
  .option("-p, --port <port>", "Port to listen on")
  .option("-H, --host <host>", "Host to bind to")
  .option("-s, --srid <srid>", "SRID of the stored geometries")
  .action((options: { port?: string; host?: string; srid?: string }) => {
    const config = loadConfig(options);
    const { app, port, host } = createServer({
      port: config.port,
      host: config.host,
      translate: { srid: config.srid, defaultTimeout: config.defaultTimeout },
    });

    console.log(`Overpass SQL Server v${VERSION}`);
    console.log(`Endpoint: http://${host}:${port}`);
    console.log(`SRID: ${config.srid}`);
    console.log("Routes:");
    console.log("  POST /translate/:dialect  - Compile a query");
    console.log("  GET  /dialects            - Supported dialects");
    console.log("  GET  /health              - Health check");

    serve({
      fetch: app.fetch,
      port,
      hostname: host,
    });

    process.on("SIGINT", () => {
      console.log("\nShutting down...");
      process.exit(0);
    });

    process.on("SIGTERM", () => {
      console.log("\nShutting down...");
      process.exit(0);
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
