// Configuration resolution for the CLI and server
//
// Command-line options win over environment variables, which win over the
// built-in defaults.

import { listDialects } from "./dialects/index.js";
import { DEFAULT_SRID, DEFAULT_TIMEOUT } from "./translator.js";

// ============================================================================
// Types
// ============================================================================

export interface ConfigOptions {
  dialect?: string;
  srid?: string;
  timeout?: string;
  json?: boolean;
  port?: string;
  host?: string;
}

export type Environment = Record<string, string | undefined>;

export interface Config {
  dialect: string;
  srid: string;
  defaultTimeout: number;
  json: boolean;
  port: number;
  host: string;
}

export const DEFAULT_DIALECT = "postgres";
export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = "localhost";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * The dialect is returned as given; checking it against the registry is left
 * to the caller so the failure is reported as an unsupported dialect.
 */
export function resolveConfig(options: ConfigOptions, env: Environment): Config {
  const dialect = options.dialect ?? env.OVERPASS_SQL_DIALECT ?? DEFAULT_DIALECT;

  const srid = options.srid ?? env.OVERPASS_SQL_SRID ?? DEFAULT_SRID;
  if (!/^[0-9]+$/.test(srid)) {
    throw new ConfigError(`Invalid SRID '${srid}': expected a numeric EPSG code`);
  }

  const timeout = options.timeout ?? env.OVERPASS_SQL_TIMEOUT;
  const defaultTimeout = timeout === undefined ? DEFAULT_TIMEOUT : parsePositiveInteger(timeout, "timeout");

  const port = options.port ?? env.PORT;
  const resolvedPort = port === undefined ? DEFAULT_PORT : parsePositiveInteger(port, "port");
  if (resolvedPort > 65535) {
    throw new ConfigError(`Invalid port '${port}': must be at most 65535`);
  }

  return {
    dialect,
    srid,
    defaultTimeout,
    json: options.json ?? false,
    port: resolvedPort,
    host: options.host ?? DEFAULT_HOST,
  };
}

function parsePositiveInteger(value: string, name: string): number {
  if (!/^[0-9]+$/.test(value) || parseInt(value, 10) === 0) {
    throw new ConfigError(`Invalid ${name} '${value}': expected a positive integer`);
  }
  return parseInt(value, 10);
}

export function describeDialects(): string {
  return listDialects().join(", ");
}
