// Dialect registry

import { UnsupportedDialectError } from "../errors.js";
import type { DialectName, SqlDialect } from "./dialect.js";
import { duckdb } from "./duckdb.js";
import { postgres } from "./postgres.js";

export type { DialectName, Materialization, SqlDialect, ViewPair } from "./dialect.js";
export { KIND_CODES, WGS84, areaSource, deriveAreaId, indent, stIntersects } from "./dialect.js";
export { duckdb, postgres };

const DIALECTS: Record<DialectName, SqlDialect> = {
  postgres,
  duckdb,
};

export function listDialects(): DialectName[] {
  return ["postgres", "duckdb"];
}

export function isDialectName(name: string): name is DialectName {
  return listDialects().some((dialect) => dialect === name);
}

/**
 * Look up a dialect by name. Names are matched exactly: `Postgres` is not
 * `postgres`.
 */
export function getDialect(name: string): SqlDialect {
  if (!isDialectName(name)) {
    throw new UnsupportedDialectError(name, listDialects());
  }
  return DIALECTS[name];
}
