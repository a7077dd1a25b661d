// SQL Dialect Descriptor
//
// Everything the translator knows about a target database goes through this
// interface: view names, tag access, spatial functions, materialization.

import type { ElementKind } from "../bindings.js";
import type { EntityKind } from "../parser.js";

// ============================================================================
// Types
// ============================================================================

export type DialectName = "postgres" | "duckdb";

export interface ViewPair {
  /** View to read when elements are addressed by id */
  lookup: string;
  /** View to read for everything else */
  geometry: string;
}

/**
 * How intermediate sets are held:
 * - `cte`: each output re-declares every set so far in one WITH statement
 * - `temp-table`: each set is created once, outputs read the tables
 */
export type Materialization = "cte" | "temp-table";

export interface SqlDialect {
  readonly name: DialectName;
  readonly views: Readonly<Record<EntityKind, ViewPair>>;
  readonly materialization: Materialization;
  /** Added to a relation id to form the id of the area derived from it */
  readonly areaIdOffset: number;

  escapeLiteral(value: string): string;

  /** Statement that bounds execution time, or undefined when unsupported */
  statementTimeout(milliseconds: number): string | undefined;

  tagExists(table: string, key: string): string;
  tagValue(table: string, key: string): string;
  regexMatch(expression: string, pattern: string, negated: boolean, caseInsensitive: boolean): string;

  idPredicate(table: string, kind: ElementKind | "nwr", ids: readonly number[]): string;

  /** Envelope given in WGS84, returned in the storage SRID */
  envelope(south: number, west: number, north: number, east: number, srid: string): string;
  /** WKT given in WGS84, returned in the storage SRID */
  polygon(wkt: string, srid: string): string;
  /** Geometry in the storage SRID, returned in WGS84 */
  toWgs84(geometry: string, srid: string): string;

  /** Statement that precomputes what spatial predicates on `relation` read */
  summarizeSet(relation: string): string | undefined;
  intersectsSet(table: string, relation: string): string;
  withinDistanceOfSet(table: string, relation: string, meters: number, srid: string): string;

  /** Rows (parent_type, parent_id, type, ref) for every way node and relation member of `source` */
  references(source: string): string;
}

// ============================================================================
// Shared helpers
// ============================================================================

export const WGS84 = "4326";

export const KIND_CODES: Record<ElementKind, string> = {
  node: "n",
  way: "w",
  relation: "r",
  area: "a",
};

export function indent(sql: string, depth: number = 1): string {
  const pad = "    ".repeat(depth);
  return sql
    .split("\n")
    .map((line) => (line ? pad + line : line))
    .join("\n");
}

export function escapeStandardLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function stIntersects(a: string, b: string): string {
  return `ST_Intersects(\n    ${a},\n    ${b}\n)`;
}

/**
 * Id of the element an area was derived from: ways keep their id,
 * relations are shifted by the offset.
 */
export function areaSource(areaId: number, offset: number): { kind: "way" | "relation"; id: number } {
  return areaId >= offset ? { kind: "relation", id: areaId - offset } : { kind: "way", id: areaId };
}

export function deriveAreaId(kind: "way" | "relation", id: number, offset: number): number {
  return kind === "relation" ? id + offset : id;
}
