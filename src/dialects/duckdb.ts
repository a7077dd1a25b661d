// DuckDB dialect (spatial extension)
//
// One table or view per kind, named after the kind. Rows carry a `bbox`
// struct and an `id_range` partition column. Intermediate sets become temp
// tables, and each set used as a spatial reference gets its extent stored in
// a session variable so later scans can skip rows outside it.

import type { ElementKind } from "../bindings.js";
import { formatNumber } from "../format.js";
import {
  WGS84,
  areaSource,
  escapeStandardLiteral,
  stIntersects,
  type SqlDialect,
} from "./dialect.js";

const AREA_ID_OFFSET = 3600000000;

/** Width of an `id_range` partition, in native element ids */
export const ID_RANGE_SIZE = 10000000;

// Meters per degree at the equator
const METERS_PER_DEGREE = 111320.0;

function toStorage(geometry: string, srid: string): string {
  return srid === WGS84 ? geometry : `ST_Transform(${geometry}, 'EPSG:4326', 'EPSG:${srid}')`;
}

function toWgs84(geometry: string, srid: string): string {
  return srid === WGS84 ? geometry : `ST_Transform(${geometry}, 'EPSG:${srid}', 'EPSG:4326')`;
}

function extentVariable(relation: string): string {
  return `getvariable('${relation}_bbox')`;
}

export function idRanges(kind: ElementKind | "nwr", ids: readonly number[]): number[] {
  const ranges = new Set<number>();
  for (const id of ids) {
    const nativeId = kind === "area" ? areaSource(id, AREA_ID_OFFSET).id : id;
    ranges.add(Math.floor(nativeId / ID_RANGE_SIZE));
  }
  return [...ranges].sort((a, b) => a - b);
}

export const duckdb: SqlDialect = {
  name: "duckdb",
  views: {
    node: { lookup: "node", geometry: "node" },
    way: { lookup: "way", geometry: "way" },
    relation: { lookup: "relation", geometry: "relation" },
    area: { lookup: "area", geometry: "area" },
    nwr: { lookup: "nwr", geometry: "nwr" },
  },
  materialization: "temp-table",
  areaIdOffset: AREA_ID_OFFSET,

  escapeLiteral: escapeStandardLiteral,

  statementTimeout(): undefined {
    return undefined;
  },

  tagExists(table: string, key: string): string {
    return `(${table}.tags->>${escapeStandardLiteral(key)}) IS NOT NULL`;
  },

  tagValue(table: string, key: string): string {
    return `(${table}.tags->>${escapeStandardLiteral(key)})`;
  },

  regexMatch(expression: string, pattern: string, negated: boolean, caseInsensitive: boolean): string {
    const options = caseInsensitive ? ", 'i'" : "";
    return `${negated ? "NOT " : ""}regexp_matches(${expression}, ${pattern}${options})`;
  },

  idPredicate(table: string, kind: ElementKind | "nwr", ids: readonly number[]): string {
    const matches = ids.map((id) => `${table}.id = ${id}`).join(" OR ");
    return `(${matches}) AND ${table}.id_range IN (${idRanges(kind, ids).join(", ")})`;
  },

  envelope(south: number, west: number, north: number, east: number, srid: string): string {
    const corners = [west, south, east, north].map(formatNumber).join(", ");
    return toStorage(`ST_MakeEnvelope(${corners})`, srid);
  },

  polygon(wkt: string, srid: string): string {
    return toStorage(`ST_GeomFromText(${escapeStandardLiteral(wkt)})`, srid);
  },

  toWgs84,

  summarizeSet(relation: string): string {
    return [
      `SET VARIABLE ${relation}_bbox = (`,
      "    SELECT",
      "        STRUCT_PACK(",
      "            xmin := min(bbox.xmin),",
      "            ymin := min(bbox.ymin),",
      "            xmax := max(bbox.xmax),",
      "            ymax := max(bbox.ymax),",
      "            geom := ST_Union_Agg(geom)",
      "        )",
      "    FROM",
      `        ${relation}`,
      ");",
    ].join("\n");
  },

  intersectsSet(table: string, relation: string): string {
    const extent = extentVariable(relation);
    return [
      `${table}.bbox.xmin <= ${extent}.xmax AND`,
      `${table}.bbox.xmax >= ${extent}.xmin AND`,
      `${table}.bbox.ymin <= ${extent}.ymax AND`,
      `${table}.bbox.ymax >= ${extent}.ymin AND`,
      stIntersects(`${extent}.geom`, `${table}.geom`),
    ].join("\n");
  },

  // Distance in degrees, scaled at the equator
  withinDistanceOfSet(table: string, relation: string, meters: number, srid: string): string {
    const extent = extentVariable(relation);
    return [
      "ST_DWithin(",
      `    ${toWgs84(`${extent}.geom`, srid)},`,
      `    ${toWgs84(`${table}.geom`, srid)},`,
      `    ${formatNumber(meters)} / ${METERS_PER_DEGREE.toFixed(1)}`,
      ")",
    ].join("\n");
  },

  references(source: string): string {
    return [
      "SELECT",
      "    parent.osm_type AS parent_type,",
      "    parent.id AS parent_id,",
      "    'n' AS type,",
      "    unnest(parent.nodes) AS ref",
      "FROM",
      `    ${source} AS parent`,
      "WHERE",
      "    parent.osm_type = 'w'",
      "UNION ALL",
      "SELECT",
      "    members.parent_type,",
      "    members.parent_id,",
      "    members.member.type AS type,",
      "    members.member.ref AS ref",
      "FROM (",
      "    SELECT",
      "        parent.osm_type AS parent_type,",
      "        parent.id AS parent_id,",
      "        unnest(parent.members) AS member",
      "    FROM",
      `        ${source} AS parent`,
      "    WHERE",
      "        parent.osm_type = 'r'",
      ") AS members",
    ].join("\n");
  },
};
