// PostgreSQL / PostGIS dialect
//
// Elements live in `<kind>_by_id` and `<kind>_by_geom` views with tags in a
// jsonb column. Intermediate sets become CTEs.

import type { ElementKind } from "../bindings.js";
import { formatNumber } from "../format.js";
import {
  WGS84,
  escapeStandardLiteral,
  indent,
  stIntersects,
  type SqlDialect,
} from "./dialect.js";

function toStorage(geometry: string, srid: string): string {
  return srid === WGS84 ? geometry : `ST_Transform(${geometry}, ${srid})`;
}

function toWgs84(geometry: string, srid: string): string {
  return srid === WGS84 ? geometry : `ST_Transform(${geometry}, 4326)`;
}

function existsIn(relation: string, predicate: string): string {
  return [
    "EXISTS (",
    "    SELECT",
    "        1",
    "    FROM",
    `        ${relation}`,
    "    WHERE",
    indent(predicate, 2),
    ")",
  ].join("\n");
}

export const postgres: SqlDialect = {
  name: "postgres",
  views: {
    node: { lookup: "node_by_id", geometry: "node_by_geom" },
    way: { lookup: "way_by_id", geometry: "way_by_geom" },
    relation: { lookup: "relation_by_id", geometry: "relation_by_geom" },
    area: { lookup: "area_by_id", geometry: "area_by_geom" },
    nwr: { lookup: "nwr_by_id", geometry: "nwr_by_geom" },
  },
  materialization: "cte",
  areaIdOffset: 3600000000,

  escapeLiteral: escapeStandardLiteral,

  statementTimeout(milliseconds: number): string {
    return `SET statement_timeout = ${milliseconds};`;
  },

  tagExists(table: string, key: string): string {
    return `${table}.tags ? ${escapeStandardLiteral(key)}`;
  },

  tagValue(table: string, key: string): string {
    return `${table}.tags->>${escapeStandardLiteral(key)}`;
  },

  regexMatch(expression: string, pattern: string, negated: boolean, caseInsensitive: boolean): string {
    const operator = (negated ? "!~" : "~") + (caseInsensitive ? "*" : "");
    return `${expression} ${operator} ${pattern}`;
  },

  idPredicate(table: string, _kind: ElementKind | "nwr", ids: readonly number[]): string {
    return `${table}.id = ANY (ARRAY[${ids.join(", ")}])`;
  },

  envelope(south: number, west: number, north: number, east: number, srid: string): string {
    const corners = [west, south, east, north].map(formatNumber).join(", ");
    return toStorage(`ST_MakeEnvelope(${corners}, 4326)`, srid);
  },

  polygon(wkt: string, srid: string): string {
    return toStorage(`ST_GeomFromText(${escapeStandardLiteral(wkt)}, 4326)`, srid);
  },

  toWgs84,

  summarizeSet(): undefined {
    return undefined;
  },

  intersectsSet(table: string, relation: string): string {
    return existsIn(relation, stIntersects(`${relation}.geom`, `${table}.geom`));
  },

  withinDistanceOfSet(table: string, relation: string, meters: number, srid: string): string {
    const distance = [
      "ST_DWithin(",
      `    ${toWgs84(`${relation}.geom`, srid)}::geography,`,
      `    ${toWgs84(`${table}.geom`, srid)}::geography,`,
      `    ${formatNumber(meters)}`,
      ")",
    ].join("\n");
    return existsIn(relation, distance);
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
      "    parent.osm_type AS parent_type,",
      "    parent.id AS parent_id,",
      "    member.type AS type,",
      "    member.ref AS ref",
      "FROM",
      `    ${source} AS parent,`,
      "    jsonb_to_recordset(parent.members) AS member(ref bigint, role text, type text)",
      "WHERE",
      "    parent.osm_type = 'r'",
    ].join("\n");
  },
};
