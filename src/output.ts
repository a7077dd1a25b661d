// Output projection

import type { SqlDialect } from "./dialects/index.js";
import type { DetailLevel, GeometryMode, OutStatement } from "./parser.js";

const KIND_NAME =
  "CASE osm_type WHEN 'n' THEN 'node' WHEN 'w' THEN 'way' WHEN 'r' THEN 'relation' WHEN 'a' THEN 'area' END";

const DETAIL_COLUMNS: Record<DetailLevel, string[]> = {
  ids: ["id", "osm_type"],
  skel: ["id", "osm_type", `${KIND_NAME} AS type`],
  body: ["id", "osm_type", `${KIND_NAME} AS type`, "tags", "nodes", "members"],
  tags: ["id", "osm_type", `${KIND_NAME} AS type`, "tags", "nodes", "members"],
  meta: ["id", "osm_type", `${KIND_NAME} AS type`, "tags", "nodes", "members", "version", "created"],
};

/**
 * Select-list for an `out` statement. Geometry always comes back in WGS84.
 */
export function outputColumns(
  detail: DetailLevel,
  geometry: GeometryMode,
  dialect: SqlDialect,
  srid: string
): string[] {
  const columns = [...DETAIL_COLUMNS[detail]];
  const geom = dialect.toWgs84("geom", srid);

  switch (geometry) {
    case "none":
      break;
    case "geom":
      columns.push(geom === "geom" ? "geom" : `${geom} AS geom`);
      break;
    case "center":
      columns.push(`ST_Centroid(${geom}) AS center`);
      break;
    case "bb":
      columns.push(`ST_Envelope(${geom}) AS bounds`);
      break;
  }

  return columns;
}

export function formatOutput(out: OutStatement, relation: string, dialect: SqlDialect, srid: string): string {
  const columns = outputColumns(out.detail, out.geometry, dialect, srid);
  return [
    "SELECT",
    columns.map((column) => `    ${column}`).join(",\n"),
    "FROM",
    `    ${relation}`,
  ].join("\n");
}
