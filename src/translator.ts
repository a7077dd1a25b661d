// Overpass QL → SQL Translator

import {
  BindingEnvironment,
  DEFAULT_SET,
  EMPTY_RELATION,
  RelationNames,
  type Binding,
  type ElementKind,
} from "./bindings.js";
import { KIND_CODES, WGS84, indent, stIntersects, type SqlDialect } from "./dialects/index.js";
import { FilterApplicabilityError } from "./errors.js";
import { formatNumber } from "./format.js";
import { formatOutput } from "./output.js";
import type {
  AreaFilter,
  AroundFilter,
  BboxFilter,
  EntityKind,
  Filter,
  OutStatement,
  PolyFilter,
  QueryStatement,
  RecurseDirection,
  RecurseStatement,
  Request,
  Selector,
  SelectorOperator,
  SelectorValue,
  SetStatement,
  Settings,
  UnionStatement,
} from "./parser.js";

// ============================================================================
// Types
// ============================================================================

export type StatementRole = "setup" | "output";

export interface SqlStatement {
  sql: string;
  /** `setup` statements prepare the session; each `output` returns one result set */
  role: StatementRole;
}

export interface TranslationResult {
  statements: SqlStatement[];
}

export interface TranslateOptions {
  /** SRID geometries are stored in */
  srid?: string;
  /** Seconds, used when the request sets no [timeout:...] */
  defaultTimeout?: number;
  /** Seconds, upper bound for any timeout */
  maxTimeout?: number;
}

export const DEFAULT_SRID = WGS84;
export const DEFAULT_TIMEOUT = 180;
export const MAX_TIMEOUT = 500;

interface Fragment {
  relation: string;
  sql: string;
}

export interface TranslationContext {
  dialect: SqlDialect;
  srid: string;
  defaultTimeout: number;
  maxTimeout: number;
  // Every set defined so far, in dependency order
  fragments: Fragment[];
  statements: SqlStatement[];
  // Relations whose extent has been stored for spatial predicates
  summarized: Set<string>;
}

const NWR_KINDS: ReadonlySet<ElementKind> = new Set<ElementKind>(["node", "way", "relation"]);

const SRID_PATTERN = /^[0-9]+$/;

// ============================================================================
// Translator
// ============================================================================

export class Translator {
  private ctx: TranslationContext;
  private names: RelationNames = new RelationNames();

  constructor(dialect: SqlDialect, options: TranslateOptions = {}) {
    const srid = options.srid ?? DEFAULT_SRID;
    if (!SRID_PATTERN.test(srid)) {
      throw new RangeError(`Invalid SRID '${srid}': expected a numeric EPSG code`);
    }

    this.ctx = {
      dialect,
      srid,
      defaultTimeout: options.defaultTimeout ?? DEFAULT_TIMEOUT,
      maxTimeout: options.maxTimeout ?? MAX_TIMEOUT,
      fragments: [],
      statements: [],
      summarized: new Set(),
    };
  }

  translate(request: Request): TranslationResult {
    this.ctx.fragments = [];
    this.ctx.statements = [];
    this.ctx.summarized = new Set();
    this.names = new RelationNames();

    const timeout = this.ctx.dialect.statementTimeout(this.timeoutSeconds(request.settings) * 1000);
    if (timeout !== undefined) {
      this.ctx.statements.push({ sql: timeout, role: "setup" });
    }

    const env = new BindingEnvironment();
    let hasOutput = false;

    for (const statement of request.statements) {
      if (statement.type === "out") {
        this.translateOut(statement, env);
        hasOutput = true;
      } else {
        this.translateStatement(statement, env);
      }
    }

    // A request without `out` still returns the default set
    if (!hasOutput) {
      this.translateOut({ type: "out", geometry: "none", detail: "body" }, env);
    }

    return { statements: this.ctx.statements };
  }

  private timeoutSeconds(settings: Settings): number {
    return Math.min(settings.timeout ?? this.ctx.defaultTimeout, this.ctx.maxTimeout);
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  private translateStatement(statement: SetStatement, env: BindingEnvironment): Binding {
    switch (statement.type) {
      case "query":
        return this.translateQuery(statement, env);
      case "union":
        return this.translateUnion(statement, env);
      case "recurse":
        return this.translateRecurse(statement, env);
    }
  }

  private translateQuery(query: QueryStatement, env: BindingEnvironment): Binding {
    const { dialect } = this.ctx;
    const kinds = kindsOf(query.kind);
    const input = query.input !== undefined ? env.resolve(query.input) : undefined;
    const predicates: string[] = [];
    let table: string;
    let resultKinds = kinds;

    const fromInput = input !== undefined && !readsAsContainment(query.kind, input);

    if (input !== undefined && fromInput) {
      table = this.relationOf(input);
      predicates.push(kindPredicate(table, query.kind));
      resultKinds = intersect(kinds, input.kinds);
    } else {
      const hasId = query.filters.some((filter) => filter.type === "id" || filter.type === "ids");
      const views = dialect.views[query.kind];
      table = hasId ? views.lookup : views.geometry;
    }

    for (const selector of query.selectors) {
      predicates.push(this.translateSelector(selector, table));
    }

    // `node.a` where `.a` holds only areas: elements inside those areas
    if (input !== undefined && !fromInput) {
      predicates.push(this.intersectsBinding(table, input));
    }

    for (const filter of query.filters) {
      predicates.push(this.translateFilter(filter, table, query.kind, env));
    }

    const lines = ["SELECT", `    ${table}.*`, "FROM", `    ${table}`];
    if (predicates.length > 0) {
      lines.push("WHERE", indent(predicates.join(" AND\n")));
    }

    const binding = this.addFragment(query.assign, lines.join("\n"), resultKinds);
    this.assign(env, query.assign, binding);
    return binding;
  }

  /**
   * Each branch sees the sets defined before the union and the default set
   * left by the branch before it, so `(way[x]; >;)` expands the ways. Named
   * sets a branch assigns stay hidden from its siblings and become visible
   * once the union closes. The union itself is the distinct combination of
   * every branch result.
   */
  private translateUnion(union: UnionStatement, env: BindingEnvironment): Binding {
    const results: Binding[] = [];
    const branches: BindingEnvironment[] = [];
    let current = env.default();

    for (const statement of union.statements) {
      const branch = env.clone();
      branch.setDefault(current);
      results.push(this.translateStatement(statement, branch));
      current = branch.default();
      branches.push(branch);
    }

    for (const branch of branches) {
      env.absorb(branch);
    }

    const kinds = new Set<ElementKind>();
    for (const result of results) {
      for (const kind of result.kinds) {
        kinds.add(kind);
      }
    }

    const parts = results.map((result) => `SELECT * FROM ${this.relationOf(result)}`);
    const sql = [
      "SELECT DISTINCT ON (osm_type, id)",
      "    *",
      "FROM (",
      indent(parts.join("\nUNION ALL\n")),
      ") AS t",
      "ORDER BY",
      "    osm_type, id",
    ].join("\n");

    const binding = this.addFragment(union.assign, sql, kinds);
    this.assign(env, union.assign, binding);
    return binding;
  }

  private translateRecurse(recurse: RecurseStatement, env: BindingEnvironment): Binding {
    const input = recurse.input !== undefined ? env.resolve(recurse.input) : env.default();
    const source = this.relationOf(input);
    const { sql, kinds } = this.recurseFrom(source, recurse.direction);
    const binding = this.addFragment(recurse.assign, sql, kinds);
    this.assign(env, recurse.assign, binding);
    return binding;
  }

  private recurseFrom(source: string, direction: RecurseDirection): { sql: string; kinds: ReadonlySet<ElementKind> } {
    const elements = this.ctx.dialect.views.nwr.lookup;

    switch (direction) {
      case "down":
        return { sql: this.oneLevel(elements, this.ctx.dialect.references(source), "down"), kinds: NWR_KINDS };
      case "up":
        return {
          sql: this.oneLevel(elements, this.ctx.dialect.references(elements), "up", source),
          kinds: new Set<ElementKind>(["way", "relation"]),
        };
      case "down-all":
        return { sql: this.closure(elements, source, "down"), kinds: NWR_KINDS };
      case "up-all":
        return { sql: this.closure(elements, source, "up"), kinds: NWR_KINDS };
    }
  }

  private translateOut(out: OutStatement, env: BindingEnvironment): void {
    const input = out.input !== undefined ? env.resolve(out.input) : env.default();
    const relation = this.relationOf(input);
    const projection = formatOutput(out, relation, this.ctx.dialect, this.ctx.srid);

    if (this.ctx.dialect.materialization === "cte") {
      const ctes = this.ctx.fragments.map(
        (fragment) => `${fragment.relation} AS (\n${indent(fragment.sql)}\n)`
      );
      this.ctx.statements.push({
        sql: `WITH\n${ctes.join(",\n")}\n${projection}\n;`,
        role: "output",
      });
    } else {
      this.ctx.statements.push({ sql: `${projection}\n;`, role: "output" });
    }
  }

  // ==========================================================================
  // Selectors and filters
  // ==========================================================================

  private translateSelector(selector: Selector, table: string): string {
    const { dialect } = this.ctx;
    const exists = dialect.tagExists(table, selector.key);
    const predicate =
      selector.operator === undefined || selector.value === undefined
        ? exists
        : this.comparison(selector.operator, selector.value, selector.caseInsensitive === true, table, selector.key);

    return selector.not ? `NOT ${predicate}` : predicate;
  }

  private comparison(
    operator: SelectorOperator,
    value: SelectorValue,
    caseInsensitive: boolean,
    table: string,
    key: string
  ): string {
    const { dialect } = this.ctx;
    const exists = dialect.tagExists(table, key);
    const tag = dialect.tagValue(table, key);
    const literal = dialect.escapeLiteral(value.type === "string" ? value.value : value.raw);

    switch (operator) {
      case "=":
        return `(${exists} AND ${tag} = ${literal})`;
      case "!=":
        return `(NOT ${exists} OR ${tag} != ${literal})`;
      case "~":
        return `(${exists} AND ${dialect.regexMatch(tag, literal, false, caseInsensitive)})`;
      case "!~":
        return `(NOT ${exists} OR ${dialect.regexMatch(tag, literal, true, caseInsensitive)})`;
    }
  }

  private translateFilter(filter: Filter, table: string, kind: EntityKind, env: BindingEnvironment): string {
    const { dialect } = this.ctx;

    switch (filter.type) {
      case "bbox":
        return this.translateBbox(filter, table);
      case "poly":
        return this.translatePoly(filter, table);
      case "id":
        return dialect.idPredicate(table, kind, [filter.id]);
      case "ids":
        return dialect.idPredicate(table, kind, filter.ids);
      case "area":
        return this.translateArea(filter, table, env);
      case "around":
        return this.translateAround(filter, table, env);
    }
  }

  private translateBbox(filter: BboxFilter, table: string): string {
    const { south, west, north, east } = filter;
    if (south > north) {
      throw new FilterApplicabilityError(
        "bbox",
        `Bounding box south edge ${formatNumber(south)} is north of its north edge ${formatNumber(north)}`
      );
    }
    if (south < -90 || north > 90) {
      throw new FilterApplicabilityError("bbox", "Bounding box latitudes must lie within -90 and 90");
    }

    const envelope = this.ctx.dialect.envelope(south, west, north, east, this.ctx.srid);
    return stIntersects(envelope, `${table}.geom`);
  }

  private translatePoly(filter: PolyFilter, table: string): string {
    const values = filter.coordinates.trim().split(/\s+/).filter((value) => value !== "");

    if (values.some((value) => !/^-?[0-9]+(\.[0-9]+)?$/.test(value))) {
      throw new FilterApplicabilityError("poly", "Polygon coordinates must be numbers");
    }
    if (values.length % 2 !== 0) {
      throw new FilterApplicabilityError("poly", "Polygon coordinates must come in latitude/longitude pairs");
    }
    if (values.length < 6) {
      throw new FilterApplicabilityError("poly", "Polygon needs at least 3 points");
    }

    // Input is "lat lon lat lon ...", WKT wants "lon lat"
    const points: string[] = [];
    for (let i = 0; i < values.length; i += 2) {
      points.push(`${values[i + 1]} ${values[i]}`);
    }
    if (points[0] !== points[points.length - 1]) {
      points.push(points[0]);
    }

    const polygon = this.ctx.dialect.polygon(`POLYGON((${points.join(", ")}))`, this.ctx.srid);
    return stIntersects(polygon, `${table}.geom`);
  }

  private translateArea(filter: AreaFilter, table: string, env: BindingEnvironment): string {
    const name = filter.input ?? DEFAULT_SET;
    const binding = env.resolve(name);

    if (!binding.kinds.has("area")) {
      throw new FilterApplicabilityError(
        "area",
        `(area${filter.input !== undefined ? `.${filter.input}` : ""}) needs a set holding areas, ` +
          `but '.${name}' was not produced by an area query`
      );
    }

    return this.intersectsBinding(table, binding);
  }

  private translateAround(filter: AroundFilter, table: string, env: BindingEnvironment): string {
    const binding = env.resolve(filter.input ?? DEFAULT_SET);
    const relation = this.relationOf(binding);
    this.summarize(relation);
    return this.ctx.dialect.withinDistanceOfSet(table, relation, filter.radius, this.ctx.srid);
  }

  private intersectsBinding(table: string, binding: Binding): string {
    const relation = this.relationOf(binding);
    this.summarize(relation);
    return this.ctx.dialect.intersectsSet(table, relation);
  }

  // ==========================================================================
  // Traversal
  // ==========================================================================

  /**
   * Elements one step away from the input: the nodes and members it references
   * (down) or the ways and relations referencing it (up).
   */
  private oneLevel(elements: string, references: string, direction: "up" | "down", source?: string): string {
    const match =
      direction === "down"
        ? ["refs.type = element.osm_type AND", "refs.ref = element.id"]
        : ["refs.parent_type = element.osm_type AND", "refs.parent_id = element.id"];

    const from = ["FROM", "    (", indent(references, 2), "    ) AS refs"];
    if (direction === "up" && source !== undefined) {
      from.push(
        `    JOIN ${source} AS child ON`,
        "        child.osm_type = refs.type AND",
        "        child.id = refs.ref"
      );
    }

    return [
      "SELECT",
      "    element.*",
      "FROM",
      `    ${elements} AS element`,
      "WHERE",
      "    EXISTS (",
      "        SELECT",
      "            1",
      indent(from.join("\n"), 2),
      "        WHERE",
      indent(match.join("\n"), 3),
      "    )",
    ].join("\n");
  }

  /**
   * Transitive closure, including the input itself.
   */
  private closure(elements: string, source: string, direction: "up" | "down"): string {
    const references = this.ctx.dialect.references(elements);
    const [select, join] =
      direction === "down"
        ? [
            ["refs.type,", "refs.ref"],
            ["refs.parent_type = closure.osm_type AND", "refs.parent_id = closure.id"],
          ]
        : [
            ["refs.parent_type,", "refs.parent_id"],
            ["refs.type = closure.osm_type AND", "refs.ref = closure.id"],
          ];

    return [
      "WITH RECURSIVE closure(osm_type, id) AS (",
      "    SELECT",
      "        osm_type,",
      "        id",
      "    FROM",
      `        ${source}`,
      "    UNION",
      "    SELECT",
      indent(select.join("\n"), 2),
      "    FROM",
      "        closure",
      "        JOIN (",
      indent(references, 3),
      "        ) AS refs ON",
      indent(join.join("\n"), 3),
      ")",
      "SELECT",
      "    element.*",
      "FROM",
      `    ${elements} AS element`,
      "WHERE",
      "    EXISTS (",
      "        SELECT",
      "            1",
      "        FROM",
      "            closure",
      "        WHERE",
      "            closure.osm_type = element.osm_type AND",
      "            closure.id = element.id",
      "    )",
    ].join("\n");
  }

  // ==========================================================================
  // Sets
  // ==========================================================================

  private addFragment(assign: string | undefined, sql: string, kinds: ReadonlySet<ElementKind>): Binding {
    const relation = this.names.next(assign === undefined || assign === DEFAULT_SET ? "default" : assign);
    this.emit(relation, sql);
    return { relation, kinds };
  }

  private emit(relation: string, sql: string): void {
    this.ctx.fragments.push({ relation, sql });

    if (this.ctx.dialect.materialization === "temp-table") {
      this.ctx.statements.push({
        sql: `CREATE OR REPLACE TEMP TABLE ${relation} AS\n${sql}\n;`,
        role: "setup",
      });
    }
  }

  /**
   * Relation holding a binding. The set that exists before any statement has
   * run is created on first use.
   */
  private relationOf(binding: Binding): string {
    if (binding.empty && !this.ctx.fragments.some((fragment) => fragment.relation === EMPTY_RELATION)) {
      const sql = ["SELECT", "    *", "FROM", `    ${this.ctx.dialect.views.nwr.lookup}`, "WHERE", "    false"];
      this.emit(EMPTY_RELATION, sql.join("\n"));
    }
    return binding.relation;
  }

  private summarize(relation: string): void {
    if (this.ctx.summarized.has(relation)) return;

    const statement = this.ctx.dialect.summarizeSet(relation);
    if (statement !== undefined) {
      this.ctx.statements.push({ sql: statement, role: "setup" });
    }
    this.ctx.summarized.add(relation);
  }

  private assign(env: BindingEnvironment, name: string | undefined, binding: Binding): void {
    if (name === undefined) {
      env.setDefault(binding);
    } else {
      env.define(name, binding);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function kindsOf(kind: EntityKind): ReadonlySet<ElementKind> {
  return kind === "nwr" ? NWR_KINDS : new Set<ElementKind>([kind]);
}

function intersect(a: ReadonlySet<ElementKind>, b: ReadonlySet<ElementKind>): ReadonlySet<ElementKind> {
  return new Set([...a].filter((kind) => b.has(kind)));
}

function kindPredicate(table: string, kind: EntityKind): string {
  if (kind === "nwr") {
    return `${table}.osm_type IN ('n', 'w', 'r')`;
  }
  return `${table}.osm_type = '${KIND_CODES[kind]}'`;
}

// A set of areas can only be narrowed to other kinds spatially
function readsAsContainment(kind: EntityKind, input: Binding): boolean {
  return kind !== "area" && input.kinds.size > 0 && [...input.kinds].every((k) => k === "area");
}

// Convenience function
export function translate(request: Request, dialect: SqlDialect, options: TranslateOptions = {}): TranslationResult {
  return new Translator(dialect, options).translate(request);
}
