// Overpass SQL - Entry Point

export { parse, Parser } from "./parser.js";
export type {
  Request,
  Settings,
  Statement,
  SetStatement,
  QueryStatement,
  UnionStatement,
  RecurseStatement,
  OutStatement,
  EntityKind,
  Selector,
  SelectorOperator,
  SelectorValue,
  Filter,
  BboxFilter,
  PolyFilter,
  IdFilter,
  IdListFilter,
  AreaFilter,
  AroundFilter,
  RecurseDirection,
  GeometryMode,
  DetailLevel,
  ParseResult,
  ParseError,
} from "./parser.js";

export { format } from "./format.js";

export { BindingEnvironment, RelationNames, EMPTY_BINDING } from "./bindings.js";
export type { Binding, ElementKind } from "./bindings.js";

export { getDialect, listDialects, isDialectName, postgres, duckdb, areaSource, deriveAreaId } from "./dialects/index.js";
export type { DialectName, SqlDialect, ViewPair, Materialization } from "./dialects/index.js";

export { translate, Translator, DEFAULT_SRID, DEFAULT_TIMEOUT, MAX_TIMEOUT } from "./translator.js";
export type { SqlStatement, StatementRole, TranslationResult, TranslateOptions } from "./translator.js";

export { outputColumns } from "./output.js";

export { compile, toSql, formatDiagnostic } from "./compiler.js";
export type { CompileResult, CompileError, CompileResponse } from "./compiler.js";

export {
  OverpassSqlError,
  QuerySyntaxError,
  UnboundNameError,
  UnsupportedDialectError,
  FilterApplicabilityError,
} from "./errors.js";
export type { ErrorKind } from "./errors.js";

export { createApp, createServer } from "./routes.js";
export type { TranslateRequest, AppOptions, ServerOptions } from "./routes.js";

export { resolveConfig, ConfigError } from "./config.js";
export type { Config, ConfigOptions } from "./config.js";

export const VERSION = "0.1.0";
