// Overpass QL Printer
//
// Renders a request back to query text. Parsing the output yields an equal
// request, so the printer doubles as a canonical form for queries.

import type {
  Filter,
  OutStatement,
  RecurseDirection,
  Request,
  Selector,
  SelectorValue,
  Settings,
  Statement,
} from "./parser.js";

const RECURSE_OPERATORS: Record<RecurseDirection, string> = {
  up: "<",
  "up-all": "<<",
  down: ">",
  "down-all": ">>",
};

export function format(request: Request): string {
  const lines: string[] = [];

  const settings = formatSettings(request.settings);
  if (settings) {
    lines.push(settings);
  }

  for (const statement of request.statements) {
    lines.push(formatStatement(statement) + ";");
  }

  return lines.join("\n");
}

/**
 * Numbers as the tokenizer reads them: never in exponent notation.
 */
export function formatNumber(value: number): string {
  const text = String(value);
  const match = /^-?\d(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }
  const decimals = (match[1] ?? "").length - Number(match[2]);
  return value.toFixed(Math.max(0, Math.min(100, decimals)));
}

export function quote(value: string): string {
  const delimiter = value.includes('"') && !value.includes("'") ? "'" : '"';
  return delimiter + value.split(delimiter).join("\\" + delimiter) + delimiter;
}

function formatSettings(settings: Settings): string {
  let text = "";
  if (settings.format !== undefined) {
    text += `[out:${settings.format}]`;
  }
  if (settings.timeout !== undefined) {
    text += `[timeout:${settings.timeout}]`;
  }
  return text ? text + ";" : "";
}

function formatStatement(statement: Statement): string {
  switch (statement.type) {
    case "query": {
      const kind = statement.kind === "relation" ? "rel" : statement.kind;
      return (
        kind +
        formatInput(statement.input) +
        statement.selectors.map(formatSelector).join("") +
        statement.filters.map(formatFilter).join("") +
        formatAssign(statement.assign)
      );
    }

    case "union": {
      const inner = statement.statements.map((s) => formatStatement(s) + ";").join(" ");
      return `(${inner})${formatAssign(statement.assign)}`;
    }

    case "recurse": {
      const input = statement.input !== undefined ? `.${statement.input} ` : "";
      return input + RECURSE_OPERATORS[statement.direction] + formatAssign(statement.assign);
    }

    case "out":
      return formatOut(statement);
  }
}

function formatSelector(selector: Selector): string {
  let text = "[";
  if (selector.not) {
    text += "!";
  }
  text += quote(selector.key);

  if (selector.operator !== undefined && selector.value !== undefined) {
    text += selector.operator + formatValue(selector.value);
    if (selector.caseInsensitive) {
      text += ",i";
    }
  }

  return text + "]";
}

function formatValue(value: SelectorValue): string {
  return value.type === "number" ? value.raw : quote(value.value);
}

function formatFilter(filter: Filter): string {
  switch (filter.type) {
    case "bbox":
      return `(${[filter.south, filter.west, filter.north, filter.east].map(formatNumber).join(",")})`;
    case "poly":
      return `(poly:${quote(filter.coordinates)})`;
    case "id":
      return `(${filter.id})`;
    case "ids":
      return `(id:${filter.ids.join(",")})`;
    case "area":
      return `(area${formatInput(filter.input)})`;
    case "around":
      return `(around${formatInput(filter.input)}:${formatNumber(filter.radius)})`;
  }
}

function formatOut(statement: OutStatement): string {
  const parts: string[] = [];
  if (statement.input !== undefined) {
    parts.push(`.${statement.input}`);
  }
  parts.push("out");
  if (statement.geometry !== "none") {
    parts.push(statement.geometry);
  }
  if (statement.detail !== "body") {
    parts.push(statement.detail);
  }
  return parts.join(" ");
}

function formatInput(input: string | undefined): string {
  return input !== undefined ? `.${input}` : "";
}

function formatAssign(assign: string | undefined): string {
  return assign !== undefined ? `->.${assign}` : "";
}
