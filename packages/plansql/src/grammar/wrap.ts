/**
 * Identifier Wrapping
 *
 * Quotes table and column references through the dialect. Handles
 * qualified names (`schema.table`, `table.column`), aliases
 * (`expr as alias`), `*`, inline expressions and JSON selectors.
 */
import { type ColumnLike, type TableLike } from "../plan/ast";
import { isExpression } from "../plan/expression";
import { isJsonSelector, type JsonSelector, parseJsonSelector } from "./json-path";
import { type Grammar } from "./types";

const ALIAS_KEYWORD = / as /i;
const ALIAS_SEPARATOR = /\s+as\s+/i;

function splitAliased(value: string): readonly [string, string] {
  const [target = "", alias = ""] = value.split(ALIAS_SEPARATOR);
  return [target, alias];
}

/**
 * Wraps one identifier segment. `*` passes through unquoted.
 */
export function wrapValue(grammar: Grammar, value: string): string {
  if (value === "*") {
    return value;
  }
  return grammar.dialect.quoteIdentifier(value);
}

/**
 * Wraps a table reference. The prefix goes onto the table name (the last
 * segment of `schema.table`) and onto the alias of `table as alias`.
 *
 * @example
 * // sqlite dialect, prefix "app_"
 * wrapTable(grammar, "main.users as u") // "main"."app_users" as "app_u"
 */
export function wrapTable(
  grammar: Grammar,
  table: TableLike,
  prefix: string = grammar.tablePrefix,
): string {
  if (isExpression(table)) {
    return String(table.getValue(grammar));
  }

  if (ALIAS_KEYWORD.test(table)) {
    const [target, alias] = splitAliased(table);
    return `${wrapTable(grammar, target, prefix)} as ${wrapValue(grammar, prefix + alias)}`;
  }

  const schemaSeparator = table.lastIndexOf(".");
  if (schemaSeparator !== -1) {
    const prefixed =
      table.slice(0, schemaSeparator) + "." + prefix + table.slice(schemaSeparator + 1);
    return prefixed
      .split(".")
      .map((segment) => wrapValue(grammar, segment))
      .join(".");
  }

  return wrapValue(grammar, prefix + table);
}

function wrapSegments(grammar: Grammar, segments: readonly string[]): string {
  return segments
    .map((segment, index) =>
      index === 0 && segments.length > 1 ?
        wrapTable(grammar, segment)
      : wrapValue(grammar, segment),
    )
    .join(".");
}

/**
 * Wraps a column reference.
 *
 * @example
 * // sqlite dialect
 * wrap(grammar, "users.name as n") // "users"."name" as "n"
 * wrap(grammar, "users.*")         // "users".*
 */
export function wrap(grammar: Grammar, value: ColumnLike): string {
  if (isExpression(value)) {
    return String(value.getValue(grammar));
  }

  if (ALIAS_KEYWORD.test(value)) {
    const [target, alias] = splitAliased(value);
    return `${wrap(grammar, target)} as ${wrapValue(grammar, alias)}`;
  }

  if (isJsonSelector(value)) {
    return grammar.dialect.wrapJsonSelector(grammar, parseJsonSelector(value));
  }

  return wrapSegments(grammar, value.split("."));
}

/**
 * Wraps a plain column name, without JSON selector handling.
 */
function wrapColumnName(grammar: Grammar, column: string): string {
  return wrapSegments(grammar, column.split("."));
}

export function columnize(
  grammar: Grammar,
  columns: readonly ColumnLike[],
): string {
  return columns.map((column) => wrap(grammar, column)).join(", ");
}

// ============================================================
// JSON Paths
// ============================================================

function escapeJsonPathKey(key: string): string {
  return key.replaceAll(/\\*'/g, "''");
}

/**
 * Renders the path part of a selector as a quoted JSON path literal.
 *
 * @example
 * "meta->tags[0]->name" → '$."tags"[0]."name"'
 */
export function wrapJsonPath(selector: JsonSelector): string {
  let path = "$";
  for (const segment of selector.path) {
    path +=
      segment.kind === "key" ?
        `."${escapeJsonPathKey(segment.key)}"`
      : `[${segment.index}]`;
  }
  return `'${path}'`;
}

/**
 * @returns The wrapped base column and either `""` or `, '<path>'`
 */
export function wrapJsonFieldAndPath(
  grammar: Grammar,
  selector: JsonSelector,
): readonly [string, string] {
  const field = wrapColumnName(grammar, selector.column);
  const path = selector.path.length > 0 ? `, ${wrapJsonPath(selector)}` : "";
  return [field, path];
}
