/**
 * SQLite Dialect Adapter
 *
 * Uses SQLite's JSON1 functions for JSON predicates and `strftime` for
 * date components. Join-aware updates and deletes target `rowid`.
 */
import {
  compileInsert,
  compileInsertOnConflictUpdate,
  compileInsertUsing,
} from "../compiler/insert";
import {
  compileDeleteByRowId,
  compileUpdateByRowId,
} from "../compiler/update-delete";
import { requireTable } from "../compiler/utils";
import { parseJsonSelector } from "../grammar/json-path";
import { type Grammar } from "../grammar/types";
import { type DateComponent, type DateComponentPredicate } from "../plan/ast";
import { prepareBindingsForRowIdUpdate } from "../plan/bindings";
import { isExpression } from "../plan/expression";
import { defaultDialect } from "./default";
import { type DialectAdapter } from "./types";
import { quoteDoubleQuoted } from "./utils";

const DATE_FORMATS: Readonly<Record<DateComponent, string>> = {
  date: "%Y-%m-%d",
  time: "%H:%M:%S",
  day: "%d",
  month: "%m",
  year: "%Y",
};

function jsonArgument(grammar: Grammar, column: string): string {
  const [field, path] = grammar.wrapJsonFieldAndPath(parseJsonSelector(column));
  return field + path;
}

/**
 * @example
 * // { component: "month", column: "created_at", operator: "=" }
 * `strftime('%m', "created_at") = cast(? as text)`
 */
function compileDateComponent(
  grammar: Grammar,
  predicate: DateComponentPredicate,
): string {
  const format = grammar.quoteString(DATE_FORMATS[predicate.component]);
  const column = grammar.wrap(predicate.column);
  const value = grammar.parameter(predicate.value);
  return `strftime(${format}, ${column}) ${predicate.operator} cast(${value} as text)`;
}

/**
 * SQLite dialect adapter implementation.
 */
export const sqliteDialect: DialectAdapter = {
  ...defaultDialect,
  name: "sqlite",
  capabilities: {
    supportsSavepoints: true,
    operators: [
      "=",
      "<",
      ">",
      "<=",
      ">=",
      "<>",
      "!=",
      "like",
      "not like",
      "ilike",
      "&",
      "|",
      "<<",
      ">>",
    ],
    bitwiseOperators: [],
  },

  quoteIdentifier: quoteDoubleQuoted,

  predicateOverrides: {
    date_component: compileDateComponent,
  },

  // ============================================================
  // JSON
  // ============================================================

  wrapJsonSelector(grammar, selector) {
    const [field, path] = grammar.wrapJsonFieldAndPath(selector);
    return `json_extract(${field}${path})`;
  },

  compileJsonContains(grammar, column, value) {
    const element = `${grammar.wrapValue("json_each")}.${grammar.wrapValue("value")}`;
    return `exists (select 1 from json_each(${jsonArgument(grammar, column)}) where ${element} is ${value})`;
  },

  compileJsonContainsKey(grammar, column) {
    return `json_type(${jsonArgument(grammar, column)}) is not null`;
  },

  compileJsonLength(grammar, column, operator, value) {
    return `json_array_length(${jsonArgument(grammar, column)}) ${operator} ${value}`;
  },

  // json_each compares one element at a time, so scalars are bound as is.
  prepareBindingForJsonContains(value) {
    return value;
  },

  // ============================================================
  // Clauses
  // ============================================================

  compileIndexHint(_grammar, _plan, hint) {
    return hint.type === "force" ? `indexed by ${hint.index}` : "";
  },

  wrapUnion(sql) {
    return `select * from (${sql})`;
  },

  // ============================================================
  // Write Statements
  // ============================================================

  compileInsertOrIgnore(grammar, plan, values) {
    return compileInsert(grammar, plan, values).replace("insert", "insert or ignore");
  },

  compileInsertOrIgnoreUsing(grammar, plan, columns, sql) {
    return compileInsertUsing(grammar, plan, columns, sql).replace(
      "insert",
      "insert or ignore",
    );
  },

  compileUpsert(grammar, plan, values, uniqueBy, update) {
    return compileInsertOnConflictUpdate(grammar, plan, values, uniqueBy, update);
  },

  compileUpdateWithJoins(grammar, plan, values) {
    return compileUpdateByRowId(grammar, plan, values, "rowid");
  },

  compileDeleteWithJoins(grammar, plan) {
    return compileDeleteByRowId(grammar, plan, "rowid");
  },

  prepareBindingsForUpdate: prepareBindingsForRowIdUpdate,

  /**
   * Deleting every row keeps the AUTOINCREMENT counter, so the table's
   * `sqlite_sequence` entry is removed too.
   */
  compileTruncate(grammar, plan) {
    const from = requireTable(plan, "truncate");
    const name = isExpression(from) ? String(from.getValue(grammar)) : from;
    const separator = name.lastIndexOf(".");
    const schema =
      separator === -1 ? "" : `${grammar.wrapValue(name.slice(0, separator))}.`;
    const table = name.slice(separator + 1);

    return new Map<string, readonly unknown[]>([
      [
        `delete from ${schema}sqlite_sequence where name = ?`,
        [grammar.tablePrefix + table],
      ],
      [`delete from ${grammar.wrapTable(from)}`, []],
    ]);
  },
};
