/**
 * Insert Statement Compilation
 */
import { type Grammar } from "../grammar/types";
import {
  type InsertValues,
  type QueryPlan,
  type RecordValues,
  type UpsertUpdate,
} from "../plan/ast";
import { cleanBindings } from "../plan/bindings";
import { requireTable } from "./utils";

function isBatch(values: InsertValues): values is readonly RecordValues[] {
  return Array.isArray(values);
}

/**
 * Normalizes a single record into a one-element batch.
 */
function toRecordBatch(values: InsertValues): readonly RecordValues[] {
  return isBatch(values) ? values : [values];
}

/**
 * The insert column list: the keys of the first record.
 */
function insertColumns(records: readonly RecordValues[]): string[] {
  const [first] = records;
  return first === undefined ? [] : Object.keys(first);
}

/**
 * Every record's values, ordered by the insert column list.
 */
function insertRows(
  records: readonly RecordValues[],
): unknown[][] {
  const columns = insertColumns(records);
  return records.map((record) => columns.map((column) => record[column]));
}

/**
 * Positional bindings of an insert: each row's values in column order.
 * Expressions render inline and are dropped.
 */
export function prepareBindingsForInsert(values: InsertValues): unknown[] {
  return cleanBindings(insertRows(toRecordBatch(values)).flat());
}

/**
 * @example
 * // [{ name: "a", age: 1 }, { name: "b", age: 2 }]
 * "insert into users (name, age) values (?, ?), (?, ?)"
 */
export function compileInsert(
  grammar: Grammar,
  plan: QueryPlan,
  values: InsertValues,
): string {
  const table = grammar.wrapTable(requireTable(plan, "insert"));
  const records = toRecordBatch(values);
  const columns = insertColumns(records);

  if (columns.length === 0) {
    return `insert into ${table} default values`;
  }

  const rows = insertRows(records)
    .map((row) => `(${grammar.parameterize(row)})`)
    .join(", ");

  return `insert into ${table} (${grammar.columnize(columns)}) values ${rows}`;
}

/**
 * Inserts the rows of a select. No columns, or `["*"]`, omits the column list.
 */
export function compileInsertUsing(
  grammar: Grammar,
  plan: QueryPlan,
  columns: readonly string[],
  sql: string,
): string {
  const table = grammar.wrapTable(requireTable(plan, "insert"));

  if (columns.length === 0 || (columns.length === 1 && columns[0] === "*")) {
    return `insert into ${table} ${sql}`;
  }

  return `insert into ${table} (${grammar.columnize(columns)}) ${sql}`;
}

// ============================================================
// Upserts
// ============================================================

function isColumnList(update: UpsertUpdate): update is readonly string[] {
  return Array.isArray(update);
}

/**
 * The `set` list of an `on conflict ... do update`. Listed columns copy the
 * incoming row's value; mapped columns take a parameter.
 *
 * @example
 * // ["name", "email"]
 * '"name" = "excluded"."name", "email" = "excluded"."email"'
 */
function compileUpsertAssignments(
  grammar: Grammar,
  update: UpsertUpdate,
): string {
  if (isColumnList(update)) {
    const excluded = grammar.wrapValue("excluded");
    return update
      .map((column) => `${grammar.wrap(column)} = ${excluded}.${grammar.wrap(column)}`)
      .join(", ");
  }
  return Object.entries(update)
    .map(([column, value]) => `${grammar.wrap(column)} = ${grammar.parameter(value)}`)
    .join(", ");
}

/**
 * `insert ... on conflict (<unique>) do update set <assignments>`
 */
export function compileInsertOnConflictUpdate(
  grammar: Grammar,
  plan: QueryPlan,
  values: InsertValues,
  uniqueBy: readonly string[],
  update: UpsertUpdate,
): string {
  const insert = compileInsert(grammar, plan, values);
  const assignments = compileUpsertAssignments(grammar, update);
  return `${insert} on conflict (${grammar.columnize(uniqueBy)}) do update set ${assignments}`;
}

/**
 * Insert bindings followed by the bindings of mapped conflict assignments.
 */
export function prepareBindingsForUpsert(
  values: InsertValues,
  update: UpsertUpdate,
): unknown[] {
  const assignments = isColumnList(update) ? [] : cleanBindings(Object.values(update));
  return [...prepareBindingsForInsert(values), ...assignments];
}
