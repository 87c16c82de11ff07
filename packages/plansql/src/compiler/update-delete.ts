/**
 * Update, Delete & Truncate Compilation
 *
 * Plans with joins go to the dialect's join-aware renderer when it has one;
 * otherwise the joins are placed between the table and the `set` list
 * (update) or after the table (delete).
 */
import { type Grammar } from "../grammar/types";
import { type QueryPlan, type RecordValues } from "../plan/ast";
import {
  type BindingGroups,
  prepareBindingsForDelete as prepareDeleteBindings,
  prepareBindingsForUpdate as prepareUpdateBindings,
} from "../plan/bindings";
import { isExpression } from "../plan/expression";
import { compileJoins } from "./components";
import { compileWheres } from "./predicates";
import { compileSelect } from "./select";
import { lastAliasSegment, requireTable } from "./utils";

function hasJoins(plan: QueryPlan): boolean {
  return plan.joins !== undefined && plan.joins.length > 0;
}

/**
 * `col = ?` pairs in the mapping's insertion order.
 */
function compileUpdateColumns(
  grammar: Grammar,
  values: RecordValues,
): string {
  return Object.entries(values)
    .map(([column, value]) => `${grammar.wrap(column)} = ${grammar.parameter(value)}`)
    .join(", ");
}

/**
 * `col = ?` pairs with any table qualifier dropped from the column.
 */
function compileUnqualifiedUpdateColumns(
  grammar: Grammar,
  values: RecordValues,
): string {
  return Object.entries(values)
    .map(([column, value]) => {
      const name = column.split(".").at(-1) ?? column;
      return `${grammar.wrap(name)} = ${grammar.parameter(value)}`;
    })
    .join(", ");
}

/**
 * Selects the row identifiers of the rows a join-aware statement targets,
 * by the alias of the target table (or its name when unaliased).
 */
function compileRowIdSelect(
  grammar: Grammar,
  plan: QueryPlan,
  rowId: string,
): string {
  const from = requireTable(plan, "join-aware");
  const source = isExpression(from) ? String(from.getValue(grammar)) : from;
  return compileSelect(grammar, {
    ...plan,
    columns: [`${lastAliasSegment(source)}.${rowId}`],
  });
}

/**
 * Rewrites a join-aware update as an update of the rows whose identifier
 * column (`rowid`, `ctid`) is returned by a select over the joins.
 *
 * @example
 * 'update "users" set "active" = ? where "rowid" in (select "users"."rowid" from ...)'
 */
export function compileUpdateByRowId(
  grammar: Grammar,
  plan: QueryPlan,
  values: RecordValues,
  rowId: string,
): string {
  const table = grammar.wrapTable(requireTable(plan, "update"));
  const columns = compileUnqualifiedUpdateColumns(grammar, values);
  const select = compileRowIdSelect(grammar, plan, rowId);
  return `update ${table} set ${columns} where ${grammar.wrap(rowId)} in (${select})`;
}

/**
 * Rewrites a join-aware delete the way compileUpdateByRowId rewrites updates.
 */
export function compileDeleteByRowId(
  grammar: Grammar,
  plan: QueryPlan,
  rowId: string,
): string {
  const table = grammar.wrapTable(requireTable(plan, "delete"));
  const select = compileRowIdSelect(grammar, plan, rowId);
  return `delete from ${table} where ${grammar.wrap(rowId)} in (${select})`;
}

export function compileUpdate(
  grammar: Grammar,
  plan: QueryPlan,
  values: RecordValues,
): string {
  const table = grammar.wrapTable(requireTable(plan, "update"));
  const columns = compileUpdateColumns(grammar, values);
  const where = compileWheres(grammar, plan);

  if (!hasJoins(plan)) {
    return `update ${table} set ${columns} ${where}`.trim();
  }

  if (grammar.dialect.compileUpdateWithJoins) {
    return grammar.dialect.compileUpdateWithJoins(grammar, plan, values).trim();
  }

  const joins = compileJoins(grammar, plan.joins ?? []);
  return `update ${table} ${joins} set ${columns} ${where}`.trim();
}

/**
 * Positional bindings for an update, using the dialect's ordering when it
 * defines one.
 */
export function prepareBindingsForUpdate(
  grammar: Grammar,
  bindings: Partial<BindingGroups>,
  values: RecordValues,
): unknown[] {
  if (grammar.dialect.prepareBindingsForUpdate) {
    return grammar.dialect.prepareBindingsForUpdate(bindings, values);
  }
  return prepareUpdateBindings(bindings, values);
}

export function compileDelete(grammar: Grammar, plan: QueryPlan): string {
  const table = grammar.wrapTable(requireTable(plan, "delete"));
  const where = compileWheres(grammar, plan);

  if (!hasJoins(plan)) {
    return `delete from ${table} ${where}`.trim();
  }

  if (grammar.dialect.compileDeleteWithJoins) {
    return grammar.dialect.compileDeleteWithJoins(grammar, plan).trim();
  }

  const alias = lastAliasSegment(table);
  const joins = compileJoins(grammar, plan.joins ?? []);
  return `delete ${alias} from ${table} ${joins} ${where}`.trim();
}

export function prepareBindingsForDelete(
  bindings: Partial<BindingGroups>,
): unknown[] {
  return prepareDeleteBindings(bindings);
}

/**
 * Truncation statements mapped to their bindings.
 */
export function compileTruncate(
  grammar: Grammar,
  plan: QueryPlan,
): ReadonlyMap<string, readonly unknown[]> {
  return grammar.dialect.compileTruncate(grammar, plan);
}
