/**
 * Compiled statement artifacts: SQL text paired with its positional
 * parameters, reassembled from the plan's binding groups.
 */
import { type Grammar } from "../grammar/types";
import {
  type InsertValues,
  type QueryPlan,
  type RecordValues,
} from "../plan/ast";
import {
  mergeOrderBindingsIntoSelect,
  prepareBindingsForSelect,
} from "../plan/bindings";
import { compileInsert, prepareBindingsForInsert } from "./insert";
import { substituteBindingsIntoRawSql } from "./raw-sql";
import { compileSelect } from "./select";
import {
  compileDelete,
  compileUpdate,
  prepareBindingsForDelete,
  prepareBindingsForUpdate,
} from "./update-delete";

export type CompiledStatement = Readonly<{
  sql: string;
  params: readonly unknown[];
}>;

/**
 * Positional bindings for a select. Group-limit emulation moves the order
 * bindings into the select list.
 */
function selectBindings(plan: QueryPlan): unknown[] {
  const bindings = plan.bindings ?? {};
  return prepareBindingsForSelect(
    plan.groupLimit === undefined ? bindings : mergeOrderBindingsIntoSelect(bindings),
  );
}

export function toSql(grammar: Grammar, plan: QueryPlan): CompiledStatement {
  return { sql: compileSelect(grammar, plan), params: selectBindings(plan) };
}

export function toInsertSql(
  grammar: Grammar,
  plan: QueryPlan,
  values: InsertValues,
): CompiledStatement {
  return {
    sql: compileInsert(grammar, plan, values),
    params: prepareBindingsForInsert(values),
  };
}

export function toUpdateSql(
  grammar: Grammar,
  plan: QueryPlan,
  values: RecordValues,
): CompiledStatement {
  return {
    sql: compileUpdate(grammar, plan, values),
    params: prepareBindingsForUpdate(grammar, plan.bindings ?? {}, values),
  };
}

export function toDeleteSql(
  grammar: Grammar,
  plan: QueryPlan,
): CompiledStatement {
  return {
    sql: compileDelete(grammar, plan),
    params: prepareBindingsForDelete(plan.bindings ?? {}),
  };
}

/**
 * Inlines the parameters of a compiled statement, for logging and debugging.
 */
export function toRawSql(
  grammar: Grammar,
  compiled: CompiledStatement,
): string {
  return substituteBindingsIntoRawSql(grammar, compiled.sql, compiled.params);
}
