/**
 * Select Statement Compilation
 *
 * A select plan compiles along one of three paths:
 *
 * 1. Union aggregate: an aggregate over a plan with unions or havings is
 *    applied to the plan compiled as a derived table.
 * 2. Group limit: a per-partition row cap is emulated with a ranked derived
 *    table filtered on `row_number()`.
 * 3. Plain: the components are concatenated, followed by any unions.
 *
 * The plan is never mutated; every rewrite works on a local copy.
 */
import { type Grammar } from "../grammar/types";
import { type GroupLimit, type QueryPlan, type UnionSpec } from "../plan/ast";
import {
  compileAggregate,
  compileComponents,
  compileLimit,
  compileOffset,
  compileOrders,
  orderedComponents,
} from "./components";
import { assertRowCount, concatenate } from "./utils";

/** Alias of the ranked derived table used by group-limit emulation. */
export const GROUP_LIMIT_TABLE = "ranked_table";

/** Alias of the row-number column used by group-limit emulation. */
export const GROUP_LIMIT_ROW = "ranked_row";

/** Alias of the derived table an aggregate is applied to. */
const AGGREGATE_TABLE = "temp_table";

function hasItems<T>(list: readonly T[] | undefined): list is readonly T[] {
  return list !== undefined && list.length > 0;
}

export function compileSelect(grammar: Grammar, plan: QueryPlan): string {
  if (
    (hasItems(plan.unions) || hasItems(plan.havings)) &&
    plan.aggregate !== undefined
  ) {
    return compileUnionAggregate(grammar, plan);
  }

  // An empty select list means every column, the same as an unset one.
  const columns = hasItems(plan.columns) ? plan.columns : ["*"];
  const withColumns: QueryPlan = { ...plan, columns };

  if (plan.groupLimit !== undefined) {
    return compileGroupLimit(grammar, withColumns, plan.groupLimit);
  }

  let sql = concatenate(
    orderedComponents(compileComponents(grammar, withColumns)),
  ).trim();

  if (hasItems(plan.unions)) {
    sql = `${grammar.dialect.wrapUnion(sql)} ${compileUnions(grammar, plan)}`;
  }

  return sql;
}

/**
 * `select exists(<select>) as "exists"`
 */
export function compileExists(grammar: Grammar, plan: QueryPlan): string {
  return `select exists(${compileSelect(grammar, plan)}) as ${grammar.wrap("exists")}`;
}

// ============================================================
// Unions
// ============================================================

function compileUnion(grammar: Grammar, union: UnionSpec): string {
  const conjunction = union.all ? " union all " : " union ";
  return conjunction + grammar.dialect.wrapUnion(compileSelect(grammar, union.query));
}

/**
 * Compiles the unions of a plan, followed by the union-level order, limit
 * and offset.
 */
function compileUnions(grammar: Grammar, plan: QueryPlan): string {
  let sql = (plan.unions ?? [])
    .map((union) => compileUnion(grammar, union))
    .join("");

  if (hasItems(plan.unionOrders)) {
    sql += ` ${compileOrders(grammar, plan.unionOrders)}`;
  }
  if (plan.unionLimit !== undefined) {
    sql += ` ${compileLimit(plan.unionLimit)}`;
  }
  if (plan.unionOffset !== undefined) {
    sql += ` ${compileOffset(plan.unionOffset)}`;
  }

  return sql.trimStart();
}

/**
 * Applies the aggregate to the rest of the plan compiled as a derived table.
 *
 * @example
 * "select count(*) as aggregate from ((select * from a) union (select * from b)) as temp_table"
 */
function compileUnionAggregate(grammar: Grammar, plan: QueryPlan): string {
  if (plan.aggregate === undefined) {
    return compileSelect(grammar, plan);
  }
  const aggregate = compileAggregate(grammar, plan, plan.aggregate);
  const inner = compileSelect(grammar, { ...plan, aggregate: undefined });
  return `${aggregate} from (${inner}) as ${grammar.wrapTable(AGGREGATE_TABLE)}`;
}

// ============================================================
// Group Limit Emulation
// ============================================================

/**
 * Emulates a per-partition row cap. The orders move into the window
 * function and the offset is folded into the row-number filter, so their
 * bindings are expected in the select group (see
 * `mergeOrderBindingsIntoSelect`).
 *
 * @example
 * // groupLimit { value: 2, column: "team" }, offset 3
 * "select * from (select *, row_number() over (partition by team) as ranked_row
 *   from players) as ranked_table where ranked_row <= 5 and ranked_row > 3
 *   order by ranked_row"
 */
function compileGroupLimit(
  grammar: Grammar,
  plan: QueryPlan,
  groupLimit: GroupLimit,
): string {
  const offset =
    plan.offset === undefined ? undefined : assertRowCount(plan.offset, "offset");
  const limit = assertRowCount(groupLimit.value, "group limit") + (offset ?? 0);

  const components = compileComponents(grammar, { ...plan, offset: undefined });
  const rowNumber = compileRowNumber(
    grammar,
    groupLimit.column,
    components.orders ?? "",
  );
  const inner = concatenate(
    orderedComponents({
      ...components,
      columns: (components.columns ?? "") + rowNumber,
      orders: undefined,
    }),
  );

  const table = grammar.wrap(GROUP_LIMIT_TABLE);
  const row = grammar.wrap(GROUP_LIMIT_ROW);

  let sql = `select * from (${inner}) as ${table} where ${row} <= ${limit}`;
  if (offset !== undefined) {
    sql += ` and ${row} > ${offset}`;
  }
  return `${sql} order by ${row}`;
}

function compileRowNumber(
  grammar: Grammar,
  partition: string,
  orders: string,
): string {
  const over = `partition by ${grammar.wrap(partition)} ${orders}`.trim();
  return `, row_number() over (${over}) as ${grammar.wrap(GROUP_LIMIT_ROW)}`;
}
