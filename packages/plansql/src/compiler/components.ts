/**
 * Clause Assemblers
 *
 * Each present component of a plan compiles to one fragment. Absent
 * components, and empty lists, contribute nothing.
 */
import { type Grammar } from "../grammar/types";
import {
  type Aggregate,
  type ColumnLike,
  type JoinSpec,
  type OrderSpec,
  type QueryPlan,
} from "../plan/ast";
import { compileHavings } from "./havings";
import { compileWheres } from "./predicates";
import { assertRowCount } from "./utils";

/**
 * Select components in output order.
 */
const SELECT_COMPONENTS = [
  "aggregate",
  "columns",
  "from",
  "indexHint",
  "joins",
  "wheres",
  "groups",
  "havings",
  "orders",
  "limit",
  "offset",
  "lock",
] as const;

type SelectComponent = (typeof SELECT_COMPONENTS)[number];

type CompiledComponents = {
  [K in SelectComponent]?: string | undefined;
};

function hasItems<T>(list: readonly T[] | undefined): list is readonly T[] {
  return list !== undefined && list.length > 0;
}

/**
 * Compiles every present component of the plan, keyed by component.
 */
export function compileComponents(
  grammar: Grammar,
  plan: QueryPlan,
): CompiledComponents {
  const components: CompiledComponents = {};

  if (plan.aggregate !== undefined) {
    components.aggregate = compileAggregate(grammar, plan, plan.aggregate);
  }
  if (plan.columns !== undefined) {
    components.columns = compileColumns(grammar, plan, plan.columns);
  }
  if (plan.from !== undefined) {
    components.from = `from ${grammar.wrapTable(plan.from)}`;
  }
  if (plan.indexHint !== undefined) {
    components.indexHint = grammar.dialect.compileIndexHint(
      grammar,
      plan,
      plan.indexHint,
    );
  }
  if (hasItems(plan.joins)) {
    components.joins = compileJoins(grammar, plan.joins);
  }
  if (hasItems(plan.wheres)) {
    components.wheres = compileWheres(grammar, plan);
  }
  if (hasItems(plan.groups)) {
    components.groups = `group by ${grammar.columnize(plan.groups)}`;
  }
  if (hasItems(plan.havings)) {
    components.havings = compileHavings(grammar, plan.havings);
  }
  if (hasItems(plan.orders)) {
    components.orders = compileOrders(grammar, plan.orders);
  }
  if (plan.limit !== undefined) {
    components.limit = compileLimit(plan.limit);
  }
  if (plan.offset !== undefined) {
    components.offset = compileOffset(plan.offset);
  }
  if (plan.lock !== undefined) {
    components.lock = compileLock(grammar, plan.lock);
  }

  return components;
}

/**
 * Lists compiled components in output order.
 */
export function orderedComponents(
  components: CompiledComponents,
): (string | undefined)[] {
  return SELECT_COMPONENTS.map((component) => components[component]);
}

// ============================================================
// Individual Components
// ============================================================

/**
 * @example
 * // { function: "count", columns: ["*"] }
 * "select count(*) as aggregate"
 */
export function compileAggregate(
  grammar: Grammar,
  plan: QueryPlan,
  aggregate: Aggregate,
): string {
  let column = grammar.columnize(aggregate.columns);

  if (typeof plan.distinct === "object") {
    column = `distinct ${grammar.columnize(plan.distinct)}`;
  } else if (plan.distinct === true && column !== "*") {
    column = `distinct ${column}`;
  }

  return `select ${aggregate.function}(${column}) as aggregate`;
}

/**
 * Renders the select list. Aggregates suppress it.
 */
export function compileColumns(
  grammar: Grammar,
  plan: QueryPlan,
  columns: readonly ColumnLike[],
): string {
  if (plan.aggregate !== undefined) {
    return "";
  }

  const columnized = grammar.columnize(columns);
  const custom = grammar.dialect.compileColumns?.(grammar, plan, columnized);
  if (custom !== undefined) {
    return custom;
  }

  const isDistinct =
    plan.distinct === true ||
    (typeof plan.distinct === "object" && plan.distinct.length > 0);
  return `${isDistinct ? "select distinct" : "select"} ${columnized}`;
}

/**
 * Renders joins in order. A join with nested joins renders its target as
 * `(table <nested joins>)`; a lateral join goes to the dialect.
 */
export function compileJoins(
  grammar: Grammar,
  joins: readonly JoinSpec[],
): string {
  return joins
    .map((join) => {
      const table = grammar.wrapTable(join.table);
      const tableAndNested =
        hasItems(join.joins) ?
          `(${table} ${compileJoins(grammar, join.joins)})`
        : table;

      if (join.lateral === true) {
        return grammar.dialect.compileJoinLateral(grammar, join, tableAndNested);
      }

      return `${join.type} join ${tableAndNested} ${compileWheres(grammar, join)}`.trim();
    })
    .join(" ");
}

export function compileOrders(
  grammar: Grammar,
  orders: readonly OrderSpec[],
): string {
  if (orders.length === 0) {
    return "";
  }
  const rendered = orders.map((order) =>
    order.__type === "raw" ?
      order.sql
    : `${grammar.wrap(order.column)} ${order.direction}`,
  );
  return `order by ${rendered.join(", ")}`;
}

export function compileLimit(limit: number): string {
  return `limit ${assertRowCount(limit, "limit")}`;
}

export function compileOffset(offset: number): string {
  return `offset ${assertRowCount(offset, "offset")}`;
}

/**
 * A string lock passes through verbatim; booleans are dialect-specific.
 */
export function compileLock(grammar: Grammar, lock: boolean | string): string {
  if (typeof lock === "string") {
    return lock;
  }
  return grammar.dialect.compileLock(grammar, lock);
}
