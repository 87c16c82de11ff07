/**
 * Query plan types.
 *
 * A QueryPlan is the snapshot a query builder hands to the compiler.
 * Predicates and having clauses are closed tagged unions discriminated
 * by `__type`; the compilers switch over them exhaustively.
 */
import { type BindingGroups } from "./bindings";
import { type Expression } from "./expression";

// ============================================================
// References
// ============================================================

/**
 * A column reference: `"name"`, `"users.name"`, `"users.name as n"`,
 * `"data->items[0]->sku"`, or an inline expression.
 */
export type ColumnLike = string | Expression;

/**
 * A table reference: `"users"`, `"users as u"`, `"main.users"`, or an
 * inline expression such as a derived table.
 */
export type TableLike = string | Expression;

/**
 * The word joining a predicate to the one before it.
 */
export type BooleanConnector = "and" | "or";

// ============================================================
// Predicates
// ============================================================

type PredicateBase<T extends string> = Readonly<{
  __type: T;
  boolean: BooleanConnector;
}>;

export type RawPredicate = PredicateBase<"raw"> &
  Readonly<{ sql: string | Expression }>;

export type BasicPredicate = PredicateBase<"basic"> &
  Readonly<{ column: ColumnLike; operator: string; value: unknown }>;

export type BitwisePredicate = PredicateBase<"bitwise"> &
  Readonly<{ column: ColumnLike; operator: string; value: unknown }>;

export type LikePredicate = PredicateBase<"like"> &
  Readonly<{
    column: ColumnLike;
    value: unknown;
    not: boolean;
    caseSensitive: boolean;
  }>;

export type InPredicate = PredicateBase<"in"> &
  Readonly<{ column: ColumnLike; values: readonly unknown[] }>;

export type NotInPredicate = PredicateBase<"not_in"> &
  Readonly<{ column: ColumnLike; values: readonly unknown[] }>;

/**
 * Values are inlined into the SQL text, so only integers are accepted.
 */
export type InRawPredicate = PredicateBase<"in_raw"> &
  Readonly<{ column: ColumnLike; values: readonly unknown[] }>;

export type NotInRawPredicate = PredicateBase<"not_in_raw"> &
  Readonly<{ column: ColumnLike; values: readonly unknown[] }>;

export type NullPredicate = PredicateBase<"null"> &
  Readonly<{ column: ColumnLike }>;

export type NotNullPredicate = PredicateBase<"not_null"> &
  Readonly<{ column: ColumnLike }>;

export type BetweenPredicate = PredicateBase<"between"> &
  Readonly<{ column: ColumnLike; values: readonly unknown[]; not: boolean }>;

export type BetweenColumnsPredicate = PredicateBase<"between_columns"> &
  Readonly<{
    column: ColumnLike;
    values: readonly ColumnLike[];
    not: boolean;
  }>;

export type ValueBetweenPredicate = PredicateBase<"value_between"> &
  Readonly<{ value: unknown; columns: readonly ColumnLike[]; not: boolean }>;

/**
 * Date parts a date-component predicate can compare.
 */
export type DateComponent = "date" | "time" | "day" | "month" | "year";

export type DateComponentPredicate = PredicateBase<"date_component"> &
  Readonly<{
    component: DateComponent;
    column: ColumnLike;
    operator: string;
    value: unknown;
  }>;

export type ColumnPredicate = PredicateBase<"column"> &
  Readonly<{ first: ColumnLike; operator: string; second: ColumnLike }>;

/**
 * A parenthesized group. Inside a join, the group's scope is the join itself.
 */
export type NestedPredicate = PredicateBase<"nested"> &
  Readonly<{ query: PredicateScope }>;

export type SubSelectPredicate = PredicateBase<"sub"> &
  Readonly<{ column: ColumnLike; operator: string; query: QueryPlan }>;

export type ExistsPredicate = PredicateBase<"exists"> &
  Readonly<{ query: QueryPlan }>;

export type NotExistsPredicate = PredicateBase<"not_exists"> &
  Readonly<{ query: QueryPlan }>;

export type RowValuesPredicate = PredicateBase<"row_values"> &
  Readonly<{
    columns: readonly ColumnLike[];
    operator: string;
    values: readonly unknown[];
  }>;

/**
 * Compares a JSON member against a boolean literal. The value is rendered
 * inline as `true` / `false`, never bound.
 */
export type JsonBooleanPredicate = PredicateBase<"json_boolean"> &
  Readonly<{ column: string; operator: string; value: boolean }>;

export type JsonContainsPredicate = PredicateBase<"json_contains"> &
  Readonly<{ column: string; value: unknown; not: boolean }>;

export type JsonOverlapsPredicate = PredicateBase<"json_overlaps"> &
  Readonly<{ column: string; value: unknown; not: boolean }>;

export type JsonContainsKeyPredicate = PredicateBase<"json_contains_key"> &
  Readonly<{ column: string; not: boolean }>;

export type JsonLengthPredicate = PredicateBase<"json_length"> &
  Readonly<{ column: string; operator: string; value: unknown }>;

export type FullTextOptions = Readonly<{
  language?: string | undefined;
  mode?: "plain" | "phrase" | "websearch" | "boolean" | undefined;
  expanded?: boolean | undefined;
}>;

export type FullTextPredicate = PredicateBase<"full_text"> &
  Readonly<{
    columns: readonly ColumnLike[];
    value: unknown;
    options: FullTextOptions;
  }>;

export type ExpressionPredicate = PredicateBase<"expression"> &
  Readonly<{ expression: Expression }>;

/**
 * One condition of a `where` or `on` clause.
 */
export type Predicate =
  | RawPredicate
  | BasicPredicate
  | BitwisePredicate
  | LikePredicate
  | InPredicate
  | NotInPredicate
  | InRawPredicate
  | NotInRawPredicate
  | NullPredicate
  | NotNullPredicate
  | BetweenPredicate
  | BetweenColumnsPredicate
  | ValueBetweenPredicate
  | DateComponentPredicate
  | ColumnPredicate
  | NestedPredicate
  | SubSelectPredicate
  | ExistsPredicate
  | NotExistsPredicate
  | RowValuesPredicate
  | JsonBooleanPredicate
  | JsonContainsPredicate
  | JsonOverlapsPredicate
  | JsonContainsKeyPredicate
  | JsonLengthPredicate
  | FullTextPredicate
  | ExpressionPredicate;

export type PredicateType = Predicate["__type"];

// ============================================================
// Having Predicates
// ============================================================

export type RawHaving = PredicateBase<"raw"> & Readonly<{ sql: string }>;

export type BasicHaving = PredicateBase<"basic"> &
  Readonly<{ column: ColumnLike; operator: string; value: unknown }>;

export type BetweenHaving = PredicateBase<"between"> &
  Readonly<{ column: ColumnLike; values: readonly unknown[]; not: boolean }>;

export type NullHaving = PredicateBase<"null"> &
  Readonly<{ column: ColumnLike }>;

export type NotNullHaving = PredicateBase<"not_null"> &
  Readonly<{ column: ColumnLike }>;

export type BitwiseHaving = PredicateBase<"bitwise"> &
  Readonly<{ column: ColumnLike; operator: string; value: unknown }>;

export type ExpressionHaving = PredicateBase<"expression"> &
  Readonly<{ expression: Expression }>;

export type NestedHaving = PredicateBase<"nested"> &
  Readonly<{ query: QueryPlan }>;

/**
 * One condition of a `having` clause.
 */
export type HavingPredicate =
  | RawHaving
  | BasicHaving
  | BetweenHaving
  | NullHaving
  | NotNullHaving
  | BitwiseHaving
  | ExpressionHaving
  | NestedHaving;

export type HavingType = HavingPredicate["__type"];

// ============================================================
// Joins, Orders, Unions
// ============================================================

export type JoinType = "inner" | "left" | "right" | "cross" | (string & {});

/**
 * A join target with its `on` conditions.
 *
 * With `joins` set, the target becomes a parenthesized compound
 * `(table <nested joins>)`. With `lateral`, the target is usually a derived
 * table expression and the dialect's lateral renderer takes over.
 */
export type JoinSpec = Readonly<{
  __type: "join";
  type: JoinType;
  table: TableLike;
  wheres?: readonly Predicate[] | undefined;
  joins?: readonly JoinSpec[] | undefined;
  lateral?: boolean | undefined;
}>;

export type SortDirection = "asc" | "desc";

export type ColumnOrder = Readonly<{
  __type: "column";
  column: ColumnLike;
  direction: SortDirection;
}>;

export type RawOrder = Readonly<{ __type: "raw"; sql: string }>;

export type OrderSpec = ColumnOrder | RawOrder;

export type UnionSpec = Readonly<{ query: QueryPlan; all: boolean }>;

// ============================================================
// Query Plan
// ============================================================

export type Aggregate = Readonly<{
  function: string;
  columns: readonly ColumnLike[];
}>;

/**
 * Caps the number of rows per partition of `column`.
 */
export type GroupLimit = Readonly<{ value: number; column: string }>;

export type IndexHint = Readonly<{
  type: "hint" | "force" | "ignore";
  index: string;
}>;

/**
 * The compiler's input for read statements, and the target description
 * (`from`, `joins`, `wheres`) for write statements.
 */
export type QueryPlan = Readonly<{
  __type?: "query" | undefined;
  aggregate?: Aggregate | undefined;
  columns?: readonly ColumnLike[] | undefined;
  distinct?: boolean | readonly ColumnLike[] | undefined;
  from?: TableLike | undefined;
  indexHint?: IndexHint | undefined;
  joins?: readonly JoinSpec[] | undefined;
  wheres?: readonly Predicate[] | undefined;
  groups?: readonly ColumnLike[] | undefined;
  havings?: readonly HavingPredicate[] | undefined;
  orders?: readonly OrderSpec[] | undefined;
  limit?: number | undefined;
  offset?: number | undefined;
  groupLimit?: GroupLimit | undefined;
  unions?: readonly UnionSpec[] | undefined;
  unionOrders?: readonly OrderSpec[] | undefined;
  unionLimit?: number | undefined;
  unionOffset?: number | undefined;
  lock?: boolean | string | undefined;
  /** Parameter values collected by the query builder, per clause kind. */
  bindings?: Partial<BindingGroups> | undefined;
}>;

/**
 * Anything that owns a predicate list: a query plan (`where`) or a join (`on`).
 */
export type PredicateScope = QueryPlan | JoinSpec;

// ============================================================
// Write Payloads
// ============================================================

export type RecordValues = Readonly<Record<string, unknown>>;

export type InsertValues = RecordValues | readonly RecordValues[];

/**
 * Columns to overwrite on conflict: a list of column names copied from the
 * incoming row, or a column-to-value mapping.
 */
export type UpsertUpdate = readonly string[] | RecordValues;
