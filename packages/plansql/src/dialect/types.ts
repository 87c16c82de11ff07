/**
 * SQL Dialect Abstraction Layer
 *
 * The compiler renders dialect-neutral SQL and calls into a DialectAdapter
 * wherever a database needs its own syntax. Implementing a new dialect
 * (MySQL, SQL Server, etc.) means spreading `defaultDialect` and
 * replacing the operations the database supports.
 */
import { type Grammar } from "../grammar/types";
import { type JsonSelector } from "../grammar/json-path";
import {
  type FullTextPredicate,
  type HavingPredicate,
  type IndexHint,
  type InsertValues,
  type JoinSpec,
  type LikePredicate,
  type Predicate,
  type QueryPlan,
  type RecordValues,
  type UpsertUpdate,
} from "../plan/ast";
import { type BindingGroups } from "../plan/bindings";

/**
 * Known SQL dialects.
 */
export type SqlDialect = "default" | "sqlite" | "postgres";

/**
 * Static capability profile of a dialect.
 */
export type DialectCapabilities = Readonly<{
  /** Whether SAVEPOINT statements are available inside transactions. */
  supportsSavepoints: boolean;

  /** Comparison operators the dialect accepts in addition to the standard set. */
  operators: readonly string[];

  /** Operators that are compiled as bitwise predicates. */
  bitwiseOperators: readonly string[];
}>;

/**
 * Per-variant predicate renderers. A dialect replaces the default rendering
 * of a variant by supplying a function under its `__type`.
 */
export type PredicateOverrides = {
  readonly [K in Predicate["__type"]]?: (
    grammar: Grammar,
    predicate: Extract<Predicate, { __type: K }>,
  ) => string;
};

/**
 * Per-variant having renderers, keyed like PredicateOverrides.
 */
export type HavingOverrides = {
  readonly [K in HavingPredicate["__type"]]?: (
    grammar: Grammar,
    having: Extract<HavingPredicate, { __type: K }>,
  ) => string;
};

/**
 * Adapter interface for SQL dialect differences.
 *
 * Each method receives the grammar doing the rendering so it can wrap
 * identifiers and emit placeholders consistently with the rest of the statement.
 */
export interface DialectAdapter {
  /**
   * The dialect name this adapter handles.
   */
  readonly name: SqlDialect;

  /**
   * Dialect capabilities.
   */
  readonly capabilities: DialectCapabilities;

  // ============================================================
  // Identifiers
  // ============================================================

  /**
   * Quotes one identifier segment (never `*`).
   *
   * @example
   * Default: name → name
   * SQLite/PostgreSQL: foo"bar → "foo""bar"
   */
  quoteIdentifier(name: string): string;

  // ============================================================
  // JSON
  // ============================================================

  /**
   * Renders a JSON member access.
   *
   * @example
   * SQLite: json_extract("data", '$."a"[0]')
   * PostgreSQL: "data"->'a'->>0
   */
  wrapJsonSelector(grammar: Grammar, selector: JsonSelector): string;

  /**
   * Renders a JSON member access compared against a boolean literal.
   */
  wrapJsonBooleanSelector(grammar: Grammar, selector: JsonSelector): string;

  /**
   * Renders the `true` / `false` literal of a JSON boolean comparison.
   */
  wrapJsonBooleanValue(value: string): string;

  /**
   * @param value - Placeholder or inline expression for the JSON document
   */
  compileJsonContains(grammar: Grammar, column: string, value: string): string;

  compileJsonOverlaps(grammar: Grammar, column: string, value: string): string;

  compileJsonContainsKey(grammar: Grammar, column: string): string;

  compileJsonLength(
    grammar: Grammar,
    column: string,
    operator: string,
    value: string,
  ): string;

  /**
   * Converts a JSON-contains binding into the value actually bound.
   *
   * @example
   * Default: ["a", 1] → '["a",1]'
   */
  prepareBindingForJsonContains(value: unknown): unknown;

  // ============================================================
  // Predicates
  // ============================================================

  compileCaseSensitiveLike(grammar: Grammar, predicate: LikePredicate): string;

  compileFullText(grammar: Grammar, predicate: FullTextPredicate): string;

  /**
   * Enforces the raw in-list policy. Values are inlined into the SQL, so the
   * default only admits integers.
   */
  assertRawInValues(column: string, values: readonly unknown[]): void;

  /**
   * Optional replacements for individual where-predicate variants.
   */
  readonly predicateOverrides?: PredicateOverrides;

  /**
   * Optional replacements for individual having variants.
   */
  readonly havingOverrides?: HavingOverrides;

  // ============================================================
  // Clauses
  // ============================================================

  /**
   * Renders the select list. Returning undefined keeps the default rendering.
   */
  compileColumns?(
    grammar: Grammar,
    plan: QueryPlan,
    columns: string,
  ): string | undefined;

  compileIndexHint(grammar: Grammar, plan: QueryPlan, hint: IndexHint): string;

  /**
   * @param expression - The wrapped join target, parenthesized when nested
   */
  compileJoinLateral(
    grammar: Grammar,
    join: JoinSpec,
    expression: string,
  ): string;

  /**
   * Renders a boolean lock; `true` is an exclusive lock, `false` a shared one.
   * String locks are emitted verbatim and never reach the dialect.
   */
  compileLock(grammar: Grammar, lock: boolean): string;

  /**
   * Wraps one member of a union.
   *
   * @example
   * Default: (select ...)
   * SQLite: select * from (select ...)
   */
  wrapUnion(sql: string): string;

  compileRandom(seed?: string | number): string;

  // ============================================================
  // Write Statements
  // ============================================================

  compileInsertOrIgnore(
    grammar: Grammar,
    plan: QueryPlan,
    values: InsertValues,
  ): string;

  compileInsertOrIgnoreUsing(
    grammar: Grammar,
    plan: QueryPlan,
    columns: readonly string[],
    sql: string,
  ): string;

  compileInsertGetId(
    grammar: Grammar,
    plan: QueryPlan,
    values: InsertValues,
    sequence?: string,
  ): string;

  compileUpsert(
    grammar: Grammar,
    plan: QueryPlan,
    values: InsertValues,
    uniqueBy: readonly string[],
    update: UpsertUpdate,
  ): string;

  /**
   * Renders an update whose plan has joins. Absent: `update <table> <joins> set ...`.
   */
  compileUpdateWithJoins?(
    grammar: Grammar,
    plan: QueryPlan,
    values: RecordValues,
  ): string;

  /**
   * Renders a delete whose plan has joins. Absent: `delete <alias> from <table> <joins> ...`.
   */
  compileDeleteWithJoins?(grammar: Grammar, plan: QueryPlan): string;

  /**
   * Positional bindings for an update. Absent: join, set values, then the rest.
   */
  prepareBindingsForUpdate?(
    bindings: Partial<BindingGroups>,
    values: RecordValues,
  ): unknown[];

  /**
   * Truncation may take several statements; each maps to its own bindings.
   */
  compileTruncate(
    grammar: Grammar,
    plan: QueryPlan,
  ): ReadonlyMap<string, readonly unknown[]>;

  // ============================================================
  // Transactions & Server
  // ============================================================

  compileSavepoint(name: string): string;

  compileSavepointRollBack(name: string): string;

  /**
   * Query counting open connections, or null when the database has none.
   */
  compileThreadCount(): string | null;

  // ============================================================
  // Literals
  // ============================================================

  escapeString(value: string): string;

  escapeBool(value: boolean): string;

  escapeBinary(value: Uint8Array): string;
}
