/**
 * Grammar contract shared by the compilers and the dialect adapters.
 */
import { type DialectAdapter } from "../dialect/types";
import { type ColumnLike, type TableLike } from "../plan/ast";
import { type JsonSelector } from "./json-path";

/**
 * Statement kinds reported to observability hooks.
 */
export type StatementKind =
  | "select"
  | "exists"
  | "insert"
  | "insert_or_ignore"
  | "insert_get_id"
  | "insert_using"
  | "insert_or_ignore_using"
  | "update"
  | "upsert"
  | "delete"
  | "truncate";

export type CompileHookContext = Readonly<{
  statement: StatementKind;
  dialect: string;
  sql: string;
}>;

/**
 * Observability hooks for monitoring compilation.
 *
 * @example
 * ```typescript
 * const grammar = createGrammar("sqlite", {
 *   hooks: {
 *     onCompile: (ctx) => {
 *       console.log(`[${ctx.dialect}] ${ctx.statement}: ${ctx.sql}`);
 *     },
 *   },
 * });
 * ```
 */
export type GrammarHooks = Readonly<{
  /** Called once per statement compiled through the grammar facade */
  onCompile?: (ctx: CompileHookContext) => void;
}>;

/**
 * The rendering primitives every compiler and dialect builds on.
 */
export interface Grammar {
  readonly dialect: DialectAdapter;
  readonly tablePrefix: string;

  /** Wraps a column reference, handling `table.column`, aliases and JSON selectors. */
  wrap(value: ColumnLike): string;
  /** Wraps a table reference, applying the table prefix. */
  wrapTable(table: TableLike, prefix?: string): string;
  /** Wraps a single identifier segment. `*` is never quoted. */
  wrapValue(value: string): string;
  /** Splits a JSON selector into the wrapped field and a `, '<path>'` suffix. */
  wrapJsonFieldAndPath(selector: JsonSelector): readonly [string, string];
  /** Renders a JSON path as a single-quoted `'$."a"[0]'` literal. */
  wrapJsonPath(selector: JsonSelector): string;
  columnize(columns: readonly ColumnLike[]): string;
  parameter(value: unknown): string;
  parameterize(values: readonly unknown[]): string;
  quoteString(value: string | readonly string[]): string;
  escape(value: unknown, binary?: boolean): string;
}
