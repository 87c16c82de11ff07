/**
 * QueryGrammar
 *
 * Binds a dialect and options into the rendering primitives the compilers
 * use, and exposes one method per statement. Each statement method fires
 * `hooks.onCompile` once with the finished SQL.
 */
import {
  compileDelete,
  compileExists,
  compileHavings,
  compileInsert,
  compileInsertUsing,
  compileSelect,
  compileTruncate,
  compileUpdate,
  compileWheres,
  type CompiledStatement,
  prepareBindingsForDelete,
  prepareBindingsForUpdate,
  prepareBindingsForUpsert,
  substituteBindingsIntoRawSql,
  toDeleteSql,
  toInsertSql,
  toRawSql,
  toSql,
  toUpdateSql,
} from "../compiler";
import { DEFAULT_DIALECT, getDialect } from "../dialect";
import { isPlanSqlError } from "../errors";
import { type DialectAdapter, type SqlDialect } from "../dialect/types";
import {
  type ColumnLike,
  type HavingPredicate,
  type InsertValues,
  type PredicateScope,
  type QueryPlan,
  type RecordValues,
  type TableLike,
  type UpsertUpdate,
} from "../plan/ast";
import { type BindingGroups } from "../plan/bindings";
import { type JsonSelector } from "./json-path";
import {
  type GrammarOptions,
  resolveGrammarOptions,
} from "./options";
import { escape, parameter, parameterize, quoteString } from "./parameters";
import {
  type Grammar,
  type GrammarHooks,
  type StatementKind,
} from "./types";
import {
  columnize,
  wrap,
  wrapJsonFieldAndPath,
  wrapJsonPath,
  wrapTable,
  wrapValue,
} from "./wrap";

export class QueryGrammar implements Grammar {
  readonly dialect: DialectAdapter;
  readonly tablePrefix: string;
  readonly #hooks: GrammarHooks;

  constructor(dialect: DialectAdapter, options: GrammarOptions = {}) {
    const resolved = resolveGrammarOptions(options);
    this.dialect = dialect;
    this.tablePrefix = resolved.tablePrefix;
    this.#hooks = resolved.hooks;
  }

  /**
   * Runs one statement compile, recording the statement and dialect on any
   * PlanSqlError that escapes it.
   */
  #attempt<T>(statement: StatementKind, build: () => T): T {
    try {
      return build();
    } catch (error) {
      if (isPlanSqlError(error)) {
        error.recordSite({ statement, dialect: this.dialect.name });
      }
      throw error;
    }
  }

  #notify(statement: StatementKind, sql: string): void {
    this.#hooks.onCompile?.({ statement, dialect: this.dialect.name, sql });
  }

  #emit(statement: StatementKind, build: () => string): string {
    const sql = this.#attempt(statement, build);
    this.#notify(statement, sql);
    return sql;
  }

  // ============================================================
  // Rendering Primitives
  // ============================================================

  wrap(value: ColumnLike): string {
    return wrap(this, value);
  }

  wrapTable(table: TableLike, prefix?: string): string {
    return wrapTable(this, table, prefix);
  }

  wrapValue(value: string): string {
    return wrapValue(this, value);
  }

  wrapJsonFieldAndPath(selector: JsonSelector): readonly [string, string] {
    return wrapJsonFieldAndPath(this, selector);
  }

  wrapJsonPath(selector: JsonSelector): string {
    return wrapJsonPath(selector);
  }

  columnize(columns: readonly ColumnLike[]): string {
    return columnize(this, columns);
  }

  parameter(value: unknown): string {
    return parameter(this, value);
  }

  parameterize(values: readonly unknown[]): string {
    return parameterize(this, values);
  }

  quoteString(value: string | readonly string[]): string {
    return quoteString(value);
  }

  escape(value: unknown, binary = false): string {
    return escape(this, value, binary);
  }

  // ============================================================
  // Clauses
  // ============================================================

  compileWheres(scope: PredicateScope): string {
    return compileWheres(this, scope);
  }

  compileHavings(havings: readonly HavingPredicate[]): string {
    return compileHavings(this, havings);
  }

  // ============================================================
  // Read Statements
  // ============================================================

  compileSelect(plan: QueryPlan): string {
    return this.#emit("select", () => compileSelect(this, plan));
  }

  compileExists(plan: QueryPlan): string {
    return this.#emit("exists", () => compileExists(this, plan));
  }

  // ============================================================
  // Write Statements
  // ============================================================

  compileInsert(plan: QueryPlan, values: InsertValues): string {
    return this.#emit("insert", () => compileInsert(this, plan, values));
  }

  compileInsertOrIgnore(plan: QueryPlan, values: InsertValues): string {
    return this.#emit(
      "insert_or_ignore",
      () => this.dialect.compileInsertOrIgnore(this, plan, values),
    );
  }

  compileInsertGetId(
    plan: QueryPlan,
    values: InsertValues,
    sequence?: string,
  ): string {
    return this.#emit(
      "insert_get_id",
      () => this.dialect.compileInsertGetId(this, plan, values, sequence),
    );
  }

  compileInsertUsing(
    plan: QueryPlan,
    columns: readonly string[],
    sql: string,
  ): string {
    return this.#emit("insert_using", () => compileInsertUsing(this, plan, columns, sql));
  }

  compileInsertOrIgnoreUsing(
    plan: QueryPlan,
    columns: readonly string[],
    sql: string,
  ): string {
    return this.#emit(
      "insert_or_ignore_using",
      () => this.dialect.compileInsertOrIgnoreUsing(this, plan, columns, sql),
    );
  }

  compileUpsert(
    plan: QueryPlan,
    values: InsertValues,
    uniqueBy: readonly string[],
    update: UpsertUpdate,
  ): string {
    return this.#emit(
      "upsert",
      () => this.dialect.compileUpsert(this, plan, values, uniqueBy, update),
    );
  }

  compileUpdate(plan: QueryPlan, values: RecordValues): string {
    return this.#emit("update", () => compileUpdate(this, plan, values));
  }

  compileDelete(plan: QueryPlan): string {
    return this.#emit("delete", () => compileDelete(this, plan));
  }

  compileTruncate(plan: QueryPlan): ReadonlyMap<string, readonly unknown[]> {
    const statements = this.#attempt("truncate", () => compileTruncate(this, plan));
    for (const sql of statements.keys()) {
      this.#notify("truncate", sql);
    }
    return statements;
  }

  // ============================================================
  // Bindings
  // ============================================================

  prepareBindingsForUpdate(
    bindings: Partial<BindingGroups>,
    values: RecordValues,
  ): unknown[] {
    return prepareBindingsForUpdate(this, bindings, values);
  }

  prepareBindingsForDelete(bindings: Partial<BindingGroups>): unknown[] {
    return prepareBindingsForDelete(bindings);
  }

  prepareBindingsForUpsert(values: InsertValues, update: UpsertUpdate): unknown[] {
    return prepareBindingsForUpsert(values, update);
  }

  prepareBindingForJsonContains(value: unknown): unknown {
    return this.dialect.prepareBindingForJsonContains(value);
  }

  substituteBindingsIntoRawSql(sql: string, bindings: readonly unknown[]): string {
    return substituteBindingsIntoRawSql(this, sql, bindings);
  }

  // ============================================================
  // Compiled Statements
  // ============================================================

  toSql(plan: QueryPlan): CompiledStatement {
    const compiled = this.#attempt("select", () => toSql(this, plan));
    this.#notify("select", compiled.sql);
    return compiled;
  }

  toInsertSql(plan: QueryPlan, values: InsertValues): CompiledStatement {
    const compiled = this.#attempt("insert", () => toInsertSql(this, plan, values));
    this.#notify("insert", compiled.sql);
    return compiled;
  }

  toUpdateSql(plan: QueryPlan, values: RecordValues): CompiledStatement {
    const compiled = this.#attempt("update", () => toUpdateSql(this, plan, values));
    this.#notify("update", compiled.sql);
    return compiled;
  }

  toDeleteSql(plan: QueryPlan): CompiledStatement {
    const compiled = this.#attempt("delete", () => toDeleteSql(this, plan));
    this.#notify("delete", compiled.sql);
    return compiled;
  }

  toRawSql(compiled: CompiledStatement): string {
    return toRawSql(this, compiled);
  }

  // ============================================================
  // Dialect Capabilities
  // ============================================================

  compileRandom(seed?: string | number): string {
    return this.dialect.compileRandom(seed);
  }

  compileSavepoint(name: string): string {
    return this.dialect.compileSavepoint(name);
  }

  compileSavepointRollBack(name: string): string {
    return this.dialect.compileSavepointRollBack(name);
  }

  compileThreadCount(): string | null {
    return this.dialect.compileThreadCount();
  }

  supportsSavepoints(): boolean {
    return this.dialect.capabilities.supportsSavepoints;
  }

  getOperators(): readonly string[] {
    return this.dialect.capabilities.operators;
  }

  getBitwiseOperators(): readonly string[] {
    return this.dialect.capabilities.bitwiseOperators;
  }
}

/**
 * Creates a grammar for a dialect adapter or a dialect name.
 *
 * @example
 * ```typescript
 * const grammar = createGrammar("sqlite", { tablePrefix: "app_" });
 * grammar.compileSelect({ from: "users", wheres: [...] });
 * ```
 */
export function createGrammar(
  dialect: DialectAdapter | SqlDialect = DEFAULT_DIALECT,
  options: GrammarOptions = {},
): QueryGrammar {
  const adapter = typeof dialect === "string" ? getDialect(dialect) : dialect;
  return new QueryGrammar(adapter, options);
}
