/**
 * PlanSQL: a query-plan to SQL compiler with per-dialect rendering.
 *
 * @example
 * ```typescript
 * import { createGrammar } from "plansql";
 *
 * const grammar = createGrammar("sqlite", { tablePrefix: "app_" });
 *
 * const { sql, params } = grammar.toSql({
 *   from: "users",
 *   wheres: [
 *     { __type: "basic", boolean: "and", column: "age", operator: ">", value: 18 },
 *   ],
 *   orders: [{ __type: "column", column: "name", direction: "asc" }],
 *   limit: 10,
 *   bindings: { where: [18] },
 * });
 * // sql: 'select * from "app_users" where "age" > ? order by "name" asc limit 10'
 * // params: [18]
 * ```
 */

// ============================================================
// Grammar
// ============================================================

export {
  type CompileHookContext,
  createGrammar,
  type Grammar,
  type GrammarHooks,
  type GrammarOptions,
  grammarOptionsSchema,
  QueryGrammar,
  type StatementKind,
} from "./grammar";

// ============================================================
// Query Plans
// ============================================================

export * from "./plan";

// ============================================================
// Compiler
// ============================================================

export {
  type CompiledStatement,
  compileDelete,
  compileExists,
  compileHavings,
  compileInsert,
  compileSelect,
  compileUpdate,
  compileWheres,
  type SqlToken,
  substituteBindingsIntoRawSql,
  tokenizeSql,
} from "./compiler";

// ============================================================
// Dialects
// ============================================================

export {
  defaultDialect,
  type DialectAdapter,
  type DialectCapabilities,
  getDialect,
  type HavingOverrides,
  postgresDialect,
  type PredicateOverrides,
  quoteDoubleQuoted,
  sqlDialectSchema,
  type SqlDialect,
  sqliteDialect,
} from "./dialect";

// ============================================================
// Drizzle
// ============================================================

export { toDrizzleSql } from "./drizzle";

// ============================================================
// Errors
// ============================================================

export {
  type CompileSite,
  CompilerInvariantError,
  ConfigurationError,
  type ErrorCategory,
  EscapeError,
  getErrorSuggestion,
  isPlanSqlError,
  isSystemError,
  isUserRecoverable,
  MalformedPlanError,
  PlanSqlError,
  type PlanSqlErrorOptions,
  UnsupportedOperationError,
  ValidationError,
  type ValidationErrorDetails,
  type ValidationIssue,
} from "./errors";
export { validateInput, wrapZodError } from "./errors/validation";
