/**
 * Shared Compiler Utilities
 *
 * Text helpers shared between the select, predicate and write compilers.
 */
import { CompilerInvariantError, MalformedPlanError } from "../errors";
import { type QueryPlan, type TableLike } from "../plan/ast";

const LEADING_BOOLEAN = /and |or /i;
const ALIAS_SEPARATOR = /\s+as\s+/i;

/**
 * Joins non-empty fragments with single spaces.
 */
export function concatenate(segments: readonly (string | undefined)[]): string {
  return segments
    .filter((segment): segment is string => segment !== undefined && segment !== "")
    .join(" ");
}

/**
 * Removes the first `and ` / `or ` (case-insensitive). Every compiled
 * predicate starts with its connector, so this strips the first one.
 */
export function removeLeadingBoolean(value: string): string {
  return value.replace(LEADING_BOOLEAN, "");
}

/**
 * Strips a known keyword prefix such as `"where "`, `"on "` or `"having "`.
 */
export function stripKeyword(sql: string, keyword: string): string {
  if (!sql.startsWith(keyword)) {
    throw new CompilerInvariantError(
      `Expected compiled clause to start with "${keyword}"`,
      { keyword, sql },
    );
  }
  return sql.slice(keyword.length);
}

/**
 * Splits `"table as alias"` on the alias keyword.
 */
export function splitAlias(value: string): string[] {
  return value.split(ALIAS_SEPARATOR);
}

/**
 * Returns the alias of an aliased reference, or the reference itself.
 */
export function lastAliasSegment(value: string): string {
  const segments = splitAlias(value);
  return segments.at(-1) ?? value;
}

export function requireTable(plan: QueryPlan, statement: string): TableLike {
  if (plan.from === undefined) {
    throw new MalformedPlanError(
      `The ${statement} statement requires a target table`,
      { statement },
    );
  }
  return plan.from;
}

/**
 * Validates a row count that is inlined into the SQL text.
 */
export function assertRowCount(value: number, clause: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new MalformedPlanError(
      `The ${clause} must be a non-negative integer, got ${String(value)}`,
      { clause, value },
    );
  }
  return value;
}
