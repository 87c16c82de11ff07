/**
 * Shared test helpers: grammars per dialect, predicate builders and an
 * in-memory SQLite database behind drizzle.
 */
import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";

import { createGrammar, type GrammarOptions, type QueryGrammar } from "../src/grammar";
import {
  type BasicPredicate,
  type BooleanConnector,
  type ColumnLike,
  type ColumnOrder,
  type ColumnPredicate,
  type JoinSpec,
  type Predicate,
  type QueryPlan,
  type SortDirection,
} from "../src/plan";

// ============================================================
// Grammars
// ============================================================

export function defaultGrammar(options?: GrammarOptions): QueryGrammar {
  return createGrammar("default", options);
}

export function sqliteGrammar(options?: GrammarOptions): QueryGrammar {
  return createGrammar("sqlite", options);
}

export function postgresGrammar(options?: GrammarOptions): QueryGrammar {
  return createGrammar("postgres", options);
}

// ============================================================
// Plan Builders
// ============================================================

export function basic(
  column: ColumnLike,
  operator: string,
  value: unknown,
  boolean: BooleanConnector = "and",
): BasicPredicate {
  return { __type: "basic", boolean, column, operator, value };
}

export function columns(
  first: ColumnLike,
  operator: string,
  second: ColumnLike,
  boolean: BooleanConnector = "and",
): ColumnPredicate {
  return { __type: "column", boolean, first, operator, second };
}

export function join(
  table: string,
  wheres: readonly Predicate[],
  type = "inner",
): JoinSpec {
  return { __type: "join", type, table, wheres };
}

export function orderBy(
  column: ColumnLike,
  direction: SortDirection = "asc",
): ColumnOrder {
  return { __type: "column", column, direction };
}

/**
 * A plan over `users` filtered by the given predicates.
 */
export function usersWhere(...wheres: Predicate[]): QueryPlan {
  return { from: "users", wheres };
}

// ============================================================
// SQLite
// ============================================================

export type TestDatabase = Readonly<{
  db: BetterSQLite3Database;
  close: () => void;
}>;

/**
 * Opens an in-memory SQLite database wrapped in drizzle.
 */
export function createTestDatabase(): TestDatabase {
  const sqlite = new Database(":memory:");
  return {
    db: drizzle(sqlite),
    close: () => sqlite.close(),
  };
}
