/**
 * SQL Dialect Module
 *
 * Provides dialect adapters for different SQL databases.
 * Use `getDialect()` to get the appropriate adapter for a dialect name.
 */
import { z } from "zod";

import { validateInput } from "../errors/validation";
import { defaultDialect } from "./default";
import { postgresDialect } from "./postgres";
import { sqliteDialect } from "./sqlite";
import { type DialectAdapter, type SqlDialect } from "./types";

export { defaultDialect } from "./default";
export { postgresDialect } from "./postgres";
export { sqliteDialect } from "./sqlite";
export type {
  DialectAdapter,
  DialectCapabilities,
  HavingOverrides,
  PredicateOverrides,
  SqlDialect,
} from "./types";
export { quoteDoubleQuoted } from "./utils";

/**
 * Map of dialect names to their adapters.
 */
const DIALECT_ADAPTERS: Record<SqlDialect, DialectAdapter> = {
  default: defaultDialect,
  sqlite: sqliteDialect,
  postgres: postgresDialect,
};

export const sqlDialectSchema = z.enum(["default", "sqlite", "postgres"]);

/**
 * Gets the dialect adapter for a given dialect name.
 *
 * @throws ValidationError for an unknown name
 *
 * @example
 * ```typescript
 * const adapter = getDialect("postgres");
 * adapter.compileSavepoint("trans2"); // "SAVEPOINT trans2"
 * ```
 */
export function getDialect(dialect: SqlDialect): DialectAdapter {
  return DIALECT_ADAPTERS[validateInput(sqlDialectSchema, dialect, "dialect name")];
}

/**
 * Default dialect used when none is specified.
 */
export const DEFAULT_DIALECT: SqlDialect = "default";
