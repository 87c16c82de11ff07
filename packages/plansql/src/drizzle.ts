/**
 * Drizzle Bridge
 *
 * Converts a compiled statement into a Drizzle SQL object so it can run on
 * any Drizzle database instance. Each `?` placeholder becomes a bound
 * parameter; Drizzle then renders it in the driver's own style (`?` for
 * SQLite, `$1` for PostgreSQL).
 */
import { type SQL, sql } from "drizzle-orm";

import { tokenizeSql, type CompiledStatement } from "./compiler";
import { MalformedPlanError } from "./errors";

/**
 * @throws MalformedPlanError when the placeholder count and the parameter
 *   count differ
 *
 * @example
 * ```typescript
 * const grammar = createGrammar("sqlite");
 * const statement = grammar.toSql({ from: "users", wheres: [...] });
 * const rows = db.all(toDrizzleSql(statement));
 * ```
 */
export function toDrizzleSql(compiled: CompiledStatement): SQL {
  const chunks: SQL[] = [];
  let position = 0;

  for (const token of tokenizeSql(compiled.sql)) {
    switch (token.kind) {
      case "text": {
        chunks.push(sql.raw(token.text));
        break;
      }
      case "escaped_placeholder": {
        chunks.push(sql.raw("?"));
        break;
      }
      case "placeholder": {
        if (position >= compiled.params.length) {
          throw new MalformedPlanError(
            `Statement has more placeholders than parameters (${compiled.params.length}).`,
            { sql: compiled.sql, params: compiled.params.length },
          );
        }
        // sql.param keeps array values a single parameter
        chunks.push(sql`${sql.param(compiled.params[position])}`);
        position += 1;
        break;
      }
    }
  }

  if (position !== compiled.params.length) {
    throw new MalformedPlanError(
      `Statement has ${position} placeholder(s) but ${compiled.params.length} parameter(s).`,
      { sql: compiled.sql, params: compiled.params.length },
    );
  }

  return sql.join(chunks, sql.raw(""));
}
