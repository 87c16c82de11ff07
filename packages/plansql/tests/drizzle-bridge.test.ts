/**
 * Conversion of compiled statements into drizzle SQL objects.
 */
import { PgDialect } from "drizzle-orm/pg-core";
import { SQLiteSyncDialect } from "drizzle-orm/sqlite-core";
import { describe, expect, it } from "vitest";

import { toDrizzleSql } from "../src/drizzle";
import { MalformedPlanError } from "../src/errors";
import { basic, postgresGrammar, sqliteGrammar, usersWhere } from "./test-utils";

const sqliteRenderer = new SQLiteSyncDialect();
const pgRenderer = new PgDialect();

describe("toDrizzleSql", () => {
  it("keeps ? placeholders for SQLite", () => {
    const statement = sqliteGrammar().toSql({
      ...usersWhere(basic("id", "=", 1), basic("name", "=", "ada")),
      bindings: { where: [1, "ada"] },
    });
    const query = sqliteRenderer.sqlToQuery(toDrizzleSql(statement));

    expect(query.sql).toBe('select * from "users" where "id" = ? and "name" = ?');
    expect(query.params).toEqual([1, "ada"]);
  });

  it("numbers placeholders for PostgreSQL", () => {
    const statement = postgresGrammar().toSql({
      ...usersWhere(basic("id", "=", 1), basic("name", "like", "a%")),
      bindings: { where: [1, "a%"] },
    });
    const query = pgRenderer.sqlToQuery(toDrizzleSql(statement));

    expect(query.sql).toBe('select * from "users" where "id" = $1 and "name"::text like $2');
    expect(query.params).toEqual([1, "a%"]);
  });

  it("unescapes ?? into the literal ? operator", () => {
    const statement = postgresGrammar().toSql({
      ...usersWhere(
        { __type: "json_contains_key", boolean: "and", column: "data->theme", not: false },
        basic("id", ">", 0),
      ),
      bindings: { where: [0] },
    });
    const query = pgRenderer.sqlToQuery(toDrizzleSql(statement));

    expect(query.sql).toBe(
      `select * from "users" where coalesce(("data")::jsonb ? 'theme', false) and "id" > $1`,
    );
    expect(query.params).toEqual([0]);
  });

  it("keeps parameters after a quoted JSON path key", () => {
    const statement = postgresGrammar().toSql({
      ...usersWhere(basic("data->it's", "=", "x"), basic("id", "=", 1)),
      bindings: { where: ["x", 1] },
    });
    const query = pgRenderer.sqlToQuery(toDrizzleSql(statement));

    expect(query.sql).toBe(`select * from "users" where "data"->>'it''s' = $1 and "id" = $2`);
    expect(query.params).toEqual(["x", 1]);
  });

  it("leaves question marks inside string literals alone", () => {
    const query = sqliteRenderer.sqlToQuery(
      toDrizzleSql({ sql: "select '?' as mark, ? as value", params: [7] }),
    );

    expect(query.sql).toBe("select '?' as mark, ? as value");
    expect(query.params).toEqual([7]);
  });

  it("binds an array value as one parameter", () => {
    const query = pgRenderer.sqlToQuery(
      toDrizzleSql({ sql: "select * from t where tags && ?", params: [["a", "b"]] }),
    );

    expect(query.sql).toBe("select * from t where tags && $1");
    expect(query.params).toEqual([["a", "b"]]);
  });

  it("rejects a statement with too few parameters", () => {
    expect(() => toDrizzleSql({ sql: "a = ? and b = ?", params: [1] })).toThrow(
      "Statement has more placeholders than parameters (1).",
    );
  });

  it("rejects a statement with parameters left over", () => {
    expect(() => toDrizzleSql({ sql: "a = ?", params: [1, 2] })).toThrow(MalformedPlanError);
    expect(() => toDrizzleSql({ sql: "a = ?", params: [1, 2] })).toThrow(
      "Statement has 1 placeholder(s) but 2 parameter(s).",
    );
  });
});
