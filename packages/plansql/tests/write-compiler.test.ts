/**
 * Unit tests for insert, upsert, update, delete and truncate compilation.
 */
import { describe, expect, it } from "vitest";

import { prepareBindingsForInsert } from "../src/compiler";
import { MalformedPlanError, UnsupportedOperationError } from "../src/errors";
import { type QueryPlan, raw } from "../src/plan";
import {
  basic,
  columns,
  defaultGrammar,
  join,
  postgresGrammar,
  sqliteGrammar,
} from "./test-utils";

const grammar = defaultGrammar();
const users: QueryPlan = { from: "users" };

// ============================================================
// Inserts
// ============================================================

describe("compileInsert", () => {
  it("compiles a single record", () => {
    expect(grammar.compileInsert(users, { name: "Ada", age: 36 })).toBe(
      "insert into users (name, age) values (?, ?)",
    );
  });

  it("compiles a batch with one placeholder group per record", () => {
    const records = [
      { name: "Ada", age: 36 },
      { name: "Alan", age: 41 },
    ];
    expect(grammar.compileInsert(users, records)).toBe(
      "insert into users (name, age) values (?, ?), (?, ?)",
    );
    expect(prepareBindingsForInsert(records)).toEqual(["Ada", 36, "Alan", 41]);
  });

  it("orders every record's bindings by the first record's keys", () => {
    expect(
      prepareBindingsForInsert([
        { a: 1, b: 2 },
        { b: 3, a: 4 },
      ]),
    ).toEqual([1, 2, 4, 3]);
  });

  it("inserts default values for an empty record", () => {
    expect(grammar.compileInsert(users, {})).toBe("insert into users default values");
    expect(grammar.compileInsert(users, [])).toBe("insert into users default values");
  });

  it("inlines expressions and drops them from the bindings", () => {
    const values = { name: "Ada", created_at: raw("CURRENT_TIMESTAMP") };
    expect(grammar.toInsertSql(users, values)).toEqual({
      sql: "insert into users (name, created_at) values (?, CURRENT_TIMESTAMP)",
      params: ["Ada"],
    });
  });

  it("requires a target table", () => {
    expect(() => grammar.compileInsert({}, { name: "Ada" })).toThrow(
      "The insert statement requires a target table",
    );
  });

  it("inserts from a select", () => {
    const select = "select name, email from staging";
    expect(grammar.compileInsertUsing(users, ["name", "email"], select)).toBe(
      "insert into users (name, email) select name, email from staging",
    );
    expect(grammar.compileInsertUsing(users, ["*"], select)).toBe(
      "insert into users select name, email from staging",
    );
    expect(grammar.compileInsertUsing(users, [], select)).toBe(
      "insert into users select name, email from staging",
    );
  });
});

describe("insert or ignore", () => {
  it("uses insert or ignore in SQLite", () => {
    expect(sqliteGrammar().compileInsertOrIgnore(users, { name: "Ada" })).toBe(
      'insert or ignore into "users" ("name") values (?)',
    );
    expect(
      sqliteGrammar().compileInsertOrIgnoreUsing(users, ["name"], "select name from staging"),
    ).toBe('insert or ignore into "users" ("name") select name from staging');
  });

  it("uses on conflict do nothing in PostgreSQL", () => {
    expect(postgresGrammar().compileInsertOrIgnore(users, { name: "Ada" })).toBe(
      'insert into "users" ("name") values (?) on conflict do nothing',
    );
  });

  it("is unsupported in the default dialect", () => {
    expect(() => grammar.compileInsertOrIgnore(users, { name: "Ada" })).toThrow(
      "This database engine does not support inserting while ignoring errors.",
    );
    expect(() => grammar.compileInsertOrIgnoreUsing(users, [], "select 1")).toThrow(
      UnsupportedOperationError,
    );
  });
});

describe("compileInsertGetId", () => {
  it("is a plain insert by default", () => {
    expect(grammar.compileInsertGetId(users, { name: "Ada" })).toBe(
      "insert into users (name) values (?)",
    );
  });

  it("returns the id column in PostgreSQL", () => {
    expect(postgresGrammar().compileInsertGetId(users, { name: "Ada" })).toBe(
      'insert into "users" ("name") values (?) returning "id"',
    );
    expect(postgresGrammar().compileInsertGetId(users, { name: "Ada" }, "user_id")).toBe(
      'insert into "users" ("name") values (?) returning "user_id"',
    );
  });
});

describe("compileUpsert", () => {
  const values = { email: "ada@example.test", name: "Ada" };

  it("copies listed columns from the excluded row", () => {
    expect(sqliteGrammar().compileUpsert(users, values, ["email"], ["name"])).toBe(
      'insert into "users" ("email", "name") values (?, ?) on conflict ("email") do update set "name" = "excluded"."name"',
    );
  });

  it("binds mapped columns after the insert values", () => {
    const update = { name: "Ada L.", visits: raw('"visits" + 1') };
    expect(postgresGrammar().compileUpsert(users, values, ["email"], update)).toBe(
      'insert into "users" ("email", "name") values (?, ?) on conflict ("email") do update set "name" = ?, "visits" = "visits" + 1',
    );
    expect(grammar.prepareBindingsForUpsert(values, update)).toEqual([
      "ada@example.test",
      "Ada",
      "Ada L.",
    ]);
  });

  it("is unsupported in the default dialect", () => {
    expect(() => grammar.compileUpsert(users, values, ["email"], ["name"])).toThrow(
      "This database engine does not support upserts.",
    );
  });
});

// ============================================================
// Updates
// ============================================================

describe("compileUpdate", () => {
  it("sets columns in mapping order and appends the where clause", () => {
    expect(
      grammar.toUpdateSql(
        { from: "users", wheres: [basic("id", "=", 7)], bindings: { where: [7] } },
        { name: "Ada", age: 36 },
      ),
    ).toEqual({
      sql: "update users set name = ?, age = ? where id = ?",
      params: ["Ada", 36, 7],
    });
  });

  it("places joins between the table and the set list", () => {
    expect(
      grammar.compileUpdate(
        {
          from: "users",
          joins: [join("orders", [columns("users.id", "=", "orders.user_id")])],
          wheres: [basic("orders.total", ">", 100)],
        },
        { "users.vip": 1 },
      ),
    ).toBe(
      "update users inner join orders on users.id = orders.user_id set users.vip = ? where orders.total > ?",
    );
  });

  it("orders bindings as join, set values, then where", () => {
    const plan: QueryPlan = {
      from: "users",
      joins: [
        join("orders", [basic("orders.status", "=", "paid")]),
        join("teams", [basic("teams.region", "=", "eu")]),
      ],
      wheres: [basic("users.active", "=", 1)],
      bindings: { select: ["ignored"], join: ["paid", "eu"], where: [1] },
    };
    expect(grammar.toUpdateSql(plan, { status: "gold" }).params).toEqual([
      "paid",
      "eu",
      "gold",
      1,
    ]);
  });

  it("resolves deferred values when preparing bindings", () => {
    expect(grammar.prepareBindingsForUpdate({ where: [1] }, { seen_at: () => "later" })).toEqual([
      "later",
      1,
    ]);
  });

  it("rewrites join updates as a rowid subselect in SQLite", () => {
    const plan: QueryPlan = {
      from: "users",
      joins: [join("orders", [columns("users.id", "=", "orders.user_id")])],
      wheres: [basic("orders.total", ">", 100)],
      bindings: { join: [], where: [100] },
    };
    expect(sqliteGrammar().toUpdateSql(plan, { "users.vip": 1 })).toEqual({
      sql: 'update "users" set "vip" = ? where "rowid" in (select "users"."rowid" from "users" inner join "orders" on "users"."id" = "orders"."user_id" where "orders"."total" > ?)',
      params: [1, 100],
    });
  });

  it("rewrites join updates as a ctid subselect in PostgreSQL", () => {
    expect(
      postgresGrammar().compileUpdate(
        {
          from: "users as u",
          joins: [join("orders", [columns("u.id", "=", "orders.user_id")])],
        },
        { vip: true },
      ),
    ).toBe(
      'update "users" as "u" set "vip" = ? where "ctid" in (select "u"."ctid" from "users" as "u" inner join "orders" on "u"."id" = "orders"."user_id")',
    );
  });

  it("binds set values before join bindings in the rewritten form", () => {
    expect(
      sqliteGrammar().prepareBindingsForUpdate(
        { select: ["ignored"], join: ["paid"], where: [100] },
        { vip: 1 },
      ),
    ).toEqual([1, "paid", 100]);
  });
});

// ============================================================
// Deletes
// ============================================================

describe("compileDelete", () => {
  it("deletes with and without a where clause", () => {
    expect(grammar.compileDelete(users)).toBe("delete from users");
    expect(
      grammar.toDeleteSql({
        from: "users",
        wheres: [basic("id", "=", 3)],
        bindings: { select: ["ignored"], where: [3] },
      }),
    ).toEqual({ sql: "delete from users where id = ?", params: [3] });
  });

  it("names the target alias when the plan has joins", () => {
    expect(
      grammar.compileDelete({
        from: "users as u",
        joins: [join("orders", [columns("u.id", "=", "orders.user_id")])],
        wheres: [basic("orders.total", "<", 1)],
      }),
    ).toBe(
      "delete u from users as u inner join orders on u.id = orders.user_id where orders.total < ?",
    );
  });

  it("rewrites join deletes as a row identifier subselect", () => {
    const plan: QueryPlan = {
      from: "users",
      joins: [join("orders", [columns("users.id", "=", "orders.user_id")])],
    };
    expect(sqliteGrammar().compileDelete(plan)).toBe(
      'delete from "users" where "rowid" in (select "users"."rowid" from "users" inner join "orders" on "users"."id" = "orders"."user_id")',
    );
    expect(postgresGrammar().compileDelete(plan)).toBe(
      'delete from "users" where "ctid" in (select "users"."ctid" from "users" inner join "orders" on "users"."id" = "orders"."user_id")',
    );
  });

  it("requires a target table", () => {
    expect(() => grammar.compileDelete({ wheres: [basic("id", "=", 1)] })).toThrow(
      MalformedPlanError,
    );
  });
});

// ============================================================
// Truncate
// ============================================================

describe("compileTruncate", () => {
  it("maps each statement to its bindings", () => {
    expect([...grammar.compileTruncate(users)]).toEqual([["truncate table users", []]]);
    expect([...postgresGrammar().compileTruncate(users)]).toEqual([
      ['truncate "users" restart identity cascade', []],
    ]);
  });

  it("resets the SQLite sequence of the prefixed table", () => {
    const statements = sqliteGrammar({ tablePrefix: "app_" }).compileTruncate({
      from: "main.users",
    });
    expect([...statements]).toEqual([
      ['delete from "main".sqlite_sequence where name = ?', ["app_users"]],
      ['delete from "main"."app_users"', []],
    ]);
  });
});
