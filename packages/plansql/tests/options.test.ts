/**
 * Grammar options, dialect resolution and compile hooks.
 */
import { describe, expect, it, vi } from "vitest";

import { getDialect, sqlDialectSchema, sqliteDialect, type DialectAdapter } from "../src/dialect";
import { ConfigurationError, ValidationError } from "../src/errors";
import { createGrammar, resolveGrammarOptions } from "../src/grammar";
import { basic, usersWhere } from "./test-utils";

describe("resolveGrammarOptions", () => {
  it("defaults to no table prefix and no hooks", () => {
    expect(resolveGrammarOptions()).toEqual({ tablePrefix: "", hooks: {} });
  });

  it("keeps a valid prefix", () => {
    expect(resolveGrammarOptions({ tablePrefix: "app_" }).tablePrefix).toBe("app_");
  });

  it("rejects a prefix with quoting characters", () => {
    let thrown: unknown;
    try {
      resolveGrammarOptions({ tablePrefix: 'app"; drop' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    if (!(thrown instanceof ConfigurationError)) return;
    expect(thrown.message).toBe(
      "Invalid grammar options: tablePrefix: Table prefix may only contain letters, digits and underscores",
    );
    expect(thrown.cause).toBeInstanceOf(ValidationError);
    expect(thrown.suggestion).toBe("Review the options passed to createGrammar().");
  });

  it("validates options when a grammar is created", () => {
    expect(() => createGrammar("sqlite", { tablePrefix: "a b" })).toThrow(ConfigurationError);
  });
});

describe("getDialect", () => {
  it("resolves each dialect name to its adapter", () => {
    expect(getDialect("sqlite")).toBe(sqliteDialect);
    expect(getDialect("postgres").name).toBe("postgres");
    expect(getDialect("default").name).toBe("default");
  });

  it("only accepts known names", () => {
    expect(sqlDialectSchema.safeParse("mysql").success).toBe(false);
    expect(sqlDialectSchema.safeParse("postgres").success).toBe(true);
  });

  it("is the default dialect when createGrammar gets no name", () => {
    expect(createGrammar().dialect.name).toBe("default");
  });
});

describe("custom adapters", () => {
  it("accepts an adapter built by spreading a shipped one", () => {
    const bracketed: DialectAdapter = {
      ...sqliteDialect,
      name: "bracketed",
      quoteIdentifier: (name) => `[${name}]`,
    };
    const grammar = createGrammar(bracketed);
    expect(grammar.compileSelect(usersWhere(basic("users.age", ">", 1)))).toBe(
      "select * from [users] where [users].[age] > ?",
    );
  });
});

describe("onCompile hook", () => {
  it("receives the statement kind, dialect and SQL", () => {
    const onCompile = vi.fn();
    const grammar = createGrammar("sqlite", { hooks: { onCompile } });

    grammar.compileSelect({ from: "users" });

    expect(onCompile).toHaveBeenCalledTimes(1);
    expect(onCompile).toHaveBeenCalledWith({
      statement: "select",
      dialect: "sqlite",
      sql: 'select * from "users"',
    });
  });

  it("fires for write statements", () => {
    const onCompile = vi.fn();
    const grammar = createGrammar("default", { hooks: { onCompile } });

    grammar.toUpdateSql({ from: "users" }, { name: "a" });
    grammar.compileDelete({ from: "users" });

    expect(onCompile.mock.calls.map(([context]) => context)).toEqual([
      { statement: "update", dialect: "default", sql: "update users set name = ?" },
      { statement: "delete", dialect: "default", sql: "delete from users" },
    ]);
  });

  it("fires once per truncate statement", () => {
    const onCompile = vi.fn();
    createGrammar("sqlite", { hooks: { onCompile } }).compileTruncate({ from: "users" });

    expect(onCompile).toHaveBeenCalledTimes(2);
    expect(onCompile).toHaveBeenLastCalledWith({
      statement: "truncate",
      dialect: "sqlite",
      sql: 'delete from "users"',
    });
  });

  it("does not fire for clause compilation", () => {
    const onCompile = vi.fn();
    const grammar = createGrammar("default", { hooks: { onCompile } });

    grammar.compileWheres(usersWhere(basic("id", "=", 1)));
    grammar.compileHavings([]);

    expect(onCompile).not.toHaveBeenCalled();
  });
});
