/**
 * Unit tests for having compilation.
 */
import { describe, expect, it } from "vitest";

import { type BetweenHaving, raw } from "../src/plan";
import { defaultGrammar, postgresGrammar } from "./test-utils";

const grammar = defaultGrammar();
const total = raw("sum(total)");

describe("compileHavings", () => {
  it("returns an empty string without predicates", () => {
    expect(grammar.compileHavings([])).toBe("");
  });

  it("compiles basic comparisons and drops the first connector", () => {
    expect(
      grammar.compileHavings([
        { __type: "basic", boolean: "or", column: total, operator: ">", value: 100 },
        { __type: "basic", boolean: "and", column: "region", operator: "=", value: "eu" },
      ]),
    ).toBe("having sum(total) > ? and region = ?");
  });

  it("passes raw text through", () => {
    expect(
      grammar.compileHavings([{ __type: "raw", boolean: "and", sql: "count(*) > 2" }]),
    ).toBe("having count(*) > 2");
  });

  it("compiles between and not between", () => {
    const between: BetweenHaving = {
      __type: "between",
      boolean: "and",
      column: "total",
      values: [1, 10],
      not: false,
    };
    expect(grammar.compileHavings([between])).toBe("having total between ? and ?");
    expect(grammar.compileHavings([{ ...between, not: true }])).toBe(
      "having total not between ? and ?",
    );
  });

  it("requires exactly two between endpoints", () => {
    expect(() =>
      grammar.compileHavings([
        { __type: "between", boolean: "and", column: "total", values: [1, 2, 3], not: false },
      ]),
    ).toThrow("Having-between predicate on total requires exactly two values, got 3.");
  });

  it("compiles null checks", () => {
    expect(
      grammar.compileHavings([
        { __type: "null", boolean: "and", column: "region" },
        { __type: "not_null", boolean: "or", column: "country" },
      ]),
    ).toBe("having region is null or country is not null");
  });

  it("compiles bitwise checks as a non-zero test", () => {
    expect(
      grammar.compileHavings([
        { __type: "bitwise", boolean: "and", column: "flags", operator: "&", value: 2 },
      ]),
    ).toBe("having (flags & ?) != 0");
  });

  it("uses the PostgreSQL bitwise override", () => {
    expect(
      postgresGrammar().compileHavings([
        { __type: "bitwise", boolean: "and", column: "flags", operator: "&", value: 2 },
      ]),
    ).toBe('having ("flags" & ?)::bool');
  });

  it("inlines expression havings", () => {
    expect(
      grammar.compileHavings([
        { __type: "expression", boolean: "and", expression: raw("max(score) < 10") },
      ]),
    ).toBe("having max(score) < 10");
  });

  it("parenthesizes nested groups without the having keyword", () => {
    expect(
      grammar.compileHavings([
        { __type: "basic", boolean: "and", column: total, operator: ">", value: 0 },
        {
          __type: "nested",
          boolean: "or",
          query: {
            havings: [
              { __type: "basic", boolean: "and", column: total, operator: ">", value: 100 },
              { __type: "basic", boolean: "or", column: total, operator: "<", value: 5 },
            ],
          },
        },
      ]),
    ).toBe("having sum(total) > ? or (sum(total) > ? or sum(total) < ?)");
  });

  it("rejects an empty nested group", () => {
    expect(() =>
      grammar.compileHavings([{ __type: "nested", boolean: "and", query: {} }]),
    ).toThrow("A nested having group has no predicates.");
  });
});
