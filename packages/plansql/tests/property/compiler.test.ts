import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { tokenizeSql } from "../../src/compiler";
import { type Predicate, type QueryPlan } from "../../src/plan";
import { defaultGrammar, sqliteGrammar } from "../test-utils";
import {
  basicPredicateArb,
  basicPredicatesArb,
  bindingListArb,
  boundPredicatesArb,
  connectorArb,
  identifierArb,
  leafBoundPredicateArb,
  recordValuesArb,
  rowCountArb,
} from "./arbitraries";

const grammar = defaultGrammar();

function placeholderCount(sql: string): number {
  return tokenizeSql(sql).filter((token) => token.kind === "placeholder").length;
}

describe("Predicate List Properties", () => {
  it("compiles an empty list to an empty string", () => {
    fc.assert(
      fc.property(identifierArb, (table) => {
        expect(grammar.compileWheres({ from: table, wheres: [] })).toBe("");
      }),
    );
  });

  it("never shows the connector of a single predicate", () => {
    fc.assert(
      fc.property(basicPredicateArb, (predicate) => {
        expect(grammar.compileWheres({ wheres: [predicate] })).toBe(
          `where ${predicate.column} ${predicate.operator} ?`,
        );
      }),
    );
  });

  it("emits one placeholder per bound value", () => {
    fc.assert(
      fc.property(basicPredicatesArb, (wheres) => {
        expect(placeholderCount(grammar.compileWheres({ wheres }))).toBe(wheres.length);
      }),
    );
  });

  it("emits one placeholder per binding for every predicate variant", () => {
    fc.assert(
      fc.property(boundPredicatesArb, ({ wheres, bindings }) => {
        const sql = sqliteGrammar().compileWheres({ wheres });
        expect(placeholderCount(sql)).toBe(bindings.length);
      }),
    );
  });

  it("leaves no placeholder once the predicates' own values are substituted", () => {
    fc.assert(
      fc.property(boundPredicatesArb, ({ wheres, bindings }) => {
        const sqlite = sqliteGrammar();
        const substituted = sqlite.substituteBindingsIntoRawSql(
          sqlite.compileWheres({ wheres }),
          bindings,
        );
        expect(placeholderCount(substituted)).toBe(0);
      }),
    );
  });

  it("keeps every value of a nested group in order", () => {
    fc.assert(
      fc.property(leafBoundPredicateArb, leafBoundPredicateArb, (first, second) => {
        const sqlite = sqliteGrammar();
        const flat = sqlite.compileWheres({ wheres: [first.predicate, second.predicate] });
        const nested = sqlite.compileWheres({
          wheres: [
            {
              __type: "nested",
              boolean: "and",
              query: { wheres: [first.predicate, second.predicate] },
            },
          ],
        });
        const bindings = [...first.bindings, ...second.bindings];
        expect(sqlite.substituteBindingsIntoRawSql(nested, bindings)).toBe(
          `where (${sqlite.substituteBindingsIntoRawSql(flat, bindings).slice("where ".length)})`,
        );
      }),
    );
  });

  it("compiles empty in-lists to tautologies for any column", () => {
    fc.assert(
      fc.property(identifierArb, connectorArb, (column, boolean) => {
        const emptyIn: Predicate = { __type: "in", boolean, column, values: [] };
        const emptyNotIn: Predicate = { __type: "not_in", boolean, column, values: [] };
        expect(grammar.compileWheres({ wheres: [emptyIn] })).toBe("where 0 = 1");
        expect(grammar.compileWheres({ wheres: [emptyNotIn] })).toBe("where 1 = 1");
      }),
    );
  });

  it("parenthesizes a nested group without repeating the keyword", () => {
    fc.assert(
      fc.property(basicPredicatesArb, connectorArb, (inner, boolean) => {
        const flat = grammar.compileWheres({ wheres: inner });
        const nested = grammar.compileWheres({
          wheres: [{ __type: "nested", boolean, query: { wheres: inner } }],
        });
        expect(nested).toBe(`where (${flat.slice("where ".length)})`);
      }),
    );
  });

  it("parenthesizes a nested join group without the on keyword", () => {
    fc.assert(
      fc.property(basicPredicatesArb, (inner) => {
        const join = { __type: "join", type: "inner", table: "t", wheres: inner } as const;
        const flat = grammar.compileWheres(join);
        const nested = grammar.compileWheres({
          ...join,
          wheres: [{ __type: "nested", boolean: "and", query: join }],
        });
        expect(nested).toBe(`on (${flat.slice("on ".length)})`);
      }),
    );
  });
});

describe("Select Properties", () => {
  it("folds the offset into the group-limit filter", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 100 }), rowCountArb, (value, offset) => {
        const sql = grammar.compileSelect({
          from: "players",
          offset,
          groupLimit: { value, column: "team" },
        });
        expect(sql).toBe(
          "select * from (select *, row_number() over (partition by team) as ranked_row from players) " +
            `as ranked_table where ranked_row <= ${value + offset} and ranked_row > ${offset} order by ranked_row`,
        );
      }),
    );
  });

  it("aggregates a union over a derived table", () => {
    fc.assert(
      fc.property(identifierArb, identifierArb, fc.boolean(), (first, second, all) => {
        const plan: QueryPlan = {
          from: first,
          unions: [{ query: { from: second }, all }],
          aggregate: { function: "count", columns: ["*"] },
        };
        const union = all ? "union all" : "union";
        expect(grammar.compileSelect(plan)).toBe(
          `select count(*) as aggregate from ((select * from ${first}) ${union} (select * from ${second})) as temp_table`,
        );
      }),
    );
  });
});

describe("Update Binding Properties", () => {
  it("orders join bindings, then set values, then where bindings", () => {
    fc.assert(
      fc.property(
        bindingListArb,
        bindingListArb,
        bindingListArb,
        recordValuesArb,
        (select, join, where, values) => {
          expect(grammar.prepareBindingsForUpdate({ select, join, where }, values)).toEqual([
            ...join,
            ...Object.values(values),
            ...where,
          ]);
        },
      ),
    );
  });
});
