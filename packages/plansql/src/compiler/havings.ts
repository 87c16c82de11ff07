/**
 * Having Compilation
 *
 * Mirrors the predicate compiler for the aggregate filter of a grouped
 * query. Nested groups are sub-plans whose own havings are unwrapped and
 * parenthesized.
 */
import { MalformedPlanError } from "../errors";
import { type Grammar } from "../grammar/types";
import { type HavingPredicate } from "../plan/ast";
import { requireRange } from "./predicates";
import { removeLeadingBoolean, stripKeyword } from "./utils";

const HAVING_KEYWORD = "having ";

/**
 * @returns `having ...`, or an empty string for an empty list
 */
export function compileHavings(
  grammar: Grammar,
  havings: readonly HavingPredicate[],
): string {
  if (havings.length === 0) {
    return "";
  }
  const parts = havings.map(
    (having) => `${having.boolean} ${compileHaving(grammar, having)}`,
  );
  return HAVING_KEYWORD + removeLeadingBoolean(parts.join(" "));
}

function compileHaving(grammar: Grammar, having: HavingPredicate): string {
  const overrides = grammar.dialect.havingOverrides ?? {};

  switch (having.__type) {
    case "raw": {
      return overrides.raw?.(grammar, having) ?? having.sql;
    }
    case "basic": {
      if (overrides.basic) {
        return overrides.basic(grammar, having);
      }
      const column = grammar.wrap(having.column);
      return `${column} ${having.operator} ${grammar.parameter(having.value)}`;
    }
    case "between": {
      if (overrides.between) {
        return overrides.between(grammar, having);
      }
      const column = grammar.wrap(having.column);
      const [min, max] = requireRange(having.values, "Having-between", column);
      const between = having.not ? "not between" : "between";
      return `${column} ${between} ${grammar.parameter(min)} and ${grammar.parameter(max)}`;
    }
    case "null": {
      return (
        overrides.null?.(grammar, having) ?? `${grammar.wrap(having.column)} is null`
      );
    }
    case "not_null": {
      return (
        overrides.not_null?.(grammar, having) ??
        `${grammar.wrap(having.column)} is not null`
      );
    }
    case "bitwise": {
      if (overrides.bitwise) {
        return overrides.bitwise(grammar, having);
      }
      const column = grammar.wrap(having.column);
      const parameter = grammar.parameter(having.value);
      return `(${column} ${having.operator} ${parameter}) != 0`;
    }
    case "expression": {
      return (
        overrides.expression?.(grammar, having) ??
        String(having.expression.getValue(grammar))
      );
    }
    case "nested": {
      if (overrides.nested) {
        return overrides.nested(grammar, having);
      }
      const compiled = compileHavings(grammar, having.query.havings ?? []);
      if (compiled === "") {
        throw new MalformedPlanError("A nested having group has no predicates.");
      }
      return `(${stripKeyword(compiled, HAVING_KEYWORD)})`;
    }
    default: {
      const _exhaustive: never = having;
      return _exhaustive;
    }
  }
}
