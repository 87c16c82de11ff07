/**
 * Predicate Compilation
 *
 * Compiles the `where` predicates of a query plan and the `on` predicates
 * of a join. Each variant renders to fixed text; dialects may replace a
 * variant through `predicateOverrides` or supply the capability methods the
 * JSON, full-text and case-sensitive-like variants delegate to.
 */
import { MalformedPlanError } from "../errors";
import { parseJsonSelector } from "../grammar/json-path";
import { type Grammar } from "../grammar/types";
import {
  type BasicPredicate,
  type BetweenColumnsPredicate,
  type BetweenPredicate,
  type DateComponentPredicate,
  type InPredicate,
  type InRawPredicate,
  type LikePredicate,
  type NestedPredicate,
  type NotInPredicate,
  type NotInRawPredicate,
  type Predicate,
  type PredicateScope,
  type RowValuesPredicate,
  type ValueBetweenPredicate,
} from "../plan/ast";
import { compileSelect } from "./select";
import { removeLeadingBoolean, stripKeyword } from "./utils";

// ============================================================
// Clause Compilation
// ============================================================

/**
 * The keyword a scope's predicate list starts with.
 */
function predicateKeyword(scope: PredicateScope): "where" | "on" {
  return scope.__type === "join" ? "on" : "where";
}

/**
 * Renders every predicate of the scope as `<boolean> <sql>`, in order.
 */
function compileWheresToArray(
  grammar: Grammar,
  scope: PredicateScope,
): string[] {
  return (scope.wheres ?? []).map(
    (predicate) => `${predicate.boolean} ${compilePredicate(grammar, predicate)}`,
  );
}

/**
 * Compiles the predicate list of a plan (`where ...`) or a join (`on ...`).
 *
 * @returns An empty string when the scope has no predicates
 */
export function compileWheres(grammar: Grammar, scope: PredicateScope): string {
  const parts = compileWheresToArray(grammar, scope);
  if (parts.length === 0) {
    return "";
  }
  return `${predicateKeyword(scope)} ${removeLeadingBoolean(parts.join(" "))}`;
}

// ============================================================
// Variant Dispatch
// ============================================================

type Renderer<P> = (grammar: Grammar, predicate: P) => string;

function render<P>(
  grammar: Grammar,
  predicate: P,
  override: Renderer<P> | undefined,
  fallback: Renderer<P>,
): string {
  return (override ?? fallback)(grammar, predicate);
}

/**
 * Compiles a single predicate, without its boolean connector.
 */
export function compilePredicate(grammar: Grammar, predicate: Predicate): string {
  const overrides = grammar.dialect.predicateOverrides ?? {};

  switch (predicate.__type) {
    case "raw": {
      return render(grammar, predicate, overrides.raw, (g, p) =>
        typeof p.sql === "string" ? p.sql : String(p.sql.getValue(g)),
      );
    }
    case "basic": {
      return render(grammar, predicate, overrides.basic, compileBasic);
    }
    case "bitwise": {
      return render(grammar, predicate, overrides.bitwise, (g, p) =>
        compilePredicate(g, { ...p, __type: "basic" }),
      );
    }
    case "like": {
      return render(grammar, predicate, overrides.like, compileLike);
    }
    case "in": {
      return render(grammar, predicate, overrides.in, compileIn);
    }
    case "not_in": {
      return render(grammar, predicate, overrides.not_in, compileNotIn);
    }
    case "in_raw": {
      return render(grammar, predicate, overrides.in_raw, compileInRaw);
    }
    case "not_in_raw": {
      return render(grammar, predicate, overrides.not_in_raw, compileNotInRaw);
    }
    case "null": {
      return render(
        grammar,
        predicate,
        overrides.null,
        (g, p) => `${g.wrap(p.column)} is null`,
      );
    }
    case "not_null": {
      return render(
        grammar,
        predicate,
        overrides.not_null,
        (g, p) => `${g.wrap(p.column)} is not null`,
      );
    }
    case "between": {
      return render(grammar, predicate, overrides.between, compileBetween);
    }
    case "between_columns": {
      return render(
        grammar,
        predicate,
        overrides.between_columns,
        compileBetweenColumns,
      );
    }
    case "value_between": {
      return render(
        grammar,
        predicate,
        overrides.value_between,
        compileValueBetween,
      );
    }
    case "date_component": {
      return render(
        grammar,
        predicate,
        overrides.date_component,
        compileDateComponent,
      );
    }
    case "column": {
      return render(
        grammar,
        predicate,
        overrides.column,
        (g, p) => `${g.wrap(p.first)} ${p.operator} ${g.wrap(p.second)}`,
      );
    }
    case "nested": {
      return render(grammar, predicate, overrides.nested, compileNested);
    }
    case "sub": {
      return render(
        grammar,
        predicate,
        overrides.sub,
        (g, p) => `${g.wrap(p.column)} ${p.operator} (${compileSelect(g, p.query)})`,
      );
    }
    case "exists": {
      return render(
        grammar,
        predicate,
        overrides.exists,
        (g, p) => `exists (${compileSelect(g, p.query)})`,
      );
    }
    case "not_exists": {
      return render(
        grammar,
        predicate,
        overrides.not_exists,
        (g, p) => `not exists (${compileSelect(g, p.query)})`,
      );
    }
    case "row_values": {
      return render(grammar, predicate, overrides.row_values, compileRowValues);
    }
    case "json_boolean": {
      return render(grammar, predicate, overrides.json_boolean, (g, p) => {
        const selector = g.dialect.wrapJsonBooleanSelector(
          g,
          parseJsonSelector(p.column),
        );
        const value = g.dialect.wrapJsonBooleanValue(p.value ? "true" : "false");
        return `${selector} ${p.operator} ${value}`;
      });
    }
    case "json_contains": {
      return render(
        grammar,
        predicate,
        overrides.json_contains,
        (g, p) =>
          negate(p.not) +
          g.dialect.compileJsonContains(g, p.column, g.parameter(p.value)),
      );
    }
    case "json_overlaps": {
      return render(
        grammar,
        predicate,
        overrides.json_overlaps,
        (g, p) =>
          negate(p.not) +
          g.dialect.compileJsonOverlaps(g, p.column, g.parameter(p.value)),
      );
    }
    case "json_contains_key": {
      return render(
        grammar,
        predicate,
        overrides.json_contains_key,
        (g, p) => negate(p.not) + g.dialect.compileJsonContainsKey(g, p.column),
      );
    }
    case "json_length": {
      return render(grammar, predicate, overrides.json_length, (g, p) =>
        g.dialect.compileJsonLength(g, p.column, p.operator, g.parameter(p.value)),
      );
    }
    case "full_text": {
      return render(grammar, predicate, overrides.full_text, (g, p) =>
        g.dialect.compileFullText(g, p),
      );
    }
    case "expression": {
      return render(grammar, predicate, overrides.expression, (g, p) =>
        String(p.expression.getValue(g)),
      );
    }
    default: {
      const _exhaustive: never = predicate;
      return _exhaustive;
    }
  }
}

// ============================================================
// Variant Renderers
// ============================================================

function negate(not: boolean): string {
  return not ? "not " : "";
}

/**
 * `?` is the placeholder character, so one inside an operator (PostgreSQL's
 * `?|`, `?&`) is escaped as `??`.
 */
export function escapeOperator(operator: string): string {
  return operator.replaceAll("?", "??");
}

export function compileBasic(grammar: Grammar, predicate: BasicPredicate): string {
  const value = grammar.parameter(predicate.value);
  return `${grammar.wrap(predicate.column)} ${escapeOperator(predicate.operator)} ${value}`;
}

function compileLike(grammar: Grammar, predicate: LikePredicate): string {
  if (predicate.caseSensitive) {
    return grammar.dialect.compileCaseSensitiveLike(grammar, predicate);
  }
  return compilePredicate(grammar, {
    __type: "basic",
    boolean: predicate.boolean,
    column: predicate.column,
    operator: predicate.not ? "not like" : "like",
    value: predicate.value,
  });
}

function compileIn(grammar: Grammar, predicate: InPredicate): string {
  if (predicate.values.length === 0) {
    return "0 = 1";
  }
  return `${grammar.wrap(predicate.column)} in (${grammar.parameterize(predicate.values)})`;
}

function compileNotIn(grammar: Grammar, predicate: NotInPredicate): string {
  if (predicate.values.length === 0) {
    return "1 = 1";
  }
  return `${grammar.wrap(predicate.column)} not in (${grammar.parameterize(predicate.values)})`;
}

function inlineIntegers(
  grammar: Grammar,
  predicate: InRawPredicate | NotInRawPredicate,
): string {
  const column = grammar.wrap(predicate.column);
  grammar.dialect.assertRawInValues(column, predicate.values);
  return predicate.values.map(String).join(", ");
}

function compileInRaw(grammar: Grammar, predicate: InRawPredicate): string {
  if (predicate.values.length === 0) {
    return "0 = 1";
  }
  const values = inlineIntegers(grammar, predicate);
  return `${grammar.wrap(predicate.column)} in (${values})`;
}

function compileNotInRaw(grammar: Grammar, predicate: NotInRawPredicate): string {
  if (predicate.values.length === 0) {
    return "1 = 1";
  }
  const values = inlineIntegers(grammar, predicate);
  return `${grammar.wrap(predicate.column)} not in (${values})`;
}

/**
 * Returns the two endpoints of a range. Throws when there are not exactly
 * two, or when either one is undefined.
 */
export function requireRange<T>(
  values: readonly T[],
  kind: string,
  subject: string,
): readonly [T, T] {
  if (values.length !== 2) {
    throw new MalformedPlanError(
      `${kind} predicate on ${subject} requires exactly two values, got ${values.length}.`,
      { kind, subject, count: values.length },
    );
  }
  const [min, max] = values;
  if (min === undefined || max === undefined) {
    const endpoint = min === undefined ? "lower" : "upper";
    throw new MalformedPlanError(
      `${kind} predicate on ${subject} has an undefined ${endpoint} bound.`,
      { kind, subject, endpoint },
    );
  }
  return [min, max];
}

function compileBetween(grammar: Grammar, predicate: BetweenPredicate): string {
  const column = grammar.wrap(predicate.column);
  const [min, max] = requireRange(predicate.values, "Between", column);
  const between = predicate.not ? "not between" : "between";
  return `${column} ${between} ${grammar.parameter(min)} and ${grammar.parameter(max)}`;
}

function compileBetweenColumns(
  grammar: Grammar,
  predicate: BetweenColumnsPredicate,
): string {
  const column = grammar.wrap(predicate.column);
  const [min, max] = requireRange(predicate.values, "Between-columns", column);
  const between = predicate.not ? "not between" : "between";
  return `${column} ${between} ${grammar.wrap(min)} and ${grammar.wrap(max)}`;
}

function compileValueBetween(
  grammar: Grammar,
  predicate: ValueBetweenPredicate,
): string {
  const value = grammar.parameter(predicate.value);
  const [min, max] = requireRange(predicate.columns, "Value-between", value);
  const between = predicate.not ? "not between" : "between";
  return `${value} ${between} ${grammar.wrap(min)} and ${grammar.wrap(max)}`;
}

function compileDateComponent(
  grammar: Grammar,
  predicate: DateComponentPredicate,
): string {
  const column = grammar.wrap(predicate.column);
  const value = grammar.parameter(predicate.value);
  return `${predicate.component}(${column}) ${predicate.operator} ${value}`;
}

function compileNested(grammar: Grammar, predicate: NestedPredicate): string {
  const scope = predicate.query;
  const compiled = compileWheres(grammar, scope);
  if (compiled === "") {
    throw new MalformedPlanError("A nested predicate group has no predicates.", {
      scope: predicateKeyword(scope),
    });
  }
  return `(${stripKeyword(compiled, `${predicateKeyword(scope)} `)})`;
}

function compileRowValues(
  grammar: Grammar,
  predicate: RowValuesPredicate,
): string {
  if (predicate.columns.length !== predicate.values.length) {
    throw new MalformedPlanError(
      `Row-values predicate compares ${predicate.columns.length} columns with ${predicate.values.length} values.`,
      { columns: predicate.columns.length, values: predicate.values.length },
      { suggestion: "Pass exactly one value per column." },
    );
  }
  const columns = grammar.columnize(predicate.columns);
  const values = grammar.parameterize(predicate.values);
  return `(${columns}) ${predicate.operator} (${values})`;
}
