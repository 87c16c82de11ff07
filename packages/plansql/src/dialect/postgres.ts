/**
 * PostgreSQL Dialect Adapter
 *
 * Uses the `->` / `->>` operators and jsonb functions for JSON predicates,
 * text search functions for full text, and `ctid` for join-aware updates
 * and deletes.
 */
import {
  compileInsert,
  compileInsertOnConflictUpdate,
  compileInsertUsing,
} from "../compiler/insert";
import { compileBasic, escapeOperator } from "../compiler/predicates";
import {
  compileDeleteByRowId,
  compileUpdateByRowId,
} from "../compiler/update-delete";
import { requireTable } from "../compiler/utils";
import { MalformedPlanError } from "../errors";
import {
  formatJsonSelector,
  type JsonSelector,
  parseJsonSelector,
  splitLastSegment,
} from "../grammar/json-path";
import { type Grammar } from "../grammar/types";
import {
  type BasicPredicate,
  type DateComponentPredicate,
  type FullTextPredicate,
} from "../plan/ast";
import { prepareBindingsForRowIdUpdate } from "../plan/bindings";
import { defaultDialect } from "./default";
import { type DialectAdapter } from "./types";
import { quoteDoubleQuoted, toHex } from "./utils";

/**
 * Text search configurations accepted for full-text predicates. Anything
 * else falls back to `english`.
 */
const FULL_TEXT_LANGUAGES: ReadonlySet<string> = new Set([
  "simple",
  "arabic",
  "danish",
  "dutch",
  "english",
  "finnish",
  "french",
  "german",
  "hungarian",
  "indonesian",
  "irish",
  "italian",
  "lithuanian",
  "nepali",
  "norwegian",
  "portuguese",
  "romanian",
  "russian",
  "spanish",
  "swedish",
  "tamil",
  "turkish",
]);

const FULL_TEXT_QUERY_FUNCTIONS = {
  plain: "plainto_tsquery",
  phrase: "phraseto_tsquery",
  websearch: "websearch_to_tsquery",
  boolean: "plainto_tsquery",
} as const;

// ============================================================
// JSON Selectors
// ============================================================

/**
 * Quotes a path key as a string literal. Under standard-conforming strings a
 * backslash is an ordinary character, but the placeholder scanner reads `\'`
 * as an escaped quote, so keys holding one are rejected.
 */
function quoteJsonKey(grammar: Grammar, selector: JsonSelector, key: string): string {
  if (key.includes("\\")) {
    const path = formatJsonSelector(selector);
    throw new MalformedPlanError(
      `JSON path key "${key}" in ${path} contains a backslash.`,
      { selector: path, key },
      { suggestion: "Rename the key, or compare against it with a raw predicate." },
    );
  }
  return grammar.quoteString(key);
}

function wrapJsonAttribute(grammar: Grammar, selector: JsonSelector): string[] {
  return selector.path.map((segment) =>
    segment.kind === "index" ?
      String(segment.index)
    : quoteJsonKey(grammar, selector, segment.key),
  );
}

/**
 * @example
 * "data->address->city" → "data"->'address'->>'city'
 * "data->tags[0]"       → "data"->'tags'->>0
 */
function wrapPostgresJsonSelector(grammar: Grammar, selector: JsonSelector): string {
  const field = grammar.wrap(selector.column);
  const attributes = wrapJsonAttribute(grammar, selector);
  const last = attributes.pop();
  if (last === undefined) {
    return field;
  }
  if (attributes.length > 0) {
    return `${field}->${attributes.join("->")}->>${last}`;
  }
  return `${field}->>${last}`;
}

/**
 * The selector with every step returning jsonb (`->` instead of `->>`).
 */
function wrapJsonbSelector(grammar: Grammar, selector: JsonSelector): string {
  return wrapPostgresJsonSelector(grammar, selector).replaceAll("->>", "->");
}

function wrapJsonbColumn(grammar: Grammar, column: string): string {
  return wrapJsonbSelector(grammar, parseJsonSelector(column));
}

// ============================================================
// Predicate Overrides
// ============================================================

/**
 * Like operators compare the text form of the column.
 */
function compilePostgresBasic(grammar: Grammar, predicate: BasicPredicate): string {
  if (!predicate.operator.toLowerCase().includes("like")) {
    return compileBasic(grammar, predicate);
  }
  const column = grammar.wrap(predicate.column);
  return `${column}::text ${predicate.operator} ${grammar.parameter(predicate.value)}`;
}

function compileDateComponent(
  grammar: Grammar,
  predicate: DateComponentPredicate,
): string {
  const column = grammar.wrap(predicate.column);
  const value = grammar.parameter(predicate.value);

  switch (predicate.component) {
    case "date":
    case "time": {
      return `${column}::${predicate.component} ${predicate.operator} ${value}`;
    }
    case "day":
    case "month":
    case "year": {
      return `extract(${predicate.component} from ${column}) ${predicate.operator} ${value}`;
    }
    default: {
      const _exhaustive: never = predicate.component;
      return _exhaustive;
    }
  }
}

/**
 * @example
 * (to_tsvector('english', "title") || to_tsvector('english', "body")) @@ plainto_tsquery('english', ?)
 */
function compileFullText(grammar: Grammar, predicate: FullTextPredicate): string {
  const requested = predicate.options.language ?? "english";
  const language = FULL_TEXT_LANGUAGES.has(requested) ? requested : "english";
  const quotedLanguage = grammar.quoteString(language);

  const columns = predicate.columns
    .map((column) => `to_tsvector(${quotedLanguage}, ${grammar.wrap(column)})`)
    .join(" || ");
  const fn = FULL_TEXT_QUERY_FUNCTIONS[predicate.options.mode ?? "plain"];

  return `(${columns}) @@ ${fn}(${quotedLanguage}, ${grammar.parameter(predicate.value)})`;
}

/**
 * PostgreSQL dialect adapter implementation.
 */
export const postgresDialect: DialectAdapter = {
  ...defaultDialect,
  name: "postgres",
  capabilities: {
    supportsSavepoints: true,
    operators: [
      "=",
      "<",
      ">",
      "<=",
      ">=",
      "<>",
      "!=",
      "like",
      "not like",
      "between",
      "ilike",
      "not ilike",
      "~",
      "&",
      "|",
      "#",
      "<<",
      ">>",
      "<<=",
      ">>=",
      "&&",
      "@>",
      "<@",
      "?",
      "?|",
      "?&",
      "||",
      "-",
      "@?",
      "@@",
      "#-",
      "is distinct from",
      "is not distinct from",
    ],
    bitwiseOperators: ["~", "&", "|", "#", "<<", ">>", "<<=", ">>="],
  },

  quoteIdentifier: quoteDoubleQuoted,

  predicateOverrides: {
    basic: compilePostgresBasic,
    bitwise(grammar, predicate) {
      const column = grammar.wrap(predicate.column);
      const operator = escapeOperator(predicate.operator);
      return `(${column} ${operator} ${grammar.parameter(predicate.value)})::bool`;
    },
    // Case-insensitive matching is `ilike`; plain `like` is case-sensitive.
    like(grammar, predicate) {
      const operator =
        (predicate.not ? "not " : "") + (predicate.caseSensitive ? "like" : "ilike");
      return compilePostgresBasic(grammar, {
        __type: "basic",
        boolean: predicate.boolean,
        column: predicate.column,
        operator,
        value: predicate.value,
      });
    },
    date_component: compileDateComponent,
  },

  havingOverrides: {
    bitwise(grammar, having) {
      const column = grammar.wrap(having.column);
      return `(${column} ${having.operator} ${grammar.parameter(having.value)})::bool`;
    },
  },

  // ============================================================
  // JSON
  // ============================================================

  wrapJsonSelector: wrapPostgresJsonSelector,

  wrapJsonBooleanSelector(grammar, selector) {
    return `(${wrapJsonbSelector(grammar, selector)})::jsonb`;
  },

  wrapJsonBooleanValue(value) {
    return `'${value}'::jsonb`;
  },

  compileJsonContains(grammar, column, value) {
    return `(${wrapJsonbColumn(grammar, column)})::jsonb @> ${value}`;
  },

  /**
   * An index as the last step tests the array's length; a key tests for
   * the key with the jsonb `?` operator, escaped as `??`.
   */
  compileJsonContainsKey(grammar, column) {
    const selector = parseJsonSelector(column);
    const [parent, last] = splitLastSegment(selector);
    const target = wrapJsonbSelector(grammar, parent);

    if (last === undefined) {
      return `(${target})::jsonb is not null`;
    }

    if (last.kind === "index") {
      const length =
        last.index < 0 ? `>= ${Math.abs(last.index)}` : `> ${last.index}`;
      return (
        `case when jsonb_typeof((${target})::jsonb) = 'array' ` +
        `then jsonb_array_length((${target})::jsonb) ${length} else false end`
      );
    }

    return `coalesce((${target})::jsonb ?? ${quoteJsonKey(grammar, selector, last.key)}, false)`;
  },

  compileJsonLength(grammar, column, operator, value) {
    return `jsonb_array_length((${wrapJsonbColumn(grammar, column)})::jsonb) ${operator} ${value}`;
  },

  // ============================================================
  // Predicates
  // ============================================================

  compileFullText,

  // ============================================================
  // Clauses
  // ============================================================

  compileColumns(grammar, plan, columns) {
    if (typeof plan.distinct === "object" && plan.distinct.length > 0) {
      return `select distinct on (${grammar.columnize(plan.distinct)}) ${columns}`;
    }
    return undefined;
  },

  compileJoinLateral(_grammar, join, expression) {
    return `${join.type} join lateral ${expression} on true`.trim();
  },

  compileLock(_grammar, lock) {
    return lock ? "for update" : "for share";
  },

  // ============================================================
  // Write Statements
  // ============================================================

  compileInsertOrIgnore(grammar, plan, values) {
    return `${compileInsert(grammar, plan, values)} on conflict do nothing`;
  },

  compileInsertOrIgnoreUsing(grammar, plan, columns, sql) {
    return `${compileInsertUsing(grammar, plan, columns, sql)} on conflict do nothing`;
  },

  compileInsertGetId(grammar, plan, values, sequence) {
    const id = sequence === undefined || sequence === "" ? "id" : sequence;
    return `${compileInsert(grammar, plan, values)} returning ${grammar.wrap(id)}`;
  },

  compileUpsert(grammar, plan, values, uniqueBy, update) {
    return compileInsertOnConflictUpdate(grammar, plan, values, uniqueBy, update);
  },

  compileUpdateWithJoins(grammar, plan, values) {
    return compileUpdateByRowId(grammar, plan, values, "ctid");
  },

  compileDeleteWithJoins(grammar, plan) {
    return compileDeleteByRowId(grammar, plan, "ctid");
  },

  prepareBindingsForUpdate: prepareBindingsForRowIdUpdate,

  compileTruncate(grammar, plan) {
    const table = grammar.wrapTable(requireTable(plan, "truncate"));
    return new Map([[`truncate ${table} restart identity cascade`, []]]);
  },

  // ============================================================
  // Transactions & Server
  // ============================================================

  compileThreadCount() {
    return `select count(*) as "Value" from pg_stat_activity`;
  },

  // ============================================================
  // Literals
  // ============================================================

  escapeBool(value) {
    return value ? "true" : "false";
  },

  escapeBinary(value) {
    return `'\\x${toHex(value)}'::bytea`;
  },
};
