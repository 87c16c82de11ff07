/**
 * Raw-SQL Binding Substitution
 *
 * Finds the `?` placeholders of compiled SQL, skipping those inside string
 * literals and those escaped as `??`.
 */
import { type Grammar } from "../grammar/types";
import { warnInDevelopment } from "../utils/env";

export type SqlToken =
  | Readonly<{ kind: "text"; text: string }>
  | Readonly<{ kind: "placeholder" }>
  /** `??` outside a string literal: a literal `?` in the executed SQL. */
  | Readonly<{ kind: "escaped_placeholder" }>;

/** Two-character sequences copied through verbatim. */
const ESCAPE_SEQUENCES: ReadonlySet<string> = new Set(["\\'", "''", "??"]);

/**
 * Splits SQL text into text runs and substitutable placeholders.
 *
 * `\'` and `''` are text, as is `??` inside a string literal. A lone `'`
 * opens or closes a string literal; a `?` outside one is a placeholder.
 */
export function tokenizeSql(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let text = "";
  let isStringLiteral = false;

  const flush = (): void => {
    if (text !== "") {
      tokens.push({ kind: "text", text });
      text = "";
    }
  };

  for (let index = 0; index < sql.length; index++) {
    const char = sql.charAt(index);
    const pair = char + sql.charAt(index + 1);

    if (pair === "??" && !isStringLiteral) {
      flush();
      tokens.push({ kind: "escaped_placeholder" });
      index += 1;
    } else if (ESCAPE_SEQUENCES.has(pair)) {
      text += pair;
      index += 1;
    } else if (char === "'") {
      text += char;
      isStringLiteral = !isStringLiteral;
    } else if (char === "?" && !isStringLiteral) {
      flush();
      tokens.push({ kind: "placeholder" });
    } else {
      text += char;
    }
  }

  flush();
  return tokens;
}

/**
 * Replaces each placeholder with the next binding escaped as a literal.
 * Placeholders beyond the last binding stay `?`.
 *
 * @example
 * substituteBindingsIntoRawSql(grammar, "select * from t where a = ? and b = '?'", [5])
 * // "select * from t where a = 5 and b = '?'"
 */
export function substituteBindingsIntoRawSql(
  grammar: Grammar,
  sql: string,
  bindings: readonly unknown[],
): string {
  const pending = bindings.map((binding) => grammar.escape(binding));
  let query = "";

  for (const token of tokenizeSql(sql)) {
    switch (token.kind) {
      case "text": {
        query += token.text;
        break;
      }
      case "escaped_placeholder": {
        query += "??";
        break;
      }
      case "placeholder": {
        query += pending.shift() ?? "?";
        break;
      }
    }
  }

  if (pending.length > 0) {
    warnInDevelopment(
      `[plansql] ${pending.length} binding(s) left over after substituting every placeholder.`,
    );
  }

  return query;
}
