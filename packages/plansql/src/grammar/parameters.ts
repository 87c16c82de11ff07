/**
 * Value Parameterization & Literal Escaping
 */
import { EscapeError } from "../errors";
import { isExpression } from "../plan/expression";
import { type Grammar } from "./types";

const PLACEHOLDER = "?";

/**
 * Returns the inline text of an expression, or a placeholder for anything else.
 */
export function parameter(grammar: Grammar, value: unknown): string {
  if (isExpression(value)) {
    return String(value.getValue(grammar));
  }
  return PLACEHOLDER;
}

export function parameterize(
  grammar: Grammar,
  values: readonly unknown[],
): string {
  return values.map((value) => parameter(grammar, value)).join(", ");
}

/**
 * Single-quotes a string, or each string of a list joined by commas.
 */
export function quoteString(value: string | readonly string[]): string {
  if (typeof value !== "string") {
    return value.map((item) => quoteString(item)).join(", ");
  }
  return `'${value.replaceAll("'", "''")}'`;
}

/**
 * Renders a binding as a literal for the grammar's dialect.
 *
 * @param binary - Treat the value as raw bytes
 * @throws EscapeError for arrays, plain objects, non-finite numbers and
 *   strings containing NUL bytes
 */
export function escape(grammar: Grammar, value: unknown, binary = false): string {
  const { dialect } = grammar;

  if (value === null || value === undefined) {
    return "null";
  }

  if (binary || value instanceof Uint8Array) {
    if (value instanceof Uint8Array) {
      return dialect.escapeBinary(value);
    }
    if (typeof value === "string") {
      return dialect.escapeBinary(new TextEncoder().encode(value));
    }
    throw new EscapeError("Only strings and byte arrays can be escaped as binary.", {
      type: typeof value,
    });
  }

  if (isExpression(value)) {
    return String(value.getValue(grammar));
  }

  switch (typeof value) {
    case "number": {
      if (!Number.isFinite(value)) {
        throw new EscapeError(`Non-finite numbers cannot be escaped: ${value}`, {
          value: String(value),
        });
      }
      return String(value);
    }
    case "bigint": {
      return value.toString();
    }
    case "boolean": {
      return dialect.escapeBool(value);
    }
    case "string": {
      if (value.includes("\0")) {
        throw new EscapeError(
          "Strings with null bytes cannot be escaped. Use the binary escape option.",
        );
      }
      return dialect.escapeString(value);
    }
    default: {
      break;
    }
  }

  if (value instanceof Date) {
    return dialect.escapeString(value.toISOString());
  }

  if (Array.isArray(value)) {
    throw new EscapeError("The database connection does not support escaping arrays.");
  }

  throw new EscapeError(`Values of type ${typeof value} cannot be escaped.`, {
    type: typeof value,
  });
}
