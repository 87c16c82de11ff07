import { type Grammar } from "../grammar/types";

/**
 * SQL text that is inlined verbatim wherever a column, table or value is
 * expected. Expressions never produce a placeholder or a binding.
 */
export type Expression = Readonly<{
  __type: "expression";
  getValue: (grammar: Grammar) => string | number;
}>;

/**
 * Creates an expression that renders as the given SQL text.
 *
 * @example
 * ```typescript
 * const plan: QueryPlan = {
 *   from: "orders",
 *   columns: [raw("count(*) as total")],
 * };
 * ```
 */
export function raw(value: string | number): Expression {
  return {
    __type: "expression",
    getValue: () => value,
  };
}

/**
 * Creates an expression whose text depends on the grammar rendering it,
 * e.g. one that quotes identifiers through the active dialect.
 */
export function expression(
  render: (grammar: Grammar) => string | number,
): Expression {
  return { __type: "expression", getValue: render };
}

export function isExpression(value: unknown): value is Expression {
  return (
    typeof value === "object" &&
    value !== null &&
    "__type" in value &&
    value.__type === "expression" &&
    "getValue" in value &&
    typeof value.getValue === "function"
  );
}
