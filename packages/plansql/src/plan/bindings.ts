/**
 * Binding groups and positional reassembly.
 *
 * A query builder collects parameter values per clause kind while the
 * plan is being assembled. Only when the statement type is known can the
 * groups be flattened into the order the `?` placeholders appear in.
 */
import { type RecordValues } from "./ast";
import { isExpression } from "./expression";

/**
 * Binding groups in select-statement placeholder order.
 */
export const BINDING_GROUPS = [
  "select",
  "from",
  "join",
  "where",
  "groupBy",
  "having",
  "order",
  "union",
  "unionOrder",
] as const;

export type BindingGroup = (typeof BINDING_GROUPS)[number];

export type BindingGroups = Readonly<Record<BindingGroup, readonly unknown[]>>;

/**
 * Creates a complete set of binding groups, filling missing ones with `[]`.
 */
export function createBindingGroups(
  partial: Partial<BindingGroups> = {},
): BindingGroups {
  return {
    select: partial.select ?? [],
    from: partial.from ?? [],
    join: partial.join ?? [],
    where: partial.where ?? [],
    groupBy: partial.groupBy ?? [],
    having: partial.having ?? [],
    order: partial.order ?? [],
    union: partial.union ?? [],
    unionOrder: partial.unionOrder ?? [],
  };
}

/**
 * Flattens binding groups in placeholder order, skipping excluded groups.
 * Values that are themselves arrays stay a single binding.
 */
export function flattenBindings(
  bindings: Partial<BindingGroups>,
  except: readonly BindingGroup[] = [],
): unknown[] {
  const groups = createBindingGroups(bindings);
  const result: unknown[] = [];
  for (const group of BINDING_GROUPS) {
    if (except.includes(group)) continue;
    result.push(...groups[group]);
  }
  return result;
}

/**
 * Positional bindings for a select statement.
 */
export function prepareBindingsForSelect(
  bindings: Partial<BindingGroups>,
): unknown[] {
  return flattenBindings(bindings);
}

/**
 * Group-limit emulation moves the order-by into the select list, so the
 * order bindings move with it.
 */
export function mergeOrderBindingsIntoSelect(
  bindings: Partial<BindingGroups>,
): BindingGroups {
  const groups = createBindingGroups(bindings);
  return {
    ...groups,
    select: [...groups.select, ...groups.order],
    order: [],
  };
}

/**
 * Drops expressions, which render inline and never occupy a placeholder.
 */
export function cleanBindings(values: readonly unknown[]): unknown[] {
  return values.filter((value) => !isExpression(value));
}

function isThunk(value: unknown): value is () => unknown {
  return typeof value === "function";
}

/**
 * Resolves a deferred value. Functions are called; anything else is returned as is.
 */
export function resolveValue(value: unknown): unknown {
  return isThunk(value) ? value() : value;
}

/**
 * Positional bindings for an update statement: join bindings, then the
 * `set` values in mapping order, then every other group except `select`.
 * Deferred values are resolved here, after the SQL text has been compiled.
 */
export function prepareBindingsForUpdate(
  bindings: Partial<BindingGroups>,
  values: RecordValues,
): unknown[] {
  const groups = createBindingGroups(bindings);
  const setValues = cleanBindings(
    Object.values(values).map((value) => resolveValue(value)),
  );
  return [
    ...groups.join,
    ...setValues,
    ...flattenBindings(groups, ["select", "join"]),
  ];
}

/**
 * Positional bindings for an update whose joins moved into a row-identifier
 * subselect: the `set` values, then every group except `select`.
 */
export function prepareBindingsForRowIdUpdate(
  bindings: Partial<BindingGroups>,
  values: RecordValues,
): unknown[] {
  const setValues = cleanBindings(
    Object.values(values).map((value) => resolveValue(value)),
  );
  return [...setValues, ...flattenBindings(bindings, ["select"])];
}

/**
 * Positional bindings for a delete statement: every group except `select`.
 */
export function prepareBindingsForDelete(
  bindings: Partial<BindingGroups>,
): unknown[] {
  return flattenBindings(bindings, ["select"]);
}
