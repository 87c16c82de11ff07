export type * from "./ast";
export {
  BINDING_GROUPS,
  type BindingGroup,
  type BindingGroups,
  cleanBindings,
  createBindingGroups,
  flattenBindings,
  mergeOrderBindingsIntoSelect,
  prepareBindingsForDelete,
  prepareBindingsForRowIdUpdate,
  prepareBindingsForSelect,
  prepareBindingsForUpdate,
  resolveValue,
} from "./bindings";
export { type Expression, expression, isExpression, raw } from "./expression";
