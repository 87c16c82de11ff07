export {
  formatJsonSelector,
  isJsonSelector,
  type JsonPathSegment,
  type JsonSelector,
  parseJsonSelector,
  splitLastSegment,
} from "./json-path";
export {
  grammarOptionsSchema,
  type GrammarOptions,
  resolveGrammarOptions,
  type ResolvedGrammarOptions,
} from "./options";
export {
  escape,
  parameter,
  parameterize,
  quoteString,
} from "./parameters";
export { createGrammar, QueryGrammar } from "./query-grammar";
export type {
  CompileHookContext,
  Grammar,
  GrammarHooks,
  StatementKind,
} from "./types";
export {
  columnize,
  wrap,
  wrapJsonFieldAndPath,
  wrapJsonPath,
  wrapTable,
  wrapValue,
} from "./wrap";
