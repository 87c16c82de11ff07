/**
 * Query Compiler Module
 *
 * Compiles query plans to SQL text. Every function takes the grammar that
 * renders identifiers and placeholders for the target dialect.
 */
export {
  compileAggregate,
  compileColumns,
  compileComponents,
  compileJoins,
  compileLimit,
  compileLock,
  compileOffset,
  compileOrders,
  orderedComponents,
} from "./components";
export { compileHavings } from "./havings";
export {
  compileInsert,
  compileInsertOnConflictUpdate,
  compileInsertUsing,
  prepareBindingsForInsert,
  prepareBindingsForUpsert,
} from "./insert";
export {
  compileBasic,
  compilePredicate,
  compileWheres,
  escapeOperator,
  requireRange,
} from "./predicates";
export {
  type SqlToken,
  substituteBindingsIntoRawSql,
  tokenizeSql,
} from "./raw-sql";
export {
  compileExists,
  compileSelect,
  GROUP_LIMIT_ROW,
  GROUP_LIMIT_TABLE,
} from "./select";
export {
  type CompiledStatement,
  toDeleteSql,
  toInsertSql,
  toRawSql,
  toSql,
  toUpdateSql,
} from "./statements";
export {
  compileDelete,
  compileDeleteByRowId,
  compileTruncate,
  compileUpdate,
  compileUpdateByRowId,
  prepareBindingsForDelete,
  prepareBindingsForUpdate,
} from "./update-delete";
export {
  assertRowCount,
  concatenate,
  lastAliasSegment,
  removeLeadingBoolean,
  requireTable,
  splitAlias,
  stripKeyword,
} from "./utils";
