/**
 * Default Dialect
 *
 * Standard SQL with no identifier quoting. Every capability that needs
 * database-specific syntax (JSON predicates, full text, lateral joins,
 * upserts, ignore-on-conflict inserts) throws UnsupportedOperationError.
 */
import { compileInsert } from "../compiler/insert";
import { requireTable } from "../compiler/utils";
import { MalformedPlanError, UnsupportedOperationError } from "../errors";
import { quoteString } from "../grammar/parameters";
import { type DialectAdapter } from "./types";
import { toHex } from "./utils";

function unsupported(feature: string, dialect: string): never {
  throw new UnsupportedOperationError(feature, dialect);
}

function isIntegerValue(value: unknown): boolean {
  return (
    typeof value === "bigint" ||
    (typeof value === "number" && Number.isSafeInteger(value))
  );
}

export const defaultDialect: DialectAdapter = {
  name: "default",
  capabilities: {
    supportsSavepoints: true,
    operators: [],
    bitwiseOperators: [],
  },

  // ============================================================
  // Identifiers
  // ============================================================

  quoteIdentifier(name) {
    return name;
  },

  // ============================================================
  // JSON
  // ============================================================

  wrapJsonSelector(grammar) {
    return unsupported("JSON operations", grammar.dialect.name);
  },

  wrapJsonBooleanSelector(grammar, selector) {
    return grammar.dialect.wrapJsonSelector(grammar, selector);
  },

  wrapJsonBooleanValue(value) {
    return value;
  },

  compileJsonContains(grammar) {
    return unsupported("JSON contains operations", grammar.dialect.name);
  },

  compileJsonOverlaps(grammar) {
    return unsupported("JSON overlaps operations", grammar.dialect.name);
  },

  compileJsonContainsKey(grammar) {
    return unsupported("JSON contains key operations", grammar.dialect.name);
  },

  compileJsonLength(grammar) {
    return unsupported("JSON length operations", grammar.dialect.name);
  },

  prepareBindingForJsonContains(value) {
    return JSON.stringify(value);
  },

  // ============================================================
  // Predicates
  // ============================================================

  compileCaseSensitiveLike(grammar) {
    return unsupported("case-sensitive like operations", grammar.dialect.name);
  },

  compileFullText(grammar) {
    return unsupported("fulltext search operations", grammar.dialect.name);
  },

  assertRawInValues(column, values) {
    const position = values.findIndex((value) => !isIntegerValue(value));
    if (position !== -1) {
      throw new MalformedPlanError(
        `Raw in-list on ${column} accepts only integers, got ${String(values[position])}.`,
        { column },
        { suggestion: "Use a parameterized in-list for non-integer values." },
      );
    }
  },

  // ============================================================
  // Clauses
  // ============================================================

  compileIndexHint() {
    return "";
  },

  compileJoinLateral(grammar) {
    return unsupported("lateral joins", grammar.dialect.name);
  },

  compileLock() {
    return "";
  },

  wrapUnion(sql) {
    return `(${sql})`;
  },

  compileRandom() {
    return "RANDOM()";
  },

  // ============================================================
  // Write Statements
  // ============================================================

  compileInsertOrIgnore(grammar) {
    return unsupported("inserting while ignoring errors", grammar.dialect.name);
  },

  compileInsertOrIgnoreUsing(grammar) {
    return unsupported("inserting while ignoring errors", grammar.dialect.name);
  },

  compileInsertGetId(grammar, plan, values) {
    return compileInsert(grammar, plan, values);
  },

  compileUpsert(grammar) {
    return unsupported("upserts", grammar.dialect.name);
  },

  compileTruncate(grammar, plan) {
    const table = grammar.wrapTable(requireTable(plan, "truncate"));
    return new Map([[`truncate table ${table}`, []]]);
  },

  // ============================================================
  // Transactions & Server
  // ============================================================

  compileSavepoint(name) {
    return `SAVEPOINT ${name}`;
  },

  compileSavepointRollBack(name) {
    return `ROLLBACK TO SAVEPOINT ${name}`;
  },

  compileThreadCount() {
    return null;
  },

  // ============================================================
  // Literals
  // ============================================================

  escapeString(value) {
    return quoteString(value);
  },

  escapeBool(value) {
    return value ? "1" : "0";
  },

  escapeBinary(value) {
    return `x'${toHex(value)}'`;
  },
};
