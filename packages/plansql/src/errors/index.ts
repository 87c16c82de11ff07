/**
 * PlanSQL Error Hierarchy
 *
 * All errors extend PlanSqlError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   grammar.compileSelect(plan);
 * } catch (error) {
 *   if (isPlanSqlError(error)) {
 *     console.error(error.toUserMessage());
 *     if (isUserRecoverable(error)) {
 *       // The query builder produced a plan the compiler rejects
 *     }
 *   }
 * }
 * ```
 */

import { ZodError } from "zod";

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by an invalid plan, binding or option. Recoverable by fixing the input.
 * - `system`: The target dialect lacks a capability, or the compiler reached an
 *   unreachable state. Never recoverable by retrying.
 */
export type ErrorCategory = "user" | "system";

/**
 * Options for PlanSqlError constructor.
 */
export type PlanSqlErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

/**
 * The grammar method that was compiling when an error escaped it.
 */
export type CompileSite = Readonly<{
  /** Statement kind, e.g. "select" or "upsert" */
  statement: string;
  /** Name of the dialect the grammar targets */
  dialect: string;
}>;

function formatDetailValue(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value !== "object" || value === null) {
    return String(value);
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

/**
 * Renders error details as `key=value` pairs in insertion order.
 *
 * @example
 * formatDetails({ clause: "limit", value: -1 }) // 'clause="limit", value=-1'
 */
function formatDetails(details: Readonly<Record<string, unknown>>): string {
  return Object.entries(details)
    .map(([key, value]) => `${key}=${formatDetailValue(value)}`)
    .join(", ");
}

/**
 * Causes are schema failures (a ZodError) or another PlanSqlError; both are
 * summarized on one line.
 */
function formatCause(cause: unknown): string {
  if (cause instanceof ZodError) {
    return cause.issues
      .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
  }
  if (cause instanceof PlanSqlError) {
    return `[${cause.code}] ${cause.message}`;
  }
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return typeof cause === "string" ? cause : formatDetailValue(cause);
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all PlanSQL errors.
 *
 * `site` is empty until a grammar statement method lets the error escape;
 * that method records its statement kind and dialect.
 */
export class PlanSqlError extends Error {
  /** Machine-readable error code (e.g., "MALFORMED_PLAN") */
  readonly code: string;

  readonly category: ErrorCategory;

  /** The plan fragment that failed: columns, counts, the clause name */
  readonly details: Readonly<Record<string, unknown>>;

  readonly suggestion?: string;

  #site: CompileSite | undefined;

  constructor(message: string, code: string, options: PlanSqlErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PlanSqlError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze({ ...options.details });
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /** The statement being compiled when the error was raised, once recorded. */
  get site(): CompileSite | undefined {
    return this.#site;
  }

  /**
   * Records where the error was raised. The first site recorded is kept,
   * since it is the innermost grammar method.
   */
  recordSite(site: CompileSite): void {
    this.#site ??= site;
  }

  /**
   * The message, followed by the suggestion when there is one.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Multi-line form for logs: the code and message, then the compile site,
   * category, suggestion, details and cause, each only when present.
   *
   * @example
   * ```text
   * [MALFORMED_PLAN] The limit must be a non-negative integer, got -1
   *   While compiling: select (sqlite)
   *   Category: user
   *   Details: clause="limit", value=-1
   * ```
   */
  toLogString(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (this.#site) {
      lines.push(`  While compiling: ${this.#site.statement} (${this.#site.dialect})`);
    }
    lines.push(`  Category: ${this.category}`);
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }
    if (Object.keys(this.details).length > 0) {
      lines.push(`  Details: ${formatDetails(this.details)}`);
    }
    if (this.cause !== undefined) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Plan Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "tablePrefix") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Details for ValidationError.
 */
export type ValidationErrorDetails = Readonly<{
  /** What was being validated */
  subject: string;
  /** Individual validation issues */
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when grammar options or other structured input fail schema validation.
 *
 * @example
 * ```typescript
 * try {
 *   validateInput(grammarOptionsSchema, { tablePrefix: "bad prefix" }, "grammar options");
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.details.issues);
 *     // [{ path: "tablePrefix", message: "..." }]
 *   }
 * }
 * ```
 */
export class ValidationError extends PlanSqlError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    const fieldList =
      details.issues.length > 0 ?
        details.issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following fields: ${fieldList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

/**
 * Thrown when a query plan is structurally invalid.
 *
 * Indicates a defect in whatever built the plan (arity mismatches, non-integer
 * values in a raw integer list, empty nested groups), not a problem with the data.
 *
 * @example
 * ```typescript
 * grammar.compileSelect({
 *   from: "users",
 *   wheres: [{ __type: "between", boolean: "and", column: "age", values: [1], not: false }],
 * });
 * // MalformedPlanError: Between predicate on "age" requires exactly two values, got 1.
 * ```
 */
export class MalformedPlanError extends PlanSqlError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "MALFORMED_PLAN", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `The query plan was built incorrectly. Check the code that constructs it.`,
      cause: options?.cause,
    });
    this.name = "MalformedPlanError";
  }
}

/**
 * Thrown when a binding value cannot be rendered as a SQL literal.
 */
export class EscapeError extends PlanSqlError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "ESCAPE_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Only strings, numbers, bigints, booleans, dates, byte arrays and null can be inlined.`,
      cause: options?.cause,
    });
    this.name = "EscapeError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when grammar configuration is invalid.
 */
export class ConfigurationError extends PlanSqlError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review the options passed to createGrammar().`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Dialect Errors (category: "system")
// ============================================================

/**
 * Thrown when the target dialect has no implementation for a feature.
 *
 * @example
 * ```typescript
 * try {
 *   grammar.compileUpsert(plan, values, ["email"], ["name"]);
 * } catch (error) {
 *   if (error instanceof UnsupportedOperationError) {
 *     console.log(error.details.feature); // "upserts"
 *   }
 * }
 * ```
 */
export class UnsupportedOperationError extends PlanSqlError {
  constructor(
    feature: string,
    dialect: string,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(
      `This database engine does not support ${feature}.`,
      "UNSUPPORTED_OPERATION",
      {
        details: { feature, dialect },
        category: "system",
        suggestion:
          options?.suggestion ??
          `The "${dialect}" dialect cannot express ${feature}. Use a dialect that implements it or rewrite the query.`,
        cause: options?.cause,
      },
    );
    this.name = "UnsupportedOperationError";
  }
}

// ============================================================
// Compiler Errors (category: "system")
// ============================================================

/**
 * Thrown when a compiler invariant is violated.
 *
 * This indicates a bug in the compiler. The compiler reached
 * a state that should be unreachable. These errors are not user-recoverable.
 */
export class CompilerInvariantError extends PlanSqlError {
  constructor(
    message: string,
    details?: Readonly<Record<string, unknown>>,
    options?: { cause?: unknown },
  ) {
    super(message, "COMPILER_INVARIANT_ERROR", {
      details: details ?? {},
      category: "system",
      suggestion: `This is an internal compiler error. Please report it as a bug with the plan that triggered it.`,
      cause: options?.cause,
    });
    this.name = "CompilerInvariantError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for PlanSqlError.
 */
export function isPlanSqlError(error: unknown): error is PlanSqlError {
  return error instanceof PlanSqlError;
}

/**
 * Check if error is recoverable by fixing the input plan, bindings or options.
 */
export function isUserRecoverable(error: unknown): boolean {
  return isPlanSqlError(error) && error.category === "user";
}

/**
 * Check if error indicates a missing dialect capability or a compiler bug.
 */
export function isSystemError(error: unknown): boolean {
  return isPlanSqlError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isPlanSqlError(error) ? error.suggestion : undefined;
}
