/**
 * Contextual Validation Utilities
 *
 * Zod validation wrappers that name the subject being validated
 * (grammar options, dialect configuration) in the resulting error.
 *
 * @example
 * ```typescript
 * const options = validateInput(grammarOptionsSchema, input, "grammar options");
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import { ValidationError, type ValidationIssue } from "./index";

// ============================================================
// Validation Functions
// ============================================================

/**
 * Converts Zod issues to ValidationIssue format.
 */
function zodIssuesToValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates input against a Zod schema.
 *
 * @param subject - Human-readable name of what is being validated
 * @returns Validated and transformed input
 * @throws ValidationError listing every issue if validation fails
 */
export function validateInput<T>(
  schema: ZodType<T>,
  input: unknown,
  subject: string,
): T {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  throw wrapZodError(result.error, subject);
}

/**
 * Wraps a Zod error as a ValidationError for the given subject.
 *
 * Use this when you've already caught a ZodError and want to
 * convert it to a ValidationError with context.
 */
export function wrapZodError(
  error: ZodError,
  subject: string,
): ValidationError {
  const issues = zodIssuesToValidationIssues(error);
  const summary = issues
    .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
    .join("; ");

  return new ValidationError(
    `Invalid ${subject}: ${summary}`,
    { subject, issues },
    { cause: error },
  );
}
