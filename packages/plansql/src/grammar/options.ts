/**
 * Grammar Options
 *
 * Options are validated with zod when a grammar is created. Hooks are
 * functions and are kept out of the schema.
 */
import { z } from "zod";

import { ConfigurationError, ValidationError } from "../errors";
import { validateInput } from "../errors/validation";
import { type GrammarHooks } from "./types";

export const grammarOptionsSchema = z.object({
  tablePrefix: z
    .string()
    .regex(
      /^[A-Za-z0-9_]*$/,
      "Table prefix may only contain letters, digits and underscores",
    )
    .default(""),
});

export type GrammarOptions = Readonly<{
  /** Prepended to every table name and table alias. Defaults to "". */
  tablePrefix?: string | undefined;
  hooks?: GrammarHooks | undefined;
}>;

export type ResolvedGrammarOptions = Readonly<{
  tablePrefix: string;
  hooks: GrammarHooks;
}>;

/**
 * Validates grammar options and fills in defaults.
 *
 * @throws ConfigurationError carrying the validation issues
 */
export function resolveGrammarOptions(
  options: GrammarOptions = {},
): ResolvedGrammarOptions {
  try {
    const { tablePrefix } = validateInput(
      grammarOptionsSchema,
      { tablePrefix: options.tablePrefix },
      "grammar options",
    );
    return { tablePrefix, hooks: options.hooks ?? {} };
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigurationError(
        error.message,
        { issues: error.details.issues },
        { cause: error },
      );
    }
    throw error;
  }
}
