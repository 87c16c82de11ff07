/**
 * Development-only diagnostics.
 */

function getNodeEnv(): string | undefined {
  if (typeof process === "undefined") {
    return undefined;
  }
  return process.env.NODE_ENV;
}

function isDevelopmentEnvironment(): boolean {
  return getNodeEnv() !== "production";
}

/**
 * Writes a warning to the console unless NODE_ENV is "production".
 */
export function warnInDevelopment(message: string, details?: unknown): void {
  if (!isDevelopmentEnvironment()) {
    return;
  }
  if (details !== undefined) {
    console.warn(message, details);
    return;
  }
  console.warn(message);
}
