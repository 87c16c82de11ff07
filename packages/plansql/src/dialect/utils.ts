/**
 * Quotes an identifier with double quotes, doubling embedded ones.
 *
 * @example
 * quoteDoubleQuoted('say "hi"') // "say ""hi"""
 */
export function quoteDoubleQuoted(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}

export function toHex(value: Uint8Array): string {
  return Array.from(value, (byte) => byte.toString(16).padStart(2, "0")).join("");
}
