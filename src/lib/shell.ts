/**
 * Single-quote a string for a POSIX shell. Embedded single quotes become `'\''`.
 */
export function shellQuote(text: string): string {
  return `'${text.replace(/'/g, `'\\''`)}'`;
}
