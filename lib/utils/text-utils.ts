/**
 * Escapes a literal so it can be embedded in a regular expression.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
