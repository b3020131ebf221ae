/**
 * Lower-cased alphanumeric tokens of a name. The whole (trimmed, lower-cased)
 * name is included as a token of its own.
 *
 * @example tokenize('brave_search') // ['brave_search', 'brave', 'search']
 */
export function tokenize(name: string): string[] {
  const whole = name.trim().toLowerCase();
  if (!whole) return [];
  const parts = whole.split(/[^a-z0-9]+/).filter(Boolean);
  return [...new Set([whole, ...parts])];
}
