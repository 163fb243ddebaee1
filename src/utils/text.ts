/**
 * Text normalization helpers shared by the mapper, extractors and title filler
 */

const MISSING_SENTINEL = 'tbd';

/**
 * Collapse every whitespace run (newlines included) to one space and trim
 */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Backslash-escape each of `chars` that is not already escaped
 */
export function escapeUnescaped(value: string, chars: string): string {
  if (!chars) return value;
  const cls = chars.replace(/[\]\\^-]/g, '\\$&');
  return value.replace(new RegExp(`(?<!\\\\)([${cls}])`, 'g'), '\\$1');
}

export function escapeCommas(value: string): string {
  return escapeUnescaped(value, ',');
}

/**
 * True for non-strings, empty and whitespace-only strings
 */
export function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

/**
 * Blank, or a "TBD" placeholder in any case
 */
export function isMissingValue(value: unknown): boolean {
  if (typeof value !== 'string') return true;
  const trimmed = value.trim();
  return trimmed === '' || trimmed.toLowerCase() === MISSING_SENTINEL;
}

/**
 * Parse an env-style boolean flag
 */
export function isTruthyFlag(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}
