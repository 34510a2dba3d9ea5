/**
 * Helpers for classifying configuration values.
 */

const EMPTY_WORDS = new Set(['false', '0', 'null', 'n/a']);
const DEFAULT_WORDS = new Set(['true', 'default']);

/**
 * True for missing or empty values and for the words `false`, `0`, `null`
 * and `N/A` (case-insensitive).
 */
export function isEmptyValue(value: string | null | undefined): boolean {
  if (value === null || value === undefined || value.length === 0) return true;
  return EMPTY_WORDS.has(value.toLowerCase());
}

export function isNotEmptyValue(value: string | null | undefined): boolean {
  return !isEmptyValue(value);
}

/** True for `true` or `default` (case-insensitive). */
export function isDefaultValue(value: string | null | undefined): boolean {
  return value !== null && value !== undefined && DEFAULT_WORDS.has(value.toLowerCase());
}

export function getPid(): number {
  return process.pid;
}
