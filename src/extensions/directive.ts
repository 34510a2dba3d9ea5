/**
 * Extension directive resolution.
 *
 * A directive is a comma-separated list of extension names. Two tokens are
 * special:
 *  - `default` marks where the default extensions are spliced in.
 *  - a leading `-` removes a name; `-default` removes every default.
 *
 * Names a directive lists more than once are kept as listed.
 */

export const DEFAULT_KEY = 'default';
export const REMOVE_VALUE_PREFIX = '-';
export const COMMA_SPLIT_PATTERN = /\s*,+\s*/;

/** Answers whether an extension name is currently registered. */
export type ExistenceOracle = (name: string) => boolean;

export function parseDirective(directive: string | null | undefined): string[] {
  if (directive === null || directive === undefined) return [];
  const trimmed = directive.trim();
  if (trimmed.length === 0) return [];
  return trimmed.split(COMMA_SPLIT_PATTERN).filter((token) => token.trim().length > 0);
}

export function resolveExtensionNames(
  defaults: readonly string[] | null | undefined,
  directive: string | null | undefined,
  exists: ExistenceOracle,
): string[] {
  const workingDefaults = (defaults ?? []).filter((name) => exists(name));
  const tokens = parseDirective(directive);

  let names: string[];
  if (tokens.includes(REMOVE_VALUE_PREFIX + DEFAULT_KEY)) {
    names = tokens;
  } else {
    const i = tokens.indexOf(DEFAULT_KEY);
    names = i > 0
      ? [...tokens.slice(0, i), ...workingDefaults, ...tokens.slice(i)]
      : [...workingDefaults, ...tokens];
  }
  names = names.filter((name) => name !== DEFAULT_KEY);

  const removed = new Set<string>();
  for (const name of names) {
    if (name.startsWith(REMOVE_VALUE_PREFIX)) {
      removed.add(name);
      removed.add(name.substring(REMOVE_VALUE_PREFIX.length));
    }
  }
  return removed.size === 0 ? names : names.filter((name) => !removed.has(name));
}
