/**
 * Parsers for configuration layers.
 *
 * `.properties` text follows the classic line-oriented format: `key=value`,
 * `key:value` or `key value`, `#`/`!` comment lines, a trailing backslash to
 * continue a line, and `\t` `\n` `\r` `\f` `\uXXXX` escapes.
 *
 * YAML layers are flattened so `a: { b: 1 }` becomes `a.b=1`.
 */

import yaml from 'js-yaml';
import { ConfigError } from '../errors.js';

export type PropertySet = Map<string, string>;

const WHITESPACE = new Set([' ', '\t', '\f']);
const YAML_EXTENSIONS = ['.yaml', '.yml'];

export function parseProperties(text: string, into: PropertySet = new Map()): PropertySet {
  for (const line of logicalLines(text)) {
    const [key, value] = splitKeyValue(line);
    into.set(unescape(key), unescape(value));
  }
  return into;
}

function skipWhitespace(s: string, from: number): number {
  let i = from;
  while (i < s.length && WHITESPACE.has(s[i])) i++;
  return i;
}

function endsWithContinuation(s: string): boolean {
  let count = 0;
  for (let i = s.length - 1; i >= 0 && s[i] === '\\'; i--) count++;
  return count % 2 === 1;
}

function* logicalLines(text: string): Generator<string> {
  const body = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const physical = body.split(/\r\n|\r|\n/);
  let i = 0;
  while (i < physical.length) {
    let line = physical[i].slice(skipWhitespace(physical[i], 0));
    i++;
    if (line.length === 0) continue;
    if (line[0] === '#' || line[0] === '!') continue;

    while (endsWithContinuation(line)) {
      line = line.slice(0, -1);
      if (i >= physical.length) break;
      line += physical[i].slice(skipWhitespace(physical[i], 0));
      i++;
    }
    yield line;
  }
}

function splitKeyValue(line: string): [string, string] {
  let keyEnd = line.length;
  let valueStart = line.length;
  let hasSep = false;
  let escaped = false;

  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (c === '\\') {
      escaped = true;
      continue;
    }
    if (c === '=' || c === ':') {
      keyEnd = i;
      valueStart = i + 1;
      hasSep = true;
      break;
    }
    if (WHITESPACE.has(c)) {
      keyEnd = i;
      valueStart = i + 1;
      break;
    }
  }

  while (valueStart < line.length) {
    const c = line[valueStart];
    if (!WHITESPACE.has(c)) {
      if (!hasSep && (c === '=' || c === ':')) {
        hasSep = true;
      } else {
        break;
      }
    }
    valueStart++;
  }

  return [line.slice(0, keyEnd), line.slice(valueStart)];
}

function unescape(s: string): string {
  if (!s.includes('\\')) return s;
  let out = '';
  for (let i = 0; i < s.length; i++) {
    const c = s[i];
    if (c !== '\\') {
      out += c;
      continue;
    }
    i++;
    if (i >= s.length) break;
    const next = s[i];
    switch (next) {
      case 't': out += '\t'; break;
      case 'n': out += '\n'; break;
      case 'r': out += '\r'; break;
      case 'f': out += '\f'; break;
      case 'u': {
        const hex = s.slice(i + 1, i + 5);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
          throw new ConfigError('Malformed \\uxxxx encoding');
        }
        out += String.fromCharCode(parseInt(hex, 16));
        i += 4;
        break;
      }
      default: out += next;
    }
  }
  return out;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): boolean {
  return value === null || typeof value !== 'object';
}

function flatten(prefix: string, value: unknown, into: PropertySet): void {
  if (isMapping(value)) {
    for (const [k, v] of Object.entries(value)) {
      flatten(prefix ? `${prefix}.${k}` : k, v, into);
    }
  } else if (Array.isArray(value)) {
    if (value.every(isScalar)) {
      into.set(prefix, value.map((v) => (v === null ? '' : String(v))).join(','));
    } else {
      value.forEach((v, i) => flatten(`${prefix}[${i}]`, v, into));
    }
  } else {
    into.set(prefix, value === null || value === undefined ? '' : String(value));
  }
}

/**
 * Parse a YAML document into a flat property set. Sequences of scalars
 * become comma-separated values; other sequences use `key[i]` keys.
 *
 * @throws ConfigError if the document is not a mapping.
 */
export function parseYamlProperties(text: string, into: PropertySet = new Map()): PropertySet {
  const data = yaml.load(text, { schema: yaml.FAILSAFE_SCHEMA });
  if (data === null || data === undefined) return into;
  if (!isMapping(data)) {
    throw new ConfigError('YAML configuration layer must be a mapping');
  }
  flatten('', data, into);
  return into;
}

export function isYamlName(name: string): boolean {
  const lower = name.toLowerCase();
  return YAML_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/** Parse a layer with the parser its name calls for. */
export function parseLayer(name: string, text: string, into: PropertySet = new Map()): PropertySet {
  return isYamlName(name) ? parseYamlProperties(text, into) : parseProperties(text, into);
}
