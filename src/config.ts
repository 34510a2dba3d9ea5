/**
 * Configuration context: a properties snapshot plus system-property lookup.
 *
 * Contexts are immutable. The process-wide context behind the
 * backward-compatible entry points is replaced wholesale, never edited.
 */

import { PropertiesLoader } from './properties/loader.js';
import type { PropertySet } from './properties/parser.js';

export const DEFAULT_PROPERTIES_FILE = 'extconf.properties';

const VARIABLE_PATTERN = /\$\s*\{?\s*([._0-9a-zA-Z]+)\s*\}?/g;

export interface ConfigContextOptions {
  properties?: PropertySet | Record<string, string>;
  systemProperties?: Record<string, string>;
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
}

export class ConfigContext {
  private readonly _properties: ReadonlyMap<string, string>;
  private readonly _systemProperties: Readonly<Record<string, string>>;
  private readonly _env: Record<string, string | undefined>;

  constructor(options?: ConfigContextOptions) {
    const props = options?.properties;
    this._properties = props instanceof Map ? new Map(props) : new Map(Object.entries(props ?? {}));
    this._systemProperties = Object.freeze({ ...(options?.systemProperties ?? {}) });
    this._env = options?.env ?? process.env;
  }

  get properties(): ReadonlyMap<string, string> {
    return this._properties;
  }

  get(key: string, defaultValue?: string): string | undefined {
    return this._properties.get(key) ?? defaultValue;
  }

  /**
   * Environment first, then system properties when the environment value
   * is missing or empty.
   */
  getSystemProperty(key: string): string | undefined {
    const value = this._env[key];
    if (value !== undefined && value.length > 0) return value;
    return Object.prototype.hasOwnProperty.call(this._systemProperties, key)
      ? this._systemProperties[key]
      : value;
  }

  /**
   * A non-empty system property overrides the loaded properties.
   */
  getProperty(key: string, defaultValue?: string): string | undefined {
    const value = this.getSystemProperty(key);
    if (value !== undefined && value.length > 0) return value;
    return this.get(key, defaultValue);
  }

  /**
   * Substitute `${name}` and `$name` placeholders. Lookup order is system
   * property, then `params`, then the loaded properties; unresolved
   * placeholders become empty.
   */
  replaceProperty(expression: string, params?: Readonly<Record<string, string>>): string {
    if (expression.length === 0 || !expression.includes('$')) return expression;
    return expression.replace(VARIABLE_PATTERN, (_match, key: string) => {
      const system = this.getSystemProperty(key);
      if (system !== undefined && system.length > 0) return system;
      if (params !== undefined && Object.prototype.hasOwnProperty.call(params, key)) return params[key];
      return this.get(key) ?? '';
    });
  }

  withProperties(properties: PropertySet | Record<string, string>): ConfigContext {
    return new ConfigContext({
      properties,
      systemProperties: { ...this._systemProperties },
      env: this._env,
    });
  }
}

let _globalContext: ConfigContext | null = null;

/**
 * The process-wide context. On first use, when nothing was set, it is built
 * from an optional `extconf.properties` in the working directory.
 */
export function getGlobalContext(): ConfigContext {
  if (_globalContext === null) {
    const properties = new PropertiesLoader().load(DEFAULT_PROPERTIES_FILE, false, true);
    _globalContext = new ConfigContext({ properties });
  }
  return _globalContext;
}

export function setGlobalContext(context: ConfigContext): void {
  _globalContext = context;
}

export function resetGlobalContext(): void {
  _globalContext = null;
}

/**
 * Replace the process-wide properties. Call during initialization, before
 * anything reads them.
 */
export function setProperties(properties: PropertySet | Record<string, string>): void {
  _globalContext = (_globalContext ?? new ConfigContext()).withProperties(properties);
}

export function getProperties(): ReadonlyMap<string, string> {
  return getGlobalContext().properties;
}
