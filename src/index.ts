/**
 * extconf - extension directive resolution and layered properties loading.
 */

// Extensions
export {
  resolveExtensionNames,
  parseDirective,
  DEFAULT_KEY,
  REMOVE_VALUE_PREFIX,
  COMMA_SPLIT_PATTERN,
} from './extensions/directive.js';
export type { ExistenceOracle } from './extensions/directive.js';
export { ExtensionRegistry, mergeValues } from './extensions/registry.js';
export type { ExtensionPoint, ExtensionPointOptions } from './extensions/registry.js';

// Properties
export { PropertiesLoader, LoaderSettingsSchema } from './properties/loader.js';
export type { LoaderSettings, PropertiesLoaderOptions } from './properties/loader.js';
export { parseProperties, parseYamlProperties, parseLayer } from './properties/parser.js';
export type { PropertySet } from './properties/parser.js';

// Resources
export { SearchPathLocator, FileResource } from './resources/locator.js';
export type { Resource, ResourceLocator, TextEncoding } from './resources/locator.js';

// Config
export {
  ConfigContext,
  DEFAULT_PROPERTIES_FILE,
  getGlobalContext,
  setGlobalContext,
  resetGlobalContext,
  setProperties,
  getProperties,
} from './config.js';
export type { ConfigContextOptions } from './config.js';

// Errors
export {
  ExtconfError,
  ResourceNotFoundError,
  AmbiguousResourceError,
  ReadFailureError,
  ConfigError,
  UnknownExtensionPointError,
  InvalidExtensionError,
} from './errors.js';

// Observability
export { ContextLogger } from './observability/context-logger.js';
export type { ContextLoggerOptions, LogFormat, LogLevel, WritableOutput } from './observability/context-logger.js';

// Utils
export { isEmptyValue, isNotEmptyValue, isDefaultValue, getPid } from './utils/index.js';

export const VERSION = '0.1.0';
