/**
 * PropertiesLoader: loads configuration layers from disk or a search path.
 *
 * A file at the literal path always wins. Otherwise the search path is
 * consulted, and either a single match is loaded or every match is merged
 * with later layers overriding earlier ones. Loading never throws: missing,
 * ambiguous and unreadable sources are logged and contribute nothing.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { v4 as uuidv4 } from 'uuid';
import {
  AmbiguousResourceError,
  ConfigError,
  ExtconfError,
  ReadFailureError,
  ResourceNotFoundError,
  toError,
} from '../errors.js';
import { ContextLogger } from '../observability/context-logger.js';
import { FileResource, SearchPathLocator, isRegularFile } from '../resources/locator.js';
import type { Resource, ResourceLocator } from '../resources/locator.js';
import { parseLayer } from './parser.js';
import type { PropertySet } from './parser.js';

export const LoaderSettingsSchema = Type.Object({
  searchPath: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  encoding: Type.Optional(Type.Union([Type.Literal('utf-8'), Type.Literal('latin1')])),
});

export type LoaderSettings = Static<typeof LoaderSettingsSchema>;

export interface PropertiesLoaderOptions extends LoaderSettings {
  /** Takes precedence over `searchPath`. */
  locator?: ResourceLocator;
  logger?: ContextLogger;
}

const SEARCH_PATH_LOCATION = '<search path>';

export class PropertiesLoader {
  private _locator: ResourceLocator;
  private _encoding: 'utf-8' | 'latin1';
  private _logger: ContextLogger;

  /**
   * @throws ConfigError if the settings do not match {@link LoaderSettingsSchema}.
   */
  constructor(options?: PropertiesLoaderOptions) {
    const settings: LoaderSettings = {};
    if (options?.searchPath !== undefined) settings.searchPath = options.searchPath;
    if (options?.encoding !== undefined) settings.encoding = options.encoding;
    if (!Value.Check(LoaderSettingsSchema, settings)) {
      const errors = [...Value.Errors(LoaderSettingsSchema, settings)].map((e) => ({
        field: e.path || '/',
        message: e.message,
      }));
      throw new ConfigError('Invalid properties loader settings', { errors });
    }

    this._locator = options?.locator ?? new SearchPathLocator(settings.searchPath ?? [process.cwd()]);
    this._encoding = settings.encoding ?? 'utf-8';
    this._logger = options?.logger ?? new ContextLogger({ name: 'extconf.loader' });
  }

  get locator(): ResourceLocator {
    return this._locator;
  }

  /**
   * Load `name` as a property set.
   *
   * @param allowMultiple merge every match on the search path instead of
   *   requiring a single one.
   * @param optional suppress the warning when nothing is found.
   */
  load(name: string, allowMultiple: boolean = false, optional: boolean = false): PropertySet {
    const logger = this._logger.withTrace(uuidv4());

    if (isRegularFile(name)) {
      return this._parse(name, new FileResource(name), logger);
    }

    let resources: Resource[] = [];
    try {
      resources = this._locator.getResources(name);
    } catch (e) {
      this._report(logger, new ReadFailureError(name, SEARCH_PATH_LOCATION, { cause: toError(e) }));
    }

    if (resources.length === 0) {
      if (!optional) {
        this._report(logger, new ResourceNotFoundError(name));
      }
      return new Map();
    }

    if (!allowMultiple) {
      if (resources.length > 1) {
        this._report(logger, new AmbiguousResourceError(name, resources.map((r) => r.location)));
      }
      const single = this._lookupSingle(name, logger);
      return single === null ? new Map() : this._parse(name, single, logger);
    }

    logger.info(`Loading ${name} properties from ${resources.map((r) => r.location).join(', ')}`, {
      name,
      count: resources.length,
    });

    const merged: PropertySet = new Map();
    for (const resource of resources) {
      for (const [key, value] of this._parse(name, resource, logger)) {
        merged.set(key, value);
      }
    }
    return merged;
  }

  /**
   * Read `name` as raw text: the file at that path, else the single
   * search-path match. Returns an empty string when neither exists.
   */
  loadMigrationRule(name: string): string {
    const logger = this._logger.withTrace(uuidv4());

    if (isRegularFile(name)) {
      return this._read(name, new FileResource(name), logger);
    }

    let resource: Resource | null = null;
    try {
      resource = this._locator.getResource(name);
    } catch (e) {
      this._report(logger, new ReadFailureError(name, SEARCH_PATH_LOCATION, { cause: toError(e) }));
    }
    return resource === null ? '' : this._read(name, resource, logger);
  }

  private _lookupSingle(name: string, logger: ContextLogger): Resource | null {
    try {
      const resource = this._locator.getResource(name);
      if (resource === null) {
        this._report(logger, new ReadFailureError(name, SEARCH_PATH_LOCATION));
      }
      return resource;
    } catch (e) {
      this._report(logger, new ReadFailureError(name, SEARCH_PATH_LOCATION, { cause: toError(e) }));
      return null;
    }
  }

  private _parse(name: string, resource: Resource, logger: ContextLogger): PropertySet {
    try {
      const text = resource.read(this._encoding);
      const properties = parseLayer(resource.location, text);
      logger.debug(`Loaded ${properties.size} properties from ${resource.location}`, {
        name,
        location: resource.location,
      });
      return properties;
    } catch (e) {
      this._report(logger, new ReadFailureError(name, resource.location, { cause: toError(e) }));
      return new Map();
    }
  }

  private _read(name: string, resource: Resource, logger: ContextLogger): string {
    try {
      return resource.read(this._encoding);
    } catch (e) {
      this._report(logger, new ReadFailureError(name, resource.location, { cause: toError(e) }));
      return '';
    }
  }

  private _report(logger: ContextLogger, error: ExtconfError): void {
    logger.warn(error.message, error.toJSON());
  }
}
