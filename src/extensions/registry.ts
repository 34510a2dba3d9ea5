/**
 * Named extensions grouped under extension points.
 *
 * The registry does not discover or construct extensions; callers register
 * ready instances. Its main consumer is directive resolution, which asks it
 * whether a default name is currently registered.
 */

import { InvalidExtensionError, UnknownExtensionPointError } from '../errors.js';
import { resolveExtensionNames } from './directive.js';
import type { ExistenceOracle } from './directive.js';

type TypeChecker = (value: unknown) => boolean;

/**
 * Describes a named slot where extensions can be registered.
 */
export interface ExtensionPoint {
  readonly name: string;
  readonly description: string;
  readonly defaults: readonly string[];
}

export interface ExtensionPointOptions {
  name: string;
  description?: string;
  defaults?: readonly string[];
  typeCheck?: TypeChecker;
  typeName?: string;
}

interface InternalExtensionPoint extends ExtensionPoint {
  readonly typeCheck: TypeChecker | null;
  readonly typeName: string;
}

export class ExtensionRegistry {
  private _points: Map<string, InternalExtensionPoint> = new Map();
  private _extensions: Map<string, Map<string, unknown>> = new Map();

  constructor(points: ExtensionPointOptions[] = []) {
    for (const point of points) {
      this.addPoint(point);
    }
  }

  /**
   * Declare an extension point. Declaring an existing point again replaces
   * its description, defaults and type check but keeps its extensions.
   */
  addPoint(options: ExtensionPointOptions): void {
    this._points.set(options.name, {
      name: options.name,
      description: options.description ?? '',
      defaults: Object.freeze([...(options.defaults ?? [])]),
      typeCheck: options.typeCheck ?? null,
      typeName: options.typeName ?? options.name,
    });
    if (!this._extensions.has(options.name)) {
      this._extensions.set(options.name, new Map());
    }
  }

  /**
   * Register an extension under a name. A name registered twice keeps the
   * latest extension.
   *
   * @throws UnknownExtensionPointError if the point was never declared.
   * @throws InvalidExtensionError if the extension fails the point's type check.
   */
  register(pointName: string, name: string, extension: unknown): void {
    const point = this._point(pointName);
    if (point.typeCheck !== null && !point.typeCheck(extension)) {
      throw new InvalidExtensionError(pointName, name, point.typeName);
    }
    this._slot(pointName).set(name, extension);
  }

  /**
   * Remove a named extension. Returns true if it was registered.
   */
  unregister(pointName: string, name: string): boolean {
    return this._slot(pointName).delete(name);
  }

  hasExtension(pointName: string, name: string): boolean {
    return this._slot(pointName).has(name);
  }

  get(pointName: string, name: string): unknown | null {
    const slot = this._slot(pointName);
    return slot.has(name) ? slot.get(name) : null;
  }

  listNames(pointName: string): string[] {
    return [...this._slot(pointName).keys()];
  }

  listPoints(): ExtensionPoint[] {
    return [...this._points.values()].map(({ name, description, defaults }) => ({
      name,
      description,
      defaults,
    }));
  }

  /** Existence check bound to one extension point. */
  oracle(pointName: string): ExistenceOracle {
    const slot = this._slot(pointName);
    return (name) => slot.has(name);
  }

  /**
   * Resolve a directive against the point's registered extensions. When
   * `defaults` is omitted the point's declared defaults are used.
   */
  resolveNames(pointName: string, directive: string | null | undefined, defaults?: readonly string[] | null): string[] {
    const point = this._point(pointName);
    return resolveExtensionNames(defaults ?? point.defaults, directive, this.oracle(pointName));
  }

  private _point(pointName: string): InternalExtensionPoint {
    const point = this._points.get(pointName);
    if (point === undefined) {
      throw new UnknownExtensionPointError(pointName, [...this._points.keys()]);
    }
    return point;
  }

  private _slot(pointName: string): Map<string, unknown> {
    const slot = this._extensions.get(pointName);
    if (slot === undefined) {
      throw new UnknownExtensionPointError(pointName, [...this._points.keys()]);
    }
    return slot;
  }
}

/**
 * Insert the default extensions into a directive's extension list.
 *
 * Kept for callers that address extensions by registry and point rather
 * than by passing an oracle.
 */
export function mergeValues(
  registry: ExtensionRegistry,
  pointName: string,
  directive: string | null | undefined,
  defaults: readonly string[] | null | undefined,
): string[] {
  return resolveExtensionNames(defaults, directive, registry.oracle(pointName));
}
