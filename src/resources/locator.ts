/**
 * Resource discovery over an ordered search path.
 */

import { readFileSync, statSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';

export type TextEncoding = 'utf-8' | 'latin1';

export interface Resource {
  /** Identifies the resource in log records. */
  readonly location: string;
  read(encoding: TextEncoding): string;
}

export interface ResourceLocator {
  /** Every match for `name`, in search order. */
  getResources(name: string): Resource[];
  /** The single match a plain lookup of `name` resolves to, or null. */
  getResource(name: string): Resource | null;
}

export class FileResource implements Resource {
  readonly location: string;

  constructor(filePath: string) {
    this.location = filePath;
  }

  read(encoding: TextEncoding): string {
    return readFileSync(this.location, encoding);
  }
}

export function isRegularFile(p: string): boolean {
  try {
    return statSync(p).isFile();
  } catch {
    return false;
  }
}

/**
 * Looks resources up as relative paths under each root directory.
 */
export class SearchPathLocator implements ResourceLocator {
  private _roots: string[];

  constructor(roots: readonly string[]) {
    this._roots = roots.map((root) => resolve(root));
  }

  get roots(): readonly string[] {
    return this._roots;
  }

  getResources(name: string): Resource[] {
    if (isAbsolute(name)) return [];
    const results: Resource[] = [];
    const seen = new Set<string>();
    for (const root of this._roots) {
      const candidate = join(root, name);
      if (seen.has(candidate)) continue;
      seen.add(candidate);
      if (isRegularFile(candidate)) {
        results.push(new FileResource(candidate));
      }
    }
    return results;
  }

  getResource(name: string): Resource | null {
    if (isAbsolute(name)) return null;
    for (const root of this._roots) {
      const candidate = join(root, name);
      if (isRegularFile(candidate)) {
        return new FileResource(candidate);
      }
    }
    return null;
  }
}
