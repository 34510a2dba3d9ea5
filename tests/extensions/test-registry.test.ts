import { describe, it, expect, beforeEach } from 'vitest';
import { ExtensionRegistry, mergeValues } from '../../src/extensions/registry.js';
import { InvalidExtensionError, UnknownExtensionPointError } from '../../src/errors.js';

interface Filter {
  apply(input: string): string;
}

function isFilter(value: unknown): boolean {
  return typeof value === 'object' && value !== null && typeof (value as Record<string, unknown>)['apply'] === 'function';
}

const upper: Filter = { apply: (s) => s.toUpperCase() };
const trim: Filter = { apply: (s) => s.trim() };

let registry: ExtensionRegistry;

beforeEach(() => {
  registry = new ExtensionRegistry([
    { name: 'filter', description: 'Input filters', defaults: ['trim', 'upper'], typeCheck: isFilter, typeName: 'Filter' },
  ]);
});

describe('ExtensionRegistry', () => {
  it('registers and looks up named extensions', () => {
    registry.register('filter', 'upper', upper);
    expect(registry.hasExtension('filter', 'upper')).toBe(true);
    expect(registry.get('filter', 'upper')).toBe(upper);
    expect(registry.get('filter', 'trim')).toBeNull();
    expect(registry.listNames('filter')).toEqual(['upper']);
  });

  it('replaces an extension registered under the same name', () => {
    registry.register('filter', 'upper', upper);
    registry.register('filter', 'upper', trim);
    expect(registry.get('filter', 'upper')).toBe(trim);
    expect(registry.listNames('filter')).toEqual(['upper']);
  });

  it('unregisters by name', () => {
    registry.register('filter', 'upper', upper);
    expect(registry.unregister('filter', 'upper')).toBe(true);
    expect(registry.unregister('filter', 'upper')).toBe(false);
    expect(registry.hasExtension('filter', 'upper')).toBe(false);
  });

  it('rejects unknown extension points', () => {
    expect(() => registry.register('nope', 'x', upper)).toThrow(UnknownExtensionPointError);
    expect(() => registry.hasExtension('nope', 'x')).toThrow("Unknown extension point: 'nope'. Available: filter");
  });

  it('rejects extensions failing the type check', () => {
    expect(() => registry.register('filter', 'bad', { nope: true })).toThrow(InvalidExtensionError);
    expect(() => registry.register('filter', 'bad', 42)).toThrow(
      "Extension 'bad' for 'filter' must satisfy the Filter interface",
    );
  });

  it('accepts anything on a point without a type check', () => {
    registry.addPoint({ name: 'any' });
    registry.register('any', 'n', 42);
    expect(registry.get('any', 'n')).toBe(42);
  });

  it('lists points with their defaults', () => {
    expect(registry.listPoints()).toEqual([
      { name: 'filter', description: 'Input filters', defaults: ['trim', 'upper'] },
    ]);
  });

  it('keeps extensions when a point is declared again', () => {
    registry.register('filter', 'upper', upper);
    registry.addPoint({ name: 'filter', defaults: ['upper'] });
    expect(registry.hasExtension('filter', 'upper')).toBe(true);
    expect(registry.listPoints()[0].defaults).toEqual(['upper']);
  });

  it('provides a live oracle bound to a point', () => {
    const exists = registry.oracle('filter');
    expect(exists('upper')).toBe(false);
    registry.register('filter', 'upper', upper);
    expect(exists('upper')).toBe(true);
  });
});

describe('ExtensionRegistry.resolveNames', () => {
  beforeEach(() => {
    registry.register('filter', 'trim', trim);
    registry.register('filter', 'upper', upper);
  });

  it('uses the point defaults when none are given', () => {
    expect(registry.resolveNames('filter', '')).toEqual(['trim', 'upper']);
    expect(registry.resolveNames('filter', 'cache,default')).toEqual(['cache', 'trim', 'upper']);
  });

  it('drops defaults that are not registered', () => {
    registry.unregister('filter', 'trim');
    expect(registry.resolveNames('filter', 'x')).toEqual(['upper', 'x']);
  });

  it('uses explicit defaults when given', () => {
    expect(registry.resolveNames('filter', '-upper', ['upper', 'trim', 'missing'])).toEqual(['trim']);
  });
});

describe('mergeValues', () => {
  it('resolves against the registry oracle', () => {
    registry.register('filter', 'trim', trim);
    expect(mergeValues(registry, 'filter', 'x,default', ['trim', 'upper'])).toEqual(['x', 'trim']);
    expect(mergeValues(registry, 'filter', '-default,x', ['trim'])).toEqual(['x']);
  });
});
