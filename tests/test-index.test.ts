import { describe, it, expect } from 'vitest';
import * as extconf from '../src/index.js';

describe('public exports', () => {
  it('exposes the resolver, loader and context', () => {
    expect(typeof extconf.resolveExtensionNames).toBe('function');
    expect(typeof extconf.PropertiesLoader).toBe('function');
    expect(typeof extconf.ConfigContext).toBe('function');
    expect(extconf.DEFAULT_KEY).toBe('default');
    expect(extconf.VERSION).toBe('0.1.0');
  });

  it('resolves through the registry entry point', () => {
    const registry = new extconf.ExtensionRegistry([{ name: 'filter', defaults: ['a', 'b'] }]);
    registry.register('filter', 'a', {});
    registry.register('filter', 'b', {});
    expect(extconf.mergeValues(registry, 'filter', 'c,default,d', ['a', 'b'])).toEqual(['c', 'a', 'b', 'd']);
  });
});
