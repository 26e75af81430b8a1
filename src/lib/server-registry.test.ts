import { describe, it, expect } from 'vitest';
import { ServerRegistry } from './server-registry.js';
import { ConfigError } from './errors.js';
import { createServer } from '../../tests/fixtures/servers.js';

describe('ServerRegistry', () => {
  it('should refuse an empty server list', () => {
    expect(() => ServerRegistry.load([])).toThrow(ConfigError);
    expect(() => ServerRegistry.load([])).toThrow('empty registry');
  });

  it('should refuse duplicate names', () => {
    const servers = [createServer({ name: 'A' }), createServer({ name: 'A', address: '5.6.7.8:27015' })];

    expect(() => ServerRegistry.load(servers)).toThrow('duplicate server name: A');
  });

  it('should refuse an empty name', () => {
    expect(() => ServerRegistry.load([createServer({ name: '' })])).toThrow('server name must not be empty');
  });

  it('should look servers up by name and position', () => {
    const registry = ServerRegistry.load([
      createServer({ name: 'A' }),
      createServer({ name: 'B', address: '5.6.7.8:25575', containerRef: 'mc' }),
    ]);

    expect(registry.size).toBe(2);
    expect(registry.lookup('B')).toEqual({ name: 'B', address: '5.6.7.8:25575', secret: 'x', containerRef: 'mc' });
    expect(registry.lookup('missing')).toBeUndefined();
    expect(registry.at(0)?.name).toBe('A');
    expect(registry.at(2)).toBeUndefined();
    expect(registry.list().map((s) => s.name)).toEqual(['A', 'B']);
  });

  it('should not share or expose mutable descriptors', () => {
    const source = createServer({ name: 'A' });
    const registry = ServerRegistry.load([source]);
    source.address = 'changed:1';

    expect(registry.lookup('A')?.address).toBe('1.2.3.4:27015');
    expect(Object.isFrozen(registry.lookup('A'))).toBe(true);
  });
});
