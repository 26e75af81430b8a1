import type { ServerDescriptor } from '../types/server-descriptor.js';
import { ConfigError } from './errors.js';

/**
 * Read-only view of the servers the session can address
 */
export interface ServerLookup {
  readonly size: number;
  lookup(name: string): ServerDescriptor | undefined;
  at(index: number): ServerDescriptor | undefined;
}

/**
 * Immutable, ordered set of configured servers
 */
export class ServerRegistry implements ServerLookup {
  private readonly servers: readonly ServerDescriptor[];
  private readonly byName: ReadonlyMap<string, ServerDescriptor>;

  private constructor(servers: readonly ServerDescriptor[]) {
    this.servers = servers;
    this.byName = new Map(servers.map((s) => [s.name, s]));
  }

  /**
   * Build a registry from loaded descriptors
   * @throws ConfigError if the list is empty or names are not unique
   */
  static load(servers: readonly ServerDescriptor[]): ServerRegistry {
    if (servers.length === 0) {
      throw new ConfigError('empty registry');
    }

    const seen = new Set<string>();
    for (const server of servers) {
      if (!server.name) {
        throw new ConfigError('server name must not be empty');
      }
      if (seen.has(server.name)) {
        throw new ConfigError(`duplicate server name: ${server.name}`);
      }
      seen.add(server.name);
    }

    return new ServerRegistry(servers.map((s) => Object.freeze({ ...s })));
  }

  get size(): number {
    return this.servers.length;
  }

  lookup(name: string): ServerDescriptor | undefined {
    return this.byName.get(name);
  }

  at(index: number): ServerDescriptor | undefined {
    return this.servers[index];
  }

  list(): readonly ServerDescriptor[] {
    return this.servers;
  }
}
