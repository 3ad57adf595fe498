import { ResponseCache } from './caches/responses.js';
import type { CounterRegistry } from './counters.js';
import { ConfigurationError } from './errors.js';
import type { CacheOptions } from './types.js';

// a named group of backends, optionally fronted by a response cache
export interface Pool {
  readonly name: string;
  readonly cache: ResponseCache | null;
}

// pool definition as configured
export interface PoolDefinition {
  name: string;
  cache?: Partial<CacheOptions> | ResponseCache;
}

// the configured pools, read-only while serving
export class PoolRegistry {
  private pools: Map<string, Pool>;

  constructor(counters: CounterRegistry, definitions: readonly PoolDefinition[]) {
    this.pools = new Map();
    for (const definition of definitions) {
      if (this.pools.has(definition.name)) {
        throw new ConfigurationError(`Duplicate pool '${definition.name}'`);
      }
      // several pools may share one cache instance
      const cache =
        definition.cache instanceof ResponseCache
          ? definition.cache
          : definition.cache
            ? new ResponseCache(counters, definition.cache)
            : null;
      this.pools.set(definition.name, { name: definition.name, cache });
    }
  }

  get(name: string): Pool | null {
    return this.pools.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.pools.has(name);
  }

  names(): Set<string> {
    return new Set(this.pools.keys());
  }
}
