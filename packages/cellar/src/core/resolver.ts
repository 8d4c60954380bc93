/* Resolver
 *
 * Cache-aware instantiation used by Container.fetch() and Container.fresh().
 *
 *  - Returns cached instances without touching any other state.
 *  - Detects circular dependencies with a pending set of cache keys: an
 *    initializer may re-enter the container for a different key, never for a
 *    key still being resolved on the current stack.
 *  - Enforces lock and teardown state before running an initializer.
 *  - Writes the cache only after the initializer and postInit both returned,
 *    so a failed resolution leaves the cache as it was.
 */

import { CircularDependencyError, LockedModeError, TeardownInProgressError } from '../errors/errors.js';
import type { ResourceMap, ResourceSpec } from '../types/types.js';
import type { Activator } from './activator.js';
import { cacheKey, type CacheKey } from './cache-key.js';
import type { Container } from './container.js';
import { FLAG_DERIVED } from './flags.js';

export class Resolver<R extends ResourceMap> {
  /** Keys being resolved on the current call stack */
  private readonly pending = new Set<CacheKey>();

  constructor(
    private readonly container: Container<R>,
    private readonly activator: Activator<R>
  ) {}

  /**
   * Keys currently in flight, sorted.
   */
  inFlight(): string[] {
    return Array.from(this.pending).sort();
  }

  /**
   * Resolve one instance of a resource.
   *
   * @param spec - Resource definition
   * @param argument - Normalized, validated argument
   * @param useCache - Read and write the cache (false for fresh() and ignoreCache)
   * @throws CircularDependencyError when the key is already pending
   * @throws LockedModeError when locked and neither derived nor overridden
   * @throws TeardownInProgressError once cleanup() has begun
   */
  resolve(spec: ResourceSpec<R>, argument: string, useCache: boolean): unknown {
    const { cache, overrides } = this.container;

    // Fast path: hot instance already cached
    if (useCache && cache.has(spec.name, argument)) {
      return cache.get(spec.name, argument);
    }

    const key = cacheKey(spec.name, argument);
    if (this.pending.has(key)) {
      throw new CircularDependencyError(spec.name, argument, this.inFlight());
    }

    this.pending.add(key);
    try {
      const override = overrides.get(spec.name);
      if (this.container.isLocked && !(spec.flags & FLAG_DERIVED) && !override) {
        throw new LockedModeError(spec.name);
      }
      if (this.container.isTornDown) {
        throw new TeardownInProgressError(spec.name, this.container.getName());
      }

      const value = this.activator.run(spec, key, argument, override);

      if (useCache) cache.set(spec.name, argument, value);
      return value;
    } finally {
      this.pending.delete(key);
    }
  }
}
