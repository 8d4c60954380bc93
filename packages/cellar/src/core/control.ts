/* Control
 *
 * Administrative facade of one container: overrides, lock, direct cache
 * seeding and dropping, preload, fresh instances and teardown.
 *
 * Kept apart from Container so that administrative names never compete with
 * resource names. The facade holds nothing but the container reference; get
 * a new one with `container.control()` whenever needed.
 *
 * Usage example:
 * ```typescript
 * // in a test
 * container
 *   .control()
 *   .override({ dbh: testDatabase, mailer: () => new FakeMailer() })
 *   .lock();
 *
 * container.get('userService'); // derived from the overridden dbh
 * container.get('paymentGateway'); // LockedModeError: not overridden
 * ```
 */

import { ArgumentValidationError, InvalidCacheValueError } from '../errors/errors.js';
import type {
  Argument,
  CacheSeedMap,
  Initializer,
  OverrideMap,
  ResourceMap,
  ResourceSpec,
} from '../types/types.js';
import { isScalar, normalizeArgument } from './cache-key.js';
import type { Container } from './container.js';
import { FLAG_IGNORE_CACHE } from './flags.js';

function isInitializer<R extends ResourceMap>(value: unknown): value is Initializer<unknown, R> {
  return typeof value === 'function';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeSeed(seed: unknown): string {
  if (isScalar(seed)) return `a scalar value '${String(seed)}'`;
  if (typeof seed === 'function') return 'a function';
  return Object.prototype.toString.call(seed);
}

/**
 * Parse one setCache() seed into argument -> value slots.
 *
 * @returns the slots to write, or null to drop every cached instance
 */
function parseSeed<R extends ResourceMap>(
  spec: ResourceSpec<R>,
  seed: unknown
): Map<string, unknown> | null {
  if (seed === null || seed === undefined) return null;
  if (spec.flags & FLAG_IGNORE_CACHE) {
    throw new InvalidCacheValueError(spec.name, 'a value for a resource that is never cached');
  }

  let pairs: Array<[unknown, unknown]>;
  if (Array.isArray(seed)) {
    if (seed.length === 1) {
      pairs = [['', seed[0]]];
    } else if (seed.length % 2 === 0) {
      pairs = [];
      for (let i = 0; i < seed.length; i += 2) pairs.push([seed[i], seed[i + 1]]);
    } else {
      throw new InvalidCacheValueError(spec.name, `an array of ${seed.length} elements`);
    }
  } else if (seed instanceof Map) {
    pairs = Array.from(seed.entries());
  } else if (isPlainObject(seed)) {
    pairs = Object.entries(seed);
  } else {
    throw new InvalidCacheValueError(spec.name, describeSeed(seed));
  }

  const slots = new Map<string, unknown>();
  for (const [raw, value] of pairs) {
    const argument = normalizeArgument(spec.name, raw);
    if (!spec.validate(argument)) throw new ArgumentValidationError(spec.name, argument);
    slots.set(argument, value);
  }
  return slots;
}

export class Control<R extends ResourceMap> {
  constructor(private readonly container: Container<R>) {}

  /**
   * Log cleanup failures that must not abort the current operation.
   */
  private report(name: string, errors: Error[]): void {
    for (const error of errors) {
      this.container.logger.warn(
        `[Cellar] Cleanup failed for resource '${name}' in container '${this.container.getName()}':`,
        error
      );
    }
  }

  /**
   * Replace the initializers of some resources.
   *
   * Every cached instance of an overridden resource is evicted with its
   * normal cleanup. A value that is not a function is coerced into an
   * initializer returning it; to override with a function value, wrap it:
   * `{ handler: () => myHandler }`.
   *
   * @throws UnknownResourceError if any name is not registered (nothing is changed)
   */
  override(overrides: OverrideMap<R>): this {
    const entries: Array<[string, unknown]> = Object.entries(overrides);
    for (const [name] of entries) this.container._spec(name);

    this.container._checkGeneration();
    // Installed before eviction; cleanups may re-enter get().
    for (const [name, value] of entries) {
      this.container.overrides.set(name, isInitializer<R>(value) ? value : () => value);
    }
    for (const [name] of entries) {
      this.report(name, this.container._evict(name));
    }
    return this;
  }

  /**
   * Evict whatever overridden resources produced, then drop every override.
   */
  clearOverrides(): this {
    this.container._checkGeneration();
    for (const name of this.container.overrides.keys()) {
      this.report(name, this.container._evict(name));
    }
    this.container.overrides.clear();
    return this;
  }

  /**
   * Forbid initializing resources that are neither derived nor overridden.
   * Cached instances are still returned.
   */
  lock(): this {
    this.container._setLocked(true);
    return this;
  }

  unlock(): this {
    this.container._setLocked(false);
    return this;
  }

  /**
   * Write or drop cache entries without running any initializer or cleanup.
   *
   * Useful to bootstrap a resource whose initializer needs part of its own
   * state: seed the object first, then let the initializer enrich it.
   *
   * @throws UnknownResourceError for an unregistered name
   * @throws InvalidCacheValueError for a seed of the wrong shape, or any
   *   non-null seed of an `ignoreCache` resource
   * @throws ArgumentValidationError for an argument the resource rejects
   */
  setCache(seeds: CacheSeedMap<R>): this {
    const plan: Array<[string, Map<string, unknown> | null]> = [];
    const entries: Array<[string, unknown]> = Object.entries(seeds);
    for (const [name, seed] of entries) {
      plan.push([name, parseSeed(this.container._spec(name), seed)]);
    }

    this.container._checkGeneration();
    const { cache } = this.container;
    for (const [name, slots] of plan) {
      if (slots === null) {
        cache.take(name);
        continue;
      }
      for (const [argument, value] of slots) cache.set(name, argument, value);
    }
    return this;
  }

  /**
   * Drop every cached instance without running any cleanup.
   *
   * The caller takes over whatever the dropped values hold.
   */
  cleanCache(): this {
    this.container._checkGeneration();
    this.container.cache.clear();
    return this;
  }

  /**
   * Initialize every resource flagged `preload`, in registration order.
   * The first failure propagates.
   */
  preload(): this {
    for (const name of this.container.registry.preloadList()) {
      this.container.fetch(name);
    }
    return this;
  }

  /**
   * Create an instance bypassing the cache. See {@link Container.fresh}.
   */
  fresh<K extends keyof R & string>(name: K, argument?: Argument): R[K] {
    return this.container.fresh(name, argument);
  }

  /**
   * Tear the container down. See {@link Container._teardown}.
   */
  cleanup(): this {
    this.container._teardown();
    return this;
  }
}
