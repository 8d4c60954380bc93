/* Activator
 *
 * Runs the active initializer of a resource and applies its postInit hook.
 * The active initializer is the container's override for the resource when
 * one is installed, the definition's own `init` otherwise.
 *
 * Caching, locking and cycle detection are the resolver's business; the
 * activator only produces a value (or lets the initializer's error through).
 */

import type { Initializer, ResourceMap, ResourceSpec } from '../types/types.js';
import type { CacheKey } from './cache-key.js';
import type { Container } from './container.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for instrumentation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

export class Activator<R extends ResourceMap> {
  constructor(
    private readonly container: Container<R>,
    private readonly hook?: (key: string, durationNs: number) => void
  ) {}

  /**
   * Wrap instantiation with the onInstantiate hook, if configured.
   * The hook fires whether the initializer returns or throws.
   */
  private instrument<T>(key: CacheKey, execute: () => T): T {
    const hook = this.hook;
    if (!hook) return execute();

    const start = nowMs();
    try {
      return execute();
    } finally {
      hook(key, toNs(nowMs() - start));
    }
  }

  /**
   * Produce the final value of one resource instance.
   *
   * @param spec - Resource definition
   * @param key - Cache key of the instance, reported to the hook
   * @param argument - Normalized argument
   * @param override - Override initializer, if installed
   */
  run(
    spec: ResourceSpec<R>,
    key: CacheKey,
    argument: string,
    override?: Initializer<unknown, R>
  ): unknown {
    const raw = this.instrument(key, () =>
      override
        ? override(this.container, spec.name, argument)
        : spec.init(this.container, spec.name, argument)
    );
    return spec.postInit ? spec.postInit(raw, this.container) : raw;
  }
}
