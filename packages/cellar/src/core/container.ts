import {
  AggregateCleanupError,
  ArgumentValidationError,
  InvalidContainerConfigError,
  UnknownResourceError,
} from '../errors/errors.js';
import type { Registry } from '../registry/registry.js';
import type {
  Argument,
  CleanupMode,
  ContainerOptions,
  Initializer,
  Logger,
  ResourceMap,
  ResourceSpec,
} from '../types/types.js';
import { Activator } from './activator.js';
import { normalizeArgument } from './cache-key.js';
import { Control } from './control.js';
import { FLAG_IGNORE_CACHE } from './flags.js';
import { ForkGuard } from './fork-guard.js';
import { ResourceCache } from './resource-cache.js';
import { Resolver } from './resolver.js';

const DEFAULT_NAME = 'Container';

const processGeneration = () => process.pid;

/*
 * Container: the live, mutable side of a registry.
 *
 * Holds the instance cache, overrides, the lock flag and the teardown flag.
 * Resources are instantiated on first access and cached per (name, argument);
 * the fork guard runs before every operation that reads or writes the cache.
 *
 * Members prefixed with `_` are shared with Control and the core helpers and
 * are not part of the public API.
 */
export class Container<R extends ResourceMap = ResourceMap> {
  readonly registry: Registry<R>;
  readonly cache = new ResourceCache();
  readonly overrides = new Map<string, Initializer<unknown, R>>();
  readonly logger: Logger;

  private readonly resolver: Resolver<R>;
  private readonly forkGuard: ForkGuard<R>;
  private readonly name: string;

  private locked = false;
  private tearingDown = false;

  constructor(registry: Registry<R>, options?: ContainerOptions<R>) {
    const cfg = this.validateOptions(options);

    this.registry = registry;
    this.name = cfg.name ?? DEFAULT_NAME;
    this.logger = cfg.logger ?? console;
    this.resolver = new Resolver(this, new Activator(this, cfg.onInstantiate));
    this.forkGuard = new ForkGuard(this, cfg.generation ?? processGeneration);

    if (cfg.overrides) this.control().override(cfg.overrides);
  }

  /**
   * Reject option values of the wrong type before anything is wired.
   */
  private validateOptions(options?: ContainerOptions<R>): ContainerOptions<R> {
    if (options === undefined) return {};
    if (typeof options !== 'object' || options === null) {
      throw new InvalidContainerConfigError('options must be an object.');
    }
    if (options.name !== undefined && typeof options.name !== 'string') {
      throw new InvalidContainerConfigError(`'name' must be a string.`);
    }
    if (options.generation !== undefined && typeof options.generation !== 'function') {
      throw new InvalidContainerConfigError(`'generation' must be a function.`);
    }
    if (options.onInstantiate !== undefined && typeof options.onInstantiate !== 'function') {
      throw new InvalidContainerConfigError(`'onInstantiate' must be a function.`);
    }
    if (options.logger !== undefined && typeof options.logger?.warn !== 'function') {
      throw new InvalidContainerConfigError(`'logger' must have a warn() method.`);
    }
    return options;
  }

  getName(): string {
    return this.name;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * True once cleanup() has begun; no resource can be initialized afterwards.
   */
  get isTornDown(): boolean {
    return this.tearingDown;
  }

  /**
   * Get a resource, initializing it on first use.
   *
   * @example
   * ```typescript
   * const dbh = container.get('dbh');
   * const sessions = container.get('redis', 'session');
   * ```
   *
   * @throws UnknownResourceError if `name` is not registered
   * @throws ArgumentTypeError / ArgumentValidationError for a bad argument
   * @throws CircularDependencyError, LockedModeError, TeardownInProgressError
   */
  get<K extends keyof R & string>(name: K, argument?: Argument): R[K] {
    return this.fetch(name, argument) as R[K];
  }

  /**
   * Untyped form of get(), for callers that only know the name at runtime.
   */
  fetch(name: string, argument?: Argument): unknown {
    return this._resolve(name, argument, true);
  }

  /**
   * Create an instance without reading or writing the cache.
   *
   * Meant for one-off instances whose state must not leak into the shared
   * one, e.g. a database handle for a long transaction. The caller owns the
   * result: no cleanup will ever run for it.
   */
  fresh<K extends keyof R & string>(name: K, argument?: Argument): R[K] {
    return this._resolve(name, argument, false) as R[K];
  }

  /**
   * Return a cached instance without initializing anything.
   *
   * @returns the cached value, or undefined when none is cached
   * @throws UnknownResourceError if `name` is not registered
   */
  cached<K extends keyof R & string>(name: K, argument?: Argument): R[K] | undefined {
    this._spec(name);
    const normalized = normalizeArgument(name, argument);
    this._checkGeneration();
    return this.cache.get(name, normalized) as R[K] | undefined;
  }

  /**
   * Administrative facade: override, lock, setCache, preload, cleanup.
   */
  control(): Control<R> {
    return new Control(this);
  }

  private _resolve(name: string, argument: Argument | undefined, useCache: boolean): unknown {
    const spec = this._spec(name);
    const normalized = normalizeArgument(name, argument);
    if (!spec.validate(normalized)) {
      throw new ArgumentValidationError(name, normalized);
    }
    this._checkGeneration();
    return this.resolver.resolve(
      spec,
      normalized,
      useCache && !(spec.flags & FLAG_IGNORE_CACHE)
    );
  }

  /**
   * @internal Definition of a registered resource.
   * @throws UnknownResourceError
   */
  _spec(name: string): ResourceSpec<R> {
    const spec = this.registry.lookup(name);
    if (!spec) throw new UnknownResourceError(name, this.registry.names());
    return spec;
  }

  /** @internal Run fork recovery if the generation changed. */
  _checkGeneration(): void {
    this.forkGuard.check();
  }

  /** @internal */
  _setLocked(locked: boolean): void {
    this.locked = locked;
  }

  /**
   * @internal Sort resource names for teardown: ascending cleanupOrder,
   * ties broken by registration order.
   */
  _teardownOrder(names: readonly string[]): string[] {
    const specs = names.map((name) => this._spec(name));
    specs.sort((a, b) => a.cleanupOrder - b.cleanupOrder || a.order - b.order);
    return specs.map((spec) => spec.name);
  }

  /**
   * @internal Hand one evicted value to its cleanup function.
   *
   * Fork mode prefers forkCleanup and falls back to cleanup.
   *
   * @returns the error thrown by the cleanup function, if any
   */
  _runCleanup(spec: ResourceSpec<R>, value: unknown, mode: CleanupMode): Error | undefined {
    try {
      if (mode === 'fork' && spec.forkCleanup) {
        spec.forkCleanup(value);
      } else if (spec.cleanup) {
        spec.cleanup(value);
      }
    } catch (error) {
      return error instanceof Error ? error : new Error(String(error));
    }
    return undefined;
  }

  /**
   * @internal Remove every cached instance of a resource, running its normal cleanup.
   *
   * @returns errors thrown by cleanup functions; every instance is processed regardless
   */
  _evict(name: string): Error[] {
    const spec = this._spec(name);
    const slots = this.cache.take(name);
    if (!slots) return [];

    const errors: Error[] = [];
    for (const value of slots.values()) {
      const error = this._runCleanup(spec, value, 'normal');
      if (error) errors.push(error);
    }
    return errors;
  }

  /**
   * @internal Release every cached instance and refuse further initialization.
   *
   * Resources are evicted in ascending cleanupOrder. Every instance is
   * processed even when cleanup functions throw; the collected errors are
   * thrown afterwards as one AggregateCleanupError. Calling it again is a
   * no-op unless the cache was seeded in between.
   *
   * @throws AggregateCleanupError if one or more cleanup functions failed
   */
  _teardown(): void {
    this._checkGeneration();
    this.tearingDown = true;

    const errors: Error[] = [];
    for (const name of this._teardownOrder(this.cache.names())) {
      errors.push(...this._evict(name));
    }
    this.cache.clear();

    if (errors.length > 0) {
      throw new AggregateCleanupError(errors);
    }
  }
}
