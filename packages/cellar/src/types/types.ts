import type { Container } from '../core/container.js';

/**
 * Generic constructor signature used by class-constructed resources.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Map of resource names to the types of their values.
 *
 * Declared once per registry so that `get()`, overrides and accessors are
 * typed by resource name:
 *
 * ```typescript
 * type AppResources = {
 *   config: Config;
 *   dbh: Database;
 * };
 * const registry = new Registry<AppResources>();
 * ```
 *
 * Declare it with `type`: an interface has no index signature and does not
 * satisfy this constraint.
 */
export type ResourceMap = Record<string, unknown>;

/**
 * Value accepted as a resource argument. Non-string scalars are converted
 * with `String()`; an absent argument is the empty string.
 */
export type Argument = string | number | bigint | boolean;

export type ArgumentPredicate = (argument: string) => boolean;

/**
 * Resource initializer. Receives the container it runs in (to fetch its own
 * dependencies), the resource name, and the normalized argument.
 */
export type Initializer<T = unknown, R extends ResourceMap = ResourceMap> = (
  container: Container<R>,
  name: string,
  argument: string
) => T;

/**
 * Reference to a constructor parameter of a class-constructed resource.
 *
 *   - `true`: the resource named like the parameter
 *   - `'name'`: the resource `name`
 *   - `['name', arg]`: the resource `name` with an argument
 *   - `{ literal: value }`: the value itself
 */
export type DependencyRef =
  | true
  | string
  | readonly [name: string, argument: Argument]
  | { readonly literal: unknown };

/**
 * Options accepted by `Registry.register()`.
 *
 * Exactly one of `init`, `literal` and `class` must be given.
 */
export interface ResourceOptions<T = unknown, R extends ResourceMap = ResourceMap> {
  init?: Initializer<T, R>;
  /** Constant value. Implies `derived` and no dependencies. */
  literal?: T;
  /** Constructor called with one object of named dependency values. */
  class?: Constructor<T>;
  /**
   * Argument validator. A RegExp is anchored to the whole string.
   * Defaults to accepting only the empty argument.
   */
  argument?: RegExp | ArgumentPredicate;
  /**
   * Resource names the initializer may fetch, or the constructor parameter
   * map when `class` is used. Verified by `Registry.selfCheck()`.
   */
  dependencies?: readonly string[] | Readonly<Record<string, DependencyRef>>;
  /**
   * Module specifiers the initializer loads. Only resolved, never loaded, by
   * `Registry.selfCheck()`; the initializer imports what it uses.
   */
  require?: string | readonly string[];
  cleanup?: (value: T) => void;
  /** Runs instead of `cleanup` when the entry is dropped after a fork. */
  forkCleanup?: (value: T) => void;
  /** Keep the cached value across a fork. */
  forkSafe?: boolean;
  /** Lower runs first during teardown. @default 0 */
  cleanupOrder?: number;
  /** Never cache; every access runs the initializer. */
  ignoreCache?: boolean;
  /** May be initialized while the container is locked. */
  derived?: boolean;
  /** Included in `control().preload()`. */
  preload?: boolean;
  /** Validates or transforms the raw value (from `init` or an override) before caching. */
  postInit?: (value: T, container: Container<R>) => T;
}

/**
 * Frozen resource description produced by the registry.
 *
 * Callbacks are declared as methods: the registry stores resources of
 * different value types side by side.
 */
export interface ResourceSpec<R extends ResourceMap = ResourceMap> {
  readonly name: string;
  /** Registration index, used to break cleanup-order ties. */
  readonly order: number;
  /** Bitfield of FLAG_* values from core/flags. */
  readonly flags: number;
  readonly cleanupOrder: number;
  readonly dependencies: readonly string[];
  readonly modules: readonly string[];
  init(container: Container<R>, name: string, argument: string): unknown;
  validate(argument: string): boolean;
  cleanup?(value: unknown): void;
  forkCleanup?(value: unknown): void;
  postInit?(value: unknown, container: Container<R>): unknown;
}

/**
 * Override accepted by `control().override()`: an initializer, or any other
 * value, which is coerced into an initializer returning it.
 */
export type OverrideMap<R extends ResourceMap> = {
  readonly [K in keyof R]?: R[K] | Initializer<R[K], R>;
};

/**
 * Cache seed accepted by `control().setCache()`:
 *
 *   - `null` / `undefined`: drop every cached instance of the resource
 *   - `[value]`: the no-argument slot
 *   - `[arg, value, arg, value, ...]`: argument/value pairs
 *   - `{ arg: value }` or `Map`: argument/value pairs
 */
export type CacheSeed<T> =
  | null
  | undefined
  | readonly [T]
  | readonly unknown[]
  | Readonly<Record<string, T>>
  | ReadonlyMap<Argument, T>;

export type CacheSeedMap<R extends ResourceMap> = {
  readonly [K in keyof R]?: CacheSeed<R[K]>;
};

export interface Logger {
  warn(message: string, ...args: unknown[]): void;
}

/**
 * Container configuration passed to the constructor.
 */
export interface ContainerOptions<R extends ResourceMap = ResourceMap> {
  /**
   * Optional name for debugging and error messages.
   *
   * @default 'Container'
   */
  name?: string;

  /** Initial overrides, applied as by `control().override()`. */
  overrides?: OverrideMap<R>;

  /**
   * Process identity probe. When its value changes between two operations,
   * the container runs fork recovery.
   *
   * @default () => process.pid
   */
  generation?: () => unknown;

  /**
   * Sink for non-fatal cleanup failures.
   *
   * @default console
   */
  logger?: Logger;

  /**
   * Optional hook invoked after every initializer run.
   *
   * Receives the cache key and the duration in nanoseconds.
   */
  onInstantiate?: (key: string, durationNs: number) => void;
}

export type CleanupMode = 'normal' | 'fork';
