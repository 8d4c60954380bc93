/*
 * Registry
 * --------
 * Ordered set of resource definitions shared by any number of containers.
 *
 * Responsibilities
 *  - validate resource names (identifier, unique, not a container operation)
 *    and delegate option validation to buildSpec()
 *  - keep registration order: it drives preload order and breaks
 *    cleanup-order ties during teardown
 *  - verify declared dependencies and required modules on demand (selfCheck)
 *
 * Definitions are frozen and cannot be removed or redefined; the only
 * state that grows after setup is the preload list, and only by registration.
 */
import { createRequire } from 'node:module';
import path from 'node:path';

import { isIdentifier } from '../core/cache-key.js';
import { Container } from '../core/container.js';
import {
  DuplicateResourceError,
  InvalidSpecError,
  MissingDependencyError,
  ReservedNameError,
  UnloadableDependencyError,
} from '../errors/errors.js';
import { FLAG_PRELOAD } from '../core/flags.js';
import type {
  ContainerOptions,
  Initializer,
  ResourceMap,
  ResourceOptions,
  ResourceSpec,
} from '../types/types.js';
import { buildSpec } from './spec-builder.js';

export interface RegistryOptions {
  /**
   * File or file URL that `require` module specifiers are resolved from.
   *
   * @default `${process.cwd()}/index.js`
   */
  base?: string | URL;
}

let reservedNames: Set<string> | undefined;

/**
 * Names a resource may not take: container operations and Object.prototype members.
 */
function reserved(): Set<string> {
  return (reservedNames ??= new Set([
    ...Object.getOwnPropertyNames(Container.prototype),
    ...Object.getOwnPropertyNames(Object.prototype),
  ]));
}

export class Registry<R extends ResourceMap = ResourceMap> {
  /** Primary storage: resource name -> frozen definition, in registration order */
  private readonly specs = new Map<string, ResourceSpec<R>>();

  private readonly preloads: string[] = [];

  private readonly base: string | URL;

  private shared?: Container<R>;

  constructor(options?: RegistryOptions) {
    this.base = options?.base ?? path.join(process.cwd(), 'index.js');
  }

  /**
   * Number of registered resources.
   */
  get size(): number {
    return this.specs.size;
  }

  /**
   * Declare a resource.
   *
   * @param name - Identifier (`/^[a-z][a-z_0-9]*$/i`)
   * @param options - Resource options, or a bare initializer
   * @throws InvalidSpecError for a malformed name or options
   * @throws DuplicateResourceError if `name` is already registered
   * @throws ReservedNameError if `name` collides with a container operation
   *
   * @example
   * ```typescript
   * const registry = new Registry<{ config: Config; dbh: Database }>()
   *   .register('config', { literal: loadConfig() })
   *   .register('dbh', {
   *     dependencies: ['config'],
   *     init: (c) => connect(c.get('config').database),
   *     cleanup: (dbh) => dbh.close(),
   *   });
   * ```
   */
  register<K extends keyof R & string>(
    name: K,
    options: ResourceOptions<R[K], R> | Initializer<R[K], R>
  ): this {
    if (!isIdentifier(name)) {
      throw new InvalidSpecError(String(name), 'name', 'must be an identifier');
    }
    if (this.specs.has(name)) throw new DuplicateResourceError(name);
    if (reserved().has(name)) throw new ReservedNameError(name);

    const spec = buildSpec<R[K], R>(name, options, this.specs.size);
    this.specs.set(name, spec);
    if (spec.flags & FLAG_PRELOAD) this.preloads.push(name);
    return this;
  }

  /**
   * Fetch the definition of a resource.
   *
   * @returns the definition, or undefined if `name` is not registered
   */
  lookup(name: string): ResourceSpec<R> | undefined {
    return this.specs.get(name);
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  /**
   * Registration index of a resource, or -1 if `name` is not registered.
   */
  order(name: string): number {
    return this.specs.get(name)?.order ?? -1;
  }

  /**
   * Registered resource names, in registration order.
   */
  names(): string[] {
    return Array.from(this.specs.keys());
  }

  /**
   * Names of resources flagged `preload`, in registration order.
   */
  preloadList(): readonly string[] {
    return this.preloads;
  }

  /**
   * Verify that every declared dependency is registered and every required
   * module can be resolved.
   *
   * @throws MissingDependencyError naming the resource and the missing dependency
   * @throws UnloadableDependencyError naming the resource and the module
   */
  selfCheck(): this {
    const requireFrom = createRequire(this.base);
    for (const spec of this.specs.values()) {
      for (const dep of spec.dependencies) {
        if (!this.specs.has(dep)) throw new MissingDependencyError(spec.name, dep);
      }
      for (const module of spec.modules) {
        try {
          requireFrom.resolve(module);
        } catch (error) {
          throw new UnloadableDependencyError(spec.name, module, error);
        }
      }
    }
    return this;
  }

  /**
   * The shared container of this registry, created on first call.
   */
  defaultContainer(options?: ContainerOptions<R>): Container<R> {
    return (this.shared ??= new Container<R>(this, options));
  }
}
