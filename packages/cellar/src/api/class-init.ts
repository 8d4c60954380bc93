import type { Container } from '../core/container.js';
import type { Argument, Constructor, DependencyRef, ResourceMap } from '../types/types.js';

type Resolve<R extends ResourceMap> = (container: Container<R>) => unknown;

/**
 * A literal dependency: `{ literal: value }`.
 */
export function isLiteralRef(ref: unknown): ref is { readonly literal: unknown } {
  return typeof ref === 'object' && ref !== null && !Array.isArray(ref) && 'literal' in ref;
}

/**
 * A parametric dependency: `['name', argument]`.
 */
export function isArgumentRef(ref: unknown): ref is readonly [string, Argument] {
  return Array.isArray(ref) && ref.length === 2 && typeof ref[0] === 'string';
}

/**
 * Resource name a constructor parameter pulls from the container, if any.
 */
export function referencedResource(param: string, ref: DependencyRef): string | undefined {
  if (ref === true) return param;
  if (typeof ref === 'string') return ref;
  if (isArgumentRef(ref)) return ref[0];
  return undefined;
}

function toResolver<R extends ResourceMap>(param: string, ref: DependencyRef): Resolve<R> {
  if (isLiteralRef(ref)) {
    const { literal } = ref;
    return () => literal;
  }
  if (isArgumentRef(ref)) {
    const [name, argument] = ref;
    return (container) => container.fetch(name, argument);
  }
  const name = ref === true ? param : ref;
  return (container) => container.fetch(name);
}

/**
 * Build an initializer that constructs `ctor` from named resources.
 *
 * The plan is computed once; each run fetches the referenced resources and
 * passes them to the constructor as a single object.
 *
 * @example
 * ```typescript
 * registry.register('service', {
 *   class: UserService,
 *   dependencies: {
 *     dbh: true,                    // container.get('dbh')
 *     cache: ['redis', 'session'],  // container.get('redis', 'session')
 *     retries: { literal: 3 },
 *   },
 * });
 * // new UserService({ dbh, cache, retries: 3 })
 * ```
 */
export function classInitializer<T, R extends ResourceMap>(
  ctor: Constructor<T>,
  refs: Readonly<Record<string, DependencyRef>>
): (container: Container<R>) => T {
  const plan = Object.entries(refs).map(
    ([param, ref]): [string, Resolve<R>] => [param, toResolver<R>(param, ref)]
  );

  return (container) => {
    const params: Record<string, unknown> = {};
    for (const [param, resolve] of plan) {
      params[param] = resolve(container);
    }
    return new ctor(params);
  };
}
