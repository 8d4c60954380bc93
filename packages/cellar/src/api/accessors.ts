import type { Container } from '../core/container.js';
import type { Argument, ResourceMap } from '../types/types.js';

export type Accessors<R extends ResourceMap> = {
  readonly [K in keyof R & string]: (argument?: Argument) => R[K];
};

/**
 * Build one getter per registered resource.
 *
 * Resources registered after the call have no accessor.
 *
 * @example
 * ```typescript
 * const { config, redis } = createAccessors(container);
 * config();          // container.get('config')
 * redis('session');  // container.get('redis', 'session')
 * ```
 */
export function createAccessors<R extends ResourceMap>(container: Container<R>): Accessors<R> {
  const result = {} as { -readonly [K in keyof R & string]: (argument?: Argument) => R[K] };

  (container.registry.names() as Array<keyof R & string>).forEach((name) => {
    result[name] = (argument) => container.get(name, argument);
  });

  return Object.freeze(result);
}
