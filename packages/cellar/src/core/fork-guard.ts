/* ForkGuard
 *
 * Detects that the running context has been duplicated (a process fork, or
 * whatever the configured generation probe reports) and drops cached state
 * that must not be shared across that boundary.
 *
 * On a generation change:
 *  - forkSafe resources keep their cached instances untouched
 *  - every other cached instance is removed from the cache and handed to
 *    forkCleanup (or cleanup when no forkCleanup is declared)
 *  - overrides and the lock flag are left alone
 *
 * Cleanup failures are logged and the pass continues with the next instance.
 */

import type { ResourceMap, ResourceSpec } from '../types/types.js';
import type { Container } from './container.js';
import { FLAG_FORK_SAFE } from './flags.js';

export class ForkGuard<R extends ResourceMap> {
  private generation: unknown;

  constructor(
    private readonly container: Container<R>,
    private readonly probe: () => unknown
  ) {
    this.generation = probe();
  }

  /**
   * Run fork recovery if the generation changed since the last check.
   *
   * @returns true if a recovery pass ran
   */
  check(): boolean {
    const current = this.probe();
    if (Object.is(current, this.generation)) return false;

    // Commit first: cleanup callbacks may re-enter the container.
    this.generation = current;
    this.recover();
    return true;
  }

  private recover(): void {
    const { cache, registry } = this.container;
    const victims: Array<[ResourceSpec<R>, Map<string, unknown>]> = [];

    for (const name of this.container._teardownOrder(cache.names())) {
      const spec = registry.lookup(name);
      if (!spec || spec.flags & FLAG_FORK_SAFE) continue;
      const slots = cache.take(name);
      if (slots) victims.push([spec, slots]);
    }

    for (const [spec, slots] of victims) {
      for (const [argument, value] of slots) {
        const error = this.container._runCleanup(spec, value, 'fork');
        if (error) {
          this.container.logger.warn(
            `[Cellar] Fork cleanup failed for resource '${spec.name}'` +
              (argument === '' ? '' : ` (argument '${argument}')`) +
              ` in container '${this.container.getName()}':`,
            error
          );
        }
      }
    }
  }
}
