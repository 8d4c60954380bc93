import { describe, expect, it, vi } from 'vitest';

import { Container } from '../src/core/container.js';
import { AggregateCleanupError, TeardownInProgressError } from '../src/errors/errors.js';
import { Registry } from '../src/registry/registry.js';

describe('Container teardown', () => {
  it('cleans up in ascending cleanupOrder, then registration order', () => {
    const order: string[] = [];
    const track = (name: string) => ({ init: () => name, cleanup: () => order.push(name) });
    const registry = new Registry()
      .register('late', { ...track('late'), cleanupOrder: 9e9 })
      .register('first', { ...track('first'), cleanupOrder: -5 })
      .register('mid', { ...track('mid'), cleanupOrder: 0 })
      .register('tie', track('tie'));
    const container = new Container(registry);

    for (const name of ['tie', 'mid', 'first', 'late']) container.get(name);
    container.control().cleanup();

    expect(order).toEqual(['first', 'mid', 'tie', 'late']);
  });

  it('refuses to initialize anything afterwards', () => {
    const container = new Container(new Registry().register('dbh', () => 'db'), { name: 'App' });
    container.get('dbh');

    container.control().cleanup();

    expect(container.isTornDown).toBe(true);
    expect(container.cached('dbh')).toBeUndefined();
    expect(() => container.get('dbh')).toThrow(TeardownInProgressError);
    expect(() => container.fresh('dbh')).toThrow("Container 'App' is being torn down");
  });

  it('cleans every argument instance', () => {
    const cleanup = vi.fn();
    const container = new Container(
      new Registry().register('redis', { init: (_c, _n, arg) => `r:${arg}`, argument: /\w*/, cleanup })
    );
    container.get('redis', 'a');
    container.get('redis', 'b');

    container.control().cleanup();

    expect(cleanup.mock.calls).toEqual([['r:a'], ['r:b']]);
  });

  it('is idempotent', () => {
    const cleanup = vi.fn();
    const container = new Container(new Registry().register('dbh', { init: () => 'db', cleanup }));
    container.get('dbh');

    container.control().cleanup().cleanup();

    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('finishes teardown before reporting failures', () => {
    const fine = vi.fn();
    const registry = new Registry()
      .register('a', {
        init: () => 'a',
        cleanup: () => {
          throw new Error('a failed');
        },
      })
      .register('b', { init: () => 'b', cleanup: fine })
      .register('c', {
        init: () => 'c',
        cleanup: () => {
          throw 'c failed';
        },
      });
    const container = new Container(registry);
    for (const name of ['a', 'b', 'c']) container.get(name);

    try {
      container.control().cleanup();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AggregateCleanupError);
      if (error instanceof AggregateCleanupError) {
        expect(error.errors.map((e) => e.message)).toEqual(['a failed', 'c failed']);
      }
    }
    expect(fine).toHaveBeenCalledWith('b');
    expect(container.cache.size).toBe(0);
  });

  it('still serves and cleans values seeded after teardown', () => {
    const cleanup = vi.fn();
    const container = new Container(new Registry().register('dbh', { init: () => 'db', cleanup }));
    container.control().cleanup();

    container.control().setCache({ dbh: ['seeded'] });
    expect(container.get('dbh')).toBe('seeded');

    container.control().cleanup();
    expect(cleanup).toHaveBeenCalledWith('seeded');
  });
});
