import { describe, expect, it, vi } from 'vitest';

import { Container } from '../src/core/container.js';
import {
  ArgumentValidationError,
  InvalidCacheValueError,
  LockedModeError,
  UnknownResourceError,
} from '../src/errors/errors.js';
import { Registry } from '../src/registry/registry.js';

type Bootstrap = {
  logger: { level: string };
  config: { level: string; loggedAt: string };
};

describe('Control.override', () => {
  it('replaces initializers and evicts what they replaced', () => {
    const cleanup = vi.fn();
    const container = new Container(
      new Registry().register('dbh', { init: () => 'real', cleanup })
    );

    expect(container.get('dbh')).toBe('real');

    container.control().override({ dbh: 'fake' });
    expect(cleanup).toHaveBeenLastCalledWith('real');
    expect(container.get('dbh')).toBe('fake');

    container.control().override({ dbh: () => 'made' });
    expect(cleanup).toHaveBeenLastCalledWith('fake');
    expect(container.get('dbh')).toBe('made');

    container.control().clearOverrides();
    expect(cleanup).toHaveBeenLastCalledWith('made');
    expect(cleanup).toHaveBeenCalledTimes(3);
    expect(container.get('dbh')).toBe('real');
  });

  it('passes the container, name and argument to override functions', () => {
    const container = new Container(
      new Registry().register('redis', { init: () => 'real', argument: /\w*/ })
    );

    container.control().override({
      redis: (_c: unknown, name: string, argument: string) => `${name}:${argument}`,
    });

    expect(container.get('redis', 'lock')).toBe('redis:lock');
  });

  it('runs postInit on overridden values', () => {
    const container = new Container(
      new Registry().register('port', { init: () => 80, postInit: (value) => `:${String(value)}` })
    );

    container.control().override({ port: 8080 });
    expect(container.get('port')).toBe(':8080');
  });

  it('changes nothing when a name is unknown', () => {
    const cleanup = vi.fn();
    const container = new Container(
      new Registry().register('dbh', { init: () => 'real', cleanup })
    );
    container.get('dbh');

    expect(() => container.control().override({ dbh: 'fake', nope: 1 })).toThrow(
      UnknownResourceError
    );
    expect(cleanup).not.toHaveBeenCalled();
    expect(container.get('dbh')).toBe('real');
    expect(container.overrides.size).toBe(0);
  });

  it('installs the override before running cleanup', () => {
    let container: Container | undefined;
    const seen: unknown[] = [];
    const registry = new Registry().register('dbh', {
      init: () => 'real',
      cleanup: () => seen.push(container?.get('dbh')),
    });
    container = new Container(registry);
    container.get('dbh');

    container.control().override({ dbh: 'fake' });

    expect(seen).toEqual(['fake']);
    expect(container.get('dbh')).toBe('fake');
  });

  it('logs cleanup failures and keeps going', () => {
    const logger = { warn: vi.fn() };
    const failure = new Error('close failed');
    const container = new Container(
      new Registry().register('dbh', {
        init: () => 'real',
        cleanup: () => {
          throw failure;
        },
      }),
      { name: 'Test', logger }
    );
    container.get('dbh');

    container.control().override({ dbh: 'fake' });

    expect(logger.warn).toHaveBeenCalledWith(
      "[Cellar] Cleanup failed for resource 'dbh' in container 'Test':",
      failure
    );
    expect(container.get('dbh')).toBe('fake');
  });
});

describe('Control.lock', () => {
  function setup() {
    const registry = new Registry()
      .register('config', { literal: { port: 80 } })
      .register('helper', { init: (c) => c.fetch('config'), derived: true })
      .register('dbh', () => 'db')
      .register('mailer', () => 'smtp');
    return new Container(registry);
  }

  it('refuses to initialize resources that are neither derived nor overridden', () => {
    const container = setup();
    container.get('dbh');

    container.control().lock();
    expect(container.isLocked).toBe(true);

    expect(container.get('dbh')).toBe('db');
    expect(() => container.get('mailer')).toThrow(LockedModeError);
    expect(() => container.fresh('dbh')).toThrow(LockedModeError);
    expect(container.get('helper')).toEqual({ port: 80 });
  });

  it('lets overridden resources through', () => {
    const container = setup();
    container.control().lock().override({ mailer: 'fake' });

    expect(container.get('mailer')).toBe('fake');
  });

  it('exempts derived resources only while their dependencies resolve', () => {
    const registry = new Registry()
      .register('dbh', () => 'db')
      .register('schema', { init: (c) => `schema of ${String(c.fetch('dbh'))}`, derived: true });

    const locked = new Container(registry);
    locked.control().lock();
    expect(() => locked.get('schema')).toThrow(LockedModeError);
    expect(locked.cached('schema')).toBeUndefined();

    locked.control().override({ dbh: 'test-db' });
    expect(locked.get('schema')).toBe('schema of test-db');

    const cached = new Container(registry);
    cached.get('dbh');
    cached.control().lock();
    expect(cached.get('schema')).toBe('schema of db');
  });

  it('unlocks', () => {
    const container = setup();
    container.control().lock().unlock();

    expect(container.isLocked).toBe(false);
    expect(container.get('mailer')).toBe('smtp');
  });
});

describe('Control.setCache', () => {
  function setup() {
    const init = vi.fn((_c: unknown, _name: string, argument: string) => `real:${argument}`);
    const cleanup = vi.fn();
    const registry = new Registry()
      .register('redis', { init, cleanup, argument: /\w*/ })
      .register('dbh', () => 'db');
    return { container: new Container(registry), init, cleanup };
  }

  it('seeds values in every accepted shape', () => {
    const { container, init } = setup();

    container.control().setCache({ redis: ['default'] });
    container.control().setCache({ redis: ['a', 1, 'b', 2] });
    container.control().setCache({ redis: { c: 3 } });
    container.control().setCache({ redis: new Map([['d', 4]]) });

    expect(container.get('redis')).toBe('default');
    expect(container.get('redis', 'a')).toBe(1);
    expect(container.get('redis', 'b')).toBe(2);
    expect(container.get('redis', 'c')).toBe(3);
    expect(container.get('redis', 'd')).toBe(4);
    expect(init).not.toHaveBeenCalled();
  });

  it('drops instances without running cleanup', () => {
    const { container, init, cleanup } = setup();
    container.get('redis', 'a');

    container.control().setCache({ redis: null });

    expect(container.cached('redis', 'a')).toBeUndefined();
    expect(cleanup).not.toHaveBeenCalled();
    expect(container.get('redis', 'a')).toBe('real:a');
    expect(init).toHaveBeenCalledTimes(2);
  });

  it('replaces a cached value without running cleanup', () => {
    const { container, cleanup } = setup();
    container.get('redis');

    container.control().setCache({ redis: ['seeded'] });

    expect(container.get('redis')).toBe('seeded');
    expect(cleanup).not.toHaveBeenCalled();
  });

  it('rejects malformed seeds', () => {
    const { container } = setup();
    const received = (seed: unknown): string => {
      try {
        container.control().setCache({ redis: seed } as never);
      } catch (error) {
        if (error instanceof InvalidCacheValueError) return error.received;
        throw error;
      }
      return 'accepted';
    };

    expect(received(['a', 'b', 'c'])).toBe('an array of 3 elements');
    expect(received('plain')).toBe("a scalar value 'plain'");
    expect(received(() => 1)).toBe('a function');
    expect(received(new Set())).toBe('[object Set]');
  });

  it('validates arguments and writes nothing on failure', () => {
    const { container } = setup();

    expect(() => container.control().setCache({ redis: ['ok'], dbh: { x: 1 } })).toThrow(
      ArgumentValidationError
    );
    expect(container.cached('redis')).toBeUndefined();
    expect(() => container.control().setCache({ nope: ['x'] })).toThrow(UnknownResourceError);
  });

  it('refuses to seed resources that are never cached', () => {
    const registry = new Registry().register('counter', { init: () => 1, ignoreCache: true });
    const container = new Container(registry);

    try {
      container.control().setCache({ counter: [5] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidCacheValueError);
      if (error instanceof InvalidCacheValueError) {
        expect(error.received).toBe('a value for a resource that is never cached');
      }
    }
    expect(container.cached('counter')).toBeUndefined();
    expect(() => container.control().setCache({ counter: null })).not.toThrow();
  });

  it('bootstraps mutually dependent resources', () => {
    const registry = new Registry<Bootstrap>()
      .register('logger', (c) => ({ level: c.get('config').level }))
      .register('config', (c) => ({ level: 'debug', loggedAt: c.get('logger').level }));
    const container = new Container(registry);

    container.control().setCache({ logger: [{ level: 'bootstrap' }] });
    expect(container.get('config')).toEqual({ level: 'debug', loggedAt: 'bootstrap' });

    container.control().setCache({ logger: null });
    expect(container.get('logger')).toEqual({ level: 'debug' });
  });
});

describe('Control.cleanCache', () => {
  it('drops every instance without running cleanup', () => {
    const cleanup = vi.fn();
    let count = 0;
    const registry = new Registry()
      .register('dbh', { init: () => ++count, cleanup })
      .register('redis', { init: (_c, _name, argument) => `r:${argument}`, argument: /\w*/, cleanup });
    const container = new Container(registry);
    container.get('dbh');
    container.get('redis', 'a');

    const control = container.control();
    expect(control.cleanCache()).toBe(control);

    expect(container.cache.size).toBe(0);
    expect(cleanup).not.toHaveBeenCalled();
    expect(container.isTornDown).toBe(false);
    expect(container.get('dbh')).toBe(2);
  });

  it('keeps overrides', () => {
    const container = new Container(new Registry().register('dbh', () => 'real'));
    container.control().override({ dbh: 'fake' });
    container.get('dbh');

    container.control().cleanCache();

    expect(container.get('dbh')).toBe('fake');
  });
});

describe('Control.preload', () => {
  it('initializes preload resources in registration order', () => {
    const order: string[] = [];
    const registry = new Registry()
      .register('first', { init: () => order.push('first'), preload: true })
      .register('lazy', () => order.push('lazy'))
      .register('second', { init: () => order.push('second'), preload: true });
    const container = new Container(registry);

    container.control().preload();
    container.control().preload();

    expect(order).toEqual(['first', 'second']);
  });

  it('propagates the first failure', () => {
    const registry = new Registry()
      .register('broken', {
        init: () => {
          throw new Error('unreachable host');
        },
        preload: true,
      })
      .register('after', { init: () => 1, preload: true });
    const container = new Container(registry);

    expect(() => container.control().preload()).toThrow('unreachable host');
    expect(container.cached('after')).toBeUndefined();
  });
});
