import { describe, expect, it } from 'vitest';

import {
  isArgumentRef,
  isLiteralRef,
  referencedResource,
} from '../src/api/class-init.js';
import { Container } from '../src/core/container.js';
import { Registry } from '../src/registry/registry.js';

class UserService {
  constructor(readonly deps: Record<string, unknown>) {}
}

type Services = {
  config: { port: number };
  redis: string;
  users: UserService;
};

describe('class-constructed resources', () => {
  it('passes named dependencies to the constructor', () => {
    const registry = new Registry<Services>()
      .register('config', { literal: { port: 1 } })
      .register('redis', { init: (_c, _name, argument) => `redis:${argument}`, argument: /\w*/ })
      .register('users', {
        class: UserService,
        dependencies: {
          config: true,
          sessions: ['redis', 'session'],
          settings: 'config',
          retries: { literal: 3 },
        },
      });
    const container = new Container(registry);

    const users = container.get('users');
    expect(users).toBeInstanceOf(UserService);
    expect(users.deps).toEqual({
      config: { port: 1 },
      sessions: 'redis:session',
      settings: { port: 1 },
      retries: 3,
    });
    expect(container.get('users')).toBe(users);
  });

  it('constructs with an empty object when there are no dependencies', () => {
    const container = new Container(new Registry().register('users', { class: UserService }));
    const users = container.get('users');

    expect(users instanceof UserService && users.deps).toEqual({});
  });
});

describe('dependency references', () => {
  it('tells references apart', () => {
    expect(isLiteralRef({ literal: undefined })).toBe(true);
    expect(isLiteralRef(['literal', 1])).toBe(false);
    expect(isArgumentRef(['redis', 'x'])).toBe(true);
    expect(isArgumentRef(['redis'])).toBe(false);
    expect(isArgumentRef([1, 'x'])).toBe(false);
  });

  it('names the resource a parameter pulls', () => {
    expect(referencedResource('dbh', true)).toBe('dbh');
    expect(referencedResource('dbh', 'database')).toBe('database');
    expect(referencedResource('cache', ['redis', 'session'])).toBe('redis');
    expect(referencedResource('retries', { literal: 3 })).toBeUndefined();
  });
});
