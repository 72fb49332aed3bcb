import { describe, it, expect, vi } from 'vitest';

import { ServiceCollection, ServiceRegistrationError } from '../../../../src/shared/di/service-collection';

type Ctx = { requestId: string };

class Counter {
  value = 0;
}

class RequestInfo {
  constructor(
    readonly requestId: string,
    readonly counter: Counter,
  ) {}
}

type Services = {
  counter: Counter;
  requestInfo: RequestInfo;
  greeting: string;
  a: string;
  b: string;
};

function baseCollection() {
  return new ServiceCollection<Services, Ctx>()
    .addSingleton('counter', () => new Counter())
    .addScoped('requestInfo', (sp, ctx) => new RequestInfo(ctx.requestId, sp.get('counter')));
}

describe('ServiceCollection', () => {
  it('lists registrations in the order they were added', () => {
    const services = baseCollection().addSingleton('greeting', () => 'hello');

    expect(services.list()).toEqual([
      { key: 'counter', lifetime: 'singleton' },
      { key: 'requestInfo', lifetime: 'scoped' },
      { key: 'greeting', lifetime: 'singleton' },
    ]);
  });

  it('rejects a second registration of the same key', () => {
    expect(() => baseCollection().addSingleton('counter', () => new Counter())).toThrow(
      new ServiceRegistrationError("Service 'counter' is already registered. Use replace() to swap it."),
    );
  });

  it('replace() swaps the factory and keeps position and lifetime', () => {
    const services = baseCollection().addSingleton('greeting', () => 'hello');
    services.replace('counter', () => Object.assign(new Counter(), { value: 42 }));

    expect(services.list()[0]).toEqual({ key: 'counter', lifetime: 'singleton' });
    expect(services.build().get('counter').value).toBe(42);
  });

  it('replace() of an unknown key throws', () => {
    expect(() => baseCollection().replace('greeting', () => 'hi')).toThrow(
      new ServiceRegistrationError("Service 'greeting' is not registered."),
    );
  });

  it('builds factories lazily, on first get', () => {
    const factory = vi.fn(() => 'hello');
    const provider = baseCollection().addSingleton('greeting', factory).build();

    expect(factory).not.toHaveBeenCalled();
    provider.get('greeting');
    provider.get('greeting');
    expect(factory).toHaveBeenCalledTimes(1);
  });
});

describe('ServiceProvider', () => {
  it('shares singletons across scopes and creates scoped services once per scope', () => {
    const provider = baseCollection().build();
    const first = provider.createScope({ requestId: 'r1' });
    const second = provider.createScope({ requestId: 'r2' });

    const a = first.get('requestInfo');
    expect(first.get('requestInfo')).toBe(a);
    expect(second.get('requestInfo')).not.toBe(a);

    expect(a.requestId).toBe('r1');
    expect(second.get('requestInfo').requestId).toBe('r2');
    expect(a.counter).toBe(second.get('requestInfo').counter);
    expect(first.get('counter')).toBe(provider.get('counter'));
  });

  it('refuses to resolve scoped services from the root', () => {
    expect(() => baseCollection().build().get('requestInfo')).toThrow(
      new ServiceRegistrationError("Cannot resolve scoped service 'requestInfo' from the root provider."),
    );
  });

  it('only creates scopes from the root', () => {
    const scope = baseCollection().build().createScope({ requestId: 'r1' });
    expect(() => scope.createScope({ requestId: 'r2' })).toThrow(
      new ServiceRegistrationError('Scopes can only be created from the root provider.'),
    );
  });

  it('reports dependency cycles', () => {
    const provider = new ServiceCollection<Services, Ctx>()
      .addSingleton('a', (sp) => `a:${sp.get('b')}`)
      .addSingleton('b', (sp) => `b:${sp.get('a')}`)
      .build();

    expect(() => provider.get('a')).toThrow(new ServiceRegistrationError('Circular dependency: a -> b -> a'));
  });

  it('tryGet() returns undefined for unregistered keys', () => {
    const provider = baseCollection().build();
    expect(provider.tryGet('greeting')).toBeUndefined();
    expect(provider.has('counter')).toBe(true);
  });

  it('disposes created instances in reverse order, only once', async () => {
    const disposed: string[] = [];
    const provider = new ServiceCollection<Services, Ctx>()
      .addSingleton('a', () => 'a', { dispose: () => void disposed.push('a') })
      .addSingleton('b', (sp) => `b:${sp.get('a')}`, { dispose: () => void disposed.push('b') })
      .addSingleton('greeting', () => 'never built', { dispose: () => void disposed.push('greeting') })
      .build();

    provider.get('b');
    await provider.dispose();
    await provider.dispose();

    expect(disposed).toEqual(['b', 'a']);
    expect(() => provider.get('a')).toThrow(
      new ServiceRegistrationError("Cannot resolve 'a': provider is disposed."),
    );
  });

  it('runs every disposer even when one fails', async () => {
    const disposed: string[] = [];
    const provider = new ServiceCollection<Services, Ctx>()
      .addSingleton('a', () => 'a', { dispose: () => void disposed.push('a') })
      .addSingleton(
        'b',
        () => 'b',
        {
          dispose: () => {
            throw new Error('boom');
          },
        },
      )
      .build();

    provider.get('a');
    provider.get('b');

    await expect(provider.dispose()).rejects.toThrow('One or more services failed to dispose.');
    expect(disposed).toEqual(['a']);
  });

  it('disposing a scope leaves singletons alive', async () => {
    const provider = baseCollection().build();
    const scope = provider.createScope({ requestId: 'r1' });
    const counter = scope.get('counter');

    await scope.dispose();
    expect(provider.get('counter')).toBe(counter);
  });
});
