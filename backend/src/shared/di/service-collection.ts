/**
 * backend/src/shared/di/service-collection.ts
 *
 * WHY:
 * - The app registers its services in a fixed order, each with a lifetime:
 *   singletons shared by the whole process, scoped services created once per request.
 * - Registration is separate from construction: factories run lazily on first get,
 *   so tests can replace() a registration before anything is built.
 *
 * HOW TO USE:
 * - const services = new ServiceCollection<AppServices, RequestScope>()
 * - services.addSingleton('db', () => createDb(...), { dispose: (db) => db.destroy() })
 * - services.addScoped('userAccessor', (sp, ctx) => new UserAccessor(ctx.request))
 * - const provider = services.build()
 * - const scope = provider.createScope({ request, reply }); scope.get('userAccessor')
 *
 * RULES:
 * - A key is registered once; use replace() to swap it.
 * - Scoped services cannot be resolved from the root provider, and singleton
 *   factories only see the root (no singleton can capture a request's state).
 * - Dependency cycles throw instead of overflowing the stack.
 */

export type ServiceLifetime = 'singleton' | 'scoped';

export interface ServiceResolver<S> {
  get<K extends keyof S>(key: K): S[K];
  tryGet<K extends keyof S>(key: K): S[K] | undefined;
  has(key: keyof S): boolean;
}

export type SingletonFactory<S, K extends keyof S> = (sp: ServiceResolver<S>) => S[K];
export type ScopedFactory<S, C, K extends keyof S> = (sp: ServiceResolver<S>, ctx: C) => S[K];

export interface ServiceDescriptor<S, C, K extends keyof S = keyof S> {
  key: K;
  lifetime: ServiceLifetime;
  factory: (sp: ServiceResolver<S>, ctx: C | null) => S[K];
  // Method syntax keeps the parameter bivariant so descriptors of every key share one map.
  dispose?(instance: S[K]): Promise<void> | void;
}

export type RegisterOptions<S, K extends keyof S> = {
  dispose?: (instance: S[K]) => Promise<void> | void;
};

export class ServiceRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServiceRegistrationError';
  }
}

export class ServiceCollection<S, C> {
  private readonly descriptors = new Map<keyof S, ServiceDescriptor<S, C>>();

  addSingleton<K extends keyof S>(
    key: K,
    factory: SingletonFactory<S, K>,
    opts: RegisterOptions<S, K> = {},
  ): this {
    return this.add({ key, lifetime: 'singleton', factory: (sp) => factory(sp), dispose: opts.dispose });
  }

  addScoped<K extends keyof S>(
    key: K,
    factory: ScopedFactory<S, C, K>,
    opts: RegisterOptions<S, K> = {},
  ): this {
    return this.add({
      key,
      lifetime: 'scoped',
      factory: (sp, ctx) => {
        if (ctx === null) {
          throw new ServiceRegistrationError(
            `Cannot resolve scoped service '${String(key)}' from the root provider.`,
          );
        }
        return factory(sp, ctx);
      },
      dispose: opts.dispose,
    });
  }

  /**
   * Swap an existing registration's factory. Position and lifetime are kept.
   * The replacement ignores the request context (tests swap infrastructure, not per-request state).
   */
  replace<K extends keyof S>(key: K, factory: SingletonFactory<S, K>, opts: RegisterOptions<S, K> = {}): this {
    const existing = this.descriptors.get(key);
    if (!existing) {
      throw new ServiceRegistrationError(`Service '${String(key)}' is not registered.`);
    }

    const replacement: ServiceDescriptor<S, C, K> = {
      key,
      lifetime: existing.lifetime,
      factory: (sp, ctx) => {
        if (existing.lifetime === 'scoped' && ctx === null) {
          throw new ServiceRegistrationError(
            `Cannot resolve scoped service '${String(key)}' from the root provider.`,
          );
        }
        return factory(sp);
      },
      dispose: opts.dispose,
    };
    this.descriptors.set(key, replacement);
    return this;
  }

  has(key: keyof S): boolean {
    return this.descriptors.has(key);
  }

  /** Registrations in the order they were added. */
  list(): ReadonlyArray<Pick<ServiceDescriptor<S, C>, 'key' | 'lifetime'>> {
    return [...this.descriptors.values()].map((d) => ({ key: d.key, lifetime: d.lifetime }));
  }

  build(): ServiceProvider<S, C> {
    return new ServiceProvider(new Map(this.descriptors), null, null);
  }

  private add<K extends keyof S>(descriptor: ServiceDescriptor<S, C, K>): this {
    if (this.descriptors.has(descriptor.key)) {
      throw new ServiceRegistrationError(
        `Service '${String(descriptor.key)}' is already registered. Use replace() to swap it.`,
      );
    }
    this.descriptors.set(descriptor.key, descriptor);
    return this;
  }
}

export class ServiceProvider<S, C> implements ServiceResolver<S> {
  private readonly instances = new Map<keyof S, S[keyof S]>();
  private readonly resolving = new Set<keyof S>();
  private disposed = false;

  constructor(
    private readonly descriptors: ReadonlyMap<keyof S, ServiceDescriptor<S, C>>,
    private readonly root: ServiceProvider<S, C> | null,
    private readonly ctx: C | null,
  ) {}

  get<K extends keyof S>(key: K): S[K] {
    const descriptor = this.descriptors.get(key);
    if (!descriptor) {
      throw new ServiceRegistrationError(`Service '${String(key)}' is not registered.`);
    }

    // Singletons always live on the root, even when requested through a scope.
    if (descriptor.lifetime === 'singleton' && this.root) {
      return this.root.get(key);
    }

    if (this.disposed) {
      throw new ServiceRegistrationError(`Cannot resolve '${String(key)}': provider is disposed.`);
    }

    if (this.instances.has(key)) {
      // Stored under the same key it was created for.
      return this.instances.get(key) as S[K];
    }

    if (this.resolving.has(key)) {
      const chain = [...this.resolving, key].map(String).join(' -> ');
      throw new ServiceRegistrationError(`Circular dependency: ${chain}`);
    }

    this.resolving.add(key);
    try {
      const instance = descriptor.factory(this, this.ctx);
      this.instances.set(key, instance);
      return instance as S[K];
    } finally {
      this.resolving.delete(key);
    }
  }

  tryGet<K extends keyof S>(key: K): S[K] | undefined {
    return this.descriptors.has(key) ? this.get(key) : undefined;
  }

  has(key: keyof S): boolean {
    return this.descriptors.has(key);
  }

  createScope(ctx: C): ServiceProvider<S, C> {
    if (this.root) {
      throw new ServiceRegistrationError('Scopes can only be created from the root provider.');
    }
    return new ServiceProvider(this.descriptors, this, ctx);
  }

  /**
   * Runs disposers of the instances this provider created, most recent first.
   * Errors are collected so one failing disposer does not leak the rest.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const created = [...this.instances.entries()].reverse();
    this.instances.clear();

    const failures: unknown[] = [];
    for (const [key, instance] of created) {
      const descriptor = this.descriptors.get(key);
      if (!descriptor?.dispose) continue;
      try {
        await descriptor.dispose(instance);
      } catch (err) {
        failures.push(err);
      }
    }

    if (failures.length > 0) {
      throw new AggregateError(failures, 'One or more services failed to dispose.');
    }
  }
}
