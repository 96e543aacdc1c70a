/**
 * backend/src/shared/di/service-container.ts
 *
 * WHY:
 * - The tenant resolver needs a lifecycle manager that can "produce an instance of
 *   this runtime class inside the current scope". This is it.
 * - Scopes map 1:1 to HTTP requests (see shared/http/request-scope.ts).
 *
 * HOW TO USE:
 * - const services = new ServiceCollection()
 *     .addSingleton(Clock, () => new Clock())
 *     .addScoped(ReportService, async (s) => new ReportService(await s.get(Clock)));
 * - const container = services.build();
 * - const scope = container.createScope();
 *   const reports = await scope.get(ReportService);
 *   await scope.dispose();
 *
 * LIFETIMES:
 * - singleton: one per container, closed by container.close().
 * - scoped:    one per scope, closed by scope.dispose().
 * - transient: new on every get(); closed with the scope that created it.
 *
 * RULES:
 * - Classes are the keys. Plain values (config, logger) are captured by factories.
 * - Singleton factories receive the root container, so they cannot capture scoped services.
 * - Concurrent get() calls for the same scoped class share one construction.
 * - A construction that finishes after its scope was disposed is closed at once and
 *   rejects with scopeDisposed; it is never handed out.
 */

import type { ServiceClass } from './capability';
import { DiErrors } from './di.errors';

export type Lifetime = 'singleton' | 'scoped' | 'transient';

/** Lifecycle-manager boundary consumed by the tenant resolver. */
export interface InstanceProvider {
  get<T>(type: ServiceClass<T>): Promise<T>;
}

export type ServiceFactory<T> = (provider: InstanceProvider) => T | Promise<T>;

export interface Closeable {
  close(): Promise<void> | void;
}

export type ServiceRegistration = {
  type: ServiceClass<unknown>;
  lifetime: Lifetime;
  factory: ServiceFactory<unknown>;
};

function isCloseable(value: unknown): value is Closeable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'close' in value &&
    typeof value.close === 'function'
  );
}

/** Closes in reverse creation order; every close runs even if an earlier one fails. */
async function closeAll(instances: unknown[]): Promise<void> {
  const errors: unknown[] = [];

  for (const instance of instances.reverse()) {
    if (!isCloseable(instance)) continue;
    try {
      await instance.close();
    } catch (err) {
      errors.push(err);
    }
  }

  if (errors.length === 1) throw errors[0];
  if (errors.length > 1) throw new AggregateError(errors, 'Failed to close services');
}

export class ServiceCollection {
  private readonly registrations = new Map<ServiceClass<unknown>, ServiceRegistration>();

  addSingleton<T>(type: ServiceClass<T>, factory: ServiceFactory<T>): this {
    return this.add({ type, lifetime: 'singleton', factory });
  }

  addScoped<T>(type: ServiceClass<T>, factory: ServiceFactory<T>): this {
    return this.add({ type, lifetime: 'scoped', factory });
  }

  addTransient<T>(type: ServiceClass<T>, factory: ServiceFactory<T>): this {
    return this.add({ type, lifetime: 'transient', factory });
  }

  add(registration: ServiceRegistration): this {
    if (this.registrations.has(registration.type)) {
      throw DiErrors.serviceAlreadyRegistered({ service: registration.type.name });
    }
    this.registrations.set(registration.type, registration);
    return this;
  }

  has(type: ServiceClass<unknown>): boolean {
    return this.registrations.has(type);
  }

  build(): ServiceContainer {
    return new ServiceContainer(new Map(this.registrations));
  }
}

export class ServiceContainer implements InstanceProvider {
  private readonly singletons = new Map<ServiceClass<unknown>, Promise<unknown>>();
  private readonly created: unknown[] = [];

  constructor(
    private readonly registrations: ReadonlyMap<ServiceClass<unknown>, ServiceRegistration>,
  ) {}

  createScope(): ServiceScope {
    return new ServiceScope(this);
  }

  has(type: ServiceClass<unknown>): boolean {
    return this.registrations.has(type);
  }

  async get<T>(type: ServiceClass<T>): Promise<T> {
    const registration = this.registrationFor(type);
    if (registration.lifetime === 'scoped') {
      throw DiErrors.scopedFromRoot({ service: type.name });
    }

    // Transients resolved at the root live as long as the container.
    const instance =
      registration.lifetime === 'singleton'
        ? await this.singleton(registration)
        : await this.track(registration);

    return ensureInstanceOf(type, instance);
  }

  async close(): Promise<void> {
    const created = this.created.splice(0, this.created.length);
    this.singletons.clear();
    await closeAll(created);
  }

  /** @internal used by ServiceScope */
  registrationFor(type: ServiceClass<unknown>): ServiceRegistration {
    const registration = this.registrations.get(type);
    if (!registration) {
      throw DiErrors.serviceNotRegistered({ service: type.name });
    }
    return registration;
  }

  /** @internal used by ServiceScope */
  singleton(registration: ServiceRegistration): Promise<unknown> {
    let pending = this.singletons.get(registration.type);
    if (!pending) {
      pending = this.track(registration);
      this.singletons.set(registration.type, pending);
      // A failed construction must not poison later attempts.
      void pending.catch(() => this.singletons.delete(registration.type));
    }
    return pending;
  }

  /** @internal used by ServiceScope */
  async construct(
    registration: ServiceRegistration,
    provider: InstanceProvider,
  ): Promise<unknown> {
    return registration.factory(provider);
  }

  private async track(registration: ServiceRegistration): Promise<unknown> {
    const instance = await this.construct(registration, this);
    this.created.push(instance);
    return instance;
  }
}

export class ServiceScope implements InstanceProvider {
  private readonly scoped = new Map<ServiceClass<unknown>, Promise<unknown>>();
  private readonly created: unknown[] = [];
  private disposed = false;

  constructor(private readonly root: ServiceContainer) {}

  get isDisposed(): boolean {
    return this.disposed;
  }

  async get<T>(type: ServiceClass<T>): Promise<T> {
    if (this.disposed) {
      throw DiErrors.scopeDisposed({ service: type.name });
    }

    const registration = this.root.registrationFor(type);
    let instance: unknown;

    switch (registration.lifetime) {
      case 'singleton':
        instance = await this.root.singleton(registration);
        break;
      case 'scoped':
        instance = await this.scopedInstance(registration);
        break;
      case 'transient':
        instance = await this.track(registration);
        break;
    }

    return ensureInstanceOf(type, instance);
  }

  /**
   * Closes every scoped/transient instance this scope created. Safe to call twice.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const created = this.created.splice(0, this.created.length);
    this.scoped.clear();
    await closeAll(created);
  }

  private scopedInstance(registration: ServiceRegistration): Promise<unknown> {
    let pending = this.scoped.get(registration.type);
    if (!pending) {
      pending = this.track(registration);
      this.scoped.set(registration.type, pending);
      void pending.catch(() => this.scoped.delete(registration.type));
    }
    return pending;
  }

  private async track(registration: ServiceRegistration): Promise<unknown> {
    const instance = await this.root.construct(registration, this);

    if (this.disposed) {
      await closeAll([instance]);
      throw DiErrors.scopeDisposed({ service: registration.type.name });
    }

    this.created.push(instance);
    return instance;
  }
}

function ensureInstanceOf<T>(type: ServiceClass<T>, instance: unknown): T {
  if (!(instance instanceof type)) {
    throw DiErrors.factoryTypeMismatch({ service: type.name });
  }
  return instance;
}
