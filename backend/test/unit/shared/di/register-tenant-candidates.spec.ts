import { describe, it, expect } from 'vitest';
import {
  CandidateRegistryBuilder,
  ServiceCollection,
  TenantServices,
  defineCapability,
  registerTenantCandidates,
} from '../../../../src/shared/di';

interface Greeter {
  greet(): string;
}

const GreeterCapability = defineCapability<Greeter>('Greeter', ['greet']);

class Prefix {
  readonly value = 'hello';
}

class AcmeGreeter implements Greeter {
  constructor(private readonly prefix: Prefix) {}
  greet() {
    return `${this.prefix.value} from acme`;
  }
}

class GlobexGreeter implements Greeter {
  greet() {
    return 'globex says hi';
  }
}

function wire(opts: { lifetime?: 'scoped' | 'transient' } = {}) {
  const services = new ServiceCollection().addSingleton(Prefix, () => new Prefix());
  const builder = new CandidateRegistryBuilder();

  registerTenantCandidates<Greeter>(
    services,
    builder,
    GreeterCapability,
    [
      {
        type: AcmeGreeter,
        name: 'acme-corp',
        create: async (p) => new AcmeGreeter(await p.get(Prefix)),
      },
      { type: GlobexGreeter, create: () => new GlobexGreeter() },
    ],
    opts,
  );

  const registry = builder.build();
  return { services, registry, container: services.build() };
}

describe('registerTenantCandidates', () => {
  it('registers every candidate with the container', () => {
    const { services } = wire();

    expect(services.has(AcmeGreeter)).toBe(true);
    expect(services.has(GlobexGreeter)).toBe(true);
  });

  it('adds candidates in table order, with name overrides or the class name', () => {
    const { registry } = wire();

    expect(registry.candidatesFor(GreeterCapability).map((c) => c.displayName)).toEqual([
      'acme-corp',
      'GlobexGreeter',
    ]);
  });

  it('resolves candidates with their dependencies', async () => {
    const { registry, container } = wire();
    const tenantServices = new TenantServices(registry);

    const scope = container.createScope();
    const greeter = await tenantServices.resolve(GreeterCapability, 'acme', scope);

    expect(greeter.greet()).toBe('hello from acme');
  });

  it('registers as scoped by default', async () => {
    const { registry, container } = wire();
    const tenantServices = new TenantServices(registry);
    const scope = container.createScope();

    const a = await tenantServices.resolve(GreeterCapability, 'Globex', scope);
    const b = await tenantServices.resolve(GreeterCapability, 'Globex', scope);

    expect(a).toBe(b);
  });

  it('honours an explicit lifetime', async () => {
    const { registry, container } = wire({ lifetime: 'transient' });
    const tenantServices = new TenantServices(registry);
    const scope = container.createScope();

    const a = await tenantServices.resolve(GreeterCapability, 'Globex', scope);
    const b = await tenantServices.resolve(GreeterCapability, 'Globex', scope);

    expect(a).not.toBe(b);
  });
});
