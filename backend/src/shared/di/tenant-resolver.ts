/**
 * backend/src/shared/di/tenant-resolver.ts
 *
 * WHY:
 * - Normal DI binds interface -> class once, at startup. Multi-tenancy needs the
 *   binding decided per request, keyed by a tenant key.
 * - TenantResolver picks the class; the lifecycle manager (InstanceProvider) builds it,
 *   so scoped lifetime rules still apply.
 *
 * MATCHING:
 * - Linear scan in registry order.
 * - First candidate whose displayName contains the tenant key (case-sensitive) wins.
 *   Overlapping names are a configuration defect; they are not rejected, only ordered.
 * - No match -> TenantImplementationNotFoundError. Never undefined.
 *
 * EMPTY KEY:
 * - '' is contained in every name, so it would always pick the first candidate.
 *   The integrator chooses: 'not-found' (default) or 'first-candidate'.
 *
 * RULES:
 * - No logging, no retries, no fallback here. Callers decide what a miss means.
 * - Stateless: safe to call concurrently from any number of scopes.
 */

import type { Capability } from './capability';
import type { CandidateDescriptor, CandidateRegistry } from './candidate-registry';
import type { InstanceProvider } from './service-container';
import { DiErrors } from './di.errors';

export type EmptyTenantKeyPolicy = 'not-found' | 'first-candidate';

export type TenantResolverOptions = {
  emptyTenantKey?: EmptyTenantKeyPolicy;
};

export class TenantResolver<T> {
  private readonly emptyTenantKey: EmptyTenantKeyPolicy;

  constructor(
    private readonly capability: Capability<T>,
    private readonly candidates: readonly CandidateDescriptor[],
    opts: TenantResolverOptions = {},
  ) {
    this.emptyTenantKey = opts.emptyTenantKey ?? 'not-found';
  }

  select(tenantKey: string): CandidateDescriptor {
    if (tenantKey === '' && this.emptyTenantKey === 'not-found') {
      throw DiErrors.tenantImplementationNotFound(this.capability.name, tenantKey);
    }

    const match = this.candidates.find((c) => c.displayName.includes(tenantKey));
    if (!match) {
      throw DiErrors.tenantImplementationNotFound(this.capability.name, tenantKey);
    }
    return match;
  }

  async resolve(tenantKey: string, provider: InstanceProvider): Promise<T> {
    const candidate = this.select(tenantKey);
    const instance = await provider.get(candidate.type);

    if (!this.capability.isImplementedBy(instance)) {
      throw DiErrors.contractViolation({
        capability: this.capability.name,
        service: candidate.displayName,
      });
    }
    return instance;
  }
}

/**
 * Resolution API over every registered capability.
 * An unregistered capability behaves like one with no candidates (NOT_FOUND).
 */
export class TenantServices {
  constructor(
    private readonly registry: CandidateRegistry,
    private readonly opts: TenantResolverOptions = {},
  ) {}

  resolverFor<T>(capability: Capability<T>): TenantResolver<T> {
    return new TenantResolver(capability, this.registry.candidatesFor(capability), this.opts);
  }

  resolve<T>(capability: Capability<T>, tenantKey: string, provider: InstanceProvider): Promise<T> {
    return this.resolverFor(capability).resolve(tenantKey, provider);
  }
}
