/**
 * backend/src/shared/di/register-tenant-candidates.ts
 *
 * WHY:
 * - One call per capability wires both halves of tenant resolution:
 *   the container learns how to build each class, the registry learns which classes
 *   compete for the capability (and under which display name).
 * - The table is typed TenantCandidate<T>[], so a class that does not satisfy the
 *   capability fails to compile here instead of failing a cast at request time.
 *
 * RULES:
 * - Call exactly once per capability, at startup, before registry.build().
 * - Table order is match order.
 */

import type { Capability, ServiceClass } from './capability';
import type { CandidateRegistryBuilder } from './candidate-registry';
import type { Lifetime, ServiceCollection, ServiceFactory } from './service-container';

export type TenantCandidate<T> = {
  type: ServiceClass<T>;
  create: ServiceFactory<T>;
  /** Display name matched against tenant keys. Defaults to the class name. */
  name?: string;
};

export function registerTenantCandidates<T>(
  services: ServiceCollection,
  registry: CandidateRegistryBuilder,
  capability: Capability<T>,
  candidates: readonly TenantCandidate<T>[],
  opts: { lifetime?: Lifetime } = {},
): void {
  const lifetime = opts.lifetime ?? 'scoped';
  const names = new Map<ServiceClass<unknown>, string>();

  for (const candidate of candidates) {
    services.add({ type: candidate.type, lifetime, factory: candidate.create });
    if (candidate.name !== undefined) names.set(candidate.type, candidate.name);
  }

  registry.add(
    capability,
    candidates.map((c) => c.type),
    { names },
  );
}
