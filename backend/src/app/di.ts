/**
 * backend/src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Declares every service ONCE, then builds the container and the tenant candidate
 *   registry exactly once, before the server accepts traffic.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. the empty tenant key policy) belong HERE,
 *   not inside the resolver.
 */

import type { AppConfig } from './config';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import {
  CandidateRegistryBuilder,
  ServiceCollection,
  TenantServices,
  type CandidateRegistry,
  type ServiceContainer,
} from '../shared/di';

import { loadTransactionSeed, registerTransactionModule } from '../modules/transactions';
import type { Transaction } from '../modules/transactions';

import { createTenantModule, registerTenantServices } from '../modules/tenants';
import type { TenantModule } from '../modules/tenants';

export type AppDeps = {
  logger: Logger;

  container: ServiceContainer;
  candidates: CandidateRegistry;
  tenantServices: TenantServices;

  // modules
  tenants: TenantModule;

  // lifecycle
  close: () => Promise<void>;
};

export type BuildDepsOptions = {
  /** Replaces the seed file (tests). */
  transactions?: readonly Transaction[];
};

export function buildDeps(config: AppConfig, opts: BuildDepsOptions = {}): AppDeps {
  const services = new ServiceCollection();
  const candidateBuilder = new CandidateRegistryBuilder();

  // support modules first: tenant services depend on them
  registerTransactionModule({
    services,
    seed: opts.transactions ?? loadTransactionSeed(),
  });

  registerTenantServices({ services, candidates: candidateBuilder });

  // frozen from here on
  const container = services.build();
  const candidates = candidateBuilder.build();

  const tenantServices = new TenantServices(candidates, {
    emptyTenantKey: config.tenants.emptyKeyPolicy,
  });

  const tenants = createTenantModule({ tenantServices });

  return {
    logger,
    container,
    candidates,
    tenantServices,
    tenants,
    close: async () => {
      await container.close();
    },
  };
}
