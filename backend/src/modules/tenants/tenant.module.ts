/**
 * backend/src/modules/tenants/tenant.module.ts
 *
 * WHY:
 * - Encapsulates Tenants module wiring in two phases, matching the container lifecycle:
 *   1. registerTenantServices(): declare implementations (before build).
 *   2. createTenantModule(): routes over the built resolution API (after build).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import {
  registerTenantCandidates,
  type CandidateRegistryBuilder,
  type ServiceCollection,
  type TenantServices,
} from '../../shared/di';
import { TenantServiceCapability } from './tenant-service.capability';
import { TENANT_SERVICE_CANDIDATES } from './tenant.candidates';
import { TenantController } from './tenant.controller';
import { registerTenantRoutes } from './tenant.routes';

export function registerTenantServices(deps: {
  services: ServiceCollection;
  candidates: CandidateRegistryBuilder;
}): void {
  registerTenantCandidates(
    deps.services,
    deps.candidates,
    TenantServiceCapability,
    TENANT_SERVICE_CANDIDATES,
  );
}

export type TenantModule = ReturnType<typeof createTenantModule>;

export function createTenantModule(deps: { tenantServices: TenantServices }) {
  const controller = new TenantController(deps.tenantServices);

  return {
    registerRoutes(app: FastifyInstance) {
      registerTenantRoutes(app, controller);
    },
  };
}
