/**
 * backend/src/modules/tenants/index.ts
 *
 * WHY:
 * - Define the public surface of the tenants module.
 * - Other modules resolve tenant behaviour by capability, never by importing services/.
 */

export { TenantServiceCapability } from './tenant-service.capability';
export type { TenantService } from './tenant-service.capability';
export { registerTenantServices, createTenantModule } from './tenant.module';
export type { TenantModule } from './tenant.module';
export type { TenantKey, TenantProfile, TenantTransaction } from './tenant.types';
