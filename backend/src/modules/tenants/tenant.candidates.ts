/**
 * backend/src/modules/tenants/tenant.candidates.ts
 *
 * WHY:
 * - The explicit table of TenantService implementations. Adding a tenant = one class
 *   + one row here. Nothing scans the filesystem.
 *
 * RULES:
 * - Row order is match order: a tenant key matching several names picks the first row.
 * - Keep names non-overlapping where possible ('acme' is listed before 'acme-europe'
 *   so the bare key 'acme' stays with Acme).
 * - `name` is what tenant keys are matched against (keys from subdomains are lowercase).
 */

import type { TenantCandidate } from '../../shared/di';
import { TransactionService } from '../transactions';
import type { TenantService } from './tenant-service.capability';
import { AcmeTenantService } from './services/acme-tenant.service';
import { AcmeEuropeTenantService } from './services/acme-europe-tenant.service';
import { GlobexTenantService } from './services/globex-tenant.service';

export const TENANT_SERVICE_CANDIDATES: readonly TenantCandidate<TenantService>[] = [
  {
    type: AcmeTenantService,
    name: 'acme',
    create: async (p) => new AcmeTenantService(await p.get(TransactionService)),
  },
  {
    type: AcmeEuropeTenantService,
    name: 'acme-europe',
    create: async (p) => new AcmeEuropeTenantService(await p.get(TransactionService)),
  },
  {
    type: GlobexTenantService,
    name: 'globex',
    create: async (p) => new GlobexTenantService(await p.get(TransactionService)),
  },
];
