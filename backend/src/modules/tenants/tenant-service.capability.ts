/**
 * backend/src/modules/tenants/tenant-service.capability.ts
 *
 * WHY:
 * - The contract every tenant implementation satisfies, and the capability value
 *   callers resolve it by. Callers never name a concrete tenant class.
 */

import { defineCapability } from '../../shared/di';
import type { TenantProfile, TenantTransaction } from './tenant.types';

export interface TenantService {
  getProfile(): TenantProfile;
  listTransactions(year: number): Promise<TenantTransaction[]>;
  getTransaction(transactionId: number): Promise<TenantTransaction | undefined>;
}

export const TenantServiceCapability = defineCapability<TenantService>('TenantService', [
  'getProfile',
  'listTransactions',
  'getTransaction',
]);
