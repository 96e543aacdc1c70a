import { TenantErrors } from '../tenant.errors';

/**
 * Tenant key rules:
 * - Pure (no I/O)
 * - Throws AppError
 *
 * '' is present: a blank tenant header is left to the empty key policy.
 */
export function assertTenantKeyPresent(tenantKey: string | null): asserts tenantKey is string {
  if (tenantKey === null) {
    throw TenantErrors.tenantKeyMissing();
  }
}
