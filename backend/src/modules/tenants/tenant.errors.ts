/**
 * backend/src/modules/tenants/tenant.errors.ts
 *
 * WHY:
 * - Tenants module owns its domain semantics.
 * - "Unknown tenant" is not defined here: it comes out of tenant resolution as
 *   TenantImplementationNotFoundError (NOT_FOUND) and is mapped by the error handler.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const TenantErrors = {
  tenantKeyMissing(meta?: AppErrorMeta) {
    return AppError.validationError('Tenant key is missing from request.', meta);
  },
} as const;
