/**
 * backend/src/shared/di/di.errors.ts
 *
 * WHY:
 * - The DI core owns the meaning of its failures.
 * - "No implementation for this tenant" must be distinguishable from wiring bugs,
 *   so it gets its own AppError subclass (callers can `instanceof` it).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Meta carries names only (capability, class, tenant key). Never instances.
 */

import { AppError, type AppErrorMeta } from '../http/errors';

export class TenantImplementationNotFoundError extends AppError {
  readonly capability: string;
  readonly tenantKey: string;

  constructor(capability: string, tenantKey: string) {
    super({
      code: 'NOT_FOUND',
      status: 404,
      message: 'No implementation registered for this tenant',
      meta: { capability, tenantKey },
    });
    this.name = 'TenantImplementationNotFoundError';
    this.capability = capability;
    this.tenantKey = tenantKey;
  }
}

export const DiErrors = {
  tenantImplementationNotFound(capability: string, tenantKey: string) {
    return new TenantImplementationNotFoundError(capability, tenantKey);
  },

  serviceNotRegistered(meta?: AppErrorMeta) {
    return AppError.internal('Service is not registered', meta);
  },

  serviceAlreadyRegistered(meta?: AppErrorMeta) {
    return AppError.conflict('Service is already registered', meta);
  },

  capabilityAlreadyRegistered(meta?: AppErrorMeta) {
    return AppError.conflict('Capability candidates are already registered', meta);
  },

  registryFrozen(meta?: AppErrorMeta) {
    return AppError.internal('Candidate registry is already built', meta);
  },

  scopedFromRoot(meta?: AppErrorMeta) {
    return AppError.internal('Scoped service cannot be resolved outside a scope', meta);
  },

  scopeDisposed(meta?: AppErrorMeta) {
    return AppError.internal('Service scope is already disposed', meta);
  },

  factoryTypeMismatch(meta?: AppErrorMeta) {
    return AppError.internal('Service factory returned an instance of another type', meta);
  },

  contractViolation(meta?: AppErrorMeta) {
    return AppError.internal('Resolved instance does not satisfy the capability', meta);
  },
} as const;
