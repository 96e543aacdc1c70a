/**
 * backend/src/shared/di/index.ts
 *
 * Public surface of the DI core. Modules import from here, not from individual files.
 */

export { defineCapability } from './capability';
export type { Capability, ServiceClass, MethodKeys } from './capability';

export {
  CandidateRegistry,
  CandidateRegistryBuilder,
  buildCandidates,
} from './candidate-registry';
export type { CandidateDescriptor, CandidateNameOverrides } from './candidate-registry';

export { ServiceCollection, ServiceContainer, ServiceScope } from './service-container';
export type {
  Closeable,
  InstanceProvider,
  Lifetime,
  ServiceFactory,
  ServiceRegistration,
} from './service-container';

export { TenantResolver, TenantServices } from './tenant-resolver';
export type { EmptyTenantKeyPolicy, TenantResolverOptions } from './tenant-resolver';

export { registerTenantCandidates } from './register-tenant-candidates';
export type { TenantCandidate } from './register-tenant-candidates';

export { DiErrors, TenantImplementationNotFoundError } from './di.errors';
