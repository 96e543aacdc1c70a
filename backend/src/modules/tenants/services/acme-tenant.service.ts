import { LedgerTenantService } from './ledger-tenant.service';

export class AcmeTenantService extends LedgerTenantService {
  protected readonly profile = {
    tenant: 'acme',
    ledger: 'acme',
    currency: 'USD',
    locale: 'en-US',
  };
}
