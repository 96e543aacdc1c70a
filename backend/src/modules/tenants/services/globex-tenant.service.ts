import { LedgerTenantService } from './ledger-tenant.service';

export class GlobexTenantService extends LedgerTenantService {
  protected readonly profile = {
    tenant: 'globex',
    ledger: 'globex',
    currency: 'GBP',
    locale: 'en-GB',
  };
}
