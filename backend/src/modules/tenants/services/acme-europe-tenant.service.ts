import { LedgerTenantService } from './ledger-tenant.service';

export class AcmeEuropeTenantService extends LedgerTenantService {
  protected readonly profile = {
    tenant: 'acme-europe',
    ledger: 'acme-europe',
    currency: 'EUR',
    locale: 'de-DE',
  };
}
