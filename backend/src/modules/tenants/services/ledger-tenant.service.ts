/**
 * backend/src/modules/tenants/services/ledger-tenant.service.ts
 *
 * WHY:
 * - Every current tenant reads its own ledger and presents amounts in its own
 *   currency/locale. Only the profile differs, so subclasses declare just that.
 * - A tenant with different rules overrides the methods (or implements
 *   TenantService from scratch); the resolver does not care which.
 */

import type { Transaction, TransactionService } from '../../transactions';
import type { TenantService } from '../tenant-service.capability';
import type { TenantProfile, TenantTransaction } from '../tenant.types';

export abstract class LedgerTenantService implements TenantService {
  protected abstract readonly profile: TenantProfile;

  constructor(private readonly transactions: TransactionService) {}

  getProfile(): TenantProfile {
    return { ...this.profile };
  }

  async listTransactions(year: number): Promise<TenantTransaction[]> {
    const rows = await this.transactions.getTransactionsByYear(this.profile.ledger, year);
    return rows.map((row) => this.present(row));
  }

  async getTransaction(transactionId: number): Promise<TenantTransaction | undefined> {
    const row = await this.transactions.getTransactionById(this.profile.ledger, transactionId);
    return row ? this.present(row) : undefined;
  }

  protected present(row: Transaction): TenantTransaction {
    const format = new Intl.NumberFormat(this.profile.locale, {
      style: 'currency',
      currency: this.profile.currency,
    });
    return { ...row, formattedAmount: format.format(row.amount) };
  }
}
