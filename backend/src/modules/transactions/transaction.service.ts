/**
 * backend/src/modules/transactions/transaction.service.ts
 *
 * WHY:
 * - Read side of a tenant's ledger, shared by every tenant service implementation.
 * - Registered as scoped: one instance per request, so the per-request year cache
 *   below never outlives (or leaks across) a request.
 *
 * RULES:
 * - No HTTP here. No AppError for misses: "no rows" is [] and "no row" is undefined.
 * - Year must be a positive integer; anything else is the caller's bug.
 * - Cached rows are copied out; a failed read is not cached.
 */

import type { LedgerKey, Transaction } from './transaction.types';
import type { TransactionRepo } from './dal/transaction.repo';
import { TransactionErrors } from './transaction.errors';

export class TransactionService {
  private readonly byYear = new Map<string, Promise<Transaction[]>>();

  constructor(private readonly repo: TransactionRepo) {}

  async getTransactionsByYear(ledger: LedgerKey, year: number): Promise<Transaction[]> {
    if (!Number.isInteger(year) || year < 1) {
      throw TransactionErrors.invalidYear({ year });
    }

    const key = `${ledger}:${year}`;
    let pending = this.byYear.get(key);
    if (!pending) {
      pending = this.repo.findByYear(ledger, year);
      this.byYear.set(key, pending);
      void pending.catch(() => this.byYear.delete(key));
    }

    const rows = await pending;
    return rows.map((row) => ({ ...row }));
  }

  async getTransactionById(
    ledger: LedgerKey,
    transactionId: number,
  ): Promise<Transaction | undefined> {
    return this.repo.findById(ledger, transactionId);
  }
}
