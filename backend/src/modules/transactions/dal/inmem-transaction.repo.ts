/**
 * backend/src/modules/transactions/dal/inmem-transaction.repo.ts
 *
 * WHY:
 * - Persistence is not part of this service; transactions come from a seed file.
 * - Same role as InMem* adapters elsewhere: swap in di.ts for a real store.
 *
 * RULES:
 * - Returns copies so callers cannot mutate the store.
 * - Results are ordered by date, then id.
 */

import type { LedgerKey, Transaction } from '../transaction.types';
import { TransactionRepo } from './transaction.repo';

function byDateThenId(a: Transaction, b: Transaction): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return a.transactionId - b.transactionId;
}

export class InMemTransactionRepo extends TransactionRepo {
  private readonly rows: readonly Transaction[];

  constructor(rows: readonly Transaction[]) {
    super();
    this.rows = [...rows].sort(byDateThenId);
  }

  findByYear(ledger: LedgerKey, year: number): Promise<Transaction[]> {
    const prefix = `${String(year).padStart(4, '0')}-`;
    const matches = this.rows.filter((r) => r.ledger === ledger && r.date.startsWith(prefix));
    return Promise.resolve(matches.map((r) => ({ ...r })));
  }

  findById(ledger: LedgerKey, transactionId: number): Promise<Transaction | undefined> {
    const row = this.rows.find((r) => r.ledger === ledger && r.transactionId === transactionId);
    return Promise.resolve(row ? { ...row } : undefined);
  }
}
