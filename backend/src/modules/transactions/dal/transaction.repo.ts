/**
 * backend/src/modules/transactions/dal/transaction.repo.ts
 *
 * WHY:
 * - TransactionService depends on this contract, not on a storage engine.
 * - Abstract class (not interface) so it can be the container key:
 *   di registers `TransactionRepo` and hands back whichever implementation it chose.
 *
 * RULES:
 * - DAL only. No AppError, no policies.
 * - Reads return undefined / [] for "nothing", never throw for a miss.
 */

import type { LedgerKey, Transaction } from '../transaction.types';

export abstract class TransactionRepo {
  abstract findByYear(ledger: LedgerKey, year: number): Promise<Transaction[]>;
  abstract findById(ledger: LedgerKey, transactionId: number): Promise<Transaction | undefined>;
}
