/**
 * backend/src/modules/transactions/index.ts
 *
 * Public surface of the transactions module. Other modules must not deep-import /dal.
 */

export { TransactionService } from './transaction.service';
export { TransactionErrors } from './transaction.errors';
export { registerTransactionModule } from './transaction.module';
export { loadTransactionSeed } from './transaction.seed';
export type { LedgerKey, Transaction } from './transaction.types';
