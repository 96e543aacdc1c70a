/**
 * backend/src/modules/transactions/transaction.errors.ts
 *
 * WHY:
 * - Transactions module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - A transaction of another tenant's ledger is reported as NOT_FOUND, same as a missing one.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const TransactionErrors = {
  transactionNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Transaction not found', meta);
  },

  invalidYear(meta?: AppErrorMeta) {
    return AppError.validationError('Year must be a positive integer', meta);
  },
} as const;
