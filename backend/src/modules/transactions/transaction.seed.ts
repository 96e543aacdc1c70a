/**
 * backend/src/modules/transactions/transaction.seed.ts
 *
 * WHY:
 * - The seed file is data, so it is validated like any other input before use.
 */

import { z } from 'zod';
import rawSeed from './seed/transactions.seed.json';
import type { Transaction } from './transaction.types';

const SeedRowSchema = z.object({
  id: z.number().int().positive(),
  ledger: z.string().min(1),
  amount: z.number(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD'),
});

export const TransactionSeedSchema = z.array(SeedRowSchema);

export function parseTransactionSeed(input: unknown): Transaction[] {
  return TransactionSeedSchema.parse(input).map((row) => ({
    transactionId: row.id,
    ledger: row.ledger,
    amount: row.amount,
    date: row.date,
  }));
}

export function loadTransactionSeed(): Transaction[] {
  return parseTransactionSeed(rawSeed);
}
