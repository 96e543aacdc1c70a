/**
 * backend/src/modules/tenants/tenant.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the tenant endpoints.
 *
 * RULES:
 * - Use Zod for runtime validation. Querystring/params arrive as strings: coerce.
 */

import { z } from 'zod';

export const listTransactionsQuerySchema = z.object({
  year: z.coerce.number().int().min(1).max(9999),
});

export const transactionParamsSchema = z.object({
  transactionId: z.coerce.number().int().positive(),
});

export type ListTransactionsQuery = z.infer<typeof listTransactionsQuerySchema>;
export type TransactionParams = z.infer<typeof transactionParamsSchema>;
