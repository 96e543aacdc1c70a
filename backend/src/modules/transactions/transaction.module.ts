/**
 * backend/src/modules/transactions/transaction.module.ts
 *
 * WHY:
 * - Encapsulates Transactions module wiring.
 * - Support module (no routes of its own). Tenant services consume TransactionService.
 *
 * RULES:
 * - Registers into the ServiceCollection; never builds the container itself.
 * - The repo is a singleton (shared store), the service is scoped (per request).
 */

import type { ServiceCollection } from '../../shared/di';
import { TransactionRepo } from './dal/transaction.repo';
import { InMemTransactionRepo } from './dal/inmem-transaction.repo';
import { TransactionService } from './transaction.service';
import type { Transaction } from './transaction.types';

export type TransactionModuleDeps = {
  services: ServiceCollection;
  seed: readonly Transaction[];
};

export function registerTransactionModule(deps: TransactionModuleDeps): void {
  deps.services
    .addSingleton(TransactionRepo, () => new InMemTransactionRepo(deps.seed))
    .addScoped(
      TransactionService,
      async (provider) => new TransactionService(await provider.get(TransactionRepo)),
    );
}
