/**
 * backend/src/modules/tenants/tenant.routes.ts
 *
 * WHY:
 * - Declares tenant endpoints. The tenant comes from the request context
 *   (header or subdomain), never from the path.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { TenantController } from './tenant.controller';

export function registerTenantRoutes(app: FastifyInstance, controller: TenantController) {
  app.get('/tenant/profile', controller.getProfile.bind(controller));
  app.get('/tenant/transactions', controller.listTransactions.bind(controller));
  app.get('/tenant/transactions/:transactionId', controller.getTransaction.bind(controller));
}
