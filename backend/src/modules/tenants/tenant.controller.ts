/**
 * backend/src/modules/tenants/tenant.controller.ts
 *
 * WHY:
 * - Maps HTTP -> tenant service call.
 * - The only place that turns (request tenant key, request scope) into a TenantService.
 *
 * RULES:
 * - No business rules here; the resolved TenantService owns them.
 * - Validate with Zod and throw AppError.
 * - Never name a concrete tenant class: resolve by capability.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { TenantServices } from '../../shared/di';
import { AppError } from '../../shared/http/errors';
import { withRequestContext } from '../../shared/logger/with-context';
import { TransactionErrors } from '../transactions';
import { assertTenantKeyPresent } from './policies/tenant-key.policy';
import { TenantServiceCapability, type TenantService } from './tenant-service.capability';
import { listTransactionsQuerySchema, transactionParamsSchema } from './tenant.schemas';

export class TenantController {
  constructor(private readonly tenantServices: TenantServices) {}

  private async resolveTenantService(req: FastifyRequest): Promise<TenantService> {
    const { tenantKey } = req.requestContext;
    assertTenantKeyPresent(tenantKey);

    const service = await this.tenantServices.resolve(
      TenantServiceCapability,
      tenantKey,
      req.scope,
    );

    withRequestContext(req).debug('tenants.service_resolved', {
      flow: 'tenants.resolve',
      capability: TenantServiceCapability.name,
      implementation: service.getProfile().tenant,
    });

    return service;
  }

  async getProfile(req: FastifyRequest, reply: FastifyReply) {
    const service = await this.resolveTenantService(req);
    return reply.status(200).send(service.getProfile());
  }

  async listTransactions(req: FastifyRequest, reply: FastifyReply) {
    const parsed = listTransactionsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query', { issues: parsed.error.issues });
    }

    const service = await this.resolveTenantService(req);
    const transactions = await service.listTransactions(parsed.data.year);

    return reply.status(200).send({ year: parsed.data.year, transactions });
  }

  async getTransaction(req: FastifyRequest, reply: FastifyReply) {
    const parsed = transactionParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.validationError('Invalid transaction id', { issues: parsed.error.issues });
    }

    const service = await this.resolveTenantService(req);
    const transaction = await service.getTransaction(parsed.data.transactionId);
    if (!transaction) {
      throw TransactionErrors.transactionNotFound({
        transactionId: parsed.data.transactionId,
      });
    }

    return reply.status(200).send(transaction);
  }
}
