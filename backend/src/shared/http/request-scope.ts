/**
 * backend/src/shared/http/request-scope.ts
 *
 * WHY:
 * - Scoped services (and tenant services resolved through them) live exactly as long
 *   as one HTTP request.
 * - Handlers get `req.scope` and never create or dispose scopes themselves.
 *
 * HOW IT WORKS:
 * 1. onRequest opens a scope on the root container.
 * 2. onResponse disposes it after the reply is sent (success or error).
 * 3. onRequestAbort disposes it when the client goes away first.
 *
 * RULES:
 * - Dispose failures are logged, never sent to the client (the reply is already out).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { ServiceContainer, ServiceScope } from '../di';
import { withRequestContext } from '../logger/with-context';

declare module 'fastify' {
  interface FastifyRequest {
    scope: ServiceScope;
  }
}

async function disposeScope(req: FastifyRequest, flow: string): Promise<void> {
  try {
    await req.scope.dispose();
  } catch (err) {
    withRequestContext(req).error('request_scope.dispose_failed', {
      flow,
      message: err instanceof Error ? err.message : String(err),
    });
  }
}

export function registerRequestScope(app: FastifyInstance, container: ServiceContainer) {
  app.decorateRequest('scope', null as unknown as ServiceScope);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.scope = container.createScope();
    done();
  });

  app.addHook('onResponse', async (req: FastifyRequest) => {
    await disposeScope(req, 'http.response');
  });

  app.addHook('onRequestAbort', async (req: FastifyRequest) => {
    await disposeScope(req, 'http.abort');
  });
}
