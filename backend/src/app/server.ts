/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * ORDER MATTERS:
 * - request context (tenant key) -> request scope -> request log.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerRequestScope } from '../shared/http/request-scope';
import { registerErrorHandler } from '../shared/http/error-handler';

export function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app, { tenantHeader: opts.config.tenants.header });
  registerRequestScope(app, opts.deps.container);
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
      tenantKey: req.requestContext.tenantKey,
    });
    done();
  });

  return app;
}
