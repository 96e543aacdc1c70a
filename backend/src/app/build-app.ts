/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 */

import type { AppConfig } from './config';
import { buildDeps, type BuildDepsOptions } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, opts: BuildDepsOptions = {}) {
  const deps = buildDeps(config, opts);
  const app = buildServer({ config, deps });

  registerRoutes(app, { config, deps });
  await app.ready();

  logger.info('di.ready', {
    flow: 'app.build',
    capabilities: deps.candidates.capabilities(),
    emptyTenantKeyPolicy: config.tenants.emptyKeyPolicy,
  });

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
