/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv and emptyTenantKeyPolicy are unions, so invalid values ('prod', 'wildcard')
 *   fail at startup in Zod instead of silently falling through.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const EmptyTenantKeyPolicySchema = z.enum(['not-found', 'first-candidate']).default('not-found');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('tenantry-backend'),

  // Tenant resolution
  TENANT_HEADER: z
    .string()
    .regex(/^[A-Za-z0-9-]+$/, 'Must be a valid header name')
    .default('x-tenant-key'),
  EMPTY_TENANT_KEY_POLICY: EmptyTenantKeyPolicySchema,
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type EmptyTenantKeyPolicy = z.infer<typeof EmptyTenantKeyPolicySchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  logLevel: string;
  serviceName: string;

  tenants: {
    header: string;
    emptyKeyPolicy: EmptyTenantKeyPolicy;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    tenants: {
      header: parsed.TENANT_HEADER,
      emptyKeyPolicy: parsed.EMPTY_TENANT_KEY_POLICY,
    },
  };
}
