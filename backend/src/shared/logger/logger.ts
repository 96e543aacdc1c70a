/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Adds stable metadata (service, env) to every line.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Prefer `withRequestContext(req)` inside request handlers.
 * - Pass errors as `{ err }` or their message/stack, never as the only argument.
 *
 * RULES:
 * - The DI core (shared/di) does not log. Logging happens at the edges.
 */

import winston from 'winston';

export type Logger = winston.Logger;

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'tenantry-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const logger: Logger = winston.createLogger({
  level,
  silent: nodeEnv === 'test' && process.env.LOG_IN_TESTS !== 'true',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});
