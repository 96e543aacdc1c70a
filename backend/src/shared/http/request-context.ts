/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Tenant-scoped service resolution needs to know which tenant a request targets.
 * - We also want a stable requestId for logs and debugging.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app, { tenantHeader }).
 * - After registration, every request has `req.requestContext`.
 *
 * TENANT KEY PRECEDENCE:
 * 1. Tenant header (e.g. `x-tenant-key: acme`), case preserved, trimmed.
 *    A header that is sent but blank yields '' and still wins: the resolver's
 *    empty key policy decides what it means.
 * 2. Host subdomain (`acme.localhost`, `acme.example.com`), lowercased.
 * 3. null.
 *
 * RULES:
 * - The key is opaque here. Whether it names a real tenant is decided by resolution.
 * - tenantKey can be null; modules treat that as a hard failure at the boundary.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
  tenantKey: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "acme.localhost:3000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

/**
 * Extracts tenant key from the host.
 *
 * Returns null for localhost, an apex domain (example.com) and anything unrecognised.
 */
export function extractTenantKeyFromHost(host: string | null): string | null {
  if (!host) return null;

  if (host === 'localhost') return null;
  if (host.endsWith('.localhost')) {
    const [tenant] = host.split('.');
    return tenant && tenant !== 'localhost' ? tenant : null;
  }

  const parts = host.split('.');
  if (parts.length >= 3) {
    const candidate = parts[0];
    return candidate ? candidate : null;
  }

  return null;
}

export function extractTenantKeyFromHeader(raw: string | string[] | undefined): string | null {
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string') return null;

  return value.trim();
}

export function registerRequestContext(app: FastifyInstance, opts: { tenantHeader: string }) {
  const headerName = opts.tenantHeader.toLowerCase();

  app.decorateRequest('requestContext', null as unknown as RequestContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    const host = parseHost(req.headers.host);
    const tenantKey =
      extractTenantKeyFromHeader(req.headers[headerName]) ?? extractTenantKeyFromHost(host);

    req.requestContext = {
      requestId: randomUUID(),
      host,
      tenantKey,
    };

    done();
  });
}
