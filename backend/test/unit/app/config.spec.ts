import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { buildConfig } from '../../../src/app/config';

describe('buildConfig', () => {
  it('applies defaults', () => {
    expect(buildConfig({})).toEqual({
      nodeEnv: 'development',
      port: 3000,
      logLevel: 'info',
      serviceName: 'tenantry-backend',
      tenants: {
        header: 'x-tenant-key',
        emptyKeyPolicy: 'not-found',
      },
    });
  });

  it('reads tenant resolution settings', () => {
    const config = buildConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      TENANT_HEADER: 'X-Workspace',
      EMPTY_TENANT_KEY_POLICY: 'first-candidate',
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.port).toBe(8080);
    expect(config.tenants).toEqual({ header: 'X-Workspace', emptyKeyPolicy: 'first-candidate' });
  });

  it('rejects unknown empty key policies and bad header names', () => {
    expect(() => buildConfig({ EMPTY_TENANT_KEY_POLICY: 'wildcard' })).toThrowError(ZodError);
    expect(() => buildConfig({ TENANT_HEADER: 'x tenant' })).toThrowError(ZodError);
  });
});
