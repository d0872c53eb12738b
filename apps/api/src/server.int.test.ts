import { afterEach, describe, expect, it } from 'vitest';
import { HealthSchema } from '@sicmatch/types';
import { buildServer } from './server.js';
import { validateApiRuntimeEnv } from './lib/env.js';
import { createSicCatalog, type SicCatalog } from './modules/sic-codes/services/catalog.js';

const populated = createSicCatalog(
  [
    { code: '7372', description: 'Prepackaged Software' },
    { code: '5411', description: 'Grocery Stores' },
    { code: '6021', description: 'National Commercial Banks' },
    { code: '5812', description: 'Eating Places' },
  ],
  { source: 'fixture.csv' }
);

const apps: Array<Awaited<ReturnType<typeof buildServer>>> = [];

async function start(catalog: SicCatalog = populated, env: NodeJS.ProcessEnv = {}) {
  const app = await buildServer({ catalog, logger: false, env: validateApiRuntimeEnv(env) });
  apps.push(app);
  return app;
}

afterEach(async () => {
  await Promise.all(apps.splice(0).map((app) => app.close()));
});

describe('server', () => {
  it('reports health for a loaded catalog', async () => {
    const app = await start();
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['cache-control']).toBe('no-store');
    const health = HealthSchema.parse(res.json());
    expect(health.ok).toBe(true);
    expect(health.catalog.entries).toBe(4);
    expect(health.catalog.source).toBe('fixture.csv');
  });

  it('is unhealthy with an empty catalog', async () => {
    const app = await start(createSicCatalog([]));

    const get = await app.inject({ method: 'GET', url: '/healthz' });
    expect(get.statusCode).toBe(503);
    expect(HealthSchema.parse(get.json()).ok).toBe(false);

    const head = await app.inject({ method: 'HEAD', url: '/healthz' });
    expect(head.statusCode).toBe(503);
    expect(head.body).toBe('');
  });

  it('answers HEAD /healthz', async () => {
    const app = await start();
    const res = await app.inject({ method: 'HEAD', url: '/healthz' });
    expect(res.statusCode).toBe(200);
  });

  it('exposes Prometheus metrics including the catalog size', async () => {
    const app = await start();
    await app.inject({ method: 'GET', url: '/healthz' });

    const res = await app.inject({ method: 'GET', url: '/metrics' });
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toMatch(/text\/plain/);
    expect(res.body).toMatch(/^sicmatch_catalog_entries 4$/m);
    expect(res.body).toContain('sicmatch_http_requests_total{method="GET",route="/healthz",status_code="200"}');
  });

  it('documents the SIC routes in OpenAPI', async () => {
    const app = await start();
    const res = await app.inject({ method: 'GET', url: '/openapi.json' });

    expect(res.statusCode).toBe(200);
    const paths = Object.keys(res.json().paths ?? {});
    expect(paths).toEqual(
      expect.arrayContaining([
        '/v1/sic/match',
        '/v1/sic/match/batch',
        '/v1/sic/assess',
        '/v1/sic/codes',
        '/v1/sic/codes/{code}',
        '/healthz',
        '/health',
      ])
    );
    expect(paths).not.toContain('/metrics');
  });

  it('returns the error envelope for unknown routes', async () => {
    const app = await start();
    const res = await app.inject({ method: 'GET', url: '/v1/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: { code: 'ERR_NOT_FOUND', message: 'Route GET /v1/nope not found' },
    });
  });

  it('sets security headers', async () => {
    const app = await start();
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.headers['x-content-type-options']).toBe('nosniff');
  });

  it('enforces the global rate limit from the environment', async () => {
    const app = await start(populated, { RATE_LIMIT_MAX: '2' });
    const codes: number[] = [];
    let last = await app.inject({ method: 'GET', url: '/v1/sic/codes/5411' });
    codes.push(last.statusCode);
    for (let i = 0; i < 3; i++) {
      last = await app.inject({ method: 'GET', url: '/v1/sic/codes/5411' });
      codes.push(last.statusCode);
    }
    expect(codes).toEqual([200, 200, 429, 429]);
    expect(last.json().error.code).toBe('ERR_RATE_LIMITED');
  });
});
