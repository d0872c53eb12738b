import { HealthSchema } from '@sicmatch/types';
import type { z } from 'zod/v4';
import type { SicCatalog } from '../sic-codes/services/catalog.js';

type Health = z.infer<typeof HealthSchema>;

export { HealthSchema };

export function checkHealth(
  catalog: SicCatalog,
  nodeEnv = process.env.NODE_ENV ?? 'development'
): Health {
  const startedAt = Date.now();
  const now = new Date();

  const catalogOk = catalog.size > 0;

  return {
    ok: catalogOk,
    service: 'sicmatch-api',
    time: {
      server: now.toISOString(),
      uptimeSec: Math.round(process.uptime()),
      tz: Intl.DateTimeFormat().resolvedOptions().timeZone,
    },
    catalog: {
      ok: catalogOk,
      entries: catalog.size,
      source: catalog.source,
      loadedAt: catalog.loadedAt.toISOString(),
    },
    version: {
      commit: process.env.GIT_COMMIT ?? process.env.COMMIT_SHA ?? null,
      env: nodeEnv,
    },
    durationMs: Date.now() - startedAt,
  };
}
