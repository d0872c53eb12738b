import { z } from 'zod/v4';

export const HealthSchema = z.object({
  ok: z.boolean(),
  service: z.string().default('sicmatch-api'),
  time: z.object({
    server: z.string(),
    uptimeSec: z.number(),
    tz: z.string(),
  }),
  catalog: z.object({
    ok: z.boolean(),
    entries: z.number().int(),
    source: z.string().nullable(),
    loadedAt: z.string().nullable(),
  }),
  version: z.object({
    commit: z.string().nullable(),
    env: z.string(),
  }),
  durationMs: z.number(),
});
