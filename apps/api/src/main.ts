import 'dotenv/config';
import { validateApiRuntimeEnv } from './lib/env.js';
import { loadSicCatalog } from './modules/sic-codes/services/catalog.js';
import { buildServer } from './server.js';

async function start() {
  const env = validateApiRuntimeEnv();

  // Fails fast on a missing or malformed catalog; nothing is served from a partial one.
  const catalog = await loadSicCatalog(env.catalogPath);

  const app = await buildServer({ catalog, env });
  app.log.info({ entries: catalog.size, source: catalog.source }, 'sic_catalog_loaded');

  if (env.nodeEnv === 'production' && !env.webOrigin) {
    app.log.warn('WEB_ORIGIN not set; cross-origin requests are refused.');
  }

  await app.listen({ port: env.port, host: env.host });
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
