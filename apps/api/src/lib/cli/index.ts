import 'dotenv/config';
import { commands } from './registry.js';
import { log } from './runtime.js';

async function main() {
  const [cmd = '', ...args] = process.argv.slice(2);
  const fn = commands[cmd];

  if (!fn) {
    log(`Unknown command: ${cmd}\n\nAvailable:\n  ${Object.keys(commands).join('\n  ')}`);
    process.exit(1);
  }

  const started = Date.now();
  log(`→ ${cmd} starting...`);

  try {
    await fn(args);
    log(`✔ ${cmd} finished in ${Date.now() - started}ms`);
    process.exit(0);
  } catch (err) {
    log(`✖ ${cmd} failed:\n`, err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
