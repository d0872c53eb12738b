import type { Command } from '../runtime.js';
import { formatScore, loadMatcher, log } from '../runtime.js';
import { flagNum, parseFlags } from '../utils.js';

export const SAMPLE_DESCRIPTIONS = [
  'Compass Group PLC food catering and support services',
  'Tesco PLC retail supermarket grocery stores',
  'HSBC Holdings PLC banking financial services',
  'Simple catering',
  'Restaurant business',
  'Food retail store',
] as const;

export const demo: Command = async (args) => {
  const flags = parseFlags(args);
  const limit = flagNum(flags, 'limit') ?? 3;
  const matcher = await loadMatcher();

  log(`Catalog: ${matcher.catalog.size} codes`);

  for (const description of SAMPLE_DESCRIPTIONS) {
    const result = matcher.classify(description, { limit });
    log('');
    log(`Original: ${description}`);
    log(`Extracted: ${result.extracted || '(unclassifiable)'}`);
    log('Top matches:');
    for (const m of result.matches) {
      log(`  ${formatScore(m.score)} - ${m.code} - ${m.description}`);
    }
  }
};
