import type { Command } from '../runtime.js';
import { formatScore, loadMatcher, log } from '../runtime.js';
import { flagNum, parseFlags, requireFlag } from '../utils.js';

export const match: Command = async (args) => {
  const flags = parseFlags(args);
  const text = requireFlag(flags, 'text');
  const limit = flagNum(flags, 'limit') ?? 3;
  const minScore = flagNum(flags, 'min-score');

  const matcher = await loadMatcher();
  const result = matcher.classify(text, { limit, minScore });

  log(`Extracted: ${result.extracted || '(unclassifiable)'}`);
  if (result.categories.length) log(`Categories: ${result.categories.join(', ')}`);
  if (!result.matches.length) {
    log('No matches');
    return;
  }
  for (const m of result.matches) {
    log(`  ${formatScore(m.score)} - ${m.code} - ${m.description}`);
  }
};
