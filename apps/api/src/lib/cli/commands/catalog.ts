import type { Command } from '../runtime.js';
import { loadMatcher, log } from '../runtime.js';
import { flagStr, parseFlags } from '../utils.js';

export const catalogCheck: Command = async (args) => {
  const flags = parseFlags(args);
  const { catalog } = await loadMatcher(flagStr(flags, 'path'));
  log(`${catalog.source}: ${catalog.size} codes`);
};
