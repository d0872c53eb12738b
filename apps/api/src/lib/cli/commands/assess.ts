import type { Command } from '../runtime.js';
import { formatScore, loadMatcher, log } from '../runtime.js';
import { parseFlags, requireFlag } from '../utils.js';
import { assessCurrentCode, predictCode } from '../../../modules/sic-codes/services/assess.js';

export const assess: Command = async (args) => {
  const flags = parseFlags(args);
  const text = requireFlag(flags, 'text');
  const code = requireFlag(flags, 'code');

  const matcher = await loadMatcher();
  const current = assessCurrentCode(matcher, text, code);
  const predicted = predictCode(matcher, text);

  log(`Current:   ${current.currentCode} - ${current.currentDescription}`);
  log(`  score ${formatScore(current.score)} (${current.reason}), accurate: ${current.accurate}`);
  log(`Predicted: ${predicted.code ?? '-'} - ${predicted.description || '-'}`);
  log(`  score ${formatScore(predicted.score)}, accurate: ${predicted.accurate}`);
};
