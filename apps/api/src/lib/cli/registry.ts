import type { Command } from './runtime.js';
import { assess } from './commands/assess.js';
import { catalogCheck } from './commands/catalog.js';
import { demo } from './commands/demo.js';
import { match } from './commands/match.js';

export const commands: Record<string, Command> = {
  demo,
  match,
  assess,
  'catalog:check': catalogCheck,
};
