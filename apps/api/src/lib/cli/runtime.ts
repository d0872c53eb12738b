import { resolveCatalogPath } from '../env.js';
import { loadSicCatalog } from '../../modules/sic-codes/services/catalog.js';
import { createSicMatcher, type SicMatcher } from '../../modules/sic-codes/services/match.js';

export type Command = (args: string[]) => Promise<void>;

export function log(...args: unknown[]) {
  console.log(...args);
}

/** Load the catalog named by SIC_CATALOG_PATH (or the bundled one) and wrap it in a matcher. */
export async function loadMatcher(path = resolveCatalogPath()): Promise<SicMatcher> {
  return createSicMatcher(await loadSicCatalog(path));
}

export function formatScore(score: number) {
  return `${score.toFixed(0).padStart(3)}%`;
}
