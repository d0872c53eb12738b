import type { ActivityCategory } from '@sicmatch/types';

// Corporate and legal boilerplate, removed as whole words.
export const STOP_WORDS = [
  'plc',
  'ltd',
  'limited',
  'group',
  'holdings',
  'company',
  'corporation',
  'corp',
  'inc',
  'the',
  'and',
  'through',
  'its',
  'subsidiaries',
  'engaged',
  'in',
  'business',
  'of',
  'activities',
  'services',
  'operations',
] as const;

/**
 * Domain phrases, evaluated in table order. Terms match anywhere in the cleaned
 * text (no word boundaries), so "stores" yields "store" and "banking" yields "bank".
 * Within a category the first listed term that matches at a position wins.
 */
export const ACTIVITY_PATTERNS: ReadonlyArray<{
  category: ActivityCategory;
  terms: readonly string[];
}> = [
  {
    category: 'food-service',
    terms: ['food service', 'food catering', 'catering', 'restaurant', 'dining'],
  },
  { category: 'retail', terms: ['retail', 'supermarket', 'grocery', 'store', 'shop'] },
  { category: 'banking', terms: ['bank', 'banking', 'financial', 'lending', 'deposit'] },
  { category: 'technology', terms: ['software', 'technology', 'computing'] },
  { category: 'manufacturing', terms: ['manufacturing', 'production', 'factory'] },
];

const FALLBACK_TOKENS = 3;
const FALLBACK_MIN_LENGTH = 4;

// Word boundaries over Unicode letters and digits; `\b` only knows ASCII.
const STOP_WORD_RE = new RegExp(
  `(?<![\\p{L}\\p{N}_])(?:${STOP_WORDS.join('|')})(?![\\p{L}\\p{N}_])`,
  'gu'
);

const COMPILED = ACTIVITY_PATTERNS.map(({ category, terms }) => ({
  category,
  re: new RegExp(`(?:${terms.map(escapeRegExp).join('|')})`, 'g'),
}));

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Lower-case the text and blank out every stop word. Non-strings become "". */
export function stripBoilerplate(description: unknown): string {
  if (typeof description !== 'string') return '';
  return description.toLowerCase().replace(STOP_WORD_RE, ' ');
}

function findActivities(cleaned: string) {
  const found: Array<{ category: ActivityCategory; phrase: string }> = [];
  for (const { category, re } of COMPILED) {
    for (const m of cleaned.matchAll(re)) found.push({ category, phrase: m[0] });
  }
  return found;
}

/**
 * Reduce a free-text company description to an approximate business-activity phrase.
 *
 * Every domain phrase found is kept (duplicates included) in pattern-table order.
 * Without any, the first three tokens longer than three characters are used.
 * An empty result means the description is unclassifiable.
 */
export function extractBusinessActivity(description: unknown): string {
  const cleaned = stripBoilerplate(description);
  const activities = findActivities(cleaned);

  if (activities.length) return activities.map((a) => a.phrase).join(' ');

  return cleaned
    .split(/\s+/)
    .filter((w) => [...w].length >= FALLBACK_MIN_LENGTH)
    .slice(0, FALLBACK_TOKENS)
    .join(' ');
}

/** Distinct activity categories present in the description, in table order. */
export function extractActivityCategories(description: unknown): ActivityCategory[] {
  const seen = new Set(findActivities(stripBoilerplate(description)).map((a) => a.category));
  return ACTIVITY_PATTERNS.map((p) => p.category).filter((c) => seen.has(c));
}
