import { describe, expect, it } from 'vitest';
import { createSicCatalog } from './catalog.js';
import { createSicMatcher, matchCatalog, scoreSimilarity } from './match.js';

const catalog = createSicCatalog([
  { code: '7372', description: 'Prepackaged Software' },
  { code: '5411', description: 'Grocery Stores' },
  { code: '6021', description: 'National Commercial Banks' },
  { code: '5812', description: 'Eating Places' },
]);

describe('scoreSimilarity', () => {
  it('scores identical text 100 regardless of case', () => {
    expect(scoreSimilarity('grocery stores', 'Grocery Stores')).toBe(100);
  });

  it('scores an empty query 0', () => {
    expect(scoreSimilarity('', 'Grocery Stores')).toBe(0);
  });
});

describe('matchCatalog', () => {
  it('ranks the grocery code first for a retail grocery phrase', () => {
    const out = matchCatalog('retail supermarket grocery stores', catalog);
    expect(out[0]?.code).toBe('5411');
    expect(out[0]?.description).toBe('Grocery Stores');
  });

  it('returns at most `limit` results with non-increasing scores', () => {
    for (const limit of [1, 2, 3, 4, 10]) {
      const out = matchCatalog('national banks and software', catalog, { limit });
      expect(out.length).toBe(Math.min(limit, catalog.size));
      const scores = out.map((m) => m.score);
      expect(scores).toEqual([...scores].sort((a, b) => b - a));
    }
  });

  it('defaults to three results', () => {
    expect(matchCatalog('eating', catalog)).toHaveLength(3);
  });

  it('returns [] for an empty catalog', () => {
    expect(matchCatalog('grocery', createSicCatalog([]))).toEqual([]);
    expect(matchCatalog('grocery', { entries: [] })).toEqual([]);
  });

  it('returns [] for a non-positive limit and floors fractional limits', () => {
    expect(matchCatalog('grocery', catalog, { limit: 0 })).toEqual([]);
    expect(matchCatalog('grocery', catalog, { limit: -2 })).toEqual([]);
    expect(matchCatalog('grocery', catalog, { limit: 2.7 })).toHaveLength(2);
  });

  it('returns every entry for an unbounded limit', () => {
    const out = matchCatalog('grocery stores', catalog, { limit: Infinity });
    expect(out).toHaveLength(4);
    expect(out[0]?.code).toBe('5411');
    expect(matchCatalog('grocery', catalog, { limit: -Infinity })).toEqual([]);
    expect(matchCatalog('grocery', catalog, { limit: Number.NaN })).toEqual([]);
  });

  it('scores every entry 0 for an empty or non-string query and keeps catalog order', () => {
    const expected = [
      { code: '7372', description: 'Prepackaged Software', score: 0 },
      { code: '5411', description: 'Grocery Stores', score: 0 },
    ];
    expect(matchCatalog('', catalog, { limit: 2 })).toEqual(expected);
    expect(matchCatalog(undefined, catalog, { limit: 2 })).toEqual(expected);
  });

  it('keeps every code when descriptions repeat, in catalog order', () => {
    const dupes = createSicCatalog([
      { code: 'A1', description: 'Grocery Stores' },
      { code: 'B2', description: 'Grocery Stores' },
      { code: 'C3', description: 'Eating Places' },
    ]);
    const out = matchCatalog('grocery stores', dupes, { limit: 2 });
    expect(out).toEqual([
      { code: 'A1', description: 'Grocery Stores', score: 100 },
      { code: 'B2', description: 'Grocery Stores', score: 100 },
    ]);
  });

  it('applies minScore only when asked', () => {
    expect(matchCatalog('grocery stores', catalog, { minScore: 100 })).toEqual([
      { code: '5411', description: 'Grocery Stores', score: 100 },
    ]);
    expect(matchCatalog('grocery stores', catalog, { limit: 4 })).toHaveLength(4);
  });
});

describe('createSicMatcher', () => {
  const matcher = createSicMatcher(catalog);

  it('exposes the injected catalog', () => {
    expect(matcher.catalog).toBe(catalog);
  });

  it('classifies a description through extraction then matching', () => {
    const out = matcher.classify('Tesco PLC retail supermarket grocery stores', { limit: 2 });
    expect(out.description).toBe('Tesco PLC retail supermarket grocery stores');
    expect(out.extracted).toBe('retail supermarket grocery store');
    expect(out.categories).toEqual(['retail']);
    expect(out.classifiable).toBe(true);
    expect(out.matches).toHaveLength(2);
    expect(out.matches[0]?.code).toBe('5411');
  });

  it('flags boilerplate-only descriptions as unclassifiable', () => {
    const out = matcher.classify('The Holdings Group PLC');
    expect(out.extracted).toBe('');
    expect(out.classifiable).toBe(false);
    expect(out.categories).toEqual([]);
    expect(out.matches.map((m) => m.score)).toEqual([0, 0, 0]);
  });

  it('matches an already-extracted phrase directly', () => {
    expect(matcher.match('grocery stores', { limit: 1 })).toEqual([
      { code: '5411', description: 'Grocery Stores', score: 100 },
    ]);
  });
});
