import * as fuzz from 'fuzzball';
import type { SicAssessment, SicPrediction } from '@sicmatch/types';
import type { SicMatcher } from './match.js';

export const CURRENT_CODE_ACCURATE_AT = 70;
export const PREDICTION_ACCURATE_AT = 90;
// Applied to the best fuzzy match when the assigned code is not in the catalog.
export const MISSING_CODE_PENALTY = 0.6;

const round1 = (n: number) => Math.round(n * 10) / 10;

function bestMatchFor(matcher: SicMatcher, description: string) {
  if (!description.trim()) return null;
  return matcher.classify(description, { limit: 1 }).matches[0] ?? null;
}

/** Best predicted code for a description; `accurate` once the score reaches 90. */
export function predictCode(matcher: SicMatcher, description: string): SicPrediction {
  const best = bestMatchFor(matcher, description);
  if (!best) return { code: null, description: '', score: 0, accurate: false };
  return {
    code: best.code,
    description: best.description,
    score: best.score,
    accurate: best.score >= PREDICTION_ACCURATE_AT,
  };
}

/**
 * Grade an already-assigned SIC code against a company description.
 *
 * A known code scores the best of four plain similarity measures between the
 * description and the code's catalog text. An unknown code falls back to the
 * best catalog match, discounted by {@link MISSING_CODE_PENALTY}.
 */
export function assessCurrentCode(
  matcher: SicMatcher,
  description: string,
  currentCode: string
): SicAssessment {
  const code = currentCode.trim();

  if (!description.trim() || !code) {
    return {
      currentCode: code,
      currentDescription: '',
      score: 0,
      accurate: false,
      reason: 'missing-input',
      breakdown: null,
      bestMatch: null,
    };
  }

  const bestMatch = bestMatchFor(matcher, description);
  const known = matcher.catalog.get(code);

  if (known) {
    const a = description.toLowerCase().trim();
    const b = known.description.toLowerCase().trim();
    const breakdown = {
      ratio: fuzz.ratio(a, b),
      partialRatio: fuzz.partial_ratio(a, b),
      tokenSortRatio: fuzz.token_sort_ratio(a, b),
      tokenSetRatio: fuzz.token_set_ratio(a, b),
    };
    const score = Math.max(
      breakdown.ratio,
      breakdown.partialRatio,
      breakdown.tokenSortRatio,
      breakdown.tokenSetRatio
    );
    return {
      currentCode: code,
      currentDescription: known.description,
      score,
      accurate: score >= CURRENT_CODE_ACCURATE_AT,
      reason: 'code-found',
      breakdown,
      bestMatch,
    };
  }

  const score = bestMatch ? round1(bestMatch.score * MISSING_CODE_PENALTY) : 0;
  return {
    currentCode: code,
    currentDescription: bestMatch ? `[Not found: ${code}]` : `[Unknown: ${code}]`,
    score,
    accurate: score >= CURRENT_CODE_ACCURATE_AT,
    reason: 'code-not-found',
    breakdown: null,
    bestMatch,
  };
}
