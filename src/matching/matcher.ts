/**
 * Matcher: scores one document against one category.
 *
 * Score = (sum of weights of features whose phrase occurs in the text)
 *         / (sum of all feature weights), clamped to [0, 1].
 *
 * Phrase presence is a case-insensitive substring test, so each feature
 * counts at most once regardless of how often it occurs. No randomness
 * and no I/O: identical inputs always give identical scores.
 */

import type { GuidelineDocument, RobustnessScore } from '../types/coverage.js';
import type { UsageScenarioCategory } from '../types/taxonomy.js';

/** Decimal places kept in scores, for stable report diffs. */
const SCORE_PRECISION = 4;

export function roundScore(value: number): number {
  const factor = 10 ** SCORE_PRECISION;
  return Math.round(value * factor) / factor;
}

function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * Score already-lowercased text. Shared by Matcher.score and callers
 * that score the same text against many categories.
 */
export function scoreText(
  lowerText: string,
  category: UsageScenarioCategory,
): RobustnessScore {
  const features = category.match_features;
  const maxWeight = features.reduce((sum, f) => sum + f.weight, 0);

  if (lowerText.trim().length === 0) {
    return Object.freeze({
      category_id: category.id,
      score: 0,
      matched_features: Object.freeze([]),
      rationale: 'empty document',
    });
  }

  const matched: string[] = [];
  let hitWeight = 0;
  for (const feature of features) {
    if (lowerText.includes(feature.phrase.toLowerCase())) {
      matched.push(feature.phrase);
      hitWeight += feature.weight;
    }
  }

  const score = maxWeight > 0 ? roundScore(clamp01(hitWeight / maxWeight)) : 0;

  return Object.freeze({
    category_id: category.id,
    score,
    matched_features: Object.freeze(matched),
    rationale: `${matched.length}/${features.length} features matched (${hitWeight}/${maxWeight} weight)`,
  });
}

export class Matcher {
  score(document: GuidelineDocument, category: UsageScenarioCategory): RobustnessScore {
    return scoreText(document.source_text.toLowerCase(), category);
  }
}
