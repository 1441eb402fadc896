/**
 * Gap list: the ranked view of categories still below the coverage target.
 *
 * Ordering is tier (high, medium, low), then gap size descending, then
 * category id ascending. Only categories with a positive gap appear.
 */

import type { CoverageReport, GapEntry } from '../types/coverage.js';
import { TIER_RANK, type UsageScenarioCategory } from '../types/taxonomy.js';
import { roundScore } from '../matching/matcher.js';
import type { TaxonomyRegistry } from '../taxonomy/registry.js';

interface RankedCategory {
  category: UsageScenarioCategory;
  score: number;
  gap: number;
}

function compareRanked(a: RankedCategory, b: RankedCategory): number {
  const tierDelta = TIER_RANK[a.category.priority_tier] - TIER_RANK[b.category.priority_tier];
  if (tierDelta !== 0) return tierDelta;
  if (a.gap !== b.gap) return b.gap - a.gap;
  if (a.category.id < b.category.id) return -1;
  if (a.category.id > b.category.id) return 1;
  return 0;
}

function rankAll(
  report: CoverageReport,
  registry: TaxonomyRegistry,
  threshold: number,
): RankedCategory[] {
  return registry
    .categories()
    .map((category) => {
      const score = report.scores[category.id]?.score ?? 0;
      return { category, score, gap: roundScore(Math.max(0, threshold - score)) };
    })
    .sort(compareRanked);
}

/**
 * Every registry category in sequencing priority order, including those
 * already at or above the threshold.
 */
export function priorityOrder(
  report: CoverageReport,
  registry: TaxonomyRegistry,
  threshold: number,
): UsageScenarioCategory[] {
  return rankAll(report, registry, threshold).map((r) => r.category);
}

export function buildGapList(
  report: CoverageReport,
  registry: TaxonomyRegistry,
  threshold: number,
): GapEntry[] {
  return rankAll(report, registry, threshold)
    .filter((r) => r.score < threshold)
    .map((r, index) =>
      Object.freeze({
        category_id: r.category.id,
        priority_tier: r.category.priority_tier,
        current_score: r.score,
        gap_size: r.gap,
        priority_rank: index + 1,
      }),
    );
}
