/**
 * Coverage data model: documents, per-category scores, coverage reports
 * and derived gap entries.
 *
 * Field names are snake_case because these records are written verbatim
 * into persisted reports and must stay stable for external diffing.
 */

import type { PriorityTier } from './taxonomy.js';

/**
 * A guideline document. Owned by the caller; the engine only reads it.
 */
export interface GuidelineDocument {
  readonly name: string;
  readonly source_text: string;
  /** Clinical domain, e.g. 'cardiology' */
  readonly domain_tag: string;
  /** UTF-8 byte length of source_text */
  readonly byte_size: number;
}

/**
 * Result of scoring one document against one category.
 * Never edited: a new evaluation produces a new score.
 */
export interface RobustnessScore {
  readonly category_id: string;
  /** Normalized weighted hit ratio in [0, 1] */
  readonly score: number;
  /** Phrases that fired, in feature order */
  readonly matched_features: readonly string[];
  readonly rationale: string;
}

/**
 * Scores for every taxonomy category against one document.
 *
 * `scores` keys are exactly the registry's category ids; unmatched
 * categories carry 0.0 rather than being omitted.
 */
export interface CoverageReport {
  readonly document_name: string;
  readonly scores: Readonly<Record<string, RobustnessScore>>;
  /** Mean of all category scores */
  readonly overall_coverage: number;
  /** ISO-8601 */
  readonly timestamp: string;
}

/**
 * A category whose score is below the coverage target.
 * Derived from a CoverageReport; recomputed whenever the report changes.
 */
export interface GapEntry {
  readonly category_id: string;
  readonly priority_tier: PriorityTier;
  readonly current_score: number;
  /** max(0, target_threshold - current_score) */
  readonly gap_size: number;
  /** 1-based: tier first, then gap size descending, then id */
  readonly priority_rank: number;
}
