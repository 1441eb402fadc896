/**
 * Type definitions for the CDS usage-scenario taxonomy.
 *
 * Defines Zod schemas and inferred TypeScript types for:
 * - PriorityTier: high / medium / low
 * - MatchFeature: a weighted keyword or phrase signal
 * - UsageScenarioCategory: one taxonomy entry
 * - TierPolicy: fixed per-tier category counts
 * - TaxonomyDefinition: the static definition file (data/taxonomy.json)
 *
 * Categories are tagged records, not a class hierarchy. The tier decides
 * ordering; the features decide matching.
 */

import { z } from 'zod';

// ============================================================================
// Priority Tier
// ============================================================================

export const PRIORITY_TIERS = ['high', 'medium', 'low'] as const;

export const PriorityTierSchema = z.enum(PRIORITY_TIERS);

export type PriorityTier = z.infer<typeof PriorityTierSchema>;

/** Sort rank per tier (lower = visited first). */
export const TIER_RANK: Record<PriorityTier, number> = {
  high: 0,
  medium: 1,
  low: 2,
};

// ============================================================================
// Match Feature
// ============================================================================

/**
 * A weighted signal. `phrase` is matched as a case-insensitive substring.
 */
export const MatchFeatureSchema = z.object({
  phrase: z.string().trim().min(1),
  weight: z.number().positive(),
});

export type MatchFeature = z.infer<typeof MatchFeatureSchema>;

// ============================================================================
// Usage Scenario Category
// ============================================================================

/**
 * Schema for one category as stored in the definition file.
 *
 * An empty `match_features` array is accepted by the schema and rejected
 * by the registry with InvalidCategoryError, so the error names the
 * offending category instead of a JSON path.
 */
export const UsageScenarioCategorySchema = z.object({
  /** Stable key, e.g. '1.1.1' */
  id: z.string().min(1),
  /** Machine name, e.g. 'differential_diagnosis' */
  slug: z.string().min(1),
  display_name: z.string().min(1),
  priority_tier: PriorityTierSchema,
  /** Decision-support group, e.g. 'diagnostic_reasoning' */
  group: z.string().min(1),
  match_features: z.array(MatchFeatureSchema),
});

export type UsageScenarioCategory = Readonly<
  Omit<z.infer<typeof UsageScenarioCategorySchema>, 'match_features'> & {
    match_features: readonly Readonly<MatchFeature>[];
  }
>;

// ============================================================================
// Tier Policy & Definition
// ============================================================================

/**
 * Number of categories each tier must hold. Changed only through
 * editTaxonomy(), never at evaluation time.
 */
export const TierPolicySchema = z.object({
  high: z.number().int().min(0),
  medium: z.number().int().min(0),
  low: z.number().int().min(0),
});

export type TierPolicy = z.infer<typeof TierPolicySchema>;

export const TaxonomyDefinitionSchema = z.object({
  version: z.number().int().min(1).default(1),
  tier_policy: TierPolicySchema,
  categories: z.array(UsageScenarioCategorySchema),
});

export type TaxonomyDefinition = z.infer<typeof TaxonomyDefinitionSchema>;

/** Total number of categories in the shipped taxonomy. */
export const TAXONOMY_SIZE = 23;
