/**
 * Types for the scenario inventory ("table" fidelity).
 *
 * An inventory is a flat table with one row per generated-or-candidate
 * scenario. The fifteen metadata fields are opaque to the engine; it only
 * guarantees that each one is populated.
 */

/** The fifteen descriptive metadata fields, in column order. */
export const INVENTORY_METADATA_FIELDS = [
  'scenario_id',
  'category_id',
  'category_name',
  'clinical_domain',
  'persona',
  'title',
  'condition',
  'decision_point',
  'priority',
  'complexity',
  'fidelity',
  'guideline_name',
  'guideline_section',
  'created_date',
  'version',
] as const;

export type InventoryMetadataField = (typeof INVENTORY_METADATA_FIELDS)[number];

export type InventoryMetadata = Record<InventoryMetadataField, string>;

/**
 * One inventory row. `match_score` is copied from the RobustnessScore at
 * build time; rows go stale when the source report is recomputed.
 */
export interface InventoryEntry extends InventoryMetadata {
  match_score: number;
  /** Placeholder for a zero-score category the generator can still synthesize */
  synthetic: boolean;
}

export type InventoryStatus = 'SUCCESS' | 'PARTIAL_SUCCESS';

export interface InventoryResult {
  document_name: string;
  entries: InventoryEntry[];
  /** Share of entries with zero missing fields, 0-1 */
  completion_rate: number;
  status: InventoryStatus;
  /** Entry count per category id */
  entries_by_category: Record<string, number>;
  synthetic_count: number;
}

/**
 * Which zero-score categories receive synthetic placeholder rows.
 */
export type SyntheticPolicy =
  | { mode: 'all' }
  | { mode: 'none' }
  | { mode: 'tiers'; tiers: Array<'high' | 'medium' | 'low'> };
