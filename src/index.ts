/**
 * Public API: taxonomy, scoring, sequencing, fidelity orchestration,
 * batch runs and reporting.
 */

// Types
export type {
  PriorityTier,
  MatchFeature,
  UsageScenarioCategory,
  TierPolicy,
  TaxonomyDefinition,
} from './types/taxonomy.js';
export type { GuidelineDocument, RobustnessScore, CoverageReport, GapEntry } from './types/coverage.js';
export type {
  InventoryEntry,
  InventoryMetadata,
  InventoryResult,
  InventoryStatus,
  SyntheticPolicy,
} from './types/inventory.js';
export type {
  CandidateScenario,
  GenerationConstraints,
  GenerationOutputFormat,
  ScenarioGenerator,
} from './types/generation.js';
export type {
  CategoryOutcome,
  CategoryState,
  ResidualGap,
  SequentialResult,
  SkipReason,
  StateTransition,
} from './types/sequencing.js';
export type { DecisionPoint, DraftOutline, Specialty } from './types/draft.js';
export type {
  FallbackRecord,
  FidelityLevel,
  FidelityPayload,
  FidelityRun,
  OrchestratorState,
} from './types/fidelity.js';
export type { CancellationSignal } from './types/cancellation.js';
export type {
  ComprehensiveReport,
  DocumentComparisonReport,
  PerformanceSummary,
} from './types/report.js';
export { FIDELITY_LADDER, FidelityLevelSchema } from './types/fidelity.js';
export { INVENTORY_METADATA_FIELDS } from './types/inventory.js';
export { PRIORITY_TIERS, TAXONOMY_SIZE, TaxonomyDefinitionSchema } from './types/taxonomy.js';

// Modules
export * from './taxonomy/index.js';
export { Matcher, scoreText, roundScore } from './matching/matcher.js';
export * from './coverage/index.js';
export * from './inventory/index.js';
export * from './drafting/index.js';
export * from './generation/index.js';
export * from './sequencing/index.js';
export * from './fidelity/index.js';
export * from './batch/index.js';
export * from './reporting/index.js';
export * from './documents/index.js';
export * from './config/index.js';
export * from './logging/index.js';
