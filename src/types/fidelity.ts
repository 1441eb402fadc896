/**
 * Fidelity ladder, per-level payloads and run records.
 *
 * The ladder is ordered from highest to lowest fidelity; a failed level
 * falls back to the next entry. `none` is the floor and always succeeds.
 */

import { z } from 'zod';
import type { CoverageReport, GapEntry } from './coverage.js';
import type { DraftOutline } from './draft.js';
import type { CandidateScenario, GenerationOutputFormat } from './generation.js';
import type { InventoryResult } from './inventory.js';
import type { SequentialResult } from './sequencing.js';

// ============================================================================
// Ladder
// ============================================================================

export const FIDELITY_LADDER = [
  'full-fhir',
  'full',
  'sequential',
  'table',
  'evaluation-only',
  'draft',
  'none',
] as const;

export const FidelityLevelSchema = z.enum(FIDELITY_LADDER);

export type FidelityLevel = z.infer<typeof FidelityLevelSchema>;

// ============================================================================
// Payloads
// ============================================================================

export interface EvaluationPayload {
  kind: 'evaluation-only';
  report: CoverageReport;
  gaps: GapEntry[];
}

export interface TablePayload {
  kind: 'table';
  report: CoverageReport;
  inventory: InventoryResult;
}

export interface SequentialPayload {
  kind: 'sequential';
  result: SequentialResult;
}

export interface FullPayload {
  kind: 'full' | 'full-fhir';
  output_format: GenerationOutputFormat;
  initial_report: CoverageReport;
  report: CoverageReport;
  scenarios: CandidateScenario[];
  /** Categories whose generation call rejected, with messages */
  failed_categories: Array<{ category_id: string; message: string }>;
}

export interface DraftPayload {
  kind: 'draft';
  outline: DraftOutline;
}

export interface NonePayload {
  kind: 'none';
  skipped: true;
}

export type FidelityPayload =
  | EvaluationPayload
  | TablePayload
  | SequentialPayload
  | FullPayload
  | DraftPayload
  | NonePayload;

// ============================================================================
// Orchestrator state & run record
// ============================================================================

export type OrchestratorState =
  | 'idle'
  | 'running'
  | 'succeeded'
  | 'failed_fallback'
  | 'failed'
  | 'cancelled';

export interface FallbackRecord {
  from: FidelityLevel;
  /** null when the ladder was exhausted or fallback is disabled */
  to: FidelityLevel | null;
  reason: string;
}

/**
 * One (document, requested level) execution. Frozen after creation.
 */
export interface FidelityRun {
  readonly document_name: string;
  readonly requested_level: FidelityLevel;
  /** Level whose payload is reported; null when nothing succeeded */
  readonly fidelity_level: FidelityLevel | null;
  /** Seconds */
  readonly execution_time: number;
  readonly success: boolean;
  readonly state: Extract<OrchestratorState, 'succeeded' | 'failed' | 'cancelled'>;
  readonly result_payload: FidelityPayload | null;
  /** Nearest higher level that failed before the reported one */
  readonly fallback_from: FidelityLevel | null;
  readonly fallbacks: readonly FallbackRecord[];
  readonly error_message: string | null;
}
