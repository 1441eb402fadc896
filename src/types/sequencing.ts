/**
 * Types for the gap-filling sequencer ("sequential" fidelity).
 *
 * Per-category state machine:
 *
 *   pending -> evaluating -> sufficient ------> filled
 *                        \-> needs_generation -> filled | skipped
 *
 * `done` is the sequencer-level terminal state reached once every
 * category is filled or skipped.
 */

import type { CoverageReport } from './coverage.js';

export type CategoryState =
  | 'pending'
  | 'evaluating'
  | 'sufficient'
  | 'needs_generation'
  | 'filled'
  | 'skipped';

export type TerminalCategoryState = Extract<CategoryState, 'filled' | 'skipped'>;

export type SkipReason =
  | 'BELOW_THRESHOLD'
  | 'GENERATION_FAILED'
  | 'GENERATION_TIMEOUT'
  | 'BUDGET_EXHAUSTED'
  | 'CANCELLED';

export interface StateTransition {
  category_id: string;
  from: CategoryState;
  to: CategoryState;
  /** Sequence number within the run, starting at 1 */
  step: number;
  reason?: SkipReason;
}

export interface CategoryOutcome {
  category_id: string;
  state: TerminalCategoryState;
  initial_score: number;
  final_score: number;
  generation_attempted: boolean;
  scenarios_generated: number;
  skip_reason?: SkipReason;
  /** Failure message from the collaborator, when it rejected */
  failure?: string;
}

export interface ResidualGap {
  category_id: string;
  score: number;
  reason: SkipReason;
  failure?: string;
}

export interface SequentialResult {
  report: CoverageReport;
  residual_gaps: ResidualGap[];
  generation_calls: number;
  generated_scenarios: number;
  outcomes: CategoryOutcome[];
  transitions: StateTransition[];
  budget_exhausted: boolean;
  cancelled: boolean;
}
