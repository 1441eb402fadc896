/**
 * Contract for the external scenario-generation collaborator.
 *
 * The engine treats generation as a black box: it hands over a document,
 * a category and constraints, and receives candidate scenarios back or a
 * rejection. Template logic lives entirely on the collaborator's side.
 */

import type { GuidelineDocument } from './coverage.js';
import type { UsageScenarioCategory } from './taxonomy.js';

export type GenerationOutputFormat = 'scenario' | 'fhir';

export interface GenerationConstraints {
  output_format: GenerationOutputFormat;
  /** Score the category must reach to count as covered */
  target_threshold: number;
  /** Upper bound on candidates per call */
  max_candidates?: number;
}

export interface CandidateScenario {
  id: string;
  category_id: string;
  title: string;
  /** Scenario body; appended to the working text before re-scoring */
  text: string;
}

export interface ScenarioGenerator {
  /**
   * Produce candidate scenarios for one category.
   * Rejects with GenerationError when nothing can be produced.
   */
  generate(
    document: GuidelineDocument,
    category: UsageScenarioCategory,
    constraints: GenerationConstraints,
  ): Promise<CandidateScenario[]>;
}
