/**
 * Gap-filling sequencer ("sequential" fidelity).
 *
 * Visits every category in priority order (tier, gap size descending, id)
 * and drives it through its state machine:
 *
 *   pending -> evaluating -> sufficient -> filled
 *                         -> needs_generation -> filled | skipped
 *   pending -> skipped        (cancelled, or below threshold with the budget spent)
 *
 * Each category is re-scored against the working text when it is
 * evaluated, so scenarios generated for an earlier category can lift a
 * later one over the threshold without another call. Generated scenario
 * texts are appended to the working text; the original document is never
 * modified.
 *
 * Collaborator failures, timeouts, budget exhaustion and cancellation all
 * end the category in `skipped` with a reason. None of them is fatal.
 */

import type { CancellationSignal } from '../types/cancellation.js';
import type { CoverageReport, GuidelineDocument } from '../types/coverage.js';
import type { GenerationOutputFormat, ScenarioGenerator } from '../types/generation.js';
import type {
  CategoryOutcome,
  CategoryState,
  ResidualGap,
  SequentialResult,
  SkipReason,
  StateTransition,
} from '../types/sequencing.js';
import type { UsageScenarioCategory } from '../types/taxonomy.js';
import type { CoverageAggregator } from '../coverage/coverage-aggregator.js';
import { priorityOrder } from '../coverage/gap-list.js';
import {
  GenerationTimeoutError,
  generateWithTimeout,
} from '../generation/collaborator.js';
import { silentLogger, type EngineLogger } from '../logging/engine-logger.js';
import type { TaxonomyRegistry } from '../taxonomy/registry.js';

export const DEFAULT_MAX_GENERATION_CALLS = 23;
export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;

export interface GapSequencerOptions {
  /** Score at or above which a category needs no generation */
  threshold: number;
  /** Total collaborator calls allowed per run (default 23) */
  maxGenerationCalls?: number;
  /** Per-call timeout (default 30000) */
  generationTimeoutMs?: number;
  outputFormat?: GenerationOutputFormat;
  signal?: CancellationSignal;
  logger?: EngineLogger;
  /** Called for every state change, in order */
  onTransition?: (transition: StateTransition) => void;
}

export class GapSequencer {
  private readonly maxCalls: number;
  private readonly timeoutMs: number;
  private readonly logger: EngineLogger;

  constructor(
    private readonly registry: TaxonomyRegistry,
    private readonly aggregator: CoverageAggregator,
    private readonly generator: ScenarioGenerator,
    private readonly options: GapSequencerOptions,
  ) {
    this.maxCalls = options.maxGenerationCalls ?? DEFAULT_MAX_GENERATION_CALLS;
    this.timeoutMs = options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async run(document: GuidelineDocument, initialReport?: CoverageReport): Promise<SequentialResult> {
    const threshold = this.options.threshold;
    const signal = this.options.signal;

    let report = initialReport ?? this.aggregator.evaluate(document);
    let working: GuidelineDocument = document;

    const transitions: StateTransition[] = [];
    const outcomes: CategoryOutcome[] = [];
    const residualGaps: ResidualGap[] = [];
    let generationCalls = 0;
    let generatedScenarios = 0;
    let budgetExhausted = false;
    let cancelled = false;

    const move = (categoryId: string, from: CategoryState, to: CategoryState, reason?: SkipReason): void => {
      const transition: StateTransition = {
        category_id: categoryId,
        from,
        to,
        step: transitions.length + 1,
        ...(reason !== undefined ? { reason } : {}),
      };
      transitions.push(transition);
      this.options.onTransition?.(transition);
    };

    const skip = (
      category: UsageScenarioCategory,
      from: CategoryState,
      reason: SkipReason,
      initialScore: number,
      attempted: boolean,
      scenarios: number,
      failure?: string,
    ): void => {
      const score = report.scores[category.id]?.score ?? 0;
      move(category.id, from, 'skipped', reason);
      outcomes.push({
        category_id: category.id,
        state: 'skipped',
        initial_score: initialScore,
        final_score: score,
        generation_attempted: attempted,
        scenarios_generated: scenarios,
        skip_reason: reason,
        ...(failure !== undefined ? { failure } : {}),
      });
      residualGaps.push({
        category_id: category.id,
        score,
        reason,
        ...(failure !== undefined ? { failure } : {}),
      });
      this.logger.debug(`${category.id} skipped`, { reason, score });
    };

    for (const category of priorityOrder(report, this.registry, threshold)) {
      const initialScore = report.scores[category.id]?.score ?? 0;

      if (signal?.isCancelled) {
        cancelled = true;
        skip(category, 'pending', 'CANCELLED', initialScore, false, 0);
        continue;
      }

      if (working !== document) {
        report = this.aggregator.rescore(report, working, category.id);
      }
      const current = report.scores[category.id]?.score ?? 0;

      if (current < threshold && generationCalls >= this.maxCalls) {
        budgetExhausted = true;
        skip(category, 'pending', 'BUDGET_EXHAUSTED', initialScore, false, 0);
        continue;
      }

      move(category.id, 'pending', 'evaluating');

      if (current >= threshold) {
        move(category.id, 'evaluating', 'sufficient');
        move(category.id, 'sufficient', 'filled');
        outcomes.push({
          category_id: category.id,
          state: 'filled',
          initial_score: initialScore,
          final_score: current,
          generation_attempted: false,
          scenarios_generated: 0,
        });
        continue;
      }

      move(category.id, 'evaluating', 'needs_generation');

      generationCalls++;
      let texts: string[];
      try {
        const candidates = await generateWithTimeout(
          this.generator,
          working,
          category,
          {
            output_format: this.options.outputFormat ?? 'scenario',
            target_threshold: threshold,
          },
          this.timeoutMs,
        );
        texts = candidates.map((c) => c.text);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        const reason: SkipReason =
          err instanceof GenerationTimeoutError ? 'GENERATION_TIMEOUT' : 'GENERATION_FAILED';
        this.logger.warn(`Generation failed for ${category.id}: ${message}`);
        skip(category, 'needs_generation', reason, initialScore, true, 0, message);
        continue;
      }

      generatedScenarios += texts.length;
      if (texts.length > 0) {
        working = appendScenarios(working, texts);
      }
      report = this.aggregator.rescore(report, working, category.id);
      const rescored = report.scores[category.id]?.score ?? 0;

      if (rescored >= threshold) {
        move(category.id, 'needs_generation', 'filled');
        outcomes.push({
          category_id: category.id,
          state: 'filled',
          initial_score: initialScore,
          final_score: rescored,
          generation_attempted: true,
          scenarios_generated: texts.length,
        });
      } else {
        skip(category, 'needs_generation', 'BELOW_THRESHOLD', initialScore, true, texts.length);
      }
    }

    this.logger.debug('Sequencing complete', {
      document: document.name,
      calls: generationCalls,
      residual: residualGaps.length,
    });

    return {
      report,
      residual_gaps: residualGaps,
      generation_calls: generationCalls,
      generated_scenarios: generatedScenarios,
      outcomes,
      transitions,
      budget_exhausted: budgetExhausted,
      cancelled,
    };
  }
}

/**
 * Working copy of `document` with scenario texts appended as paragraphs.
 */
export function appendScenarios(document: GuidelineDocument, texts: string[]): GuidelineDocument {
  const sourceText = [document.source_text, ...texts].join('\n\n');
  return {
    ...document,
    source_text: sourceText,
    byte_size: Buffer.byteLength(sourceText, 'utf-8'),
  };
}
