/**
 * One handler per fidelity level. A handler either returns its payload or
 * throws; the orchestrator turns a throw into a fallback.
 *
 * Every level from `full-fhir` down to `evaluation-only` refuses documents
 * above the size limit. `draft` and `none` accept anything.
 */

import type { CancellationSignal } from '../types/cancellation.js';
import type { GuidelineDocument } from '../types/coverage.js';
import type {
  FidelityLevel,
  FidelityPayload,
  FullPayload,
} from '../types/fidelity.js';
import type { CandidateScenario, GenerationOutputFormat, ScenarioGenerator } from '../types/generation.js';
import type { CoverageAggregator } from '../coverage/coverage-aggregator.js';
import type { DraftOutliner } from '../drafting/draft-outliner.js';
import { GenerationError, generateWithTimeout } from '../generation/collaborator.js';
import type { InventoryBuilder } from '../inventory/inventory-builder.js';
import type { EngineLogger } from '../logging/engine-logger.js';
import { GapSequencer, appendScenarios } from '../sequencing/gap-sequencer.js';
import type { StateTransition } from '../types/sequencing.js';
import type { TaxonomyRegistry } from '../taxonomy/registry.js';

/**
 * The document exceeds `max_document_bytes` for a scoring level.
 */
export class DocumentTooLargeError extends Error {
  override name = 'DocumentTooLargeError' as const;

  constructor(
    public readonly documentName: string,
    public readonly byteSize: number,
    public readonly limit: number,
  ) {
    super(`Document "${documentName}" is ${byteSize} bytes, limit is ${limit}`);
  }
}

export interface LevelContext {
  signal?: CancellationSignal;
  /** Sequencer state changes for this run */
  onTransition?: (transition: StateTransition) => void;
}

export type LevelHandler = (
  document: GuidelineDocument,
  context: LevelContext,
) => Promise<FidelityPayload>;

export type LevelHandlers = Record<FidelityLevel, LevelHandler>;

export interface LevelDependencies {
  registry: TaxonomyRegistry;
  aggregator: CoverageAggregator;
  generator: ScenarioGenerator;
  inventoryBuilder: InventoryBuilder;
  outliner: DraftOutliner;
  logger: EngineLogger;
  threshold: number;
  maxGenerationCalls: number;
  generationTimeoutMs: number;
  maxDocumentBytes: number;
}

export function assertDocumentSize(document: GuidelineDocument, limit: number): void {
  if (document.byte_size > limit) {
    throw new DocumentTooLargeError(document.name, document.byte_size, limit);
  }
}

/**
 * Generate for every category, then re-evaluate the document with all
 * candidate texts appended. Fails only when every call fails.
 */
async function runFull(
  deps: LevelDependencies,
  document: GuidelineDocument,
  kind: FullPayload['kind'],
  outputFormat: GenerationOutputFormat,
): Promise<FullPayload> {
  assertDocumentSize(document, deps.maxDocumentBytes);
  const initialReport = deps.aggregator.evaluate(document);

  const scenarios: CandidateScenario[] = [];
  const failed: FullPayload['failed_categories'] = [];

  for (const category of deps.registry.categories()) {
    try {
      const candidates = await generateWithTimeout(
        deps.generator,
        document,
        category,
        { output_format: outputFormat, target_threshold: deps.threshold },
        deps.generationTimeoutMs,
      );
      scenarios.push(...candidates);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      failed.push({ category_id: category.id, message });
    }
  }

  if (failed.length === deps.registry.size && failed.length > 0) {
    throw new GenerationError(
      `All ${failed.length} generation calls failed (${outputFormat}): ${failed[0]?.message ?? ''}`,
    );
  }
  if (failed.length > 0) {
    deps.logger.warn(`${failed.length} generation calls failed`, { document: document.name, kind });
  }

  const enriched = scenarios.length > 0
    ? appendScenarios(document, scenarios.map((s) => s.text))
    : document;

  return {
    kind,
    output_format: outputFormat,
    initial_report: initialReport,
    report: deps.aggregator.evaluate(enriched),
    scenarios,
    failed_categories: failed,
  };
}

export function createLevelHandlers(deps: LevelDependencies): LevelHandlers {
  return {
    'full-fhir': async (document) => runFull(deps, document, 'full-fhir', 'fhir'),

    full: async (document) => runFull(deps, document, 'full', 'scenario'),

    sequential: async (document, context) => {
      assertDocumentSize(document, deps.maxDocumentBytes);
      const sequencer = new GapSequencer(deps.registry, deps.aggregator, deps.generator, {
        threshold: deps.threshold,
        maxGenerationCalls: deps.maxGenerationCalls,
        generationTimeoutMs: deps.generationTimeoutMs,
        logger: deps.logger,
        ...(context.signal ? { signal: context.signal } : {}),
        ...(context.onTransition ? { onTransition: context.onTransition } : {}),
      });
      return { kind: 'sequential', result: await sequencer.run(document) };
    },

    table: async (document) => {
      assertDocumentSize(document, deps.maxDocumentBytes);
      const report = deps.aggregator.evaluate(document);
      return { kind: 'table', report, inventory: deps.inventoryBuilder.build(report, document) };
    },

    'evaluation-only': async (document) => {
      assertDocumentSize(document, deps.maxDocumentBytes);
      const report = deps.aggregator.evaluate(document);
      return { kind: 'evaluation-only', report, gaps: deps.aggregator.gapList(report, deps.threshold) };
    },

    draft: async (document) => ({ kind: 'draft', outline: deps.outliner.outline(document) }),

    none: async () => ({ kind: 'none', skipped: true }),
  };
}
