/**
 * Wires a FidelityOrchestrator from a registry, a generator and the
 * engine config.
 */

import type { ScenarioGenerator } from '../types/generation.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/schema.js';
import { CoverageAggregator } from '../coverage/coverage-aggregator.js';
import { DraftOutliner } from '../drafting/draft-outliner.js';
import { FeatureSeededGenerator } from '../generation/feature-seeded-generator.js';
import { InventoryBuilder } from '../inventory/inventory-builder.js';
import { silentLogger, type EngineLogger } from '../logging/engine-logger.js';
import type { RunEventSink } from '../logging/run-event-log.js';
import type { TaxonomyRegistry } from '../taxonomy/registry.js';
import { createLevelHandlers, type LevelHandlers } from './level-handlers.js';
import { FidelityOrchestrator } from './orchestrator.js';

export interface EngineOptions {
  registry: TaxonomyRegistry;
  config?: EngineConfig;
  /** Defaults to the built-in FeatureSeededGenerator */
  generator?: ScenarioGenerator;
  logger?: EngineLogger;
  events?: RunEventSink;
  /** Replace individual level handlers */
  handlers?: Partial<LevelHandlers>;
  /** Wall clock for report timestamps */
  clock?: () => Date;
  /** Monotonic milliseconds for execution times */
  now?: () => number;
}

export function createFidelityOrchestrator(options: EngineOptions): FidelityOrchestrator {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const logger = options.logger ?? silentLogger;
  const registry = options.registry;

  const handlers = createLevelHandlers({
    registry,
    aggregator: new CoverageAggregator(registry, options.clock ? { clock: options.clock } : {}),
    generator: options.generator ?? new FeatureSeededGenerator(),
    inventoryBuilder: new InventoryBuilder(registry, {
      syntheticPolicy: config.inventory.synthetic_policy,
      completionTarget: config.inventory.completion_target,
      ...(options.clock ? { clock: options.clock } : {}),
    }),
    outliner: new DraftOutliner(registry),
    logger,
    threshold: config.coverage.target_threshold,
    maxGenerationCalls: config.sequencer.max_generation_calls,
    generationTimeoutMs: config.sequencer.generation_timeout_ms,
    maxDocumentBytes: config.fidelity.max_document_bytes,
  });

  return new FidelityOrchestrator(
    { ...handlers, ...options.handlers },
    {
      allowFallback: config.fidelity.allow_fallback,
      disabledLevels: config.fidelity.disabled_levels,
      logger,
      ...(options.events ? { events: options.events } : {}),
      ...(options.now ? { now: options.now } : {}),
    },
  );
}
