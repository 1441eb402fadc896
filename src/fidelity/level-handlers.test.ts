import { describe, it, expect, vi } from 'vitest';
import {
  DocumentTooLargeError,
  assertDocumentSize,
  createLevelHandlers,
  type LevelDependencies,
} from './level-handlers.js';
import { CoverageAggregator } from '../coverage/coverage-aggregator.js';
import { DraftOutliner } from '../drafting/draft-outliner.js';
import { GenerationError } from '../generation/collaborator.js';
import { FeatureSeededGenerator } from '../generation/feature-seeded-generator.js';
import { InventoryBuilder } from '../inventory/inventory-builder.js';
import { silentLogger } from '../logging/engine-logger.js';
import {
  FailingGenerator,
  ScriptedGenerator,
  makeDocument,
  miniRegistry,
} from '../__fixtures__/engine-fixtures.js';
import type { CandidateScenario, ScenarioGenerator } from '../types/generation.js';
import type { FidelityPayload } from '../types/fidelity.js';

function dependencies(overrides: Partial<LevelDependencies> = {}): LevelDependencies {
  const registry = miniRegistry();
  return {
    registry,
    aggregator: new CoverageAggregator(registry),
    generator: new FeatureSeededGenerator(),
    inventoryBuilder: new InventoryBuilder(registry, { syntheticPolicy: { mode: 'none' } }),
    outliner: new DraftOutliner(registry),
    logger: silentLogger,
    threshold: 0.5,
    maxGenerationCalls: 23,
    generationTimeoutMs: 1000,
    maxDocumentBytes: 1000,
    ...overrides,
  };
}

type PayloadOf<K extends FidelityPayload['kind']> = FidelityPayload & { kind: K };

function isKind<K extends FidelityPayload['kind']>(
  payload: FidelityPayload,
  kind: K,
): payload is PayloadOf<K> {
  return payload.kind === kind;
}

function expectKind<K extends FidelityPayload['kind']>(payload: FidelityPayload, kind: K): PayloadOf<K> {
  if (!isKind(payload, kind)) {
    throw new Error(`expected a ${kind} payload`);
  }
  return payload;
}

const doc = makeDocument('afib', 'Start warfarin. Send a reminder.');

describe('createLevelHandlers', () => {
  it('evaluation-only returns the report and its gaps', async () => {
    const payload = await createLevelHandlers(dependencies())['evaluation-only'](doc, {});
    const evaluation = expectKind(payload, 'evaluation-only');

    expect(evaluation.report.scores.C1.score).toBe(1);
    expect(evaluation.gaps.map((g) => g.category_id)).toEqual(['A1', 'B1']);
  });

  it('table builds an inventory from the report', async () => {
    const payload = await createLevelHandlers(dependencies()).table(doc, {});
    const table = expectKind(payload, 'table');

    expect(table.inventory.entries.map((e) => e.scenario_id)).toEqual(['afib-A1', 'afib-C1']);
  });

  it('sequential runs the sequencer with the run context', async () => {
    const transitions: string[] = [];
    const handlers = createLevelHandlers(
      dependencies({ generator: new ScriptedGenerator(() => 'anticoagulation, staging scan') }),
    );
    const payload = await handlers.sequential(doc, {
      onTransition: (t) => transitions.push(`${t.category_id}>${t.to}`),
    });
    const sequential = expectKind(payload, 'sequential');

    // B1 is lifted by the text generated for A1
    expect(sequential.result.generation_calls).toBe(1);
    expect(sequential.result.residual_gaps).toEqual([]);
    expect(transitions.at(-1)).toBe('C1>filled');
  });

  it('full generates for every category and re-evaluates', async () => {
    const payload = await createLevelHandlers(dependencies()).full(doc, {});
    const full = expectKind(payload, 'full');

    expect(full.output_format).toBe('scenario');
    expect(full.scenarios.map((s) => s.id)).toEqual(['afib-A1-seeded', 'afib-B1-seeded', 'afib-C1-seeded']);
    expect(full.failed_categories).toEqual([]);
    expect(full.initial_report.overall_coverage).toBe(0.4167);
    expect(full.report.overall_coverage).toBe(1);
  });

  it('full keeps going when some calls fail', async () => {
    const warn = vi.fn();
    const partial: ScenarioGenerator = {
      async generate(document, category, constraints): Promise<CandidateScenario[]> {
        if (category.id === 'A1') throw new GenerationError('rate limited', 'A1');
        return new FeatureSeededGenerator().generate(document, category, constraints);
      },
    };
    const handlers = createLevelHandlers(
      dependencies({ generator: partial, logger: { ...silentLogger, warn } }),
    );
    const full = expectKind(await handlers.full(doc, {}), 'full');

    expect(full.failed_categories).toEqual([{ category_id: 'A1', message: 'rate limited' }]);
    expect(full.scenarios).toHaveLength(2);
    expect(warn).toHaveBeenCalledWith('1 generation calls failed', { document: 'afib', kind: 'full' });
  });

  it('full throws when every call fails', async () => {
    const handlers = createLevelHandlers(dependencies({ generator: new FailingGenerator() }));

    await expect(handlers.full(doc, {})).rejects.toThrow(
      'All 3 generation calls failed (scenario): generator offline for A1',
    );
  });

  it('full-fhir asks for FHIR output', async () => {
    const handlers = createLevelHandlers(dependencies());

    await expect(handlers['full-fhir'](doc, {})).rejects.toThrow(
      'All 3 generation calls failed (fhir): FHIR output is not supported by the built-in generator',
    );
  });

  it('draft outlines the document', async () => {
    const text = 'Recommend warfarin for patients with atrial fibrillation.';
    const payload = await createLevelHandlers(dependencies()).draft(makeDocument('afib', text), {});
    const draft = expectKind(payload, 'draft');

    expect(draft.outline.specialty).toBe('cardiology');
    expect(draft.outline.category_hints).toEqual(['A1']);
  });

  it('none returns an explicit skip', async () => {
    await expect(createLevelHandlers(dependencies()).none(doc, {})).resolves.toEqual({
      kind: 'none',
      skipped: true,
    });
  });

  it('enforces the size limit on scoring levels only', async () => {
    const handlers = createLevelHandlers(dependencies({ maxDocumentBytes: 10 }));

    for (const level of ['full-fhir', 'full', 'sequential', 'table', 'evaluation-only'] as const) {
      await expect(handlers[level](doc, {})).rejects.toBeInstanceOf(DocumentTooLargeError);
    }
    await expect(handlers.draft(doc, {})).resolves.toMatchObject({ kind: 'draft' });
    await expect(handlers.none(doc, {})).resolves.toMatchObject({ kind: 'none' });
  });
});

describe('assertDocumentSize', () => {
  it('accepts a document exactly at the limit', () => {
    expect(() => assertDocumentSize(makeDocument('d', 'abcde'), 5)).not.toThrow();
    expect(() => assertDocumentSize(makeDocument('d', 'abcdef'), 5)).toThrow(
      'Document "d" is 6 bytes, limit is 5',
    );
  });
});
