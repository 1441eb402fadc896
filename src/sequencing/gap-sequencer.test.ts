import { describe, it, expect } from 'vitest';
import { GapSequencer, appendScenarios, type GapSequencerOptions } from './gap-sequencer.js';
import { CoverageAggregator } from '../coverage/coverage-aggregator.js';
import { CancellationToken } from '../batch/cancellation.js';
import {
  FailingGenerator,
  ScriptedGenerator,
  makeDocument,
  miniRegistry,
} from '../__fixtures__/engine-fixtures.js';
import { loadTaxonomy } from '../taxonomy/loader.js';
import type { CandidateScenario, ScenarioGenerator } from '../types/generation.js';
import type { StateTransition } from '../types/sequencing.js';

describe('GapSequencer', () => {
  const registry = miniRegistry();
  const aggregator = new CoverageAggregator(registry);

  function sequencer(generator: ScenarioGenerator, options: Partial<GapSequencerOptions> = {}) {
    return new GapSequencer(registry, aggregator, generator, { threshold: 0.7, ...options });
  }

  it('fills covered categories without calling the generator', async () => {
    const generator = new FailingGenerator();
    const result = await sequencer(generator).run(
      makeDocument('d', 'anticoagulation, warfarin, staging scan, pet-ct and a reminder'),
    );

    expect(generator.calls).toEqual([]);
    expect(result.generation_calls).toBe(0);
    expect(result.residual_gaps).toEqual([]);
    expect(result.outcomes.map((o) => o.state)).toEqual(['filled', 'filled', 'filled']);
    expect(result.transitions.slice(0, 3).map((t) => t.to)).toEqual(['evaluating', 'sufficient', 'filled']);
  });

  it('skips every category when the generator always fails', async () => {
    const generator = new FailingGenerator();
    const result = await sequencer(generator).run(makeDocument('d', 'warfarin'));

    expect(generator.calls).toEqual(['A1', 'B1', 'C1']);
    expect(result.generation_calls).toBe(3);
    expect(result.residual_gaps).toEqual([
      { category_id: 'A1', score: 0.25, reason: 'GENERATION_FAILED', failure: 'generator offline for A1' },
      { category_id: 'B1', score: 0, reason: 'GENERATION_FAILED', failure: 'generator offline for B1' },
      { category_id: 'C1', score: 0, reason: 'GENERATION_FAILED', failure: 'generator offline for C1' },
    ]);
    expect(result.outcomes.every((o) => o.state === 'skipped' && o.generation_attempted)).toBe(true);
  });

  it('appends generated text and lets it lift later categories', async () => {
    const generator = new ScriptedGenerator(() => 'anticoagulation and a reminder');
    const document = makeDocument('d', 'warfarin');
    const result = await sequencer(generator).run(document);

    // A1 filled by its own call, B1 still uncovered, C1 lifted by A1's text
    expect(generator.calls.map((c) => c.categoryId)).toEqual(['A1', 'B1']);
    expect(generator.calls[0].constraints).toEqual({ output_format: 'scenario', target_threshold: 0.7 });
    expect(result.generated_scenarios).toBe(2);
    expect(result.outcomes).toEqual([
      {
        category_id: 'A1',
        state: 'filled',
        initial_score: 0.25,
        final_score: 1,
        generation_attempted: true,
        scenarios_generated: 1,
      },
      {
        category_id: 'B1',
        state: 'skipped',
        initial_score: 0,
        final_score: 0,
        generation_attempted: true,
        scenarios_generated: 1,
        skip_reason: 'BELOW_THRESHOLD',
      },
      {
        category_id: 'C1',
        state: 'filled',
        initial_score: 0,
        final_score: 1,
        generation_attempted: false,
        scenarios_generated: 0,
      },
    ]);
    expect(result.residual_gaps).toEqual([{ category_id: 'B1', score: 0, reason: 'BELOW_THRESHOLD' }]);
    expect(result.report.overall_coverage).toBe(0.6667);
    expect(document.source_text).toBe('warfarin');
  });

  it('records an ordered transition trace', async () => {
    const seen: StateTransition[] = [];
    const generator = new ScriptedGenerator(() => 'anticoagulation and a reminder');
    const result = await sequencer(generator, { onTransition: (t) => seen.push(t) }).run(
      makeDocument('d', 'warfarin'),
    );

    expect(seen).toEqual(result.transitions);
    expect(result.transitions.map((t) => `${t.category_id}:${t.from}>${t.to}`)).toEqual([
      'A1:pending>evaluating',
      'A1:evaluating>needs_generation',
      'A1:needs_generation>filled',
      'B1:pending>evaluating',
      'B1:evaluating>needs_generation',
      'B1:needs_generation>skipped',
      'C1:pending>evaluating',
      'C1:evaluating>sufficient',
      'C1:sufficient>filled',
    ]);
    expect(result.transitions.map((t) => t.step)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(result.transitions[5].reason).toBe('BELOW_THRESHOLD');
  });

  it('skips with BUDGET_EXHAUSTED once the call budget is spent', async () => {
    const generator = new FailingGenerator();
    const result = await sequencer(generator, { maxGenerationCalls: 1 }).run(makeDocument('d', 'warfarin'));

    expect(generator.calls).toEqual(['A1']);
    expect(result.budget_exhausted).toBe(true);
    expect(result.residual_gaps.map((g) => g.reason)).toEqual([
      'GENERATION_FAILED',
      'BUDGET_EXHAUSTED',
      'BUDGET_EXHAUSTED',
    ]);
    expect(result.transitions.map((t) => `${t.category_id}:${t.from}>${t.to}`)).toEqual([
      'A1:pending>evaluating',
      'A1:evaluating>needs_generation',
      'A1:needs_generation>skipped',
      'B1:pending>skipped',
      'C1:pending>skipped',
    ]);
  });

  it('still fills sufficient categories after the budget is spent', async () => {
    const result = await sequencer(new FailingGenerator(), { maxGenerationCalls: 0 }).run(
      makeDocument('d', 'a reminder'),
    );

    expect(result.outcomes.map((o) => `${o.category_id}:${o.state}`)).toEqual([
      'A1:skipped',
      'B1:skipped',
      'C1:filled',
    ]);
  });

  it('skips with GENERATION_TIMEOUT when a call does not settle', async () => {
    const hanging: ScenarioGenerator = { generate: () => new Promise<CandidateScenario[]>(() => undefined) };
    const result = await sequencer(hanging, { generationTimeoutMs: 5, maxGenerationCalls: 1 }).run(
      makeDocument('d', 'warfarin'),
    );

    expect(result.residual_gaps[0]).toEqual({
      category_id: 'A1',
      score: 0.25,
      reason: 'GENERATION_TIMEOUT',
      failure: 'Generation for "A1" timed out after 5ms',
    });
  });

  it('passes the output format through to the generator', async () => {
    const generator = new ScriptedGenerator(() => '');
    await sequencer(generator, { outputFormat: 'fhir', maxGenerationCalls: 1 }).run(makeDocument('d', ''));
    expect(generator.calls[0].constraints.output_format).toBe('fhir');
  });

  it('skips everything when cancelled before the run', async () => {
    const token = new CancellationToken();
    token.cancel('user abort');
    const generator = new FailingGenerator();
    const result = await sequencer(generator, { signal: token }).run(makeDocument('d', 'warfarin'));

    expect(generator.calls).toEqual([]);
    expect(result.cancelled).toBe(true);
    expect(result.transitions.map((t) => `${t.from}>${t.to}`)).toEqual([
      'pending>skipped',
      'pending>skipped',
      'pending>skipped',
    ]);
    expect(result.residual_gaps.every((g) => g.reason === 'CANCELLED')).toBe(true);
  });

  it('stops generating once cancelled mid-run', async () => {
    const token = new CancellationToken();
    const generator = new ScriptedGenerator(() => 'anticoagulation');
    const result = await sequencer(generator, {
      signal: token,
      onTransition: (t) => {
        if (t.category_id === 'A1' && t.to === 'filled') token.cancel();
      },
    }).run(makeDocument('d', 'warfarin'));

    expect(generator.calls).toHaveLength(1);
    expect(result.outcomes.map((o) => o.skip_reason ?? o.state)).toEqual(['filled', 'CANCELLED', 'CANCELLED']);
  });

  it('ends every category in exactly one terminal state', async () => {
    const result = await sequencer(new ScriptedGenerator((c) => c.match_features[0].phrase), {
      maxGenerationCalls: 1,
    }).run(makeDocument('d', ''));

    const ids = result.outcomes.map((o) => o.category_id).sort();
    expect(ids).toEqual(['A1', 'B1', 'C1']);
    for (const id of ids) {
      const terminal = result.transitions.filter(
        (t) => t.category_id === id && (t.to === 'filled' || t.to === 'skipped'),
      );
      expect(terminal).toHaveLength(1);
    }
  });
});

describe('GapSequencer with the shipped taxonomy', () => {
  it('fills high-tier categories from their top phrases and skips the rest on failure', async () => {
    const registry = await loadTaxonomy();
    const aggregator = new CoverageAggregator(registry);
    const text = registry
      .byTier('high')
      .map((c) => `${c.match_features[0].phrase}.`)
      .join(' ');
    const document = makeDocument('high', text);
    const initial = aggregator.evaluate(document);
    const below = Object.values(initial.scores).filter((s) => s.score < 0.5).length;

    const generator = new FailingGenerator();
    const result = await new GapSequencer(registry, aggregator, generator, { threshold: 0.5 }).run(
      document,
      initial,
    );

    for (const category of registry.byTier('high')) {
      expect(initial.scores[category.id].score).toBeGreaterThan(0.5);
      const outcome = result.outcomes.find((o) => o.category_id === category.id);
      expect(outcome).toMatchObject({ state: 'filled', generation_attempted: false });
      expect(generator.calls).not.toContain(category.id);
    }
    expect(result.residual_gaps).toHaveLength(below);
    expect(result.outcomes).toHaveLength(23);
  });
});

describe('appendScenarios', () => {
  it('joins texts as paragraphs and recounts bytes', () => {
    const doc = appendScenarios(makeDocument('d', 'base'), ['one', 'två']);
    expect(doc.source_text).toBe('base\n\none\n\ntvå');
    expect(doc.byte_size).toBe(15);
  });
});
