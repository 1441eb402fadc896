import { describe, it, expect, vi, afterEach } from 'vitest';
import { GenerationError, GenerationTimeoutError, generateWithTimeout } from './collaborator.js';
import { ScriptedGenerator, makeDocument, miniRegistry } from '../__fixtures__/engine-fixtures.js';
import type { CandidateScenario, ScenarioGenerator } from '../types/generation.js';

const constraints = { output_format: 'scenario', target_threshold: 0.5 } as const;

describe('generateWithTimeout', () => {
  const category = miniRegistry().get('A1');
  const document = makeDocument('d', 'text');

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the generator candidates', async () => {
    const generator = new ScriptedGenerator(() => 'generated');
    const candidates = await generateWithTimeout(generator, document, category, constraints, 1000);
    expect(candidates.map((c) => c.text)).toEqual(['generated']);
  });

  it('rejects with GenerationTimeoutError when the call hangs', async () => {
    vi.useFakeTimers();
    const hanging: ScenarioGenerator = {
      generate: () => new Promise<CandidateScenario[]>(() => undefined),
    };

    const pending = generateWithTimeout(hanging, document, category, constraints, 250);
    const assertion = expect(pending).rejects.toMatchObject({
      name: 'GenerationTimeoutError',
      categoryId: 'A1',
      timeoutMs: 250,
      message: 'Generation for "A1" timed out after 250ms',
    });
    await vi.advanceTimersByTimeAsync(250);
    await assertion;
    await expect(pending).rejects.toBeInstanceOf(GenerationTimeoutError);
  });

  it('passes GenerationError through unchanged', async () => {
    const original = new GenerationError('quota exceeded', 'A1');
    const failing: ScenarioGenerator = { generate: () => Promise.reject(original) };

    await expect(generateWithTimeout(failing, document, category, constraints, 1000)).rejects.toBe(original);
  });

  it('wraps other failures in GenerationError', async () => {
    const failing: ScenarioGenerator = { generate: () => Promise.reject(new TypeError('bad response')) };

    const err = await generateWithTimeout(failing, document, category, constraints, 1000).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(GenerationError);
    expect(err).toMatchObject({
      message: 'Generation for "A1" failed: bad response',
      categoryId: 'A1',
    });
    expect(err instanceof Error ? err.cause : undefined).toBeInstanceOf(TypeError);
  });
});
