// ============================================================================
// Generation Call Boundary
// ============================================================================
// Wraps calls to the scenario-generation collaborator with a per-call
// timeout and normalizes every rejection into a GenerationError. Callers
// (the sequencer and the full-fidelity handlers) turn those errors into
// state transitions; nothing here is fatal to a run.

import type { GuidelineDocument } from '../types/coverage.js';
import type {
  CandidateScenario,
  GenerationConstraints,
  ScenarioGenerator,
} from '../types/generation.js';
import type { UsageScenarioCategory } from '../types/taxonomy.js';

/**
 * Collaborator failure for one call. Recoverable: the category is skipped
 * or the fidelity level falls back.
 */
export class GenerationError extends Error {
  override name: string = 'GenerationError';

  constructor(
    message: string,
    public readonly categoryId?: string,
    cause?: unknown,
  ) {
    super(message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * The call did not settle within its budget. Handled exactly like any
 * other GenerationError.
 */
export class GenerationTimeoutError extends GenerationError {
  override name = 'GenerationTimeoutError';

  constructor(
    categoryId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Generation for "${categoryId}" timed out after ${timeoutMs}ms`, categoryId);
  }
}

/**
 * Invoke the collaborator for one category, bounded by `timeoutMs`.
 *
 * - Resolves with the candidates on success
 * - Rejects with GenerationTimeoutError when the timeout fires first
 * - Rejects with GenerationError (wrapping the original) on any other failure
 *
 * The timer is cleared once the race settles, so nothing is left pending.
 */
export async function generateWithTimeout(
  generator: ScenarioGenerator,
  document: GuidelineDocument,
  category: UsageScenarioCategory,
  constraints: GenerationConstraints,
  timeoutMs: number,
): Promise<CandidateScenario[]> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new GenerationTimeoutError(category.id, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      generator.generate(document, category, constraints),
      timeout,
    ]);
  } catch (err: unknown) {
    if (err instanceof GenerationError) {
      throw err;
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new GenerationError(`Generation for "${category.id}" failed: ${message}`, category.id, err);
  } finally {
    clearTimeout(timer);
  }
}
