/**
 * Fidelity orchestrator: runs one document at a requested level and walks
 * down the ladder on failure.
 *
 *   idle -> running -> succeeded
 *                   -> failed_fallback -> running (next level) ...
 *                   -> failed              (fallback disabled)
 *
 * `none` always succeeds, so with fallback enabled every run ends
 * succeeded unless it is cancelled. Each fallback is recorded as
 * `{ from, to, reason }` and the finished run is frozen.
 */

import { performance } from 'node:perf_hooks';
import type { CancellationSignal } from '../types/cancellation.js';
import type { GuidelineDocument } from '../types/coverage.js';
import type {
  FallbackRecord,
  FidelityLevel,
  FidelityPayload,
  FidelityRun,
  OrchestratorState,
} from '../types/fidelity.js';
import type { StateTransition } from '../types/sequencing.js';
import { silentLogger, type EngineLogger } from '../logging/engine-logger.js';
import { nullEventSink, type RunEventSink, type RunEvent } from '../logging/run-event-log.js';
import { nextLevel } from './ladder.js';
import type { LevelContext, LevelHandlers } from './level-handlers.js';

/** Fallback reason for a level switched off in configuration. */
export const LEVEL_DISABLED = 'LEVEL_DISABLED';

export interface FidelityOrchestratorOptions {
  /** When false the first failure is final (default true) */
  allowFallback?: boolean;
  /** `none` is never disabled */
  disabledLevels?: readonly FidelityLevel[];
  logger?: EngineLogger;
  events?: RunEventSink;
  /** Milliseconds, monotonic (default performance.now) */
  now?: () => number;
}

export interface RunOptions {
  signal?: CancellationSignal;
}

function roundSeconds(ms: number): number {
  return Math.round(Math.max(0, ms)) / 1000;
}

export class FidelityOrchestrator {
  private readonly allowFallback: boolean;
  private readonly disabled: ReadonlySet<FidelityLevel>;
  private readonly logger: EngineLogger;
  private readonly events: RunEventSink;
  private readonly now: () => number;
  /** Tail of queued event writes */
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly handlers: LevelHandlers,
    options: FidelityOrchestratorOptions = {},
  ) {
    this.allowFallback = options.allowFallback ?? true;
    this.disabled = new Set(options.disabledLevels ?? []);
    this.logger = options.logger ?? silentLogger;
    this.events = options.events ?? nullEventSink;
    this.now = options.now ?? (() => performance.now());
  }

  async run(
    document: GuidelineDocument,
    requested: FidelityLevel,
    options: RunOptions = {},
  ): Promise<FidelityRun> {
    const started = this.now();
    const fallbacks: FallbackRecord[] = [];
    const signal = options.signal;
    const onTransition = (t: StateTransition): void => {
      this.emit({
        type: 'transition',
        document_name: document.name,
        category_id: t.category_id,
        from: t.from,
        to: t.to,
        step: t.step,
        ...(t.reason !== undefined ? { reason: t.reason } : {}),
      });
    };

    let state: OrchestratorState = 'idle';
    let level: FidelityLevel | null = requested;
    let payload: FidelityPayload | null = null;
    let achieved: FidelityLevel | null = null;
    let lastError: string | null = null;

    while (level !== null) {
      if (signal?.isCancelled) {
        state = 'cancelled';
        lastError = `Cancelled: ${signal.reason ?? 'cancelled'}`;
        break;
      }

      state = 'running';
      this.logger.debug(`Running ${level}`, { document: document.name });

      const attempt = await this.attempt(level, document, {
        ...(signal ? { signal } : {}),
        onTransition,
      });
      if (attempt.ok) {
        payload = attempt.payload;
        achieved = level;
        state = 'succeeded';
        break;
      }

      const reason = attempt.reason;
      lastError = reason;
      const to: FidelityLevel | null = this.allowFallback ? nextLevel(level) : null;
      fallbacks.push({ from: level, to, reason });
      this.emit({
        type: 'fallback',
        document_name: document.name,
        requested_level: requested,
        from: level,
        to,
        reason,
      });

      if (to === null) {
        state = 'failed';
        this.logger.warn(`${document.name} failed at ${level}: ${reason}`);
        break;
      }

      state = 'failed_fallback';
      this.logger.info(`${document.name}: ${level} failed, falling back to ${to}`, { reason });
      level = to;
    }

    const finalState: FidelityRun['state'] =
      state === 'succeeded' || state === 'cancelled' ? state : 'failed';
    const degradedFrom = fallbacks.filter((f) => f.to !== null).at(-1)?.from ?? null;

    const run: FidelityRun = Object.freeze({
      document_name: document.name,
      requested_level: requested,
      fidelity_level: achieved,
      execution_time: roundSeconds(this.now() - started),
      success: finalState === 'succeeded',
      state: finalState,
      result_payload: payload,
      fallback_from: achieved !== null ? degradedFrom : null,
      fallbacks: Object.freeze(fallbacks),
      error_message: finalState === 'succeeded' ? null : lastError,
    });

    this.emit({
      type: 'run_complete',
      document_name: run.document_name,
      requested_level: run.requested_level,
      fidelity_level: run.fidelity_level,
      state: run.state,
      execution_time: run.execution_time,
      fallback_count: run.fallbacks.length,
    });
    await this.pending;

    return run;
  }

  private async attempt(
    level: FidelityLevel,
    document: GuidelineDocument,
    context: LevelContext,
  ): Promise<{ ok: true; payload: FidelityPayload } | { ok: false; reason: string }> {
    if (level !== 'none' && this.disabled.has(level)) {
      return { ok: false, reason: LEVEL_DISABLED };
    }
    try {
      return { ok: true, payload: await this.handlers[level](document, context) };
    } catch (err: unknown) {
      return { ok: false, reason: err instanceof Error ? `${err.name}: ${err.message}` : String(err) };
    }
  }

  /**
   * Queue an event write. A failing sink is reported but never fails a run.
   */
  private emit(event: RunEvent): void {
    const write = this.events.record(event).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Could not record ${event.type} event: ${message}`);
    });
    this.pending = this.pending.then(() => write);
  }
}

/**
 * A run for a pair that never started because the batch was cancelled.
 */
export function cancelledRun(
  documentName: string,
  requested: FidelityLevel,
  reason: string,
): FidelityRun {
  return Object.freeze({
    document_name: documentName,
    requested_level: requested,
    fidelity_level: null,
    execution_time: 0,
    success: false,
    state: 'cancelled',
    result_payload: null,
    fallback_from: null,
    fallbacks: Object.freeze([]),
    error_message: `Cancelled: ${reason}`,
  });
}

/**
 * A run for a pair whose orchestration threw outside any level handler.
 */
export function failedRun(
  documentName: string,
  requested: FidelityLevel,
  message: string,
): FidelityRun {
  return Object.freeze({
    document_name: documentName,
    requested_level: requested,
    fidelity_level: null,
    execution_time: 0,
    success: false,
    state: 'failed',
    result_payload: null,
    fallback_from: null,
    fallbacks: Object.freeze([]),
    error_message: message,
  });
}
