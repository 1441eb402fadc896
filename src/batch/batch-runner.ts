/**
 * Batch runner: every (document, requested level) pair through the
 * fidelity orchestrator, with bounded concurrency.
 *
 * Pairs are processed in chunks of `concurrency` with Promise.all. Pairs
 * share nothing but the frozen registry, so one pair's failure never
 * affects another. Cancellation is checked as each pair starts; pairs not
 * yet started when it fires come back as cancelled runs.
 */

import * as p from '@clack/prompts';
import type { CancellationSignal } from '../types/cancellation.js';
import type { GuidelineDocument } from '../types/coverage.js';
import type { FidelityLevel, FidelityRun } from '../types/fidelity.js';
import type { ComprehensiveReport, DocumentComparisonReport } from '../types/report.js';
import { compareLevels } from '../fidelity/ladder.js';
import { cancelledRun, failedRun, type FidelityOrchestrator } from '../fidelity/orchestrator.js';
import { silentLogger, type EngineLogger } from '../logging/engine-logger.js';
import { buildComprehensiveReport } from '../reporting/report-builder.js';

export const DEFAULT_CONCURRENCY = 4;

export interface BatchProgress {
  current: number;
  total: number;
  /** 0-100 */
  percent: number;
  document_name: string;
  requested_level: FidelityLevel;
  state: FidelityRun['state'];
}

export interface BatchConfig {
  /** Maximum pairs in flight (default 4) */
  concurrency?: number;
  /** Coverage target recorded in the report configuration */
  targetThreshold?: number;
  signal?: CancellationSignal;
  onProgress?: (progress: BatchProgress) => void;
  logger?: EngineLogger;
  /** Report timestamp source (default: current time) */
  clock?: () => Date;
}

export interface BatchResult {
  /** Sorted by (document_name, ladder index of requested level) */
  runs: FidelityRun[];
  comprehensive: ComprehensiveReport;
  per_document: Record<string, DocumentComparisonReport>;
  cancelled: boolean;
  /** Wall time in milliseconds */
  duration: number;
}

interface Pair {
  document: GuidelineDocument;
  level: FidelityLevel;
}

export class BatchRunner {
  private readonly concurrency: number;
  private readonly logger: EngineLogger;
  private onProgress?: (progress: BatchProgress) => void;

  constructor(
    private readonly orchestrator: FidelityOrchestrator,
    private readonly config: BatchConfig = {},
  ) {
    this.concurrency = Math.max(1, config.concurrency ?? DEFAULT_CONCURRENCY);
    this.logger = config.logger ?? silentLogger;
    this.onProgress = config.onProgress;
  }

  async run(
    documents: readonly GuidelineDocument[],
    levels: readonly FidelityLevel[],
  ): Promise<BatchResult> {
    const startTime = Date.now();
    const uniqueLevels = [...new Set(levels)].sort(compareLevels);
    const pairs: Pair[] = documents.flatMap((document) =>
      uniqueLevels.map((level) => ({ document, level })),
    );
    const signal = this.config.signal;

    const runs: FidelityRun[] = [];
    let processed = 0;
    for (const chunk of chunkArray(pairs, this.concurrency)) {
      await Promise.all(
        chunk.map(async ({ document, level }) => {
          const run = await this.runPair(document, level, signal);
          runs.push(run);
          processed++;
          this.reportProgress(processed, pairs.length, run);
        }),
      );
    }

    const comprehensive = buildComprehensiveReport(
      documents.map((d) => ({ name: d.name, domain_tag: d.domain_tag })),
      uniqueLevels,
      runs,
      {
        timestamp: (this.config.clock ?? (() => new Date()))().toISOString(),
        concurrency: this.concurrency,
        target_threshold: this.config.targetThreshold ?? 0.5,
      },
    );

    return {
      runs: comprehensive.runs,
      comprehensive,
      per_document: comprehensive.individual_reports,
      cancelled: signal?.isCancelled ?? false,
      duration: Date.now() - startTime,
    };
  }

  /**
   * Same as run(), with a spinner and ASCII progress bar.
   */
  async runWithProgress(
    documents: readonly GuidelineDocument[],
    levels: readonly FidelityLevel[],
  ): Promise<BatchResult> {
    const total = documents.length * new Set(levels).size;
    const spin = p.spinner();
    spin.start(`Running ${total} document/level pairs...`);

    const originalOnProgress = this.onProgress;
    this.onProgress = (progress) => {
      spin.message(
        `[${progressBar(progress.percent)}] ${progress.percent}% (${progress.current}/${progress.total})`,
      );
      originalOnProgress?.(progress);
    };

    try {
      const result = await this.run(documents, levels);
      spin.stop(`Completed ${result.runs.length} runs in ${result.duration}ms`);
      return result;
    } catch (error) {
      spin.stop('Batch failed');
      throw error;
    } finally {
      this.onProgress = originalOnProgress;
    }
  }

  private async runPair(
    document: GuidelineDocument,
    level: FidelityLevel,
    signal: CancellationSignal | undefined,
  ): Promise<FidelityRun> {
    if (signal?.isCancelled) {
      return cancelledRun(document.name, level, signal.reason ?? 'cancelled');
    }
    try {
      return await this.orchestrator.run(document, level, signal ? { signal } : {});
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Run ${document.name}/${level} aborted: ${message}`);
      return failedRun(document.name, level, message);
    }
  }

  private reportProgress(current: number, total: number, run: FidelityRun): void {
    this.onProgress?.({
      current,
      total,
      percent: Math.round((current / total) * 100),
      document_name: run.document_name,
      requested_level: run.requested_level,
      state: run.state,
    });
  }
}

/**
 * Split an array into chunks of at most `size`.
 */
export function chunkArray<T>(array: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}

/**
 * Format: [████████░░░░░░░░░░░░]
 */
export function progressBar(percent: number): string {
  const width = 20;
  const filled = Math.round((percent / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}
