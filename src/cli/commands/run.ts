/**
 * CLI command: `cds-coverage run`
 *
 * Runs every guideline document at every requested fidelity level, writes
 * the per-document and comprehensive reports, and prints a run table.
 *
 * Exit codes:
 * - 0: every pair succeeded (possibly at a degraded level)
 * - 1: at least one pair hard-failed
 * - 2: configuration, taxonomy or document loading error
 * - 130: cancelled (SIGINT)
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { GuidelineDocument } from '../../types/coverage.js';
import type { ScenarioGenerator } from '../../types/generation.js';
import { FidelityLevelSchema, type FidelityLevel } from '../../types/fidelity.js';
import { BatchRunner, type BatchResult } from '../../batch/batch-runner.js';
import { CancellationToken } from '../../batch/cancellation.js';
import { loadDocuments } from '../../documents/document-loader.js';
import { EngineConfigError } from '../../config/reader.js';
import type { EngineConfig } from '../../config/schema.js';
import { createFidelityOrchestrator } from '../../fidelity/engine.js';
import { createStderrLogger } from '../../logging/engine-logger.js';
import { RunEventLog } from '../../logging/run-event-log.js';
import { writeReports } from '../../reporting/report-writer.js';
import { formatRunTable } from '../../reporting/terminal-formatter.js';
import { getDefaultRegistry } from '../../taxonomy/loader.js';
import type { TaxonomyRegistry } from '../../taxonomy/registry.js';
import {
  EXIT_CANCELLED,
  EXIT_FAILED,
  EXIT_OK,
  flagValue,
  hasFlag,
  listFlag,
  loadCommandConfig,
  numberFlag,
  reportConfigError,
} from '../shared.js';

const HELP_TEXT = `
Usage: cds-coverage run [options]

Run guideline documents through the fidelity ladder and write reports.

Options:
  --documents=a,b        Document ids to run (default: all in documents_dir)
  --levels=l1,l2         Requested levels (default: batch.default_levels)
  --output-dir=DIR       Report directory (default: batch.output_dir)
  --no-per-document      Skip per-document comparison reports
  --no-comprehensive     Skip the comprehensive report and text summary
  --concurrency=N        Pairs in flight (default: batch.concurrency)
  --threshold=X          Coverage target 0-1 (default: coverage.target_threshold)
  --budget=N             Generation calls per sequential run
  --config=PATH          Config file (default: cds-coverage.config.json)
  --json                 Print a JSON summary instead of the table
  --help, -h             Show this help message

Levels: full-fhir, full, sequential, table, evaluation-only, draft, none

Exit codes:
  0    Every pair succeeded (possibly degraded)
  1    At least one pair failed
  2    Configuration error
  130  Cancelled
`;

export interface RunCommandDeps {
  /** Replaces the built-in generator */
  generator?: ScenarioGenerator;
  /** Replaces the SIGINT-wired token */
  token?: CancellationToken;
}

function parseLevels(values: string[]): FidelityLevel[] {
  return values.map((value) => {
    const result = FidelityLevelSchema.safeParse(value);
    if (!result.success) {
      throw new EngineConfigError(`Unknown fidelity level "${value}"`, 'levels');
    }
    return result.data;
  });
}

interface RunSetup {
  config: EngineConfig;
  registry: TaxonomyRegistry;
  documents: GuidelineDocument[];
}

/**
 * Resolve config, taxonomy and documents. Every failure here is a
 * configuration error.
 */
async function prepareRun(args: string[]): Promise<RunSetup> {
  const threshold = numberFlag(args, 'threshold');
  const budget = numberFlag(args, 'budget');
  const concurrency = numberFlag(args, 'concurrency');
  const outputDir = flagValue(args, 'output-dir');
  const levelArgs = listFlag(args, 'levels');

  const config = await loadCommandConfig(args, {
    coverage: threshold !== undefined ? { target_threshold: threshold } : {},
    sequencer: budget !== undefined ? { max_generation_calls: budget } : {},
    batch: {
      ...(concurrency !== undefined ? { concurrency } : {}),
      ...(outputDir !== undefined ? { output_dir: outputDir } : {}),
      ...(levelArgs !== undefined ? { default_levels: parseLevels(levelArgs) } : {}),
      ...(hasFlag(args, 'no-per-document') ? { per_document_reports: false } : {}),
      ...(hasFlag(args, 'no-comprehensive') ? { comprehensive_report: false } : {}),
    },
  });

  const registry = await getDefaultRegistry();
  const documents = await loadDocuments(config.batch.documents_dir, listFlag(args, 'documents'));
  if (documents.length === 0) {
    throw new EngineConfigError(`No guideline documents found in ${config.batch.documents_dir}`);
  }
  return { config, registry, documents };
}

export function exitCodeFor(result: BatchResult): number {
  if (result.cancelled) return EXIT_CANCELLED;
  return result.runs.some((r) => r.state === 'failed') ? EXIT_FAILED : EXIT_OK;
}

export async function runCommand(args: string[], deps: RunCommandDeps = {}): Promise<number> {
  if (hasFlag(args, 'help') || args.includes('-h')) {
    console.log(HELP_TEXT);
    return EXIT_OK;
  }

  const json = hasFlag(args, 'json');

  let setup: RunSetup;
  try {
    setup = await prepareRun(args);
  } catch (err: unknown) {
    return reportConfigError(err, json);
  }

  const { config, registry, documents } = setup;
  const logger = createStderrLogger('run', json ? 'warn' : config.logging.level);
  const orchestrator = createFidelityOrchestrator({
    registry,
    config,
    logger,
    ...(deps.generator ? { generator: deps.generator } : {}),
    ...(config.logging.event_log ? { events: new RunEventLog(config.logging.event_log) } : {}),
  });

  const token = deps.token ?? new CancellationToken();
  const onSigint = (): void => token.cancel('SIGINT');
  process.once('SIGINT', onSigint);
  token.onCancel((reason) => logger.warn(`Cancelling remaining pairs (${reason})`));

  const levels = config.batch.default_levels;
  const runner = new BatchRunner(orchestrator, {
    concurrency: config.batch.concurrency,
    targetThreshold: config.coverage.target_threshold,
    signal: token,
    logger,
  });

  let result: BatchResult;
  try {
    result = json ? await runner.run(documents, levels) : await runner.runWithProgress(documents, levels);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  const written = await writeReports(result.comprehensive, {
    outputDir: config.batch.output_dir,
    perDocument: config.batch.per_document_reports,
    comprehensive: config.batch.comprehensive_report,
  });
  const exitCode = exitCodeFor(result);

  if (json) {
    console.log(JSON.stringify({
      exit_code: exitCode,
      cancelled: result.cancelled,
      performance_summary: result.comprehensive.performance_summary,
      runs: result.runs.map((r) => ({
        document_name: r.document_name,
        requested_level: r.requested_level,
        fidelity_level: r.fidelity_level,
        state: r.state,
        execution_time: r.execution_time,
        fallbacks: r.fallbacks.length,
        error_message: r.error_message,
      })),
      reports: written,
    }, null, 2));
    return exitCode;
  }

  p.intro(pc.bgCyan(pc.black(' Fidelity Run ')));
  p.log.message(formatRunTable(result.runs));
  for (const recommendation of result.comprehensive.recommendations) {
    p.log.info(recommendation);
  }
  if (written.length > 0) {
    p.log.success(`Wrote ${written.length} report file(s) to ${config.batch.output_dir}`);
  }

  if (exitCode === EXIT_CANCELLED) {
    p.outro(pc.yellow('Cancelled before all pairs ran'));
  } else if (exitCode === EXIT_FAILED) {
    p.outro(pc.red('One or more runs failed'));
  } else {
    p.outro(pc.green(`${result.runs.length} runs complete`));
  }
  return exitCode;
}
