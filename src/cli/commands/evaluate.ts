/**
 * CLI command: `cds-coverage evaluate <document>`
 *
 * Scores one guideline document against the taxonomy and prints the
 * coverage table followed by the ranked gap list.
 *
 * `<document>` is a file path when it ends in .md or .txt, otherwise an
 * id looked up in batch.documents_dir.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { GuidelineDocument } from '../../types/coverage.js';
import { CoverageAggregator } from '../../coverage/coverage-aggregator.js';
import {
  DOCUMENT_EXTENSIONS,
  loadDocument,
  parseGuidelineDocument,
} from '../../documents/document-loader.js';
import { formatCoverageReport } from '../../reporting/terminal-formatter.js';
import { getDefaultRegistry } from '../../taxonomy/loader.js';
import { NotFoundError, type TaxonomyRegistry } from '../../taxonomy/registry.js';
import type { EngineConfig } from '../../config/schema.js';
import {
  EXIT_FAILED,
  EXIT_OK,
  hasFlag,
  loadCommandConfig,
  numberFlag,
  positionals,
  reportConfigError,
} from '../shared.js';

const HELP_TEXT = `
Usage: cds-coverage evaluate <document> [options]

Score a guideline document against every CDS usage-scenario category.

Arguments:
  <document>        Path to a .md/.txt file, or a document id in documents_dir

Options:
  --threshold=X     Coverage target 0-1 (default: coverage.target_threshold)
  --config=PATH     Config file (default: cds-coverage.config.json)
  --json            Output report and gaps as JSON
  --help, -h        Show this help message
`;

async function resolveDocument(target: string, documentsDir: string): Promise<GuidelineDocument> {
  const ext = extname(target).toLowerCase();
  if (DOCUMENT_EXTENSIONS.some((e) => e === ext)) {
    const content = await readFile(target, 'utf-8');
    return parseGuidelineDocument(content, basename(target, extname(target)), target);
  }
  return loadDocument(documentsDir, target);
}

export async function evaluateCommand(args: string[]): Promise<number> {
  if (hasFlag(args, 'help') || args.includes('-h')) {
    console.log(HELP_TEXT);
    return EXIT_OK;
  }

  const json = hasFlag(args, 'json');
  const target = positionals(args)[0];
  if (!target) {
    p.log.error('Usage: cds-coverage evaluate <document>');
    return EXIT_FAILED;
  }

  let setup: { config: EngineConfig; registry: TaxonomyRegistry };
  try {
    const threshold = numberFlag(args, 'threshold');
    setup = {
      config: await loadCommandConfig(args, {
        coverage: threshold !== undefined ? { target_threshold: threshold } : {},
      }),
      registry: await getDefaultRegistry(),
    };
  } catch (err: unknown) {
    return reportConfigError(err, json);
  }
  const { config, registry } = setup;

  let document: GuidelineDocument;
  try {
    document = await resolveDocument(target, config.batch.documents_dir);
  } catch (err: unknown) {
    const message = err instanceof NotFoundError
      ? `Document not found: ${target}`
      : err instanceof Error ? err.message : String(err);
    if (json) {
      console.log(JSON.stringify({ error: message }, null, 2));
    } else {
      p.log.error(message);
    }
    return EXIT_FAILED;
  }

  const threshold = config.coverage.target_threshold;
  const aggregator = new CoverageAggregator(registry);
  const report = aggregator.evaluate(document);
  const gaps = aggregator.gapList(report, threshold);

  if (json) {
    console.log(JSON.stringify({ threshold, report, gaps }, null, 2));
    return EXIT_OK;
  }

  p.log.message(formatCoverageReport(report, gaps, registry.categories(), threshold));
  p.log.message(pc.dim(`${document.byte_size} bytes, domain ${document.domain_tag}`));
  return EXIT_OK;
}
