/**
 * Persists batch reports:
 *
 *   <outputDir>/per-document_<stamp>/<document>_fidelity_comparison.json
 *   <outputDir>/comprehensive_fidelity_<stamp>.json
 *   <outputDir>/fidelity_summary_<stamp>.txt
 *
 * `<stamp>` is local time as YYYYMMDD_HHMMSS.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ComprehensiveReport } from '../types/report.js';
import { formatTextSummary } from './summary-formatter.js';

export interface WriteReportsOptions {
  outputDir: string;
  /** Write one comparison file per document (default true) */
  perDocument?: boolean;
  /** Write the comprehensive JSON and the text summary (default true) */
  comprehensive?: boolean;
  /** Stamp source (default: current time) */
  now?: Date;
}

function two(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatStamp(date: Date): string {
  return (
    `${date.getFullYear()}${two(date.getMonth() + 1)}${two(date.getDate())}_` +
    `${two(date.getHours())}${two(date.getMinutes())}${two(date.getSeconds())}`
  );
}

/** File-system safe form of a document name. */
export function safeFileName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '');
  return cleaned.length > 0 ? cleaned : 'document';
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}

/**
 * Write the enabled reports and return their paths in write order.
 */
export async function writeReports(
  report: ComprehensiveReport,
  options: WriteReportsOptions,
): Promise<string[]> {
  const stamp = formatStamp(options.now ?? new Date());
  const written: string[] = [];
  await mkdir(options.outputDir, { recursive: true });

  if (options.perDocument ?? true) {
    const dir = join(options.outputDir, `per-document_${stamp}`);
    await mkdir(dir, { recursive: true });
    for (const name of report.documents_tested) {
      const documentReport = report.individual_reports[name];
      if (!documentReport) continue;
      const filePath = join(dir, `${safeFileName(name)}_fidelity_comparison.json`);
      await writeFile(filePath, toJson(documentReport), 'utf-8');
      written.push(filePath);
    }
  }

  if (options.comprehensive ?? true) {
    const comprehensivePath = join(options.outputDir, `comprehensive_fidelity_${stamp}.json`);
    await writeFile(comprehensivePath, toJson(report), 'utf-8');
    written.push(comprehensivePath);

    const summaryPath = join(options.outputDir, `fidelity_summary_${stamp}.txt`);
    await writeFile(summaryPath, formatTextSummary(report), 'utf-8');
    written.push(summaryPath);
  }

  return written;
}
