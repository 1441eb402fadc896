/**
 * Plain-text summary of a comprehensive report, written beside the JSON
 * reports. No colors: the output goes to a file.
 */

import type { ComprehensiveReport, PerformanceBucket } from '../types/report.js';

const RULE = '='.repeat(50);
const SUBRULE = '-'.repeat(30);

function share(part: number, total: number): string {
  return total > 0 ? `${((part / total) * 100).toFixed(1)}%` : '0.0%';
}

function bucketLines(name: string, bucket: PerformanceBucket): string[] {
  return [
    `${name}:`,
    `  Success Rate: ${(bucket.success_rate * 100).toFixed(1)}%`,
    `  Average Time: ${bucket.average_time.toFixed(2)}s`,
    `  Runs: ${bucket.successful_runs}/${bucket.total_runs}`,
  ];
}

export function formatTextSummary(report: ComprehensiveReport): string {
  const perf = report.performance_summary;
  const lines: string[] = [
    'FIDELITY LEVEL SUMMARY',
    RULE,
    `Timestamp: ${report.timestamp}`,
    `Documents Tested: ${report.documents_tested.length}`,
    `Fidelity Levels Tested: ${report.fidelity_levels_tested.length}`,
    `Total Combinations: ${report.test_configuration.total_combinations}`,
    '',
    'PERFORMANCE SUMMARY',
    SUBRULE,
    `Total Runs: ${perf.total_runs}`,
    `Successful: ${perf.successful_runs} (${share(perf.successful_runs, perf.total_runs)})`,
    `Failed: ${perf.failed_runs} (${share(perf.failed_runs, perf.total_runs)})`,
    `Degraded: ${perf.degraded_runs}`,
    `Cancelled: ${perf.cancelled_runs}`,
    `Average Execution Time: ${perf.average_execution_time.toFixed(2)}s`,
    '',
    'PERFORMANCE BY LEVEL',
    SUBRULE,
  ];

  for (const level of report.fidelity_levels_tested) {
    const bucket = perf.performance_by_level[level];
    if (bucket) lines.push(...bucketLines(level, bucket));
  }
  lines.push('', 'PERFORMANCE BY DOCUMENT', SUBRULE);
  for (const name of report.documents_tested) {
    const bucket = perf.performance_by_document[name];
    if (bucket) lines.push(...bucketLines(name, bucket));
  }

  lines.push('', 'RECOMMENDATIONS', SUBRULE);
  for (const recommendation of report.recommendations) {
    lines.push(`- ${recommendation}`);
  }
  lines.push('');

  return lines.join('\n');
}
