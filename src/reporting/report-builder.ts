/**
 * Builds per-document comparison reports and the comprehensive batch
 * report from finished FidelityRuns.
 *
 * Pure: every input (runs, timestamp, configuration) is passed in, so the
 * same runs always give the same report. Timing statistics use
 * simple-statistics over successful runs only.
 */

import { max, mean, median, min } from 'simple-statistics';
import type { CoverageReport } from '../types/coverage.js';
import type { FidelityLevel, FidelityPayload, FidelityRun } from '../types/fidelity.js';
import type {
  ComprehensiveReport,
  DocumentComparisonReport,
  LevelCharacteristics,
  LevelConsistency,
  PerformanceBucket,
  PerformanceSummary,
  QualitativeAnalysis,
  QuantitativeComparison,
  TimingStats,
} from '../types/report.js';
import { compareLevels, ladderIndex } from '../fidelity/ladder.js';

/** Success rate above which a level counts as consistent across documents. */
export const CONSISTENCY_THRESHOLD = 0.8;

export interface DocumentInfo {
  name: string;
  domain_tag: string;
}

export interface ReportContext {
  timestamp: string;
  concurrency: number;
  target_threshold: number;
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

function successfulTimes(runs: readonly FidelityRun[]): number[] {
  return runs.filter((r) => r.success).map((r) => r.execution_time);
}

function averageTime(runs: readonly FidelityRun[]): number {
  const times = successfulTimes(runs);
  return times.length > 0 ? round(mean(times)) : 0;
}

function successRate(runs: readonly FidelityRun[]): number {
  return runs.length > 0 ? round(runs.filter((r) => r.success).length / runs.length) : 0;
}

export function isDegraded(run: FidelityRun): boolean {
  return run.success && run.fidelity_level !== run.requested_level;
}

/**
 * Runs ordered by document name, then ladder position of the requested
 * level.
 */
export function sortRuns(runs: readonly FidelityRun[]): FidelityRun[] {
  return [...runs].sort((a, b) => {
    if (a.document_name !== b.document_name) {
      return a.document_name < b.document_name ? -1 : 1;
    }
    return compareLevels(a.requested_level, b.requested_level);
  });
}

/** Coverage report carried by a payload, if its level produces one. */
export function coverageOf(payload: FidelityPayload | null): CoverageReport | null {
  if (payload === null) return null;
  switch (payload.kind) {
    case 'evaluation-only':
    case 'table':
    case 'full':
    case 'full-fhir':
      return payload.report;
    case 'sequential':
      return payload.result.report;
    case 'draft':
    case 'none':
      return null;
  }
}

// ============================================================================
// Per-document report
// ============================================================================

export function buildQuantitativeComparison(runs: readonly FidelityRun[]): QuantitativeComparison {
  const executionTimes: QuantitativeComparison['execution_times'] = {};
  const resultSizes: QuantitativeComparison['result_sizes'] = {};
  for (const run of runs) {
    executionTimes[run.requested_level] = run.execution_time;
    if (run.success && run.result_payload !== null) {
      resultSizes[run.requested_level] = JSON.stringify(run.result_payload).length;
    }
  }

  const times = successfulTimes(runs);
  const timing: TimingStats | null = times.length > 0
    ? {
        mean_execution_time: round(mean(times)),
        median_execution_time: round(median(times)),
        min_execution_time: round(min(times)),
        max_execution_time: round(max(times)),
      }
    : null;

  return {
    execution_times: executionTimes,
    success_rate: successRate(runs),
    timing,
    result_sizes: resultSizes,
  };
}

export function buildQualitativeAnalysis(runs: readonly FidelityRun[]): QualitativeAnalysis {
  const characteristics: QualitativeAnalysis['level_characteristics'] = {};
  for (const run of runs) {
    const entry: LevelCharacteristics = {
      requested_level: run.requested_level,
      achieved_level: run.fidelity_level,
      execution_time: run.execution_time,
      fallback_count: run.fallbacks.length,
      payload_kind: run.result_payload?.kind ?? null,
    };
    characteristics[run.requested_level] = entry;
  }

  let speedVsDepth: QualitativeAnalysis['speed_vs_depth'] = null;
  if (runs.length >= 2) {
    const byTime = [...runs].sort(
      (a, b) => a.execution_time - b.execution_time || compareLevels(a.requested_level, b.requested_level),
    );
    const fastest = byTime[0];
    const slowest = byTime[byTime.length - 1];
    if (fastest && slowest) {
      speedVsDepth = {
        fastest_level: fastest.requested_level,
        slowest_level: slowest.requested_level,
        time_difference: round(slowest.execution_time - fastest.execution_time),
      };
    }
  }

  return {
    level_characteristics: characteristics,
    speed_vs_depth: speedVsDepth,
    degraded_levels: runs.filter(isDegraded).map((r) => r.requested_level),
    failed_levels: runs.filter((r) => !r.success).map((r) => r.requested_level),
  };
}

function documentRecommendations(
  runs: readonly FidelityRun[],
  coverage: CoverageReport | null,
  threshold: number,
): string[] {
  const recommendations: string[] = [];
  const succeeded = runs.filter((r) => r.success).map((r) => r.requested_level);
  const failed = runs.filter((r) => !r.success).map((r) => r.requested_level);

  if (succeeded.length === 0) {
    recommendations.push('No fidelity level succeeded; check the generator and the document');
  } else if (failed.length === 0) {
    recommendations.push(`All requested levels (${succeeded.join(', ')}) succeeded`);
  }
  if (failed.length > 0) {
    recommendations.push(`Failed levels (${failed.join(', ')}) need investigation`);
  }

  for (const run of runs.filter(isDegraded)) {
    const reason = run.fallbacks[0]?.reason ?? 'unknown';
    recommendations.push(
      `${run.requested_level} degraded to ${run.fidelity_level ?? 'nothing'} (${reason})`,
    );
  }

  if (coverage !== null) {
    const below = Object.values(coverage.scores).filter((s) => s.score < threshold).length;
    if (below > 0) {
      recommendations.push(
        `${below} categories score below the ${threshold} target; the sequential level targets them in priority order`,
      );
    }
  }

  return recommendations;
}

/**
 * Comparison report for one document across its requested levels.
 */
export function buildDocumentReport(
  document: DocumentInfo,
  runs: readonly FidelityRun[],
  context: ReportContext,
): DocumentComparisonReport {
  const sorted = sortRuns(runs.filter((r) => r.document_name === document.name));

  const fidelityResults: DocumentComparisonReport['fidelity_results'] = {};
  for (const run of sorted) {
    fidelityResults[run.requested_level] = run;
  }

  // Highest achieved fidelity wins
  const coverageRun = sorted
    .filter((r) => r.success && r.fidelity_level !== null && coverageOf(r.result_payload) !== null)
    .sort((a, b) => ladderIndex(a.fidelity_level ?? 'none') - ladderIndex(b.fidelity_level ?? 'none'))[0];
  const coverage = coverageRun ? coverageOf(coverageRun.result_payload) : null;

  return {
    document_name: document.name,
    domain_tag: document.domain_tag,
    timestamp: context.timestamp,
    coverage,
    fidelity_results: fidelityResults,
    quantitative_comparison: buildQuantitativeComparison(sorted),
    qualitative_analysis: buildQualitativeAnalysis(sorted),
    recommendations: documentRecommendations(sorted, coverage, context.target_threshold),
  };
}

// ============================================================================
// Comprehensive report
// ============================================================================

function bucket(runs: readonly FidelityRun[]): PerformanceBucket {
  return {
    total_runs: runs.length,
    successful_runs: runs.filter((r) => r.success).length,
    success_rate: successRate(runs),
    average_time: averageTime(runs),
  };
}

export function buildPerformanceSummary(
  runs: readonly FidelityRun[],
  levels: readonly FidelityLevel[],
  documents: readonly string[],
): PerformanceSummary {
  const byLevel: PerformanceSummary['performance_by_level'] = {};
  for (const level of levels) {
    byLevel[level] = bucket(runs.filter((r) => r.requested_level === level));
  }
  const byDocument: PerformanceSummary['performance_by_document'] = {};
  for (const name of documents) {
    byDocument[name] = bucket(runs.filter((r) => r.document_name === name));
  }

  const successful = runs.filter((r) => r.success).length;
  return {
    total_runs: runs.length,
    successful_runs: successful,
    failed_runs: runs.length - successful,
    cancelled_runs: runs.filter((r) => r.state === 'cancelled').length,
    degraded_runs: runs.filter(isDegraded).length,
    average_execution_time: averageTime(runs),
    performance_by_level: byLevel,
    performance_by_document: byDocument,
  };
}

export function buildLevelConsistency(
  runs: readonly FidelityRun[],
  levels: readonly FidelityLevel[],
): Partial<Record<FidelityLevel, LevelConsistency>> {
  const consistency: Partial<Record<FidelityLevel, LevelConsistency>> = {};
  for (const level of levels) {
    const forLevel = runs.filter((r) => r.requested_level === level);
    if (forLevel.length === 0) continue;
    const rate = successRate(forLevel);
    consistency[level] = {
      success_rate: rate,
      average_execution_time: averageTime(forLevel),
      consistent_performance: rate > CONSISTENCY_THRESHOLD,
    };
  }
  return consistency;
}

export function buildOverallRecommendations(
  runs: readonly FidelityRun[],
  levels: readonly FidelityLevel[],
): string[] {
  const recommendations: string[] = [];
  const performance = levels
    .map((level) => {
      const forLevel = runs.filter((r) => r.requested_level === level);
      return { level, total: forLevel.length, rate: successRate(forLevel), avg: averageTime(forLevel), forLevel };
    })
    .filter((p) => p.forLevel.some((r) => r.success));

  if (performance.length === 0) {
    recommendations.push('No fidelity level succeeded; check the generator and the documents');
  } else {
    const fastest = [...performance].sort(
      (a, b) => a.avg - b.avg || b.rate - a.rate || ladderIndex(a.level) - ladderIndex(b.level),
    )[0];
    const reliable = [...performance].sort(
      (a, b) => b.rate - a.rate || ladderIndex(a.level) - ladderIndex(b.level),
    )[0];
    if (fastest) {
      recommendations.push(`Fastest reliable level: ${fastest.level} (${fastest.avg.toFixed(2)}s avg)`);
    }
    if (reliable) {
      recommendations.push(`Most reliable level: ${reliable.level} (${percent(reliable.rate)} success rate)`);
    }
  }

  for (const level of levels) {
    const forLevel = runs.filter((r) => r.requested_level === level);
    const degraded = forLevel.filter(isDegraded).length;
    if (degraded > 0) {
      recommendations.push(`Fallback hot-spot: ${level} degraded in ${degraded}/${forLevel.length} runs`);
    }
  }

  const cancelled = runs.filter((r) => r.state === 'cancelled').length;
  if (cancelled > 0) {
    recommendations.push(`${cancelled} runs were cancelled before completion`);
  }

  return recommendations;
}

/**
 * The comprehensive report over every run of a batch.
 */
export function buildComprehensiveReport(
  documents: readonly DocumentInfo[],
  levels: readonly FidelityLevel[],
  runs: readonly FidelityRun[],
  context: ReportContext,
): ComprehensiveReport {
  const sorted = sortRuns(runs);
  const documentNames = [...new Set(documents.map((d) => d.name))].sort();
  const levelsTested = [...new Set(levels)].sort(compareLevels);

  const individual: Record<string, DocumentComparisonReport> = {};
  for (const name of documentNames) {
    const info = documents.find((d) => d.name === name) ?? { name, domain_tag: 'general' };
    individual[name] = buildDocumentReport(info, sorted, context);
  }

  return Object.freeze({
    timestamp: context.timestamp,
    test_configuration: {
      documents: documentNames,
      fidelity_levels: levelsTested,
      total_combinations: documentNames.length * levelsTested.length,
      concurrency: context.concurrency,
      target_threshold: context.target_threshold,
    },
    documents_tested: documentNames,
    fidelity_levels_tested: levelsTested,
    runs: sorted,
    individual_reports: individual,
    cross_document_analysis: {
      level_consistency: buildLevelConsistency(sorted, levelsTested),
    },
    performance_summary: buildPerformanceSummary(sorted, levelsTested, documentNames),
    recommendations: buildOverallRecommendations(sorted, levelsTested),
  });
}
