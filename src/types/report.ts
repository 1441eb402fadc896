/**
 * Report types for batch output: per-document comparison reports and the
 * comprehensive batch report.
 *
 * Persisted as JSON. Field names are part of the external diffing contract.
 */

import type { CoverageReport } from './coverage.js';
import type { FidelityLevel, FidelityRun } from './fidelity.js';

export interface TimingStats {
  mean_execution_time: number;
  median_execution_time: number;
  min_execution_time: number;
  max_execution_time: number;
}

export interface QuantitativeComparison {
  /** Seconds, keyed by requested level */
  execution_times: Partial<Record<FidelityLevel, number>>;
  /** Share of successful runs, 0-1 */
  success_rate: number;
  /** Null when no run succeeded */
  timing: TimingStats | null;
  /** Serialized payload length, keyed by requested level (successful runs only) */
  result_sizes: Partial<Record<FidelityLevel, number>>;
}

export interface LevelCharacteristics {
  requested_level: FidelityLevel;
  achieved_level: FidelityLevel | null;
  execution_time: number;
  fallback_count: number;
  payload_kind: string | null;
}

export interface QualitativeAnalysis {
  level_characteristics: Partial<Record<FidelityLevel, LevelCharacteristics>>;
  speed_vs_depth: {
    fastest_level: FidelityLevel;
    slowest_level: FidelityLevel;
    time_difference: number;
  } | null;
  degraded_levels: FidelityLevel[];
  failed_levels: FidelityLevel[];
}

export interface DocumentComparisonReport {
  document_name: string;
  domain_tag: string;
  timestamp: string;
  /** Coverage from the highest-fidelity successful run that produced one */
  coverage: CoverageReport | null;
  fidelity_results: Partial<Record<FidelityLevel, FidelityRun>>;
  quantitative_comparison: QuantitativeComparison;
  qualitative_analysis: QualitativeAnalysis;
  recommendations: string[];
}

export interface LevelConsistency {
  success_rate: number;
  average_execution_time: number;
  consistent_performance: boolean;
}

export interface PerformanceBucket {
  total_runs: number;
  successful_runs: number;
  success_rate: number;
  average_time: number;
}

export interface PerformanceSummary {
  total_runs: number;
  successful_runs: number;
  failed_runs: number;
  cancelled_runs: number;
  degraded_runs: number;
  average_execution_time: number;
  performance_by_level: Partial<Record<FidelityLevel, PerformanceBucket>>;
  performance_by_document: Record<string, PerformanceBucket>;
}

export interface ComprehensiveReport {
  timestamp: string;
  test_configuration: {
    documents: string[];
    fidelity_levels: FidelityLevel[];
    total_combinations: number;
    concurrency: number;
    target_threshold: number;
  };
  documents_tested: string[];
  fidelity_levels_tested: FidelityLevel[];
  /** Sorted by (document_name, ladder index of requested level) */
  runs: FidelityRun[];
  individual_reports: Record<string, DocumentComparisonReport>;
  cross_document_analysis: {
    level_consistency: Partial<Record<FidelityLevel, LevelConsistency>>;
  };
  performance_summary: PerformanceSummary;
  recommendations: string[];
}
