export {
  buildComprehensiveReport,
  buildDocumentReport,
  buildLevelConsistency,
  buildOverallRecommendations,
  buildPerformanceSummary,
  buildQualitativeAnalysis,
  buildQuantitativeComparison,
  coverageOf,
  isDegraded,
  sortRuns,
  CONSISTENCY_THRESHOLD,
  type DocumentInfo,
  type ReportContext,
} from './report-builder.js';
export { formatTextSummary } from './summary-formatter.js';
export { writeReports, formatStamp, safeFileName, type WriteReportsOptions } from './report-writer.js';
export { formatRunTable, formatCoverageReport, formatTaxonomy, colorScore, pad } from './terminal-formatter.js';
