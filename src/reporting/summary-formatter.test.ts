import { describe, it, expect } from 'vitest';
import { formatTextSummary } from './summary-formatter.js';
import { buildComprehensiveReport } from './report-builder.js';
import { REPORT_CONTEXT, REPORT_DOCUMENTS, sampleRuns } from '../__fixtures__/report-fixtures.js';

describe('formatTextSummary', () => {
  const report = buildComprehensiveReport(
    REPORT_DOCUMENTS,
    ['table', 'full', 'evaluation-only'],
    sampleRuns(),
    REPORT_CONTEXT,
  );
  const text = formatTextSummary(report);
  const lines = text.split('\n');

  it('opens with the batch header', () => {
    expect(lines.slice(0, 6)).toEqual([
      'FIDELITY LEVEL SUMMARY',
      '='.repeat(50),
      'Timestamp: 2026-03-01T12:00:00.000Z',
      'Documents Tested: 2',
      'Fidelity Levels Tested: 3',
      'Total Combinations: 6',
    ]);
  });

  it('summarises run outcomes', () => {
    expect(lines).toContain('Successful: 3 (75.0%)');
    expect(lines).toContain('Failed: 1 (25.0%)');
    expect(lines).toContain('Degraded: 1');
    expect(lines).toContain('Average Execution Time: 0.30s');
  });

  it('lists a block per level and per document', () => {
    const start = lines.indexOf('evaluation-only:');
    expect(lines.slice(start, start + 4)).toEqual([
      'evaluation-only:',
      '  Success Rate: 0.0%',
      '  Average Time: 0.00s',
      '  Runs: 0/1',
    ]);

    const afib = lines.indexOf('afib:');
    expect(lines.slice(afib, afib + 4)).toEqual([
      'afib:',
      '  Success Rate: 66.7%',
      '  Average Time: 0.35s',
      '  Runs: 2/3',
    ]);
  });

  it('ends with the recommendations', () => {
    expect(lines.slice(-5)).toEqual([
      '-'.repeat(30),
      '- Fastest reliable level: full (0.30s avg)',
      '- Most reliable level: full (100.0% success rate)',
      '- Fallback hot-spot: full degraded in 1/1 runs',
      '',
    ]);
  });
});
