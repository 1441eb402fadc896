/**
 * Hand-built FidelityRuns for report tests. Times are chosen so means and
 * medians are easy to check by hand.
 */

import type { FidelityRun } from '../types/fidelity.js';
import { CoverageAggregator } from '../coverage/coverage-aggregator.js';
import { InventoryBuilder } from '../inventory/inventory-builder.js';
import { makeDocument, miniRegistry } from './engine-fixtures.js';

export const REPORT_TIMESTAMP = '2026-03-01T12:00:00.000Z';

export const REPORT_CONTEXT = {
  timestamp: REPORT_TIMESTAMP,
  concurrency: 2,
  target_threshold: 0.5,
};

export const REPORT_DOCUMENTS = [
  { name: 'breast', domain_tag: 'oncology' },
  { name: 'afib', domain_tag: 'cardiology' },
];

export function makeRun(overrides: Partial<FidelityRun> & Pick<FidelityRun, 'document_name' | 'requested_level'>): FidelityRun {
  return {
    fidelity_level: overrides.requested_level,
    execution_time: 0,
    success: true,
    state: 'succeeded',
    result_payload: { kind: 'none', skipped: true },
    fallback_from: null,
    fallbacks: [],
    error_message: null,
    ...overrides,
  };
}

/**
 * afib/full        degraded to draft, 0.3s
 * afib/table       succeeded, 0.4s, A1 = 0.25, B1 = C1 = 0
 * afib/eval-only   failed, 0.1s
 * breast/table     succeeded, 0.2s
 */
export function sampleRuns(): FidelityRun[] {
  const registry = miniRegistry();
  const clock = () => new Date(REPORT_TIMESTAMP);
  const aggregator = new CoverageAggregator(registry, { clock });
  const inventory = new InventoryBuilder(registry, { clock, syntheticPolicy: { mode: 'none' } });

  const afib = makeDocument('afib', 'Start warfarin.');
  const afibReport = aggregator.evaluate(afib);
  const breast = makeDocument('breast', 'Order a staging scan.', 'oncology');
  const breastReport = aggregator.evaluate(breast);

  return [
    makeRun({
      document_name: 'breast',
      requested_level: 'table',
      execution_time: 0.2,
      result_payload: { kind: 'table', report: breastReport, inventory: inventory.build(breastReport, breast) },
    }),
    makeRun({
      document_name: 'afib',
      requested_level: 'evaluation-only',
      fidelity_level: null,
      execution_time: 0.1,
      success: false,
      state: 'failed',
      result_payload: null,
      fallbacks: [{ from: 'evaluation-only', to: null, reason: 'Error: scorer crashed' }],
      error_message: 'Error: scorer crashed',
    }),
    makeRun({
      document_name: 'afib',
      requested_level: 'table',
      execution_time: 0.4,
      result_payload: { kind: 'table', report: afibReport, inventory: inventory.build(afibReport, afib) },
    }),
    makeRun({
      document_name: 'afib',
      requested_level: 'full',
      fidelity_level: 'draft',
      execution_time: 0.3,
      result_payload: {
        kind: 'draft',
        outline: { document_name: 'afib', specialty: 'cardiology', decision_points: [], category_hints: [] },
      },
      fallback_from: 'evaluation-only',
      fallbacks: [
        { from: 'full', to: 'sequential', reason: 'GenerationError: offline' },
        { from: 'sequential', to: 'table', reason: 'GenerationError: offline' },
        { from: 'table', to: 'evaluation-only', reason: 'Error: boom' },
        { from: 'evaluation-only', to: 'draft', reason: 'Error: boom' },
      ],
    }),
  ];
}
