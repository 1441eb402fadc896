/**
 * Terminal tables for the CLI: batch runs, coverage reports and the
 * taxonomy listing. Color-coded with picocolors.
 */

import pc from 'picocolors';
import type { CoverageReport, GapEntry } from '../types/coverage.js';
import type { FidelityRun } from '../types/fidelity.js';
import type { PriorityTier, UsageScenarioCategory } from '../types/taxonomy.js';

/**
 * Right-pad to `width` visible characters.
 */
export function pad(str: string, width: number): string {
  // Strip ANSI codes for length calculation
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const diff = width - stripped.length;
  return diff > 0 ? str + ' '.repeat(diff) : str;
}

function truncate(str: string, width: number): string {
  return str.length > width - 2 ? str.slice(0, width - 5) + '...' : str;
}

/** Green at or above the threshold, yellow above zero, red at zero. */
export function colorScore(score: number, threshold: number): string {
  const str = score.toFixed(2);
  if (score >= threshold) return pc.green(str);
  if (score > 0) return pc.yellow(str);
  return pc.red(str);
}

function colorTier(tier: PriorityTier): string {
  if (tier === 'high') return pc.red(tier);
  if (tier === 'medium') return pc.yellow(tier);
  return pc.dim(tier);
}

function colorState(run: FidelityRun): string {
  if (run.state === 'cancelled') return pc.dim('cancelled');
  if (run.state === 'failed') return pc.red('failed');
  if (run.fidelity_level !== run.requested_level) return pc.yellow('degraded');
  return pc.green('succeeded');
}

export function formatRunTable(runs: readonly FidelityRun[]): string {
  const cols = { document: 24, requested: 17, achieved: 17, state: 12, time: 10 };
  const lines: string[] = [
    pc.dim(
      [
        pad('Document', cols.document),
        pad('Requested', cols.requested),
        pad('Achieved', cols.achieved),
        pad('State', cols.state),
        pad('Time', cols.time),
        'Fallbacks',
      ].join(''),
    ),
    pc.dim('─'.repeat(88)),
  ];

  for (const run of runs) {
    lines.push(
      [
        pad(truncate(run.document_name, cols.document), cols.document),
        pad(run.requested_level, cols.requested),
        pad(run.fidelity_level ?? pc.dim('-'), cols.achieved),
        pad(colorState(run), cols.state),
        pad(`${run.execution_time.toFixed(3)}s`, cols.time),
        String(run.fallbacks.length),
      ].join(''),
    );
  }
  return lines.join('\n');
}

export function formatCoverageReport(
  report: CoverageReport,
  gaps: readonly GapEntry[],
  categories: readonly UsageScenarioCategory[],
  threshold: number,
): string {
  const cols = { id: 8, name: 34, tier: 9, score: 8 };
  const lines: string[] = [
    pc.bold(`Coverage: ${report.document_name}`),
    '═'.repeat(72),
    pc.dim(
      [pad('ID', cols.id), pad('Category', cols.name), pad('Tier', cols.tier), pad('Score', cols.score), 'Matched'].join(''),
    ),
    pc.dim('─'.repeat(72)),
  ];

  for (const category of categories) {
    const score = report.scores[category.id];
    if (!score) continue;
    lines.push(
      [
        pad(category.id, cols.id),
        pad(truncate(category.display_name, cols.name), cols.name),
        pad(colorTier(category.priority_tier), cols.tier),
        pad(colorScore(score.score, threshold), cols.score),
        score.matched_features.join(', ') || pc.dim('-'),
      ].join(''),
    );
  }

  lines.push(pc.dim('─'.repeat(72)));
  lines.push(`Overall coverage: ${colorScore(report.overall_coverage, threshold)}`);
  lines.push('');

  if (gaps.length === 0) {
    lines.push(pc.green(`No gaps below ${threshold}`));
  } else {
    lines.push(pc.bold(`Gaps below ${threshold} (${gaps.length})`));
    for (const gap of gaps) {
      lines.push(
        `  ${pad(`#${gap.priority_rank}`, 5)}${pad(gap.category_id, cols.id)}` +
          `${pad(colorTier(gap.priority_tier), cols.tier)}gap ${gap.gap_size.toFixed(2)}`,
      );
    }
  }
  return lines.join('\n');
}

export function formatTaxonomy(categories: readonly UsageScenarioCategory[]): string {
  const cols = { id: 8, name: 34, tier: 9, group: 28 };
  const lines: string[] = [
    pc.dim([pad('ID', cols.id), pad('Category', cols.name), pad('Tier', cols.tier), pad('Group', cols.group), 'Features'].join('')),
    pc.dim('─'.repeat(88)),
  ];
  for (const category of categories) {
    lines.push(
      [
        pad(category.id, cols.id),
        pad(truncate(category.display_name, cols.name), cols.name),
        pad(colorTier(category.priority_tier), cols.tier),
        pad(category.group, cols.group),
        String(category.match_features.length),
      ].join(''),
    );
  }
  return lines.join('\n');
}
