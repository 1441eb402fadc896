/**
 * Coverage aggregator: runs the Matcher for every registry category and
 * assembles a CoverageReport.
 *
 * Guarantees total coverage: the report's score keys are exactly the
 * registry's category ids. Evaluating the same document twice yields the
 * same scores and overall coverage; only `timestamp` differs.
 */

import type {
  CoverageReport,
  GapEntry,
  GuidelineDocument,
  RobustnessScore,
} from '../types/coverage.js';
import { Matcher, roundScore } from '../matching/matcher.js';
import type { TaxonomyRegistry } from '../taxonomy/registry.js';
import { buildGapList } from './gap-list.js';

/**
 * A report whose key set differs from the registry. Indicates a bug in
 * the caller, never bad input data.
 */
export class CoverageContractError extends Error {
  override name = 'CoverageContractError' as const;

  constructor(
    message: string,
    public readonly missing: string[],
    public readonly unexpected: string[],
  ) {
    super(message);
  }
}

export interface CoverageAggregatorOptions {
  matcher?: Matcher;
  /** Timestamp source (default: current time) */
  clock?: () => Date;
}

export class CoverageAggregator {
  private readonly matcher: Matcher;
  private readonly clock: () => Date;

  constructor(
    private readonly registry: TaxonomyRegistry,
    options: CoverageAggregatorOptions = {},
  ) {
    this.matcher = options.matcher ?? new Matcher();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Score the document against every category (one Matcher call each).
   */
  evaluate(document: GuidelineDocument): CoverageReport {
    const scores = this.registry
      .categories()
      .map((category) => this.matcher.score(document, category));
    return this.assemble(document.name, scores);
  }

  /** Ranked gaps below `threshold`. */
  gapList(report: CoverageReport, threshold: number): GapEntry[] {
    return buildGapList(report, this.registry, threshold);
  }

  /**
   * New report with one category re-scored against `document`; every other
   * score is carried over from `report`.
   */
  rescore(report: CoverageReport, document: GuidelineDocument, categoryId: string): CoverageReport {
    const category = this.registry.get(categoryId);
    const fresh = this.matcher.score(document, category);
    const scores = this.registry
      .ids()
      .map((id) => (id === categoryId ? fresh : report.scores[id]))
      .filter((s): s is RobustnessScore => s !== undefined);
    return this.assemble(report.document_name, scores);
  }

  /**
   * Build a report from one score per category.
   *
   * @throws {CoverageContractError} When the scores do not cover the registry exactly
   */
  assemble(documentName: string, scores: RobustnessScore[]): CoverageReport {
    const byId: Record<string, RobustnessScore> = {};
    for (const score of scores) {
      byId[score.category_id] = score;
    }

    const ids = this.registry.ids();
    const missing = ids.filter((id) => !(id in byId));
    const unexpected = Object.keys(byId).filter((id) => !this.registry.has(id));
    if (missing.length > 0 || unexpected.length > 0 || scores.length !== ids.length) {
      throw new CoverageContractError(
        `Coverage report for "${documentName}" does not match the taxonomy ` +
          `(missing: ${missing.join(', ') || 'none'}; unexpected: ${unexpected.join(', ') || 'none'})`,
        missing,
        unexpected,
      );
    }

    // Insert in registry order so serialized reports have a stable key order
    const ordered: Record<string, RobustnessScore> = {};
    let total = 0;
    for (const id of ids) {
      const score = byId[id];
      ordered[id] = score;
      total += score.score;
    }

    return Object.freeze({
      document_name: documentName,
      scores: Object.freeze(ordered),
      overall_coverage: ids.length > 0 ? roundScore(total / ids.length) : 0,
      timestamp: this.clock().toISOString(),
    });
  }
}
