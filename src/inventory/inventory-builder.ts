/**
 * Inventory builder ("table" fidelity).
 *
 * Turns a CoverageReport into a flat scenario table: one row per category
 * that scored above zero, plus synthetic placeholder rows for zero-score
 * categories selected by the synthetic policy.
 *
 * A row is complete when none of its fifteen metadata fields is empty.
 * The inventory succeeds when the share of complete rows reaches the
 * completion target (an empty inventory counts as complete).
 */

import type { CoverageReport, GuidelineDocument, RobustnessScore } from '../types/coverage.js';
import type { DecisionPoint } from '../types/draft.js';
import {
  INVENTORY_METADATA_FIELDS,
  type InventoryEntry,
  type InventoryResult,
  type SyntheticPolicy,
} from '../types/inventory.js';
import type { UsageScenarioCategory } from '../types/taxonomy.js';
import { roundScore } from '../matching/matcher.js';
import { extractDecisionPoints } from '../drafting/draft-outliner.js';
import type { TaxonomyRegistry } from '../taxonomy/registry.js';
import { personaFor } from './personas.js';

export const DEFAULT_COMPLETION_TARGET = 0.95;

export const DEFAULT_SYNTHETIC_POLICY: SyntheticPolicy = {
  mode: 'tiers',
  tiers: ['high', 'medium'],
};

export const SYNTHETIC_SECTION = 'not present in guideline';

/** Section of a matched row whose phrase precedes every heading. */
export const BODY_SECTION = 'body';

export interface InventoryBuilderOptions {
  syntheticPolicy?: SyntheticPolicy;
  /** SUCCESS threshold for completion_rate, 0-1 */
  completionTarget?: number;
  /** Source of created_date (default: current time) */
  clock?: () => Date;
}

const HEADING_PATTERN = /^#{1,6}\s+(.+?)\s*#*\s*$/gm;

export function includesSynthetic(policy: SyntheticPolicy, category: UsageScenarioCategory): boolean {
  switch (policy.mode) {
    case 'all':
      return true;
    case 'none':
      return false;
    case 'tiers':
      return policy.tiers.includes(category.priority_tier);
  }
}

/**
 * Heading of the section that contains the first occurrence of `phrase`,
 * or '' when the phrase is absent or precedes every heading.
 */
export function sectionFor(text: string, phrase: string): string {
  const position = text.toLowerCase().indexOf(phrase.toLowerCase());
  if (position < 0) {
    return '';
  }
  let section = '';
  for (const match of text.matchAll(HEADING_PATTERN)) {
    if ((match.index ?? 0) > position) break;
    section = (match[1] ?? '').trim();
  }
  return section;
}

function complexityFor(matchedCount: number): string {
  if (matchedCount >= 3) return 'complex';
  if (matchedCount === 2) return 'moderate';
  return 'simple';
}

export function isEntryComplete(entry: InventoryEntry): boolean {
  return INVENTORY_METADATA_FIELDS.every((field) => entry[field].trim().length > 0);
}

export class InventoryBuilder {
  private readonly syntheticPolicy: SyntheticPolicy;
  private readonly completionTarget: number;
  private readonly clock: () => Date;

  constructor(
    private readonly registry: TaxonomyRegistry,
    options: InventoryBuilderOptions = {},
  ) {
    this.syntheticPolicy = options.syntheticPolicy ?? DEFAULT_SYNTHETIC_POLICY;
    this.completionTarget = options.completionTarget ?? DEFAULT_COMPLETION_TARGET;
    this.clock = options.clock ?? (() => new Date());
  }

  build(report: CoverageReport, document: GuidelineDocument): InventoryResult {
    const createdDate = this.clock().toISOString().slice(0, 10);
    const decisionPoints = extractDecisionPoints(document.source_text);
    const entries: InventoryEntry[] = [];

    for (const category of this.registry.categories()) {
      const score = report.scores[category.id];
      if (score !== undefined && score.score > 0) {
        entries.push(this.matchedEntry(category, score, document, decisionPoints, createdDate));
      } else if (includesSynthetic(this.syntheticPolicy, category)) {
        entries.push(this.syntheticEntry(category, document, createdDate));
      }
    }

    const complete = entries.filter(isEntryComplete).length;
    const completionRate = entries.length === 0 ? 1 : roundScore(complete / entries.length);

    const entriesByCategory: Record<string, number> = {};
    for (const entry of entries) {
      entriesByCategory[entry.category_id] = (entriesByCategory[entry.category_id] ?? 0) + 1;
    }

    return {
      document_name: document.name,
      entries,
      completion_rate: completionRate,
      status: completionRate >= this.completionTarget ? 'SUCCESS' : 'PARTIAL_SUCCESS',
      entries_by_category: entriesByCategory,
      synthetic_count: entries.filter((e) => e.synthetic).length,
    };
  }

  private matchedEntry(
    category: UsageScenarioCategory,
    score: RobustnessScore,
    document: GuidelineDocument,
    decisionPoints: DecisionPoint[],
    createdDate: string,
  ): InventoryEntry {
    const matched = score.matched_features.map((p) => p.toLowerCase());
    const point = decisionPoints.find((dp) => {
      const sentence = [dp.action, ...dp.patient_criteria].join(' ').toLowerCase();
      return matched.some((phrase) => sentence.includes(phrase));
    });
    const firstPhrase = score.matched_features[0] ?? '';

    return {
      scenario_id: `${document.name}-${category.id}`,
      category_id: category.id,
      category_name: category.display_name,
      clinical_domain: document.domain_tag,
      persona: personaFor(category.group),
      title: `${category.display_name}: ${document.name}`,
      condition: point?.patient_criteria.join('; ') ?? `${document.domain_tag} patient`,
      decision_point: point?.action ?? category.display_name,
      priority: category.priority_tier,
      complexity: complexityFor(score.matched_features.length),
      fidelity: 'table',
      guideline_name: document.name,
      guideline_section: sectionFor(document.source_text, firstPhrase) || BODY_SECTION,
      created_date: createdDate,
      version: String(this.registry.version),
      match_score: score.score,
      synthetic: false,
    };
  }

  private syntheticEntry(
    category: UsageScenarioCategory,
    document: GuidelineDocument,
    createdDate: string,
  ): InventoryEntry {
    return {
      scenario_id: `${document.name}-${category.id}-synthetic`,
      category_id: category.id,
      category_name: category.display_name,
      clinical_domain: document.domain_tag,
      persona: personaFor(category.group),
      title: `${category.display_name}: ${document.name} (synthetic)`,
      condition: `${document.domain_tag} patient`,
      decision_point: category.display_name,
      priority: category.priority_tier,
      complexity: 'simple',
      fidelity: 'table',
      guideline_name: document.name,
      guideline_section: SYNTHETIC_SECTION,
      created_date: createdDate,
      version: String(this.registry.version),
      match_score: 0,
      synthetic: true,
    };
  }
}
