/**
 * Draft outliner: the cheapest fidelity that still says something about a
 * guideline. Detects the clinical specialty and pulls recommendation
 * sentences out of the text with fixed patterns.
 *
 * Purely lexical. No scoring, no generation, no size limit.
 */

import type { GuidelineDocument } from '../types/coverage.js';
import type {
  DecisionPattern,
  DecisionPoint,
  DraftOutline,
  Specialty,
} from '../types/draft.js';
import type { TaxonomyRegistry } from '../taxonomy/registry.js';

// ============================================================================
// Specialty detection
// ============================================================================

/** Checked in order; the first hit wins. */
const SPECIALTY_PATTERNS: ReadonlyArray<[Exclude<Specialty, 'general'>, RegExp]> = [
  ['cardiology', /heart|cardiac|atrial|ventricular|coronary|afib|arrhythmia/i],
  ['oncology', /cancer|tumor|carcinoma|lymphoma|leukemia|metastasis|chemotherapy/i],
  ['endocrinology', /diabetes|thyroid|hormone|endocrine|insulin/i],
  ['pulmonology', /lung|pulmonary|respiratory|asthma|copd/i],
];

export function detectSpecialty(text: string): Specialty {
  for (const [specialty, pattern] of SPECIALTY_PATTERNS) {
    if (pattern.test(text)) {
      return specialty;
    }
  }
  return 'general';
}

// ============================================================================
// Decision points
// ============================================================================

interface DecisionRule {
  pattern: DecisionPattern;
  regex: RegExp;
  toPoint: (first: string, second: string) => Omit<DecisionPoint, 'pattern'>;
}

const DECISION_RULES: readonly DecisionRule[] = [
  {
    pattern: 'for-patients-recommend',
    regex: /\bfor patients with ([^,.]*?), recommend ([^.]*?)\./gi,
    toPoint: (condition, action) => ({ action, patient_criteria: [condition] }),
  },
  {
    pattern: 'recommend-for-patients',
    regex: /\brecommend ([^.]*) for patients with ([^.]*?)\./gi,
    toPoint: (action, condition) => ({ action, patient_criteria: [condition] }),
  },
  {
    pattern: 'order-for-patients',
    regex: /\border ([^.]*) for patients with ([^.]*?)\./gi,
    toPoint: (action, condition) => ({ action, patient_criteria: [condition] }),
  },
  {
    pattern: 'order-for',
    regex: /\border ([^.]*) for ([^.]*?)\./gi,
    toPoint: (action, purpose) => ({ action, patient_criteria: [purpose] }),
  },
  {
    pattern: 'monitor-patients-for',
    regex: /\bmonitor patients with ([^,.]*?) for ([^.]*?)\./gi,
    toPoint: (condition, target) => ({
      action: `monitor for ${target}`,
      patient_criteria: [condition],
    }),
  },
];

/**
 * Extract decision points in rule order, then text order within a rule.
 *
 * A sentence claimed by an earlier rule is not reported again by a later,
 * more general one ("Order X for patients with Y." is not also an
 * "Order X for Y."). Identical action/criteria pairs are reported once.
 */
export function extractDecisionPoints(text: string): DecisionPoint[] {
  const claimedStarts = new Set<number>();
  const seen = new Set<string>();
  const points: DecisionPoint[] = [];

  for (const rule of DECISION_RULES) {
    for (const match of text.matchAll(rule.regex)) {
      const start = match.index ?? 0;
      if (claimedStarts.has(start)) continue;

      const first = (match[1] ?? '').trim();
      const second = (match[2] ?? '').trim();
      if (first.length === 0 || second.length === 0) continue;

      const point = { ...rule.toPoint(first, second), pattern: rule.pattern };
      const key = `${point.action.toLowerCase()}|${point.patient_criteria.join('|').toLowerCase()}`;
      claimedStarts.add(start);
      if (seen.has(key)) continue;
      seen.add(key);
      points.push(point);
    }
  }

  return points;
}

// ============================================================================
// Outliner
// ============================================================================

export class DraftOutliner {
  /** Without a registry the outline carries no category hints. */
  constructor(private readonly registry?: TaxonomyRegistry) {}

  outline(document: GuidelineDocument): DraftOutline {
    const decisionPoints = extractDecisionPoints(document.source_text);
    return {
      document_name: document.name,
      specialty: detectSpecialty(document.source_text),
      decision_points: decisionPoints,
      category_hints: this.hintCategories(decisionPoints),
    };
  }

  private hintCategories(points: DecisionPoint[]): string[] {
    if (!this.registry || points.length === 0) {
      return [];
    }
    const haystack = points
      .map((p) => [p.action, ...p.patient_criteria].join(' '))
      .join('\n')
      .toLowerCase();

    return this.registry
      .categories()
      .filter((c) => c.match_features.some((f) => haystack.includes(f.phrase.toLowerCase())))
      .map((c) => c.id);
  }
}
