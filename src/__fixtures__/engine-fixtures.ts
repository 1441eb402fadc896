/**
 * Shared fixtures for engine tests: a three-category taxonomy with easy
 * arithmetic, document builders and scripted generators.
 */

import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { dirname } from 'node:path';
import type { GuidelineDocument } from '../types/coverage.js';
import type { CandidateScenario, GenerationConstraints, ScenarioGenerator } from '../types/generation.js';
import type { TaxonomyDefinition, UsageScenarioCategory } from '../types/taxonomy.js';
import { GenerationError } from '../generation/collaborator.js';
import { TaxonomyRegistry } from '../taxonomy/registry.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Directory holding the fixture guideline documents. */
export const FIXTURE_GUIDELINES_DIR = join(__dirname, 'guidelines');

/**
 * A1 (high):   anticoagulation x3, warfarin x1      -> max 4
 * B1 (medium): staging scan x2, pet-ct x2          -> max 4
 * C1 (low):    reminder x1                          -> max 1
 */
export function miniDefinition(): TaxonomyDefinition {
  return {
    version: 1,
    tier_policy: { high: 1, medium: 1, low: 1 },
    categories: [
      {
        id: 'A1',
        slug: 'anticoagulation_choice',
        display_name: 'Anticoagulation Choice',
        priority_tier: 'high',
        group: 'medication_selection',
        match_features: [
          { phrase: 'anticoagulation', weight: 3 },
          { phrase: 'warfarin', weight: 1 },
        ],
      },
      {
        id: 'B1',
        slug: 'staging_workup',
        display_name: 'Staging Workup',
        priority_tier: 'medium',
        group: 'diagnostic_workflow',
        match_features: [
          { phrase: 'staging scan', weight: 2 },
          { phrase: 'pet-ct', weight: 2 },
        ],
      },
      {
        id: 'C1',
        slug: 'visit_reminder',
        display_name: 'Visit Reminder',
        priority_tier: 'low',
        group: 'engagement',
        match_features: [{ phrase: 'reminder', weight: 1 }],
      },
    ],
  };
}

export function miniRegistry(): TaxonomyRegistry {
  return TaxonomyRegistry.fromDefinition(miniDefinition(), { expectedSize: null });
}

export function makeDocument(
  name: string,
  text: string,
  domain = 'cardiology',
): GuidelineDocument {
  return {
    name,
    source_text: text,
    domain_tag: domain,
    byte_size: Buffer.byteLength(text, 'utf-8'),
  };
}

/** Rejects every call. */
export class FailingGenerator implements ScenarioGenerator {
  calls: string[] = [];

  async generate(
    _document: GuidelineDocument,
    category: UsageScenarioCategory,
  ): Promise<CandidateScenario[]> {
    this.calls.push(category.id);
    throw new GenerationError(`generator offline for ${category.id}`, category.id);
  }
}

/**
 * Returns one scenario per call whose text is `textFor(category)`.
 * Records every call with its constraints.
 */
export class ScriptedGenerator implements ScenarioGenerator {
  calls: Array<{ categoryId: string; constraints: GenerationConstraints }> = [];

  constructor(private textFor: (category: UsageScenarioCategory) => string) {}

  async generate(
    _document: GuidelineDocument,
    category: UsageScenarioCategory,
    constraints: GenerationConstraints,
  ): Promise<CandidateScenario[]> {
    this.calls.push({ categoryId: category.id, constraints });
    return [
      {
        id: `${category.id}-gen-${this.calls.length}`,
        category_id: category.id,
        title: `Generated ${category.display_name}`,
        text: this.textFor(category),
      },
    ];
  }
}
