/**
 * Built-in deterministic scenario generator.
 *
 * Stands in for the external collaborator when none is configured. Each
 * call yields a single candidate scenario seeded with the category's match
 * phrases and the document's domain, which is enough to exercise
 * regeneration and re-scoring end to end.
 *
 * It has no FHIR serializer, so `output_format: 'fhir'` is rejected with
 * GenerationError and full-fhir runs fall back to `full`.
 */

import type { GuidelineDocument } from '../types/coverage.js';
import type {
  CandidateScenario,
  GenerationConstraints,
  ScenarioGenerator,
} from '../types/generation.js';
import type { UsageScenarioCategory } from '../types/taxonomy.js';
import { GenerationError } from './collaborator.js';

export class FeatureSeededGenerator implements ScenarioGenerator {
  async generate(
    document: GuidelineDocument,
    category: UsageScenarioCategory,
    constraints: GenerationConstraints,
  ): Promise<CandidateScenario[]> {
    if (constraints.output_format === 'fhir') {
      throw new GenerationError(
        'FHIR output is not supported by the built-in generator',
        category.id,
      );
    }
    if (constraints.max_candidates === 0) {
      return [];
    }

    const phrases = category.match_features.map((f) => f.phrase);
    const text = [
      `Scenario: ${category.display_name} in ${document.domain_tag}.`,
      `Given a ${document.domain_tag} patient covered by ${document.name},`,
      `when the clinician considers ${phrases.join(', ')},`,
      `then the decision support addresses ${category.slug.replace(/_/g, ' ')}.`,
    ].join(' ');

    return [
      {
        id: `${document.name}-${category.id}-seeded`,
        category_id: category.id,
        title: `${category.display_name} (${document.domain_tag})`,
        text,
      },
    ];
  }
}
