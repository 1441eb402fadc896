/**
 * Explicit taxonomy-edit operation.
 *
 * The only way tier assignments, tier counts or match features change.
 * Edits apply in order to a copy of the registry's definition and the
 * result is validated as a whole, so an edit batch that moves a category
 * between tiers must also adjust the policy in the same batch.
 */

import type { MatchFeature, PriorityTier, TierPolicy } from '../types/taxonomy.js';
import { NotFoundError, TaxonomyRegistry, type RegistryOptions } from './registry.js';

export type TaxonomyEdit =
  | { op: 'set_tier'; category_id: string; tier: PriorityTier }
  | { op: 'set_features'; category_id: string; features: MatchFeature[] }
  | { op: 'set_policy'; policy: TierPolicy };

/**
 * Apply edits and return a new registry. The source registry is untouched.
 *
 * @throws {NotFoundError} When an edit names an unknown category
 * @throws {InvalidCategoryError} When the edited taxonomy fails validation
 */
export function editTaxonomy(
  registry: TaxonomyRegistry,
  edits: TaxonomyEdit[],
  options?: RegistryOptions,
): TaxonomyRegistry {
  const definition = registry.toDefinition();

  for (const edit of edits) {
    if (edit.op === 'set_policy') {
      definition.tier_policy = { ...edit.policy };
      continue;
    }

    const target = definition.categories.find((c) => c.id === edit.category_id);
    if (!target) {
      throw new NotFoundError('category', edit.category_id);
    }

    if (edit.op === 'set_tier') {
      target.priority_tier = edit.tier;
    } else {
      target.match_features = edit.features.map((f) => ({ ...f }));
    }
  }

  definition.version += 1;
  return TaxonomyRegistry.fromDefinition(definition, options);
}
