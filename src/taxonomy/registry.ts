/**
 * Taxonomy registry: the immutable catalog of CDS usage-scenario categories.
 *
 * Built once from a validated TaxonomyDefinition. Every category and
 * feature list is frozen, so the registry can be shared across concurrent
 * runs without synchronization.
 *
 * Load-time checks (all raise InvalidCategoryError):
 * - category count matches the tier policy total (and the expected size)
 * - per-tier counts match the tier policy
 * - ids are unique
 * - every category has at least one match feature
 */

import {
  PRIORITY_TIERS,
  TAXONOMY_SIZE,
  type PriorityTier,
  type TaxonomyDefinition,
  type TierPolicy,
  type UsageScenarioCategory,
} from '../types/taxonomy.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Configuration-time taxonomy error. Fatal: blocks startup.
 */
export class InvalidCategoryError extends Error {
  override name = 'InvalidCategoryError' as const;

  constructor(
    message: string,
    public readonly categoryId?: string,
  ) {
    super(message);
  }
}

/**
 * Lookup of an id that does not exist. Programming error, not a data error.
 */
export class NotFoundError extends Error {
  override name = 'NotFoundError' as const;

  constructor(
    public readonly kind: 'category' | 'document',
    public readonly id: string,
  ) {
    super(`Unknown ${kind} id: "${id}"`);
  }
}

// ============================================================================
// Registry
// ============================================================================

export interface RegistryOptions {
  /** Required category count; null disables the check (default 23) */
  expectedSize?: number | null;
}

export class TaxonomyRegistry {
  readonly version: number;
  readonly policy: Readonly<TierPolicy>;
  private readonly ordered: readonly UsageScenarioCategory[];
  private readonly byId: ReadonlyMap<string, UsageScenarioCategory>;

  private constructor(
    version: number,
    policy: TierPolicy,
    categories: UsageScenarioCategory[],
  ) {
    this.version = version;
    this.policy = Object.freeze({ ...policy });
    this.ordered = Object.freeze(categories);
    this.byId = new Map(categories.map((c) => [c.id, c]));
  }

  /**
   * Validate a definition and build a frozen registry from it.
   *
   * @throws {InvalidCategoryError} When any load-time check fails
   */
  static fromDefinition(
    definition: TaxonomyDefinition,
    options: RegistryOptions = {},
  ): TaxonomyRegistry {
    const expectedSize = options.expectedSize === undefined ? TAXONOMY_SIZE : options.expectedSize;
    const { categories, tier_policy: policy } = definition;

    const seen = new Set<string>();
    for (const category of categories) {
      if (seen.has(category.id)) {
        throw new InvalidCategoryError(`Duplicate category id "${category.id}"`, category.id);
      }
      seen.add(category.id);

      if (category.match_features.length === 0) {
        throw new InvalidCategoryError(
          `Category "${category.id}" (${category.display_name}) has no match features`,
          category.id,
        );
      }
      for (const feature of category.match_features) {
        if (feature.phrase.trim().length === 0 || !(feature.weight > 0)) {
          throw new InvalidCategoryError(
            `Category "${category.id}" has an invalid match feature ` +
              `(phrase "${feature.phrase}", weight ${feature.weight}); phrases must be non-empty and weights positive`,
            category.id,
          );
        }
      }
    }

    const policyTotal = policy.high + policy.medium + policy.low;
    if (categories.length !== policyTotal) {
      throw new InvalidCategoryError(
        `Taxonomy has ${categories.length} categories but the tier policy allows ${policyTotal}`,
      );
    }
    if (expectedSize !== null && categories.length !== expectedSize) {
      throw new InvalidCategoryError(
        `Taxonomy must hold exactly ${expectedSize} categories, found ${categories.length}`,
      );
    }

    for (const tier of PRIORITY_TIERS) {
      const count = categories.filter((c) => c.priority_tier === tier).length;
      if (count !== policy[tier]) {
        throw new InvalidCategoryError(
          `Tier "${tier}" holds ${count} categories, policy requires ${policy[tier]}`,
        );
      }
    }

    const frozen = categories.map((c) =>
      Object.freeze({
        ...c,
        match_features: Object.freeze(c.match_features.map((f) => Object.freeze({ ...f }))),
      }),
    );

    return new TaxonomyRegistry(definition.version, policy, frozen);
  }

  get size(): number {
    return this.ordered.length;
  }

  /** All categories in definition order. */
  categories(): readonly UsageScenarioCategory[] {
    return this.ordered;
  }

  ids(): string[] {
    return this.ordered.map((c) => c.id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /**
   * @throws {NotFoundError} For an id the registry does not hold
   */
  get(id: string): UsageScenarioCategory {
    const category = this.byId.get(id);
    if (!category) {
      throw new NotFoundError('category', id);
    }
    return category;
  }

  byTier(tier: PriorityTier): UsageScenarioCategory[] {
    return this.ordered.filter((c) => c.priority_tier === tier);
  }

  /** Mutable copy of the underlying definition, for editTaxonomy(). */
  toDefinition(): TaxonomyDefinition {
    return {
      version: this.version,
      tier_policy: { ...this.policy },
      categories: this.ordered.map((c) => ({
        ...c,
        match_features: c.match_features.map((f) => ({ ...f })),
      })),
    };
  }
}
