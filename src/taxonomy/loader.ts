/**
 * Loads the static taxonomy definition from disk.
 *
 * The shipped definition lives at `data/taxonomy.json` beside the package
 * root. Parse failures and schema failures are reported as
 * InvalidCategoryError so that startup fails with one error type.
 *
 * @module taxonomy/loader
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { TaxonomyDefinitionSchema, type TaxonomyDefinition } from '../types/taxonomy.js';
import { InvalidCategoryError, TaxonomyRegistry, type RegistryOptions } from './registry.js';

/** Absolute path of the shipped definition (works from src/ and dist/). */
export const DEFAULT_TAXONOMY_PATH = fileURLToPath(
  new URL('../../data/taxonomy.json', import.meta.url),
);

/**
 * Validate raw input against the definition schema (no I/O).
 *
 * @throws {InvalidCategoryError} With `path: message` lines on failure
 */
export function parseTaxonomyDefinition(raw: unknown): TaxonomyDefinition {
  const result = TaxonomyDefinitionSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidCategoryError(`Taxonomy definition is invalid:\n${errors.join('\n')}`);
  }
  return result.data;
}

export async function loadTaxonomyDefinition(
  definitionPath: string = DEFAULT_TAXONOMY_PATH,
): Promise<TaxonomyDefinition> {
  const content = await readFile(definitionPath, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new InvalidCategoryError(`Invalid JSON in taxonomy file: ${definitionPath}`);
  }

  return parseTaxonomyDefinition(raw);
}

export async function loadTaxonomy(
  definitionPath: string = DEFAULT_TAXONOMY_PATH,
  options?: RegistryOptions,
): Promise<TaxonomyRegistry> {
  const definition = await loadTaxonomyDefinition(definitionPath);
  return TaxonomyRegistry.fromDefinition(definition, options);
}

let defaultRegistry: Promise<TaxonomyRegistry> | null = null;

/**
 * Process-wide registry built from the shipped definition.
 * Loaded on first call, then shared read-only for the life of the process.
 */
export function getDefaultRegistry(): Promise<TaxonomyRegistry> {
  if (!defaultRegistry) {
    defaultRegistry = loadTaxonomy().catch((err: unknown) => {
      defaultRegistry = null;
      throw err;
    });
  }
  return defaultRegistry;
}
