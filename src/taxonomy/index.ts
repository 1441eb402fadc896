/**
 * Taxonomy module barrel exports.
 *
 * @module taxonomy
 */

export {
  TaxonomyRegistry,
  InvalidCategoryError,
  NotFoundError,
} from './registry.js';
export type { RegistryOptions } from './registry.js';

export {
  DEFAULT_TAXONOMY_PATH,
  parseTaxonomyDefinition,
  loadTaxonomyDefinition,
  loadTaxonomy,
  getDefaultRegistry,
} from './loader.js';

export { editTaxonomy } from './editor.js';
export type { TaxonomyEdit } from './editor.js';
