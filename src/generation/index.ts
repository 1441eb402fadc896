/**
 * Generation module barrel exports.
 *
 * @module generation
 */

export {
  GenerationError,
  GenerationTimeoutError,
  generateWithTimeout,
} from './collaborator.js';

export { FeatureSeededGenerator } from './feature-seeded-generator.js';
