export {
  InventoryBuilder,
  DEFAULT_COMPLETION_TARGET,
  DEFAULT_SYNTHETIC_POLICY,
  BODY_SECTION,
  SYNTHETIC_SECTION,
  includesSynthetic,
  isEntryComplete,
  sectionFor,
  type InventoryBuilderOptions,
} from './inventory-builder.js';
export { personaFor, PERSONA_BY_GROUP, DEFAULT_PERSONA } from './personas.js';
