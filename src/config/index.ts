export {
  EngineConfigSchema,
  SyntheticPolicySchema,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
} from './schema.js';
export {
  readEngineConfig,
  validateEngineConfig,
  EngineConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
