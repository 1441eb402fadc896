export { FidelityOrchestrator, cancelledRun, failedRun, LEVEL_DISABLED } from './orchestrator.js';
export type { FidelityOrchestratorOptions, RunOptions } from './orchestrator.js';
export {
  createLevelHandlers,
  assertDocumentSize,
  DocumentTooLargeError,
  type LevelContext,
  type LevelDependencies,
  type LevelHandler,
  type LevelHandlers,
} from './level-handlers.js';
export { createFidelityOrchestrator, type EngineOptions } from './engine.js';
export { ladderFrom, ladderIndex, nextLevel, compareLevels } from './ladder.js';
