export {
  GapSequencer,
  appendScenarios,
  DEFAULT_GENERATION_TIMEOUT_MS,
  DEFAULT_MAX_GENERATION_CALLS,
  type GapSequencerOptions,
} from './gap-sequencer.js';
