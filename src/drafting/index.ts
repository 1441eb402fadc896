export { DraftOutliner, detectSpecialty, extractDecisionPoints } from './draft-outliner.js';
