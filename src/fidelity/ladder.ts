import { FIDELITY_LADDER, type FidelityLevel } from '../types/fidelity.js';

/** Position on the ladder; 0 is the highest fidelity. */
export function ladderIndex(level: FidelityLevel): number {
  return FIDELITY_LADDER.indexOf(level);
}

/** The level one step down, or null below the floor. */
export function nextLevel(level: FidelityLevel): FidelityLevel | null {
  return FIDELITY_LADDER[ladderIndex(level) + 1] ?? null;
}

/** `level` and every level below it, in fallback order. */
export function ladderFrom(level: FidelityLevel): FidelityLevel[] {
  return FIDELITY_LADDER.slice(ladderIndex(level));
}

export function compareLevels(a: FidelityLevel, b: FidelityLevel): number {
  return ladderIndex(a) - ladderIndex(b);
}
