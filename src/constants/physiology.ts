/**
 * Reserve Balance Constants
 *
 * Recovery time constants for the balance model and the cut-offs used to rate
 * how much of the reserve a session spent.
 */

import type { Sport, FatigueLevel } from '@/types';

/**
 * Recovery time constant (seconds) by sport.
 *
 * - Running: 300s, the D′ analogue of the cycling constant
 * - Cycling: 546s, Skiba et al. (2012) W′bal fit
 */
export const TAU: Record<Sport, number> = {
  running: 300,
  cycling: 546,
};

/**
 * Share of reserve expended below which each fatigue level applies.
 * Anything at or above the last cut-off is 'high'.
 */
export const FATIGUE_CUTOFFS: { level: Exclude<FatigueLevel, 'high'>; below: number }[] = [
  { level: 'low', below: 0.5 },
  { level: 'moderate', below: 0.8 },
];
