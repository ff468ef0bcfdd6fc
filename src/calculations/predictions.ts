/**
 * Hyperbolic model inversions.
 * All functions take the threshold and reserve in matching units
 * (m/s and m, or W and J).
 */

import type { RacePrediction } from '@/types';
import { RACE_DISTANCES } from '@/constants';

/**
 * Time to cover a distance flat out: t = d/CS - D′/CS²
 * @param distance - Distance in meters
 * @returns Time in seconds, or null if the model gives no positive time
 */
export function predictDuration(distance: number, threshold: number, reserve: number): number | null {
  const seconds = distance / threshold - reserve / (threshold * threshold);
  return seconds > 0 && Number.isFinite(seconds) ? seconds : null;
}

/**
 * Predicted times for the standard race distances
 */
export function predictRaceTimes(threshold: number, reserve: number): RacePrediction[] {
  return RACE_DISTANCES.map(({ race, meters }) => {
    const timeSec = predictDuration(meters, threshold, reserve);
    return {
      race,
      distance: meters,
      timeSec,
      avgSpeed: timeSec === null ? null : meters / timeSec,
    };
  });
}

/**
 * How long an intensity can be held before the reserve runs out.
 * @returns Seconds, Infinity at or below threshold
 */
export function timeToExhaustion(intensity: number, threshold: number, reserve: number): number {
  const excess = intensity - threshold;
  if (excess <= 0) return Infinity;
  return reserve / excess;
}

/**
 * Highest constant intensity that can be held for a duration
 * @param duration - Seconds
 */
export function sustainableIntensity(duration: number, threshold: number, reserve: number): number {
  return threshold + reserve / duration;
}
