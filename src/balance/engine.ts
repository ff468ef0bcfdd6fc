/**
 * balance/engine.ts
 * =================
 * Reserve balance (D′bal / W′bal) over a per-second intensity series.
 * Linear drain above threshold, exponential refill toward full reserve below it.
 */

import type { Sport, BalanceSummary, FatigueLevel } from '@/types';
import { TAU, FATIGUE_CUTOFFS } from '@/constants';
import { clamp, mean } from '@/utils/helpers';

/**
 * Default recovery time constant for a sport
 * @returns Seconds
 */
export function defaultTau(sport: Sport): number {
  return TAU[sport];
}

/**
 * Simulate remaining reserve second by second.
 *
 * Step i uses the intensity of step i-1. Above threshold the excess is
 * subtracted; at or below threshold the gap to full reserve decays by
 * exp(deficit / (tau * threshold)). Every value is clamped to [0, reserve].
 *
 * @param intensity - One sample per second (m/s or W)
 * @param threshold - Must be > 0
 * @param reserve - Full reserve, also the starting balance
 * @param tau - Recovery time constant in seconds
 * @returns New array, same length as intensity
 */
export function simulateBalance(
  intensity: readonly number[],
  threshold: number,
  reserve: number,
  tau: number = TAU.running
): number[] {
  const balance = new Array<number>(intensity.length).fill(reserve);

  for (let i = 1; i < intensity.length; i++) {
    const diff = intensity[i - 1] - threshold;
    const excess = Math.max(0, diff);
    const deficit = Math.min(0, diff);

    let next: number;
    if (excess > 0) {
      next = balance[i - 1] - excess;
    } else {
      next = reserve - (reserve - balance[i - 1]) * Math.exp(deficit / (tau * threshold));
    }

    balance[i] = Math.min(reserve, Math.max(0, next));
  }

  return balance;
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

/**
 * Rate fatigue from the share of reserve spent (0-1)
 */
export function rateFatigue(fractionExpended: number): FatigueLevel {
  for (const cutoff of FATIGUE_CUTOFFS) {
    if (fractionExpended < cutoff.below) return cutoff.level;
  }
  return 'high';
}

/**
 * Summarise a completed trace
 * @param intensity - Series the trace was simulated from
 * @param balance - Output of simulateBalance
 */
export function summarizeBalance(
  intensity: readonly number[],
  balance: readonly number[],
  threshold: number,
  reserve: number
): BalanceSummary {
  if (balance.length === 0) {
    return {
      minBalance: reserve,
      reserveExpended: 0,
      percentExpended: 0,
      secondsAboveThreshold: 0,
      fractionAboveThreshold: 0,
      meanIntensity: 0,
      meanIntensityPct: 0,
      fatigue: 'low',
    };
  }

  const minBalance = balance.reduce((m, b) => Math.min(m, b), Infinity);
  const reserveExpended = reserve - minBalance;
  const fractionExpended = reserve > 0 ? clamp(reserveExpended / reserve, 0, 1) : 0;

  const secondsAboveThreshold = intensity.filter(x => x > threshold).length;
  const meanIntensity = mean(intensity);

  return {
    minBalance,
    reserveExpended,
    percentExpended: fractionExpended * 100,
    secondsAboveThreshold,
    fractionAboveThreshold: intensity.length > 0 ? secondsAboveThreshold / intensity.length : 0,
    meanIntensity,
    meanIntensityPct: threshold > 0 ? (meanIntensity / threshold) * 100 : 0,
    fatigue: rateFatigue(fractionExpended),
  };
}
