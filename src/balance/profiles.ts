/**
 * Synthetic Effort Profiles
 * =========================
 * Per-second intensity series for the balance simulator. Anything random
 * comes from the injected RandomSource so runs can be replayed.
 *
 * Percentages are of threshold; a series lasts durationMinutes * 60 samples.
 */

import type {
  ProfileSpec,
  RandomSource,
  SteadyProfile,
  IntervalsProfile,
  VariableProfile,
} from '@/types';
import { clamp } from '@/utils/helpers';
import { mathRandom, randomInt, randomNormal, randomUniform } from './random';

/** Smoothing width for variable pace, in samples */
const VARIABLE_SMOOTHING_SIGMA = 30;
/** Variable pace stays within these multiples of threshold */
const VARIABLE_MIN = 0.5;
const VARIABLE_MAX = 1.5;

const RACE_BASE = 0.9;
const RACE_SURGE_EARLIEST = 5 * 60;
const RACE_KICK = 1.3;

/**
 * Steady effort
 */
export function steadyProfile(
  threshold: number,
  durationMinutes: number,
  { intensityPct = 95 }: Omit<SteadyProfile, 'kind'> = {}
): number[] {
  return new Array<number>(durationMinutes * 60).fill(threshold * (intensityPct / 100));
}

/**
 * Repeating work / rest blocks, starting with work
 */
export function intervalsProfile(
  threshold: number,
  durationMinutes: number,
  {
    workPct = 120,
    restPct = 70,
    workSeconds = 120,
    restSeconds = 60,
  }: Omit<IntervalsProfile, 'kind'> = {}
): number[] {
  const cycle = workSeconds + restSeconds;
  const series: number[] = [];
  for (let i = 0; i < durationMinutes * 60; i++) {
    const inWork = i % cycle < workSeconds;
    series.push(threshold * ((inWork ? workPct : restPct) / 100));
  }
  return series;
}

/**
 * Gaussian smoothing with reflected edges (d c b a | a b c d | d c b a).
 * Kernel radius is round(4 * sigma).
 */
export function gaussianSmooth(values: readonly number[], sigma: number): number[] {
  const n = values.length;
  if (n === 0 || sigma <= 0) return [...values];

  const radius = Math.round(4 * sigma);
  const kernel: number[] = [];
  let total = 0;
  for (let k = -radius; k <= radius; k++) {
    const w = Math.exp(-0.5 * (k * k) / (sigma * sigma));
    kernel.push(w);
    total += w;
  }

  const reflect = (idx: number): number => {
    const period = 2 * n;
    const m = ((idx % period) + period) % period;
    return m < n ? m : period - m - 1;
  };

  const out: number[] = [];
  for (let i = 0; i < n; i++) {
    let acc = 0;
    for (let k = -radius; k <= radius; k++) {
      acc += kernel[k + radius] * values[reflect(i + k)];
    }
    out.push(acc / total);
  }
  return out;
}

/**
 * Smoothed random variation around a base intensity
 */
export function variableProfile(
  threshold: number,
  durationMinutes: number,
  { basePct = 85, variabilityPct = 15 }: Omit<VariableProfile, 'kind'> = {},
  rng: RandomSource = mathRandom
): number[] {
  const noise: number[] = [];
  for (let i = 0; i < durationMinutes * 60; i++) {
    noise.push(randomNormal(rng, 0, variabilityPct / 100));
  }
  const smoothed = gaussianSmooth(noise, VARIABLE_SMOOTHING_SIGMA);

  return smoothed.map(v =>
    clamp((basePct / 100 + v) * threshold, VARIABLE_MIN * threshold, VARIABLE_MAX * threshold)
  );
}

/**
 * Race: 90% of threshold with 3-4 surges (110-130%, 30-119s)
 * after the first 5 minutes, and a 130% kick near the finish.
 */
export function raceProfile(
  threshold: number,
  durationMinutes: number,
  rng: RandomSource = mathRandom
): number[] {
  const length = durationMinutes * 60;
  const series = new Array<number>(length).fill(threshold * RACE_BASE);

  const fill = (start: number, seconds: number, value: number): void => {
    const end = Math.min(length, start + seconds);
    for (let i = Math.max(0, start); i < end; i++) series[i] = value;
  };

  const surgeCount = randomInt(rng, 3, 5);
  const latestSurge = (durationMinutes - 3) * 60;
  if (latestSurge > RACE_SURGE_EARLIEST) {
    for (let s = 0; s < surgeCount; s++) {
      const start = randomInt(rng, RACE_SURGE_EARLIEST, latestSurge);
      const seconds = randomInt(rng, 30, 120);
      const pct = randomUniform(rng, 1.1, 1.3);
      fill(start, seconds, threshold * pct);
    }
  }

  const kickStart = length - randomInt(rng, 30, 60);
  const kickSeconds = randomInt(rng, 20, 40);
  fill(kickStart, kickSeconds, threshold * RACE_KICK);

  return series;
}

/**
 * Build any profile from its spec
 */
export function buildProfile(
  spec: ProfileSpec,
  threshold: number,
  durationMinutes: number,
  rng: RandomSource = mathRandom
): number[] {
  switch (spec.kind) {
    case 'steady':
      return steadyProfile(threshold, durationMinutes, spec);
    case 'intervals':
      return intervalsProfile(threshold, durationMinutes, spec);
    case 'variable':
      return variableProfile(threshold, durationMinutes, spec, rng);
    case 'race':
      return raceProfile(threshold, durationMinutes, rng);
  }
}
