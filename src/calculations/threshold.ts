/**
 * Threshold / Reserve Estimation
 * ==============================
 * One rule per test protocol. Every rule returns the threshold (critical speed
 * or power) and the reserve above it (D′ or W′) in the caller's own units.
 *
 * Inputs are not sanity-checked: a max below the end intensity yields a
 * negative reserve, and so on. Only the regression protocols can fail.
 */

import type {
  ThresholdEstimate,
  TestProtocol,
} from '@/types';
import {
  THREE_MINUTE_SECONDS,
  THREE_FIVE_GAP_SECONDS,
  RAMP_AREA_FACTOR,
  MIN_FIT_POINTS,
} from '@/constants';
import { fitLinear, fitLevenbergMarquardt } from './regression';
import type { TwoParamModel } from './regression';

/** intensity = threshold + reserve / duration */
const HYPERBOLIC_MODEL: TwoParamModel = {
  value: (t, threshold, reserve) => threshold + reserve / t,
  gradient: (t) => [1, 1 / t],
};

/** Starting point for the hyperbolic fit */
const HYPERBOLIC_INITIAL_GUESS: [number, number] = [1, 1];

/**
 * 3-minute all-out test.
 * The end intensity is the threshold; the area above it over 180s is the reserve.
 */
export function estimateFromThreeMinute(maxIntensity: number, endIntensity: number): ThresholdEstimate {
  return {
    threshold: endIntensity,
    reserve: (maxIntensity - endIntensity) * THREE_MINUTE_SECONDS,
  };
}

/**
 * Time-trial method: distance = threshold * duration + reserve.
 * @param durations - Trial durations in seconds
 * @param distances - Distance covered in each trial
 * @throws FitError with fewer than 2 trials or identical durations
 */
export function estimateFromTimeTrials(
  durations: readonly number[],
  distances: readonly number[]
): ThresholdEstimate {
  const { slope, intercept } = fitLinear(durations, distances);
  return { threshold: slope, reserve: intercept };
}

/**
 * Time-to-exhaustion method: intensity = threshold + reserve / duration,
 * fitted by nonlinear least squares.
 *
 * Fewer than 2 efforts gives { threshold: 0, reserve: 0 } rather than an error.
 * @throws FitError on mismatched arrays, identical durations or no convergence
 */
export function estimateFromTimeToExhaustion(
  durations: readonly number[],
  intensities: readonly number[]
): ThresholdEstimate {
  if (durations.length < MIN_FIT_POINTS || intensities.length < MIN_FIT_POINTS) {
    return { threshold: 0, reserve: 0 };
  }

  const { params } = fitLevenbergMarquardt(
    HYPERBOLIC_MODEL,
    durations,
    intensities,
    HYPERBOLIC_INITIAL_GUESS
  );
  const [threshold, reserve] = params;
  return { threshold, reserve };
}

/**
 * 3/5-minute method (running): slope between the two marks is the threshold.
 * @param distance3Min - Meters covered in the first 3 minutes
 * @param distance5Min - Meters covered in 5 minutes
 */
export function estimateFromThreeFiveMinute(distance3Min: number, distance5Min: number): ThresholdEstimate {
  const threshold = (distance5Min - distance3Min) / THREE_FIVE_GAP_SECONDS;
  return {
    threshold,
    reserve: distance3Min - threshold * THREE_MINUTE_SECONDS,
  };
}

/**
 * Ramp test. Models the ramp as a line through threshold and integrates the
 * triangle above it up to exhaustion.
 * @param finalIntensity - Intensity at exhaustion
 * @param timeToExhaustion - Seconds from ramp start
 * @param rampRate - Intensity increase per minute
 */
export function estimateFromRamp(
  finalIntensity: number,
  timeToExhaustion: number,
  rampRate: number
): ThresholdEstimate {
  const minutes = timeToExhaustion / 60;
  return {
    threshold: finalIntensity - RAMP_AREA_FACTOR * rampRate * minutes,
    reserve: RAMP_AREA_FACTOR * rampRate * minutes * minutes,
  };
}

/**
 * Estimate from any supported protocol
 */
export function estimateThreshold(protocol: TestProtocol): ThresholdEstimate {
  switch (protocol.kind) {
    case 'three-minute':
      return estimateFromThreeMinute(protocol.maxIntensity, protocol.endIntensity);
    case 'time-trial':
      return estimateFromTimeTrials(protocol.durations, protocol.distances);
    case 'time-to-exhaustion':
      return estimateFromTimeToExhaustion(protocol.durations, protocol.intensities);
    case 'three-five-minute':
      return estimateFromThreeFiveMinute(protocol.distance3Min, protocol.distance5Min);
    case 'ramp':
      return estimateFromRamp(protocol.finalIntensity, protocol.timeToExhaustion, protocol.rampRate);
  }
}
