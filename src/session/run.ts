/**
 * Session runner: estimate once, then feed the estimate into the simulator.
 */

import type {
  Sport,
  ThresholdEstimate,
  ProtocolKind,
  ProfileKind,
  IntensityZone,
  RacePrediction,
  BalanceSummary,
  RandomSource,
  TestProtocol,
} from '@/types';
import { estimateThreshold, calculateZones, predictRaceTimes } from '@/calculations';
import { simulateBalance, summarizeBalance, defaultTau, buildProfile, mathRandom } from '@/balance';
import { toMeters } from '@/utils/format';
import type { DistanceUnit } from '@/utils/format';
import type { Session } from './schema';

export interface SimulationReport {
  profile: ProfileKind;
  durationMinutes: number;
  tau: number;
  intensity: number[];
  balance: number[];
  summary: BalanceSummary;
}

export interface SessionReport {
  sport: Sport;
  unit: DistanceUnit;
  /** 'manual' when the estimate was supplied directly */
  source: ProtocolKind | 'manual';
  estimate: ThresholdEstimate;
  zones: IntensityZone[];
  /** Running only */
  predictions: RacePrediction[];
  simulation: SimulationReport | null;
}

/**
 * Running distances are entered in the session's unit; the estimators work in meters.
 * Cycling time-trial distances are work in joules and pass through.
 */
export function protocolInMeters(protocol: TestProtocol, sport: Sport, unit: DistanceUnit): TestProtocol {
  if (sport !== 'running' || unit === 'meters') return protocol;
  switch (protocol.kind) {
    case 'time-trial':
      return { ...protocol, distances: protocol.distances.map(d => toMeters(d, unit)) };
    case 'three-five-minute':
      return {
        ...protocol,
        distance3Min: toMeters(protocol.distance3Min, unit),
        distance5Min: toMeters(protocol.distance5Min, unit),
      };
    default:
      return protocol;
  }
}

/**
 * Run a validated session
 * @throws FitError from the regression protocols
 * @throws Error when a simulation is requested on a non-positive threshold
 */
export function runSession(session: Session, rng: RandomSource = mathRandom): SessionReport {
  let estimate: ThresholdEstimate;
  let source: SessionReport['source'];
  if (session.protocol) {
    estimate = estimateThreshold(protocolInMeters(session.protocol, session.sport, session.unit));
    source = session.protocol.kind;
  } else if (session.estimate) {
    estimate = { ...session.estimate };
    source = 'manual';
  } else {
    throw new Error('Session has neither a protocol nor an estimate');
  }

  const { threshold, reserve } = estimate;

  let simulation: SimulationReport | null = null;
  if (session.simulation) {
    if (!(threshold > 0)) {
      throw new Error(`Cannot simulate with a threshold of ${threshold}; it must be positive`);
    }
    const { profile, durationMinutes } = session.simulation;
    const tau = session.simulation.tau ?? defaultTau(session.sport);
    const intensity = buildProfile(profile, threshold, durationMinutes, rng);
    const balance = simulateBalance(intensity, threshold, reserve, tau);
    simulation = {
      profile: profile.kind,
      durationMinutes,
      tau,
      intensity,
      balance,
      summary: summarizeBalance(intensity, balance, threshold, reserve),
    };
  }

  return {
    sport: session.sport,
    unit: session.unit,
    source,
    estimate,
    zones: calculateZones(threshold),
    predictions: session.sport === 'running' ? predictRaceTimes(threshold, reserve) : [],
    simulation,
  };
}
