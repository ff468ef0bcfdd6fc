import { describe, it, expect } from 'vitest';
import { runSession } from './run';
import { sessionSchema } from './schema';
import type { SessionInput } from './schema';
import { FitError } from '@/calculations/errors';
import type { RandomSource } from '@/types';

const zeros: RandomSource = { next: () => 0 };

const run = (input: SessionInput) => runSession(sessionSchema.parse(input), zeros);

describe('runSession', () => {
  it('estimates, derives zones and predicts races for running', () => {
    const report = run({
      sport: 'running',
      protocol: { kind: 'three-minute', maxIntensity: 6, endIntensity: 4 },
    });
    expect(report.source).toBe('three-minute');
    expect(report.estimate).toEqual({ threshold: 4, reserve: 360 });
    expect(report.zones).toHaveLength(7);
    expect(report.predictions).toHaveLength(8);
    expect(report.simulation).toBeNull();
  });

  it('skips race predictions for cycling', () => {
    const report = run({ sport: 'cycling', estimate: { threshold: 250, reserve: 20000 } });
    expect(report.source).toBe('manual');
    expect(report.predictions).toEqual([]);
  });

  it('feeds the estimate into the simulator', () => {
    const report = run({
      sport: 'running',
      protocol: { kind: 'three-minute', maxIntensity: 6, endIntensity: 4 },
      simulation: { profile: { kind: 'intervals' }, durationMinutes: 20 },
    });
    const sim = report.simulation;
    expect(sim?.tau).toBe(300);
    expect(sim?.intensity).toHaveLength(1200);
    expect(sim?.balance).toHaveLength(1200);
    expect(sim?.balance[0]).toBe(360);
    expect(sim?.summary.secondsAboveThreshold).toBe(840);
  });

  it('uses the cycling tau unless overridden', () => {
    const base = { sport: 'cycling' as const, estimate: { threshold: 250, reserve: 20000 } };
    expect(run({ ...base, simulation: { profile: { kind: 'race' } } }).simulation?.tau).toBe(546);
    expect(run({ ...base, simulation: { profile: { kind: 'race' }, tau: 400 } }).simulation?.tau).toBe(400);
  });

  it('reads time-trial distances in the session unit', () => {
    const durations = [150, 360, 720];
    const meters = run({
      sport: 'running',
      protocol: { kind: 'time-trial', durations, distances: [900, 1800, 3300] },
    });
    const kilometers = run({
      sport: 'running',
      unit: 'kilometers',
      protocol: { kind: 'time-trial', durations, distances: [0.9, 1.8, 3.3] },
    });
    expect(kilometers.estimate.threshold).toBeCloseTo(meters.estimate.threshold, 9);
    expect(kilometers.estimate.reserve).toBeCloseTo(meters.estimate.reserve, 6);
  });

  it('converts 3/5-minute distances to meters', () => {
    const { estimate } = run({
      sport: 'running',
      unit: 'kilometers',
      protocol: { kind: 'three-five-minute', distance3Min: 0.8, distance5Min: 1.3 },
    });
    expect(estimate.threshold).toBeCloseTo(4.1666667, 6);
    expect(estimate.reserve).toBeCloseTo(50, 6);
  });

  it('leaves cycling work in joules whatever the unit', () => {
    const { estimate } = run({
      sport: 'cycling',
      unit: 'kilometers',
      protocol: { kind: 'time-trial', durations: [100, 200], distances: [45000, 70000] },
    });
    expect(estimate.threshold).toBeCloseTo(250, 9);
    expect(estimate.reserve).toBeCloseTo(20000, 6);
  });

  it('propagates FitError from the regression protocols', () => {
    expect(() => run({
      sport: 'running',
      protocol: { kind: 'time-trial', durations: [300, 300], distances: [1200, 1300] },
    })).toThrow(FitError);
  });

  it('refuses to simulate on a non-positive threshold', () => {
    expect(() => run({
      sport: 'running',
      protocol: { kind: 'three-five-minute', distance3Min: 1000, distance5Min: 900 },
      simulation: { profile: { kind: 'steady' } },
    })).toThrow('it must be positive');
  });
});
