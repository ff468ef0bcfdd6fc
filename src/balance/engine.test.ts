import { describe, it, expect } from 'vitest';
import { simulateBalance, summarizeBalance, rateFatigue, defaultTau } from './engine';

describe('simulateBalance', () => {
  it('starts at full reserve whatever the first sample', () => {
    expect(simulateBalance([100, 0, 50], 4, 200)[0]).toBe(200);
    expect(simulateBalance([0, 0], 4, 200)[0]).toBe(200);
  });

  it('keeps length for empty and single-sample series', () => {
    expect(simulateBalance([], 4, 200)).toEqual([]);
    expect(simulateBalance([9], 4, 200)).toEqual([200]);
  });

  it('drains linearly under constant overload', () => {
    const series = new Array<number>(30).fill(4.5);
    const balance = simulateBalance(series, 4, 10);
    for (let i = 0; i < series.length; i++) {
      expect(balance[i]).toBe(Math.max(0, 10 - i * 0.5));
    }
  });

  it('uses the previous sample for each step', () => {
    const balance = simulateBalance([10, 0], 4, 100);
    expect(balance).toEqual([100, 94]);
  });

  it('holds the balance when intensity equals threshold', () => {
    expect(simulateBalance([6, 4, 4], 4, 50)).toEqual([50, 48, 48]);
  });

  it('recovers exponentially toward full reserve at rest', () => {
    const series = [...new Array<number>(20).fill(6), ...new Array<number>(5000).fill(0)];
    const balance = simulateBalance(series, 4, 200, 300);

    expect(balance[20]).toBe(160);
    expect(balance[21]).toBeCloseTo(200 - 40 * Math.exp(-4 / (300 * 4)), 10);

    for (let i = 21; i < balance.length; i++) {
      expect(balance[i]).toBeGreaterThanOrEqual(balance[i - 1]);
    }
    expect(balance[balance.length - 1]).toBeCloseTo(200, 4);
  });

  it('recovers faster the further below threshold', () => {
    const easy = simulateBalance([6, 6, 3.5, 3.5], 4, 100);
    const rest = simulateBalance([6, 6, 1, 1], 4, 100);
    expect(rest[3]).toBeGreaterThan(easy[3]);
  });

  it('recovers faster with a shorter tau', () => {
    const series = [6, 6, 2, 2];
    const fast = simulateBalance(series, 4, 100, 100);
    const slow = simulateBalance(series, 4, 100, 546);
    expect(fast[3]).toBeGreaterThan(slow[3]);
  });

  it('defaults tau to the running constant', () => {
    const series = [6, 6, 6, 2, 2, 2];
    expect(simulateBalance(series, 4, 100)).toEqual(simulateBalance(series, 4, 100, 300));
  });

  it('never leaves [0, reserve]', () => {
    // Deterministic mix of hard surges and rests
    const series = Array.from({ length: 2000 }, (_, i) => 300 + 180 * Math.sin(i / 17) + 60 * Math.cos(i / 5));
    const balance = simulateBalance(series, 280, 15000, 546);
    expect(Math.min(...balance)).toBeGreaterThanOrEqual(0);
    expect(Math.max(...balance)).toBeLessThanOrEqual(15000);
  });

  it('bottoms out at zero and stays there while overloaded', () => {
    const balance = simulateBalance(new Array<number>(10).fill(400), 300, 250, 546);
    expect(balance.slice(3)).toEqual([0, 0, 0, 0, 0, 0, 0]);
  });

  it('does not mutate the input', () => {
    const series = Object.freeze([5, 5, 3, 3]);
    const copy = [...series];
    simulateBalance(series, 4, 100);
    expect(series).toEqual(copy);
  });
});

describe('defaultTau', () => {
  it('returns per-sport constants', () => {
    expect(defaultTau('running')).toBe(300);
    expect(defaultTau('cycling')).toBe(546);
  });
});

describe('rateFatigue', () => {
  it('uses 50% and 80% cut-offs', () => {
    expect(rateFatigue(0)).toBe('low');
    expect(rateFatigue(0.49)).toBe('low');
    expect(rateFatigue(0.5)).toBe('moderate');
    expect(rateFatigue(0.79)).toBe('moderate');
    expect(rateFatigue(0.8)).toBe('high');
    expect(rateFatigue(1)).toBe('high');
  });
});

describe('summarizeBalance', () => {
  it('summarises a short trace', () => {
    const intensity = [6, 6, 2, 2];
    const balance = simulateBalance(intensity, 4, 10);
    const summary = summarizeBalance(intensity, balance, 4, 10);

    expect(summary.minBalance).toBe(6);
    expect(summary.reserveExpended).toBe(4);
    expect(summary.percentExpended).toBeCloseTo(40, 10);
    expect(summary.secondsAboveThreshold).toBe(2);
    expect(summary.fractionAboveThreshold).toBe(0.5);
    expect(summary.meanIntensity).toBe(4);
    expect(summary.meanIntensityPct).toBe(100);
    expect(summary.fatigue).toBe('low');
  });

  it('rates an emptied reserve as high fatigue', () => {
    const intensity = new Array<number>(60).fill(5);
    const balance = simulateBalance(intensity, 4, 20);
    const summary = summarizeBalance(intensity, balance, 4, 20);
    expect(summary.minBalance).toBe(0);
    expect(summary.percentExpended).toBe(100);
    expect(summary.fatigue).toBe('high');
  });

  it('summarises an empty trace as untouched', () => {
    expect(summarizeBalance([], [], 4, 200)).toEqual({
      minBalance: 200,
      reserveExpended: 0,
      percentExpended: 0,
      secondsAboveThreshold: 0,
      fractionAboveThreshold: 0,
      meanIntensity: 0,
      meanIntensityPct: 0,
      fatigue: 'low',
    });
  });

  it('reports 0% expended on a zero reserve', () => {
    const summary = summarizeBalance([5, 5], [0, 0], 4, 0);
    expect(summary.percentExpended).toBe(0);
  });
});
