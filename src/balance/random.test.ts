import { describe, it, expect } from 'vitest';
import { randomInt, randomUniform, randomNormal, mathRandom } from './random';
import type { RandomSource } from '@/types';

const fixed = (value: number): RandomSource => ({ next: () => value });

describe('random helpers', () => {
  it('randomInt covers [min, max)', () => {
    expect(randomInt(fixed(0), 3, 5)).toBe(3);
    expect(randomInt(fixed(0.49), 3, 5)).toBe(3);
    expect(randomInt(fixed(0.5), 3, 5)).toBe(4);
    expect(randomInt(fixed(0.9999), 3, 5)).toBe(4);
  });

  it('randomUniform maps linearly', () => {
    expect(randomUniform(fixed(0.25), 10, 20)).toBe(12.5);
  });

  it('randomNormal is centred on mu', () => {
    // u2 = 0.25: cos(pi / 2) is ~0
    const values = [0.5, 0.25];
    let i = 0;
    const rng: RandomSource = { next: () => values[i++] };
    expect(randomNormal(rng, 7, 2)).toBeCloseTo(7, 12);
  });

  it('randomNormal stays finite when the source returns 0', () => {
    expect(Number.isFinite(randomNormal(fixed(0)))).toBe(true);
  });

  it('mathRandom stays in [0, 1)', () => {
    for (let i = 0; i < 100; i++) {
      const v = mathRandom.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});
