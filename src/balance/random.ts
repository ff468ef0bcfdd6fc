import type { RandomSource } from '@/types';

/** Math.random as a RandomSource */
export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Integer in [min, max)
 */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min));
}

/**
 * Float in [min, max)
 */
export function randomUniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/**
 * Normal sample via Box-Muller (consumes two uniforms)
 */
export function randomNormal(rng: RandomSource, mu: number = 0, sigma: number = 1): number {
  const u1 = 1 - rng.next(); // (0, 1] so the log is finite
  const u2 = rng.next();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mu + sigma * z;
}
