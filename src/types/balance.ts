/** Fatigue rating from the share of reserve spent */
export type FatigueLevel = 'low' | 'moderate' | 'high';

/** Post-processing of a completed balance trace */
export interface BalanceSummary {
  minBalance: number;
  reserveExpended: number;
  /** 0-100 */
  percentExpended: number;
  /** Samples above threshold, one sample = one second */
  secondsAboveThreshold: number;
  fractionAboveThreshold: number;
  meanIntensity: number;
  /** Mean intensity as % of threshold */
  meanIntensityPct: number;
  fatigue: FatigueLevel;
}

/** Synthetic effort profile shapes */
export type ProfileKind = 'steady' | 'intervals' | 'variable' | 'race';

export interface SteadyProfile {
  kind: 'steady';
  intensityPct?: number;
}

export interface IntervalsProfile {
  kind: 'intervals';
  workPct?: number;
  restPct?: number;
  workSeconds?: number;
  restSeconds?: number;
}

export interface VariableProfile {
  kind: 'variable';
  basePct?: number;
  variabilityPct?: number;
}

export interface RaceProfile {
  kind: 'race';
}

export type ProfileSpec = SteadyProfile | IntervalsProfile | VariableProfile | RaceProfile;

/** Uniform random numbers on [0, 1) */
export interface RandomSource {
  next(): number;
}
