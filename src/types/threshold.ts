/** Sport the test was performed in. Drives defaults only, never the maths. */
export type Sport = 'running' | 'cycling';

/**
 * Threshold / reserve pair.
 * Running: threshold in m/s (critical speed), reserve in m (D′).
 * Cycling: threshold in W (critical power), reserve in J (W′).
 */
export interface ThresholdEstimate {
  threshold: number;
  reserve: number;
}

/** 3-minute all-out test */
export interface ThreeMinuteProtocol {
  kind: 'three-minute';
  maxIntensity: number;
  endIntensity: number;   // mean of the final 30s
}

/** Two or more maximal time trials: distance covered vs duration */
export interface TimeTrialProtocol {
  kind: 'time-trial';
  durations: number[];    // seconds
  distances: number[];    // meters (or joules of work)
}

/** Two or more constant-intensity efforts held to exhaustion */
export interface TimeToExhaustionProtocol {
  kind: 'time-to-exhaustion';
  durations: number[];    // seconds
  intensities: number[];
}

/** Distances covered in 3 and 5 minutes all-out (running) */
export interface ThreeFiveMinuteProtocol {
  kind: 'three-five-minute';
  distance3Min: number;
  distance5Min: number;
}

/** Incremental ramp to exhaustion */
export interface RampProtocol {
  kind: 'ramp';
  finalIntensity: number;
  timeToExhaustion: number; // seconds
  rampRate: number;         // intensity increase per minute
}

export type TestProtocol =
  | ThreeMinuteProtocol
  | TimeTrialProtocol
  | TimeToExhaustionProtocol
  | ThreeFiveMinuteProtocol
  | RampProtocol;

export type ProtocolKind = TestProtocol['kind'];

/** Training zone as a band of absolute intensity */
export interface IntensityZone {
  name: string;
  lower: number;
  upper: number;
}

/** Predicted result for a named race distance */
export interface RacePrediction {
  race: string;
  distance: number;        // meters
  timeSec: number | null;  // null when the model gives no positive time
  avgSpeed: number | null; // m/s
}
