/**
 * Training zones as fractions of threshold.
 * Bands are contiguous: each upper bound is the next zone's lower bound.
 */
export const ZONE_BANDS: { name: string; lower: number; upper: number }[] = [
  { name: 'Recovery',       lower: 0.60, upper: 0.70 },
  { name: 'Easy/Aerobic',   lower: 0.70, upper: 0.80 },
  { name: 'Moderate',       lower: 0.80, upper: 0.87 },
  { name: 'Threshold',      lower: 0.87, upper: 0.93 },
  { name: 'Critical',       lower: 0.93, upper: 1.00 },
  { name: 'Interval',       lower: 1.00, upper: 1.10 },
  { name: 'Repetition',     lower: 1.10, upper: 1.20 },
];

/** Meters in a statute mile */
export const METERS_PER_MILE = 1609.34;

/** Race distances (meters) used for predictions */
export const RACE_DISTANCES: { race: string; meters: number }[] = [
  { race: '800m', meters: 800 },
  { race: '1500m', meters: 1500 },
  { race: 'Mile', meters: METERS_PER_MILE },
  { race: '3000m', meters: 3000 },
  { race: '5K', meters: 5000 },
  { race: '10K', meters: 10000 },
  { race: 'Half Marathon', meters: 21097.5 },
  { race: 'Marathon', meters: 42195 },
];

/** Races at least this long (meters) show per-mile pace when reporting in miles */
export const MILE_PACE_MIN_DISTANCE = 5000;
