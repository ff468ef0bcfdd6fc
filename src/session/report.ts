import type { Sport, IntensityZone, RacePrediction } from '@/types';
import type { SessionReport, SimulationReport } from './run';
import { formatDuration, formatPaceFromSpeed, paceLabel, formatPercent } from '@/utils/format';
import type { DistanceUnit } from '@/utils/format';
import { MILE_PACE_MIN_DISTANCE } from '@/constants';

const SOURCE_LABELS: Record<SessionReport['source'], string> = {
  'three-minute': '3-minute all-out test',
  'time-trial': 'Time trials',
  'time-to-exhaustion': 'Time to exhaustion',
  'three-five-minute': '3/5-minute test',
  'ramp': 'Ramp test',
  'manual': 'Manual entry',
};

function formatThreshold(sport: Sport, threshold: number, unit: DistanceUnit): string {
  if (sport === 'cycling') return `Critical Power: ${threshold.toFixed(0)} W`;
  return `Critical Speed: ${threshold.toFixed(2)} m/s (${(threshold * 3.6).toFixed(1)} km/h, ` +
    `${formatPaceFromSpeed(threshold, unit)} ${paceLabel(unit)})`;
}

function formatReserve(sport: Sport, reserve: number): string {
  if (sport === 'cycling') return `W′: ${(reserve / 1000).toFixed(1)} kJ`;
  return `D′: ${reserve.toFixed(0)} m`;
}

/**
 * Running zones read as pace (the lower speed is the slower pace);
 * cycling zones as a watt range.
 */
function formatZone(sport: Sport, zone: IntensityZone, unit: DistanceUnit): string {
  if (sport === 'cycling') {
    return `${zone.name}: ${zone.lower.toFixed(0)}-${zone.upper.toFixed(0)} W`;
  }
  return `${zone.name}: ${formatPaceFromSpeed(zone.lower, unit)} - ` +
    `${formatPaceFromSpeed(zone.upper, unit)} ${paceLabel(unit)}`;
}

/** Per-mile pace only for 5K and up; track distances stay per km */
function formatPrediction(p: RacePrediction, unit: DistanceUnit): string {
  if (p.timeSec === null || p.avgSpeed === null) return `${p.race}: N/A`;
  const paceUnit: DistanceUnit =
    unit === 'miles' && p.distance >= MILE_PACE_MIN_DISTANCE ? 'miles' : 'kilometers';
  return `${p.race}: ${formatDuration(p.timeSec)} ` +
    `(pace: ${formatPaceFromSpeed(p.avgSpeed, paceUnit)} ${paceLabel(paceUnit)})`;
}

function formatAverage(sport: Sport, meanIntensity: number): string {
  if (sport === 'cycling') return `Average power: ${meanIntensity.toFixed(0)} W`;
  return `Average speed: ${(meanIntensity * 3.6).toFixed(1)} km/h ` +
    `(${formatPaceFromSpeed(meanIntensity, 'kilometers')} min/km)`;
}

function formatSimulation(sport: Sport, sim: SimulationReport): string[] {
  const s = sim.summary;
  const capacityUnit = sport === 'cycling' ? 'J' : 'm';
  return [
    `Simulation (${sim.profile}, ${sim.durationMinutes} min, tau ${sim.tau}s)`,
    `  ${formatAverage(sport, s.meanIntensity)}`,
    `  Average intensity: ${s.meanIntensityPct.toFixed(1)}% of threshold`,
    `  Time above threshold: ${(s.secondsAboveThreshold / 60).toFixed(1)} min`,
    `  Minimum balance: ${s.minBalance.toFixed(0)} ${capacityUnit}`,
    `  Reserve expended: ${s.reserveExpended.toFixed(0)} ${capacityUnit} ` +
      `(${formatPercent(s.percentExpended / 100)} of total)`,
    `  Fatigue: ${s.fatigue}`,
  ];
}

/**
 * Plain-text session report, one line per entry
 */
export function formatSessionReport(report: SessionReport): string {
  const { sport, unit, estimate } = report;
  const lines: string[] = [
    `Method: ${SOURCE_LABELS[report.source]}`,
    formatThreshold(sport, estimate.threshold, unit),
    formatReserve(sport, estimate.reserve),
    '',
    'Training zones',
    ...report.zones.map(z => `  ${formatZone(sport, z, unit)}`),
  ];

  if (report.predictions.length > 0) {
    lines.push('', 'Predicted race times');
    lines.push(...report.predictions.map(p => `  ${formatPrediction(p, unit)}`));
  }

  if (report.simulation) {
    lines.push('', ...formatSimulation(sport, report.simulation));
  }

  return lines.join('\n');
}
