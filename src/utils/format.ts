import { METERS_PER_MILE } from '@/constants';

/** Distance units accepted at the edges */
export type DistanceUnit = 'meters' | 'kilometers' | 'miles';

/**
 * Convert a distance to meters
 * @param distance - Distance in the given unit
 * @param unit - Unit of distance
 */
export function toMeters(distance: number, unit: DistanceUnit): number {
  if (unit === 'kilometers') return distance * 1000;
  if (unit === 'miles') return distance * METERS_PER_MILE;
  return distance;
}

/**
 * Format seconds as time string (h:mm:ss or m:ss)
 * @param seconds - Time in seconds
 * @returns Formatted time string
 */
export function formatDuration(seconds: number | null): string {
  if (seconds === null || !seconds || isNaN(seconds) || !Number.isFinite(seconds)) return '--';
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const sec = Math.floor(seconds % 60);
  return h > 0
    ? `${h}:${String(m).padStart(2, '0')}:${String(sec).padStart(2, '0')}`
    : `${m}:${String(sec).padStart(2, '0')}`;
}

/**
 * Format a speed as pace, min:sec per km (or per mile)
 * Meters fall back to per-km pace.
 * @param speed - Speed in m/s
 * @param unit - Distance unit
 * @returns e.g. "4:10"
 */
export function formatPaceFromSpeed(speed: number, unit: DistanceUnit = 'kilometers'): string {
  if (!speed || isNaN(speed) || speed <= 0) return '--';
  const paceSeconds = (unit === 'miles' ? METERS_PER_MILE : 1000) / speed;
  const minutes = Math.floor(paceSeconds / 60);
  const seconds = Math.floor(paceSeconds % 60);
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

/**
 * Pace unit label for a distance unit
 */
export function paceLabel(unit: DistanceUnit): string {
  return unit === 'miles' ? 'min/mile' : 'min/km';
}

/**
 * Format percentage
 * @param value - Decimal value (e.g., 0.15 for 15%)
 * @param decimals - Number of decimal places
 * @returns Formatted percentage string
 */
export function formatPercent(value: number, decimals: number = 1): string {
  return `${(value * 100).toFixed(decimals)}%`;
}
