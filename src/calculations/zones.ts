import type { IntensityZone } from '@/types';
import { ZONE_BANDS } from '@/constants';

/**
 * Get training zones from threshold
 * @param threshold - Critical speed (m/s) or critical power (W)
 * @returns Zones from slowest to fastest, in the threshold's units
 */
export function calculateZones(threshold: number): IntensityZone[] {
  return ZONE_BANDS.map(band => ({
    name: band.name,
    lower: band.lower * threshold,
    upper: band.upper * threshold,
  }));
}

/**
 * Find the zone an intensity falls in
 * @returns Zone name, or null outside every band
 */
export function zoneForIntensity(intensity: number, threshold: number): string | null {
  if (threshold <= 0) return null;
  const ratio = intensity / threshold;
  const band = ZONE_BANDS.find(b => ratio >= b.lower && ratio < b.upper);
  return band ? band.name : null;
}
