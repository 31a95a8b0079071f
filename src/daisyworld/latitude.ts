/**
 * Latitude bands — Insolation multipliers and band aggregation.
 *
 * Index convention: band 0 is the pole, band LATITUDE_BAND_COUNT − 1 is the
 * equator. Multipliers rise linearly with index, display band 0 averages the
 * polar-most bands, and latitude statistics are reported as band indices, so a
 * larger index always means closer to the equator.
 */

import {
  EQUATORIAL_LUMINOSITY_MULTIPLIER,
  LATITUDE_BAND_COUNT,
  POLAR_LUMINOSITY_MULTIPLIER,
} from './constants';
import { coverAlbedo, type GroundCover } from './groundCover';
import type { Species } from './species';

export interface LatitudeStats {
  /** Lowest occupied band index, or the band count when unoccupied */
  min: number;
  /** Proportion-weighted mean band index, or NaN when unoccupied */
  mean: number;
  /** Highest occupied band index, or −1 when unoccupied */
  max: number;
}

export function bandLuminosityMultiplier(
  index: number,
  bandCount: number = LATITUDE_BAND_COUNT,
): number {
  if (bandCount === 1) return EQUATORIAL_LUMINOSITY_MULTIPLIER;
  const slope = (EQUATORIAL_LUMINOSITY_MULTIPLIER - POLAR_LUMINOSITY_MULTIPLIER) / (bandCount - 1);
  return POLAR_LUMINOSITY_MULTIPLIER + slope * index;
}

/** Precomputed multipliers for every band. */
export function createBandMultipliers(bandCount: number = LATITUDE_BAND_COUNT): Float64Array {
  const multipliers = new Float64Array(bandCount);
  for (let i = 0; i < bandCount; i++) {
    multipliers[i] = bandLuminosityMultiplier(i, bandCount);
  }
  return multipliers;
}

/**
 * Planet albedo weighted by the sunlight each band receives: 1 − Σ m·(1 − A_band) / N.
 */
export function roundWorldAlbedo(
  bands: readonly Readonly<GroundCover>[],
  multipliers: Float64Array,
): number {
  let absorbed = 0;
  for (let i = 0; i < bands.length; i++) {
    absorbed += (multipliers[i] * (1 - coverAlbedo(bands[i]))) / bands.length;
  }
  return 1 - absorbed;
}

/**
 * Average contiguous runs of bands into `displayCount` coarser bands.
 */
export function displayBandAverages(values: readonly number[], displayCount: number): number[] {
  if (!Number.isInteger(displayCount) || displayCount <= 0 || values.length % displayCount !== 0) {
    throw new Error(`displayCount must be a positive divisor of ${values.length}, got ${displayCount}`);
  }

  const runLength = values.length / displayCount;
  const averages: number[] = [];
  for (let d = 0; d < displayCount; d++) {
    let sum = 0;
    for (let i = d * runLength; i < (d + 1) * runLength; i++) {
      sum += values[i];
    }
    averages.push(sum / runLength);
  }
  return averages;
}

export function latitudeStats(bands: readonly Readonly<GroundCover>[], species: Species): LatitudeStats {
  let min = bands.length;
  let max = -1;
  let weighted = 0;
  let total = 0;

  for (let i = 0; i < bands.length; i++) {
    const proportion = bands[i][species];
    if (proportion <= 0) continue;
    if (i < min) min = i;
    max = i;
    weighted += i * proportion;
    total += proportion;
  }

  return {
    min,
    mean: total > 0 ? weighted / total : NaN,
    max,
  };
}
