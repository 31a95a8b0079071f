/**
 * Physics — Pure energy-balance and growth formulas.
 *
 *   T_global = (S · L · (1 − A) / σ)^¼ − 273
 *   T_local  = q · (A − a) + T_global
 *   β(T)     = 1 − 0.003265 · (22.5 − T)²
 *   growth   = x · (β(T_local) · ground − γ)
 *
 * None of these guard their domain: a non-positive luminosity yields NaN.
 */

import {
  CELSIUS_OFFSET,
  CONDUCTIVITY,
  DEATH_RATE,
  FLUX_CONSTANT,
  GROWTH_CURVATURE,
  OPTIMAL_GROWTH_TEMPERATURE,
  STEFAN_CONSTANT,
} from './constants';

/**
 * Global temperature in °C for a planet of the given luminosity and albedo.
 */
export function globalTemperature(luminosity: number, albedo: number): number {
  const absorption = 1 - albedo;
  return Math.pow((FLUX_CONSTANT * luminosity * absorption) / STEFAN_CONSTANT, 0.25) - CELSIUS_OFFSET;
}

/**
 * Temperature of a patch with albedo `localAlbedo`, relative to the planetary mean.
 */
export function localTemperature(
  globalAlbedo: number,
  globalTemp: number,
  localAlbedo: number,
): number {
  return CONDUCTIVITY * (globalAlbedo - localAlbedo) + globalTemp;
}

/**
 * Albedo a surface behaves as once its absorption is scaled by an insolation
 * multiplier. A multiplier of 1 returns `albedo` unchanged.
 */
export function effectiveAlbedo(albedo: number, insolationMultiplier: number): number {
  return 1 - insolationMultiplier * (1 - albedo);
}

/** Parabolic growth curve, peaking at 1 for 22.5 °C. */
export function growthRateFunction(localTemp: number): number {
  const offset = OPTIMAL_GROWTH_TEMPERATURE - localTemp;
  return 1 - GROWTH_CURVATURE * offset * offset;
}

/**
 * Net growth rate of a population, limited by the bare ground available to colonize.
 */
export function growthRate(
  proportion: number,
  localTemp: number,
  groundProportion: number,
): number {
  return proportion * (growthRateFunction(localTemp) * groundProportion - DEATH_RATE);
}
