/**
 * Physical and model constants for Daisyworld.
 *
 * Values follow the energy-balance formulation of Watson & Lovelock (1983).
 */

// ── Energy balance ──────────────────────────────────────────────────

/** Stefan's constant, erg / (s · cm² · K⁴) */
export const STEFAN_CONSTANT = 0.0000567;

/** Base solar flux at luminosity 1, erg / (s · cm²) */
export const FLUX_CONSTANT = 917000;

/** Add to Celsius to get Kelvin */
export const CELSIUS_OFFSET = 273;

/** How strongly a patch's albedo deviation shifts its temperature from the global mean */
export const CONDUCTIVITY = 20;

// ── Growth ──────────────────────────────────────────────────────────

/** Temperature (°C) of peak growth */
export const OPTIMAL_GROWTH_TEMPERATURE = 22.5;

/** Curvature of the parabolic growth curve */
export const GROWTH_CURVATURE = 0.003265;

export const DEATH_RATE = 0.3;

// ── Time stepping ───────────────────────────────────────────────────

/** Simulated time units advanced by one update */
export const TIME_STEP = 0.01;

export const UPDATES_PER_TIME_UNIT = 100;

/** Proportions below this after a growth step are set to exactly 0 */
export const EXTINCTION_FLOOR = 0.001;

/** Default reseed level used by boostIfExtinct() */
export const DEFAULT_BOOST_THRESHOLD = 0.01;

// ── Latitude bands ──────────────────────────────────────────────────

export const LATITUDE_BAND_COUNT = 90;
export const DISPLAY_BAND_COUNT = 10;

/** Insolation multiplier at the pole (band 0) */
export const POLAR_LUMINOSITY_MULTIPLIER = 0.6;

/** Insolation multiplier at the equator (band LATITUDE_BAND_COUNT - 1) */
export const EQUATORIAL_LUMINOSITY_MULTIPLIER = 1.5;
