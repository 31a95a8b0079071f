/**
 * Daisy species and their albedos.
 *
 * Bare ground is not a species: its proportion is whatever the species leave
 * uncovered, and it is never enabled or disabled.
 */

export const SPECIES = ['white', 'black', 'gray'] as const;

export type Species = (typeof SPECIES)[number];

export const SPECIES_ALBEDO: Readonly<Record<Species, number>> = Object.freeze({
  white: 0.75,
  black: 0.25,
  gray: 0.5,
});

export const GROUND_ALBEDO = 0.5;

/** One-letter column suffix used in recorded data (`a_w`, `lat_min_b`, ...) */
export const SPECIES_SHORT_NAME: Readonly<Record<Species, string>> = Object.freeze({
  white: 'w',
  black: 'b',
  gray: 'g',
});

export function isSpecies(value: string): value is Species {
  return (SPECIES as readonly string[]).includes(value);
}
