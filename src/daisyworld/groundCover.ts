/**
 * GroundCover — Proportion of an area covered by each species.
 *
 * The sum of species proportions is expected to stay ≤ 1 but is not enforced;
 * ground proportion goes negative if it is violated.
 */

import { EXTINCTION_FLOOR } from './constants';
import { GROUND_ALBEDO, SPECIES, SPECIES_ALBEDO, type Species } from './species';

export type GroundCover = Record<Species, number>;

export function createGroundCover(initial: Partial<GroundCover> = {}): GroundCover {
  return {
    white: initial.white ?? 0,
    black: initial.black ?? 0,
    gray: initial.gray ?? 0,
  };
}

export function cloneGroundCover(cover: Readonly<GroundCover>): GroundCover {
  return { ...cover };
}

export function groundProportion(cover: Readonly<GroundCover>): number {
  let covered = 0;
  for (const species of SPECIES) {
    covered += cover[species];
  }
  return 1 - covered;
}

/** Area-weighted albedo of the species and the bare ground between them. */
export function coverAlbedo(cover: Readonly<GroundCover>): number {
  let albedo = 0;
  for (const species of SPECIES) {
    albedo += cover[species] * SPECIES_ALBEDO[species];
  }
  return albedo + groundProportion(cover) * GROUND_ALBEDO;
}

/** Zero out numerically insignificant populations. */
export function applyExtinctionFloor(proportion: number): number {
  return proportion < EXTINCTION_FLOOR ? 0 : proportion;
}

/** Equal-weight average of several covers. */
export function averageGroundCover(covers: readonly Readonly<GroundCover>[]): GroundCover {
  const avg = createGroundCover();
  if (covers.length === 0) return avg;

  for (const cover of covers) {
    for (const species of SPECIES) {
      avg[species] += cover[species];
    }
  }
  for (const species of SPECIES) {
    avg[species] /= covers.length;
  }
  return avg;
}
