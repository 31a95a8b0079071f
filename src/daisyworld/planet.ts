/**
 * Planet — Daisyworld state and its per-step update rule.
 *
 * Two modes share the same physics:
 *   - flat:  one planet-wide GroundCover
 *   - round: LATITUDE_BAND_COUNT equal-area bands, each with its own cover and
 *            insolation multiplier (band 0 = pole)
 *
 * Global albedo and temperature are cached between mutations. Every mutator
 * drops the cache.
 */

import {
  DEFAULT_BOOST_THRESHOLD,
  DISPLAY_BAND_COUNT,
  EXTINCTION_FLOOR,
  LATITUDE_BAND_COUNT,
  TIME_STEP,
  UPDATES_PER_TIME_UNIT,
} from './constants';
import {
  applyExtinctionFloor,
  averageGroundCover,
  cloneGroundCover,
  coverAlbedo,
  createGroundCover,
  groundProportion,
  type GroundCover,
} from './groundCover';
import {
  createBandMultipliers,
  displayBandAverages,
  latitudeStats,
  roundWorldAlbedo,
  type LatitudeStats,
} from './latitude';
import {
  effectiveAlbedo,
  globalTemperature,
  growthRate,
  localTemperature,
} from './physics';
import { SPECIES, SPECIES_ALBEDO, type Species } from './species';

// ── Types ───────────────────────────────────────────────────────────

export interface InitialProportions {
  white: number;
  black: number;
  /** Supplying a gray proportion enables gray daisies unless `enabled.gray` says otherwise */
  gray?: number;
}

export interface PlanetOptions {
  proportions: InitialProportions;
  /** Dimensionless solar luminosity (1 = baseline) */
  luminosity: number;
  /** Start latitude-resolved. Default false */
  roundWorld?: boolean;
  /** Start with growth and death active. Default true */
  growthEnabled?: boolean;
  enabled?: Partial<Record<Species, boolean>>;
}

export type BoostThresholds = Partial<Record<Species, number>>;

export interface PlanetSnapshot {
  step: number;
  time: number;
  luminosity: number;
  roundWorld: boolean;
  growthEnabled: boolean;
  enabled: Record<Species, boolean>;
  proportions: GroundCover;
  ground: number;
  albedo: number;
  temperature: number;
}

export interface Planet {
  // Queries
  getProportion(species: Species): number;
  getProportions(): GroundCover;
  getGroundProportion(): number;
  getTotalAlbedo(): number;
  getGlobalTemperature(): number;
  /** Temperature of a patch with the given albedo on the flat formula. */
  getLocalTemperature(albedo: number): number;
  getSpeciesLocalTemperature(species: Species): number;
  /** Planet-wide rate; in round mode the equal-weight mean of the band rates. */
  getGrowthRate(species: Species): number;
  getLuminosity(): number;
  isSpeciesEnabled(species: Species): boolean;
  isGrowthEnabled(): boolean;
  isRoundWorld(): boolean;
  getUpdateCount(): number;
  /** Simulated time units elapsed (update count × time step). */
  getTime(): number;

  // Latitude view (a flat planet reads as uniform across every band)
  getBandCount(): number;
  getBandLuminosityMultiplier(band: number): number;
  getBandProportions(species: Species): number[];
  getBandLocalTemperature(band: number, species: Species): number;
  getBandGrowthRate(band: number, species: Species): number;
  getDisplayBandProportions(species: Species, displayCount?: number): number[];
  getLatitudeStats(species: Species): LatitudeStats;

  // Commands
  setLuminosity(luminosity: number): void;
  setSpeciesEnabled(species: Species, enabled: boolean): void;
  setWhiteEnabled(enabled: boolean): void;
  setBlackEnabled(enabled: boolean): void;
  setGrayEnabled(enabled: boolean): void;
  setDaisyGrowthAndDeath(enabled: boolean): void;
  setRoundWorld(enabled: boolean): void;
  boostIfExtinct(thresholds?: BoostThresholds): void;
  update(): void;

  snapshot(): PlanetSnapshot;
}

interface Derived {
  albedo: number;
  temperature: number;
}

// ── Factory ─────────────────────────────────────────────────────────

export function createPlanet(options: PlanetOptions): Planet {
  const { proportions } = options;

  let luminosity = options.luminosity;
  let growthEnabled = options.growthEnabled ?? true;
  let roundWorld = options.roundWorld ?? false;
  let updateCount = 0;

  const enabled: Record<Species, boolean> = {
    white: options.enabled?.white ?? true,
    black: options.enabled?.black ?? true,
    gray: options.enabled?.gray ?? proportions.gray !== undefined,
  };

  const flat = createGroundCover(proportions);
  for (const species of SPECIES) {
    if (!enabled[species]) flat[species] = 0;
  }

  const multipliers = createBandMultipliers(LATITUDE_BAND_COUNT);
  let bands: GroundCover[] = broadcast(flat);

  let cache: Derived | null = null;

  function broadcast(cover: GroundCover): GroundCover[] {
    return Array.from({ length: LATITUDE_BAND_COUNT }, () => cloneGroundCover(cover));
  }

  function invalidate(): void {
    cache = null;
  }

  function derived(): Derived {
    if (cache === null) {
      const albedo = roundWorld ? roundWorldAlbedo(bands, multipliers) : coverAlbedo(flat);
      cache = { albedo, temperature: globalTemperature(luminosity, albedo) };
    }
    return cache;
  }

  function assertBand(band: number): void {
    if (!Number.isInteger(band) || band < 0 || band >= LATITUDE_BAND_COUNT) {
      throw new Error(`band must be an integer 0–${LATITUDE_BAND_COUNT - 1}, got ${band}`);
    }
  }

  /** Bands as stored in round mode, or the flat cover repeated per band. */
  function bandView(): readonly Readonly<GroundCover>[] {
    return roundWorld ? bands : broadcast(flat);
  }

  function cellLocalTemperature(multiplier: number, species: Species, snap: Derived): number {
    return localTemperature(
      snap.albedo,
      snap.temperature,
      effectiveAlbedo(SPECIES_ALBEDO[species], multiplier),
    );
  }

  function cellGrowthRate(
    cover: Readonly<GroundCover>,
    multiplier: number,
    species: Species,
    snap: Derived,
  ): number {
    return growthRate(
      cover[species],
      cellLocalTemperature(multiplier, species, snap),
      groundProportion(cover),
    );
  }

  /**
   * Advance every cell by one time step. All increments are computed from the
   * same snapshot before any cover is written.
   */
  function growCells(cells: GroundCover[], cellMultipliers: ArrayLike<number>, snap: Derived): void {
    const increments = cells.map((cover, i) => {
      const delta = createGroundCover();
      for (const species of SPECIES) {
        if (enabled[species]) {
          delta[species] = cellGrowthRate(cover, cellMultipliers[i], species, snap) * TIME_STEP;
        }
      }
      return delta;
    });

    cells.forEach((cover, i) => {
      for (const species of SPECIES) {
        if (enabled[species]) {
          cover[species] = applyExtinctionFloor(cover[species] + increments[i][species]);
        }
      }
    });
  }

  function getProportion(species: Species): number {
    if (!roundWorld) return flat[species];
    let sum = 0;
    for (const band of bands) {
      sum += band[species];
    }
    return sum / bands.length;
  }

  function getProportions(): GroundCover {
    return roundWorld ? averageGroundCover(bands) : cloneGroundCover(flat);
  }

  function getBandProportions(species: Species): number[] {
    return bandView().map((cover) => cover[species]);
  }

  function setSpeciesEnabled(species: Species, value: boolean): void {
    enabled[species] = value;
    if (!value) {
      flat[species] = 0;
      for (const band of bands) {
        band[species] = 0;
      }
    }
    invalidate();
  }

  const planet: Planet = {
    getProportion,
    getProportions,

    getGroundProportion(): number {
      return groundProportion(getProportions());
    },

    getTotalAlbedo(): number {
      return derived().albedo;
    },

    getGlobalTemperature(): number {
      return derived().temperature;
    },

    getLocalTemperature(albedo: number): number {
      const snap = derived();
      return localTemperature(snap.albedo, snap.temperature, albedo);
    },

    getSpeciesLocalTemperature(species: Species): number {
      return planet.getLocalTemperature(SPECIES_ALBEDO[species]);
    },

    getGrowthRate(species: Species): number {
      const snap = derived();
      if (!roundWorld) return cellGrowthRate(flat, 1, species, snap);

      let sum = 0;
      for (let i = 0; i < bands.length; i++) {
        sum += cellGrowthRate(bands[i], multipliers[i], species, snap);
      }
      return sum / bands.length;
    },

    getLuminosity(): number {
      return luminosity;
    },

    isSpeciesEnabled(species: Species): boolean {
      return enabled[species];
    },

    isGrowthEnabled(): boolean {
      return growthEnabled;
    },

    isRoundWorld(): boolean {
      return roundWorld;
    },

    getUpdateCount(): number {
      return updateCount;
    },

    getTime(): number {
      return updateCount / UPDATES_PER_TIME_UNIT;
    },

    getBandCount(): number {
      return LATITUDE_BAND_COUNT;
    },

    getBandLuminosityMultiplier(band: number): number {
      assertBand(band);
      return multipliers[band];
    },

    getBandProportions,

    getBandLocalTemperature(band: number, species: Species): number {
      assertBand(band);
      return cellLocalTemperature(multipliers[band], species, derived());
    },

    getBandGrowthRate(band: number, species: Species): number {
      assertBand(band);
      return cellGrowthRate(bandView()[band], multipliers[band], species, derived());
    },

    getDisplayBandProportions(species: Species, displayCount: number = DISPLAY_BAND_COUNT): number[] {
      return displayBandAverages(getBandProportions(species), displayCount);
    },

    getLatitudeStats(species: Species): LatitudeStats {
      return latitudeStats(bandView(), species);
    },

    setLuminosity(value: number): void {
      luminosity = value;
      invalidate();
    },

    setSpeciesEnabled,

    setWhiteEnabled(value: boolean): void {
      setSpeciesEnabled('white', value);
    },

    setBlackEnabled(value: boolean): void {
      setSpeciesEnabled('black', value);
    },

    setGrayEnabled(value: boolean): void {
      setSpeciesEnabled('gray', value);
    },

    setDaisyGrowthAndDeath(value: boolean): void {
      growthEnabled = value;
      invalidate();
    },

    setRoundWorld(value: boolean): void {
      if (value === roundWorld) return;

      if (value) {
        bands = broadcast(flat);
      } else {
        const avg = averageGroundCover(bands);
        for (const species of SPECIES) {
          flat[species] = avg[species];
        }
      }
      roundWorld = value;
      invalidate();
    },

    boostIfExtinct(thresholds: BoostThresholds = {}): void {
      const levels = SPECIES.filter((species) => enabled[species]).map((species) => {
        const threshold = thresholds[species] ?? DEFAULT_BOOST_THRESHOLD;
        if (!(threshold >= EXTINCTION_FLOOR)) {
          throw new Error(`${species} boost threshold must be at least ${EXTINCTION_FLOOR}, got ${threshold}`);
        }
        return { species, threshold };
      });

      const cells = roundWorld ? bands : [flat];
      for (const { species, threshold } of levels) {
        for (const cover of cells) {
          if (cover[species] < threshold) cover[species] = threshold;
        }
      }
      invalidate();
    },

    update(): void {
      if (growthEnabled) {
        const snap = derived();
        if (roundWorld) {
          growCells(bands, multipliers, snap);
        } else {
          growCells([flat], [1], snap);
        }
      }
      updateCount++;
      invalidate();
    },

    snapshot(): PlanetSnapshot {
      const current = getProportions();
      const snap = derived();
      return {
        step: updateCount,
        time: planet.getTime(),
        luminosity,
        roundWorld,
        growthEnabled,
        enabled: { ...enabled },
        proportions: current,
        ground: groundProportion(current),
        albedo: snap.albedo,
        temperature: snap.temperature,
      };
    },
  };

  return planet;
}
