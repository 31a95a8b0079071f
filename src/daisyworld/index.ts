export * from './constants';

export {
  SPECIES,
  SPECIES_ALBEDO,
  SPECIES_SHORT_NAME,
  GROUND_ALBEDO,
  isSpecies,
  type Species,
} from './species';

export {
  globalTemperature,
  localTemperature,
  effectiveAlbedo,
  growthRateFunction,
  growthRate,
} from './physics';

export {
  type GroundCover,
  createGroundCover,
  cloneGroundCover,
  groundProportion,
  coverAlbedo,
  applyExtinctionFloor,
  averageGroundCover,
} from './groundCover';

export {
  type LatitudeStats,
  bandLuminosityMultiplier,
  createBandMultipliers,
  roundWorldAlbedo,
  displayBandAverages,
  latitudeStats,
} from './latitude';

export {
  type InitialProportions,
  type PlanetOptions,
  type BoostThresholds,
  type PlanetSnapshot,
  type Planet,
  createPlanet,
} from './planet';
