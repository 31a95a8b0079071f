/**
 * Scenarios — Classic Daisyworld runs (Watson & Lovelock 1983, figure 1).
 *
 * Each run builds its own planet and recorder, so runs are independent and
 * deterministic.
 */

import {
  UPDATES_PER_TIME_UNIT,
  createPlanet,
  type InitialProportions,
  type Planet,
  type Species,
} from '../daisyworld';
import { createDataRecorder, type DataRecorder } from '../recording';

export interface ScenarioResult {
  planet: Planet;
  recorder: DataRecorder;
}

// ── Frozen temperature check ────────────────────────────────────────

export interface TemperatureCheck {
  albedo: number;
  temperature: number;
  blackTemperature: number;
  whiteTemperature: number;
}

/**
 * Half white, half black, luminosity 1, no growth. Expected: albedo 0.5,
 * ≈26 °C globally, ≈31 °C over black daisies and ≈21 °C over white.
 */
export function runTemperatureCheck(): TemperatureCheck {
  const planet = createPlanet({
    proportions: { white: 0.5, black: 0.5 },
    luminosity: 1,
    growthEnabled: false,
  });

  return {
    albedo: planet.getTotalAlbedo(),
    temperature: planet.getGlobalTemperature(),
    blackTemperature: planet.getSpeciesLocalTemperature('black'),
    whiteTemperature: planet.getSpeciesLocalTemperature('white'),
  };
}

// ── Constant luminosity ─────────────────────────────────────────────

export interface ConstantLuminosityOptions {
  proportions: InitialProportions;
  enabled?: Partial<Record<Species, boolean>>;
  luminosity?: number;
  /** Simulated time units to run. Default 100 */
  timeUnits?: number;
  roundWorld?: boolean;
}

/**
 * Run at a fixed luminosity, recording the initial state and then one row per
 * time unit.
 */
export function runConstantLuminosity(options: ConstantLuminosityOptions): ScenarioResult {
  const timeUnits = options.timeUnits ?? 100;
  const roundWorld = options.roundWorld ?? false;

  const planet = createPlanet({
    proportions: options.proportions,
    enabled: options.enabled,
    luminosity: options.luminosity ?? 1,
    roundWorld,
  });
  const recorder = createDataRecorder({ intervalSteps: UPDATES_PER_TIME_UNIT, latitude: roundWorld });

  recorder.recordNow(planet);
  for (let i = 0; i < timeUnits * UPDATES_PER_TIME_UNIT; i++) {
    planet.update();
    recorder.record(planet);
  }

  return { planet, recorder };
}

// ── Luminosity sweep ────────────────────────────────────────────────

export interface LuminositySweepOptions {
  whiteEnabled: boolean;
  blackEnabled: boolean;
  minLuminosity?: number;
  maxLuminosity?: number;
  luminosityStep?: number;
  /** Time units the planet settles at each luminosity. Default 50 */
  timePerLuminosity?: number;
  roundWorld?: boolean;
}

/**
 * Raise the luminosity from min towards max, then lower it back to min.
 *
 * Each trial sets the luminosity, reseeds extinct daisies and runs
 * `timePerLuminosity` time units. One row is recorded on the last update of
 * every trial, so the row count is 2 · trials + 1.
 */
export function runLuminositySweep(options: LuminositySweepOptions): ScenarioResult {
  const {
    whiteEnabled,
    blackEnabled,
    minLuminosity = 0.5,
    maxLuminosity = 1.7,
    luminosityStep = 0.01,
    timePerLuminosity = 50,
    roundWorld = false,
  } = options;

  if (luminosityStep <= 0) {
    throw new Error(`luminosityStep must be positive, got ${luminosityStep}`);
  }

  const planet = createPlanet({
    proportions: {
      white: whiteEnabled ? 0.5 : 0,
      black: blackEnabled ? 0.5 : 0,
    },
    enabled: { white: whiteEnabled, black: blackEnabled },
    luminosity: minLuminosity,
    roundWorld,
  });

  const updatesPerLuminosity = Math.round(timePerLuminosity * UPDATES_PER_TIME_UNIT);
  const recorder = createDataRecorder({ intervalSteps: updatesPerLuminosity, latitude: roundWorld });
  const trials = Math.round((maxLuminosity - minLuminosity) / luminosityStep);

  const runTrial = (trial: number): void => {
    planet.setLuminosity(minLuminosity + luminosityStep * trial);
    planet.boostIfExtinct();
    for (let i = 0; i < updatesPerLuminosity; i++) {
      planet.update();
      recorder.record(planet);
    }
  };

  for (let trial = 0; trial < trials; trial++) {
    runTrial(trial);
  }
  for (let trial = trials; trial >= 0; trial--) {
    runTrial(trial);
  }

  return { planet, recorder };
}
