/**
 * Planet Singleton — Server-wide access to the simulated planet.
 *
 * Call `initPlanet(options)` once at server startup, then use `getPlanet()` from
 * routes and engine handlers. Every update, whether from the engine or from a
 * manual step, goes through `stepPlanet()` so the recorder sees each step.
 */

import { createPlanet, type Planet, type PlanetOptions } from '../daisyworld';
import { createDataRecorder, type DataRecorder } from '../recording';
import { createLogger } from '../logging/logger';

const log = createLogger('Planet');

let planet: Planet | null = null;
let recorder: DataRecorder | null = null;

/**
 * Initialize the planet. Throws if already initialized.
 */
export function initPlanet(options: PlanetOptions): Planet {
  if (planet !== null) {
    throw new Error('Planet is already initialized. Restart the server to re-initialize.');
  }

  planet = createPlanet(options);

  const { proportions } = options;
  log.info(
    `Initialized: white=${proportions.white} black=${proportions.black}` +
    (proportions.gray !== undefined ? ` gray=${proportions.gray}` : '') +
    ` | L=${options.luminosity} | ${planet.isRoundWorld() ? 'round' : 'flat'}` +
    ` | growth ${planet.isGrowthEnabled() ? 'on' : 'off'}`
  );

  return planet;
}

/**
 * Get the planet. Returns null if not initialized.
 */
export function getPlanet(): Planet | null {
  return planet;
}

/**
 * Attach a recorder that samples the planet every `intervalSteps` updates.
 * Latitude columns are always on: a flat planet reads as uniform bands, and the
 * planet may switch to round mode while running.
 */
export function startRecording(intervalSteps: number): DataRecorder {
  if (recorder !== null) {
    throw new Error('Recording is already started.');
  }
  recorder = createDataRecorder({ intervalSteps, latitude: true });
  return recorder;
}

export function getRecorder(): DataRecorder | null {
  return recorder;
}

/**
 * Advance the planet one update and offer the new state to the recorder.
 */
export function stepPlanet(): Planet {
  if (planet === null) {
    throw new Error('Planet is not initialized');
  }
  planet.update();
  recorder?.record(planet);
  return planet;
}

/**
 * Reset planet state. Intended for testing only.
 * @internal
 */
export function _resetPlanetSingleton(): void {
  planet = null;
  recorder = null;
}
