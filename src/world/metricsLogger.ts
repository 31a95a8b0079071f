/**
 * Metrics Logger — Cadenced system handler that logs the planet's state.
 *
 * Register with the engine loop to get periodic metrics output.
 */

import { SPECIES, type Planet } from '../daisyworld';
import { createLogger } from '../logging/logger';
import { getPlanet } from './planetSingleton';

const log = createLogger('PlanetMetrics');

export function formatPlanetMetrics(planet: Planet): string {
  const covers = SPECIES
    .filter((species) => planet.isSpeciesEnabled(species))
    .map((species) => `${species}=${planet.getProportion(species).toFixed(4)}`);

  return (
    `t=${planet.getTime().toFixed(2)} | ` +
    `L=${planet.getLuminosity().toFixed(3)} | ` +
    `${covers.length > 0 ? covers.join(' ') : 'no daisies'} ground=${planet.getGroundProportion().toFixed(4)} | ` +
    `albedo=${planet.getTotalAlbedo().toFixed(4)} | ` +
    `temp=${planet.getGlobalTemperature().toFixed(2)}°C`
  );
}

/**
 * System handler that logs planet metrics.
 * Designed to be registered via engine.registerSystem(). The step shown is the
 * planet's own update count, which includes manual steps.
 */
export function logPlanetMetrics(): void {
  const planet = getPlanet();
  if (!planet) return;

  log.info(`Step ${planet.getUpdateCount()} | ${formatPlanetMetrics(planet)}`);
}
