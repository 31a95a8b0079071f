/**
 * Runs the classic Daisyworld suite and writes each run as CSV.
 *
 * Usage: npm run build && npm run experiments
 * Output goes to `runtime.recording.dir`.
 */

import path from 'node:path';
import dotenv from 'dotenv';
import { getConfig } from '../config';
import { createLogger, setLogLevel } from '../logging/logger';
import {
  runConstantLuminosity,
  runLuminositySweep,
  runTemperatureCheck,
  type ScenarioResult,
} from './scenarios';

const log = createLogger('Experiments');

function summarize(name: string, { planet }: ScenarioResult): void {
  log.info(
    `${name} completed. Temperature = ${planet.getGlobalTemperature().toFixed(2)}; ` +
    `white = ${planet.getProportion('white').toFixed(4)}; black = ${planet.getProportion('black').toFixed(4)}`
  );
}

export async function runAll(outputDir: string): Promise<void> {
  const check = runTemperatureCheck();
  log.info(
    `Temperature check: albedo=${check.albedo.toFixed(3)} global=${check.temperature.toFixed(2)} ` +
    `black=${check.blackTemperature.toFixed(2)} white=${check.whiteTemperature.toFixed(2)}`
  );

  const runs: Array<[string, () => ScenarioResult]> = [
    ['constant_luminosity_black', () => runConstantLuminosity({
      proportions: { white: 0, black: 0.5 },
      enabled: { white: false },
    })],
    ['constant_luminosity_black_and_white', () => runConstantLuminosity({
      proportions: { white: 0.5, black: 0.5 },
    })],
    ['constant_luminosity_black_and_white_round', () => runConstantLuminosity({
      proportions: { white: 0.3, black: 0.3 },
      roundWorld: true,
    })],
    ['no_daisies', () => runLuminositySweep({ whiteEnabled: false, blackEnabled: false })],
    ['black', () => runLuminositySweep({ whiteEnabled: false, blackEnabled: true })],
    ['white', () => runLuminositySweep({ whiteEnabled: true, blackEnabled: false })],
    ['black_and_white', () => runLuminositySweep({ whiteEnabled: true, blackEnabled: true })],
  ];

  for (const [name, run] of runs) {
    const result = run();
    summarize(name, result);
    await result.recorder.writeCsv(path.join(outputDir, `${name}.csv`));
  }
}

if (require.main === module) {
  dotenv.config();
  const config = getConfig();
  setLogLevel(config.runtime.logLevel);

  runAll(config.runtime.recording.dir).catch((err: unknown) => {
    log.error('Experiment run failed:', err);
    process.exitCode = 1;
  });
}
