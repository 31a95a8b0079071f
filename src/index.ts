import express, { Application } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import path from 'node:path';
import healthCheckRouter from './routes/healthCheck';
import planetRouter from './routes/planet';
import commandsRouter from './routes/commands';
import worldInfoRouter from './routes/worldInfo';
import { getConfig } from './config';
import { validateApiKey } from './middleware/auth';
import { startEngine, stopEngine } from './engine';
import { initPlanet, logPlanetMetrics, startRecording, stepPlanet } from './world';
import { TIME_STEP } from './daisyworld';
import { createLogger, setLogLevel } from './logging/logger';

dotenv.config();

const config = getConfig();
setLogLevel(config.runtime.logLevel);

const log = createLogger('Server');

log.info('=== Daisyworld Configuration ===');
log.info(`Initial cover: white=${config.planet.proportions.white}, black=${config.planet.proportions.black}` +
  (config.planet.proportions.gray !== undefined ? `, gray=${config.planet.proportions.gray}` : ''));
log.info(`Luminosity: ${config.planet.luminosity} | ${config.planet.roundWorld ? 'round' : 'flat'} world`);
log.info(`Engine: ${config.engine.stepsPerTick} step(s) every ${config.engine.realTickIntervalMs}ms`);
log.info(`Acceleration: ${config.derived.acceleration.toFixed(2)} time units/s`);
log.info(`Log Level: ${config.runtime.logLevel}`);
log.info(`Recording: ${config.runtime.recording.enabled ? `every ${config.runtime.recording.intervalSteps} steps to ${config.runtime.recording.dir}, flushed every ${config.runtime.recording.flushIntervalSteps} steps` : 'disabled'}`);
log.info('================================');

const app: Application = express();
const PORT = process.env.PORT || 3001;

app.use(cors());
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

app.use('/api/health-check', healthCheckRouter);

// Mutating requests after this point require API key authentication
app.use(validateApiKey);

app.use('/api/planet', planetRouter);
app.use('/api/commands', commandsRouter);
app.use('/api/world-info', worldInfoRouter);

initPlanet({
  proportions: config.planet.proportions,
  luminosity: config.planet.luminosity,
  roundWorld: config.planet.roundWorld,
  growthEnabled: config.planet.growthEnabled,
  enabled: config.planet.enabled,
});

const recording = config.runtime.recording;
const recorder = recording.enabled ? startRecording(recording.intervalSteps) : null;
const recordingFile = path.join(recording.dir, `daisyworld-${Date.now()}.csv`);

app.listen(PORT, () => {
  log.info(`Server is running on port ${PORT}`);
  log.info(`Health check available at http://localhost:${PORT}/api/health-check`);

  startEngine(
    {
      timeStep: TIME_STEP,
      stepsPerTick: config.engine.stepsPerTick,
      realTickIntervalMs: config.engine.realTickIntervalMs,
    },
    (engine) => {
      engine.registerHandler('daisyworld', () => {
        stepPlanet();
      });
      engine.registerSystem('planet-metrics', config.runtime.metricsIntervalSteps, logPlanetMetrics);
      if (recorder) {
        engine.registerSystem('recorder-flush', recording.flushIntervalSteps, () => {
          recorder.flushCsv(recordingFile).catch((err: unknown) => {
            log.error(`Failed to flush recording to ${recordingFile}:`, err);
          });
        });
      }
    },
  );
});

function shutdown(signal: string): void {
  log.info(`Received ${signal}, shutting down`);
  stopEngine();

  if (!recorder) {
    process.exit(0);
  }

  recorder
    .flushCsv(recordingFile)
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      log.error('Failed to write recording:', err);
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
