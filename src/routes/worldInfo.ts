import { Router, Request, Response } from 'express';
import { getConfig } from '../config';
import { getActiveEngine } from '../engine';

const router = Router();

router.get('/', (req: Request, res: Response) => {
  const config = getConfig();
  const engine = getActiveEngine();

  if (!engine) {
    res.status(503).json({ error: 'Engine is not running' });
    return;
  }

  res.status(200).json({
    planet: {
      initialProportions: config.planet.proportions,
      initialLuminosity: config.planet.luminosity,
      roundWorld: config.planet.roundWorld,
      growthEnabled: config.planet.growthEnabled,
    },
    engine: {
      stepsPerTick: config.engine.stepsPerTick,
      realTickIntervalMs: config.engine.realTickIntervalMs,
      updatesPerTimeUnit: config.derived.updatesPerTimeUnit,
      acceleration: config.derived.acceleration,
      current: {
        running: engine.isRunning(),
        stepNumber: engine.getStepNumber(),
        simTime: engine.getSimTime(),
        ticks: engine.getTickCount(),
      },
    },
    runtime: {
      logLevel: config.runtime.logLevel,
      metricsIntervalSteps: config.runtime.metricsIntervalSteps,
      recording: config.runtime.recording,
    },
  });
});

export default router;
