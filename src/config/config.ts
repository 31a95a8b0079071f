import type { AppConfigInput } from './schema';

export const config: AppConfigInput = {
  planet: {
    proportions: {
      white: 0.5,
      black: 0.5,
    },
    luminosity: 1.0,
    roundWorld: false,
    growthEnabled: true,
  },

  engine: {
    stepsPerTick: 10,
    realTickIntervalMs: 100,
  },

  runtime: {
    logLevel: 'info',
    metricsIntervalSteps: 100,

    recording: {
      enabled: false,
      dir: './output',
      intervalSteps: 100,
      flushIntervalSteps: 10000,
    },
  },
};
