import { config } from './config';
import { AppConfigSchema, type AppConfig, type AppConfigInput, type DerivedConfig, type ValidatedConfig } from './schema';
import { ZodError } from 'zod';
import { UPDATES_PER_TIME_UNIT, TIME_STEP } from '../daisyworld';
import { createLogger } from '../logging/logger';

const log = createLogger('Config');

let cachedConfig: ValidatedConfig | null = null;

function computeDerived(validatedConfig: AppConfig): DerivedConfig {
  const { engine } = validatedConfig;

  const simTimePerTick = engine.stepsPerTick * TIME_STEP;
  const ticksPerSecond = 1000 / engine.realTickIntervalMs;

  return {
    updatesPerTimeUnit: UPDATES_PER_TIME_UNIT,
    simTimePerTick,
    ticksPerSecond,
    acceleration: simTimePerTick * ticksPerSecond,
  };
}

/**
 * Apply environment overrides on top of the file config.
 * `LUMINOSITY` replaces `planet.luminosity`; the schema rejects a non-numeric value.
 */
export function applyEnvOverrides(input: AppConfigInput, env: NodeJS.ProcessEnv): AppConfigInput {
  const raw = env.LUMINOSITY?.trim();
  if (!raw) return input;

  return {
    ...input,
    planet: {
      ...input.planet,
      luminosity: Number(raw),
    },
  };
}

export function formatZodError(error: ZodError): string {
  const lines = ['Configuration validation failed:', ''];

  for (const issue of error.issues) {
    const path = issue.path.join('.') || 'root';

    if (issue.code === 'invalid_type') {
      lines.push(
        `  ❌ ${path}:`,
        `     Expected: ${issue.expected}`,
        `     Received: ${issue.received}`,
        ''
      );
    } else if (issue.code === 'unrecognized_keys') {
      lines.push(
        `  ❌ ${path}:`,
        `     Unrecognized keys: ${issue.keys.join(', ')}`,
        `     (This may be a typo or unsupported field)`,
        ''
      );
    } else {
      lines.push(
        `  ❌ ${path}:`,
        `     ${issue.message}`,
        ''
      );
    }
  }

  lines.push('Please fix the configuration and restart the server.');

  return lines.join('\n');
}

function deepFreeze<T>(obj: T): T {
  if (obj !== null && typeof obj === 'object') {
    Object.freeze(obj);
    for (const value of Object.values(obj)) {
      if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        deepFreeze(value);
      }
    }
  }
  return obj;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): ValidatedConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  try {
    const validated = AppConfigSchema.parse(applyEnvOverrides(config, env));

    const fullConfig: ValidatedConfig = {
      ...validated,
      derived: computeDerived(validated),
    };

    cachedConfig = deepFreeze(fullConfig);

    return cachedConfig;
  } catch (error) {
    if (error instanceof ZodError) {
      log.error(formatZodError(error));
      throw new Error('Configuration validation failed. See error details above.');
    }
    throw error;
  }
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
