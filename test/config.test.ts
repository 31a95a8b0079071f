import { getConfig, resetConfigCache, applyEnvOverrides, formatZodError } from '../src/config';
import { config as fileConfig } from '../src/config/config';
import { AppConfigSchema } from '../src/config/schema';

beforeEach(() => {
  resetConfigCache();
  jest.spyOn(console, 'error').mockImplementation(() => { });
});

afterEach(() => {
  resetConfigCache();
  jest.restoreAllMocks();
});

describe('getConfig', () => {
  it('should validate the file config and fill defaults', () => {
    const config = getConfig({});

    expect(config.planet.proportions).toEqual({ white: 0.5, black: 0.5 });
    expect(config.planet.luminosity).toBe(1);
    expect(config.planet.roundWorld).toBe(false);
    expect(config.planet.enabled).toEqual({});
    expect(config.engine.stepsPerTick).toBe(10);
    expect(config.runtime.logLevel).toBe('info');
    expect(config.runtime.recording).toEqual({
      enabled: false,
      dir: './output',
      intervalSteps: 100,
      flushIntervalSteps: 10000,
    });
  });

  it('should compute derived values', () => {
    const { derived } = getConfig({});

    expect(derived.updatesPerTimeUnit).toBe(100);
    expect(derived.simTimePerTick).toBeCloseTo(0.1, 12);
    expect(derived.ticksPerSecond).toBe(10);
    expect(derived.acceleration).toBeCloseTo(1, 12);
  });

  it('should cache the result', () => {
    expect(getConfig({})).toBe(getConfig({}));
  });

  it('should deep-freeze the config', () => {
    const config = getConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.planet.proportions)).toBe(true);
    expect(Object.isFrozen(config.runtime.recording)).toBe(true);
  });

  it('should take the luminosity from LUMINOSITY', () => {
    expect(getConfig({ LUMINOSITY: '1.25' }).planet.luminosity).toBe(1.25);
  });

  it('should reject a non-numeric LUMINOSITY', () => {
    expect(() => getConfig({ LUMINOSITY: 'bright' })).toThrow(
      'Configuration validation failed. See error details above.'
    );
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('planet.luminosity'));
  });

  it('should reject a non-positive LUMINOSITY', () => {
    expect(() => getConfig({ LUMINOSITY: '0' })).toThrow('Configuration validation failed');
  });
});

describe('applyEnvOverrides', () => {
  it('should return the input untouched without overrides', () => {
    expect(applyEnvOverrides(fileConfig, {})).toBe(fileConfig);
    expect(applyEnvOverrides(fileConfig, { LUMINOSITY: '  ' })).toBe(fileConfig);
  });

  it('should not mutate the input', () => {
    const result = applyEnvOverrides(fileConfig, { LUMINOSITY: '0.8' });
    expect(result.planet.luminosity).toBe(0.8);
    expect(fileConfig.planet.luminosity).toBe(1);
  });
});

describe('AppConfigSchema', () => {
  it('should reject proportions summing above one', () => {
    const result = AppConfigSchema.safeParse({
      ...fileConfig,
      planet: { ...fileConfig.planet, proportions: { white: 0.7, black: 0.6 } },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['planet', 'proportions']);
      expect(result.error.issues[0].message).toBe('Initial proportions must sum to at most 1');
    }
  });

  it('should accept an optional gray proportion', () => {
    const result = AppConfigSchema.safeParse({
      ...fileConfig,
      planet: { ...fileConfig.planet, proportions: { white: 0.3, black: 0.3, gray: 0.2 } },
    });
    expect(result.success).toBe(true);
  });
});

describe('formatZodError', () => {
  it('should name unrecognized keys', () => {
    const result = AppConfigSchema.safeParse({ ...fileConfig, planett: {} });
    expect(result.success).toBe(false);
    if (!result.success) {
      const message = formatZodError(result.error);
      expect(message).toContain('❌ root:');
      expect(message).toContain('Unrecognized keys: planett');
    }
  });

  it('should show expected and received types', () => {
    const result = AppConfigSchema.safeParse({
      ...fileConfig,
      engine: { ...fileConfig.engine, stepsPerTick: '10' },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      const message = formatZodError(result.error);
      expect(message).toContain('❌ engine.stepsPerTick:');
      expect(message).toContain('Expected: number');
      expect(message).toContain('Received: string');
    }
  });
});
