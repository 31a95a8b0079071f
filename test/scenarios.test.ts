import {
  runTemperatureCheck,
  runConstantLuminosity,
  runLuminositySweep,
} from '../src/experiments/scenarios';
import { globalTemperature } from '../src/daisyworld/physics';

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => { });
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('runTemperatureCheck', () => {
  it('should match the reference energy balance', () => {
    const check = runTemperatureCheck();

    expect(check.albedo).toBeCloseTo(0.5, 12);
    expect(check.temperature).toBeCloseTo(26.874178, 5);
    expect(check.blackTemperature).toBeCloseTo(31.874178, 5);
    expect(check.whiteTemperature).toBeCloseTo(21.874178, 5);
  });
});

describe('runConstantLuminosity', () => {
  it('should record the initial state and one row per time unit', () => {
    const { recorder, planet } = runConstantLuminosity({
      proportions: { white: 0.5, black: 0.5 },
      timeUnits: 3,
    });

    const rows = recorder.rows();
    expect(rows).toHaveLength(4);
    expect(rows.map((r) => r.t)).toEqual([0, 1, 2, 3]);
    expect(rows[0].a_w).toBe(0.5);
    expect(planet.getUpdateCount()).toBe(300);
  });

  it('should settle black-only daisies near 0.15', () => {
    const { recorder } = runConstantLuminosity({
      proportions: { white: 0, black: 0.5 },
      enabled: { white: false },
    });

    const last = recorder.rows()[recorder.rows().length - 1];
    expect(last.t).toBe(100);
    expect(last.a_b).toBeCloseTo(0.15, 2);
    expect(last.a_w).toBe(0);
    expect(Math.abs(last.temp - 35)).toBeLessThanOrEqual(3);
  });

  it('should add latitude columns for a round world', () => {
    const { recorder } = runConstantLuminosity({
      proportions: { white: 0.3, black: 0.3 },
      timeUnits: 1,
      roundWorld: true,
    });

    expect(recorder.columns).toContain('lat_mean_w');
    expect(recorder.rows()[0].lat_min_w).toBe(0);
    expect(recorder.rows()[0].lat_max_w).toBe(89);
  });
});

describe('runLuminositySweep', () => {
  const coarse = {
    minLuminosity: 0.5,
    maxLuminosity: 0.7,
    luminosityStep: 0.1,
    timePerLuminosity: 1,
  };

  it('should raise then lower the luminosity, one row per trial', () => {
    const { recorder, planet } = runLuminositySweep({
      whiteEnabled: false,
      blackEnabled: false,
      ...coarse,
    });

    const rows = recorder.rows();
    expect(rows).toHaveLength(5);

    const luminosities = rows.map((r) => r.L);
    [0.5, 0.6, 0.7, 0.6, 0.5].forEach((expected, i) => {
      expect(luminosities[i]).toBeCloseTo(expected, 10);
    });
    expect(rows.map((r) => r.t)).toEqual([1, 2, 3, 4, 5]);
    expect(planet.getUpdateCount()).toBe(500);
  });

  it('should track the bare-planet temperature without daisies', () => {
    const { recorder } = runLuminositySweep({
      whiteEnabled: false,
      blackEnabled: false,
      ...coarse,
    });

    for (const row of recorder.rows()) {
      expect(row.a_w).toBe(0);
      expect(row.a_b).toBe(0);
      expect(row.temp).toBeCloseTo(globalTemperature(row.L, 0.5), 8);
    }
    const rising = recorder.rows().slice(0, 3).map((r) => r.temp);
    expect(rising[1]).toBeGreaterThan(rising[0]);
    expect(rising[2]).toBeGreaterThan(rising[1]);
  });

  it('should keep a disabled colour at zero while reseeding the enabled one', () => {
    const { recorder } = runLuminositySweep({
      whiteEnabled: false,
      blackEnabled: true,
      minLuminosity: 0.9,
      maxLuminosity: 1.1,
      luminosityStep: 0.1,
      timePerLuminosity: 10,
    });

    for (const row of recorder.rows()) {
      expect(row.a_w).toBe(0);
      expect(row.a_b).toBeGreaterThan(0);
    }
  });

  it('should reject a non-positive luminosity step', () => {
    expect(() => runLuminositySweep({ whiteEnabled: true, blackEnabled: true, luminosityStep: 0 })).toThrow(
      'luminosityStep must be positive, got 0'
    );
  });
});
