import {
  globalTemperature,
  localTemperature,
  effectiveAlbedo,
  growthRateFunction,
  growthRate,
} from '../src/daisyworld/physics';

describe('globalTemperature', () => {
  it('should give about 26.87°C for albedo 0.5 at luminosity 1', () => {
    // (917000 · 0.5 / 0.0000567)^¼ − 273
    expect(globalTemperature(1, 0.5)).toBeCloseTo(26.874178, 5);
  });

  it('should be strictly increasing in luminosity', () => {
    let previous = -Infinity;
    for (let L = 0.5; L <= 1.7; L += 0.05) {
      const t = globalTemperature(L, 0.5);
      expect(t).toBeGreaterThan(previous);
      previous = t;
    }
  });

  it('should fall as albedo rises', () => {
    expect(globalTemperature(1, 0.75)).toBeLessThan(globalTemperature(1, 0.25));
  });

  it('should reach absolute zero at zero luminosity', () => {
    expect(globalTemperature(0, 0.5)).toBe(-273);
  });

  it('should propagate NaN for negative luminosity', () => {
    expect(globalTemperature(-1, 0.5)).toBeNaN();
  });
});

describe('localTemperature', () => {
  it('should warm patches darker than the planet', () => {
    // 20 · (0.5 − 0.25) + 26 = 31
    expect(localTemperature(0.5, 26, 0.25)).toBe(31);
  });

  it('should cool patches brighter than the planet', () => {
    expect(localTemperature(0.5, 26, 0.75)).toBe(21);
  });

  it('should equal the global temperature when albedos match', () => {
    expect(localTemperature(0.5, 26, 0.5)).toBe(26);
  });
});

describe('effectiveAlbedo', () => {
  it('should leave albedo unchanged at multiplier 1', () => {
    expect(effectiveAlbedo(0.25, 1)).toBe(0.25);
  });

  it('should scale absorption by the multiplier', () => {
    // 1 − 1.5 · (1 − 0.75)
    expect(effectiveAlbedo(0.75, 1.5)).toBeCloseTo(0.625, 12);
    // 1 − 0.6 · (1 − 0.25)
    expect(effectiveAlbedo(0.25, 0.6)).toBeCloseTo(0.55, 12);
  });
});

describe('growthRateFunction', () => {
  it('should peak at 1 for 22.5°C', () => {
    expect(growthRateFunction(22.5)).toBe(1);
  });

  it('should be symmetric around the optimum', () => {
    expect(growthRateFunction(12.5)).toBeCloseTo(growthRateFunction(32.5), 12);
  });

  it('should approach zero about 17.5°C from the optimum', () => {
    // 1 − 0.003265 · 17.5² = 0.00009375
    expect(growthRateFunction(40)).toBeCloseTo(0.00009375, 10);
    expect(growthRateFunction(5)).toBeCloseTo(0.00009375, 10);
  });

  it('should go negative far from the optimum', () => {
    expect(growthRateFunction(50)).toBeLessThan(0);
    expect(growthRateFunction(-10)).toBeLessThan(0);
  });
});

describe('growthRate', () => {
  it('should combine growth, available ground and death', () => {
    // 0.5 · (1 · 0.5 − 0.3)
    expect(growthRate(0.5, 22.5, 0.5)).toBeCloseTo(0.1, 12);
  });

  it('should be negative when no ground is free', () => {
    // 0.4 · (1 · 0 − 0.3)
    expect(growthRate(0.4, 22.5, 0)).toBeCloseTo(-0.12, 12);
  });

  it('should be zero for an absent population', () => {
    expect(growthRate(0, 22.5, 1)).toBe(0);
  });
});
