import {
  initPlanet,
  getPlanet,
  startRecording,
  getRecorder,
  stepPlanet,
  _resetPlanetSingleton,
  formatPlanetMetrics,
  logPlanetMetrics,
} from '../src/world';
import { createPlanet } from '../src/daisyworld/planet';

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => { });
  _resetPlanetSingleton();
});

afterEach(() => {
  _resetPlanetSingleton();
  jest.restoreAllMocks();
});

describe('initPlanet', () => {
  it('should create and store the planet', () => {
    const planet = initPlanet({ proportions: { white: 0.5, black: 0.5 }, luminosity: 1 });
    expect(getPlanet()).toBe(planet);
  });

  it('should log the initial state', () => {
    initPlanet({ proportions: { white: 0.3, black: 0.2, gray: 0.1 }, luminosity: 1.1, roundWorld: true });
    expect(console.log).toHaveBeenCalledWith(
      '[Planet] Initialized: white=0.3 black=0.2 gray=0.1 | L=1.1 | round | growth on'
    );
  });

  it('should throw when already initialized', () => {
    initPlanet({ proportions: { white: 0.5, black: 0.5 }, luminosity: 1 });
    expect(() => initPlanet({ proportions: { white: 0.5, black: 0.5 }, luminosity: 1 })).toThrow(
      'Planet is already initialized'
    );
  });

  it('should return null before initialization', () => {
    expect(getPlanet()).toBeNull();
  });
});

describe('formatPlanetMetrics', () => {
  it('should summarize enabled species, albedo and temperature', () => {
    const planet = createPlanet({
      proportions: { white: 0.5, black: 0.5 },
      luminosity: 1,
      growthEnabled: false,
    });

    expect(formatPlanetMetrics(planet)).toBe(
      't=0.00 | L=1.000 | white=0.5000 black=0.5000 ground=0.0000 | albedo=0.5000 | temp=26.87°C'
    );
  });

  it('should say when no daisies are enabled', () => {
    const planet = createPlanet({
      proportions: { white: 0, black: 0 },
      luminosity: 1,
      enabled: { white: false, black: false },
    });

    expect(formatPlanetMetrics(planet)).toContain('| no daisies ground=1.0000 |');
  });
});

describe('stepPlanet', () => {
  it('should throw before initialization', () => {
    expect(() => stepPlanet()).toThrow('Planet is not initialized');
  });

  it('should advance the planet one update', () => {
    const planet = initPlanet({ proportions: { white: 0.5, black: 0.5 }, luminosity: 1 });
    expect(stepPlanet()).toBe(planet);
    expect(planet.getUpdateCount()).toBe(1);
  });

  it('should record every interval step whichever caller advanced the planet', () => {
    initPlanet({ proportions: { white: 0.5, black: 0.5 }, luminosity: 1, growthEnabled: false });
    const recorder = startRecording(100);

    // Engine steps, a manual burst across step 100, then more engine steps
    for (let i = 0; i < 95; i++) stepPlanet();
    for (let i = 0; i < 10; i++) stepPlanet();
    for (let i = 0; i < 90; i++) stepPlanet();

    expect(recorder.rows().map((row) => row.t)).toEqual([1]);
  });
});

describe('startRecording', () => {
  it('should return null before recording starts', () => {
    expect(getRecorder()).toBeNull();
  });

  it('should always carry latitude columns', () => {
    const recorder = startRecording(10);
    expect(getRecorder()).toBe(recorder);
    expect(recorder.columns).toContain('lat_min_w');
    expect(recorder.columns).toContain('lat_max_g');
  });

  it('should capture latitude statistics after a switch to round mode', () => {
    const planet = initPlanet({ proportions: { white: 0.5, black: 0.5 }, luminosity: 1, growthEnabled: false });
    const recorder = startRecording(1);

    planet.setRoundWorld(true);
    stepPlanet();

    const [row] = recorder.rows();
    expect(row.lat_min_b).toBe(0);
    expect(row.lat_max_b).toBe(89);
    expect(row.lat_min_g).toBe(90);
  });

  it('should throw when already started', () => {
    startRecording(10);
    expect(() => startRecording(10)).toThrow('Recording is already started.');
  });

  it('should be cleared by the reset', () => {
    startRecording(10);
    _resetPlanetSingleton();
    expect(getRecorder()).toBeNull();
  });
});

describe('logPlanetMetrics', () => {
  it('should do nothing without a planet', () => {
    logPlanetMetrics();
    expect(console.log).not.toHaveBeenCalled();
  });

  it('should log the planet update count and metrics line', () => {
    const planet = initPlanet({ proportions: { white: 0.5, black: 0.5 }, luminosity: 1, growthEnabled: false });
    for (let i = 0; i < 3; i++) stepPlanet();

    logPlanetMetrics();

    expect(console.log).toHaveBeenLastCalledWith(
      `[PlanetMetrics] Step 3 | ${formatPlanetMetrics(planet)}`
    );
  });
});
