/**
 * EngineLoop — Self-correcting fixed-step simulation loop.
 *
 * Each tick:
 *   1. Runs `stepsPerTick` simulation steps; per step it increments the step
 *      number, calls every registered handler in order, then advances the
 *      step accumulators of cadenced systems
 *   2. Schedules the next tick, compensating for execution time
 *
 * Configuration is read once at creation (restart-only).
 */

import { createLogger } from '../logging/logger';

const log = createLogger('Engine');

// ── Types ───────────────────────────────────────────────────────────

export interface StepContext {
  /** Step number (1-indexed: the first executed step is 1) */
  readonly stepNumber: number;
  /** Simulated time units elapsed after this step */
  readonly simTime: number;
  /** Simulated time advanced by one step */
  readonly timeStep: number;
}

/**
 * A step handler is called once per simulation step.
 * Handlers run synchronously in registration order.
 */
export type StepHandler = (ctx: StepContext) => void;

/**
 * A system handler is called when its accumulator reaches the cadence threshold.
 */
export type SystemHandler = (ctx: StepContext) => void;

export interface EngineLoopConfig {
  /** Simulated time units per step */
  timeStep: number;
  /** Steps executed per wall-clock tick */
  stepsPerTick: number;
  /** Wall-clock interval between ticks, in milliseconds */
  realTickIntervalMs: number;
}

// ── Engine Loop ─────────────────────────────────────────────────────

export interface EngineLoop {
  /** Register a step handler (called every step). Returns an unregister function. */
  registerHandler(name: string, handler: StepHandler): () => void;
  /** Register a cadenced system. Fires every `cadenceSteps` steps. Returns an unregister function. */
  registerSystem(name: string, cadenceSteps: number, handler: SystemHandler): () => void;
  /** Start the loop. No-op if already running. */
  start(): void;
  /** Stop the loop. No-op if not running. */
  stop(): void;
  /** Whether the loop is currently running. */
  isRunning(): boolean;
  /** Steps executed so far. */
  getStepNumber(): number;
  /** Simulated time units elapsed. */
  getSimTime(): number;
  /** Ticks executed so far. */
  getTickCount(): number;
}

export function createEngineLoop(config: EngineLoopConfig): EngineLoop {
  const { timeStep, stepsPerTick, realTickIntervalMs } = config;

  if (!Number.isInteger(stepsPerTick) || stepsPerTick < 1) {
    throw new Error(`stepsPerTick must be a positive integer, got ${stepsPerTick}`);
  }

  let stepNumber = 0;
  let tickCount = 0;
  let running = false;
  let timerId: ReturnType<typeof setTimeout> | null = null;

  const handlers: Map<string, StepHandler> = new Map();

  interface SystemEntry {
    cadenceSteps: number;
    accumulated: number;
    handler: SystemHandler;
  }
  const systems: Map<string, SystemEntry> = new Map();

  function simTimeAt(step: number): number {
    return step * timeStep;
  }

  function step(): void {
    stepNumber++;

    const ctx: StepContext = Object.freeze({
      stepNumber,
      simTime: simTimeAt(stepNumber),
      timeStep,
    });

    for (const [name, handler] of handlers) {
      try {
        handler(ctx);
      } catch (err) {
        log.error(`Handler "${name}" threw on step ${stepNumber}:`, err);
      }
    }

    for (const [name, entry] of systems) {
      entry.accumulated += 1;
      if (entry.accumulated >= entry.cadenceSteps) {
        entry.accumulated -= entry.cadenceSteps;
        try {
          entry.handler(ctx);
        } catch (err) {
          log.error(`System "${name}" threw on step ${stepNumber}:`, err);
        }
      }
    }
  }

  function tick(): void {
    const tickStart = performance.now();

    for (let i = 0; i < stepsPerTick; i++) {
      step();
    }
    tickCount++;

    const tickDuration = performance.now() - tickStart;

    log.debug(
      `Tick ${tickCount} | step ${stepNumber} | t=${simTimeAt(stepNumber).toFixed(2)} | ${tickDuration.toFixed(1)}ms`
    );

    // Self-correcting schedule: subtract execution time from interval
    if (running) {
      const nextDelay = Math.max(0, realTickIntervalMs - tickDuration);
      timerId = setTimeout(tick, nextDelay);
    }
  }

  return {
    registerHandler(name: string, handler: StepHandler): () => void {
      if (handlers.has(name)) {
        throw new Error(`Handler "${name}" is already registered`);
      }
      handlers.set(name, handler);
      return () => {
        handlers.delete(name);
      };
    },

    registerSystem(name: string, cadenceSteps: number, handler: SystemHandler): () => void {
      if (!Number.isInteger(cadenceSteps) || cadenceSteps <= 0) {
        throw new Error(`cadenceSteps must be a positive integer, got ${cadenceSteps}`);
      }
      if (systems.has(name)) {
        throw new Error(`System "${name}" is already registered`);
      }
      systems.set(name, {
        cadenceSteps,
        accumulated: 0,
        handler,
      });
      return () => {
        systems.delete(name);
      };
    },

    start(): void {
      if (running) return;
      running = true;

      const ticksPerSecond = 1000 / realTickIntervalMs;
      const acceleration = stepsPerTick * timeStep * ticksPerSecond;
      log.info(
        `Starting loop: ${stepsPerTick} step(s)/tick, interval=${realTickIntervalMs}ms, ${acceleration.toFixed(2)} time units/s`
      );
      log.info(`Registered handlers: ${handlers.size > 0 ? [...handlers.keys()].join(', ') : '(none)'}`);
      if (systems.size > 0) {
        const systemInfo = [...systems.entries()]
          .map(([n, e]) => `${n}(${e.cadenceSteps} steps)`)
          .join(', ');
        log.info(`Registered systems: ${systemInfo}`);
      }

      timerId = setTimeout(tick, realTickIntervalMs);
    },

    stop(): void {
      if (!running) return;
      running = false;

      if (timerId !== null) {
        clearTimeout(timerId);
        timerId = null;
      }

      log.info(`Stopped at step ${stepNumber} | t=${simTimeAt(stepNumber).toFixed(2)}`);
    },

    isRunning(): boolean {
      return running;
    },

    getStepNumber(): number {
      return stepNumber;
    },

    getSimTime(): number {
      return simTimeAt(stepNumber);
    },

    getTickCount(): number {
      return tickCount;
    },
  };
}
