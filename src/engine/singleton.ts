/**
 * Engine singleton — Enforces "restart required" for the stepping config.
 *
 * Only one engine loop may be active at a time. Starting a second engine while
 * one is running throws. Stopping the engine clears the singleton.
 */

import { createEngineLoop, type EngineLoop, type EngineLoopConfig } from './engineLoop';

let activeEngine: EngineLoop | null = null;

/**
 * Create, register as singleton, and start the engine loop.
 * `setup` runs before the first tick is scheduled, so handlers registered there
 * are listed in the startup log.
 * Throws if an engine is already running.
 */
export function startEngine(
  config: EngineLoopConfig,
  setup?: (engine: EngineLoop) => void,
): EngineLoop {
  if (activeEngine !== null && activeEngine.isRunning()) {
    throw new Error(
      'An engine loop is already running. ' +
      'Stepping config is restart-only: stop the current engine or restart the process to change it.'
    );
  }

  const engine = createEngineLoop(config);
  setup?.(engine);
  activeEngine = engine;
  engine.start();

  return engine;
}

/**
 * Stop the active engine and clear the singleton.
 * No-op if no engine is active.
 */
export function stopEngine(): void {
  if (activeEngine !== null) {
    activeEngine.stop();
    activeEngine = null;
  }
}

export function getActiveEngine(): EngineLoop | null {
  return activeEngine;
}

export function isEngineRunning(): boolean {
  return activeEngine !== null && activeEngine.isRunning();
}

/**
 * Reset singleton state. Intended for testing only.
 * @internal
 */
export function _resetEngineSingleton(): void {
  stopEngine();
}
