export {
  type StepContext,
  type StepHandler,
  type SystemHandler,
  type EngineLoopConfig,
  type EngineLoop,
  createEngineLoop,
} from './engineLoop';

export {
  startEngine,
  stopEngine,
  getActiveEngine,
  isEngineRunning,
  _resetEngineSingleton,
} from './singleton';
