export {
  initPlanet,
  getPlanet,
  startRecording,
  getRecorder,
  stepPlanet,
  _resetPlanetSingleton,
} from './planetSingleton';
export { formatPlanetMetrics, logPlanetMetrics } from './metricsLogger';
