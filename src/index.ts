/**
 * Two-link planar arm kinematics and circular trajectory generation
 */

export type * from './types';
export * from './config/simulation';
export * from './lib/errors';
export * from './lib/kinematics';
export * from './lib/simulationEvents';
export * from './lib/simulationInput';
export * from './lib/plotSeries';
export * from './lib/armAnimation';
export {
  createLogger,
  configureLogger,
  addLogHandler,
  getLogConfig,
  loggers,
  type Logger,
  type LogEntry,
  type LogHandler,
  type LogLevel,
} from './lib/logger';
export { createSimulationStore, type SimulationStore, type SimulationStoreOptions } from './stores/simulationStore';
export {
  NO_DATA_NOTICE,
  getDefaultSimulationState,
  type SimulationSlice,
  type SimulationSliceState,
  type SimulationSliceActions,
} from './stores/slices/simulationSlice';
