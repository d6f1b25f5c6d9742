/**
 * Simulation store using Zustand
 *
 * Each front end creates its own store; there is no module-level instance.
 * Events from the trajectory generator go to the given sink, or to the
 * 'Simulation' logger when none is passed.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { loggers, type Logger } from '../lib/logger';
import { createLoggingEventSink, type SimulationEventSink } from '../lib/simulationEvents';
import { createSimulationSlice, type SimulationSlice } from './slices/simulationSlice';

export interface SimulationStoreOptions {
  events?: SimulationEventSink;
  log?: Logger;
}

export type SimulationStore = StoreApi<SimulationSlice>;

export function createSimulationStore(options: SimulationStoreOptions = {}): SimulationStore {
  const log = options.log ?? loggers.simulation;
  const events = options.events ?? createLoggingEventSink(log);
  return createStore<SimulationSlice>()(createSimulationSlice({ events, log }));
}
