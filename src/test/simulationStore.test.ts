/**
 * Simulation Store Tests
 *
 * Drives the session store the way the input form and plot window do:
 * run, show/hide plots, clear, and recover from rejected requests.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createSimulationStore, type SimulationStore } from '../stores/simulationStore';
import { NO_DATA_NOTICE } from '../stores/slices/simulationSlice';
import { createRecordingEventSink, type RecordingEventSink } from '../lib/simulationEvents';
import type { Logger } from '../lib/logger';
import type { SimulationInputFields } from '../types';

const reachableFields: SimulationInputFields = {
  link1Length: '100',
  link2Length: '80',
  baseX: '0',
  baseY: '0',
  centerX: '150',
  centerY: '0',
  radius: '30',
  speed: '50',
  timeStep: '0.1',
};

const unreachableFields: SimulationInputFields = {
  ...reachableFields,
  centerX: '300',
  radius: '10',
};

describe('simulationStore', () => {
  let store: SimulationStore;
  let events: RecordingEventSink;
  let log: Logger & { warn: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    events = createRecordingEventSink();
    log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    store = createSimulationStore({ events, log });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should start idle with nothing to show', () => {
    const state = store.getState();
    expect(state.status).toBe('idle');
    expect(state.trajectory).toBeNull();
    expect(state.plotsVisible).toBe(false);
  });

  describe('runSimulation', () => {
    it('should store the trajectory and animation data on success', () => {
      expect(store.getState().runSimulation(reachableFields)).toBe(true);

      const state = store.getState();
      expect(state.status).toBe('ready');
      expect(state.error).toBeNull();
      expect(state.trajectory).toHaveLength(39);
      expect(state.poses).toHaveLength(39);
      expect(state.viewBounds?.xMax).toBeCloseTo(234, 9);
      expect(state.request?.animationIntervalMs).toBe(20);
    });

    it('should pass generator events to the injected sink', () => {
      store.getState().runSimulation(reachableFields);
      expect(events.events.map((e) => e.type)).toEqual([
        'simulation_requested',
        'validation_completed',
        'simulation_completed',
      ]);
    });

    it('should complete a valid run even when the event sink throws', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const failing = createSimulationStore({
        events: { emit: () => { throw new Error('sink down'); } },
        log,
      });

      expect(failing.getState().runSimulation(reachableFields)).toBe(true);
      expect(failing.getState().status).toBe('ready');
      expect(failing.getState().trajectory).toHaveLength(39);
      expect(log.error).not.toHaveBeenCalled();
    });

    it('should reject an unreachable circle and keep no results', () => {
      expect(store.getState().runSimulation(unreachableFields)).toBe(false);

      const state = store.getState();
      expect(state.status).toBe('rejected');
      expect(state.error?.kind).toBe('out_of_reach');
      expect(state.trajectory).toBeNull();
      expect(state.poses).toEqual([]);
      expect(log.warn).toHaveBeenCalledTimes(1);
    });

    it('should reject invalid form input before generating', () => {
      expect(store.getState().runSimulation({ ...reachableFields, speed: '' })).toBe(false);

      const state = store.getState();
      expect(state.status).toBe('rejected');
      expect(state.error).toEqual({
        kind: 'invalid_parameter',
        message: "Invalid speed: 'Speed [mm/s]' cannot be empty",
      });
      expect(events.events).toHaveLength(0);
    });

    it('should drop earlier results when a later run is rejected', () => {
      store.getState().runSimulation(reachableFields);
      store.getState().showPlots();
      store.getState().runSimulation(unreachableFields);

      const state = store.getState();
      expect(state.trajectory).toBeNull();
      expect(state.plots).toBeNull();
      expect(state.plotsVisible).toBe(false);
    });
  });

  describe('plots', () => {
    it('should refuse to show plots before a successful run', () => {
      expect(store.getState().showPlots()).toBe(false);
      expect(store.getState().notice).toBe(NO_DATA_NOTICE);
      expect(log.warn).toHaveBeenCalledWith('Plots requested before simulation data was available');
    });

    it('should build the plot series once data is ready', () => {
      store.getState().runSimulation(reachableFields);
      expect(store.getState().showPlots()).toBe(true);

      const { plots, plotsVisible, notice } = store.getState();
      expect(plotsVisible).toBe(true);
      expect(notice).toBeNull();
      expect(plots?.time).toHaveLength(39);
      expect(plots?.angleUnit).toBe('deg');
    });

    it('should hide plots without discarding them', () => {
      store.getState().runSimulation(reachableFields);
      store.getState().showPlots();
      store.getState().hidePlots();

      expect(store.getState().plotsVisible).toBe(false);
      expect(store.getState().plots).not.toBeNull();
    });
  });

  it('should return to idle on clear', () => {
    store.getState().runSimulation(reachableFields);
    store.getState().clearSimulation();

    const state = store.getState();
    expect(state.status).toBe('idle');
    expect(state.trajectory).toBeNull();
    expect(state.request).toBeNull();
  });

  it('should notify subscribers of status changes', () => {
    const statuses: string[] = [];
    store.subscribe((state) => statuses.push(state.status));

    store.getState().runSimulation(reachableFields);
    expect(statuses).toEqual(['running', 'ready']);
  });

  it('should keep separate stores independent', () => {
    const other = createSimulationStore({ events: createRecordingEventSink(), log });
    store.getState().runSimulation(reachableFields);

    expect(other.getState().status).toBe('idle');
  });
});
