/**
 * Simulation State Slice
 *
 * Owns one front end's simulation session: the last request, its trajectory
 * and the derived animation/plot data. Status moves
 * idle -> running -> ready | rejected; plots can only be shown once ready.
 */

import type { StateCreator } from 'zustand/vanilla';
import type {
  SimulationInputFields,
  SimulationRequest,
  SimulationStatus,
  Trajectory,
} from '../../types';
import { computeViewBounds, toArmPoses, type ArmPose, type ViewBounds } from '../../lib/armAnimation';
import { generateTrajectory } from '../../lib/circularTrajectory';
import { describeError, KinematicsError, type ErrorDescription } from '../../lib/errors';
import type { Logger } from '../../lib/logger';
import { toPlotSeries, type PlotSeries } from '../../lib/plotSeries';
import type { SimulationEventSink } from '../../lib/simulationEvents';
import { parseSimulationInput } from '../../lib/simulationInput';

export interface SimulationSliceState {
  status: SimulationStatus;
  request: SimulationRequest | null;
  trajectory: Trajectory | null;
  poses: ArmPose[];
  viewBounds: ViewBounds | null;
  plots: PlotSeries | null;
  plotsVisible: boolean;
  error: ErrorDescription | null;
  notice: string | null;
}

export interface SimulationSliceActions {
  /** Parse the form, generate the trajectory and store the outcome. Returns true on success. */
  runSimulation: (fields: SimulationInputFields) => boolean;
  /** Returns false when there is no trajectory to plot yet */
  showPlots: () => boolean;
  hidePlots: () => void;
  clearSimulation: () => void;
}

export type SimulationSlice = SimulationSliceState & SimulationSliceActions;

export interface SimulationSliceDeps {
  events: SimulationEventSink;
  log: Logger;
}

export const NO_DATA_NOTICE = 'Please run the simulation first to generate data for plots.';

export const getDefaultSimulationState = (): SimulationSliceState => ({
  status: 'idle',
  request: null,
  trajectory: null,
  poses: [],
  viewBounds: null,
  plots: null,
  plotsVisible: false,
  error: null,
  notice: null,
});

export const createSimulationSlice = (
  deps: SimulationSliceDeps
): StateCreator<SimulationSlice, [], [], SimulationSlice> => (set, get) => ({
  ...getDefaultSimulationState(),

  runSimulation: (fields: SimulationInputFields) => {
    set({ ...getDefaultSimulationState(), status: 'running' });

    try {
      const request = parseSimulationInput(fields);
      const trajectory = generateTrajectory(request.geometry, request.circle, request.sampling, {
        events: deps.events,
      });

      set({
        status: 'ready',
        request,
        trajectory,
        poses: toArmPoses(request.geometry, trajectory),
        viewBounds: computeViewBounds(request.geometry, request.circle),
      });
      deps.log.debug(`Animation ready: ${trajectory.length} frames at ${request.animationIntervalMs}ms`);
      return true;
    } catch (error) {
      const description = describeError(error);
      if (error instanceof KinematicsError) {
        deps.log.warn(`Simulation rejected: ${description.message}`);
      } else {
        deps.log.error('Unexpected error during simulation', error);
      }
      set({ ...getDefaultSimulationState(), status: 'rejected', error: description });
      return false;
    }
  },

  showPlots: () => {
    const { trajectory, plots } = get();
    if (!trajectory) {
      deps.log.warn('Plots requested before simulation data was available');
      set({ notice: NO_DATA_NOTICE });
      return false;
    }
    set({ plots: plots ?? toPlotSeries(trajectory), plotsVisible: true, notice: null });
    return true;
  },

  hidePlots: () => set({ plotsVisible: false }),

  clearSimulation: () => {
    deps.log.info('Clearing simulation state');
    set(getDefaultSimulationState());
  },
});
