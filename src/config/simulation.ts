/**
 * Simulation Configuration
 *
 * Centralized constants for the arm kinematics, trajectory sampling and the
 * input form defaults.
 */

import type { ElbowConfiguration, SimulationInputField } from '../types';

// =============================================================================
// Kinematics
// =============================================================================

/**
 * Relative tolerance for reach comparisons, scaled by L1 + L2.
 * Keeps points exactly on the inner/outer radius reachable despite rounding.
 */
export const REACH_TOLERANCE = 1e-9;

export const DEFAULT_ELBOW_CONFIGURATION: ElbowConfiguration = 'elbow-down';

// =============================================================================
// Input Form
// =============================================================================

/** Default form values (mm, mm/s, s, ms) */
export const DEFAULT_SIMULATION_INPUT = {
  link1Length: 1200,
  link2Length: 800,
  baseX: 0,
  baseY: 0,
  centerX: 0,
  centerY: 1500,
  radius: 200,
  speed: 100,
  timeStep: 0.01,
  animationIntervalMs: 20,
} as const satisfies Record<SimulationInputField, number>;

export const INPUT_FIELD_LABELS: Record<SimulationInputField, string> = {
  link1Length: 'Link 1 (L1) [mm]',
  link2Length: 'Link 2 (L2) [mm]',
  baseX: 'Base X [mm]',
  baseY: 'Base Y [mm]',
  centerX: 'Circle Center X [mm]',
  centerY: 'Circle Center Y [mm]',
  radius: 'Circle Radius [mm]',
  speed: 'Speed [mm/s]',
  timeStep: 'Time Step [s]',
  animationIntervalMs: 'Anim. Interval [ms]',
};

// =============================================================================
// Rendering
// =============================================================================

/** Fraction of the drawn extent added on each side of the animation view */
export const VIEW_PADDING_FACTOR = 0.15;

// =============================================================================
// Trajectory Sampling
// =============================================================================

/**
 * Fraction of the time step within which the last grid time is snapped onto
 * the end of the path instead of adding a sample after it.
 */
export const TIME_TOLERANCE = 1e-6;
