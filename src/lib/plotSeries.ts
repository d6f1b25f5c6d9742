/**
 * Plot Series
 *
 * Reshapes a trajectory into the three parallel series a plotting surface
 * draws: joint angles, angular velocities and angular accelerations.
 */

import type { Trajectory } from '../types';

export type AngleUnit = 'deg' | 'rad';

export interface JointSeries {
  joint1: number[];
  joint2: number[];
}

export interface PlotSeries {
  time: number[];
  angles: JointSeries;          // angleUnit
  velocities: JointSeries;      // rad/s
  accelerations: JointSeries;   // rad/s²
  angleUnit: AngleUnit;
}

export interface PlotAxes {
  title: string;
  xLabel: string;
  yLabel: string;
  legend: [string, string];
}

export const RAD_TO_DEG = 180 / Math.PI;

export function toPlotSeries(
  trajectory: Trajectory,
  options: { angleUnit?: AngleUnit } = {}
): PlotSeries {
  const angleUnit = options.angleUnit ?? 'deg';
  const scale = angleUnit === 'deg' ? RAD_TO_DEG : 1;

  return {
    time: trajectory.map((s) => s.t),
    angles: {
      joint1: trajectory.map((s) => s.theta1 * scale),
      joint2: trajectory.map((s) => s.theta2 * scale),
    },
    velocities: {
      joint1: trajectory.map((s) => s.omega1),
      joint2: trajectory.map((s) => s.omega2),
    },
    accelerations: {
      joint1: trajectory.map((s) => s.alpha1),
      joint2: trajectory.map((s) => s.alpha2),
    },
    angleUnit,
  };
}

/**
 * Titles and labels for the three plots, in series order
 */
export function getPlotAxes(angleUnit: AngleUnit = 'deg'): [PlotAxes, PlotAxes, PlotAxes] {
  return [
    {
      title: 'Joint Angles vs. Time',
      xLabel: 'Time (s)',
      yLabel: angleUnit === 'deg' ? 'Angle (degrees)' : 'Angle (rad)',
      legend: ['θ1 (Link 1 Angle)', 'θ2 (Link 2 Angle)'],
    },
    {
      title: 'Joint Angular Velocities vs. Time',
      xLabel: 'Time (s)',
      yLabel: 'Angular Velocity (rad/s)',
      legend: ['ω1 (Link 1 Angular Velocity)', 'ω2 (Link 2 Angular Velocity)'],
    },
    {
      title: 'Joint Angular Accelerations vs. Time',
      xLabel: 'Time (s)',
      yLabel: 'Angular Acceleration (rad/s²)',
      legend: ['α1 (Link 1 Angular Acceleration)', 'α2 (Link 2 Angular Acceleration)'],
    },
  ];
}
