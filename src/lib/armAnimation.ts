/**
 * Arm Animation Frames
 *
 * What a renderer needs to draw the arm following a trajectory: one pose per
 * sample and fixed view limits that keep the whole motion in frame.
 */

import type { ArmGeometry, CircleSpec, JointPositions, Trajectory } from '../types';
import { VIEW_PADDING_FACTOR } from '../config/simulation';
import { getJointPositions, getReachBounds } from './planarArm';

export interface ArmPose extends JointPositions {
  t: number;
}

export interface ViewBounds {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
}

export function toArmPoses(geometry: ArmGeometry, trajectory: Trajectory): ArmPose[] {
  return trajectory.map((sample) => ({
    t: sample.t,
    ...getJointPositions(geometry, sample.theta1, sample.theta2),
  }));
}

/**
 * Axis limits covering the base, its full reach square and the circle,
 * padded by `padding` of the extent on every side
 */
export function computeViewBounds(
  geometry: ArmGeometry,
  circle: CircleSpec,
  padding = VIEW_PADDING_FACTOR
): ViewBounds {
  const { maxReach } = getReachBounds(geometry);

  const xMin = Math.min(geometry.baseX - maxReach, circle.centerX - circle.radius);
  const xMax = Math.max(geometry.baseX + maxReach, circle.centerX + circle.radius);
  const yMin = Math.min(geometry.baseY - maxReach, circle.centerY - circle.radius);
  const yMax = Math.max(geometry.baseY + maxReach, circle.centerY + circle.radius);

  // Both extents include the reach square, so neither is below 2 * maxReach
  const xRange = xMax - xMin;
  const yRange = yMax - yMin;

  return {
    xMin: xMin - xRange * padding,
    xMax: xMax + xRange * padding,
    yMin: yMin - yRange * padding,
    yMax: yMax + yRange * padding,
  };
}
