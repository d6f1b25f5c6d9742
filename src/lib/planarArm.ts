/**
 * Two-Link Planar Arm Kinematics
 *
 * Closed-form forward and inverse kinematics for an arm with two revolute
 * joints in the plane:
 * - theta1: angle of link1 from the +X axis
 * - theta2: angle of link2 relative to link1
 *
 * Inverse kinematics uses the law of cosines. Of the two solutions, the
 * caller picks one with an ElbowConfiguration; 'elbow-down' (theta2 >= 0)
 * is the default everywhere so a whole trajectory stays on one branch.
 */

import type {
  ArmGeometry,
  CircleSpec,
  ElbowConfiguration,
  JointConfiguration,
  JointPositions,
  Point2D,
  ReachBounds,
  SamplingSpec,
} from '../types';
import { DEFAULT_ELBOW_CONFIGURATION, REACH_TOLERANCE } from '../config/simulation';
import {
  DegenerateConfigurationError,
  InvalidParameterError,
  OutOfReachError,
} from './errors';

// ============================================================================
// Parameter Validation
// ============================================================================

function requireFinite(parameter: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(parameter, value, 'must be a finite number');
  }
}

function requirePositive(parameter: string, value: number): void {
  requireFinite(parameter, value);
  if (value <= 0) {
    throw new InvalidParameterError(parameter, value, 'must be positive');
  }
}

export function assertValidGeometry(geometry: ArmGeometry): void {
  requirePositive('link1Length', geometry.link1Length);
  requirePositive('link2Length', geometry.link2Length);
  requireFinite('baseX', geometry.baseX);
  requireFinite('baseY', geometry.baseY);
}

export function assertValidCircle(circle: CircleSpec): void {
  requireFinite('centerX', circle.centerX);
  requireFinite('centerY', circle.centerY);
  requireFinite('radius', circle.radius);
  if (circle.radius < 0) {
    throw new InvalidParameterError('radius', circle.radius, 'must not be negative');
  }
}

export function assertValidSampling(sampling: SamplingSpec): void {
  requirePositive('speed', sampling.speed);
  requirePositive('timeStep', sampling.timeStep);
}

export function createArmGeometry(
  link1Length: number,
  link2Length: number,
  baseX = 0,
  baseY = 0
): ArmGeometry {
  const geometry = { link1Length, link2Length, baseX, baseY };
  assertValidGeometry(geometry);
  return Object.freeze(geometry);
}

export function createCircleSpec(centerX: number, centerY: number, radius: number): CircleSpec {
  const circle = { centerX, centerY, radius };
  assertValidCircle(circle);
  return Object.freeze(circle);
}

export function createSamplingSpec(speed: number, timeStep: number): SamplingSpec {
  const sampling = { speed, timeStep };
  assertValidSampling(sampling);
  return Object.freeze(sampling);
}

// ============================================================================
// Reach
// ============================================================================

export function getReachBounds(geometry: ArmGeometry): ReachBounds {
  return {
    minReach: Math.abs(geometry.link1Length - geometry.link2Length),
    maxReach: geometry.link1Length + geometry.link2Length,
  };
}

/**
 * Absolute slack for reach comparisons
 */
export function reachTolerance(geometry: ArmGeometry): number {
  return REACH_TOLERANCE * (geometry.link1Length + geometry.link2Length);
}

/**
 * Whether a distance from the base falls inside the reachable annulus
 */
export function isWithinReach(geometry: ArmGeometry, distance: number): boolean {
  const { minReach, maxReach } = getReachBounds(geometry);
  const tolerance = reachTolerance(geometry);
  return distance >= minReach - tolerance && distance <= maxReach + tolerance;
}

export function distanceFromBase(geometry: ArmGeometry, x: number, y: number): number {
  return Math.hypot(x - geometry.baseX, y - geometry.baseY);
}

export function isReachable(geometry: ArmGeometry, x: number, y: number): boolean {
  return isWithinReach(geometry, distanceFromBase(geometry, x, y));
}

// ============================================================================
// Forward Kinematics
// ============================================================================

export function forwardKinematics(
  geometry: ArmGeometry,
  theta1: number,
  theta2: number
): Point2D {
  return getJointPositions(geometry, theta1, theta2).effector;
}

/**
 * Base, elbow and end effector positions for one pose
 */
export function getJointPositions(
  geometry: ArmGeometry,
  theta1: number,
  theta2: number
): JointPositions {
  const base = { x: geometry.baseX, y: geometry.baseY };
  const elbow = {
    x: base.x + geometry.link1Length * Math.cos(theta1),
    y: base.y + geometry.link1Length * Math.sin(theta1),
  };
  const effector = {
    x: elbow.x + geometry.link2Length * Math.cos(theta1 + theta2),
    y: elbow.y + geometry.link2Length * Math.sin(theta1 + theta2),
  };
  return { base, elbow, effector };
}

// ============================================================================
// Inverse Kinematics
// ============================================================================

/**
 * Wrap an angle into (-π, π]
 */
export function normalizeAngle(angle: number): number {
  let wrapped = angle % (2 * Math.PI);
  if (wrapped <= -Math.PI) wrapped += 2 * Math.PI;
  if (wrapped > Math.PI) wrapped -= 2 * Math.PI;
  return wrapped;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Joint angles that put the end effector at (x, y).
 *
 * @throws OutOfReachError if the point lies outside the annulus
 * @throws DegenerateConfigurationError if the point is the base itself (L1 == L2),
 *   where theta1 is undefined
 */
export function solveInverseKinematics(
  geometry: ArmGeometry,
  x: number,
  y: number,
  elbow: ElbowConfiguration = DEFAULT_ELBOW_CONFIGURATION
): JointConfiguration {
  const { link1Length: l1, link2Length: l2 } = geometry;
  const dx = x - geometry.baseX;
  const dy = y - geometry.baseY;
  const distance = Math.hypot(dx, dy);

  if (!isWithinReach(geometry, distance)) {
    const { minReach, maxReach } = getReachBounds(geometry);
    throw new OutOfReachError({ x, y }, distance, minReach, maxReach);
  }

  if (distance <= reachTolerance(geometry)) {
    throw new DegenerateConfigurationError(
      { x, y },
      `Target (${x.toFixed(2)}, ${y.toFixed(2)}) coincides with the base; link1 angle is undefined`
    );
  }

  const d2 = dx * dx + dy * dy;
  // Clamped to absorb rounding at the inner and outer boundary
  const cosTheta2 = clamp((d2 - l1 * l1 - l2 * l2) / (2 * l1 * l2), -1, 1);
  const magnitude = Math.acos(cosTheta2);
  const theta2 = elbow === 'elbow-down' ? magnitude : 0 - magnitude;

  // Angle to the target minus the offset link2 adds at the elbow
  const offset = Math.atan2(l2 * Math.sin(theta2), l1 + l2 * Math.cos(theta2));
  const theta1 = normalizeAngle(Math.atan2(dy, dx) - offset);

  return { theta1, theta2 };
}
