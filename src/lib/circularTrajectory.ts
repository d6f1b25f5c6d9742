/**
 * Circular Trajectory Generator
 *
 * Drives the end effector around a circle at constant tangential speed and
 * derives the joint motion needed to do it:
 * 1. Check the whole circle against the reachable annulus (closed form)
 * 2. Sample the circle at t = k * timeStep, the last sample clamped to land on T
 * 3. Solve inverse kinematics for every sample on one pinned elbow branch
 * 4. Differentiate the joint angles twice for velocities and accelerations
 *
 * Generation is all-or-nothing: on any failure an error is thrown (or returned
 * by tryGenerateTrajectory) and no samples are produced. Per request the
 * generator moves Idle -> Validating -> Rejected | Sampling -> Complete,
 * reporting each step to the optional SimulationEventSink. A sink that throws
 * does not change the outcome.
 */

import type {
  ArmGeometry,
  CircleSpec,
  ElbowConfiguration,
  Point2D,
  SamplingSpec,
  Trajectory,
  TrajectorySample,
} from '../types';
import { DEFAULT_ELBOW_CONFIGURATION, TIME_TOLERANCE } from '../config/simulation';
import {
  DegenerateConfigurationError,
  KinematicsError,
  OutOfReachError,
} from './errors';
import { differentiate, unwrapAngles } from './finiteDifference';
import {
  assertValidCircle,
  assertValidGeometry,
  assertValidSampling,
  forwardKinematics,
  getReachBounds,
  reachTolerance,
  solveInverseKinematics,
} from './planarArm';
import { emitSafely, NULL_EVENT_SINK, type SimulationEventSink } from './simulationEvents';

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions {
  /** Elbow branch used for every sample of the trajectory */
  elbow?: ElbowConfiguration;
  /** Receives request, validation, completion and failure events */
  events?: SimulationEventSink;
}

/**
 * Distances from the base to the circle and how they compare to the annulus
 */
export interface CircleReach {
  reachable: boolean;
  /** max(0, |base - center| - radius) */
  nearest: number;
  /** |base - center| + radius */
  farthest: number;
  nearestPoint: Point2D;
  farthestPoint: Point2D;
  minReach: number;
  maxReach: number;
}

export type GenerateResult =
  | { success: true; trajectory: Trajectory }
  | { success: false; error: KinematicsError };

// ============================================================================
// Validation
// ============================================================================

/**
 * Closed-form reach check for the whole circle.
 *
 * The circle counts as reachable when its farthest point is within L1 + L2
 * and its nearest point is at least |L1 - L2| away. A base inside the circle
 * gives a nearest distance of 0, so that case only passes when L1 == L2.
 */
export function analyzeCircleReach(geometry: ArmGeometry, circle: CircleSpec): CircleReach {
  const { minReach, maxReach } = getReachBounds(geometry);
  const tolerance = reachTolerance(geometry);

  const dx = circle.centerX - geometry.baseX;
  const dy = circle.centerY - geometry.baseY;
  const centerDistance = Math.hypot(dx, dy);

  // Unit vector from base to center; any direction works when they coincide
  const ux = centerDistance > 0 ? dx / centerDistance : 1;
  const uy = centerDistance > 0 ? dy / centerDistance : 0;

  const farthest = centerDistance + circle.radius;
  const nearest = Math.max(0, centerDistance - circle.radius);

  const farthestPoint = {
    x: circle.centerX + circle.radius * ux,
    y: circle.centerY + circle.radius * uy,
  };
  const nearestPoint = centerDistance >= circle.radius
    ? { x: circle.centerX - circle.radius * ux, y: circle.centerY - circle.radius * uy }
    : { x: geometry.baseX, y: geometry.baseY };

  return {
    reachable: farthest <= maxReach + tolerance && nearest >= minReach - tolerance,
    nearest,
    farthest,
    nearestPoint,
    farthestPoint,
    minReach,
    maxReach,
  };
}

export function validateCircle(geometry: ArmGeometry, circle: CircleSpec): boolean {
  return analyzeCircleReach(geometry, circle).reachable;
}

function outOfReachFor(geometry: ArmGeometry, reach: CircleReach): OutOfReachError {
  const tooFar = reach.farthest > reach.maxReach + reachTolerance(geometry);
  return tooFar
    ? new OutOfReachError(reach.farthestPoint, reach.farthest, reach.minReach, reach.maxReach)
    : new OutOfReachError(reach.nearestPoint, reach.nearest, reach.minReach, reach.maxReach);
}

/**
 * With L1 == L2 the base is reachable, but a path through it has no defined
 * link1 angle there.
 */
function findBaseCrossing(geometry: ArmGeometry, circle: CircleSpec): DegenerateConfigurationError | null {
  const tolerance = reachTolerance(geometry);
  if (getReachBounds(geometry).minReach > tolerance) return null;

  const centerDistance = Math.hypot(circle.centerX - geometry.baseX, circle.centerY - geometry.baseY);
  if (Math.abs(centerDistance - circle.radius) > tolerance) return null;

  return new DegenerateConfigurationError(
    { x: geometry.baseX, y: geometry.baseY },
    'Circle passes through the base of an arm with equal link lengths; link1 angle is undefined there'
  );
}

// ============================================================================
// Sampling
// ============================================================================

/**
 * Time to travel once around the circle at the requested speed
 */
export function getTrajectoryDuration(circle: CircleSpec, sampling: SamplingSpec): number {
  return (2 * Math.PI * circle.radius) / sampling.speed;
}

/**
 * t_k = k * timeStep up to the duration. The final time is always exactly
 * `duration`: a grid time less than TIME_TOLERANCE * timeStep short of it is
 * snapped, otherwise a shorter last step is appended.
 */
export function sampleTimes(duration: number, timeStep: number): number[] {
  if (duration <= 0) return [0];

  const steps = Math.floor(duration / timeStep);
  const times: number[] = [];
  for (let k = 0; k <= steps; k++) {
    times.push(k * timeStep);
  }

  const last = times[times.length - 1];
  if (last > 0 && duration - last < TIME_TOLERANCE * timeStep) {
    times[times.length - 1] = duration;
  } else {
    times.push(duration);
  }
  return times;
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Sample the circle and derive joint angles, velocities and accelerations.
 *
 * @throws InvalidParameterError for non-positive lengths, speed or time step, or a negative radius
 * @throws OutOfReachError when part of the circle lies outside the annulus
 * @throws DegenerateConfigurationError when the path crosses the base of an L1 == L2 arm
 */
export function generateTrajectory(
  geometry: ArmGeometry,
  circle: CircleSpec,
  sampling: SamplingSpec,
  options: GenerateOptions = {}
): Trajectory {
  const events = options.events ?? NULL_EVENT_SINK;
  const elbow = options.elbow ?? DEFAULT_ELBOW_CONFIGURATION;

  emitSafely(events, { type: 'simulation_requested', geometry, circle, sampling });

  try {
    assertValidGeometry(geometry);
    assertValidCircle(circle);
    assertValidSampling(sampling);

    const reach = analyzeCircleReach(geometry, circle);
    emitSafely(events, {
      type: 'validation_completed',
      reachable: reach.reachable,
      nearest: reach.nearest,
      farthest: reach.farthest,
      minReach: reach.minReach,
      maxReach: reach.maxReach,
    });
    if (!reach.reachable) {
      throw outOfReachFor(geometry, reach);
    }

    const baseCrossing = findBaseCrossing(geometry, circle);
    if (baseCrossing) throw baseCrossing;

    const trajectory = sampleCircle(geometry, circle, sampling, elbow);
    const duration = trajectory[trajectory.length - 1].t;
    emitSafely(events, { type: 'simulation_completed', sampleCount: trajectory.length, duration });
    return trajectory;
  } catch (error) {
    if (error instanceof KinematicsError) {
      emitSafely(events, {
        type: 'simulation_failed',
        errorKind: error.kind,
        message: error.message,
        point: error instanceof OutOfReachError || error instanceof DegenerateConfigurationError
          ? error.point
          : undefined,
      });
    }
    throw error;
  }
}

/**
 * Same as generateTrajectory, with failures returned instead of thrown
 */
export function tryGenerateTrajectory(
  geometry: ArmGeometry,
  circle: CircleSpec,
  sampling: SamplingSpec,
  options: GenerateOptions = {}
): GenerateResult {
  try {
    return { success: true, trajectory: generateTrajectory(geometry, circle, sampling, options) };
  } catch (error) {
    if (error instanceof KinematicsError) {
      return { success: false, error };
    }
    throw error;
  }
}

function sampleCircle(
  geometry: ArmGeometry,
  circle: CircleSpec,
  sampling: SamplingSpec,
  elbow: ElbowConfiguration
): Trajectory {
  const duration = getTrajectoryDuration(circle, sampling);
  const angularSpeed = circle.radius > 0 ? sampling.speed / circle.radius : 0;
  const times = sampleTimes(duration, sampling.timeStep);

  const rawTheta1: number[] = [];
  const theta2: number[] = [];
  for (const t of times) {
    const phase = angularSpeed * t;
    const joints = solveInverseKinematics(
      geometry,
      circle.centerX + circle.radius * Math.cos(phase),
      circle.centerY + circle.radius * Math.sin(phase),
      elbow
    );
    rawTheta1.push(joints.theta1);
    theta2.push(joints.theta2);
  }

  // theta1 is normalized per solve; keep it continuous when the path winds around the base
  const theta1 = unwrapAngles(rawTheta1);

  const omega1 = differentiate(theta1, times);
  const omega2 = differentiate(theta2, times);
  const alpha1 = differentiate(omega1, times);
  const alpha2 = differentiate(omega2, times);

  const samples: TrajectorySample[] = times.map((t, i) => {
    const effector = forwardKinematics(geometry, theta1[i], theta2[i]);
    return Object.freeze({
      t,
      theta1: theta1[i],
      theta2: theta2[i],
      omega1: omega1[i],
      omega2: omega2[i],
      alpha1: alpha1[i],
      alpha2: alpha2[i],
      x: effector.x,
      y: effector.y,
    });
  });

  return Object.freeze(samples);
}
