// Geometry Types
export interface Point2D {
  x: number;
  y: number;
}

/** Two-link planar arm. Lengths in mm, base position in world coordinates. */
export interface ArmGeometry {
  readonly link1Length: number;
  readonly link2Length: number;
  readonly baseX: number;
  readonly baseY: number;
}

/** Target circle traced by the end effector. radius 0 is a single point. */
export interface CircleSpec {
  readonly centerX: number;
  readonly centerY: number;
  readonly radius: number;
}

export interface SamplingSpec {
  readonly speed: number;      // mm/s along the circle
  readonly timeStep: number;   // seconds
}

/**
 * Which of the two inverse kinematics solutions to take.
 * - elbow-down: theta2 in [0, π] (non-negative arccosine branch)
 * - elbow-up: theta2 in [-π, 0]
 */
export type ElbowConfiguration = 'elbow-down' | 'elbow-up';

// Joint Types
export interface JointConfiguration {
  theta1: number;  // radians, link1 from +X axis
  theta2: number;  // radians, link2 relative to link1
}

export interface ReachBounds {
  minReach: number;
  maxReach: number;
}

export interface JointPositions {
  base: Point2D;
  elbow: Point2D;
  effector: Point2D;
}

// Trajectory Types
export interface TrajectorySample {
  readonly t: number;
  readonly theta1: number;
  readonly theta2: number;
  readonly omega1: number;  // rad/s
  readonly omega2: number;
  readonly alpha1: number;  // rad/s²
  readonly alpha2: number;
  readonly x: number;       // end effector position from forward kinematics
  readonly y: number;
}

export type Trajectory = readonly TrajectorySample[];

// Simulation Types
export interface SimulationRequest {
  geometry: ArmGeometry;
  circle: CircleSpec;
  sampling: SamplingSpec;
  animationIntervalMs: number;
}

/** Raw text of the input form, keyed by field name. */
export type SimulationInputFields = Partial<Record<SimulationInputField, string>>;

export type SimulationInputField =
  | 'link1Length'
  | 'link2Length'
  | 'baseX'
  | 'baseY'
  | 'centerX'
  | 'centerY'
  | 'radius'
  | 'speed'
  | 'timeStep'
  | 'animationIntervalMs';

export type SimulationStatus = 'idle' | 'running' | 'ready' | 'rejected';
