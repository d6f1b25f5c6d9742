/**
 * Kinematics & Trajectory Modules
 *
 * Re-exports the arm model and the circular trajectory generator for convenient importing.
 */

export * from '../planarArm';
export * from '../circularTrajectory';
export * from '../finiteDifference';
