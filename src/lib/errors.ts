/**
 * Kinematics Errors
 *
 * Every failure of the arm model or the trajectory generator is one of these.
 * They are thrown (or returned by the `try*` variants) to the immediate caller;
 * nothing here logs.
 */

import type { Point2D } from '../types';

export type KinematicsErrorKind =
  | 'invalid_parameter'
  | 'out_of_reach'
  | 'degenerate_configuration';

export abstract class KinematicsError extends Error {
  abstract readonly kind: KinematicsErrorKind;
}

export class InvalidParameterError extends KinematicsError {
  readonly kind = 'invalid_parameter';

  constructor(
    public readonly parameter: string,
    public readonly value: unknown,
    reason: string
  ) {
    super(`Invalid ${parameter}: ${reason}`);
    this.name = 'InvalidParameterError';
  }
}

export class OutOfReachError extends KinematicsError {
  readonly kind = 'out_of_reach';

  constructor(
    public readonly point: Point2D,
    public readonly distance: number,
    public readonly minReach: number,
    public readonly maxReach: number
  ) {
    super(
      `Point (${point.x.toFixed(2)}, ${point.y.toFixed(2)}) is out of the arm's reach: ` +
      `distance ${distance.toFixed(2)} not in [${minReach.toFixed(2)}, ${maxReach.toFixed(2)}]`
    );
    this.name = 'OutOfReachError';
  }
}

export class DegenerateConfigurationError extends KinematicsError {
  readonly kind = 'degenerate_configuration';

  constructor(
    public readonly point: Point2D,
    message: string
  ) {
    super(message);
    this.name = 'DegenerateConfigurationError';
  }
}

export interface ErrorDescription {
  kind: KinematicsErrorKind | 'unexpected';
  message: string;
}

/**
 * Reduce any thrown value to something a form or log line can show
 */
export function describeError(error: unknown): ErrorDescription {
  if (error instanceof KinematicsError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { kind: 'unexpected', message: error.message };
  }
  return { kind: 'unexpected', message: String(error) };
}
