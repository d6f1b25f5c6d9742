/**
 * Simulation Events
 *
 * Structured events the trajectory generator reports while it handles one
 * request. The generator only knows the SimulationEventSink interface; where
 * the events end up (a logger, a recorder, nothing) is the caller's choice.
 */

import type { ArmGeometry, CircleSpec, Point2D, SamplingSpec } from '../types';
import type { KinematicsErrorKind } from './errors';
import type { Logger } from './logger';

// ============================================================================
// Types
// ============================================================================

export interface SimulationRequestedEvent {
  type: 'simulation_requested';
  geometry: ArmGeometry;
  circle: CircleSpec;
  sampling: SamplingSpec;
}

export interface ValidationCompletedEvent {
  type: 'validation_completed';
  reachable: boolean;
  nearest: number;
  farthest: number;
  minReach: number;
  maxReach: number;
}

export interface SimulationCompletedEvent {
  type: 'simulation_completed';
  sampleCount: number;
  duration: number;  // seconds of simulated motion
}

export interface SimulationFailedEvent {
  type: 'simulation_failed';
  errorKind: KinematicsErrorKind;
  message: string;
  point?: Point2D;
}

export type SimulationEvent =
  | SimulationRequestedEvent
  | ValidationCompletedEvent
  | SimulationCompletedEvent
  | SimulationFailedEvent;

export interface SimulationEventSink {
  emit(event: SimulationEvent): void;
}

// ============================================================================
// Sinks
// ============================================================================

export const NULL_EVENT_SINK: SimulationEventSink = {
  emit() {},
};

/**
 * Deliver an event, reporting a sink failure on the console instead of
 * passing it to the caller
 */
export function emitSafely(sink: SimulationEventSink, event: SimulationEvent): void {
  try {
    sink.emit(event);
  } catch (sinkError) {
    console.error(`[SimulationEvents] sink failed on ${event.type}`, sinkError);
  }
}

/**
 * Forward events to a namespaced logger
 */
export function createLoggingEventSink(log: Logger): SimulationEventSink {
  return {
    emit(event) {
      switch (event.type) {
        case 'simulation_requested':
          log.info('Simulation requested', {
            geometry: event.geometry,
            circle: event.circle,
            sampling: event.sampling,
          });
          break;
        case 'validation_completed':
          if (event.reachable) {
            log.debug('Circle is within reach', event);
          } else {
            log.warn('Circle is out of reach', event);
          }
          break;
        case 'simulation_completed':
          log.info(
            `Simulation completed: ${event.sampleCount} samples over ${event.duration.toFixed(2)}s`
          );
          break;
        case 'simulation_failed':
          log.error(`Simulation failed [${event.errorKind}]: ${event.message}`, event.point);
          break;
      }
    },
  };
}

export interface RecordingEventSink extends SimulationEventSink {
  readonly events: readonly SimulationEvent[];
  clear(): void;
}

/**
 * Keep every event in memory, in emission order
 */
export function createRecordingEventSink(): RecordingEventSink {
  const events: SimulationEvent[] = [];
  return {
    events,
    emit(event) {
      events.push(event);
    },
    clear() {
      events.length = 0;
    },
  };
}

/**
 * Deliver each event to several sinks
 */
export function combineEventSinks(...sinks: SimulationEventSink[]): SimulationEventSink {
  return {
    emit(event) {
      for (const sink of sinks) emitSafely(sink, event);
    },
  };
}
