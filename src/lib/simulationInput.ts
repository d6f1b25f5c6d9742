/**
 * Simulation Input Parsing
 *
 * Turns the raw text of the input form into a validated SimulationRequest.
 * An absent field takes its value from DEFAULT_SIMULATION_INPUT; a field that
 * is present but blank is an error.
 */

import type { SimulationInputField, SimulationInputFields, SimulationRequest } from '../types';
import { DEFAULT_SIMULATION_INPUT, INPUT_FIELD_LABELS } from '../config/simulation';
import { InvalidParameterError } from './errors';
import { createArmGeometry, createCircleSpec, createSamplingSpec } from './planarArm';

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function readNumber(fields: SimulationInputFields, field: SimulationInputField): number {
  const raw = fields[field];
  if (raw === undefined) return DEFAULT_SIMULATION_INPUT[field];

  const text = raw.trim();
  if (text === '') {
    throw new InvalidParameterError(field, raw, `'${INPUT_FIELD_LABELS[field]}' cannot be empty`);
  }
  if (!NUMBER_PATTERN.test(text)) {
    throw new InvalidParameterError(field, raw, `'${INPUT_FIELD_LABELS[field]}' must be a number`);
  }
  return Number(text);
}

export function parseSimulationInput(fields: SimulationInputFields): SimulationRequest {
  const geometry = createArmGeometry(
    readNumber(fields, 'link1Length'),
    readNumber(fields, 'link2Length'),
    readNumber(fields, 'baseX'),
    readNumber(fields, 'baseY')
  );
  const circle = createCircleSpec(
    readNumber(fields, 'centerX'),
    readNumber(fields, 'centerY'),
    readNumber(fields, 'radius')
  );
  const sampling = createSamplingSpec(
    readNumber(fields, 'speed'),
    readNumber(fields, 'timeStep')
  );

  const animationIntervalMs = readNumber(fields, 'animationIntervalMs');
  if (!(animationIntervalMs > 0)) {
    throw new InvalidParameterError('animationIntervalMs', animationIntervalMs, 'must be positive');
  }

  return { geometry, circle, sampling, animationIntervalMs };
}

/**
 * Form field values as text, for pre-filling the form
 */
export function getDefaultInputFields(): Required<SimulationInputFields> {
  const d = DEFAULT_SIMULATION_INPUT;
  return {
    link1Length: String(d.link1Length),
    link2Length: String(d.link2Length),
    baseX: String(d.baseX),
    baseY: String(d.baseY),
    centerX: String(d.centerX),
    centerY: String(d.centerY),
    radius: String(d.radius),
    speed: String(d.speed),
    timeStep: String(d.timeStep),
    animationIntervalMs: String(d.animationIntervalMs),
  };
}
