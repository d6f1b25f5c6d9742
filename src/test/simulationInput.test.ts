import { describe, it, expect } from 'vitest';
import { getDefaultInputFields, parseSimulationInput } from '../lib/simulationInput';
import { InvalidParameterError } from '../lib/errors';

describe('simulationInput', () => {
  describe('parseSimulationInput', () => {
    it('should fall back to the defaults for absent fields', () => {
      expect(parseSimulationInput({})).toEqual({
        geometry: { link1Length: 1200, link2Length: 800, baseX: 0, baseY: 0 },
        circle: { centerX: 0, centerY: 1500, radius: 200 },
        sampling: { speed: 100, timeStep: 0.01 },
        animationIntervalMs: 20,
      });
    });

    it('should parse trimmed decimal and exponent notation', () => {
      const request = parseSimulationInput({
        link1Length: ' 100 ',
        link2Length: '80',
        baseX: '-5.5',
        centerX: '150',
        centerY: '0',
        radius: '30',
        speed: '5e1',
        timeStep: '.1',
        animationIntervalMs: '12.5',
      });

      expect(request.geometry).toEqual({ link1Length: 100, link2Length: 80, baseX: -5.5, baseY: 0 });
      expect(request.circle).toEqual({ centerX: 150, centerY: 0, radius: 30 });
      expect(request.sampling).toEqual({ speed: 50, timeStep: 0.1 });
      expect(request.animationIntervalMs).toBe(12.5);
    });

    it('should accept a zero radius', () => {
      expect(parseSimulationInput({ radius: '0' }).circle.radius).toBe(0);
    });

    it('should reject an empty field', () => {
      expect(() => parseSimulationInput({ radius: '  ' }))
        .toThrow("Invalid radius: 'Circle Radius [mm]' cannot be empty");
    });

    it('should reject text that is not a number', () => {
      expect(() => parseSimulationInput({ speed: 'fast' }))
        .toThrow("Invalid speed: 'Speed [mm/s]' must be a number");
      expect(() => parseSimulationInput({ timeStep: '0.1s' })).toThrow(InvalidParameterError);
    });

    it('should reject out-of-range values', () => {
      expect(() => parseSimulationInput({ link1Length: '0' })).toThrow('Invalid link1Length: must be positive');
      expect(() => parseSimulationInput({ radius: '-1' })).toThrow('Invalid radius: must not be negative');
      expect(() => parseSimulationInput({ animationIntervalMs: '0' }))
        .toThrow('Invalid animationIntervalMs: must be positive');
    });
  });

  describe('getDefaultInputFields', () => {
    it('should render every default as text that parses back to the defaults', () => {
      const fields = getDefaultInputFields();
      expect(fields.timeStep).toBe('0.01');
      expect(fields.link1Length).toBe('1200');
      expect(parseSimulationInput(fields)).toEqual(parseSimulationInput({}));
    });
  });
});
