import { describe, it, expect } from 'vitest';
import { getPlotAxes, toPlotSeries } from '../lib/plotSeries';
import type { Trajectory } from '../types';

const trajectory: Trajectory = [
  { t: 0, theta1: Math.PI / 2, theta2: 0, omega1: 0.5, omega2: -0.25, alpha1: 0.1, alpha2: 0.2, x: 0, y: 180 },
  { t: 0.1, theta1: Math.PI, theta2: Math.PI / 4, omega1: 0.75, omega2: -0.5, alpha1: 0.3, alpha2: 0.4, x: -180, y: 0 },
];

describe('plotSeries', () => {
  it('should split the trajectory into parallel series with angles in degrees', () => {
    const series = toPlotSeries(trajectory);

    expect(series.angleUnit).toBe('deg');
    expect(series.time).toEqual([0, 0.1]);
    expect(series.angles.joint1[0]).toBeCloseTo(90, 10);
    expect(series.angles.joint1[1]).toBeCloseTo(180, 10);
    expect(series.angles.joint2[0]).toBe(0);
    expect(series.angles.joint2[1]).toBeCloseTo(45, 10);
    expect(series.velocities).toEqual({ joint1: [0.5, 0.75], joint2: [-0.25, -0.5] });
    expect(series.accelerations).toEqual({ joint1: [0.1, 0.3], joint2: [0.2, 0.4] });
  });

  it('should keep radians when asked', () => {
    const series = toPlotSeries(trajectory, { angleUnit: 'rad' });
    expect(series.angles.joint1).toEqual([Math.PI / 2, Math.PI]);
  });

  it('should return empty series for an empty trajectory', () => {
    const series = toPlotSeries([]);
    expect(series.time).toEqual([]);
    expect(series.angles.joint1).toEqual([]);
  });

  it('should label the angle axis in the chosen unit', () => {
    const [angles, velocities, accelerations] = getPlotAxes('rad');
    expect(angles.yLabel).toBe('Angle (rad)');
    expect(getPlotAxes()[0].yLabel).toBe('Angle (degrees)');
    expect(velocities.title).toBe('Joint Angular Velocities vs. Time');
    expect(accelerations.yLabel).toBe('Angular Acceleration (rad/s²)');
  });
});
