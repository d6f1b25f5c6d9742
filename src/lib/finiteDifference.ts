/**
 * Finite Differences
 *
 * Time derivatives of sampled joint series. Interior samples use the
 * second-order central difference for a possibly non-uniform grid (the last
 * step of a trajectory is usually shorter), the two ends use one-sided
 * first-order differences.
 */

/**
 * Derivative of `values` with respect to `times`.
 * Both arrays must have the same length and `times` must be strictly increasing.
 */
export function differentiate(values: readonly number[], times: readonly number[]): number[] {
  if (values.length !== times.length) {
    throw new RangeError(
      `Series length mismatch: ${values.length} values for ${times.length} timestamps`
    );
  }

  const n = values.length;
  if (n < 2) return new Array<number>(n).fill(0);

  const result = new Array<number>(n);
  result[0] = (values[1] - values[0]) / (times[1] - times[0]);
  result[n - 1] = (values[n - 1] - values[n - 2]) / (times[n - 1] - times[n - 2]);

  for (let i = 1; i < n - 1; i++) {
    const h1 = times[i] - times[i - 1];
    const h2 = times[i + 1] - times[i];
    // Reduces to (f[i+1] - f[i-1]) / 2h when h1 == h2
    result[i] =
      (h1 * h1 * values[i + 1] - h2 * h2 * values[i - 1] + (h2 * h2 - h1 * h1) * values[i]) /
      (h1 * h2 * (h1 + h2));
  }

  return result;
}

/**
 * Shift each angle by a multiple of 2π so consecutive samples never jump by more than π
 */
export function unwrapAngles(angles: readonly number[]): number[] {
  const result: number[] = [];
  for (let i = 0; i < angles.length; i++) {
    if (i === 0) {
      result.push(angles[0]);
      continue;
    }
    const previous = result[i - 1];
    const turns = Math.round((angles[i] - previous) / (2 * Math.PI));
    result.push(angles[i] - turns * 2 * Math.PI);
  }
  return result;
}
