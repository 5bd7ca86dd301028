// src/lib/interpolate.ts
import type { CrossCurveTable } from '@/types';
import { OutOfRangeError } from '@/lib/errors';

export function lerp(a: number, b: number, t: number) {
  return a + (b - a) * t;
}

// Last index i with axis[i] <= x; null when x is off the axis.
function bracketIndex(x: number, axis: readonly number[]): number | null {
  if (axis.length === 0 || !(x >= axis[0] && x <= axis[axis.length - 1])) return null;
  let i = 0;
  while (i + 1 < axis.length && x >= axis[i + 1]) i++;
  return i;
}

/**
 * Piecewise-linear lookup of `x` along a strictly increasing `xs`.
 * Table points are returned verbatim; nothing outside `[xs[0], xs[last]]` is extrapolated.
 */
export function interp1D(x: number, xs: readonly number[], ys: readonly number[], quantity = 'value'): number {
  const i = bracketIndex(x, xs);
  if (i === null) {
    throw new OutOfRangeError(quantity, x, xs[0], xs[xs.length - 1]);
  }

  if (x === xs[i]) return ys[i];

  const t = (x - xs[i]) / (xs[i + 1] - xs[i]);
  return lerp(ys[i], ys[i + 1], t);
}

/**
 * KN lookup over the cross curves: interpolate along displacement within the two
 * heel-angle columns that bracket `angle`, then blend those two by angle.
 * An exact angle match uses that column alone.
 */
export function interp2D(displacement: number, angle: number, table: CrossCurveTable): number {
  const angles = table.columns.map(c => c.angle);
  const j = bracketIndex(angle, angles);
  if (j === null) {
    throw new OutOfRangeError('heel angle', angle, angles[0], angles[angles.length - 1], '°');
  }

  const low = table.columns[j];
  const high = angle === low.angle ? low : table.columns[j + 1];

  const knLow = interp1D(displacement, table.displacements, low.values, 'displacement');
  if (low === high) return knLow;

  const knHigh = interp1D(displacement, table.displacements, high.values, 'displacement');
  return lerp(knLow, knHigh, (angle - low.angle) / (high.angle - low.angle));
}
