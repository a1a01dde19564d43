import type { Axis, Extent } from '../config/types';
import { EPSILON } from '../config/defaults';
import { InvalidValueError } from '../core/errors';

export interface LinearScale {
  readonly extent: Extent;
  readonly size: number;
  readonly axis: Axis;

  /**
   * Maps a domain value to a screen coordinate.
   *
   * Notes:
   * - No clamping (will extrapolate outside the extent).
   * - y is inverted: `extent.max` maps to 0, `extent.min` maps to `size`.
   */
  scale(value: number): number;

  /**
   * Maps a screen coordinate back to a domain value.
   *
   * Notes:
   * - No clamping.
   * - If size is 0, returns `extent.min` for any input.
   */
  invert(pixel: number): number;
}

export interface LinearScaleConfig {
  readonly extent: Extent;
  readonly size: number;
  readonly axis?: Axis;
  readonly epsilon?: number;
}

const assertFinite = (label: string, value: number): void => {
  if (!Number.isFinite(value)) {
    throw new InvalidValueError(label, value);
  }
};

const assertEpsilon = (epsilon: number): void => {
  if (!Number.isFinite(epsilon) || epsilon <= 0) {
    throw new InvalidValueError('epsilon', epsilon, undefined, 'must be a finite number > 0');
  }
};

/**
 * `(value - min) / max(max - min, epsilon)`. When a difference overflows
 * (extents near +/-Number.MAX_VALUE) the same ratio is taken over halved operands.
 */
const normalizeInExtent = (value: number, extent: Extent, epsilon: number): number => {
  const delta = value - extent.min;
  const span = extent.max - extent.min;
  if (Number.isFinite(delta) && Number.isFinite(span)) {
    return delta / Math.max(span, epsilon);
  }
  const halfDelta = value / 2 - extent.min / 2;
  const halfSpan = extent.max / 2 - extent.min / 2;
  return halfDelta / Math.max(halfSpan, epsilon / 2);
};

/**
 * Maps `value` within `extent` onto `[0, targetSize]`.
 *
 * `range = max(extent.max - extent.min, epsilon)`, so a degenerate extent maps
 * its single value to 0 (x) or `targetSize` (y) instead of dividing by zero.
 *
 * @throws InvalidValueError when `epsilon` is not a finite number > 0
 */
export function mapLinear(
  value: number,
  extent: Extent,
  targetSize: number,
  axis: Axis = 'x',
  epsilon: number = EPSILON
): number {
  assertEpsilon(epsilon);
  const offset = normalizeInExtent(value, extent, epsilon) * targetSize;
  return axis === 'y' ? targetSize - offset : offset;
}

/**
 * Creates a linear scale bound to one extent, target size and axis.
 */
export function createLinearScale(config: LinearScaleConfig): LinearScale {
  const { extent, size } = config;
  const axis = config.axis ?? 'x';
  const epsilon = config.epsilon ?? EPSILON;

  assertFinite('extent.min', extent.min);
  assertFinite('extent.max', extent.max);
  assertFinite('size', size);
  assertEpsilon(epsilon);

  const span = extent.max - extent.min;
  const range = Math.max(span, epsilon);

  return {
    extent,
    size,
    axis,

    scale(value: number) {
      return mapLinear(value, extent, size, axis, epsilon);
    },

    invert(pixel: number) {
      if (size === 0) return extent.min;
      const t = (axis === 'y' ? size - pixel : pixel) / size;
      if (!Number.isFinite(span)) return (1 - t) * extent.min + t * extent.max;
      return extent.min + t * range;
    },
  };
}
