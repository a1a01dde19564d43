/**
 * Min/max extents over projected values.
 *
 * @module extent
 */

import type { Extent, ProjectedDataset } from '../config/types';
import { EmptyDatasetError, InvalidValueError } from '../core/errors';

/**
 * Computes `{ min, max }` in a single linear scan. Input order is irrelevant.
 *
 * A degenerate result (`min === max`) is returned as-is; scale consumers apply
 * the epsilon floor instead of dividing by zero.
 *
 * @throws EmptyDatasetError for an empty sequence
 * @throws InvalidValueError for NaN/±Infinity entries
 */
export function computeExtent(values: ArrayLike<number>, field = 'value'): Extent {
  const count = values.length;
  if (count === 0) throw new EmptyDatasetError('computeExtent');

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < count; i++) {
    const v = values[i];
    if (!Number.isFinite(v)) throw new InvalidValueError(field, v, i);
    if (v < min) min = v;
    if (v > max) max = v;
  }

  return { min, max };
}

export function computeDatasetExtents(projected: ProjectedDataset): { readonly x: Extent; readonly y: Extent } {
  return {
    x: computeExtent(projected.xs, 'x'),
    y: computeExtent(projected.ys, 'y'),
  };
}

/**
 * Widens an extent so it contains 0.
 */
export function includeZero(extent: Extent): Extent {
  return { min: Math.min(0, extent.min), max: Math.max(0, extent.max) };
}

export const isDegenerate = (extent: Extent): boolean => extent.min === extent.max;
