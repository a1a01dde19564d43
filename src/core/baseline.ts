/**
 * Screen position of domain value zero.
 *
 * Both functions use `mapLinear` for the mixed-sign case so the axis line always
 * lands exactly where a data point with value 0 would be drawn.
 *
 * @module baseline
 */

import type { Extent } from '../config/types';
import { EPSILON } from '../config/defaults';
import { mapLinear } from '../utils/scales';

/**
 * Screen y of domain value 0 against the y extent.
 *
 * - all-positive extent (`min >= 0`): bottom (`height`)
 * - all-negative extent (`max <= 0`): top (`0`)
 * - mixed sign: proportional, strictly between
 *
 * @example
 * ```ts
 * baselineY({ min: -10, max: 20 }, 90); // 60
 * ```
 */
export function baselineY(extent: Extent, height: number, epsilon: number = EPSILON): number {
  if (extent.min >= 0) return height;
  if (extent.max <= 0) return 0;
  return mapLinear(0, extent, height, 'y', epsilon);
}

/**
 * Screen x of domain value 0 against the x extent (where a vertical axis sits).
 *
 * - all-positive extent: left edge (`0`)
 * - all-negative extent: right edge (`width`)
 * - mixed sign: proportional, strictly between
 */
export function baselineX(extent: Extent, width: number, epsilon: number = EPSILON): number {
  if (extent.min >= 0) return 0;
  if (extent.max <= 0) return width;
  return mapLinear(0, extent, width, 'x', epsilon);
}
