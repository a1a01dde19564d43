import type { Extent } from '../config/types';
import { EPSILON } from '../config/defaults';
import { baselineY } from './baseline';

export type BarDirection = 'up' | 'down';

export interface BarScales {
  readonly baseline: number;
  /** Pixels per domain unit above the baseline. */
  readonly positiveScale: number;
  /** Pixels per domain unit below the baseline. */
  readonly negativeScale: number;
}

export interface BarExtent {
  /** Bar length in pixels, always >= 0. */
  readonly length: number;
  /** `+length` for up, `-length` for down. */
  readonly signedLength: number;
  readonly direction: BarDirection;
  /** Screen y of the bar's far end. */
  readonly tip: number;
}

/**
 * Positive and negative values get independent scales, each sized by the
 * largest magnitude on its own side of the baseline.
 */
export function computeBarScales(yExtent: Extent, height: number, epsilon: number = EPSILON): BarScales {
  const baseline = baselineY(yExtent, height, epsilon);
  const availableAbove = baseline;
  const availableBelow = height - baseline;

  return {
    baseline,
    positiveScale: availableAbove / Math.max(yExtent.max, epsilon),
    negativeScale: availableBelow / Math.max(Math.abs(yExtent.min), epsilon),
  };
}

export function scaleBar(value: number, scales: BarScales): BarExtent {
  if (value >= 0) {
    const length = value * scales.positiveScale;
    return { length, signedLength: length, direction: 'up', tip: scales.baseline - length };
  }
  const length = Math.abs(value) * scales.negativeScale;
  return { length, signedLength: -length, direction: 'down', tip: scales.baseline + length };
}

/**
 * Scales every value against the same baseline, in input order.
 */
export function scaleBars(
  ys: ArrayLike<number>,
  yExtent: Extent,
  height: number,
  epsilon: number = EPSILON
): BarExtent[] {
  const scales = computeBarScales(yExtent, height, epsilon);
  const out: BarExtent[] = new Array(ys.length);
  for (let i = 0; i < ys.length; i++) {
    out[i] = scaleBar(ys[i], scales);
  }
  return out;
}
