/**
 * Groups points by x key and accumulates their y values for stacked bars.
 *
 * NOTE: Exact grouping on floating-point x is fragile. Callers with noisy x
 * should pass a quantizing key function (see `quantizeKey`).
 *
 * @module stack
 */

import type { Dataset, Extent, ProjectedDataset, StackKeyFn } from '../config/types';
import { projectDataset } from '../data/cartesianData';
import { EmptyDatasetError, InvalidValueError } from './errors';

export interface StackedGroup {
  readonly key: number;
  /** Signed sum of every member's y, accumulated in input order. */
  readonly sum: number;
  /** Fraction of the x extent allotted to this key, in (0, 1]. */
  readonly width: number;
  /** Fraction of the x extent at which this key's slot is centered. */
  readonly offset: number;
  readonly positiveTotal: number;
  readonly negativeTotal: number;
  /** Input indices of the members, in input order. */
  readonly indices: ReadonlyArray<number>;
}

export interface StackOptions {
  readonly keyOf?: StackKeyFn | null;
  readonly keyWeights?: ReadonlyMap<number, number>;
}

/** One member's span in domain units, measured from the zero baseline. */
export interface StackSegment {
  readonly index: number;
  readonly value: number;
  readonly from: number;
  readonly to: number;
}

type GroupAccumulator = {
  sum: number;
  positiveTotal: number;
  negativeTotal: number;
  readonly indices: number[];
};

/**
 * Returns a key function that snaps x to the nearest multiple of `step`.
 *
 * Steps whose reciprocal is an integer (0.1, 0.25, 1, ...) divide by that
 * reciprocal, so keys land on the decimal grid (`0.3`, not `0.30000000000000004`)
 * and match `keyWeights` entries written the same way.
 */
export function quantizeKey(step: number): StackKeyFn {
  if (!Number.isFinite(step) || step <= 0) {
    throw new InvalidValueError('stackKey.quantize', step, undefined, 'must be a finite number > 0');
  }
  const perUnit = 1 / step;
  if (Number.isInteger(perUnit)) {
    return (x: number) => Math.round(x / step) / perUnit;
  }
  return (x: number) => Math.round(x / step) * step;
}

const assertFiniteTotals = (key: number, acc: GroupAccumulator): void => {
  for (const total of [acc.positiveTotal, acc.negativeTotal, acc.sum]) {
    if (!Number.isFinite(total)) {
      throw new InvalidValueError('stack total', total, undefined, `for key ${key} must be a finite number`);
    }
  }
};

export function stackProjected(projected: ProjectedDataset, options: StackOptions = {}): StackedGroup[] {
  const { xs, ys } = projected;
  if (xs.length === 0) throw new EmptyDatasetError('stack');

  const keyOf = options.keyOf ?? null;
  const weights = options.keyWeights;

  // Map iteration order is insertion order, which gives first-seen key order.
  const groups = new Map<number, GroupAccumulator>();
  for (let i = 0; i < xs.length; i++) {
    const rawKey = keyOf === null ? xs[i] : keyOf(xs[i]);
    if (!Number.isFinite(rawKey)) throw new InvalidValueError('stack key', rawKey, i);
    const key = rawKey === 0 ? 0 : rawKey; // fold -0

    let acc = groups.get(key);
    if (!acc) {
      acc = { sum: 0, positiveTotal: 0, negativeTotal: 0, indices: [] };
      groups.set(key, acc);
    }

    const y = ys[i];
    acc.sum += y;
    if (y >= 0) acc.positiveTotal += y;
    else acc.negativeTotal += y;
    acc.indices.push(i);
  }

  let totalWeight = 0;
  for (const key of groups.keys()) {
    totalWeight += weights?.get(key) ?? 1;
  }

  const out: StackedGroup[] = [];
  let cursor = 0;
  for (const [key, acc] of groups) {
    assertFiniteTotals(key, acc);
    const width = (weights?.get(key) ?? 1) / totalWeight;
    out.push({
      key,
      sum: acc.sum,
      width,
      offset: cursor + width / 2,
      positiveTotal: acc.positiveTotal,
      negativeTotal: acc.negativeTotal,
      indices: acc.indices,
    });
    cursor += width;
  }

  return out;
}

/**
 * Groups a dataset by x key, preserving first-seen key order.
 *
 * @throws EmptyDatasetError for an empty dataset
 * @throws InvalidValueError for non-finite projections or keys
 */
export function stack(data: Dataset, options: StackOptions = {}): StackedGroup[] {
  return stackProjected(projectDataset(data, 'stack'), options);
}

/**
 * Splits a group into per-member segments. Non-negative values stack upward
 * from 0, negative values stack downward from 0.
 */
export function stackSegments(group: StackedGroup, ys: ArrayLike<number>): StackSegment[] {
  let positiveSum = 0;
  let negativeSum = 0;
  const out: StackSegment[] = [];

  for (const index of group.indices) {
    const value = ys[index];
    if (value >= 0) {
      out.push({ index, value, from: positiveSum, to: positiveSum + value });
      positiveSum += value;
    } else {
      out.push({ index, value, from: negativeSum, to: negativeSum + value });
      negativeSum += value;
    }
  }

  return out;
}

/**
 * Extent covering every group's positive and negative totals, widened to include 0.
 */
export function computeStackedExtent(groups: ReadonlyArray<StackedGroup>): Extent {
  if (groups.length === 0) throw new EmptyDatasetError('computeStackedExtent');

  let min = 0;
  let max = 0;
  for (const g of groups) {
    if (g.negativeTotal < min) min = g.negativeTotal;
    if (g.positiveTotal > max) max = g.positiveTotal;
  }
  return { min, max };
}
