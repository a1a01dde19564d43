/**
 * Tests for stack grouping, slot layout and segment accumulation.
 */

import { describe, it, expect } from 'vitest';
import { computeStackedExtent, quantizeKey, stack, stackSegments } from '../stack';
import { EmptyDatasetError, InvalidValueError } from '../errors';

describe('stack', () => {
  it('groups by x and sums y per group', () => {
    const groups = stack([
      { x: 1, y: 2 },
      { x: 1, y: 3 },
      { x: 2, y: 5 },
    ]);

    expect(groups.map((g) => ({ key: g.key, sum: g.sum }))).toEqual([
      { key: 1, sum: 5 },
      { key: 2, sum: 5 },
    ]);
  });

  it('splits the x extent equally by default and centers each slot', () => {
    const groups = stack([
      [1, 2],
      [1, 3],
      [2, 5],
    ]);

    expect(groups.map((g) => g.width)).toEqual([0.5, 0.5]);
    expect(groups.map((g) => g.offset)).toEqual([0.25, 0.75]);
  });

  it('orders groups by first occurrence, not by key', () => {
    const groups = stack([
      [3, 1],
      [1, 1],
      [3, 1],
    ]);

    expect(groups.map((g) => g.key)).toEqual([3, 1]);
    expect(groups[0].indices).toEqual([0, 2]);
    expect(groups[1].indices).toEqual([1]);
  });

  it('applies explicit key weights', () => {
    const groups = stack(
      [
        [1, 2],
        [2, 5],
      ],
      { keyWeights: new Map([[1, 3]]) }
    );

    expect(groups.map((g) => g.width)).toEqual([0.75, 0.25]);
    expect(groups.map((g) => g.offset)).toEqual([0.375, 0.875]);
  });

  it('tracks positive and negative totals separately', () => {
    const [group] = stack([
      [1, 4],
      [1, -2],
      [1, 3],
    ]);

    expect(group.sum).toBe(5);
    expect(group.positiveTotal).toBe(7);
    expect(group.negativeTotal).toBe(-2);
  });

  it('groups nearby float keys when given a quantizing key function', () => {
    const groups = stack(
      [
        [0.9999999, 1],
        [1.0000001, 2],
      ],
      { keyOf: quantizeKey(0.5) }
    );

    expect(groups).toHaveLength(1);
    expect(groups[0].key).toBe(1);
    expect(groups[0].sum).toBe(3);
  });

  it('treats -0 and 0 as the same key', () => {
    const groups = stack([
      [-0, 1],
      [0, 2],
    ]);

    expect(groups).toHaveLength(1);
    expect(Object.is(groups[0].key, 0)).toBe(true);
  });

  it('throws EmptyDatasetError for an empty dataset', () => {
    expect(() => stack([])).toThrow(EmptyDatasetError);
  });

  it('throws InvalidValueError when a group total overflows', () => {
    expect(() =>
      stack([
        [0, 1e308],
        [0, 1e308],
        [1, 1],
      ])
    ).toThrow('stack total for key 0 must be a finite number. Received: Infinity');
    expect(() =>
      stack([
        [2, -1e308],
        [2, -1e308],
      ])
    ).toThrow('stack total for key 2 must be a finite number. Received: -Infinity');
  });

  it('throws InvalidValueError when a key function returns a non-finite key', () => {
    expect(() => stack([[1, 1]], { keyOf: () => Number.NaN })).toThrow(InvalidValueError);
  });
});

describe('quantizeKey', () => {
  it('snaps to the nearest multiple of the step', () => {
    const keyOf = quantizeKey(0.5);
    expect(keyOf(1.2)).toBe(1);
    expect(keyOf(1.3)).toBe(1.5);
  });

  it('lands keys on the decimal grid for fractional steps', () => {
    const keyOf = quantizeKey(0.1);
    expect(keyOf(0.3)).toBe(0.3);
    expect(keyOf(0.31)).toBe(0.3);
    expect(keyOf(0.7)).toBe(0.7);
    expect(quantizeKey(0.25)(0.8)).toBe(0.75);
  });

  it('matches key weights written on the same grid', () => {
    const groups = stack(
      [
        [0.3, 1],
        [0.7, 1],
      ],
      { keyOf: quantizeKey(0.1), keyWeights: new Map([[0.3, 3]]) }
    );

    expect(groups.map((g) => g.key)).toEqual([0.3, 0.7]);
    expect(groups.map((g) => g.width)).toEqual([0.75, 0.25]);
  });

  it('rejects non-positive steps', () => {
    expect(() => quantizeKey(0)).toThrow(InvalidValueError);
    expect(() => quantizeKey(-1)).toThrow(InvalidValueError);
    expect(() => quantizeKey(Number.POSITIVE_INFINITY)).toThrow(InvalidValueError);
  });
});

describe('stackSegments', () => {
  it('stacks positives upward and negatives downward from zero', () => {
    const ys = [4, -2, 3, -1];
    const [group] = stack([
      [1, 4],
      [1, -2],
      [1, 3],
      [1, -1],
    ]);

    expect(stackSegments(group, ys)).toEqual([
      { index: 0, value: 4, from: 0, to: 4 },
      { index: 1, value: -2, from: 0, to: -2 },
      { index: 2, value: 3, from: 4, to: 7 },
      { index: 3, value: -1, from: -2, to: -3 },
    ]);
  });
});

describe('computeStackedExtent', () => {
  it('covers every total and always includes zero', () => {
    const groups = stack([
      [1, 4],
      [1, -2],
      [2, 6],
    ]);
    expect(computeStackedExtent(groups)).toEqual({ min: -2, max: 6 });

    const positiveOnly = stack([[1, 3]]);
    expect(computeStackedExtent(positiveOnly)).toEqual({ min: 0, max: 3 });
  });

  it('throws EmptyDatasetError with no groups', () => {
    expect(() => computeStackedExtent([])).toThrow(EmptyDatasetError);
  });
});
