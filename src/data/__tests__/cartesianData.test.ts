/**
 * Tests for cartesianData helpers - projection and guards against missing entries.
 */

import { describe, it, expect } from 'vitest';
import { getId, getPointCount, getX, getY, projectDataset, projectValue } from '../cartesianData';
import type { DataPoint, Plottable } from '../../config/types';
import { EmptyDatasetError, InvalidValueError } from '../../core/errors';

const celsius = (degrees: number): Plottable => ({ toNumeric: () => degrees });

describe('projectValue', () => {
  it('returns numbers unchanged', () => {
    expect(projectValue(42)).toBe(42);
    expect(projectValue(-0.5)).toBe(-0.5);
  });

  it('projects dates to epoch milliseconds', () => {
    expect(projectValue(new Date(1000))).toBe(1000);
  });

  it('projects plottables via toNumeric', () => {
    expect(projectValue(celsius(21))).toBe(21);
  });
});

describe('cartesianData - point access', () => {
  it('reads tuple and object points', () => {
    const data: DataPoint[] = [
      [1, 2],
      { x: 3, y: 4, id: 'b' },
    ];

    expect(getPointCount(data)).toBe(2);
    expect(getX(data, 0)).toBe(1);
    expect(getY(data, 0)).toBe(2);
    expect(getX(data, 1)).toBe(3);
    expect(getY(data, 1)).toBe(4);
    expect(getId(data, 0)).toBeUndefined();
    expect(getId(data, 1)).toBe('b');
  });

  it('returns undefined for holes in sparse arrays', () => {
    const sparseData: DataPoint[] = [{ x: 1, y: 2 }];
    sparseData[2] = { x: 3, y: 4 };

    expect(getX(sparseData, 1)).toBeUndefined();
    expect(getY(sparseData, 1)).toBeUndefined();
    expect(getX(sparseData, 2)).toBe(3);
  });
});

describe('projectDataset', () => {
  it('projects every point in input order', () => {
    const projected = projectDataset([
      { x: new Date(2000), y: celsius(-3) },
      { x: new Date(1000), y: celsius(7), id: 7 },
    ]);

    expect(Array.from(projected.xs)).toEqual([2000, 1000]);
    expect(Array.from(projected.ys)).toEqual([-3, 7]);
    expect(projected.ids[0]).toBeUndefined();
    expect(projected.ids[1]).toBe(7);
  });

  it('throws EmptyDatasetError naming the calling operation', () => {
    expect(() => projectDataset([], 'normalize(line)')).toThrow('normalize(line): dataset is empty.');
  });

  it('throws InvalidValueError for non-finite projections', () => {
    expect(() => projectDataset([[0, 1], [1, Number.POSITIVE_INFINITY]])).toThrow(
      'y[1] must be a finite number. Received: Infinity'
    );
    expect(() => projectDataset([{ x: celsius(Number.NaN), y: 1 }])).toThrow(InvalidValueError);
  });

  it('throws InvalidValueError for missing points', () => {
    const sparseData: DataPoint[] = [[0, 1]];
    sparseData[2] = [2, 3];
    expect(() => projectDataset(sparseData)).toThrow('x[1] is missing. Received: undefined');
  });

  it('does not mutate the input', () => {
    const data = Object.freeze([Object.freeze({ x: 1, y: 2 }), Object.freeze({ x: 3, y: 4 })]);
    projectDataset(data);
    expect(data).toEqual([
      { x: 1, y: 2 },
      { x: 3, y: 4 },
    ]);
  });

  it('is an EmptyDatasetError instance for empty input', () => {
    expect(() => projectDataset([])).toThrow(EmptyDatasetError);
  });
});
