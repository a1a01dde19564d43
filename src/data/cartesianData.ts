/**
 * Dataset access and projection helpers.
 *
 * Accepts both point shapes:
 * - tuple: `[x, y]`
 * - object: `{ x, y, id? }`
 *
 * Every projection is validated here so downstream math only ever sees finite numbers.
 *
 * @module cartesianData
 */

import type {
  DataPoint,
  DataPointTuple,
  Dataset,
  Plottable,
  PlottableValue,
  ProjectedDataset,
} from '../config/types';
import { EmptyDatasetError, InvalidValueError } from '../core/errors';

function isTupleDataPoint(p: DataPoint): p is DataPointTuple {
  // `DataPoint` uses a readonly tuple; `Array.isArray` doesn't narrow it well without a predicate.
  return Array.isArray(p);
}

function isPlottable(value: PlottableValue): value is Plottable {
  return typeof value === 'object' && value !== null && !(value instanceof Date);
}

/**
 * Projects a domain value to a number. Does not validate the result.
 */
export function projectValue(value: PlottableValue): number {
  if (typeof value === 'number') return value;
  if (value instanceof Date) return value.getTime();
  if (isPlottable(value)) return value.toNumeric();
  return Number.NaN;
}

/**
 * Returns the point at index i, or null for holes and non-object entries.
 */
function getPoint(data: Dataset, i: number): DataPoint | null {
  const p: DataPoint | undefined = data[i];
  // Guard against undefined/null/non-object entries (sparse arrays, holes)
  if (p === undefined || p === null || typeof p !== 'object') return null;
  return p;
}

export function getPointCount(data: Dataset): number {
  return data.length;
}

/**
 * Returns the raw x domain value at index i, or undefined for a missing point.
 */
export function getX(data: Dataset, i: number): PlottableValue | undefined {
  const p = getPoint(data, i);
  if (p === null) return undefined;
  return isTupleDataPoint(p) ? p[0] : p.x;
}

/**
 * Returns the raw y domain value at index i, or undefined for a missing point.
 */
export function getY(data: Dataset, i: number): PlottableValue | undefined {
  const p = getPoint(data, i);
  if (p === null) return undefined;
  return isTupleDataPoint(p) ? p[1] : p.y;
}

/**
 * Returns the id carried by an object point, or undefined.
 */
export function getId(data: Dataset, i: number): unknown {
  const p = getPoint(data, i);
  if (p === null || isTupleDataPoint(p)) return undefined;
  return p.id;
}

const projectFinite = (value: PlottableValue | undefined, field: 'x' | 'y', index: number): number => {
  if (value === undefined) {
    throw new InvalidValueError(field, value, index, 'is missing');
  }
  const n = projectValue(value);
  if (!Number.isFinite(n)) {
    throw new InvalidValueError(field, n, index);
  }
  return n;
};

/**
 * Projects every point of a dataset once, in input order.
 *
 * @throws EmptyDatasetError when the dataset has no points
 * @throws InvalidValueError when a point is missing or projects to NaN/±Infinity
 */
export function projectDataset(data: Dataset, operation = 'projectDataset'): ProjectedDataset {
  const count = getPointCount(data);
  if (count === 0) throw new EmptyDatasetError(operation);

  const xs = new Float64Array(count);
  const ys = new Float64Array(count);
  const ids: unknown[] = [];

  for (let i = 0; i < count; i++) {
    xs[i] = projectFinite(getX(data, i), 'x', i);
    ys[i] = projectFinite(getY(data, i), 'y', i);
    const id = getId(data, i);
    if (id !== undefined) ids[i] = id;
  }

  return { xs, ys, ids };
}
