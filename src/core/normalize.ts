/**
 * Normalization engine: one entry point per chart kind, all sharing the same
 * projection, extent, scale and baseline math.
 *
 * Every function here is pure. Inputs are never mutated and identical inputs
 * produce bit-identical output.
 *
 * @module normalize
 */

import type { ChartKind, Dataset, Extent, Geometry, NormalizeOptions, Point, ProjectedDataset } from '../config/types';
import { resolveNormalizeOptions, type ResolvedNormalizeOptions } from '../config/OptionResolver';
import { projectDataset } from '../data/cartesianData';
import { computeDatasetExtents } from '../data/extent';
import { createLinearScale, mapLinear } from '../utils/scales';
import { baselineX, baselineY } from './baseline';
import { scaleBars, type BarExtent } from './barScaler';
import { computeStackedExtent, stackProjected, stackSegments, type StackedGroup } from './stack';
import { InvalidValueError } from './errors';

export type PositionedPoint = Point & { readonly id?: unknown };

/**
 * Positions for line/point charts.
 */
export interface ScaleResult {
  readonly positions: ReadonlyArray<PositionedPoint>;
  /** Screen y of domain value 0. */
  readonly baseline: number;
}

export interface CartesianNormalization<K extends 'line' | 'point'> extends ScaleResult {
  readonly kind: K;
  /** Screen x of domain value 0 (vertical axis placement). */
  readonly originX: number;
  readonly xExtent: Extent;
  readonly yExtent: Extent;
}

export type PlacedBar = BarExtent &
  Readonly<{
    /** Screen x of the bar's center. */
    x: number;
    slotWidth: number;
    id?: unknown;
  }>;

export interface BarNormalization {
  readonly kind: 'bar';
  readonly bars: ReadonlyArray<PlacedBar>;
  readonly baseline: number;
  readonly xExtent: Extent;
  readonly yExtent: Extent;
}

export interface StackedBarSegment {
  readonly index: number;
  readonly value: number;
  /** Screen y where the segment starts (nearer the baseline). */
  readonly start: number;
  /** Screen y where the segment ends. */
  readonly end: number;
  readonly id?: unknown;
}

export type StackedBarGroup = Omit<StackedGroup, 'indices'> &
  Readonly<{
    /** Screen x of the slot center (`offset * width`). */
    x: number;
    /** Slot width in pixels (`width fraction * geometry width`). */
    slotWidth: number;
    /** Screen y of the positive stack's top. */
    top: number;
    /** Screen y of the negative stack's bottom. */
    bottom: number;
    segments: ReadonlyArray<StackedBarSegment>;
  }>;

export interface StackedBarNormalization {
  readonly kind: 'stackedBar';
  readonly groups: ReadonlyArray<StackedBarGroup>;
  readonly baseline: number;
  /** Extent of the stacked totals, always containing 0. */
  readonly yExtent: Extent;
}

export type NormalizationResultMap = {
  line: CartesianNormalization<'line'>;
  point: CartesianNormalization<'point'>;
  bar: BarNormalization;
  stackedBar: StackedBarNormalization;
};

export type NormalizationResult<K extends ChartKind = ChartKind> = NormalizationResultMap[K];

type Normalizers = {
  [K in ChartKind]: (
    projected: ProjectedDataset,
    geometry: Geometry,
    options: ResolvedNormalizeOptions
  ) => NormalizationResultMap[K];
};

const assertGeometry = (geometry: Geometry): void => {
  const { width, height } = geometry;
  if (!Number.isFinite(width) || width < 0) {
    throw new InvalidValueError('geometry.width', width, undefined, 'must be a finite number >= 0');
  }
  if (!Number.isFinite(height) || height < 0) {
    throw new InvalidValueError('geometry.height', height, undefined, 'must be a finite number >= 0');
  }
};

const withId = <T extends object>(value: T, id: unknown): T | (T & { readonly id: unknown }) =>
  id === undefined ? value : { ...value, id };

const normalizeCartesian = <K extends 'line' | 'point'>(
  kind: K,
  projected: ProjectedDataset,
  geometry: Geometry,
  options: ResolvedNormalizeOptions
): CartesianNormalization<K> => {
  const { xs, ys, ids } = projected;
  const { epsilon } = options;
  const extents = computeDatasetExtents(projected);
  const xScale = createLinearScale({ extent: extents.x, size: geometry.width, axis: 'x', epsilon });
  const yScale = createLinearScale({ extent: extents.y, size: geometry.height, axis: 'y', epsilon });

  const positions: PositionedPoint[] = new Array(xs.length);
  for (let i = 0; i < xs.length; i++) {
    positions[i] = withId({ x: xScale.scale(xs[i]), y: yScale.scale(ys[i]) }, ids[i]);
  }

  return {
    kind,
    positions,
    baseline: baselineY(extents.y, geometry.height, epsilon),
    originX: baselineX(extents.x, geometry.width, epsilon),
    xExtent: extents.x,
    yExtent: extents.y,
  };
};

const normalizeBarProjected = (
  projected: ProjectedDataset,
  geometry: Geometry,
  options: ResolvedNormalizeOptions
): BarNormalization => {
  const { xs, ys, ids } = projected;
  const { epsilon } = options;
  const extents = computeDatasetExtents(projected);
  const slotWidth = geometry.width / xs.length;
  // Centers span [slotWidth / 2, width - slotWidth / 2] so every slot stays inside the area.
  const halfSlot = slotWidth / 2;
  const xScale = createLinearScale({ extent: extents.x, size: geometry.width - slotWidth, axis: 'x', epsilon });

  const extentsByIndex = scaleBars(ys, extents.y, geometry.height, epsilon);
  const bars: PlacedBar[] = new Array(xs.length);
  for (let i = 0; i < xs.length; i++) {
    bars[i] = withId({ ...extentsByIndex[i], x: halfSlot + xScale.scale(xs[i]), slotWidth }, ids[i]);
  }

  return {
    kind: 'bar',
    bars,
    baseline: baselineY(extents.y, geometry.height, epsilon),
    xExtent: extents.x,
    yExtent: extents.y,
  };
};

const normalizeStackedBarProjected = (
  projected: ProjectedDataset,
  geometry: Geometry,
  options: ResolvedNormalizeOptions
): StackedBarNormalization => {
  const { epsilon } = options;
  const { height, width } = geometry;
  const stacked = stackProjected(projected, { keyOf: options.keyOf, keyWeights: options.keyWeights });
  const yExtent = computeStackedExtent(stacked);
  const toScreenY = (v: number): number => mapLinear(v, yExtent, height, 'y', epsilon);

  const groups: StackedBarGroup[] = stacked.map((group) => {
    const { indices: _indices, ...fields } = group;
    const segments = stackSegments(group, projected.ys).map((s) =>
      withId({ index: s.index, value: s.value, start: toScreenY(s.from), end: toScreenY(s.to) }, projected.ids[s.index])
    );
    return {
      ...fields,
      x: group.offset * width,
      slotWidth: group.width * width,
      top: toScreenY(group.positiveTotal),
      bottom: toScreenY(group.negativeTotal),
      segments,
    };
  });

  return {
    kind: 'stackedBar',
    groups,
    baseline: baselineY(yExtent, height, epsilon),
    yExtent,
  };
};

const normalizers: Normalizers = {
  line: (projected, geometry, options) => normalizeCartesian('line', projected, geometry, options),
  point: (projected, geometry, options) => normalizeCartesian('point', projected, geometry, options),
  bar: normalizeBarProjected,
  stackedBar: normalizeStackedBarProjected,
};

/**
 * Runs the chart-kind specific pipeline on an already projected dataset.
 * Used by the cache, which projects once to hash the data.
 */
export function normalizeProjected<K extends ChartKind>(
  kind: K,
  projected: ProjectedDataset,
  geometry: Geometry,
  options: ResolvedNormalizeOptions
): NormalizationResultMap[K] {
  assertGeometry(geometry);
  const run: Normalizers[K] = normalizers[kind];
  return run(projected, geometry, options);
}

/**
 * Converts a dataset into screen-space output for the given chart kind.
 *
 * @throws EmptyDatasetError when `data` is empty
 * @throws InvalidValueError for non-finite projections, missing points or bad geometry
 *
 * @example
 * ```ts
 * const result = normalize('line', [{ x: 0, y: -10 }, { x: 1, y: 20 }], { width: 100, height: 90 });
 * result.baseline; // 60
 * ```
 */
export function normalize<K extends ChartKind>(
  kind: K,
  data: Dataset,
  geometry: Geometry,
  options?: NormalizeOptions
): NormalizationResultMap[K] {
  const resolved = resolveNormalizeOptions(options);
  return normalizeProjected(kind, projectDataset(data, `normalize(${kind})`), geometry, resolved);
}

export const normalizeLine = (data: Dataset, geometry: Geometry, options?: NormalizeOptions) =>
  normalize('line', data, geometry, options);

export const normalizePoint = (data: Dataset, geometry: Geometry, options?: NormalizeOptions) =>
  normalize('point', data, geometry, options);

export const normalizeBar = (data: Dataset, geometry: Geometry, options?: NormalizeOptions) =>
  normalize('bar', data, geometry, options);

export const normalizeStackedBar = (data: Dataset, geometry: Geometry, options?: NormalizeOptions) =>
  normalize('stackedBar', data, geometry, options);
