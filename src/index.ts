/**
 * Chart coordinate normalization: turns (x, y) domain data plus a drawing-area
 * size into screen-space positions, baselines, bar extents and stacked groups.
 */

export const version = '1.0.0';

// Engine
export {
  normalize,
  normalizeLine,
  normalizePoint,
  normalizeBar,
  normalizeStackedBar,
  normalizeProjected,
} from './core/normalize';
export type {
  BarNormalization,
  CartesianNormalization,
  NormalizationResult,
  NormalizationResultMap,
  PlacedBar,
  PositionedPoint,
  ScaleResult,
  StackedBarGroup,
  StackedBarNormalization,
  StackedBarSegment,
} from './core/normalize';

// Building blocks - Pure utilities
export { computeExtent, computeDatasetExtents, includeZero, isDegenerate } from './data/extent';
export { mapLinear, createLinearScale } from './utils/scales';
export type { LinearScale, LinearScaleConfig } from './utils/scales';
export { baselineX, baselineY } from './core/baseline';
export { computeBarScales, scaleBar, scaleBars } from './core/barScaler';
export type { BarDirection, BarExtent, BarScales } from './core/barScaler';
export { stack, stackProjected, stackSegments, quantizeKey, computeStackedExtent } from './core/stack';
export type { StackedGroup, StackOptions, StackSegment } from './core/stack';

// Projection
export { projectValue, projectDataset, getPointCount, getX, getY, getId } from './data/cartesianData';
export { createCategoryProjection } from './data/categoryProjection';
export type { CategoryProjection, CategoryValue } from './data/categoryProjection';

// Memoization
export { createNormalizationCache, hashProjectedDataset } from './core/NormalizationCache';
export type {
  NormalizationCache,
  NormalizationCacheOptions,
  NormalizationCacheStats,
} from './core/NormalizationCache';

// Options defaults + resolution
export { EPSILON, defaultNormalizeOptions, defaultCacheOptions } from './config/defaults';
export { OptionResolver, resolveNormalizeOptions } from './config/OptionResolver';
export type { ResolvedNormalizeOptions } from './config/OptionResolver';

// Errors
export {
  NormalizationError,
  EmptyDatasetError,
  InvalidValueError,
  isNormalizationError,
} from './core/errors';
export type { NormalizationErrorCode } from './core/errors';

export type {
  Axis,
  ChartKind,
  DataPoint,
  DataPointObject,
  DataPointTuple,
  Dataset,
  Extent,
  Geometry,
  NormalizeOptions,
  Plottable,
  PlottableValue,
  Point,
  ProjectedDataset,
  StackKeyConfig,
  StackKeyFn,
} from './config/types';
