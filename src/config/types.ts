/**
 * Any domain value that can report a numeric projection.
 *
 * Equal values must project equally; ordering of projections is not required
 * to match the domain ordering.
 */
export interface Plottable {
  toNumeric(): number;
}

/**
 * Values accepted on either axis.
 * - number: projects to itself
 * - Date: projects to epoch milliseconds
 * - Plottable: projects via `toNumeric()`
 */
export type PlottableValue = number | Date | Plottable;

export type DataPointTuple<X extends PlottableValue = PlottableValue, Y extends PlottableValue = PlottableValue> =
  readonly [x: X, y: Y];

export type DataPointObject<X extends PlottableValue = PlottableValue, Y extends PlottableValue = PlottableValue> =
  Readonly<{
    x: X;
    y: Y;
    /** Opaque identity carried through to output for overlay keying. */
    id?: unknown;
  }>;

export type DataPoint<X extends PlottableValue = PlottableValue, Y extends PlottableValue = PlottableValue> =
  | DataPointTuple<X, Y>
  | DataPointObject<X, Y>;

/**
 * Immutable snapshot owned by the caller for the duration of one call.
 */
export type Dataset<X extends PlottableValue = PlottableValue, Y extends PlottableValue = PlottableValue> =
  ReadonlyArray<DataPoint<X, Y>>;

export type Extent = Readonly<{ min: number; max: number }>;

export type Geometry = Readonly<{ width: number; height: number }>;

/** Screen space: origin top-left, y grows downward. */
export type Point = Readonly<{ x: number; y: number }>;

export type Axis = 'x' | 'y';

export type ChartKind = 'line' | 'point' | 'bar' | 'stackedBar';

/**
 * Maps a projected x value to its stacking key.
 */
export type StackKeyFn = (x: number) => number;

export type StackKeyConfig = 'exact' | Readonly<{ quantize: number }>;

export interface NormalizeOptions {
  /**
   * Minimum domain range used as the divisor in linear mapping.
   * Must be finite and > 0. Defaults to 1e-3.
   */
  readonly epsilon?: number;
  /**
   * How stacked bars group x values.
   * - 'exact': group by exact equality of the x projection (default)
   * - { quantize: step }: group by `round(x / step) * step`
   */
  readonly stackKey?: StackKeyConfig;
  /**
   * Relative slot weight per stacking key. Keys not listed weigh 1.
   */
  readonly keyWeights?: ReadonlyMap<number, number>;
}

export interface ProjectedDataset {
  readonly xs: Float64Array;
  readonly ys: Float64Array;
  /** Sparse: only entries for points that carried an id. */
  readonly ids: ReadonlyArray<unknown>;
}
