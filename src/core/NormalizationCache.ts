/**
 * Optional memoization for render loops that re-normalize unchanged data.
 *
 * Results are keyed by chart kind, geometry, resolved options and a 32-bit
 * FNV-1a hash over the IEEE-754 bits of the projected data. A hash hit is
 * confirmed by comparing the stored projections, so a collision can only cost
 * a recomputation, never return another dataset's result.
 *
 * Notes:
 * - Eviction is least-recently-used, bounded by `maxEntries` per chart kind.
 * - Cached results are shared between callers; treat them as read-only.
 */

import type { ChartKind, Dataset, Geometry, NormalizeOptions, ProjectedDataset } from '../config/types';
import { defaultCacheOptions } from '../config/defaults';
import { resolveNormalizeOptions, type ResolvedNormalizeOptions } from '../config/OptionResolver';
import { projectDataset } from '../data/cartesianData';
import { InvalidValueError } from './errors';
import { normalizeProjected, type NormalizationResultMap } from './normalize';

export type NormalizationCacheStats = Readonly<{
  readonly total: number;
  readonly hits: number;
  readonly misses: number;
  readonly entries: number;
}>;

export interface NormalizationCacheOptions {
  readonly maxEntries?: number;
}

export interface NormalizationCache {
  normalize<K extends ChartKind>(
    kind: K,
    data: Dataset,
    geometry: Geometry,
    options?: NormalizeOptions
  ): NormalizationResultMap[K];

  /**
   * Returns an immutable snapshot of totals/hits/misses.
   */
  getStats(): NormalizationCacheStats;

  /**
   * Clears all cached entries and resets stats.
   */
  clear(): void;
}

type CacheEntry<K extends ChartKind> = {
  readonly projected: ProjectedDataset;
  readonly result: NormalizationResultMap[K];
};

type Buckets = { [K in ChartKind]: Map<string, CacheEntry<K>> };

const FNV1A_32_OFFSET = 0x811c9dc5;

function fnv1aUpdate(hash: number, words: Uint32Array): number {
  let h = hash >>> 0;
  for (let i = 0; i < words.length; i++) {
    h ^= words[i];
    h = Math.imul(h, 0x01000193) >>> 0; // FNV prime
  }
  return h >>> 0;
}

const float64Words = (data: Float64Array): Uint32Array =>
  new Uint32Array(data.buffer, data.byteOffset, data.byteLength / 4);

/**
 * Computes a stable 32-bit hash of the projected x and y columns using their
 * bit patterns (not numeric equality).
 */
export function hashProjectedDataset(projected: ProjectedDataset): number {
  const h = fnv1aUpdate(FNV1A_32_OFFSET, float64Words(projected.xs));
  return fnv1aUpdate(h, float64Words(projected.ys));
}

const sameBits = (a: Float64Array, b: Float64Array): boolean => {
  if (a.length !== b.length) return false;
  const wa = float64Words(a);
  const wb = float64Words(b);
  for (let i = 0; i < wa.length; i++) {
    if (wa[i] !== wb[i]) return false;
  }
  return true;
};

const sameIds = (a: ReadonlyArray<unknown>, b: ReadonlyArray<unknown>, count: number): boolean => {
  for (let i = 0; i < count; i++) {
    if (!Object.is(a[i], b[i])) return false;
  }
  return true;
};

const sameProjection = (a: ProjectedDataset, b: ProjectedDataset): boolean =>
  sameBits(a.xs, b.xs) && sameBits(a.ys, b.ys) && sameIds(a.ids, b.ids, a.xs.length);

const optionsKey = (options: ResolvedNormalizeOptions): string => {
  const parts: string[] = [String(options.epsilon)];
  parts.push(options.stackKey === 'exact' ? 'exact' : `q${options.stackKey.quantize}`);
  for (const [key, weight] of options.keyWeights) {
    parts.push(`${key}:${weight}`);
  }
  return parts.join('|');
};

export function createNormalizationCache(cacheOptions: NormalizationCacheOptions = {}): NormalizationCache {
  const maxEntries = cacheOptions.maxEntries ?? defaultCacheOptions.maxEntries;
  if (!Number.isInteger(maxEntries) || maxEntries < 1) {
    throw new InvalidValueError('maxEntries', maxEntries, undefined, 'must be an integer >= 1');
  }

  const buckets: Buckets = {
    line: new Map(),
    point: new Map(),
    bar: new Map(),
    stackedBar: new Map(),
  };
  let hits = 0;
  let misses = 0;

  const lookup = <K extends ChartKind>(
    bucket: Map<string, CacheEntry<K>>,
    key: string,
    projected: ProjectedDataset
  ): CacheEntry<K> | null => {
    const entry = bucket.get(key);
    if (!entry || !sameProjection(entry.projected, projected)) return null;
    // Re-insert to mark as most recently used.
    bucket.delete(key);
    bucket.set(key, entry);
    return entry;
  };

  const store = <K extends ChartKind>(bucket: Map<string, CacheEntry<K>>, key: string, entry: CacheEntry<K>): void => {
    bucket.delete(key);
    bucket.set(key, entry);
    while (bucket.size > maxEntries) {
      const oldest = bucket.keys().next();
      if (oldest.done) break;
      bucket.delete(oldest.value);
    }
  };

  function normalize<K extends ChartKind>(
    kind: K,
    data: Dataset,
    geometry: Geometry,
    options?: NormalizeOptions
  ): NormalizationResultMap[K] {
    const resolved = resolveNormalizeOptions(options);
    const projected = projectDataset(data, `normalize(${kind})`);
    const key = [
      geometry.width,
      geometry.height,
      optionsKey(resolved),
      projected.xs.length,
      hashProjectedDataset(projected),
    ].join('/');

    const bucket: Map<string, CacheEntry<K>> = buckets[kind];
    const cached = lookup(bucket, key, projected);
    if (cached) {
      hits++;
      return cached.result;
    }

    misses++;
    const result = normalizeProjected(kind, projected, geometry, resolved);
    store(bucket, key, { projected, result });
    return result;
  }

  const entryCount = (): number =>
    buckets.line.size + buckets.point.size + buckets.bar.size + buckets.stackedBar.size;

  const getStats = (): NormalizationCacheStats => ({
    total: hits + misses,
    hits,
    misses,
    entries: entryCount(),
  });

  const clear = (): void => {
    buckets.line.clear();
    buckets.point.clear();
    buckets.bar.clear();
    buckets.stackedBar.clear();
    hits = 0;
    misses = 0;
  };

  return { normalize, getStats, clear };
}
