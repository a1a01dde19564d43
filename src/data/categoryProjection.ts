import type { Plottable } from '../config/types';
import { InvalidValueError } from '../core/errors';

export interface CategoryValue extends Plottable {
  readonly category: string;
}

export interface CategoryProjection {
  /**
   * Wraps a category label as a plottable value projecting to its index.
   *
   * Edge cases:
   * - Unknown category: projects to NaN, which normalization rejects
   */
  value(category: string): CategoryValue;

  /**
   * Returns the index of a category, or -1 when unknown.
   */
  categoryIndex(category: string): number;

  readonly categories: ReadonlyArray<string>;
}

/**
 * Creates a projection for string categories onto evenly spaced integers
 * (0, 1, 2, ...) in the given order.
 *
 * Throws if duplicates exist (ambiguous mapping).
 */
export function createCategoryProjection(categories: ReadonlyArray<string>): CategoryProjection {
  const ordered: readonly string[] = [...categories];
  const indexByCategory = new Map<string, number>();

  for (let i = 0; i < ordered.length; i++) {
    const c = ordered[i];
    if (indexByCategory.has(c)) {
      throw new InvalidValueError('categories', JSON.stringify(c), i, 'must not contain duplicates');
    }
    indexByCategory.set(c, i);
  }

  const categoryIndex = (category: string): number => {
    const idx = indexByCategory.get(category);
    return idx === undefined ? -1 : idx;
  };

  const value = (category: string): CategoryValue => {
    const idx = categoryIndex(category);
    const numeric = idx < 0 ? Number.NaN : idx;
    return { category, toNumeric: () => numeric };
  };

  return { value, categoryIndex, categories: ordered };
}
