import type { NormalizeOptions } from './types';

/**
 * Floor for the domain range divisor. Same units as the domain.
 */
export const EPSILON = 1e-3;

export const defaultNormalizeOptions = {
  epsilon: EPSILON,
  stackKey: 'exact',
} as const satisfies Required<Omit<NormalizeOptions, 'keyWeights'>>;

export const defaultCacheOptions = {
  maxEntries: 32,
} as const;
