import type { NormalizeOptions, StackKeyConfig, StackKeyFn } from './types';
import { defaultNormalizeOptions } from './defaults';
import { InvalidValueError } from '../core/errors';
import { quantizeKey } from '../core/stack';

export interface ResolvedNormalizeOptions {
  readonly epsilon: number;
  readonly stackKey: StackKeyConfig;
  /** `null` means exact grouping on the x projection. */
  readonly keyOf: StackKeyFn | null;
  readonly keyWeights: ReadonlyMap<number, number>;
}

const EMPTY_WEIGHTS: ReadonlyMap<number, number> = new Map();

const resolveEpsilon = (epsilonInput: unknown): number => {
  if (epsilonInput === undefined) return defaultNormalizeOptions.epsilon;
  if (typeof epsilonInput === 'number' && Number.isFinite(epsilonInput) && epsilonInput > 0) {
    return epsilonInput;
  }
  console.warn(
    `resolveNormalizeOptions: epsilon must be a finite number > 0, using ${defaultNormalizeOptions.epsilon}. Received:`,
    epsilonInput
  );
  return defaultNormalizeOptions.epsilon;
};

const resolveStackKey = (stackKey: StackKeyConfig | undefined): { stackKey: StackKeyConfig; keyOf: StackKeyFn | null } => {
  if (stackKey === undefined || stackKey === 'exact') {
    return { stackKey: defaultNormalizeOptions.stackKey, keyOf: null };
  }
  // quantizeKey throws on a bad step.
  return { stackKey: { quantize: stackKey.quantize }, keyOf: quantizeKey(stackKey.quantize) };
};

const resolveKeyWeights = (weights: ReadonlyMap<number, number> | undefined): ReadonlyMap<number, number> => {
  if (weights === undefined || weights.size === 0) return EMPTY_WEIGHTS;

  const resolved = new Map<number, number>();
  for (const [key, weight] of weights) {
    if (!Number.isFinite(key)) {
      throw new InvalidValueError('keyWeights key', key);
    }
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new InvalidValueError(`keyWeights(${key})`, weight, undefined, 'must be a finite number > 0');
    }
    resolved.set(key, weight);
  }
  return resolved;
};

export function resolveNormalizeOptions(userOptions: NormalizeOptions = {}): ResolvedNormalizeOptions {
  const epsilon = resolveEpsilon(userOptions.epsilon);
  const { stackKey, keyOf } = resolveStackKey(userOptions.stackKey);
  const keyWeights = resolveKeyWeights(userOptions.keyWeights);

  return { epsilon, stackKey, keyOf, keyWeights };
}

export const OptionResolver = { resolve: resolveNormalizeOptions } as const;
