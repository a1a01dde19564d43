import { describe, it, expect } from 'vitest';
import { EmptyDatasetError, InvalidValueError, NormalizationError, isNormalizationError } from '../errors';

describe('errors', () => {
  it('EmptyDatasetError names the operation', () => {
    const error = new EmptyDatasetError('computeExtent');
    expect(error).toBeInstanceOf(NormalizationError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('EmptyDatasetError');
    expect(error.code).toBe('EMPTY_DATASET');
    expect(error.operation).toBe('computeExtent');
    expect(error.message).toBe(
      'computeExtent: dataset is empty. Render nothing instead of calling with zero points.'
    );
  });

  it('InvalidValueError reports field, index and value', () => {
    const error = new InvalidValueError('y', Number.NaN, 3);
    expect(error.name).toBe('InvalidValueError');
    expect(error.code).toBe('INVALID_VALUE');
    expect(error.field).toBe('y');
    expect(error.index).toBe(3);
    expect(error.value).toBeNaN();
    expect(error.message).toBe('y[3] must be a finite number. Received: NaN');
  });

  it('InvalidValueError omits the index when not given', () => {
    const error = new InvalidValueError('geometry.height', -5, undefined, 'must be a finite number >= 0');
    expect(error.index).toBeUndefined();
    expect(error.message).toBe('geometry.height must be a finite number >= 0. Received: -5');
  });

  it('isNormalizationError narrows engine failures only', () => {
    expect(isNormalizationError(new EmptyDatasetError('stack'))).toBe(true);
    expect(isNormalizationError(new InvalidValueError('x', Infinity))).toBe(true);
    expect(isNormalizationError(new Error('other'))).toBe(false);
    expect(isNormalizationError('EMPTY_DATASET')).toBe(false);
  });
});
