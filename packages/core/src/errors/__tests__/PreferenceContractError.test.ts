/**
 * Preference contract error tests
 *
 * @module errors/__tests__/PreferenceContractError
 */

import { describe, it, expect } from 'vitest';
import {
  PreferenceBuilderConsumedError,
  PreferenceContractError,
  PreferenceMovedError,
  PreferenceTypeMismatchError,
  isPreferenceContractError,
} from '../PreferenceContractError';
import { PREFERENCE_ERROR_CODE } from '../../constants/errors';

describe('PreferenceTypeMismatchError', () => {
  it('describes the call, the stored kind and the expected kind', () => {
    const error = new PreferenceTypeMismatchError('scope.name', 'getBool', 'boolean', 'string');

    expect(error.message).toBe(
      "Preference accessed as the wrong type: getBool() on 'scope.name' which holds string, expected boolean"
    );
    expect(error.name).toBe('PreferenceTypeMismatchError');
    expect(error.code).toBe(PREFERENCE_ERROR_CODE.TYPE_MISMATCH);
    expect(error.identifier).toBe('scope.name');
    expect(error.expected).toBe('boolean');
    expect(error.actual).toBe('string');
    expect(error).toBeInstanceOf(PreferenceContractError);
  });
});

describe('PreferenceMovedError', () => {
  it('names the operation attempted on the moved-from value', () => {
    const error = new PreferenceMovedError('scope.name', 'setString');

    expect(error.message).toBe(
      "Preference used after its value was moved out: setString() on 'scope.name'"
    );
    expect(error.code).toBe(PREFERENCE_ERROR_CODE.USE_AFTER_MOVE);
  });
});

describe('PreferenceBuilderConsumedError', () => {
  it('names the builder call made after build()', () => {
    const error = new PreferenceBuilderConsumedError('scope.name', 'withUnit');

    expect(error.message).toBe(
      "Preference builder used after build(): withUnit() on builder for 'scope.name'"
    );
    expect(error.code).toBe(PREFERENCE_ERROR_CODE.BUILDER_CONSUMED);
  });
});

describe('isPreferenceContractError', () => {
  it('recognizes every contract error', () => {
    expect(isPreferenceContractError(new PreferenceMovedError('a', 'getReal'))).toBe(true);
    expect(isPreferenceContractError(new PreferenceBuilderConsumedError('a', 'build'))).toBe(true);
  });

  it('rejects other errors and values', () => {
    expect(isPreferenceContractError(new Error('boom'))).toBe(false);
    expect(isPreferenceContractError({ code: PREFERENCE_ERROR_CODE.TYPE_MISMATCH })).toBe(false);
  });
});
