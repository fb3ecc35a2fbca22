/**
 * Preference Contract Errors
 *
 * Thrown when a caller uses a preference in a way its kind or lifecycle
 * state does not allow. These indicate a caller/schema mismatch and are
 * not meant to be caught and branched on.
 *
 * @module errors/PreferenceContractError
 */

import {
  PREFERENCE_ERROR_CODE,
  PREFERENCE_ERROR_MESSAGES,
} from '../constants/errors';
import type { PreferenceType, StoredPreferenceType } from '../types/preference.types';

export type PreferenceErrorCode =
  (typeof PREFERENCE_ERROR_CODE)[keyof typeof PREFERENCE_ERROR_CODE];

/**
 * Base class for all preference programming errors
 */
export class PreferenceContractError extends Error {
  readonly code: PreferenceErrorCode;
  readonly identifier: string;

  constructor(code: PreferenceErrorCode, identifier: string, detail: string) {
    super(`${PREFERENCE_ERROR_MESSAGES[code]}: ${detail}`);
    this.name = 'PreferenceContractError';
    this.code = code;
    this.identifier = identifier;
  }
}

/**
 * Typed accessor/mutator called on a preference of a different kind
 *
 * @example
 * // "Preference accessed as the wrong type: getBool() on 'scope.name' which holds string, expected boolean"
 */
export class PreferenceTypeMismatchError extends PreferenceContractError {
  readonly expected: StoredPreferenceType;
  readonly actual: PreferenceType;
  readonly operation: string;

  constructor(
    identifier: string,
    operation: string,
    expected: StoredPreferenceType,
    actual: PreferenceType
  ) {
    super(
      PREFERENCE_ERROR_CODE.TYPE_MISMATCH,
      identifier,
      `${operation}() on '${identifier}' which holds ${actual}, expected ${expected}`
    );
    this.name = 'PreferenceTypeMismatchError';
    this.expected = expected;
    this.actual = actual;
    this.operation = operation;
  }
}

/**
 * Payload read or written after it was moved into another preference
 */
export class PreferenceMovedError extends PreferenceContractError {
  readonly operation: string;

  constructor(identifier: string, operation: string) {
    super(
      PREFERENCE_ERROR_CODE.USE_AFTER_MOVE,
      identifier,
      `${operation}() on '${identifier}'`
    );
    this.name = 'PreferenceMovedError';
    this.operation = operation;
  }
}

/**
 * Builder called again after build() handed its preference out
 */
export class PreferenceBuilderConsumedError extends PreferenceContractError {
  readonly operation: string;

  constructor(identifier: string, operation: string) {
    super(
      PREFERENCE_ERROR_CODE.BUILDER_CONSUMED,
      identifier,
      `${operation}() on builder for '${identifier}'`
    );
    this.name = 'PreferenceBuilderConsumedError';
    this.operation = operation;
  }
}

/**
 * Type guard to check if a thrown value is a preference contract violation
 */
export function isPreferenceContractError(value: unknown): value is PreferenceContractError {
  return value instanceof PreferenceContractError;
}
