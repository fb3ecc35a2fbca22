/**
 * Preference Error Codes
 *
 * Machine-readable codes carried by contract-violation errors.
 *
 * @module @instrument-prefs/core/constants/errors
 */

export const PREFERENCE_ERROR_CODE = {
  /** Typed accessor or mutator called on a preference of another kind */
  TYPE_MISMATCH: 'PREFERENCE_TYPE_MISMATCH',
  /** Payload read or written after it was moved out */
  USE_AFTER_MOVE: 'PREFERENCE_USE_AFTER_MOVE',
  /** Builder used again after build() handed its preference out */
  BUILDER_CONSUMED: 'PREFERENCE_BUILDER_CONSUMED',
} as const;

export const PREFERENCE_ERROR_MESSAGES: Record<
  (typeof PREFERENCE_ERROR_CODE)[keyof typeof PREFERENCE_ERROR_CODE],
  string
> = {
  [PREFERENCE_ERROR_CODE.TYPE_MISMATCH]: 'Preference accessed as the wrong type',
  [PREFERENCE_ERROR_CODE.USE_AFTER_MOVE]: 'Preference used after its value was moved out',
  [PREFERENCE_ERROR_CODE.BUILDER_CONSUMED]: 'Preference builder used after build()',
};
