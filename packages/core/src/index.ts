/**
 * @instrument-prefs/core
 *
 * Typed preference values for instrument front ends: one named value of
 * a fixed kind (boolean, string, real, color) with label, description,
 * visibility and measurement unit.
 *
 * @module @instrument-prefs/core
 *
 * @example
 * ```typescript
 * import { Preference, RgbColor, UNIT_TYPE } from '@instrument-prefs/core';
 *
 * const grid = Preference
 *   .create('display.grid_color', 'Grid color', 'Color of the graticule', RgbColor.fromHex('#404040'))
 *   .build();
 *
 * const probe = Preference
 *   .create('probe.attenuation', 'Attenuation', 'Probe attenuation ratio', 10.0)
 *   .withUnit(UNIT_TYPE.DECIBELS)
 *   .isVisible(false)
 *   .build();
 * ```
 */

// ============================================
// Types
// ============================================
export type {
  PreferenceType,
  StoredPreferenceType,
  BooleanPayload,
  StringPayload,
  RealPayload,
  ColorPayload,
  NonePayload,
  PreferencePayload,
  PayloadOf,
  PreferenceDefault,
  ColorChannels,
  ColorSource,
  UnitType,
  UnitStyle,
} from './types';

// Type guards (runtime functions, not types)
export { isPreferenceType, isPayloadOf, isColorSource } from './types';

// ============================================
// Constants
// ============================================
export {
  PREFERENCE_TYPE,
  PREFERENCE_TYPE_VALUES,
  PREFERENCE_DEFAULT_VISIBILITY,
  UNIT_TYPE,
  DEFAULT_UNIT_TYPE,
  UNIT_STYLE,
  UNIT_DISPLAY_RULES,
  SI_PREFIXES,
  UNIT_SIGNIFICANT_DIGITS,
  PREFERENCE_ERROR_CODE,
  PREFERENCE_ERROR_MESSAGES,
  type UnitDisplayRule,
} from './constants';

// ============================================
// Errors
// ============================================
export {
  PreferenceContractError,
  PreferenceTypeMismatchError,
  PreferenceMovedError,
  PreferenceBuilderConsumedError,
  isPreferenceContractError,
  type PreferenceErrorCode,
} from './errors';

// ============================================
// Values
// ============================================
export { Preference, PreferenceBuilder } from './preference';
export { Unit } from './units';
export {
  RgbColor,
  hexColorSchema,
  CHANNEL_MAX,
  colorChannelsSchema,
  toChannel,
  createChannels,
  channelsFromSource,
  channelsToHex,
} from './color';

// ============================================
// Logging & configuration
// ============================================
export { logger, createChildLogger } from './utils/logger';
export { env, parseEnvironment, type Environment } from './config/environment';
