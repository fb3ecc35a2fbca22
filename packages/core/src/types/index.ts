/**
 * Types Index
 *
 * Barrel export for all preference type definitions.
 *
 * @module @instrument-prefs/core/types
 */

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
} from './preference.types';
export { isPreferenceType, isPayloadOf } from './preference.types';

export type { ColorChannels, ColorSource } from './color.types';
export { isColorSource } from './color.types';

export type { UnitType, UnitStyle } from './unit.types';
