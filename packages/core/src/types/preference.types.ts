/**
 * Preference Types
 *
 * Payload union and metadata types for a single typed preference.
 *
 * @module @instrument-prefs/core/types/preference
 */

import { PREFERENCE_TYPE, PREFERENCE_TYPE_VALUES } from '../constants/preference.constants';
import type { ColorChannels, ColorSource } from './color.types';

/** Preference kind derived from constants */
export type PreferenceType = (typeof PREFERENCE_TYPE)[keyof typeof PREFERENCE_TYPE];

/** Kinds a live (not moved-from) preference can have */
export type StoredPreferenceType = Exclude<PreferenceType, typeof PREFERENCE_TYPE.NONE>;

export interface BooleanPayload {
  readonly type: typeof PREFERENCE_TYPE.BOOLEAN;
  readonly value: boolean;
}

export interface StringPayload {
  readonly type: typeof PREFERENCE_TYPE.STRING;
  readonly value: string;
}

export interface RealPayload {
  readonly type: typeof PREFERENCE_TYPE.REAL;
  readonly value: number;
}

export interface ColorPayload {
  readonly type: typeof PREFERENCE_TYPE.COLOR;
  readonly value: ColorChannels;
}

/** Left behind in a preference whose payload was moved out */
export interface NonePayload {
  readonly type: typeof PREFERENCE_TYPE.NONE;
}

/**
 * The single active value of a preference.
 * `type` always names the representation that is present.
 */
export type PreferencePayload =
  | BooleanPayload
  | StringPayload
  | RealPayload
  | ColorPayload
  | NonePayload;

/** Payload variant for a given kind */
export type PayloadOf<K extends PreferenceType> = Extract<PreferencePayload, { type: K }>;

/** Values accepted as a preference default */
export type PreferenceDefault = boolean | string | number | ColorSource;

/**
 * Type guard for preference kinds
 */
export function isPreferenceType(value: unknown): value is PreferenceType {
  return PREFERENCE_TYPE_VALUES.some((type) => type === value);
}

/**
 * Narrows a payload to the variant of the given kind
 */
export function isPayloadOf<K extends PreferenceType>(
  payload: PreferencePayload,
  type: K
): payload is PayloadOf<K> {
  return payload.type === type;
}
