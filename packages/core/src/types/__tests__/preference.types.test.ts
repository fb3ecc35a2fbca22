/**
 * Preference type guard tests
 *
 * @module types/__tests__/preference.types
 */

import { describe, it, expect } from 'vitest';
import { isPreferenceType, isPayloadOf } from '../preference.types';
import { isColorSource } from '../color.types';
import type { PreferencePayload } from '../preference.types';

describe('isPreferenceType', () => {
  it.each(['boolean', 'string', 'real', 'color', 'none'])('accepts "%s"', (value) => {
    expect(isPreferenceType(value)).toBe(true);
  });

  it('rejects other values', () => {
    expect(isPreferenceType('number')).toBe(false);
    expect(isPreferenceType(undefined)).toBe(false);
    expect(isPreferenceType(1)).toBe(false);
  });
});

describe('isPayloadOf', () => {
  it('matches the payload kind', () => {
    const payload: PreferencePayload = { type: 'real', value: 1.25 };

    expect(isPayloadOf(payload, 'real')).toBe(true);
    expect(isPayloadOf(payload, 'string')).toBe(false);
  });
});

describe('isColorSource', () => {
  it('accepts objects with channel accessors', () => {
    expect(isColorSource({ getRed: () => 0, getGreen: () => 0, getBlue: () => 0 })).toBe(true);
  });

  it('rejects plain channel objects and primitives', () => {
    expect(isColorSource({ red: 0, green: 0, blue: 0 })).toBe(false);
    expect(isColorSource({ getRed: () => 0, getGreen: () => 0 })).toBe(false);
    expect(isColorSource(null)).toBe(false);
    expect(isColorSource('#ffffff')).toBe(false);
  });
});
