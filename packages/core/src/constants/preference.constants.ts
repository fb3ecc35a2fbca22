/**
 * Preference Domain Constants
 *
 * Single source of truth for preference kinds.
 *
 * @module @instrument-prefs/core/constants/preference
 */

// ============================================
// PREFERENCE TYPES
// ============================================

/**
 * Payload kinds a preference can hold.
 *
 * NONE is never constructible; it only marks a value whose payload
 * has been moved into another preference.
 */
export const PREFERENCE_TYPE = {
  BOOLEAN: 'boolean',
  STRING: 'string',
  REAL: 'real',
  COLOR: 'color',
  NONE: 'none',
} as const;

/** All preference type values as array (for validation) */
export const PREFERENCE_TYPE_VALUES = Object.values(PREFERENCE_TYPE);

// ============================================
// METADATA DEFAULTS
// ============================================

/** Preferences are shown in the editor unless hidden by the builder */
export const PREFERENCE_DEFAULT_VISIBILITY = true;
