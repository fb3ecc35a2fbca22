/**
 * Color Types
 *
 * @module @instrument-prefs/core/types/color
 */

/**
 * Internal color representation: three unsigned 16-bit channels.
 */
export interface ColorChannels {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
}

/**
 * Any rich color object exposing 16-bit channel accessors.
 * Only read when a preference is seeded or updated from it.
 */
export interface ColorSource {
  getRed(): number;
  getGreen(): number;
  getBlue(): number;
}

/**
 * Type guard for color sources
 */
export function isColorSource(value: unknown): value is ColorSource {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'getRed' in value &&
    typeof value.getRed === 'function' &&
    'getGreen' in value &&
    typeof value.getGreen === 'function' &&
    'getBlue' in value &&
    typeof value.getBlue === 'function'
  );
}
