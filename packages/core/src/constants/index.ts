/**
 * Constants Index
 *
 * Barrel export for all preference constants.
 *
 * @module @instrument-prefs/core/constants
 */

export {
  PREFERENCE_TYPE,
  PREFERENCE_TYPE_VALUES,
  PREFERENCE_DEFAULT_VISIBILITY,
} from './preference.constants';

export {
  UNIT_TYPE,
  DEFAULT_UNIT_TYPE,
  UNIT_STYLE,
  UNIT_DISPLAY_RULES,
  SI_PREFIXES,
  UNIT_SIGNIFICANT_DIGITS,
  type UnitDisplayRule,
} from './unit.constants';

export { PREFERENCE_ERROR_CODE, PREFERENCE_ERROR_MESSAGES } from './errors';
