/**
 * Unit Types
 *
 * @module @instrument-prefs/core/types/unit
 */

import type { UNIT_TYPE, UNIT_STYLE } from '../constants/unit.constants';

/** Measurement unit derived from constants */
export type UnitType = (typeof UNIT_TYPE)[keyof typeof UNIT_TYPE];

/** Display style derived from constants */
export type UnitStyle = (typeof UNIT_STYLE)[keyof typeof UNIT_STYLE];
