/**
 * Measurement Unit Constants
 *
 * Unit tags attached to preferences and the display rules for each.
 *
 * @module @instrument-prefs/core/constants/unit
 */

// ============================================
// UNIT TYPES
// ============================================

export const UNIT_TYPE = {
  FEMTOSECONDS: 'femtoseconds',
  HERTZ: 'hertz',
  VOLTS: 'volts',
  AMPS: 'amps',
  OHMS: 'ohms',
  BITRATE: 'bitrate',
  PERCENT: 'percent',
  DECIBELS: 'decibels',
  DBM: 'dbm',
  COUNTS: 'counts',
  SAMPLERATE: 'samplerate',
  SAMPLEDEPTH: 'sampledepth',
  WATTS: 'watts',
  DEGREES: 'degrees',
  CELSIUS: 'celsius',
} as const;

/** Unit given to every preference that is not tagged explicitly */
export const DEFAULT_UNIT_TYPE = UNIT_TYPE.COUNTS;

// ============================================
// DISPLAY RULES
// ============================================

/**
 * How a value is rendered:
 * - `si`: scaled with a metric prefix (k, M, m, μ, ...)
 * - `percent`: value is a fraction, rendered ×100
 * - `plain`: number followed by the suffix
 */
export const UNIT_STYLE = {
  SI: 'si',
  PERCENT: 'percent',
  PLAIN: 'plain',
} as const;

type UnitTypeValue = (typeof UNIT_TYPE)[keyof typeof UNIT_TYPE];
type UnitStyleValue = (typeof UNIT_STYLE)[keyof typeof UNIT_STYLE];

export interface UnitDisplayRule {
  suffix: string;
  style: UnitStyleValue;
  /** Multiplier applied before formatting (femtoseconds are shown in seconds) */
  scale: number;
}

export const UNIT_DISPLAY_RULES: Record<UnitTypeValue, UnitDisplayRule> = {
  [UNIT_TYPE.FEMTOSECONDS]: { suffix: 's', style: UNIT_STYLE.SI, scale: 1e-15 },
  [UNIT_TYPE.HERTZ]: { suffix: 'Hz', style: UNIT_STYLE.SI, scale: 1 },
  [UNIT_TYPE.VOLTS]: { suffix: 'V', style: UNIT_STYLE.SI, scale: 1 },
  [UNIT_TYPE.AMPS]: { suffix: 'A', style: UNIT_STYLE.SI, scale: 1 },
  [UNIT_TYPE.OHMS]: { suffix: 'Ω', style: UNIT_STYLE.SI, scale: 1 },
  [UNIT_TYPE.BITRATE]: { suffix: 'bps', style: UNIT_STYLE.SI, scale: 1 },
  [UNIT_TYPE.PERCENT]: { suffix: '%', style: UNIT_STYLE.PERCENT, scale: 100 },
  [UNIT_TYPE.DECIBELS]: { suffix: 'dB', style: UNIT_STYLE.PLAIN, scale: 1 },
  [UNIT_TYPE.DBM]: { suffix: 'dBm', style: UNIT_STYLE.PLAIN, scale: 1 },
  [UNIT_TYPE.COUNTS]: { suffix: '', style: UNIT_STYLE.PLAIN, scale: 1 },
  [UNIT_TYPE.SAMPLERATE]: { suffix: 'S/s', style: UNIT_STYLE.SI, scale: 1 },
  [UNIT_TYPE.SAMPLEDEPTH]: { suffix: 'S', style: UNIT_STYLE.SI, scale: 1 },
  [UNIT_TYPE.WATTS]: { suffix: 'W', style: UNIT_STYLE.SI, scale: 1 },
  [UNIT_TYPE.DEGREES]: { suffix: '°', style: UNIT_STYLE.PLAIN, scale: 1 },
  [UNIT_TYPE.CELSIUS]: { suffix: '°C', style: UNIT_STYLE.PLAIN, scale: 1 },
};

/** Metric prefixes, largest first, used by the `si` style */
export const SI_PREFIXES: ReadonlyArray<{ symbol: string; factor: number }> = [
  { symbol: 'G', factor: 1e9 },
  { symbol: 'M', factor: 1e6 },
  { symbol: 'k', factor: 1e3 },
  { symbol: '', factor: 1 },
  { symbol: 'm', factor: 1e-3 },
  { symbol: 'μ', factor: 1e-6 },
  { symbol: 'n', factor: 1e-9 },
  { symbol: 'p', factor: 1e-12 },
  { symbol: 'f', factor: 1e-15 },
];

/** Significant digits kept by prettyPrint */
export const UNIT_SIGNIFICANT_DIGITS = 4;
