/**
 * Unit
 *
 * Measurement unit tag carried as preference metadata, with the display
 * formatting a rendering layer uses next to the value.
 *
 * @module units/Unit
 */

import {
  DEFAULT_UNIT_TYPE,
  SI_PREFIXES,
  UNIT_DISPLAY_RULES,
  UNIT_SIGNIFICANT_DIGITS,
  UNIT_STYLE,
} from '../constants/unit.constants';
import type { UnitType } from '../types/unit.types';

export class Unit {
  private readonly type: UnitType;

  constructor(type: UnitType = DEFAULT_UNIT_TYPE) {
    this.type = type;
  }

  getType(): UnitType {
    return this.type;
  }

  getSuffix(): string {
    return UNIT_DISPLAY_RULES[this.type].suffix;
  }

  isDefault(): boolean {
    return this.type === DEFAULT_UNIT_TYPE;
  }

  equals(other: Unit): boolean {
    return this.type === other.type;
  }

  /**
   * Format a value for display
   *
   * @example
   * new Unit('hertz').prettyPrint(1.5e9);        // '1.5 GHz'
   * new Unit('percent').prettyPrint(0.125);      // '12.5%'
   * new Unit('femtoseconds').prettyPrint(1500);  // '1.5 ps'
   */
  prettyPrint(value: number): string {
    const rule = UNIT_DISPLAY_RULES[this.type];
    const scaled = value * rule.scale;

    switch (rule.style) {
      case UNIT_STYLE.SI: {
        // round first so 999999 Hz lands on M, not on "1000 kHz"
        const rounded = Number.isFinite(scaled)
          ? Number(scaled.toPrecision(UNIT_SIGNIFICANT_DIGITS))
          : scaled;
        const prefix = pickPrefix(rounded);
        return `${significant(rounded / prefix.factor)} ${prefix.symbol}${rule.suffix}`;
      }
      case UNIT_STYLE.PERCENT:
        return `${significant(scaled)}${rule.suffix}`;
      case UNIT_STYLE.PLAIN:
        return rule.suffix ? `${significant(scaled)}${rule.suffix}` : significant(scaled);
    }
  }

  toString(): string {
    return this.type;
  }
}

function pickPrefix(value: number): { symbol: string; factor: number } {
  const magnitude = Math.abs(value);
  if (magnitude === 0 || !Number.isFinite(magnitude)) {
    return { symbol: '', factor: 1 };
  }
  const smallest = SI_PREFIXES[SI_PREFIXES.length - 1];
  return SI_PREFIXES.find((prefix) => magnitude >= prefix.factor) ?? smallest;
}

// Number() drops the trailing zeros toPrecision pads with
function significant(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  return String(Number(value.toPrecision(UNIT_SIGNIFICANT_DIGITS)));
}
