/**
 * Preference
 *
 * A single named, typed configuration value. Holds exactly one payload
 * (boolean, string, real or color) plus metadata used by the registry
 * and the rendering layer.
 *
 * Ownership model:
 * - No copy operation. A preference has one owner at a time.
 * - Preference.take() and assign() move the payload; the source is left
 *   with kind `none` and may only be disposed or assigned over.
 * - assign() releases the target's previous payload before taking the
 *   source's.
 * - The kind never changes through setters.
 *
 * @module preference/Preference
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger';
import { PREFERENCE_DEFAULT_VISIBILITY, PREFERENCE_TYPE } from '../constants/preference.constants';
import type {
  PayloadOf,
  PreferenceDefault,
  PreferencePayload,
  PreferenceType,
  StoredPreferenceType,
} from '../types/preference.types';
import { isPayloadOf } from '../types/preference.types';
import type { ColorChannels, ColorSource } from '../types/color.types';
import { channelsFromSource, channelsToHex, createChannels } from '../color/channels';
import { RgbColor } from '../color/RgbColor';
import { Unit } from '../units/Unit';
import { PreferenceMovedError, PreferenceTypeMismatchError } from '../errors/PreferenceContractError';
import { PreferenceBuilder } from './PreferenceBuilder';

const logger: Logger = createChildLogger({ service: 'Preference' });

const MOVED_OUT: PreferencePayload = Object.freeze({ type: PREFERENCE_TYPE.NONE });

function payloadFromDefault(value: PreferenceDefault): PreferencePayload {
  if (typeof value === 'boolean') {
    return { type: PREFERENCE_TYPE.BOOLEAN, value };
  }
  if (typeof value === 'string') {
    return { type: PREFERENCE_TYPE.STRING, value };
  }
  if (typeof value === 'number') {
    return { type: PREFERENCE_TYPE.REAL, value };
  }
  return { type: PREFERENCE_TYPE.COLOR, value: channelsFromSource(value) };
}

export class Preference {
  private identifier: string;
  private label: string;
  private description: string;
  private payload: PreferencePayload;
  private visible: boolean = PREFERENCE_DEFAULT_VISIBILITY;
  private unit: Unit = new Unit();

  constructor(identifier: string, label: string, description: string, defaultValue: PreferenceDefault) {
    this.identifier = identifier;
    this.label = label;
    this.description = description;
    this.payload = payloadFromDefault(defaultValue);
  }

  /**
   * Construct a preference and start a builder chain for its metadata
   *
   * @example
   * ```typescript
   * const pref = Preference
   *   .create('timebase.offset', 'Offset', 'Trigger offset', 0.0)
   *   .withUnit('femtoseconds')
   *   .build();
   * ```
   */
  static create(
    identifier: string,
    label: string,
    description: string,
    defaultValue: PreferenceDefault
  ): PreferenceBuilder {
    return new PreferenceBuilder(new Preference(identifier, label, description, defaultValue));
  }

  /**
   * Move construction: a new preference takes over the source's metadata
   * and payload, the source is left as `none`.
   */
  static take(source: Preference): Preference {
    // placeholder boolean payload, overwritten by moveFrom
    const target = new Preference(source.identifier, source.label, source.description, false);
    target.moveFrom(source);
    return target;
  }

  /**
   * Move assignment: releases this preference's payload, then takes over
   * the source's metadata and payload. The source is left as `none`.
   */
  assign(source: Preference): this {
    if (source === this) {
      return this;
    }
    this.release();
    this.moveFrom(source);
    return this;
  }

  /**
   * Release the active payload. Safe on a moved-from preference.
   */
  dispose(): void {
    this.release();
  }

  // ============================================
  // METADATA
  // ============================================

  getIdentifier(): string {
    return this.identifier;
  }

  getLabel(): string {
    return this.label;
  }

  getDescription(): string {
    return this.description;
  }

  getType(): PreferenceType {
    return this.payload.type;
  }

  getIsVisible(): boolean {
    return this.visible;
  }

  setIsVisible(visible: boolean): void {
    this.visible = visible;
  }

  /** True when a unit other than the default `counts` is attached */
  hasUnit(): boolean {
    return !this.unit.isDefault();
  }

  getUnit(): Unit {
    return this.unit;
  }

  setUnit(unit: Unit): void {
    this.unit = unit;
  }

  // ============================================
  // TYPED ACCESSORS
  // ============================================

  getBool(): boolean {
    return this.expect(PREFERENCE_TYPE.BOOLEAN, 'getBool').value;
  }

  getReal(): number {
    return this.expect(PREFERENCE_TYPE.REAL, 'getReal').value;
  }

  getString(): string {
    return this.expect(PREFERENCE_TYPE.STRING, 'getString').value;
  }

  /** A new RgbColor rebuilt from the stored channels */
  getColor(): RgbColor {
    return RgbColor.fromChannels(this.expect(PREFERENCE_TYPE.COLOR, 'getColor').value);
  }

  getColorRaw(): ColorChannels {
    return this.expect(PREFERENCE_TYPE.COLOR, 'getColorRaw').value;
  }

  /**
   * Textual rendering of the value, whatever its kind.
   * Reals use the shortest form that parses back to the same number;
   * colors render as `#rrrrggggbbbb`.
   */
  toString(): string {
    const payload = this.payload;
    switch (payload.type) {
      case PREFERENCE_TYPE.BOOLEAN:
        return payload.value ? 'true' : 'false';
      case PREFERENCE_TYPE.STRING:
        return payload.value;
      case PREFERENCE_TYPE.REAL:
        // String(-0) is "0"
        return Object.is(payload.value, -0) ? '-0' : String(payload.value);
      case PREFERENCE_TYPE.COLOR:
        return channelsToHex(payload.value);
      case PREFERENCE_TYPE.NONE:
        throw this.violation(new PreferenceMovedError(this.identifier, 'toString'));
    }
  }

  // ============================================
  // TYPED MUTATORS
  // ============================================

  setBool(value: boolean): void {
    this.expect(PREFERENCE_TYPE.BOOLEAN, 'setBool');
    this.payload = { type: PREFERENCE_TYPE.BOOLEAN, value };
  }

  setReal(value: number): void {
    this.expect(PREFERENCE_TYPE.REAL, 'setReal');
    this.payload = { type: PREFERENCE_TYPE.REAL, value };
  }

  setString(value: string): void {
    this.expect(PREFERENCE_TYPE.STRING, 'setString');
    this.payload = { type: PREFERENCE_TYPE.STRING, value };
  }

  setColor(value: ColorSource): void {
    this.expect(PREFERENCE_TYPE.COLOR, 'setColor');
    this.payload = { type: PREFERENCE_TYPE.COLOR, value: channelsFromSource(value) };
  }

  setColorRaw(value: ColorChannels): void {
    this.expect(PREFERENCE_TYPE.COLOR, 'setColorRaw');
    this.payload = {
      type: PREFERENCE_TYPE.COLOR,
      value: createChannels(value.red, value.green, value.blue),
    };
  }

  // ============================================
  // INTERNALS
  // ============================================

  private expect<K extends StoredPreferenceType>(type: K, operation: string): PayloadOf<K> {
    const payload = this.payload;
    if (isPayloadOf(payload, type)) {
      return payload;
    }
    if (payload.type === PREFERENCE_TYPE.NONE) {
      throw this.violation(new PreferenceMovedError(this.identifier, operation));
    }
    throw this.violation(
      new PreferenceTypeMismatchError(this.identifier, operation, type, payload.type)
    );
  }

  private violation<E extends Error>(error: E): E {
    logger.error({ err: error, identifier: this.identifier }, 'Preference contract violation');
    return error;
  }

  private release(): void {
    if (this.payload.type === PREFERENCE_TYPE.NONE) {
      return;
    }
    logger.debug(
      { identifier: this.identifier, type: this.payload.type },
      'Released preference payload'
    );
    this.payload = MOVED_OUT;
  }

  private moveFrom(source: Preference): void {
    this.identifier = source.identifier;
    this.label = source.label;
    this.description = source.description;
    this.visible = source.visible;
    this.unit = source.unit;
    this.payload = source.payload;
    source.payload = MOVED_OUT;
  }
}
