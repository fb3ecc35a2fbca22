/**
 * PreferenceBuilder
 *
 * Holds a freshly constructed preference while optional metadata is
 * attached, then hands it out exactly once from build().
 *
 * @module preference/PreferenceBuilder
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger';
import type { UnitType } from '../types/unit.types';
import { Unit } from '../units/Unit';
import { PreferenceBuilderConsumedError } from '../errors/PreferenceContractError';
import type { Preference } from './Preference';

const logger: Logger = createChildLogger({ service: 'PreferenceBuilder' });

export class PreferenceBuilder {
  private preference: Preference | null;
  // kept for error messages once the preference has been handed out
  private readonly identifier: string;

  constructor(preference: Preference) {
    this.preference = preference;
    this.identifier = preference.getIdentifier();
  }

  isVisible(visible: boolean): this {
    this.current('isVisible').setIsVisible(visible);
    return this;
  }

  withUnit(type: UnitType): this {
    this.current('withUnit').setUnit(new Unit(type));
    return this;
  }

  /**
   * Hand out the configured preference. The builder is empty afterwards.
   */
  build(): Preference {
    const preference = this.current('build');
    this.preference = null;
    return preference;
  }

  private current(operation: string): Preference {
    if (!this.preference) {
      const error = new PreferenceBuilderConsumedError(this.identifier, operation);
      logger.error({ err: error, identifier: this.identifier }, 'Preference builder reused');
      throw error;
    }
    return this.preference;
  }
}
