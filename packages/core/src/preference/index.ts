/**
 * Preference Domain
 *
 * @module preference
 */

export { Preference } from './Preference';
export { PreferenceBuilder } from './PreferenceBuilder';
