export {
  PreferenceContractError,
  PreferenceTypeMismatchError,
  PreferenceMovedError,
  PreferenceBuilderConsumedError,
  isPreferenceContractError,
} from './PreferenceContractError';
export type { PreferenceErrorCode } from './PreferenceContractError';
