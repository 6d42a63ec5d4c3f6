/**
 * BlockTales Manual options
 * Option definitions and lifecycle hooks for the Manual framework,
 * plus the in-process host pipeline that drives them (no IO)
 */

// Hooks
export {
  beforeOptionsDefined,
  afterOptionsDefined,
  beforeOptionGroupsCreated,
  afterOptionGroupsCreated,
  optionHooks,
} from './hooks';

// Options
export { createOptionCatalog } from './options/catalog';
export { register, hasKey } from './options/registry';
export { hide, HIDDEN_OPTION_KEYS } from './options/visibility';
export { OptionLookupError, OptionValueError } from './options/errors';

// Host pipeline
export { defineOptions, GAME_OPTIONS_GROUP, CONTRIBUTED_OPTIONS_GROUP } from './host/defineOptions';
export type { DefinedOptions } from './host/defineOptions';
export { createManualOptions, manualGameName, toOptionLabel } from './host/manualOptions';
export type { ManualGameData } from './host/manualOptions';
export { resolveOptionValue, resolvePlayerOptions, defaultValue } from './host/resolve';
export type {
  SettingValue,
  WeightedSetting,
  RawSetting,
  PlayerSettings,
  ResolvedOptions,
} from './host/resolve';
export { getOptionValue, isOptionEnabled } from './host/helpers';
export { buildSettingsTemplate } from './host/template';
export type { SettingsTemplate } from './host/template';

// RNG
export { RNG } from './runtime/rng';
export type { IRNG } from './runtime/rng';

// Types
export type * from './options/types';
