/**
 * @fileoverview Configuration module exports.
 *
 * @module config
 */

export type { RunConfig, SettingValue, StartupSettings } from "./RunConfig";
export {
  SETTING_PREFIX,
  SETTING_NAMES,
  DEFAULT_SAVE_GAME_NAME,
  ConfigError,
  loadRunConfig,
} from "./RunConfig";
