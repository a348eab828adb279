/**
 * @fileoverview Run configuration for a deployment session.
 *
 * The configuration arrives as the host's startup settings, a map from
 * setting name to `{ value }`. It is read once, validated, and frozen; the
 * rest of the code only ever sees {@link RunConfig}.
 *
 * @module config/RunConfig
 */

/** Value types a startup setting can carry */
export type SettingValue = string | number | boolean;

export type StartupSettings = Readonly<Record<string, { value: SettingValue } | undefined>>;

export interface RunConfig {
  /** Encoded blueprint payload, opaque to the deployer */
  readonly blueprintString: string;
  /** Logistic robots per roboport; 0 = none */
  readonly botCount: number;
  /** Ticks after deployment before the save; 0 = never save */
  readonly saveAfterTicks: number;
  readonly saveGameName: string;
}

export const SETTING_PREFIX = "blueprint-deployer";

export const SETTING_NAMES = {
  BLUEPRINT_STRING: `${SETTING_PREFIX}-blueprint-string`,
  BOT_COUNT: `${SETTING_PREFIX}-bot-count`,
  SAVE_AFTER_TICKS: `${SETTING_PREFIX}-save-after-ticks`,
  SAVE_GAME_NAME: `${SETTING_PREFIX}-save-game-name`,
} as const;

export const DEFAULT_SAVE_GAME_NAME = "blueprint-deployment";

export class ConfigError extends Error {
  constructor(readonly setting: string, message: string) {
    super(`${setting}: ${message}`);
    this.name = "ConfigError";
  }
}

function readString(settings: StartupSettings, name: string, fallback?: string): string {
  const entry = settings[name];
  if (entry === undefined) {
    if (fallback === undefined) {
      throw new ConfigError(name, "setting is required");
    }
    return fallback;
  }
  if (typeof entry.value !== "string") {
    throw new ConfigError(name, `expected a string, got ${typeof entry.value}`);
  }
  if (entry.value.trim().length === 0) {
    throw new ConfigError(name, "must not be empty");
  }
  return entry.value;
}

function readCount(settings: StartupSettings, name: string): number {
  const entry = settings[name];
  if (entry === undefined) {
    return 0;
  }
  const value = entry.value;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(name, `expected a non-negative integer, got ${String(value)}`);
  }
  return value;
}

/**
 * Builds the run configuration from startup settings.
 *
 * @throws ConfigError when a setting is missing or has the wrong shape
 */
export function loadRunConfig(settings: StartupSettings): RunConfig {
  const config: RunConfig = {
    blueprintString: readString(settings, SETTING_NAMES.BLUEPRINT_STRING).trim(),
    botCount: readCount(settings, SETTING_NAMES.BOT_COUNT),
    saveAfterTicks: readCount(settings, SETTING_NAMES.SAVE_AFTER_TICKS),
    saveGameName: readString(settings, SETTING_NAMES.SAVE_GAME_NAME, DEFAULT_SAVE_GAME_NAME),
  };

  console.log(
    `[Config] bots=${config.botCount} saveAfterTicks=${config.saveAfterTicks} ` +
      `saveGameName=${config.saveGameName} payload=${config.blueprintString.length} chars`
  );

  return Object.freeze(config);
}
