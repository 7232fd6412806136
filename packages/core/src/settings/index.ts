/**
 * @fileoverview Settings Module
 *
 * @example
 * ```typescript
 * const settings = await loadSettings();
 * console.log(settings.api.baseUrl);
 * ```
 */

export type {
  TitlecastSettings,
  UserSettings,
  DeepPartial,
  ApiSettings,
  SessionSettings,
  LoggingSettings,
  CliSettings,
  SettingsLogger,
} from './types.js';

export { DEFAULT_SETTINGS, DEFAULT_TIMEOUT_MS } from './defaults.js';

export {
  ENV_VARS,
  getSettingsPath,
  loadUserSettings,
  mergeSettings,
  applyEnvOverrides,
  loadSettings,
  type LoadSettingsOptions,
} from './loader.js';

export {
  userSettingsSchema,
  timeoutTextSchema,
  messageCountTextSchema,
  switchTextSchema,
  logLevelTextSchema,
  MIN_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
} from './schema.js';
