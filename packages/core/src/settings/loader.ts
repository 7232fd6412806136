/**
 * @fileoverview Settings Loader
 *
 * Resolves settings in order of precedence (lowest first):
 * defaults, ~/.titlecast/settings.json, environment variables.
 * Command-line flags are applied on top by the CLI.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import type { ZodType, ZodTypeDef } from 'zod';
import type { SettingsLogger, TitlecastSettings, UserSettings } from './types.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import { logLevelTextSchema, switchTextSchema, timeoutTextSchema, userSettingsSchema } from './schema.js';

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.titlecast';
const SETTINGS_FILE = 'settings.json';

export const ENV_VARS = {
  settingsPath: 'TITLECAST_SETTINGS',
  sessionKey: 'TITLECAST_SESSION_KEY',
  baseUrl: 'TITLECAST_BASE_URL',
  clientPlatform: 'TITLECAST_CLIENT_PLATFORM',
  acceptLanguage: 'TITLECAST_ACCEPT_LANGUAGE',
  timeoutMs: 'TITLECAST_TIMEOUT_MS',
  logLevel: 'LOG_LEVEL',
  logPretty: 'TITLECAST_LOG_PRETTY',
} as const;

type Env = Record<string, string | undefined>;

// =============================================================================
// Paths
// =============================================================================

/**
 * Get the path to the settings file
 */
export function getSettingsPath(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), SETTINGS_DIR, SETTINGS_FILE);
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load and validate the user settings file.
 * @returns User settings, or null if the file is missing or invalid
 */
export async function loadUserSettings(
  filePath: string,
  logger?: SettingsLogger
): Promise<UserSettings | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    // A missing file just means defaults
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    logger?.warn('Failed to read settings file, using defaults', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger?.warn('Settings file is not valid JSON, using defaults', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const parsed = userSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    logger?.warn('Settings file failed validation, using defaults', {
      path: filePath,
      issues: parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
    return null;
  }

  return parsed.data;
}

/**
 * Merge user settings over a base. Each section is merged key by key.
 */
export function mergeSettings(base: TitlecastSettings, user: UserSettings): TitlecastSettings {
  return {
    api: { ...base.api, ...user.api },
    session: { ...base.session, ...user.session },
    logging: { ...base.logging, ...user.logging },
    cli: { ...base.cli, ...user.cli },
  };
}

/**
 * Parse one environment value. Blank counts as unset; a value that fails its
 * schema is reported and the fallback kept.
 */
function readEnv<T>(
  env: Env,
  name: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fallback: T,
  logger?: SettingsLogger
): T {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger?.warn('Invalid environment value, using fallback', {
      variable: name,
      value: raw,
      reason: parsed.error.issues[0]?.code,
      fallback,
    });
    return fallback;
  }
  return parsed.data;
}

/**
 * Apply environment variable overrides. Invalid values are reported and ignored.
 */
export function applyEnvOverrides(
  settings: TitlecastSettings,
  env: Env,
  logger?: SettingsLogger
): TitlecastSettings {
  const nonEmpty = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  return {
    api: {
      ...settings.api,
      baseUrl: nonEmpty(ENV_VARS.baseUrl) ?? settings.api.baseUrl,
      clientPlatform: nonEmpty(ENV_VARS.clientPlatform) ?? settings.api.clientPlatform,
      acceptLanguage: nonEmpty(ENV_VARS.acceptLanguage) ?? settings.api.acceptLanguage,
      timeoutMs: readEnv(env, ENV_VARS.timeoutMs, timeoutTextSchema, settings.api.timeoutMs, logger),
    },
    session: {
      sessionKey: nonEmpty(ENV_VARS.sessionKey) ?? settings.session.sessionKey,
    },
    logging: {
      level: readEnv(env, ENV_VARS.logLevel, logLevelTextSchema, settings.logging.level, logger),
      pretty: readEnv(env, ENV_VARS.logPretty, switchTextSchema, settings.logging.pretty, logger),
    },
    cli: { ...settings.cli },
  };
}

export interface LoadSettingsOptions {
  env?: Env;
  homeDir?: string;
  logger?: SettingsLogger;
}

/**
 * Resolve defaults, the settings file and the environment into one settings object
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<TitlecastSettings> {
  const env = options.env ?? process.env;
  const filePath = env[ENV_VARS.settingsPath]?.trim() || getSettingsPath(options.homeDir);

  const userSettings = await loadUserSettings(filePath, options.logger);
  const merged = userSettings ? mergeSettings(DEFAULT_SETTINGS, userSettings) : DEFAULT_SETTINGS;

  return applyEnvOverrides(merged, env, options.logger);
}
