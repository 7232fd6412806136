/**
 * @fileoverview Settings types
 */

import type { LogLevel } from '../logging/types.js';
import type { PackagingMode } from '../packaging/types.js';

export interface ApiSettings {
  /** Base URL of the chat web front end */
  baseUrl: string;
  /** Value of the anthropic-client-platform header */
  clientPlatform: string;
  acceptLanguage: string;
  userAgent: string;
  /** Per-request timeout */
  timeoutMs: number;
}

export interface SessionSettings {
  /** sessionKey cookie value; empty when unset */
  sessionKey: string;
}

export interface LoggingSettings {
  level: LogLevel;
  pretty: boolean;
}

export interface CliSettings {
  mode: PackagingMode;
  defaultMessageCount: number;
}

export interface TitlecastSettings {
  api: ApiSettings;
  session: SessionSettings;
  logging: LoggingSettings;
  cli: CliSettings;
}

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type UserSettings = DeepPartial<TitlecastSettings>;

/**
 * Receives warnings about settings that were ignored
 */
export interface SettingsLogger {
  warn: (message: string, context?: Record<string, unknown>) => void;
}
