/**
 * @fileoverview Default settings
 */

import type { TitlecastSettings } from './types.js';

export const DEFAULT_TIMEOUT_MS = 60_000;

export const DEFAULT_SETTINGS: TitlecastSettings = {
  api: {
    baseUrl: 'https://demo.fuclaude.com',
    clientPlatform: 'web_claude_ai',
    acceptLanguage: 'en-US,en;q=0.9',
    userAgent: 'Mozilla/5.0',
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  session: {
    sessionKey: '',
  },
  logging: {
    level: 'info',
    pretty: true,
  },
  cli: {
    mode: 'direct',
    defaultMessageCount: 2,
  },
};
