/**
 * @fileoverview Argument parsing
 *
 * Wraps util.parseArgs in strict mode. Every malformed flag surfaces as a
 * SettingsError, which the entry point maps to exit code 2.
 */
import { parseArgs } from 'util';
import { z } from 'zod';
import {
  SettingsError,
  isPackagingMode,
  messageCountTextSchema,
  timeoutTextSchema,
  MIN_MESSAGES,
  MAX_MESSAGES,
  MIN_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
} from '@titlecast/core';
import type { CliConfig } from './types.js';

const urlSchema = z.string().url();

const OPTIONS = {
  'session-key': { type: 'string' },
  'base-url': { type: 'string' },
  mode: { type: 'string' },
  messages: { type: 'string' },
  prompt: { type: 'string' },
  directive: { type: 'string' },
  timeout: { type: 'string' },
  verbose: { type: 'boolean', short: 'v' },
  debug: { type: 'boolean', short: 'd' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean' },
} as const;

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: false, strict: true }).values;
  } catch (error) {
    throw new SettingsError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliConfig {
  const values = readFlags(argv);
  const config: CliConfig = {
    debug: values.debug ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
    version: values.version ?? false,
  };

  if (values['session-key'] !== undefined) {
    config.sessionKey = values['session-key'];
  }

  const baseUrl = values['base-url'];
  if (baseUrl !== undefined) {
    if (!urlSchema.safeParse(baseUrl).success) {
      throw new SettingsError(`Invalid --base-url: ${baseUrl}`, { flag: 'base-url' });
    }
    config.baseUrl = baseUrl;
  }

  const mode = values.mode;
  if (mode !== undefined) {
    if (!isPackagingMode(mode)) {
      throw new SettingsError(`Invalid --mode: ${mode} (expected direct or guided)`, { flag: 'mode' });
    }
    config.mode = mode;
  }

  const messages = values.messages;
  if (messages !== undefined) {
    const count = messageCountTextSchema.safeParse(messages);
    if (!count.success) {
      throw new SettingsError(
        `Invalid --messages: ${messages} (expected ${MIN_MESSAGES}-${MAX_MESSAGES})`,
        { flag: 'messages' }
      );
    }
    config.messageCount = count.data;
  }

  const timeout = values.timeout;
  if (timeout !== undefined) {
    const timeoutMs = timeoutTextSchema.safeParse(timeout);
    if (!timeoutMs.success) {
      throw new SettingsError(
        `Invalid --timeout: ${timeout} (expected ${MIN_TIMEOUT_MS}-${MAX_TIMEOUT_MS} ms)`,
        { flag: 'timeout' }
      );
    }
    config.timeoutMs = timeoutMs.data;
  }

  const prompt = values.prompt;
  if (prompt !== undefined) {
    if (prompt.trim().length === 0) {
      throw new SettingsError('--prompt must not be empty', { flag: 'prompt' });
    }
    config.prompt = prompt;
  }

  const directive = values.directive;
  if (directive !== undefined) {
    if (config.prompt === undefined) {
      throw new SettingsError('--directive requires --prompt', { flag: 'directive' });
    }
    if (directive.trim().length === 0) {
      throw new SettingsError('--directive must not be empty', { flag: 'directive' });
    }
    config.directive = directive;
  }

  // A message count only drives the interactive direct prompt.
  if (config.messageCount !== undefined) {
    if (config.prompt !== undefined) {
      throw new SettingsError('--messages cannot be combined with --prompt', { flag: 'messages' });
    }
    if (config.mode === 'guided') {
      throw new SettingsError('--messages cannot be combined with --mode guided', { flag: 'messages' });
    }
  }

  return config;
}

export function formatHelp(): string {
  return `
titlecast - single-shot inference through a chat title endpoint

USAGE:
  titlecast [options]

OPTIONS:
  --session-key <key>   sessionKey cookie (default: TITLECAST_SESSION_KEY)
  --base-url <url>      Chat front end base URL
  --mode <mode>         Packaging strategy: direct or guided (default: direct)
  --messages <n>        Message count for direct mode (${MIN_MESSAGES}-${MAX_MESSAGES}); skips the count prompt,
                        interactive direct mode only
  --prompt <text>       Run a single inference on <text> and exit
  --directive <text>    With --prompt, use the guided strategy with this directive
  --timeout <ms>        Per-request timeout in milliseconds (default: 60000)
  -v, --verbose         Enable verbose logging
  -d, --debug           Enable debug logging
  -h, --help            Show this help message
  --version             Show version number

ENVIRONMENT:
  TITLECAST_SESSION_KEY, TITLECAST_BASE_URL, TITLECAST_TIMEOUT_MS,
  TITLECAST_SETTINGS, LOG_LEVEL, TITLECAST_LOG_PRETTY

EXAMPLES:
  # Interactive session
  titlecast --session-key test-secret

  # One question, answer on stdout
  titlecast --prompt "Which planet is largest?"

  # Guided: analyze content under a directive
  titlecast --prompt "$(cat notes.txt)" --directive "List the three main risks"
`;
}
