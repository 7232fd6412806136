/**
 * @fileoverview CLI application
 *
 * Resolves configuration, bootstraps the session once, then runs either the
 * interactive loop or a single one-shot inference. Returns the exit code
 * instead of exiting so tests can drive it end to end.
 */
import * as os from 'os';
import {
  DIRECT_ACKNOWLEDGEMENT,
  FetchHttpClient,
  InferenceRunner,
  SettingsError,
  TitleApiClient,
  bootstrapSession,
  buildDirectContent,
  buildGuidedContent,
  createRootLogger,
  formatError,
  loadSettings,
  titleOf,
  type ApiSettings,
  type HttpClient,
  type InferenceResult,
  type LogLevel,
  type Logger,
  type LoggerOptions,
  type SettingsLogger,
  type TitlecastSettings,
} from '@titlecast/core';
import { formatHelp, parseCliArgs } from './args.js';
import { ReadlinePrompter, type Prompter } from './input/prompter.js';
import { collectDirectContent, collectGuidedContent } from './input/content-builder.js';
import { runInteractiveLoop } from './loop.js';
import {
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_USAGE,
  type CliConfig,
  type ExitCode,
  type OutputStream,
} from './types.js';

export const VERSION = '0.1.0';

export interface CliDependencies {
  env: Record<string, string | undefined>;
  homeDir: string;
  stdout: OutputStream;
  stderr: OutputStream;
  createLogger: (options: LoggerOptions) => Logger;
  createHttpClient: (api: ApiSettings, logger: Logger) => HttpClient;
  createPrompter: () => Prompter;
  /** Conversation id source; defaults to crypto.randomUUID */
  generateId?: () => string;
  /** Where Ctrl+C arrives in one-shot mode; defaults to process */
  signals?: SignalSource;
}

export interface SignalSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

export function defaultDependencies(): CliDependencies {
  return {
    env: process.env,
    homeDir: os.homedir(),
    stdout: process.stdout,
    stderr: process.stderr,
    createLogger: (options) => createRootLogger(options),
    createHttpClient: (api, logger) => new FetchHttpClient(api, logger),
    createPrompter: () => new ReadlinePrompter(),
  };
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Command-line flags take precedence over everything loadSettings resolved
 */
export function applyCliOverrides(settings: TitlecastSettings, config: CliConfig): TitlecastSettings {
  return {
    api: {
      ...settings.api,
      baseUrl: config.baseUrl ?? settings.api.baseUrl,
      timeoutMs: config.timeoutMs ?? settings.api.timeoutMs,
    },
    session: {
      sessionKey: config.sessionKey ?? settings.session.sessionKey,
    },
    logging: { ...settings.logging },
    cli: {
      ...settings.cli,
      mode: config.mode ?? settings.cli.mode,
    },
  };
}

export function resolveLogLevel(config: CliConfig, settings: TitlecastSettings): LogLevel {
  if (config.debug) return 'debug';
  if (config.verbose) return 'info';
  return settings.logging.level;
}

/**
 * Holds settings warnings until the real logger exists
 */
class DeferredWarnings implements SettingsLogger {
  private readonly entries: Array<{ message: string; context?: Record<string, unknown> }> = [];

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ message, context });
  }

  flush(logger: Logger): void {
    for (const entry of this.entries) {
      logger.warn(entry.message, entry.context);
    }
    this.entries.length = 0;
  }
}

// =============================================================================
// Main
// =============================================================================

export async function runCli(
  argv: string[],
  deps: CliDependencies = defaultDependencies()
): Promise<ExitCode> {
  let config: CliConfig;
  try {
    config = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof SettingsError) {
      deps.stderr.write(`Error: ${error.message}\nRun "titlecast --help" for usage.\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (config.help) {
    deps.stdout.write(formatHelp());
    return EXIT_OK;
  }

  if (config.version) {
    deps.stdout.write(`titlecast v${VERSION}\n`);
    return EXIT_OK;
  }

  const warnings = new DeferredWarnings();
  const loaded = await loadSettings({ env: deps.env, homeDir: deps.homeDir, logger: warnings });
  const settings = applyCliOverrides(loaded, config);
  if (config.messageCount !== undefined && settings.cli.mode === 'guided') {
    deps.stderr.write('Error: --messages cannot be used when the mode is guided\nRun "titlecast --help" for usage.\n');
    return EXIT_USAGE;
  }

  const logger = deps.createLogger({
    level: resolveLogLevel(config, settings),
    pretty: settings.logging.pretty,
  });
  warnings.flush(logger.child({ component: 'settings' }));

  logger.debug('titlecast starting', {
    baseUrl: settings.api.baseUrl,
    mode: config.prompt !== undefined ? 'one-shot' : settings.cli.mode,
    timeoutMs: settings.api.timeoutMs,
  });

  const http = deps.createHttpClient(settings.api, logger.child({ component: 'transport' }));
  const api = new TitleApiClient(http);

  const bootstrap = await bootstrapSession(api, settings.session.sessionKey, {
    logger: logger.child({ component: 'bootstrap' }),
  });
  if (!bootstrap.ok) {
    deps.stderr.write(`Error: ${formatError(bootstrap.error)}\n`);
    return EXIT_FAILURE;
  }

  const runner = new InferenceRunner({
    api,
    session: bootstrap.session,
    logger: logger.child({ component: 'conversation' }),
    generateId: deps.generateId,
  });

  if (config.prompt !== undefined) {
    return runOneShot(config.prompt, config.directive, runner, deps);
  }

  const prompter = deps.createPrompter();
  const mode = settings.cli.mode;
  try {
    await runInteractiveLoop({
      prompter,
      runner,
      logger,
      gather: (p) =>
        mode === 'guided'
          ? collectGuidedContent(p)
          : collectDirectContent(p, {
              defaultCount: settings.cli.defaultMessageCount,
              fixedCount: config.messageCount,
            }),
    });
  } finally {
    prompter.close();
  }

  return EXIT_OK;
}

async function runOneShot(
  prompt: string,
  directive: string | undefined,
  runner: InferenceRunner,
  deps: CliDependencies
): Promise<ExitCode> {
  const content = directive !== undefined
    ? buildGuidedContent({ coreContent: prompt, directive })
    : buildDirectContent([prompt, DIRECT_ACKNOWLEDGEMENT]);

  // Ctrl+C is held until the conversation has been released.
  let interrupted = false;
  const onInterrupt = (): void => {
    interrupted = true;
  };
  const signals = deps.signals ?? process;
  signals.on('SIGINT', onInterrupt);

  let result: InferenceResult;
  try {
    result = await runner.run(content);
  } finally {
    signals.off('SIGINT', onInterrupt);
  }

  if (interrupted) {
    deps.stderr.write('Interrupted.\n');
    return EXIT_FAILURE;
  }

  const title = titleOf(result);
  if (title === null) {
    const reason = result.status === 'error' ? formatError(result.error) : 'No title returned';
    deps.stderr.write(`Error: ${reason}\n`);
    return EXIT_FAILURE;
  }

  deps.stdout.write(`${title}\n`);
  return EXIT_OK;
}
