/**
 * @fileoverview CLI Types
 */
import type { PackagingMode } from '@titlecast/core';

// =============================================================================
// CLI Configuration
// =============================================================================

/**
 * Command-line flags. Unset fields fall through to the environment,
 * the settings file and the defaults, in that order.
 */
export interface CliConfig {
  /** sessionKey cookie value */
  sessionKey?: string;
  /** Base URL of the chat web front end */
  baseUrl?: string;
  /** Packaging strategy for interactive turns */
  mode?: PackagingMode;
  /** Fixed message count (direct mode); skips the count prompt */
  messageCount?: number;
  /** One-shot content; runs a single inference and exits */
  prompt?: string;
  /** One-shot directive; selects the guided strategy */
  directive?: string;
  /** Per-request timeout */
  timeoutMs?: number;
  /** Debug logging */
  debug: boolean;
  /** Info logging */
  verbose: boolean;
  help: boolean;
  version: boolean;
}

/**
 * Where user-facing text goes. process.stdout satisfies it.
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type ExitCode = typeof EXIT_OK | typeof EXIT_FAILURE | typeof EXIT_USAGE;
