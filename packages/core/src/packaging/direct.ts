/**
 * @fileoverview Direct packaging strategy
 *
 * Renders messages as numbered blocks:
 *
 * ```
 * Message 1:
 *
 * <text>
 *
 * Message 2:
 *
 * <text>
 * ```
 */

import { ContentPackagingError } from '../errors/index.js';

export const MIN_MESSAGES = 1;
export const MAX_MESSAGES = 50;
export const DEFAULT_MESSAGE_COUNT = 2;

/**
 * Stand-in assistant reply used for message 2 when exactly two messages are
 * requested. Primes the title to read as an answer.
 */
export const DIRECT_ACKNOWLEDGEMENT = 'Certainly. The answer to your request is:';

export function isValidMessageCount(count: number): boolean {
  return Number.isInteger(count) && count >= MIN_MESSAGES && count <= MAX_MESSAGES;
}

/**
 * Parse the user's answer to "how many messages".
 * Empty input selects the default; anything else must be an integer in range.
 */
export function parseMessageCount(raw: string, fallback: number = DEFAULT_MESSAGE_COUNT): number | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return fallback;
  }
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const count = Number(trimmed);
  return isValidMessageCount(count) ? count : null;
}

/**
 * Whether message `index` (1-based) of `count` is eligible for auto-fill
 */
export function canAutoFill(index: number, count: number): boolean {
  return count === 2 && index === 2;
}

/**
 * Build the direct-strategy content string.
 * @returns The packaged content, or "" when every message is blank
 */
export function buildDirectContent(messages: readonly string[]): string {
  if (!isValidMessageCount(messages.length)) {
    throw new ContentPackagingError(
      `Message count must be between ${MIN_MESSAGES} and ${MAX_MESSAGES}, got ${messages.length}`,
      { count: messages.length }
    );
  }

  if (messages.every((message) => message.trim().length === 0)) {
    return '';
  }

  return messages
    .map((message, i) => `Message ${i + 1}:\n\n${message}`)
    .join('\n\n');
}
