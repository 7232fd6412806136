/**
 * @fileoverview Ephemeral conversation types
 */

import type { ConversationCreateError, TitleRequestError } from '../errors/index.js';

/**
 * Outcome of acquiring a conversation and running one step inside it.
 * Release has already been attempted whenever `acquired` is true.
 */
export type EphemeralScopeResult<T> =
  | { acquired: true; conversationId: string; value: T }
  | { acquired: false; conversationId: string; error: ConversationCreateError };

/**
 * Outcome of one inference cycle
 */
export type InferenceResult =
  | { status: 'success'; conversationId: string; title: string }
  | { status: 'absent'; conversationId: string; error?: TitleRequestError }
  | { status: 'error'; kind: 'conversation_create'; conversationId: string; error: ConversationCreateError };

export type IdGenerator = () => string;
