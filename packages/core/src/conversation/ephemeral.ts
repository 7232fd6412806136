/**
 * @fileoverview Scoped ephemeral conversation
 *
 * acquire → use → release, where release runs in a finally block whenever
 * acquire succeeded, and never when it failed. Release failures are logged
 * and swallowed so they cannot mask the result of the use step.
 */

import { randomUUID } from 'crypto';
import { ConversationCreateError, ConversationDeleteError, toError } from '../errors/index.js';
import type { Logger } from '../logging/types.js';
import type { ConversationApi } from '../api/title-api.js';
import type { Session } from '../session/types.js';
import type { EphemeralScopeResult, IdGenerator } from './types.js';

export interface EphemeralScopeOptions {
  logger: Logger;
  generateId?: IdGenerator;
}

/**
 * Create a fresh conversation, hand its id to `use`, then delete it.
 *
 * If `use` throws, the conversation is still deleted and the error is
 * rethrown after release.
 */
export async function withEphemeralConversation<T>(
  api: ConversationApi,
  session: Session,
  use: (conversationId: string) => Promise<T>,
  options: EphemeralScopeOptions
): Promise<EphemeralScopeResult<T>> {
  const conversationId = (options.generateId ?? randomUUID)();
  const logger = options.logger.child({ conversationId });

  try {
    await logger.timed('Create conversation', () => api.createConversation(session, conversationId));
  } catch (error) {
    const createError = new ConversationCreateError(conversationId, toError(error));
    logger.error('Could not create conversation', { code: createError.code, cause: toError(error).message });
    return { acquired: false, conversationId, error: createError };
  }

  logger.debug('Conversation created');
  try {
    const value = await use(conversationId);
    return { acquired: true, conversationId, value };
  } finally {
    await releaseConversation(api, session, conversationId, logger);
  }
}

/**
 * Delete a conversation exactly once. Never throws.
 */
async function releaseConversation(
  api: ConversationApi,
  session: Session,
  conversationId: string,
  logger: Logger
): Promise<void> {
  logger.info('Cleaning up conversation');
  try {
    await logger.timed('Delete conversation', () => api.deleteConversation(session, conversationId));
  } catch (error) {
    const deleteError = new ConversationDeleteError(conversationId, toError(error));
    logger.warn(deleteError.message, { code: deleteError.code, cause: toError(error).message });
  }
}
