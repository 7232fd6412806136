/**
 * @fileoverview Inference via the title endpoint
 *
 * Each run gets its own throwaway conversation: create it, ask for a title
 * of the packaged content exactly once, delete it. The title is the answer.
 *
 * Usage:
 * ```typescript
 * const runner = new InferenceRunner({ api, session, logger });
 * const result = await runner.run(buildGuidedContent({ coreContent, directive }));
 * if (result.status === 'success') console.log(result.title);
 * ```
 */

import { TitleRequestError, toError } from '../errors/index.js';
import type { Logger } from '../logging/types.js';
import type { ConversationApi } from '../api/title-api.js';
import type { Session } from '../session/types.js';
import { withEphemeralConversation } from './ephemeral.js';
import type { IdGenerator, InferenceResult } from './types.js';

export interface InferenceRunnerOptions {
  api: ConversationApi;
  session: Session;
  logger: Logger;
  /** Conversation id source; defaults to crypto.randomUUID */
  generateId?: IdGenerator;
}

type TitleOutcome = { title: string } | { title: null; error?: TitleRequestError };

/**
 * Runs inference cycles against one session. Holds no per-cycle state, so
 * concurrent runs touch disjoint conversations.
 */
export class InferenceRunner {
  private readonly api: ConversationApi;
  private readonly session: Session;
  private readonly logger: Logger;
  private readonly generateId?: IdGenerator;

  constructor(options: InferenceRunnerOptions) {
    this.api = options.api;
    this.session = options.session;
    this.logger = options.logger;
    this.generateId = options.generateId;
  }

  async run(content: string): Promise<InferenceResult> {
    const scope = await withEphemeralConversation(
      this.api,
      this.session,
      (conversationId) => this.requestTitle(conversationId, content),
      { logger: this.logger, generateId: this.generateId }
    );

    if (!scope.acquired) {
      return {
        status: 'error',
        kind: 'conversation_create',
        conversationId: scope.conversationId,
        error: scope.error,
      };
    }

    const outcome = scope.value;
    if (outcome.title !== null) {
      return { status: 'success', conversationId: scope.conversationId, title: outcome.title };
    }
    return { status: 'absent', conversationId: scope.conversationId, error: outcome.error };
  }

  /**
   * The single title call for a conversation. Failures become an absent title.
   */
  private async requestTitle(conversationId: string, content: string): Promise<TitleOutcome> {
    const logger = this.logger.child({ conversationId });
    try {
      const title = await logger.timed('Title request', () =>
        this.api.requestTitle(this.session, conversationId, content)
      );
      if (!title) {
        logger.warn('Title response carried no title');
        return { title: null };
      }
      return { title };
    } catch (error) {
      const titleError = new TitleRequestError(conversationId, toError(error));
      logger.error('Title request failed', { code: titleError.code, cause: toError(error).message });
      return { title: null, error: titleError };
    }
  }
}

/**
 * Function form of a single inference cycle
 */
export function runInference(
  session: Session,
  content: string,
  deps: Omit<InferenceRunnerOptions, 'session'>
): Promise<InferenceResult> {
  return new InferenceRunner({ ...deps, session }).run(content);
}

/**
 * Collapse a result to the present/absent title contract
 */
export function titleOf(result: InferenceResult): string | null {
  return result.status === 'success' ? result.title : null;
}
