/**
 * @fileoverview Chat web API client
 *
 * Maps the five remote operations titlecast needs onto the HTTP transport:
 *
 * | Operation           | Method | Path                                                  |
 * |---------------------|--------|-------------------------------------------------------|
 * | Validate session    | GET    | /login_token?session_key=<key>                        |
 * | List organizations  | GET    | /api/organizations                                    |
 * | Create conversation | POST   | /api/organizations/{org}/chat_conversations           |
 * | Delete conversation | DELETE | /api/organizations/{org}/chat_conversations/{uuid}    |
 * | Generate title      | POST   | /api/organizations/{org}/chat_conversations/{uuid}/title |
 *
 * Errors from the transport propagate unchanged; callers classify them.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ResponseFormatError, toError } from '../errors/index.js';
import type { Organization, Session } from '../session/types.js';
import type { HttpClient, HttpResponse } from '../transport/types.js';
import { organizationListSchema, titleResponseSchema } from './schemas.js';

/**
 * Session-level reads used by bootstrap
 */
export interface SessionApi {
  validateSession(credential: string): Promise<void>;
  listOrganizations(credential: string): Promise<Organization[]>;
}

/**
 * Conversation operations used by the ephemeral lifecycle
 */
export interface ConversationApi {
  createConversation(session: Session, conversationId: string): Promise<void>;
  deleteConversation(session: Session, conversationId: string): Promise<void>;
  /** @returns The generated title, or null when the response carries none */
  requestTitle(session: Session, conversationId: string, messageContent: string): Promise<string | null>;
}

export class TitleApiClient implements SessionApi, ConversationApi {
  constructor(private readonly http: HttpClient) {}

  async validateSession(credential: string): Promise<void> {
    await this.http.request({
      method: 'GET',
      path: '/login_token',
      query: { session_key: credential },
      sessionKey: credential,
    });
  }

  async listOrganizations(credential: string): Promise<Organization[]> {
    const path = '/api/organizations';
    const response = await this.http.request({ method: 'GET', path, sessionKey: credential });
    return parseBody(response, path, organizationListSchema);
  }

  async createConversation(session: Session, conversationId: string): Promise<void> {
    await this.http.request({
      method: 'POST',
      path: conversationsPath(session),
      body: { uuid: conversationId, name: '' },
      sessionKey: session.credential,
    });
  }

  async deleteConversation(session: Session, conversationId: string): Promise<void> {
    await this.http.request({
      method: 'DELETE',
      path: `${conversationsPath(session)}/${encodeURIComponent(conversationId)}`,
      sessionKey: session.credential,
    });
  }

  async requestTitle(session: Session, conversationId: string, messageContent: string): Promise<string | null> {
    const path = `${conversationsPath(session)}/${encodeURIComponent(conversationId)}/title`;
    const response = await this.http.request({
      method: 'POST',
      path,
      body: { message_content: messageContent, recent_titles: [] },
      sessionKey: session.credential,
    });
    const body = await parseBody(response, path, titleResponseSchema);
    return body.title ?? null;
  }
}

function conversationsPath(session: Session): string {
  return `/api/organizations/${encodeURIComponent(session.organizationId)}/chat_conversations`;
}

async function parseBody<T>(
  response: HttpResponse,
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T> {
  let raw: unknown;
  try {
    raw = await response.json();
  } catch (error) {
    throw new ResponseFormatError(`Response from ${path} is not valid JSON`, { path, cause: toError(error) });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ResponseFormatError(`Unexpected response shape from ${path}`, {
      path,
      issues: parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return parsed.data;
}
