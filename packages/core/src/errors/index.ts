/**
 * @fileoverview Error hierarchy for titlecast
 *
 * Every failure the core can produce is a TitlecastError subclass carrying a
 * machine-readable code, a category used for classification, and structured
 * context for logging. Bootstrap errors are fatal to the process; conversation
 * errors are scoped to one inference cycle.
 */

// =============================================================================
// Error Types
// =============================================================================

export type ErrorCategory =
  | 'configuration'
  | 'authentication'
  | 'authorization'
  | 'network'
  | 'server'
  | 'invalid_request'
  | 'invalid_response'
  | 'unknown';

/**
 * Error severity levels
 */
export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'transient';

export const ErrorCodes = {
  // Bootstrap
  CREDENTIAL_MISSING: 'CREDENTIAL_MISSING',
  AUTH_FAILURE: 'AUTH_FAILURE',
  CONNECTION_FAILURE: 'CONNECTION_FAILURE',
  EMPTY_ORGANIZATION_LIST: 'EMPTY_ORGANIZATION_LIST',

  // Conversation lifecycle
  CONVERSATION_CREATE_FAILED: 'CONVERSATION_CREATE_FAILED',
  TITLE_REQUEST_FAILED: 'TITLE_REQUEST_FAILED',
  CONVERSATION_DELETE_FAILED: 'CONVERSATION_DELETE_FAILED',

  // Transport
  NETWORK: 'NETWORK',
  TIMEOUT: 'TIMEOUT',
  INVALID_RESPONSE: 'INVALID_RESPONSE',

  // Local
  INVALID_MESSAGE_COUNT: 'INVALID_MESSAGE_COUNT',
  INVALID_SETTING: 'INVALID_SETTING',
} as const;

interface TitlecastErrorOptions {
  code: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  suggestion?: string;
  cause?: Error;
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class with structured context for debugging and logging.
 */
export class TitlecastError extends Error {
  /** Machine-readable error code (e.g., 'AUTH_FAILURE') */
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: Date;
  readonly context: Record<string, unknown>;
  /** Hint shown to the user alongside the message */
  readonly suggestion?: string;

  constructor(message: string, options: TitlecastErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'TitlecastError';
    this.code = options.code;
    this.category = options.category ?? 'unknown';
    this.severity = options.severity ?? 'error';
    this.timestamp = new Date();
    this.context = options.context ?? {};
    this.suggestion = options.suggestion;
  }

  /**
   * Convert to structured log format
   */
  toStructuredLog(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        category: this.category,
        severity: this.severity,
        stack: this.stack,
        cause: this.cause instanceof Error ? {
          name: this.cause.name,
          message: this.cause.message,
        } : undefined,
      },
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

// =============================================================================
// Transport Errors
// =============================================================================

/**
 * Non-2xx HTTP response from the remote
 */
export class HttpStatusError extends TitlecastError {
  readonly status: number;
  readonly method: string;
  readonly path: string;
  /** Response body, truncated */
  readonly body: string;

  constructor(options: { status: number; method: string; path: string; body: string }) {
    let category: ErrorCategory = 'unknown';
    if (options.status === 401) category = 'authentication';
    else if (options.status === 403) category = 'authorization';
    else if (options.status >= 500) category = 'server';
    else if (options.status >= 400) category = 'invalid_request';

    super(`${options.method} ${options.path} failed with status ${options.status}`, {
      code: `HTTP_${options.status}`,
      category,
      severity: options.status >= 500 ? 'transient' : 'error',
      context: { status: options.status, method: options.method, path: options.path },
    });
    this.name = 'HttpStatusError';
    this.status = options.status;
    this.method = options.method;
    this.path = options.path;
    this.body = options.body;
  }

  /** 401 and 403 both mean the session credential was refused */
  get isAuthRejection(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

/**
 * The request never produced a response (DNS, refused connection, timeout)
 */
export class TransportError extends TitlecastError {
  constructor(
    message: string,
    options: { timedOut: boolean; method: string; path: string; cause?: Error }
  ) {
    super(message, {
      code: options.timedOut ? ErrorCodes.TIMEOUT : ErrorCodes.NETWORK,
      category: 'network',
      severity: 'transient',
      context: { method: options.method, path: options.path },
      suggestion: 'Check your internet connection and the configured base URL',
      cause: options.cause,
    });
    this.name = 'TransportError';
  }
}

/**
 * A 2xx response whose body did not have the expected shape
 */
export class ResponseFormatError extends TitlecastError {
  constructor(message: string, options: { path: string; issues?: string[]; cause?: Error }) {
    super(message, {
      code: ErrorCodes.INVALID_RESPONSE,
      category: 'invalid_response',
      context: { path: options.path, issues: options.issues },
      cause: options.cause,
    });
    this.name = 'ResponseFormatError';
  }
}

// =============================================================================
// Bootstrap Errors
// =============================================================================

export class CredentialMissingError extends TitlecastError {
  constructor() {
    super('No session key configured', {
      code: ErrorCodes.CREDENTIAL_MISSING,
      category: 'configuration',
      severity: 'fatal',
      suggestion: 'Pass --session-key or set TITLECAST_SESSION_KEY',
    });
    this.name = 'CredentialMissingError';
  }
}

export class AuthFailureError extends TitlecastError {
  readonly status: number;

  constructor(status: number, cause?: Error) {
    super(`Session key was rejected (status ${status})`, {
      code: ErrorCodes.AUTH_FAILURE,
      category: status === 403 ? 'authorization' : 'authentication',
      severity: 'fatal',
      context: { status },
      suggestion: 'Copy a fresh sessionKey cookie from the browser',
      cause,
    });
    this.name = 'AuthFailureError';
    this.status = status;
  }
}

export class ConnectionFailureError extends TitlecastError {
  constructor(message: string, options: { stage: 'validate' | 'organizations'; code?: string; cause?: Error }) {
    super(message, {
      code: options.code ?? ErrorCodes.CONNECTION_FAILURE,
      category: 'network',
      severity: 'fatal',
      context: { stage: options.stage },
      suggestion: 'Check your internet connection and the configured base URL',
      cause: options.cause,
    });
    this.name = 'ConnectionFailureError';
  }
}

export class EmptyOrganizationListError extends TitlecastError {
  constructor() {
    super('The account has no organizations', {
      code: ErrorCodes.EMPTY_ORGANIZATION_LIST,
      category: 'invalid_response',
      severity: 'fatal',
    });
    this.name = 'EmptyOrganizationListError';
  }
}

export type BootstrapError =
  | CredentialMissingError
  | AuthFailureError
  | ConnectionFailureError
  | EmptyOrganizationListError;

// =============================================================================
// Conversation Errors
// =============================================================================

/**
 * Base for failures tied to one ephemeral conversation
 */
export class ConversationError extends TitlecastError {
  readonly conversationId: string;
  readonly operation: 'create' | 'title' | 'delete';

  constructor(
    message: string,
    options: {
      conversationId: string;
      operation: ConversationError['operation'];
      code: string;
      severity?: ErrorSeverity;
      cause?: Error;
    }
  ) {
    super(message, {
      code: options.code,
      category: options.cause instanceof TitlecastError ? options.cause.category : 'unknown',
      severity: options.severity ?? 'error',
      context: { conversationId: options.conversationId, operation: options.operation },
      cause: options.cause,
    });
    this.name = 'ConversationError';
    this.conversationId = options.conversationId;
    this.operation = options.operation;
  }
}

export class ConversationCreateError extends ConversationError {
  constructor(conversationId: string, cause?: Error) {
    super('Could not create a temporary conversation', {
      conversationId,
      operation: 'create',
      code: ErrorCodes.CONVERSATION_CREATE_FAILED,
      cause,
    });
    this.name = 'ConversationCreateError';
  }
}

export class TitleRequestError extends ConversationError {
  constructor(conversationId: string, cause?: Error) {
    super('Title request failed', {
      conversationId,
      operation: 'title',
      code: ErrorCodes.TITLE_REQUEST_FAILED,
      cause,
    });
    this.name = 'TitleRequestError';
  }
}

export class ConversationDeleteError extends ConversationError {
  constructor(conversationId: string, cause?: Error) {
    super(`Could not delete conversation ${conversationId}`, {
      conversationId,
      operation: 'delete',
      code: ErrorCodes.CONVERSATION_DELETE_FAILED,
      severity: 'warning',
      cause,
    });
    this.name = 'ConversationDeleteError';
  }
}

// =============================================================================
// Local Errors
// =============================================================================

export class ContentPackagingError extends TitlecastError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, {
      code: ErrorCodes.INVALID_MESSAGE_COUNT,
      category: 'invalid_request',
      context,
    });
    this.name = 'ContentPackagingError';
  }
}

export class SettingsError extends TitlecastError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, {
      code: ErrorCodes.INVALID_SETTING,
      category: 'configuration',
      severity: 'fatal',
      context,
    });
    this.name = 'SettingsError';
  }
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Format an error for terminal display
 */
export function formatError(error: unknown): string {
  if (error instanceof TitlecastError) {
    return error.suggestion ? `${error.message}. ${error.suggestion}` : error.message;
  }
  return describeError(error);
}

/**
 * Extract a string representation from any error value
 */
export function describeError(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Normalize a caught value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}
