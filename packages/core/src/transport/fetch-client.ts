/**
 * @fileoverview fetch-based HTTP transport
 *
 * Attaches the header set the chat front end expects on every request:
 * Origin, client platform, accept-language, user agent and the
 * sessionKey cookie.
 */

import { HttpStatusError, TransportError, toError } from '../errors/index.js';
import type { Logger } from '../logging/types.js';
import type { FetchHttpClientConfig, HttpClient, HttpRequest, HttpResponse } from './types.js';

const MAX_ERROR_BODY_LENGTH = 500;

export class FetchHttpClient implements HttpClient {
  private readonly baseUrl: string;
  private readonly config: FetchHttpClientConfig;
  private readonly logger: Logger;

  constructor(config: FetchHttpClientConfig, logger: Logger) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.config = config;
    this.logger = logger;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const url = this.buildUrl(request);
    const headers = this.buildHeaders(request);

    this.logger.debug('HTTP request', { method: request.method, path: request.path });

    let response: Response;
    try {
      response = await fetch(url, {
        method: request.method,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      const err = toError(error);
      const timedOut = err.name === 'TimeoutError' || err.name === 'AbortError';
      const transportError = new TransportError(
        timedOut
          ? `${request.method} ${request.path} timed out after ${this.config.timeoutMs}ms`
          : `${request.method} ${request.path} failed: ${err.message}`,
        { timedOut, method: request.method, path: request.path, cause: err }
      );
      this.logger.error('Request failed', transportError);
      throw transportError;
    }

    this.logger.debug('HTTP response', { method: request.method, path: request.path, status: response.status });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      const statusError = new HttpStatusError({
        status: response.status,
        method: request.method,
        path: request.path,
        body: body.slice(0, MAX_ERROR_BODY_LENGTH),
      });
      this.logger.error('Request failed', { status: response.status, path: request.path, body: statusError.body });
      throw statusError;
    }

    return response;
  }

  private buildUrl(request: HttpRequest): string {
    const query = request.query ? `?${new URLSearchParams(request.query).toString()}` : '';
    return `${this.baseUrl}${request.path}${query}`;
  }

  private buildHeaders(request: HttpRequest): Record<string, string> {
    const headers: Record<string, string> = {
      Origin: this.baseUrl,
      'anthropic-client-platform': this.config.clientPlatform,
      'accept-language': this.config.acceptLanguage,
      'User-Agent': this.config.userAgent,
    };
    if (request.sessionKey) {
      headers.Cookie = `sessionKey=${request.sessionKey}`;
    }
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    return headers;
  }
}
