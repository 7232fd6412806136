/**
 * @fileoverview HTTP transport types
 */

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  /** Path relative to the base URL, starting with "/" */
  path: string;
  query?: Record<string, string>;
  /** JSON-serializable body */
  body?: unknown;
  /** Sent as the sessionKey cookie */
  sessionKey?: string;
}

export interface HttpResponse {
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

/**
 * Authenticated HTTP against one fixed base endpoint.
 *
 * Implementations throw HttpStatusError for non-2xx responses and
 * TransportError when no response arrives.
 */
export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}

export interface FetchHttpClientConfig {
  baseUrl: string;
  clientPlatform: string;
  acceptLanguage: string;
  userAgent: string;
  timeoutMs: number;
}
