export { FetchHttpClient } from './fetch-client.js';
export type { HttpClient, HttpMethod, HttpRequest, HttpResponse, FetchHttpClientConfig } from './types.js';
