export { createFetchClient, DEFAULT_USER_AGENT } from './fetch-client.js';
export type { HttpClient, HttpClientOptions, HttpRequest, HttpResponse, HttpError } from './types.js';
