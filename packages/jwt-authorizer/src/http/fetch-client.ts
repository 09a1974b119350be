import { ResultAsync, errAsync } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { HttpClient, HttpClientOptions, HttpRequest, HttpResponse, HttpError } from './types.js';

const DEFAULT_TIMEOUT_MS = 10_000;

/** User agent sent with every key set request unless overridden */
export const DEFAULT_USER_AGENT = 'jwt-authorizer';

const isAbort = (error: unknown): boolean => error instanceof Error && error.name === 'AbortError';

const toRequestError =
  (timeoutMs: number) =>
  (error: unknown): HttpError =>
    isAbort(error)
      ? { type: 'timeout', message: `Request timed out after ${String(timeoutMs)}ms`, cause: error }
      : {
          type: 'network',
          message: error instanceof Error ? error.message : 'Network error',
          cause: error,
        };

const readBody = (response: Response, timeoutMs: number): ResultAsync<unknown, HttpError> => {
  if (!response.ok) {
    const error: HttpError = {
      type: 'http',
      message: `HTTP ${String(response.status)}: ${response.statusText}`,
      status: response.status,
    };
    return errAsync(error);
  }

  return ResultAsync.fromPromise<unknown, HttpError>(
    response.json(),
    (error): HttpError =>
      isAbort(error)
        ? {
            type: 'timeout',
            message: `Request timed out after ${String(timeoutMs)}ms`,
            status: response.status,
            cause: error,
          }
        : {
            type: 'parse',
            message: 'Failed to parse JSON response',
            status: response.status,
            cause: error,
          }
  );
};

/**
 * Creates an HTTP client on top of the global `fetch`.
 *
 * The timeout covers the whole exchange, body included, so a key set endpoint
 * that stops mid-response still fails within `timeoutMs`.
 *
 * @example
 * ```typescript
 * const client = createFetchClient({ timeoutMs: 5000 });
 * const result = await client.getJson({ url: 'https://auth.example.com/.well-known/jwks.json' });
 * ```
 */
export const createFetchClient = (options: HttpClientOptions = {}): HttpClient => {
  const {
    timeoutMs = DEFAULT_TIMEOUT_MS,
    userAgent = DEFAULT_USER_AGENT,
    baseHeaders = {},
  } = options;

  const getJson = async (
    request: HttpRequest
  ): Promise<Result<HttpResponse<unknown>, HttpError>> => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    const headers = {
      'User-Agent': userAgent,
      Accept: 'application/json',
      ...baseHeaders,
      ...request.headers,
    };

    try {
      return await ResultAsync.fromPromise(
        fetch(request.url, { method: 'GET', headers, signal: controller.signal }),
        toRequestError(timeoutMs)
      ).andThen((response) =>
        readBody(response, timeoutMs).map(
          (body): HttpResponse<unknown> => ({
            status: response.status,
            statusText: response.statusText,
            body,
          })
        )
      );
    } finally {
      clearTimeout(timer);
    }
  };

  return { getJson };
};
