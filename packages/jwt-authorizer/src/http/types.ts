import type { Result } from 'neverthrow';

/**
 * HTTP GET request configuration.
 */
export interface HttpRequest {
  readonly url: string;
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * HTTP response with typed body.
 */
export interface HttpResponse<T> {
  readonly status: number;
  readonly statusText: string;
  readonly body: T;
}

/**
 * HTTP error with status and message.
 */
export interface HttpError {
  readonly type: 'network' | 'timeout' | 'parse' | 'http';
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}

/**
 * Minimal HTTP capability used to download key sets.
 * Abstraction over fetch for dependency injection and testing.
 */
export interface HttpClient {
  /**
   * Performs a GET request and parses the JSON response body.
   * The body is returned untyped; callers validate its shape.
   */
  readonly getJson: (request: HttpRequest) => Promise<Result<HttpResponse<unknown>, HttpError>>;
}

/**
 * Options for creating an HTTP client.
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds, body included (default: 10000) */
  readonly timeoutMs?: number;
  /** Value of the User-Agent header (default: DEFAULT_USER_AGENT) */
  readonly userAgent?: string;
  /** Base headers to include in all requests */
  readonly baseHeaders?: Readonly<Record<string, string>>;
}
