import type { Result } from 'neverthrow';

/**
 * HTTP request configuration.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: 'GET' | 'POST';
  readonly headers?: Readonly<Record<string, string>> | undefined;
  /** Request body, already encoded (JSON or `application/x-www-form-urlencoded`) */
  readonly body?: string | undefined;
}

/**
 * HTTP response with typed body.
 */
export interface HttpResponse<T> {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: T;
}

/**
 * HTTP error with status and message.
 */
export interface HttpError {
  /**
   * `network` and `timeout` cover failures before the whole body arrived,
   * `parse` a complete 2xx body that is not JSON, `http` a non-2xx status.
   */
  readonly type: 'network' | 'timeout' | 'parse' | 'http';
  readonly message: string;
  readonly status?: number | undefined;
  /**
   * Response body of a non-2xx response: parsed JSON when the body is JSON,
   * the raw text otherwise. OAuth endpoints put `error`/`error_description` here.
   */
  readonly body?: unknown;
  readonly cause?: unknown;
}

/**
 * HTTP client interface for making requests.
 * Abstraction over fetch for dependency injection and testing.
 */
export interface HttpClient {
  /**
   * Makes an HTTP request and parses the JSON response.
   * The body is left `unknown`; callers validate its shape.
   * @param request - The request configuration
   * @returns Result with parsed response or error
   */
  readonly json: (request: HttpRequest) => Promise<Result<HttpResponse<unknown>, HttpError>>;

  /**
   * Makes an HTTP request and returns raw text response.
   * @param request - The request configuration
   * @returns Result with text response or error
   */
  readonly text: (request: HttpRequest) => Promise<Result<HttpResponse<string>, HttpError>>;
}

/**
 * Options for creating an HTTP client.
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 10000) */
  readonly timeoutMs?: number | undefined;
  /** Base headers to include in all requests, such as `User-Agent` */
  readonly baseHeaders?: Readonly<Record<string, string>> | undefined;
}
