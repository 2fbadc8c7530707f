import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type {
  HttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './types.js';

/** Default request timeout: 10 seconds */
const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Extracts headers from a fetch Response into a plain object.
 */
const extractHeaders = (headers: Headers): Record<string, string> => {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
};

/**
 * Reads the body of a failed response.
 * Best effort: the status code already describes the failure.
 */
const readErrorBody = async (response: Response): Promise<unknown> => {
  let raw: string;
  try {
    raw = await response.text();
  } catch {
    return undefined;
  }

  if (raw.length === 0) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
};

/**
 * Creates an HTTP client using the native fetch API.
 *
 * @param options - Optional client configuration
 * @returns An HttpClient instance
 *
 * @example
 * ```typescript
 * const client = createFetchClient({
 *   timeoutMs: 5000,
 *   baseHeaders: { 'User-Agent': 'my-app/1.0.0' },
 * });
 * const result = await client.json({
 *   url: 'https://login.eveonline.com/.well-known/oauth-authorization-server',
 *   method: 'GET',
 * });
 *
 * if (result.isOk()) {
 *   console.log(result.value.body);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export const createFetchClient = (options: HttpClientOptions = {}): HttpClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {} } = options;

  /**
   * Failures before a complete body arrives: the abort timer or the transport.
   */
  const toTransportError = (error: unknown): HttpError => {
    if (error instanceof Error && error.name === 'AbortError') {
      return {
        type: 'timeout',
        message: `Request timed out after ${String(timeoutMs)}ms`,
        cause: error,
      };
    }

    return {
      type: 'network',
      message: error instanceof Error ? error.message : 'Network error',
      cause: error,
    };
  };

  /**
   * Executes a fetch request and reads the whole body as text. The timeout
   * covers the body as well as the headers.
   */
  const executeFetch = async (request: HttpRequest): Promise<Result<HttpResponse<string>, HttpError>> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    try {
      const fetchOptions: RequestInit = {
        method: request.method,
        headers: {
          ...baseHeaders,
          ...request.headers,
        },
        signal: controller.signal,
      };

      // Only set body if provided (exactOptionalPropertyTypes compliance)
      if (request.body !== undefined) {
        fetchOptions.body = request.body;
      }

      const response = await fetch(request.url, fetchOptions);

      if (!response.ok) {
        const body = await readErrorBody(response);
        return err({
          type: 'http',
          message: `HTTP ${String(response.status)}: ${response.statusText}`,
          status: response.status,
          body,
        });
      }

      const body = await response.text();
      return ok({
        status: response.status,
        statusText: response.statusText,
        headers: extractHeaders(response.headers),
        body,
      });
    } catch (error) {
      return err(toTransportError(error));
    } finally {
      clearTimeout(timeoutId);
    }
  };

  const json = async (request: HttpRequest): Promise<Result<HttpResponse<unknown>, HttpError>> => {
    const fetchResult = await executeFetch({
      ...request,
      headers: {
        Accept: 'application/json',
        ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...request.headers,
      },
    });

    if (fetchResult.isErr()) {
      return err(fetchResult.error);
    }

    const response = fetchResult.value;

    try {
      const body: unknown = JSON.parse(response.body);
      return ok({ ...response, body });
    } catch (error) {
      return err({
        type: 'parse',
        message: 'Failed to parse JSON response',
        status: response.status,
        cause: error,
      });
    }
  };

  const text = (request: HttpRequest): Promise<Result<HttpResponse<string>, HttpError>> =>
    executeFetch(request);

  return {
    json,
    text,
  };
};
