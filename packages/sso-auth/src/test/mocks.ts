/**
 * Mock factories for testing.
 * Provides configurable stand-ins for the package's injected collaborators.
 */

import { ok, err, type Result } from 'neverthrow';
import type { AuthError, Clock } from '../types.js';
import type { HttpClient, HttpError, HttpResponse, HttpRequest } from '../http/types.js';
import type { Cache } from '../cache/types.js';
import type {
  CodeExchangeParams,
  OAuthToken,
  RefreshParams,
  RevokeParams,
  TokenClient,
} from '../acquisition/types.js';
import type { TokenValidator, ValidatedClaims } from '../validation/types.js';

// ============================================================================
// HTTP Client Mocks
// ============================================================================

type HttpResult = Result<HttpResponse<unknown>, HttpError>;

/**
 * Answers a request made through the mock client.
 */
export type HttpHandler = (request: HttpRequest) => HttpResult | Promise<HttpResult>;

/**
 * A successful JSON response.
 */
export const jsonResponse = (body: unknown, status = 200): HttpResult =>
  ok({ status, statusText: 'OK', headers: {}, body });

/**
 * A non-2xx response as the fetch client reports it.
 */
export const httpErrorResponse = (status: number, body?: unknown): HttpResult =>
  err({ type: 'http', message: `HTTP ${String(status)}`, status, body });

/**
 * A transport failure (no response).
 */
export const networkFailure = (message = 'read ECONNRESET'): HttpResult =>
  err({ type: 'network', message });

/**
 * Creates a mock HTTP client that records every request.
 */
export const createMockHttpClient = (
  handler: HttpHandler
): HttpClient & { readonly requests: HttpRequest[] } => {
  const requests: HttpRequest[] = [];

  const respond = async (request: HttpRequest): Promise<HttpResult> => {
    requests.push(request);
    return handler(request);
  };

  return {
    requests,
    json: respond,
    text: async (request) => {
      const result = await respond(request);
      return result.map((response) => ({
        ...response,
        body: typeof response.body === 'string' ? response.body : JSON.stringify(response.body),
      }));
    },
  };
};

/**
 * Creates a mock HTTP client that returns a successful JSON response.
 */
export const createSuccessHttpClient = (
  body: unknown,
  status = 200
): HttpClient & { readonly requests: HttpRequest[] } =>
  createMockHttpClient(() => jsonResponse(body, status));

/**
 * Creates a mock HTTP client that returns a non-2xx response.
 */
export const createErrorHttpClient = (
  status: number,
  body?: unknown
): HttpClient & { readonly requests: HttpRequest[] } =>
  createMockHttpClient(() => httpErrorResponse(status, body));

/**
 * Decodes the form body of a recorded request.
 */
export const formOf = (request: HttpRequest | undefined): Record<string, string> =>
  Object.fromEntries(new URLSearchParams(request?.body ?? ''));

// ============================================================================
// Token Client & Validator Stubs
// ============================================================================

/**
 * Scripted behavior for a stub token client.
 */
export interface StubTokenClientScript {
  readonly exchangeCode?: (params: CodeExchangeParams) => Result<OAuthToken, AuthError>;
  readonly refresh?: (params: RefreshParams) => Result<OAuthToken, AuthError>;
  readonly revoke?: (params: RevokeParams) => Result<void, AuthError>;
  /** Delay before each answer, in ms */
  readonly delayMs?: number;
}

const notScripted = (operation: string): AuthError => ({
  code: 'configuration_error',
  message: `${operation} was not scripted for this test`,
});

const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Creates a token client stub that records its calls.
 */
export const createStubTokenClient = (
  script: StubTokenClientScript
): TokenClient & {
  readonly refreshCalls: RefreshParams[];
  readonly exchangeCalls: CodeExchangeParams[];
  readonly revokeCalls: RevokeParams[];
} => {
  const refreshCalls: RefreshParams[] = [];
  const exchangeCalls: CodeExchangeParams[] = [];
  const revokeCalls: RevokeParams[] = [];
  const pause = async (): Promise<void> => {
    if (script.delayMs !== undefined) {
      await delay(script.delayMs);
    }
  };

  return {
    refreshCalls,
    exchangeCalls,
    revokeCalls,
    exchangeCode: async (params) => {
      exchangeCalls.push(params);
      await pause();
      return script.exchangeCode?.(params) ?? err(notScripted('exchangeCode'));
    },
    refresh: async (params) => {
      refreshCalls.push(params);
      await pause();
      return script.refresh?.(params) ?? err(notScripted('refresh'));
    },
    revoke: async (params) => {
      revokeCalls.push(params);
      await pause();
      return script.revoke?.(params) ?? err(notScripted('revoke'));
    },
  };
};

/**
 * Creates a validator stub that answers from a function of the token.
 */
export const createStubValidator = (
  answer: (token: string) => Result<ValidatedClaims, AuthError>
): TokenValidator & { readonly validated: string[] } => {
  const validated: string[] = [];
  return {
    validated,
    validate: (token) => {
      validated.push(token);
      return Promise.resolve(answer(token));
    },
  };
};

// ============================================================================
// Cache Mocks
// ============================================================================

/**
 * Tracked set call for assertions.
 */
interface TrackedSetCall<T> {
  readonly key: string;
  readonly value: T;
  readonly ttlMs: number | undefined;
}

/**
 * Creates a mock cache for testing.
 * Optionally pre-populated with initial data.
 */
export const createMockCache = <T>(
  initialData?: Record<string, T>
): Cache<T> & {
  readonly data: Map<string, T>;
  readonly setCalls: TrackedSetCall<T>[];
  readonly deleteCalls: string[];
} => {
  const data = new Map<string, T>(initialData ? Object.entries(initialData) : undefined);
  const setCalls: TrackedSetCall<T>[] = [];
  const deleteCalls: string[] = [];

  return {
    data,
    setCalls,
    deleteCalls,

    get: (key: string): T | undefined => data.get(key),

    set: (key: string, value: T, ttlMs?: number): void => {
      setCalls.push({ key, value, ttlMs });
      data.set(key, value);
    },

    delete: (key: string): boolean => {
      deleteCalls.push(key);
      return data.delete(key);
    },

    clear: (): void => {
      data.clear();
    },
  };
};

// ============================================================================
// Timer Mocks
// ============================================================================

/**
 * Fake clock for time-based logic.
 */
export interface FakeTimer {
  readonly now: Clock;
  readonly advance: (ms: number) => void;
  readonly set: (time: number) => void;
}

/**
 * Creates a controllable fake clock.
 */
export const createFakeTimer = (initialTime: number): FakeTimer => {
  let currentTime = initialTime;

  return {
    now: (): number => currentTime,
    advance: (ms: number): void => {
      currentTime += ms;
    },
    set: (time: number): void => {
      currentTime = time;
    },
  };
};
