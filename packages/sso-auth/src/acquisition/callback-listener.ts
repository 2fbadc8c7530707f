/**
 * Single-shot loopback HTTP endpoint that receives the provider redirect.
 *
 * @packageDocumentation
 */

import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { err, ok, type Result } from 'neverthrow';
import type { AuthError } from '../types.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { statesMatch } from './state.js';
import type { CallbackAddress, CallbackListenerOptions } from './types.js';

/** Default callback wait: 5 minutes */
export const DEFAULT_CALLBACK_TIMEOUT_MS = 300_000;

/** Longest wait a timer can hold (2^31 - 1 ms, about 24.8 days) */
export const MAX_CALLBACK_TIMEOUT_MS = 2_147_483_647;

/** Port used when the callback URL does not name one */
export const DEFAULT_CALLBACK_PORT = 8080;

/** How long a graceful close may wait for the last response to flush */
const CLOSE_GRACE_MS = 2_000;

const page = (title: string, body: string): string =>
  '<!DOCTYPE html><html><head><meta charset="utf-8"><title>' +
  title +
  '</title></head><body style="font-family: system-ui; padding: 40px; text-align: center;">' +
  `<h1>${title}</h1><p>${body}</p></body></html>`;

const SUCCESS_PAGE = page(
  'Authentication Successful',
  'You can close this window and return to the application.'
);

const FAILURE_PAGE = page(
  'Authentication Failed',
  'The sign-in could not be completed. Close this window and try again.'
);

const GONE_PAGE = page('Authentication Already Completed', 'This sign-in link has already been used.');

/**
 * Splits a callback URL into the address the listener binds.
 *
 * @example
 * ```typescript
 * splitCallbackUrl('http://localhost:8080/callback');
 * // => Ok({ host: 'localhost', port: 8080, route: '/callback' })
 * ```
 */
export const splitCallbackUrl = (callbackUrl: string): Result<CallbackAddress, AuthError> => {
  let url: URL;
  try {
    url = new URL(callbackUrl);
  } catch (error) {
    return err({
      code: 'configuration_error',
      message: `Callback URL is not a valid URL: ${callbackUrl}`,
      cause: error,
    });
  }

  if (url.protocol !== 'http:') {
    return err({
      code: 'configuration_error',
      message: `Callback URL must use http on a loopback host, got ${url.protocol}`,
    });
  }

  // WHATWG URL keeps IPv6 brackets in hostname; node:http wants them stripped
  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
  const port = url.port === '' ? DEFAULT_CALLBACK_PORT : Number(url.port);

  return ok({ host, port, route: url.pathname === '' ? '/' : url.pathname });
};

type Outcome = Result<string, AuthError>;

/**
 * Parses a request target; undefined when it is not a valid URL.
 */
const parseRequestTarget = (target: string | undefined): URL | undefined => {
  try {
    return new URL(target ?? '/', 'http://localhost');
  } catch {
    return undefined;
  }
};

/**
 * Interprets the redirect query. `error` wins over everything, then the
 * state check, then the presence of `code`.
 */
const interpretCallback = (query: URLSearchParams, expectedState: string): Outcome => {
  const providerError = query.get('error');
  if (providerError !== null) {
    const description = query.get('error_description');
    return err({
      code: 'callback_error',
      message: `Authorization failed: ${description ?? providerError}`,
      providerError,
      errorDescription: description ?? undefined,
    });
  }

  if (!statesMatch(expectedState, query.get('state'))) {
    return err({
      code: 'csrf_mismatch',
      message: 'State parameter does not match the authorization request',
    });
  }

  const code = query.get('code');
  if (code === null || code.length === 0) {
    return err({
      code: 'callback_error',
      message: 'Callback did not include an authorization code',
    });
  }

  return ok(code);
};

const respond = (res: ServerResponse, status: number, html?: string): void => {
  if (html === undefined) {
    res.writeHead(status, { Connection: 'close' });
    res.end();
    return;
  }
  res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8', Connection: 'close' });
  res.end(html);
};

/**
 * Runs the callback listener until one terminal outcome:
 * a code, a failed callback, the timeout, or cancellation.
 *
 * The first callback on the route settles the wait. Later requests get 410
 * and are not processed; other paths get 404 and unparseable request targets
 * 400, without settling. The port is released before the returned promise
 * resolves, on every exit path.
 *
 * Fails with `configuration_error`, before binding, when `timeoutMs` is not
 * an integer in [1, MAX_CALLBACK_TIMEOUT_MS].
 *
 * @example
 * ```typescript
 * const result = await runCallbackListener({
 *   expectedState: request.state,
 *   host: 'localhost',
 *   port: 8080,
 *   route: '/callback',
 *   timeoutMs: 300_000,
 * });
 *
 * if (result.isOk()) {
 *   await tokenClient.exchangeCode({ code: result.value, ... });
 * }
 * ```
 */
export const runCallbackListener = (
  options: CallbackListenerOptions,
  logger: Logger = createLogger('callback-listener')
): Promise<Result<string, AuthError>> => {
  const { expectedState, host, port, route, timeoutMs, signal, onListening } = options;

  if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_CALLBACK_TIMEOUT_MS) {
    return Promise.resolve(
      err({
        code: 'configuration_error',
        message: `Callback timeout must be an integer from 1 to ${String(MAX_CALLBACK_TIMEOUT_MS)} ms, got ${String(timeoutMs)}`,
      })
    );
  }

  if (signal?.aborted === true) {
    return Promise.resolve(
      err({ code: 'callback_cancelled', message: 'Authorization was cancelled before listening' })
    );
  }

  return new Promise((resolve) => {
    let settled = false;
    let timeoutId: NodeJS.Timeout | undefined;

    const server = http.createServer((req: IncomingMessage, res: ServerResponse) => {
      const url = parseRequestTarget(req.url);
      if (url === undefined) {
        logger.debug({ target: req.url }, 'ignoring request with a malformed target');
        respond(res, 400);
        return;
      }

      if (url.pathname !== route) {
        respond(res, 404);
        return;
      }

      if (settled) {
        respond(res, 410, GONE_PAGE);
        return;
      }

      if (req.method !== 'GET') {
        res.setHeader('Allow', 'GET');
        respond(res, 405);
        return;
      }

      const outcome = interpretCallback(url.searchParams, expectedState);
      respond(res, outcome.isOk() ? 200 : 400, outcome.isOk() ? SUCCESS_PAGE : FAILURE_PAGE);
      settle(outcome, 'graceful');
    });

    const onAbort = (): void => {
      settle(err({ code: 'callback_cancelled', message: 'Authorization was cancelled' }), 'immediate');
    };

    /**
     * One-shot transition to a terminal state. Graceful closes let the
     * in-flight response flush; immediate closes drop every connection.
     */
    function settle(outcome: Outcome, mode: 'graceful' | 'immediate'): void {
      if (settled) {
        return;
      }
      settled = true;

      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);

      if (outcome.isErr()) {
        logger.warn({ errorCode: outcome.error.code }, 'authorization callback failed');
      } else {
        logger.info('authorization callback received');
      }

      if (!server.listening) {
        resolve(outcome);
        return;
      }

      const graceTimer = setTimeout(() => {
        server.closeAllConnections();
      }, CLOSE_GRACE_MS);

      server.close(() => {
        clearTimeout(graceTimer);
        resolve(outcome);
      });

      if (mode === 'immediate') {
        server.closeAllConnections();
      } else {
        server.closeIdleConnections();
      }
    }

    server.on('error', (error: NodeJS.ErrnoException) => {
      settle(
        err({
          code: 'configuration_error',
          message:
            error.code === 'EADDRINUSE'
              ? `Callback port ${String(port)} is already in use`
              : `Callback listener failed: ${error.message}`,
          cause: error,
        }),
        'immediate'
      );
    });

    server.listen(port, host, () => {
      const address = server.address();
      const boundPort = address !== null && typeof address === 'object' ? address.port : port;

      logger.debug({ host, port: boundPort, route }, 'callback listener ready');

      if (signal?.aborted === true) {
        onAbort();
        return;
      }

      timeoutId = setTimeout(() => {
        settle(
          err({
            code: 'callback_timeout',
            message: `No authorization callback received within ${String(Math.round(timeoutMs / 1000))}s`,
          }),
          'immediate'
        );
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      onListening?.(boundPort);
    });
  });
};
