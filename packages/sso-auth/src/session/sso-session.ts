/**
 * Session manager: the interactive flow, on-demand refresh and batch
 * refresh over a token store.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import type { AuthError } from '../types.js';
import { withIdentity } from '../errors.js';
import { createLogger } from '../logging/logger.js';
import { prepareAuthorizationRequest } from '../acquisition/authorization-url.js';
import {
  DEFAULT_CALLBACK_TIMEOUT_MS,
  runCallbackListener,
  splitCallbackUrl,
} from '../acquisition/callback-listener.js';
import {
  DEFAULT_REFRESH_BUFFER_MINUTES,
  makeCharacterToken,
  needsRefresh,
  validateRefreshBuffer,
  type CharacterToken,
} from '../lifecycle/character-token.js';
import { createRefreshOrchestrator, summarizeOutcomes } from '../refresh/orchestrator.js';
import type { RefreshOutcome, RefreshSummary } from '../refresh/types.js';
import type {
  AuthenticateOptions,
  RefreshAllOptions,
  SsoSession,
  SsoSessionConfig,
} from './types.js';

/**
 * Creates a session.
 *
 * Fails with `configuration_error` when the refresh buffer is out of range,
 * `maxConcurrency` is not a positive integer, or the callback URL cannot be
 * bound.
 *
 * The session reads and writes only the tokens owned by
 * `credentials.clientId`.
 *
 * @example
 * ```typescript
 * const session = createSsoSession({
 *   credentials,
 *   endpoints: DEFAULT_SSO_ENDPOINTS,
 *   store: createJsonFileTokenStore('tokens.json'),
 *   tokenClient: createTokenClient({ userAgent }),
 *   validator: createTokenValidator(DEFAULT_SSO_ENDPOINTS),
 *   onAuthorizationUrl: (url) => console.log(`Open ${url} to sign in`),
 * });
 *
 * if (session.isOk()) {
 *   const token = await session.value.authenticate();
 * }
 * ```
 */
export const createSsoSession = (config: SsoSessionConfig): Result<SsoSession, AuthError> => {
  const { credentials, endpoints, store, tokenClient, validator } = config;
  const listener = config.listener ?? runCallbackListener;
  const clock = config.clock ?? Date.now;
  const logger = config.logger ?? createLogger('session');
  const callbackTimeoutMs = config.callbackTimeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS;
  const onAuthorizationUrl =
    config.onAuthorizationUrl ??
    ((ssoUrl: string): void => {
      logger.info({ ssoUrl }, 'open this URL in a browser to sign in');
    });

  const bufferResult = validateRefreshBuffer(
    config.refreshBufferMinutes ?? DEFAULT_REFRESH_BUFFER_MINUTES
  );
  if (bufferResult.isErr()) {
    return err(bufferResult.error);
  }
  const refreshBufferMinutes = bufferResult.value;

  const addressResult = splitCallbackUrl(credentials.callbackUrl);
  if (addressResult.isErr()) {
    return err(addressResult.error);
  }
  const address = addressResult.value;

  const orchestratorResult = createRefreshOrchestrator({
    tokenClient,
    validator,
    endpoints,
    maxConcurrency: config.maxConcurrency,
    clock,
    logger,
  });
  if (orchestratorResult.isErr()) {
    return err(orchestratorResult.error);
  }
  const orchestrator = orchestratorResult.value;
  const { clientId } = credentials;

  /**
   * Writes back a successful outcome; a failed write turns it into a failure.
   */
  const persist = async (outcome: RefreshOutcome): Promise<RefreshOutcome> => {
    if (outcome.status === 'failure') {
      return outcome;
    }

    const saved = await store.put(outcome.token);
    if (saved.isErr()) {
      return {
        status: 'failure',
        identityId: outcome.identityId,
        error: withIdentity(saved.error, outcome.identityId),
      };
    }

    return outcome;
  };

  // One refresh per identity at a time: a rotated refresh token is single-use
  const inFlight = new Map<number, Promise<RefreshOutcome>>();

  const refreshShared = (token: CharacterToken): Promise<RefreshOutcome> => {
    const pending = inFlight.get(token.identityId);
    if (pending !== undefined) {
      return pending;
    }

    const started = (async (): Promise<RefreshOutcome> => {
      try {
        return await persist(await orchestrator.refreshOne(token));
      } finally {
        inFlight.delete(token.identityId);
      }
    })();
    inFlight.set(token.identityId, started);
    return started;
  };

  const authenticate = async (
    options: AuthenticateOptions = {}
  ): Promise<Result<CharacterToken, AuthError>> => {
    const request = await prepareAuthorizationRequest(credentials, endpoints.authorizationEndpoint);
    if (request.isErr()) {
      return err(request.error);
    }

    const code = await listener({
      ...address,
      expectedState: request.value.state,
      timeoutMs: callbackTimeoutMs,
      signal: options.signal,
      onListening: (port) => {
        onAuthorizationUrl(request.value.ssoUrl, port);
      },
    });
    if (code.isErr()) {
      return err(code.error);
    }

    const oauthToken = await tokenClient.exchangeCode({
      clientId,
      code: code.value,
      codeVerifier: request.value.codeVerifier,
      tokenEndpoint: endpoints.tokenEndpoint,
    });
    if (oauthToken.isErr()) {
      return err(oauthToken.error);
    }

    const issuedAt = clock();

    const claims = await validator.validate(oauthToken.value.access_token);
    if (claims.isErr()) {
      return err(claims.error);
    }

    const existing = await store.get(clientId, claims.value.identityId);
    if (existing.isErr()) {
      return err(existing.error);
    }

    const token = makeCharacterToken(claims.value, oauthToken.value, clientId, {
      issuedAt,
      createdAt: existing.value?.createdAt,
    });

    const saved = await store.put(token);
    if (saved.isErr()) {
      return err(withIdentity(saved.error, token.identityId));
    }

    logger.info(
      { identityId: token.identityId, displayName: token.displayName },
      'identity authenticated'
    );
    return ok(token);
  };

  const getToken = async (
    identityId: number
  ): Promise<Result<CharacterToken | undefined, AuthError>> => {
    const stored = await store.get(clientId, identityId);
    if (stored.isErr() || stored.value === undefined) {
      return stored;
    }

    const token = stored.value;
    if (!needsRefresh(token, refreshBufferMinutes, clock())) {
      return ok(token);
    }

    const outcome = await refreshShared(token);
    return outcome.status === 'success' ? ok(outcome.token) : err(outcome.error);
  };

  const refreshAll = async (
    options: RefreshAllOptions = {}
  ): Promise<Result<RefreshSummary, AuthError>> => {
    const listed = await store.list(clientId);
    if (listed.isErr()) {
      return err(listed.error);
    }

    const now = clock();
    const stale = listed.value.filter(
      (token) => options.force === true || needsRefresh(token, refreshBufferMinutes, now)
    );

    const outcomes = await orchestrator.refreshMany(stale, { signal: options.signal });

    // Writes are sequential so the store sees one mutation at a time
    const persisted: RefreshOutcome[] = [];
    for (const outcome of outcomes) {
      persisted.push(await persist(outcome));
    }

    const summary = summarizeOutcomes(persisted);
    logger.info(
      { refreshed: summary.succeededIds, failed: summary.failedIds },
      'stored tokens refreshed'
    );
    return ok(summary);
  };

  const revoke = async (identityId: number): Promise<Result<boolean, AuthError>> => {
    const stored = await store.get(clientId, identityId);
    if (stored.isErr()) {
      return err(stored.error);
    }
    if (stored.value === undefined) {
      return ok(false);
    }

    if (endpoints.revocationEndpoint !== undefined) {
      const revoked = await tokenClient.revoke({
        clientId: stored.value.clientId,
        token: stored.value.refreshToken,
        revocationEndpoint: endpoints.revocationEndpoint,
        tokenTypeHint: 'refresh_token',
      });
      if (revoked.isErr()) {
        return err(withIdentity(revoked.error, identityId));
      }
    } else {
      logger.warn({ identityId }, 'no revocation endpoint configured; deleting token locally only');
    }

    return store.delete(clientId, identityId);
  };

  return ok({ authenticate, getToken, refreshAll, revoke });
};
