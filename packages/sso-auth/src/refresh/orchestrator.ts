/**
 * Concurrent token refresh with per-token failure isolation.
 *
 * @packageDocumentation
 */

import { err, ok, ResultAsync, type Result } from 'neverthrow';
import type { AuthError } from '../types.js';
import { createConfigurationError, withIdentity } from '../errors.js';
import { createLogger } from '../logging/logger.js';
import { makeCharacterToken, type CharacterToken } from '../lifecycle/character-token.js';
import type {
  RefreshManyOptions,
  RefreshOrchestrator,
  RefreshOrchestratorConfig,
  RefreshOutcome,
  RefreshSummary,
} from './types.js';

const failure = (identityId: number, error: AuthError): RefreshOutcome => ({
  status: 'failure',
  identityId,
  error: withIdentity(error, identityId),
});

/**
 * Checks a concurrency limit: a positive integer, or undefined for no limit.
 */
export const validateMaxConcurrency = (
  maxConcurrency: number | undefined
): Result<number | undefined, AuthError> =>
  maxConcurrency === undefined || (Number.isSafeInteger(maxConcurrency) && maxConcurrency > 0)
    ? ok(maxConcurrency)
    : err(
        createConfigurationError(
          `maxConcurrency must be a positive integer, got ${String(maxConcurrency)}`
        )
      );

/**
 * Creates a refresh orchestrator.
 *
 * Each refresh redeems the refresh token, validates the new access token
 * and builds a new CharacterToken; the input token is never modified. The
 * refresh token in the response always replaces the old one.
 *
 * Fails with `configuration_error` when `maxConcurrency` is not a positive
 * integer.
 *
 * @example
 * ```typescript
 * const orchestrator = createRefreshOrchestrator({ tokenClient, validator, endpoints });
 * if (orchestrator.isErr()) {
 *   return;
 * }
 * const outcomes = await orchestrator.value.refreshMany(staleTokens);
 * const summary = summarizeOutcomes(outcomes);
 *
 * for (const token of summary.refreshed) {
 *   await store.put(token);
 * }
 * ```
 */
export const createRefreshOrchestrator = (
  config: RefreshOrchestratorConfig
): Result<RefreshOrchestrator, AuthError> => {
  const { tokenClient, validator, endpoints } = config;
  const limit = validateMaxConcurrency(config.maxConcurrency);
  if (limit.isErr()) {
    return err(limit.error);
  }
  const maxConcurrency = limit.value;
  const clock = config.clock ?? Date.now;
  const logger = config.logger ?? createLogger('refresh');

  const refreshToken = async (token: CharacterToken): Promise<RefreshOutcome> => {
    const response = await tokenClient.refresh({
      clientId: token.clientId,
      refreshToken: token.refreshToken,
      tokenEndpoint: endpoints.tokenEndpoint,
    });
    if (response.isErr()) {
      return failure(token.identityId, response.error);
    }

    const issuedAt = clock();

    const claims = await validator.validate(response.value.access_token);
    if (claims.isErr()) {
      return failure(token.identityId, claims.error);
    }

    if (claims.value.identityId !== token.identityId) {
      return failure(token.identityId, {
        code: 'token_invalid',
        message: `Refreshed token belongs to identity ${String(claims.value.identityId)}`,
      });
    }

    const refreshed = makeCharacterToken(claims.value, response.value, token.clientId, {
      issuedAt,
      createdAt: token.createdAt,
    });

    // updatedAt only moves forward, even when the clock does not
    return {
      status: 'success',
      identityId: token.identityId,
      token: { ...refreshed, updatedAt: Math.max(refreshed.updatedAt, token.updatedAt + 1) },
    };
  };

  const refreshOne = async (token: CharacterToken): Promise<RefreshOutcome> => {
    const outcome = await ResultAsync.fromPromise(
      refreshToken(token),
      (error): AuthError => ({
        code: 'network_error',
        message: `Refresh failed unexpectedly: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      })
    ).match(
      (value) => value,
      (error) => failure(token.identityId, error)
    );

    if (outcome.status === 'success') {
      logger.info({ identityId: outcome.identityId }, 'token refreshed');
    } else {
      logger.warn(
        {
          identityId: outcome.identityId,
          errorCode: outcome.error.code,
          providerError: outcome.error.providerError,
        },
        'token refresh failed'
      );
    }

    return outcome;
  };

  const refreshMany = async (
    tokens: readonly CharacterToken[],
    options: RefreshManyOptions = {}
  ): Promise<readonly RefreshOutcome[]> => {
    const { signal } = options;
    const outcomes: RefreshOutcome[] = [];
    const workerCount = Math.max(1, Math.min(maxConcurrency ?? tokens.length, tokens.length));
    let nextIndex = 0;

    // Every worker starts its first refresh synchronously, so an unbounded
    // batch issues all requests at once
    const worker = async (): Promise<void> => {
      while (nextIndex < tokens.length) {
        const index = nextIndex;
        nextIndex += 1;
        const token = tokens[index];
        if (token === undefined) {
          continue;
        }

        outcomes[index] =
          signal?.aborted === true
            ? failure(token.identityId, {
                code: 'refresh_cancelled',
                message: 'Refresh batch was cancelled before this token was refreshed',
              })
            : await refreshOne(token);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, worker));

    logger.debug(
      {
        total: tokens.length,
        failed: outcomes.filter((outcome) => outcome.status === 'failure').length,
      },
      'refresh batch finished'
    );

    return outcomes;
  };

  return ok({ refreshOne, refreshMany });
};

/**
 * Summarizes a batch so partial progress is visible.
 */
export const summarizeOutcomes = (outcomes: readonly RefreshOutcome[]): RefreshSummary => {
  const refreshed: CharacterToken[] = [];
  const failed: AuthError[] = [];
  const succeededIds: number[] = [];
  const failedIds: number[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'success') {
      refreshed.push(outcome.token);
      succeededIds.push(outcome.identityId);
    } else {
      failed.push(outcome.error);
      failedIds.push(outcome.identityId);
    }
  }

  return { refreshed, failed, succeededIds, failedIds, allSucceeded: failed.length === 0 };
};
