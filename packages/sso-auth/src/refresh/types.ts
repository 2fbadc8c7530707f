import type { AuthError, Clock, SsoEndpoints } from '../types.js';
import type { TokenClient } from '../acquisition/types.js';
import type { CharacterToken } from '../lifecycle/character-token.js';
import type { TokenValidator } from '../validation/types.js';
import type { Logger } from '../logging/logger.js';

/**
 * Result of refreshing one token.
 */
export type RefreshOutcome =
  | {
      readonly status: 'success';
      readonly identityId: number;
      readonly token: CharacterToken;
    }
  | {
      readonly status: 'failure';
      readonly identityId: number;
      readonly error: AuthError;
    };

/**
 * Partial-success summary of a batch.
 */
export interface RefreshSummary {
  /** Refreshed tokens, in input order */
  readonly refreshed: readonly CharacterToken[];
  /** Failures, in input order */
  readonly failed: readonly AuthError[];
  readonly succeededIds: readonly number[];
  readonly failedIds: readonly number[];
  readonly allSucceeded: boolean;
}

/**
 * Dependencies and limits of the orchestrator.
 */
export interface RefreshOrchestratorConfig {
  readonly tokenClient: TokenClient;
  readonly validator: TokenValidator;
  readonly endpoints: Pick<SsoEndpoints, 'tokenEndpoint'>;
  /** Upper bound on refreshes in flight; unbounded when omitted */
  readonly maxConcurrency?: number | undefined;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Options for one batch.
 */
export interface RefreshManyOptions {
  /**
   * Stops starting new refreshes. Refreshes already in flight complete;
   * the rest are reported as `refresh_cancelled` failures.
   */
  readonly signal?: AbortSignal | undefined;
}

/**
 * Refreshes tokens. Performs no persistence.
 */
export interface RefreshOrchestrator {
  /**
   * Refreshes one token. Never rejects.
   */
  readonly refreshOne: (token: CharacterToken) => Promise<RefreshOutcome>;

  /**
   * Refreshes every given token concurrently. One outcome per input, in
   * input order; a failure never affects the other tokens.
   */
  readonly refreshMany: (
    tokens: readonly CharacterToken[],
    options?: RefreshManyOptions
  ) => Promise<readonly RefreshOutcome[]>;
}
