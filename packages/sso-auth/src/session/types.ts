import type { Result } from 'neverthrow';
import type { AuthError, Clock, SsoCredentials, SsoEndpoints } from '../types.js';
import type { CallbackListener, TokenClient } from '../acquisition/types.js';
import type { CharacterToken } from '../lifecycle/character-token.js';
import type { RefreshSummary } from '../refresh/types.js';
import type { TokenStore } from '../storage/types.js';
import type { TokenValidator } from '../validation/types.js';
import type { Logger } from '../logging/logger.js';

/**
 * Session configuration. Every collaborator is injected.
 */
export interface SsoSessionConfig {
  readonly credentials: SsoCredentials;
  readonly endpoints: SsoEndpoints;
  readonly store: TokenStore;
  readonly tokenClient: TokenClient;
  readonly validator: TokenValidator;
  /** Callback listener (default: loopback HTTP listener) */
  readonly listener?: CallbackListener | undefined;
  /**
   * Receives the provider URL once the callback endpoint is listening;
   * the application opens it in a browser. Defaults to logging it.
   */
  readonly onAuthorizationUrl?: ((ssoUrl: string, callbackPort: number) => void) | undefined;
  /** Minutes before expiry a token counts as stale (default: 5, range [0, 15]) */
  readonly refreshBufferMinutes?: number | undefined;
  /** Callback wait (default: 300000) */
  readonly callbackTimeoutMs?: number | undefined;
  /** Upper bound on concurrent refreshes */
  readonly maxConcurrency?: number | undefined;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Options for an interactive authorization.
 */
export interface AuthenticateOptions {
  /** Aborting ends the wait with `callback_cancelled` */
  readonly signal?: AbortSignal | undefined;
}

/**
 * Options for refreshing every stored token.
 */
export interface RefreshAllOptions {
  /** Refresh every token, not only stale ones */
  readonly force?: boolean | undefined;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Authentication and token upkeep for one registered application.
 */
export interface SsoSession {
  /**
   * Runs the interactive flow and stores the resulting token.
   */
  readonly authenticate: (
    options?: AuthenticateOptions
  ) => Promise<Result<CharacterToken, AuthError>>;

  /**
   * Returns the stored token of an identity, refreshed and written back
   * when it is stale. Ok(undefined) when none is stored.
   */
  readonly getToken: (identityId: number) => Promise<Result<CharacterToken | undefined, AuthError>>;

  /**
   * Refreshes stale stored tokens and writes back each success. Partial
   * success is kept; failures are reported in the summary.
   */
  readonly refreshAll: (options?: RefreshAllOptions) => Promise<Result<RefreshSummary, AuthError>>;

  /**
   * Revokes an identity's refresh token at the provider and deletes it
   * locally.
   * @returns true if a token was stored
   */
  readonly revoke: (identityId: number) => Promise<Result<boolean, AuthError>>;
}
