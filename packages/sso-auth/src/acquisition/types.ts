/**
 * Types for the interactive Authorization Code + PKCE flow and the token
 * endpoint.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import type { AuthError } from '../types.js';

// ============================================================================
// PKCE Types (RFC 7636)
// ============================================================================

/**
 * PKCE challenge method. Only S256 is supported.
 */
export type PkceChallengeMethod = 'S256';

/**
 * PKCE verifier/challenge pair.
 * The verifier lives in memory for one authorization attempt and is never persisted.
 */
export interface PkceChallenge {
  /** The code verifier (43-128 url-safe chars) */
  readonly verifier: string;
  /** base64url(SHA-256(verifier)), padding stripped */
  readonly challenge: string;
  readonly method: PkceChallengeMethod;
}

// ============================================================================
// Authorization Request Types
// ============================================================================

/**
 * Input for building the provider redirect URL.
 */
export interface AuthorizationUrlParams {
  readonly clientId: string;
  readonly scopes: readonly string[];
  readonly redirectUri: string;
  readonly authorizationEndpoint: string;
  /** PKCE challenge; only `challenge` and `method` are sent */
  readonly challenge: PkceChallenge;
  /** Custom state value (generated if not provided) */
  readonly state?: string | undefined;
}

/**
 * The redirect URL and the CSRF token it carries.
 */
export interface AuthorizationUrlResult {
  readonly ssoUrl: string;
  readonly state: string;
}

/**
 * Everything one interactive authorization attempt needs.
 * Created once, consumed by exactly one callback, then discarded.
 */
export interface AuthorizationRequest {
  readonly state: string;
  readonly ssoUrl: string;
  readonly codeVerifier: string;
  readonly redirectUri: string;
  readonly scopes: readonly string[];
}

// ============================================================================
// Callback Listener Types
// ============================================================================

/**
 * Where the loopback callback endpoint binds.
 */
export interface CallbackAddress {
  readonly host: string;
  readonly port: number;
  /** Path of the single accepted route, e.g. "/callback" */
  readonly route: string;
}

/**
 * Options for one run of the callback listener.
 */
export interface CallbackListenerOptions extends CallbackAddress {
  /** State token the callback must echo back */
  readonly expectedState: string;
  /** How long to wait for the callback */
  readonly timeoutMs: number;
  /** Aborting stops the wait with `callback_cancelled` */
  readonly signal?: AbortSignal | undefined;
  /** Called once the socket is bound, with the actual port (useful with port 0) */
  readonly onListening?: ((port: number) => void) | undefined;
}

/**
 * Waits for the provider redirect and resolves with the authorization code.
 */
export type CallbackListener = (
  options: CallbackListenerOptions
) => Promise<Result<string, AuthError>>;

// ============================================================================
// Token Endpoint Types
// ============================================================================

/**
 * Raw token endpoint response.
 */
export interface OAuthToken {
  readonly access_token: string;
  readonly refresh_token: string;
  readonly token_type: string;
  /** Lifetime of the access token in seconds */
  readonly expires_in: number;
}

/**
 * Parameters for the `authorization_code` grant.
 */
export interface CodeExchangeParams {
  readonly clientId: string;
  readonly code: string;
  readonly codeVerifier: string;
  readonly tokenEndpoint: string;
}

/**
 * Parameters for the `refresh_token` grant.
 */
export interface RefreshParams {
  readonly clientId: string;
  readonly refreshToken: string;
  readonly tokenEndpoint: string;
}

/**
 * Parameters for token revocation (RFC 7009).
 */
export interface RevokeParams {
  readonly clientId: string;
  readonly token: string;
  readonly revocationEndpoint: string;
  readonly tokenTypeHint?: 'refresh_token' | 'access_token' | undefined;
}

/**
 * Configuration for the token client.
 */
export interface TokenClientConfig {
  /** User-Agent sent with every token endpoint request */
  readonly userAgent: string;
}

/**
 * Token endpoint client.
 *
 * None of the operations retry; retry policy belongs to the caller.
 */
export interface TokenClient {
  /**
   * Exchanges an authorization code for a token pair.
   */
  readonly exchangeCode: (params: CodeExchangeParams) => Promise<Result<OAuthToken, AuthError>>;

  /**
   * Redeems a refresh token. The returned refresh token may differ from the
   * submitted one and always supersedes it.
   */
  readonly refresh: (params: RefreshParams) => Promise<Result<OAuthToken, AuthError>>;

  /**
   * Revokes a token at the provider.
   */
  readonly revoke: (params: RevokeParams) => Promise<Result<void, AuthError>>;
}
