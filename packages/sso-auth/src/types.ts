/**
 * Shared public types for the SSO auth package.
 *
 * @packageDocumentation
 */

import type { ValidationErrorCode } from './validation/types.js';

/**
 * Returns the current time as Unix epoch milliseconds.
 * Injected wherever wall-clock time is read so tests can pin it.
 */
export type Clock = () => number;

// ============================================================================
// Credentials & Endpoints
// ============================================================================

/**
 * Application credentials registered with the SSO provider.
 *
 * Only read by this package; ownership and persistence belong to the caller.
 */
export interface SsoCredentials {
  /** OAuth client ID */
  readonly clientId: string;
  /** Full callback URL registered with the provider (e.g. "http://localhost:8080/callback") */
  readonly callbackUrl: string;
  /** Scopes requested during authorization */
  readonly scopes: readonly string[];
  /** Application name */
  readonly name?: string | undefined;
  /** Unique alias for the application */
  readonly alias?: string | undefined;
}

/**
 * Provider endpoints and token validation parameters.
 */
export interface SsoEndpoints {
  readonly authorizationEndpoint: string;
  readonly tokenEndpoint: string;
  readonly jwksUri: string;
  readonly revocationEndpoint?: string | undefined;
  /** Accepted `iss` claim values */
  readonly issuers: readonly string[];
  /** Required `aud` claim value */
  readonly audience: string;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Error codes produced by the authentication flow and refresh orchestration.
 */
export type AuthErrorCode =
  // Interactive flow
  | 'csrf_mismatch'
  | 'callback_error'
  | 'callback_timeout'
  | 'callback_cancelled'
  // Token endpoint
  | 'network_error'
  | 'provider_error'
  // Validation
  | 'token_invalid'
  // Inputs and collaborators
  | 'configuration_error'
  | 'storage_error'
  // Batch refresh
  | 'refresh_cancelled';

/**
 * Authentication error.
 */
export interface AuthError {
  /** Error code */
  readonly code: AuthErrorCode;
  /** Human-readable error message */
  readonly message: string;
  /** Machine-readable OAuth error code from the provider (e.g. "invalid_grant") */
  readonly providerError?: string | undefined;
  /** OAuth error_description from the provider */
  readonly errorDescription?: string | undefined;
  /** HTTP status of the failed provider response */
  readonly status?: number | undefined;
  /** Identity the error relates to, when known */
  readonly identityId?: number | undefined;
  /** Validation failure kind, for `token_invalid` errors */
  readonly validationCode?: ValidationErrorCode | undefined;
  /** Underlying cause */
  readonly cause?: unknown;
}
