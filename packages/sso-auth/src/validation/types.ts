import type { JWTVerifyGetKey } from 'jose';
import type { Result } from 'neverthrow';
import type { AuthError } from '../types.js';

/**
 * OAuth 2.0 Authorization Server Metadata as per RFC 8414.
 */
export interface OAuthServerMetadata {
  /** Issuer identifier URL */
  readonly issuer: string;
  /** Authorization endpoint URL */
  readonly authorization_endpoint: string;
  /** Token endpoint URL */
  readonly token_endpoint: string;
  /** JWKS URI for public keys */
  readonly jwks_uri: string;
  /** Revocation endpoint URL (RFC 7009) */
  readonly revocation_endpoint?: string | undefined;
  /** Supported response types */
  readonly response_types_supported?: readonly string[] | undefined;
  /** Supported PKCE code challenge methods */
  readonly code_challenge_methods_supported?: readonly string[] | undefined;
  /** Supported token endpoint auth methods */
  readonly token_endpoint_auth_methods_supported?: readonly string[] | undefined;
  /** Supported scopes */
  readonly scopes_supported?: readonly string[] | undefined;
}

/**
 * Resolves the verification key for a JWT from its protected header.
 *
 * Produced by `createRemoteJWKSet` (network, cached) or `createLocalJWKSet`.
 */
export type JwksResolver = JWTVerifyGetKey;

/**
 * Token validation failure kinds.
 */
export type ValidationErrorCode =
  | 'MALFORMED_TOKEN'
  | 'EXPIRED_TOKEN'
  | 'INVALID_SIGNATURE'
  | 'INVALID_AUDIENCE'
  | 'INVALID_ISSUER'
  | 'KEY_NOT_FOUND'
  | 'JWKS_ERROR';

/**
 * Internal error type for validation operations.
 */
export interface ValidationError {
  readonly code: ValidationErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Claims extracted from a verified access token.
 */
export interface ValidatedClaims {
  /** Identity id: the trailing `:` segment of `sub` */
  readonly identityId: number;
  /** Display name (`name` claim) */
  readonly displayName: string;
  /** Granted scopes (`scp` claim) */
  readonly scopes: readonly string[];
  /** Raw `sub` claim */
  readonly subject: string;
  /** `iss` claim */
  readonly issuer: string;
  /** `aud` claim, normalized to an array */
  readonly audience: readonly string[];
  /** `exp` claim as Unix epoch milliseconds */
  readonly expiresAt: number;
}

/**
 * Expected audience and accepted issuers for validation.
 */
export interface ValidationOptions {
  /** Required audience */
  readonly audience: string;
  /** Accepted issuers */
  readonly issuers: readonly string[];
  /**
   * Clock tolerance in seconds for `exp`/`nbf` checks (default: 15).
   */
  readonly clockToleranceSeconds?: number | undefined;
}

/**
 * Configuration for creating a token validator.
 */
export interface TokenValidatorConfig extends ValidationOptions {
  /** JWKS URI; a single caching remote key set is created from it */
  readonly jwksUri?: string | undefined;
  /** Pre-built key resolver; takes precedence over `jwksUri` */
  readonly jwks?: JwksResolver | undefined;
  /** User-Agent sent when fetching the key set */
  readonly userAgent?: string | undefined;
}

/**
 * Token validator interface.
 */
export interface TokenValidator {
  /**
   * Verifies an access token and extracts its identity claims.
   * @param token - The access token (JWT) to validate
   */
  readonly validate: (token: string) => Promise<Result<ValidatedClaims, AuthError>>;
}
