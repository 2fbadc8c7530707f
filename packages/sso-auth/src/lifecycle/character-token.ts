/**
 * The durable identity + token record and its expiry policy.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import type { AuthError, Clock } from '../types.js';
import type { OAuthToken } from '../acquisition/types.js';
import type { ValidatedClaims } from '../validation/types.js';

/** Largest accepted refresh buffer. Access tokens live about 20 minutes. */
export const MAX_REFRESH_BUFFER_MINUTES = 15;

/** Refresh buffer used when the caller configures none */
export const DEFAULT_REFRESH_BUFFER_MINUTES = 5;

const MINUTE_MS = 60_000;

/**
 * An identity's token pair. Treated as an immutable value: refreshing
 * produces a new record.
 */
export interface CharacterToken {
  readonly identityId: number;
  readonly displayName: string;
  readonly accessToken: string;
  /** Latest refresh token; a rotated value replaces the previous one */
  readonly refreshToken: string;
  /** Absolute expiry, epoch ms: issue time + `expires_in` */
  readonly expiresAt: number;
  readonly scopes: readonly string[];
  readonly tokenType: string;
  readonly clientId: string;
  /** First authorization of this identity, epoch ms */
  readonly createdAt: number;
  /** Last time the token pair was replaced, epoch ms */
  readonly updatedAt: number;
}

/**
 * True once the access token has expired.
 */
export const isExpired = (token: CharacterToken, now: number = Date.now()): boolean =>
  now >= token.expiresAt;

/**
 * True once the token is inside the refresh window before expiry.
 */
export const needsRefresh = (
  token: CharacterToken,
  bufferMinutes: number,
  now: number = Date.now()
): boolean => now >= token.expiresAt - bufferMinutes * MINUTE_MS;

/**
 * Minutes until expiry; negative once expired.
 */
export const minutesUntilExpiry = (token: CharacterToken, now: number = Date.now()): number =>
  (token.expiresAt - now) / MINUTE_MS;

/**
 * Validates a caller-supplied refresh buffer.
 * Accepted range: [0, MAX_REFRESH_BUFFER_MINUTES].
 */
export const validateRefreshBuffer = (minutes: number): Result<number, AuthError> => {
  if (!Number.isFinite(minutes) || minutes < 0 || minutes > MAX_REFRESH_BUFFER_MINUTES) {
    return err({
      code: 'configuration_error',
      message: `Refresh buffer must be between 0 and ${String(MAX_REFRESH_BUFFER_MINUTES)} minutes, got ${String(minutes)}`,
    });
  }
  return ok(minutes);
};

/**
 * Timing for makeCharacterToken.
 */
export interface CharacterTokenTiming {
  /** When the token response was received, epoch ms */
  readonly issuedAt: number;
  /** Creation time to keep when this replaces an existing record */
  readonly createdAt?: number | undefined;
}

/**
 * Builds a CharacterToken from a token response and its validated claims.
 *
 * @example
 * ```typescript
 * const token = makeCharacterToken(claims, oauthToken, clientId, { issuedAt: Date.now() });
 * // token.expiresAt === issuedAt + oauthToken.expires_in * 1000
 * ```
 */
export const makeCharacterToken = (
  claims: ValidatedClaims,
  oauthToken: OAuthToken,
  clientId: string,
  timing: CharacterTokenTiming
): CharacterToken => ({
  identityId: claims.identityId,
  displayName: claims.displayName,
  accessToken: oauthToken.access_token,
  refreshToken: oauthToken.refresh_token,
  expiresAt: timing.issuedAt + oauthToken.expires_in * 1000,
  scopes: [...claims.scopes],
  tokenType: oauthToken.token_type,
  clientId,
  createdAt: timing.createdAt ?? timing.issuedAt,
  updatedAt: timing.issuedAt,
});

/**
 * Classifies a token against the refresh policy.
 */
export const tokenState = (
  token: CharacterToken,
  bufferMinutes: number,
  clock: Clock = Date.now
): 'valid' | 'needs_refresh' | 'expired' => {
  const now = clock();
  if (isExpired(token, now)) {
    return 'expired';
  }
  return needsRefresh(token, bufferMinutes, now) ? 'needs_refresh' : 'valid';
};
