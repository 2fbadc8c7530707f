import { ok, err, type Result } from 'neverthrow';
import { jwtVerify, createRemoteJWKSet, decodeProtectedHeader, type JWTPayload } from 'jose';
import type { Clock } from '../types.js';
import type {
  JwksResolver,
  ValidatedClaims,
  ValidationError,
  ValidationOptions,
} from './types.js';
import { createMalformedTokenError, mapJoseError } from './errors.js';
import { parseScopes } from './scopes.js';

/** Default clock tolerance for `exp`/`nbf` checks */
const DEFAULT_CLOCK_TOLERANCE_SECONDS = 15;

/** Display name used when the token carries no `name` claim */
const UNKNOWN_DISPLAY_NAME = 'Unknown';

/**
 * Checks if a string appears to be a JWT (3 base64url-encoded parts separated by dots).
 *
 * @param token - The token string to check
 * @returns true if the token has JWT format
 */
export const isJwtFormat = (token: string): boolean => {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return false;
  }
  const base64urlRegex = /^[A-Za-z0-9_-]+$/;
  return parts.every((part) => part.length > 0 && base64urlRegex.test(part));
};

/**
 * Creates a remote JWKS key resolver.
 * The jose library caches the fetched key set and refetches it when an
 * unknown `kid` shows up, so one instance should be shared per process.
 *
 * @param jwksUri - The JWKS URI
 * @param userAgent - Optional User-Agent header for the key set request
 */
export const createJwks = (jwksUri: string, userAgent?: string): JwksResolver => {
  const url = new URL(jwksUri);
  if (userAgent === undefined) {
    return createRemoteJWKSet(url);
  }
  return createRemoteJWKSet(url, { headers: { 'User-Agent': userAgent } });
};

/**
 * Extracts the identity id from a subject claim.
 *
 * The provider's subjects look like `CHARACTER:EVE:98765`; the id is the
 * trailing segment after the last `:`.
 */
export const parseIdentityId = (subject: string): Result<number, ValidationError> => {
  const segment = subject.split(':').pop() ?? '';

  if (!/^\d+$/.test(segment)) {
    return err(createMalformedTokenError(`Token subject "${subject}" has no numeric identity id`));
  }

  const identityId = Number(segment);
  if (!Number.isSafeInteger(identityId)) {
    return err(createMalformedTokenError(`Token subject "${subject}" identity id is out of range`));
  }

  return ok(identityId);
};

/**
 * Turns a verified payload into ValidatedClaims.
 */
const toValidatedClaims = (payload: JWTPayload): Result<ValidatedClaims, ValidationError> => {
  if (typeof payload.sub !== 'string') {
    return err(createMalformedTokenError('Token is missing required "sub" claim'));
  }
  if (typeof payload.iss !== 'string') {
    return err(createMalformedTokenError('Token is missing required "iss" claim'));
  }
  if (typeof payload.exp !== 'number') {
    return err(createMalformedTokenError('Token is missing required "exp" claim'));
  }

  const identityResult = parseIdentityId(payload.sub);
  if (identityResult.isErr()) {
    return err(identityResult.error);
  }

  const name = payload['name'];
  const audience =
    payload.aud === undefined ? [] : Array.isArray(payload.aud) ? [...payload.aud] : [payload.aud];

  return ok({
    identityId: identityResult.value,
    displayName: typeof name === 'string' && name.length > 0 ? name : UNKNOWN_DISPLAY_NAME,
    scopes: parseScopes(payload['scp']),
    subject: payload.sub,
    issuer: payload.iss,
    audience,
    expiresAt: payload.exp * 1000,
  });
};

/**
 * Verifies a JWT access token against a key set and extracts identity claims.
 *
 * The algorithm declared in the token header is the only one accepted, and
 * the key is resolved by the header's `kid`. Audience membership and the
 * issuer allow-list are enforced by jose.
 *
 * @param token - The JWT to verify
 * @param jwks - Key resolver from createJwks or createLocalJWKSet
 * @param options - Expected audience and accepted issuers
 * @param clock - Time source for `exp` checks (default: Date.now)
 * @returns Result with validated claims or validation error
 *
 * @example
 * ```typescript
 * const jwks = createJwks('https://login.eveonline.com/oauth/jwks');
 * const result = await validateAccessToken(accessToken, jwks, {
 *   audience: 'EVE Online',
 *   issuers: ['login.eveonline.com', 'https://login.eveonline.com'],
 * });
 *
 * if (result.isOk()) {
 *   console.log(result.value.identityId, result.value.displayName);
 * }
 * ```
 */
export const validateAccessToken = async (
  token: string,
  jwks: JwksResolver,
  options: ValidationOptions,
  clock: Clock = Date.now
): Promise<Result<ValidatedClaims, ValidationError>> => {
  if (!isJwtFormat(token)) {
    return err(createMalformedTokenError('Token is not a JWT'));
  }

  let algorithm: string;
  try {
    const header = decodeProtectedHeader(token);
    if (typeof header.alg !== 'string') {
      return err(createMalformedTokenError('Token header is missing "alg"'));
    }
    algorithm = header.alg;
  } catch (error) {
    return err(createMalformedTokenError('Token header could not be decoded', error));
  }

  try {
    const { payload } = await jwtVerify(token, jwks, {
      algorithms: [algorithm],
      audience: options.audience,
      issuer: [...options.issuers],
      clockTolerance: options.clockToleranceSeconds ?? DEFAULT_CLOCK_TOLERANCE_SECONDS,
      currentDate: new Date(clock()),
    });

    return toValidatedClaims(payload);
  } catch (error) {
    return err(mapJoseError(error));
  }
};
