import { errors } from 'jose';
import type { ValidationError } from './types.js';

/**
 * Maps jose library errors to ValidationError.
 *
 * Errors that are not jose errors come from fetching the remote key set
 * (DNS, connection reset, ...) and map to `JWKS_ERROR`.
 *
 * @param error - The error thrown by jose
 * @returns A ValidationError object
 */
export const mapJoseError = (error: unknown): ValidationError => {
  if (!(error instanceof Error)) {
    return {
      code: 'MALFORMED_TOKEN',
      message: 'Unknown token validation error',
      cause: error,
    };
  }

  if (!(error instanceof errors.JOSEError)) {
    return createJwksError(error.message || 'Failed to fetch JSON Web Key Set', error);
  }

  switch (error.code) {
    case errors.JWTExpired.code:
      return { code: 'EXPIRED_TOKEN', message: 'Token has expired', cause: error };
    case errors.JWTClaimValidationFailed.code:
      if (error instanceof errors.JWTClaimValidationFailed) {
        if (error.claim === 'iss') {
          return { code: 'INVALID_ISSUER', message: 'Token issuer is not trusted', cause: error };
        }
        if (error.claim === 'aud') {
          return {
            code: 'INVALID_AUDIENCE',
            message: 'Token audience does not match',
            cause: error,
          };
        }
      }
      return { code: 'MALFORMED_TOKEN', message: error.message, cause: error };
    case errors.JWSSignatureVerificationFailed.code:
    case errors.JWKSMultipleMatchingKeys.code:
      return {
        code: 'INVALID_SIGNATURE',
        message: 'Token signature verification failed',
        cause: error,
      };
    case errors.JWKSNoMatchingKey.code:
      return {
        code: 'KEY_NOT_FOUND',
        message: 'No key in the JSON Web Key Set matches the token header',
        cause: error,
      };
    case errors.JWKSTimeout.code:
    case errors.JWKSInvalid.code:
    case errors.JOSEError.code:
      return createJwksError(error.message, error);
    default:
      return { code: 'MALFORMED_TOKEN', message: 'Token format is invalid', cause: error };
  }
};

/**
 * Creates a ValidationError for JWKS failures.
 *
 * @param message - Error message
 * @param cause - Original error
 * @returns A ValidationError object
 */
export const createJwksError = (message: string, cause?: unknown): ValidationError => ({
  code: 'JWKS_ERROR',
  message,
  cause,
});

/**
 * Creates a ValidationError for tokens that verify but lack required claims.
 */
export const createMalformedTokenError = (message: string, cause?: unknown): ValidationError => ({
  code: 'MALFORMED_TOKEN',
  message,
  cause,
});
