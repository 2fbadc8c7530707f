import type { AuthError } from './types.js';
import type { ValidationError } from './validation/types.js';

/** Provider error codes that indicate a temporary condition on the provider side. */
const TRANSIENT_PROVIDER_ERRORS: readonly string[] = ['temporarily_unavailable', 'server_error'];

/** Provider error codes after which the stored credential is unusable. */
const PERMANENT_PROVIDER_ERRORS: readonly string[] = ['invalid_grant', 'invalid_client'];

/**
 * Attaches an identity id to an error.
 */
export const withIdentity = (error: AuthError, identityId: number): AuthError => ({
  ...error,
  identityId,
});

/**
 * Creates a `configuration_error`.
 */
export const createConfigurationError = (message: string, cause?: unknown): AuthError => ({
  code: 'configuration_error',
  message,
  cause,
});

/**
 * Creates a `storage_error`.
 */
export const createStorageError = (message: string, cause?: unknown): AuthError => ({
  code: 'storage_error',
  message,
  cause,
});

/**
 * Converts a token validation failure to a `token_invalid` AuthError.
 *
 * JWKS fetch failures are transport problems, not token problems, so they
 * become `network_error`.
 */
export const fromValidationError = (error: ValidationError): AuthError => {
  if (error.code === 'JWKS_ERROR') {
    return {
      code: 'network_error',
      message: `Failed to resolve signing keys: ${error.message}`,
      validationCode: error.code,
      cause: error.cause,
    };
  }

  return {
    code: 'token_invalid',
    message: error.message,
    validationCode: error.code,
    cause: error.cause,
  };
};

/**
 * Whether retrying the same operation later may succeed.
 *
 * @example
 * ```typescript
 * if (outcome.status === 'failure' && isRetryableError(outcome.error)) {
 *   scheduleRetry(outcome.identityId);
 * }
 * ```
 */
export const isRetryableError = (error: AuthError): boolean => {
  if (error.code === 'network_error') {
    return true;
  }

  if (error.code === 'provider_error') {
    if (error.providerError !== undefined && TRANSIENT_PROVIDER_ERRORS.includes(error.providerError)) {
      return true;
    }
    return error.status !== undefined && error.status >= 500;
  }

  return false;
};

/**
 * Whether the credential is permanently unusable and the user has to run the
 * interactive authorization flow again.
 */
export const requiresReauthentication = (error: AuthError): boolean => {
  if (error.code === 'token_invalid') {
    return true;
  }

  return (
    error.code === 'provider_error' &&
    error.providerError !== undefined &&
    PERMANENT_PROVIDER_ERRORS.includes(error.providerError)
  );
};

/**
 * Whether the error ended an interactive authorization attempt, which the
 * caller may simply start over.
 */
export const isInteractiveFlowError = (error: AuthError): boolean => {
  switch (error.code) {
    case 'csrf_mismatch':
    case 'callback_error':
    case 'callback_timeout':
    case 'callback_cancelled':
      return true;
    default:
      return false;
  }
};
