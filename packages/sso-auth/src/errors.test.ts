import { describe, it, expect } from 'vitest';
import {
  fromValidationError,
  isInteractiveFlowError,
  isRetryableError,
  requiresReauthentication,
  withIdentity,
} from './errors.js';
import type { AuthError } from './types.js';

const providerError = (providerCode: string | undefined, status: number): AuthError => ({
  code: 'provider_error',
  message: 'rejected',
  providerError: providerCode,
  status,
});

describe('withIdentity', () => {
  it('returns a copy carrying the identity id', () => {
    const error: AuthError = { code: 'network_error', message: 'read ECONNRESET' };

    const tagged = withIdentity(error, 98765);

    expect(tagged).toEqual({ code: 'network_error', message: 'read ECONNRESET', identityId: 98765 });
    expect(error.identityId).toBeUndefined();
  });
});

describe('fromValidationError', () => {
  describe('given a token problem', () => {
    it('returns token_invalid with the validation code', () => {
      const error = fromValidationError({ code: 'INVALID_AUDIENCE', message: 'wrong aud' });

      expect(error.code).toBe('token_invalid');
      expect(error.validationCode).toBe('INVALID_AUDIENCE');
      expect(error.message).toBe('wrong aud');
    });
  });

  describe('given a key set fetch failure', () => {
    it('returns network_error', () => {
      const error = fromValidationError({ code: 'JWKS_ERROR', message: 'timed out' });

      expect(error.code).toBe('network_error');
      expect(error.validationCode).toBe('JWKS_ERROR');
    });
  });
});

describe('isRetryableError', () => {
  it('returns true for network errors', () => {
    expect(isRetryableError({ code: 'network_error', message: 'offline' })).toBe(true);
  });

  it('returns true for provider 5xx and transient provider codes', () => {
    expect(isRetryableError(providerError(undefined, 503))).toBe(true);
    expect(isRetryableError(providerError('temporarily_unavailable', 400))).toBe(true);
  });

  it('returns false for a rejected grant', () => {
    expect(isRetryableError(providerError('invalid_grant', 400))).toBe(false);
  });

  it('returns false for interactive flow errors', () => {
    expect(isRetryableError({ code: 'csrf_mismatch', message: 'state' })).toBe(false);
  });
});

describe('requiresReauthentication', () => {
  it('returns true for invalid_grant and invalid_client', () => {
    expect(requiresReauthentication(providerError('invalid_grant', 400))).toBe(true);
    expect(requiresReauthentication(providerError('invalid_client', 401))).toBe(true);
  });

  it('returns true for an invalid token', () => {
    expect(requiresReauthentication({ code: 'token_invalid', message: 'bad signature' })).toBe(true);
  });

  it('returns false for transient failures', () => {
    expect(requiresReauthentication(providerError(undefined, 502))).toBe(false);
    expect(requiresReauthentication({ code: 'network_error', message: 'offline' })).toBe(false);
  });
});

describe('isInteractiveFlowError', () => {
  it('returns true for the callback outcomes', () => {
    for (const code of ['csrf_mismatch', 'callback_error', 'callback_timeout', 'callback_cancelled'] as const) {
      expect(isInteractiveFlowError({ code, message: code })).toBe(true);
    }
  });

  it('returns false for token endpoint failures', () => {
    expect(isInteractiveFlowError(providerError('invalid_grant', 400))).toBe(false);
  });
});
