import { describe, it, expect } from 'vitest';
import { errors } from 'jose';
import { createJwksError, createMalformedTokenError, mapJoseError } from './errors.js';

describe('mapJoseError', () => {
  describe('given an expired token error', () => {
    it('returns EXPIRED_TOKEN', () => {
      const error = new errors.JWTExpired('"exp" claim timestamp check failed', { exp: 1 });

      const result = mapJoseError(error);

      expect(result.code).toBe('EXPIRED_TOKEN');
      expect(result.cause).toBe(error);
    });
  });

  describe('given a claim validation error', () => {
    it('returns INVALID_ISSUER for the iss claim', () => {
      const error = new errors.JWTClaimValidationFailed('unexpected "iss" claim value', {}, 'iss');

      expect(mapJoseError(error).code).toBe('INVALID_ISSUER');
    });

    it('returns INVALID_AUDIENCE for the aud claim', () => {
      const error = new errors.JWTClaimValidationFailed('unexpected "aud" claim value', {}, 'aud');

      expect(mapJoseError(error).code).toBe('INVALID_AUDIENCE');
    });

    it('returns MALFORMED_TOKEN for other claims', () => {
      const error = new errors.JWTClaimValidationFailed('"nbf" claim timestamp check failed', {}, 'nbf');

      const result = mapJoseError(error);

      expect(result.code).toBe('MALFORMED_TOKEN');
      expect(result.message).toBe('"nbf" claim timestamp check failed');
    });
  });

  describe('given a signature failure', () => {
    it('returns INVALID_SIGNATURE', () => {
      expect(mapJoseError(new errors.JWSSignatureVerificationFailed()).code).toBe(
        'INVALID_SIGNATURE'
      );
    });
  });

  describe('given no matching key', () => {
    it('returns KEY_NOT_FOUND', () => {
      expect(mapJoseError(new errors.JWKSNoMatchingKey()).code).toBe('KEY_NOT_FOUND');
    });
  });

  describe('given a key set timeout', () => {
    it('returns JWKS_ERROR', () => {
      expect(mapJoseError(new errors.JWKSTimeout()).code).toBe('JWKS_ERROR');
    });
  });

  describe('given a plain Error from the key set fetch', () => {
    it('returns JWKS_ERROR with the original message', () => {
      const result = mapJoseError(new Error('getaddrinfo ENOTFOUND sso.example.com'));

      expect(result.code).toBe('JWKS_ERROR');
      expect(result.message).toBe('getaddrinfo ENOTFOUND sso.example.com');
    });
  });

  describe('given a non-Error value', () => {
    it('returns MALFORMED_TOKEN', () => {
      expect(mapJoseError('boom').code).toBe('MALFORMED_TOKEN');
    });
  });
});

describe('createJwksError', () => {
  it('creates a JWKS_ERROR with the cause', () => {
    const cause = new Error('socket hang up');

    expect(createJwksError('Key set unavailable', cause)).toEqual({
      code: 'JWKS_ERROR',
      message: 'Key set unavailable',
      cause,
    });
  });
});

describe('createMalformedTokenError', () => {
  it('creates a MALFORMED_TOKEN error', () => {
    expect(createMalformedTokenError('Token is not a JWT').code).toBe('MALFORMED_TOKEN');
  });
});
