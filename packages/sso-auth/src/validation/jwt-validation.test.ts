import { describe, it, expect, beforeAll } from 'vitest';
import { isJwtFormat, parseIdentityId, validateAccessToken } from './jwt-validation.js';
import type { JwksResolver, ValidationOptions } from './types.js';
import {
  createSigningKey,
  createTestJwks,
  signAccessToken,
  type TestSigningKey,
} from '../test/jwt.js';
import {
  FIXED_NOW_MS,
  SCOPE_PUBLIC_DATA,
  SCOPE_SKILLS,
  TEST_AUDIENCE,
  TEST_CLIENT_ID,
  TEST_DISPLAY_NAME,
  TEST_IDENTITY_ID,
  TEST_ISSUER,
  TEST_ISSUER_HOST,
  TEST_SUBJECT,
  TOKEN_LIFETIME_SECONDS,
} from '../test/fixtures.js';

const OPTIONS: ValidationOptions = {
  audience: TEST_AUDIENCE,
  issuers: [TEST_ISSUER_HOST, TEST_ISSUER],
};

const clock = (): number => FIXED_NOW_MS;

const NOW_SECONDS = Math.floor(FIXED_NOW_MS / 1000);

// ============================================================================
// isJwtFormat Tests
// ============================================================================

describe('isJwtFormat', () => {
  describe('given valid JWT structure', () => {
    it('returns true for three base64url parts', () => {
      expect(isJwtFormat('abc_def-ghi.jkl_mno-pqr.stu_vwx-yz0')).toBe(true);
    });
  });

  describe('given invalid JWT structure', () => {
    it('returns false for two parts', () => {
      expect(isJwtFormat('header.payload')).toBe(false);
    });

    it('returns false for an empty part', () => {
      expect(isJwtFormat('header..signature')).toBe(false);
    });

    it('returns false for characters outside base64url', () => {
      expect(isJwtFormat('head+er.pay/load.sig=')).toBe(false);
    });
  });
});

// ============================================================================
// parseIdentityId Tests
// ============================================================================

describe('parseIdentityId', () => {
  describe('given a provider subject', () => {
    it('returns the trailing segment as a number', () => {
      const result = parseIdentityId('CHARACTER:EVE:98765');

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toBe(98765);
      }
    });
  });

  describe('given a bare numeric subject', () => {
    it('returns the number', () => {
      const result = parseIdentityId('2112625428');

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toBe(2112625428);
      }
    });
  });

  describe('given a non-numeric trailing segment', () => {
    it('returns MALFORMED_TOKEN', () => {
      const result = parseIdentityId('CHARACTER:EVE:pilot');

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('MALFORMED_TOKEN');
      }
    });
  });

  describe('given a trailing colon', () => {
    it('returns MALFORMED_TOKEN', () => {
      const result = parseIdentityId('CHARACTER:EVE:');

      expect(result.isErr()).toBe(true);
    });
  });
});

// ============================================================================
// validateAccessToken Tests
// ============================================================================

describe('validateAccessToken', () => {
  let signingKey: TestSigningKey;
  let jwks: JwksResolver;

  beforeAll(async () => {
    signingKey = await createSigningKey('test-key-1');
    jwks = createTestJwks(signingKey);
  });

  describe('given a valid token', () => {
    it('returns the identity claims', async () => {
      // Arrange
      const token = await signAccessToken(signingKey);

      // Act
      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      // Assert
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          identityId: TEST_IDENTITY_ID,
          displayName: TEST_DISPLAY_NAME,
          scopes: [SCOPE_PUBLIC_DATA],
          subject: TEST_SUBJECT,
          issuer: TEST_ISSUER_HOST,
          audience: [TEST_CLIENT_ID, TEST_AUDIENCE],
          expiresAt: FIXED_NOW_MS + TOKEN_LIFETIME_SECONDS * 1000,
        });
      }
    });

    it('reads multiple scopes from an scp array', async () => {
      const token = await signAccessToken(signingKey, { scp: [SCOPE_PUBLIC_DATA, SCOPE_SKILLS] });

      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.scopes).toEqual([SCOPE_PUBLIC_DATA, SCOPE_SKILLS]);
      }
    });

    it('accepts the URL form of the issuer', async () => {
      const token = await signAccessToken(signingKey, { iss: TEST_ISSUER });

      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      expect(result.isOk()).toBe(true);
    });

    it('accepts a single string audience', async () => {
      const token = await signAccessToken(signingKey, { aud: TEST_AUDIENCE });

      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.audience).toEqual([TEST_AUDIENCE]);
      }
    });
  });

  describe('given an expired token', () => {
    it('returns EXPIRED_TOKEN', async () => {
      const token = await signAccessToken(signingKey, {
        iat: NOW_SECONDS - 3600,
        exp: NOW_SECONDS - 60,
      });

      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('EXPIRED_TOKEN');
      }
    });
  });

  describe('given a token expired by less than the clock tolerance', () => {
    it('accepts the token', async () => {
      const token = await signAccessToken(signingKey, {
        iat: NOW_SECONDS - 1200,
        exp: NOW_SECONDS - 5,
      });

      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      expect(result.isOk()).toBe(true);
    });
  });

  describe('given a wrong audience', () => {
    it('returns INVALID_AUDIENCE', async () => {
      const token = await signAccessToken(signingKey, { aud: ['another-client', 'Other Game'] });

      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('INVALID_AUDIENCE');
      }
    });
  });

  describe('given an untrusted issuer', () => {
    it('returns INVALID_ISSUER', async () => {
      const token = await signAccessToken(signingKey, { iss: 'https://sso.attacker.example' });

      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('INVALID_ISSUER');
      }
    });
  });

  describe('given a token signed by a key missing from the key set', () => {
    it('returns KEY_NOT_FOUND and no claims', async () => {
      // Arrange
      const foreignKey = await createSigningKey('unknown-key');
      const token = await signAccessToken(foreignKey);

      // Act
      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      // Assert
      expect(result.isOk()).toBe(false);
      if (result.isErr()) {
        expect(result.error.code).toBe('KEY_NOT_FOUND');
      }
    });
  });

  describe('given a token whose kid names a different key', () => {
    it('returns INVALID_SIGNATURE', async () => {
      const impostorKey = await createSigningKey('test-key-1');
      const token = await signAccessToken(impostorKey);

      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('INVALID_SIGNATURE');
      }
    });
  });

  describe('given a subject without a numeric id', () => {
    it('returns MALFORMED_TOKEN', async () => {
      const token = await signAccessToken(signingKey, { sub: 'CHARACTER:EVE:unknown' });

      const result = await validateAccessToken(token, jwks, OPTIONS, clock);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('MALFORMED_TOKEN');
      }
    });
  });

  describe('given a string that is not a JWT', () => {
    it('returns MALFORMED_TOKEN', async () => {
      const result = await validateAccessToken('opaque-access-token', jwks, OPTIONS, clock);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('MALFORMED_TOKEN');
      }
    });
  });
});
