/**
 * Access tokens signed at test time, and local key sets to verify them.
 */

import {
  SignJWT,
  createLocalJWKSet,
  exportJWK,
  generateKeyPair,
  type JWK,
  type KeyLike,
} from 'jose';
import type { JwksResolver } from '../validation/types.js';
import {
  FIXED_NOW_MS,
  SCOPE_PUBLIC_DATA,
  TEST_AUDIENCE,
  TEST_CLIENT_ID,
  TEST_DISPLAY_NAME,
  TEST_ISSUER_HOST,
  TEST_SUBJECT,
  TOKEN_LIFETIME_SECONDS,
} from './fixtures.js';

export interface TestSigningKey {
  readonly kid: string;
  readonly privateKey: KeyLike;
  readonly publicJwk: JWK;
}

/**
 * Generates an RS256 key pair with a key id.
 */
export const createSigningKey = async (kid = 'test-key-1'): Promise<TestSigningKey> => {
  const { privateKey, publicKey } = await generateKeyPair('RS256');
  const jwk = await exportJWK(publicKey);
  return { kid, privateKey, publicJwk: { ...jwk, kid, alg: 'RS256', use: 'sig' } };
};

/**
 * Local key set holding the public halves of the given keys.
 */
export const createTestJwks = (...keys: readonly TestSigningKey[]): JwksResolver =>
  createLocalJWKSet({ keys: keys.map((key) => key.publicJwk) });

/**
 * Claims of a test access token. Times are epoch seconds.
 */
export interface TestTokenClaims {
  readonly sub?: string;
  readonly name?: string;
  readonly scp?: string | readonly string[];
  readonly iss?: string;
  readonly aud?: string | readonly string[];
  readonly iat?: number;
  readonly exp?: number;
}

/**
 * Signs an access token shaped like the provider's. Defaults: the test
 * identity, issued at FIXED_NOW_MS, valid for TOKEN_LIFETIME_SECONDS.
 */
export const signAccessToken = (
  key: TestSigningKey,
  claims: TestTokenClaims = {}
): Promise<string> => {
  const iat = claims.iat ?? Math.floor(FIXED_NOW_MS / 1000);
  const scp = claims.scp ?? SCOPE_PUBLIC_DATA;
  const aud = claims.aud ?? [TEST_CLIENT_ID, TEST_AUDIENCE];

  return new SignJWT({
    name: claims.name ?? TEST_DISPLAY_NAME,
    scp: typeof scp === 'string' ? scp : [...scp],
  })
    .setProtectedHeader({ alg: 'RS256', kid: key.kid, typ: 'JWT' })
    .setSubject(claims.sub ?? TEST_SUBJECT)
    .setIssuer(claims.iss ?? TEST_ISSUER_HOST)
    .setAudience(typeof aud === 'string' ? aud : [...aud])
    .setIssuedAt(iat)
    .setExpirationTime(claims.exp ?? iat + TOKEN_LIFETIME_SECONDS)
    .sign(key.privateKey);
};
