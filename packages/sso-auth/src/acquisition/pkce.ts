/**
 * PKCE (Proof Key for Code Exchange) per RFC 7636, S256 only.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { base64url } from 'jose';
import type { AuthError } from '../types.js';
import type { PkceChallenge } from './types.js';

/**
 * Characters allowed in a PKCE verifier (unreserved URI characters).
 * Per RFC 7636 Section 4.1: [A-Z] / [a-z] / [0-9] / "-" / "." / "_" / "~"
 */
const VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]+$/;

/** Minimum verifier length (RFC 7636 Section 4.1) */
const VERIFIER_MIN_LENGTH = 43;

/** Maximum verifier length (RFC 7636 Section 4.1) */
const VERIFIER_MAX_LENGTH = 128;

/** 32 bytes = 256 bits of entropy, encoding to 43 characters */
const VERIFIER_MIN_BYTES = 32;

/** 96 bytes encode to exactly 128 characters */
const VERIFIER_MAX_BYTES = 96;

/**
 * Generates a PKCE verifier: base64url (no padding) of random bytes.
 *
 * @param byteLength - Number of random bytes (default: 32, clamped to 32-96;
 *   32 when not finite)
 *
 * @example
 * ```typescript
 * const verifier = generatePkceVerifier();
 * // => "dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk"
 * ```
 */
export const generatePkceVerifier = (byteLength: number = VERIFIER_MIN_BYTES): string => {
  const requested = Number.isFinite(byteLength) ? Math.floor(byteLength) : VERIFIER_MIN_BYTES;
  const clamped = Math.max(VERIFIER_MIN_BYTES, Math.min(VERIFIER_MAX_BYTES, requested));
  const randomValues = new Uint8Array(clamped);
  crypto.getRandomValues(randomValues);
  return base64url.encode(randomValues);
};

/**
 * SHA-256 of the input, base64url-encoded without padding.
 */
const sha256Base64Url = async (input: string): Promise<string> => {
  const data = new TextEncoder().encode(input);
  const hashBuffer = await crypto.subtle.digest('SHA-256', data);
  return base64url.encode(new Uint8Array(hashBuffer));
};

/**
 * Creates a PKCE challenge from a verifier.
 *
 * Fails with `configuration_error` when the verifier violates RFC 7636
 * length or charset rules.
 *
 * @example
 * ```typescript
 * const result = await createPkceChallenge(verifier);
 *
 * if (result.isOk()) {
 *   const { challenge, method } = result.value;
 * }
 * ```
 */
export const createPkceChallenge = async (
  verifier: string
): Promise<Result<PkceChallenge, AuthError>> => {
  if (verifier.length < VERIFIER_MIN_LENGTH || verifier.length > VERIFIER_MAX_LENGTH) {
    return err({
      code: 'configuration_error',
      message: `PKCE verifier must be ${String(VERIFIER_MIN_LENGTH)}-${String(VERIFIER_MAX_LENGTH)} characters, got ${String(verifier.length)}`,
    });
  }

  if (!VERIFIER_PATTERN.test(verifier)) {
    return err({
      code: 'configuration_error',
      message: 'PKCE verifier contains characters outside the unreserved URI set',
    });
  }

  const challenge = await sha256Base64Url(verifier);
  return ok({ verifier, challenge, method: 'S256' });
};

/**
 * Checks that a verifier produces the given challenge.
 */
export const validatePkceChallenge = async (
  verifier: string,
  challenge: string
): Promise<boolean> => (await sha256Base64Url(verifier)) === challenge;

/**
 * Generates a complete PKCE pair.
 *
 * Generation has no failure mode short of the platform's random source
 * failing, which throws.
 *
 * @param byteLength - Random bytes behind the verifier (default: 32)
 */
export const generatePkceChallengePair = async (
  byteLength: number = VERIFIER_MIN_BYTES
): Promise<PkceChallenge> => {
  const verifier = generatePkceVerifier(byteLength);
  const challenge = await sha256Base64Url(verifier);
  return { verifier, challenge, method: 'S256' };
};
