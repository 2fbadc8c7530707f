/**
 * CSRF state tokens for the authorization request.
 *
 * @packageDocumentation
 */

/**
 * Characters allowed in the state parameter.
 * Alphanumeric only, so the value needs no URL escaping.
 */
const STATE_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Default length for state parameter.
 * 32 characters provides ~190 bits of entropy.
 */
const STATE_DEFAULT_LENGTH = 32;

/** Shortest state accepted */
const STATE_MIN_LENGTH = 16;

/**
 * Largest byte value that maps uniformly onto the charset; bytes at or above
 * it are redrawn.
 */
const UNBIASED_LIMIT = 256 - (256 % STATE_CHARSET.length);

/**
 * Generates a cryptographically secure state parameter.
 *
 * @param length - Length of the state string (default: 32, minimum: 16)
 *
 * @example
 * ```typescript
 * const state = generateState();
 * // => "aB3cD4eF5gH6iJ7kL8mN9oP0qR1sT2uV"
 * ```
 */
export const generateState = (length: number = STATE_DEFAULT_LENGTH): string => {
  const target = Math.max(STATE_MIN_LENGTH, Math.floor(length));
  let state = '';

  while (state.length < target) {
    const randomValues = new Uint8Array(target - state.length);
    crypto.getRandomValues(randomValues);

    for (const randomValue of randomValues) {
      if (randomValue < UNBIASED_LIMIT) {
        state += STATE_CHARSET.charAt(randomValue % STATE_CHARSET.length);
      }
    }
  }

  return state;
};

/**
 * Compares a received state to the expected one in constant time.
 */
export const statesMatch = (expected: string, received: string | null | undefined): boolean => {
  if (received === null || received === undefined || received.length !== expected.length) {
    return false;
  }

  let diff = 0;
  for (let i = 0; i < expected.length; i++) {
    diff |= expected.charCodeAt(i) ^ received.charCodeAt(i);
  }
  return diff === 0;
};
