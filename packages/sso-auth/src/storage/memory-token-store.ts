import { ok } from 'neverthrow';
import type { CharacterToken } from '../lifecycle/character-token.js';
import type { TokenStore } from './types.js';

/**
 * Copies a token so callers never share the store's instance.
 */
export const copyToken = (token: CharacterToken): CharacterToken => ({
  ...token,
  scopes: [...token.scopes],
});

/**
 * Map key of a token. Client ids never contain a newline.
 */
export const tokenKey = (clientId: string, identityId: number): string =>
  `${clientId}\n${String(identityId)}`;

/**
 * Orders tokens by client id, then identity id.
 */
export const compareTokens = (a: CharacterToken, b: CharacterToken): number =>
  a.clientId === b.clientId ? a.identityId - b.identityId : a.clientId < b.clientId ? -1 : 1;

/**
 * Tokens of `clientId` (all tokens when undefined), sorted and copied.
 */
export const selectTokens = (
  tokens: Iterable<CharacterToken>,
  clientId: string | undefined
): CharacterToken[] =>
  [...tokens]
    .filter((token) => clientId === undefined || token.clientId === clientId)
    .sort(compareTokens)
    .map(copyToken);

/**
 * Creates an in-memory token store. Tokens are lost when the process exits.
 *
 * @param initial - Tokens to start with
 *
 * @example
 * ```typescript
 * const store = createMemoryTokenStore();
 * await store.put(token);
 * const result = await store.get(token.clientId, token.identityId);
 * ```
 */
export const createMemoryTokenStore = (initial: readonly CharacterToken[] = []): TokenStore => {
  const tokens = new Map<string, CharacterToken>(
    initial.map((token) => [tokenKey(token.clientId, token.identityId), copyToken(token)])
  );

  return {
    get: (clientId, identityId) => {
      const token = tokens.get(tokenKey(clientId, identityId));
      return Promise.resolve(ok(token === undefined ? undefined : copyToken(token)));
    },

    put: (token) => {
      tokens.set(tokenKey(token.clientId, token.identityId), copyToken(token));
      return Promise.resolve(ok(undefined));
    },

    list: (clientId) => Promise.resolve(ok(selectTokens(tokens.values(), clientId))),

    delete: (clientId, identityId) =>
      Promise.resolve(ok(tokens.delete(tokenKey(clientId, identityId)))),
  };
};
