import type { Result } from 'neverthrow';
import type { AuthError } from '../types.js';
import type { CharacterToken } from '../lifecycle/character-token.js';

/**
 * Persistent store of CharacterTokens. Each registered application owns its
 * tokens: entries are keyed by client id, then identity id, so the same
 * identity authorized under two applications is stored twice.
 *
 * A `put` that resolves Ok is durable before the next read. Implementations
 * hand out copies, never references to their own state.
 */
export interface TokenStore {
  /**
   * Gets the token an application holds for one identity.
   * @returns The token, or undefined when none is stored
   */
  readonly get: (
    clientId: string,
    identityId: number
  ) => Promise<Result<CharacterToken | undefined, AuthError>>;

  /**
   * Inserts or replaces the token of `token.clientId` and `token.identityId`.
   */
  readonly put: (token: CharacterToken) => Promise<Result<void, AuthError>>;

  /**
   * Lists the tokens of one application, or of every application when
   * `clientId` is omitted. Ordered by client id, then identity id.
   */
  readonly list: (clientId?: string) => Promise<Result<readonly CharacterToken[], AuthError>>;

  /**
   * Deletes the token an application holds for one identity.
   * @returns true if a token existed
   */
  readonly delete: (clientId: string, identityId: number) => Promise<Result<boolean, AuthError>>;
}
