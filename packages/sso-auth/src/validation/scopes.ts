/**
 * Parses a scope value into an array.
 * Handles space-separated strings (RFC 6749) as well as arrays, which is how
 * the provider encodes the `scp` claim when more than one scope is granted.
 *
 * @param scope - Space-separated scope string, array of scopes, or a missing claim
 * @returns Array of individual scopes; non-string entries are dropped
 */
export const parseScopes = (scope: unknown): readonly string[] => {
  if (typeof scope === 'string') {
    return scope
      .split(' ')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }

  if (Array.isArray(scope)) {
    return scope
      .filter((s): s is string => typeof s === 'string')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }

  return [];
};

/**
 * Joins scopes into the space-separated form used on the wire.
 * Order is preserved.
 */
export const joinScopes = (scopes: readonly string[]): string => scopes.join(' ');
