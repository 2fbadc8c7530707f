// Main factory
export { createTokenValidator } from './token-validator.js';

// JWT verification
export { createJwks, isJwtFormat, parseIdentityId, validateAccessToken } from './jwt-validation.js';

// Scope utilities
export { parseScopes, joinScopes } from './scopes.js';

// Metadata discovery (RFC 8414)
export {
  DEFAULT_AUDIENCE,
  DEFAULT_METADATA_CACHE_TTL_MS,
  DEFAULT_METADATA_URL,
  DEFAULT_SSO_ENDPOINTS,
  createCachedMetadataFetcher,
  fetchServerMetadata,
  supportsPkceS256,
  toSsoEndpoints,
  validateServerMetadata,
} from './discovery.js';
export type { CachedMetadataFetcher } from './discovery.js';

// Types
export type {
  JwksResolver,
  OAuthServerMetadata,
  TokenValidator,
  TokenValidatorConfig,
  ValidatedClaims,
  ValidationError,
  ValidationErrorCode,
  ValidationOptions,
} from './types.js';
