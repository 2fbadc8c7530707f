/**
 * SSO Auth - OAuth 2.0 Authorization Code + PKCE client and token upkeep
 *
 * @packageDocumentation
 */

// Public types
export type * from './types.js';

// ============================================================================
// Errors
// ============================================================================

export {
  createConfigurationError,
  createStorageError,
  fromValidationError,
  isInteractiveFlowError,
  isRetryableError,
  requiresReauthentication,
  withIdentity,
} from './errors.js';

// ============================================================================
// Interactive flow & token endpoint
// ============================================================================

export {
  buildAuthorizationUrl,
  buildUserAgent,
  createPkceChallenge,
  createTokenClient,
  DEFAULT_CALLBACK_PORT,
  DEFAULT_CALLBACK_TIMEOUT_MS,
  MAX_CALLBACK_TIMEOUT_MS,
  generatePkceChallengePair,
  generatePkceVerifier,
  generateState,
  prepareAuthorizationRequest,
  runCallbackListener,
  splitCallbackUrl,
  statesMatch,
  validatePkceChallenge,
} from './acquisition/index.js';
export type {
  AuthorizationRequest,
  AuthorizationUrlParams,
  AuthorizationUrlResult,
  CallbackAddress,
  CallbackListener,
  CallbackListenerOptions,
  CodeExchangeParams,
  OAuthToken,
  PkceChallenge,
  PkceChallengeMethod,
  RefreshParams,
  RevokeParams,
  TokenClient,
  TokenClientConfig,
  UserAgentParts,
} from './acquisition/index.js';

// ============================================================================
// Token validation & discovery
// ============================================================================

export {
  createCachedMetadataFetcher,
  createJwks,
  createTokenValidator,
  DEFAULT_AUDIENCE,
  DEFAULT_METADATA_URL,
  DEFAULT_SSO_ENDPOINTS,
  fetchServerMetadata,
  isJwtFormat,
  joinScopes,
  parseIdentityId,
  parseScopes,
  supportsPkceS256,
  toSsoEndpoints,
  validateAccessToken,
} from './validation/index.js';
export type {
  CachedMetadataFetcher,
  JwksResolver,
  OAuthServerMetadata,
  TokenValidator,
  TokenValidatorConfig,
  ValidatedClaims,
  ValidationError,
  ValidationErrorCode,
  ValidationOptions,
} from './validation/index.js';

// ============================================================================
// Token lifecycle & refresh
// ============================================================================

export {
  DEFAULT_REFRESH_BUFFER_MINUTES,
  MAX_REFRESH_BUFFER_MINUTES,
  isExpired,
  makeCharacterToken,
  minutesUntilExpiry,
  needsRefresh,
  tokenState,
  validateRefreshBuffer,
} from './lifecycle/index.js';
export type { CharacterToken, CharacterTokenTiming } from './lifecycle/index.js';

export {
  createRefreshOrchestrator,
  summarizeOutcomes,
  validateMaxConcurrency,
} from './refresh/index.js';
export type {
  RefreshManyOptions,
  RefreshOrchestrator,
  RefreshOrchestratorConfig,
  RefreshOutcome,
  RefreshSummary,
} from './refresh/index.js';

// ============================================================================
// Storage & session
// ============================================================================

export { createJsonFileTokenStore, createMemoryTokenStore } from './storage/index.js';
export type { TokenStore } from './storage/index.js';

export { createSsoSession } from './session/index.js';
export type {
  AuthenticateOptions,
  RefreshAllOptions,
  SsoSession,
  SsoSessionConfig,
} from './session/index.js';

// ============================================================================
// Infrastructure
// ============================================================================

export { loadSsoConfig, loadSsoConfigFromFile, PACKAGE_VERSION } from './config/index.js';
export type { SsoConfig } from './config/index.js';

export { createLogger } from './logging/index.js';
export type { Logger } from './logging/index.js';

export { createFetchClient } from './http/index.js';
export type { HttpClient, HttpClientOptions, HttpError, HttpRequest, HttpResponse } from './http/index.js';

export { createMemoryCache } from './cache/index.js';
export type { Cache } from './cache/index.js';
