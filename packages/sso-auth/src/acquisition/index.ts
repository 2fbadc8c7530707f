/**
 * Interactive Authorization Code + PKCE flow and the token endpoint.
 *
 * @packageDocumentation
 */

// Types
export type {
  // PKCE
  PkceChallengeMethod,
  PkceChallenge,
  // Authorization request
  AuthorizationUrlParams,
  AuthorizationUrlResult,
  AuthorizationRequest,
  // Callback
  CallbackAddress,
  CallbackListener,
  CallbackListenerOptions,
  // Token endpoint
  OAuthToken,
  CodeExchangeParams,
  RefreshParams,
  RevokeParams,
  TokenClient,
  TokenClientConfig,
} from './types.js';
export type { UserAgentParts } from './user-agent.js';

// PKCE
export {
  generatePkceVerifier,
  createPkceChallenge,
  validatePkceChallenge,
  generatePkceChallengePair,
} from './pkce.js';

// Authorization request
export { generateState, statesMatch } from './state.js';
export { buildAuthorizationUrl, prepareAuthorizationRequest } from './authorization-url.js';

// Callback listener
export {
  DEFAULT_CALLBACK_PORT,
  DEFAULT_CALLBACK_TIMEOUT_MS,
  MAX_CALLBACK_TIMEOUT_MS,
  runCallbackListener,
  splitCallbackUrl,
} from './callback-listener.js';

// Token endpoint
export { createTokenClient } from './token-client.js';
export { buildUserAgent } from './user-agent.js';
