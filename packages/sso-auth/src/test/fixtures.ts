/**
 * Shared test fixtures and constants.
 */

import type { SsoCredentials, SsoEndpoints } from '../types.js';
import type { OAuthToken } from '../acquisition/types.js';
import type { CharacterToken } from '../lifecycle/character-token.js';
import type { OAuthServerMetadata, ValidatedClaims } from '../validation/types.js';

// ============================================================================
// Time Constants
// ============================================================================

/** One minute in milliseconds */
export const ONE_MINUTE_MS = 60 * 1000;

/** One hour in milliseconds */
export const ONE_HOUR_MS = 60 * ONE_MINUTE_MS;

/** Fixed "now" for deterministic tests: 2025-01-15T12:00:00Z */
export const FIXED_NOW_MS = Date.UTC(2025, 0, 15, 12, 0, 0);

/** Access token lifetime the provider issues, in seconds */
export const TOKEN_LIFETIME_SECONDS = 1200;

// ============================================================================
// URL Constants
// ============================================================================

export const TEST_SSO_URL = 'https://sso.example.com';
export const TEST_ISSUER = TEST_SSO_URL;
export const TEST_ISSUER_HOST = 'sso.example.com';
export const TEST_AUTHORIZATION_ENDPOINT = `${TEST_SSO_URL}/v2/oauth/authorize`;
export const TEST_TOKEN_ENDPOINT = `${TEST_SSO_URL}/v2/oauth/token`;
export const TEST_REVOCATION_ENDPOINT = `${TEST_SSO_URL}/v2/oauth/revoke`;
export const TEST_JWKS_URI = `${TEST_SSO_URL}/oauth/jwks`;
export const TEST_METADATA_URL = `${TEST_SSO_URL}/.well-known/oauth-authorization-server`;
export const TEST_CALLBACK_URL = 'http://localhost:8080/callback';

// ============================================================================
// Client Configuration
// ============================================================================

export const TEST_CLIENT_ID = 'test-client-id';
export const TEST_USER_AGENT = 'sso-auth-tests/1.0.0 (test@example.com)';
export const TEST_AUDIENCE = 'EVE Online';

// ============================================================================
// Identity & Scopes
// ============================================================================

export const TEST_IDENTITY_ID = 98765;
export const TEST_DISPLAY_NAME = 'Test Pilot';
export const TEST_SUBJECT = `CHARACTER:EVE:${String(TEST_IDENTITY_ID)}`;

export const SCOPE_PUBLIC_DATA = 'publicData';
export const SCOPE_SKILLS = 'esi-skills.read_skills.v1';
export const SCOPE_WALLET = 'esi-wallet.read_character_wallet.v1';

// ============================================================================
// Factories
// ============================================================================

export const TEST_CREDENTIALS: SsoCredentials = {
  clientId: TEST_CLIENT_ID,
  callbackUrl: TEST_CALLBACK_URL,
  scopes: [SCOPE_PUBLIC_DATA],
};

export const TEST_ENDPOINTS: SsoEndpoints = {
  authorizationEndpoint: TEST_AUTHORIZATION_ENDPOINT,
  tokenEndpoint: TEST_TOKEN_ENDPOINT,
  jwksUri: TEST_JWKS_URI,
  revocationEndpoint: TEST_REVOCATION_ENDPOINT,
  issuers: [TEST_ISSUER_HOST, TEST_ISSUER],
  audience: TEST_AUDIENCE,
};

/**
 * Creates a valid RFC 8414 metadata document.
 */
export const createServerMetadata = (
  overrides: Partial<OAuthServerMetadata> = {}
): OAuthServerMetadata => ({
  issuer: TEST_ISSUER,
  authorization_endpoint: TEST_AUTHORIZATION_ENDPOINT,
  token_endpoint: TEST_TOKEN_ENDPOINT,
  jwks_uri: TEST_JWKS_URI,
  revocation_endpoint: TEST_REVOCATION_ENDPOINT,
  response_types_supported: ['code', 'token'],
  code_challenge_methods_supported: ['S256'],
  ...overrides,
});

/**
 * Creates a token endpoint response.
 */
export const createOAuthToken = (overrides: Partial<OAuthToken> = {}): OAuthToken => ({
  access_token: 'access-token-1',
  refresh_token: 'refresh-token-1',
  token_type: 'Bearer',
  expires_in: TOKEN_LIFETIME_SECONDS,
  ...overrides,
});

/**
 * Creates validated claims.
 */
export const createClaims = (overrides: Partial<ValidatedClaims> = {}): ValidatedClaims => ({
  identityId: TEST_IDENTITY_ID,
  displayName: TEST_DISPLAY_NAME,
  scopes: [SCOPE_PUBLIC_DATA],
  subject: TEST_SUBJECT,
  issuer: TEST_ISSUER_HOST,
  audience: [TEST_CLIENT_ID, TEST_AUDIENCE],
  expiresAt: FIXED_NOW_MS + TOKEN_LIFETIME_SECONDS * 1000,
  ...overrides,
});

/**
 * Creates a stored token that expires 20 minutes after FIXED_NOW_MS.
 */
export const createCharacterToken = (overrides: Partial<CharacterToken> = {}): CharacterToken => ({
  identityId: TEST_IDENTITY_ID,
  displayName: TEST_DISPLAY_NAME,
  accessToken: 'stored-access-token',
  refreshToken: 'stored-refresh-token',
  expiresAt: FIXED_NOW_MS + TOKEN_LIFETIME_SECONDS * 1000,
  scopes: [SCOPE_PUBLIC_DATA],
  tokenType: 'Bearer',
  clientId: TEST_CLIENT_ID,
  createdAt: FIXED_NOW_MS - ONE_HOUR_MS,
  updatedAt: FIXED_NOW_MS - ONE_HOUR_MS,
  ...overrides,
});
