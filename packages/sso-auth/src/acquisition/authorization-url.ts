/**
 * Authorization URL builder for the Authorization Code + PKCE flow.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import type { AuthError, SsoCredentials } from '../types.js';
import { createConfigurationError } from '../errors.js';
import { joinScopes } from '../validation/scopes.js';
import { generatePkceChallengePair } from './pkce.js';
import { generateState } from './state.js';
import type {
  AuthorizationRequest,
  AuthorizationUrlParams,
  AuthorizationUrlResult,
} from './types.js';

/**
 * Parses an endpoint URL, failing with `configuration_error`.
 */
const parseEndpoint = (endpoint: string): Result<URL, AuthError> => {
  try {
    return ok(new URL(endpoint));
  } catch (error) {
    return err(createConfigurationError(`Authorization endpoint is not a valid URL: ${endpoint}`, error));
  }
};

/**
 * Builds the provider redirect URL and a fresh CSRF state.
 *
 * No network call is made. Scopes are space-joined in the given order.
 *
 * @example
 * ```typescript
 * const pkce = await generatePkceChallengePair();
 * const result = buildAuthorizationUrl({
 *   clientId: 'my-client-id',
 *   scopes: ['publicData'],
 *   redirectUri: 'http://localhost:8080/callback',
 *   authorizationEndpoint: 'https://login.eveonline.com/v2/oauth/authorize',
 *   challenge: pkce,
 * });
 *
 * if (result.isOk()) {
 *   // Send the user to result.value.ssoUrl, keep result.value.state for the callback
 * }
 * ```
 */
export const buildAuthorizationUrl = (
  params: AuthorizationUrlParams
): Result<AuthorizationUrlResult, AuthError> => {
  const urlResult = parseEndpoint(params.authorizationEndpoint);
  if (urlResult.isErr()) {
    return err(urlResult.error);
  }

  const url = urlResult.value;
  const state = params.state ?? generateState();

  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', params.clientId);
  url.searchParams.set('redirect_uri', params.redirectUri);
  url.searchParams.set('scope', joinScopes(params.scopes));
  url.searchParams.set('state', state);
  url.searchParams.set('code_challenge', params.challenge.challenge);
  url.searchParams.set('code_challenge_method', params.challenge.method);

  return ok({ ssoUrl: url.toString(), state });
};

/**
 * Starts one authorization attempt: generates the PKCE pair and state and
 * builds the redirect URL from the application credentials.
 */
export const prepareAuthorizationRequest = async (
  credentials: SsoCredentials,
  authorizationEndpoint: string
): Promise<Result<AuthorizationRequest, AuthError>> => {
  const pkce = await generatePkceChallengePair();

  const urlResult = buildAuthorizationUrl({
    clientId: credentials.clientId,
    scopes: credentials.scopes,
    redirectUri: credentials.callbackUrl,
    authorizationEndpoint,
    challenge: pkce,
  });

  if (urlResult.isErr()) {
    return err(urlResult.error);
  }

  return ok({
    state: urlResult.value.state,
    ssoUrl: urlResult.value.ssoUrl,
    codeVerifier: pkce.verifier,
    redirectUri: credentials.callbackUrl,
    scopes: [...credentials.scopes],
  });
};
