/**
 * Token client for the provider's token and revocation endpoints.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import type { AuthError } from '../types.js';
import type { HttpClient, HttpError } from '../http/types.js';
import { createFetchClient } from '../http/fetch-client.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type {
  CodeExchangeParams,
  OAuthToken,
  RefreshParams,
  RevokeParams,
  TokenClient,
  TokenClientConfig,
} from './types.js';

/**
 * Successful token endpoint response. `refresh_token` is optional on the
 * wire because RFC 6749 lets a refresh response omit it.
 */
const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  token_type: z.string().min(1).default('Bearer'),
  expires_in: z.number().positive(),
});

/**
 * OAuth error response body (RFC 6749 Section 5.2).
 */
const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * Maps a failed HTTP call to an AuthError.
 * Non-2xx and unparseable responses are provider errors; a failure before the
 * whole response arrived is a network error.
 */
const toAuthError = (operation: string, error: HttpError): AuthError => {
  if (error.type === 'network' || error.type === 'timeout') {
    return {
      code: 'network_error',
      message: `${operation} failed: ${error.message}`,
      cause: error,
    };
  }

  const parsed = oauthErrorSchema.safeParse(error.body);
  if (parsed.success) {
    return {
      code: 'provider_error',
      message: `${operation} rejected: ${parsed.data.error_description ?? parsed.data.error}`,
      providerError: parsed.data.error,
      errorDescription: parsed.data.error_description,
      status: error.status,
      cause: error,
    };
  }

  return {
    code: 'provider_error',
    message: `${operation} rejected: ${error.message}`,
    status: error.status,
    cause: error,
  };
};

/**
 * Creates a token client.
 *
 * Requests are form-encoded and carry the configured User-Agent. Public
 * client: `client_id` goes in the body and no secret is sent.
 *
 * @param config - Token client configuration
 * @param httpClient - HTTP client (optional)
 * @param logger - Logger (optional)
 *
 * @example
 * ```typescript
 * const client = createTokenClient({ userAgent: 'my-app/1.0.0 (me@example.com)' });
 *
 * const result = await client.exchangeCode({
 *   clientId: 'my-client-id',
 *   code: 'code_from_callback',
 *   codeVerifier: request.codeVerifier,
 *   tokenEndpoint: 'https://login.eveonline.com/v2/oauth/token',
 * });
 *
 * if (result.isOk()) {
 *   console.log('Expires in', result.value.expires_in);
 * }
 * ```
 */
export const createTokenClient = (
  config: TokenClientConfig,
  httpClient: HttpClient = createFetchClient(),
  logger: Logger = createLogger('token-client')
): TokenClient => {
  const formHeaders = {
    'Content-Type': 'application/x-www-form-urlencoded',
    'User-Agent': config.userAgent,
  };

  /**
   * Posts a grant to the token endpoint and validates the response.
   * `fallbackRefreshToken` covers refresh responses that omit a new refresh token.
   */
  const requestToken = async (
    operation: string,
    tokenEndpoint: string,
    form: Record<string, string>,
    fallbackRefreshToken?: string
  ): Promise<Result<OAuthToken, AuthError>> => {
    const response = await httpClient.json({
      url: tokenEndpoint,
      method: 'POST',
      headers: formHeaders,
      body: new URLSearchParams(form).toString(),
    });

    if (response.isErr()) {
      const error = toAuthError(operation, response.error);
      logger.warn(
        { grantType: form['grant_type'], errorCode: error.code, providerError: error.providerError },
        'token request failed'
      );
      return err(error);
    }

    const parsed = tokenResponseSchema.safeParse(response.value.body);
    if (!parsed.success) {
      return err({
        code: 'provider_error',
        message: `${operation} returned an invalid token response: ${parsed.error.message}`,
        status: response.value.status,
        cause: parsed.error,
      });
    }

    const refreshToken = parsed.data.refresh_token ?? fallbackRefreshToken;
    if (refreshToken === undefined) {
      return err({
        code: 'provider_error',
        message: `${operation} response did not include a refresh token`,
        status: response.value.status,
      });
    }

    logger.debug({ grantType: form['grant_type'], expiresIn: parsed.data.expires_in }, 'token issued');

    return ok({
      access_token: parsed.data.access_token,
      refresh_token: refreshToken,
      token_type: parsed.data.token_type,
      expires_in: parsed.data.expires_in,
    });
  };

  const exchangeCode = (params: CodeExchangeParams): Promise<Result<OAuthToken, AuthError>> =>
    requestToken('Code exchange', params.tokenEndpoint, {
      grant_type: 'authorization_code',
      client_id: params.clientId,
      code: params.code,
      code_verifier: params.codeVerifier,
    });

  const refresh = (params: RefreshParams): Promise<Result<OAuthToken, AuthError>> =>
    requestToken(
      'Token refresh',
      params.tokenEndpoint,
      {
        grant_type: 'refresh_token',
        client_id: params.clientId,
        refresh_token: params.refreshToken,
      },
      params.refreshToken
    );

  const revoke = async (params: RevokeParams): Promise<Result<void, AuthError>> => {
    const response = await httpClient.text({
      url: params.revocationEndpoint,
      method: 'POST',
      headers: formHeaders,
      body: new URLSearchParams({
        client_id: params.clientId,
        token: params.token,
        token_type_hint: params.tokenTypeHint ?? 'refresh_token',
      }).toString(),
    });

    if (response.isErr()) {
      return err(toAuthError('Token revocation', response.error));
    }

    return ok(undefined);
  };

  return {
    exchangeCode,
    refresh,
    revoke,
  };
};
