/**
 * Environment configuration.
 *
 * @packageDocumentation
 */

import { config as loadDotenv } from 'dotenv';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import type { AuthError, SsoCredentials, SsoEndpoints } from '../types.js';
import { createConfigurationError } from '../errors.js';
import { buildUserAgent } from '../acquisition/user-agent.js';
import { MAX_CALLBACK_TIMEOUT_MS } from '../acquisition/callback-listener.js';
import { MAX_REFRESH_BUFFER_MINUTES } from '../lifecycle/character-token.js';
import { DEFAULT_SSO_ENDPOINTS } from '../validation/discovery.js';
import { parseScopes } from '../validation/scopes.js';

/** Version reported in the default User-Agent */
export const PACKAGE_VERSION = '0.1.0';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const optionalUrl = z.preprocess(blankToUndefined, z.string().url().optional());

const envSchema = z.object({
  SSO_CLIENT_ID: z.preprocess(blankToUndefined, z.string({ required_error: 'is required' })),
  SSO_CALLBACK_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('http://localhost:8080/callback')
  ),
  SSO_SCOPES: z.preprocess(blankToUndefined, z.string().default('publicData')),
  SSO_APP_NAME: z.preprocess(blankToUndefined, z.string().optional()),
  SSO_METADATA_URL: optionalUrl,
  SSO_AUTHORIZATION_ENDPOINT: optionalUrl,
  SSO_TOKEN_ENDPOINT: optionalUrl,
  SSO_REVOCATION_ENDPOINT: optionalUrl,
  SSO_JWKS_URI: optionalUrl,
  SSO_AUDIENCE: z.preprocess(blankToUndefined, z.string().default(DEFAULT_SSO_ENDPOINTS.audience)),
  SSO_ISSUERS: z.preprocess(blankToUndefined, z.string().optional()),
  SSO_CALLBACK_TIMEOUT_SECONDS: z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .int()
      .positive()
      .max(Math.floor(MAX_CALLBACK_TIMEOUT_MS / 1000))
      .default(300)
  ),
  SSO_REFRESH_BUFFER_MINUTES: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).max(MAX_REFRESH_BUFFER_MINUTES).default(5)
  ),
  SSO_HTTP_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(10_000)),
  SSO_USER_AGENT: z.preprocess(blankToUndefined, z.string().optional()),
  SSO_CONTACT: z.preprocess(blankToUndefined, z.string().optional()),
  SSO_TOKEN_FILE: z.preprocess(blankToUndefined, z.string().optional()),
});

/**
 * Resolved configuration.
 */
export interface SsoConfig {
  readonly credentials: SsoCredentials;
  readonly endpoints: SsoEndpoints;
  /** RFC 8414 document to discover endpoints from, when set */
  readonly metadataUrl?: string | undefined;
  readonly callbackTimeoutMs: number;
  readonly refreshBufferMinutes: number;
  readonly httpTimeoutMs: number;
  readonly userAgent: string;
  /** JSON token store path, when set */
  readonly tokenFile?: string | undefined;
}

/**
 * Loads configuration from environment variables.
 *
 * @param env - Variables to read (default: process.env)
 *
 * @example
 * ```typescript
 * const config = loadSsoConfig();
 * if (config.isErr()) {
 *   console.error(config.error.message);
 *   process.exit(1);
 * }
 * ```
 */
export const loadSsoConfig = (
  env: Readonly<Record<string, string | undefined>> = process.env
): Result<SsoConfig, AuthError> => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return err(createConfigurationError(`Invalid SSO configuration: ${problems}`, parsed.error));
  }

  const vars = parsed.data;
  const appName = vars.SSO_APP_NAME ?? 'sso-auth';

  return ok({
    credentials: {
      clientId: vars.SSO_CLIENT_ID,
      callbackUrl: vars.SSO_CALLBACK_URL,
      scopes: parseScopes(vars.SSO_SCOPES),
      name: vars.SSO_APP_NAME,
    },
    endpoints: {
      authorizationEndpoint:
        vars.SSO_AUTHORIZATION_ENDPOINT ?? DEFAULT_SSO_ENDPOINTS.authorizationEndpoint,
      tokenEndpoint: vars.SSO_TOKEN_ENDPOINT ?? DEFAULT_SSO_ENDPOINTS.tokenEndpoint,
      jwksUri: vars.SSO_JWKS_URI ?? DEFAULT_SSO_ENDPOINTS.jwksUri,
      revocationEndpoint: vars.SSO_REVOCATION_ENDPOINT ?? DEFAULT_SSO_ENDPOINTS.revocationEndpoint,
      issuers:
        vars.SSO_ISSUERS === undefined ? DEFAULT_SSO_ENDPOINTS.issuers : parseScopes(vars.SSO_ISSUERS),
      audience: vars.SSO_AUDIENCE,
    },
    metadataUrl: vars.SSO_METADATA_URL,
    callbackTimeoutMs: vars.SSO_CALLBACK_TIMEOUT_SECONDS * 1000,
    refreshBufferMinutes: vars.SSO_REFRESH_BUFFER_MINUTES,
    httpTimeoutMs: vars.SSO_HTTP_TIMEOUT_MS,
    userAgent:
      vars.SSO_USER_AGENT ??
      buildUserAgent({ appName, appVersion: PACKAGE_VERSION, contact: vars.SSO_CONTACT }),
    tokenFile: vars.SSO_TOKEN_FILE,
  });
};

/**
 * Loads configuration from a dotenv file, leaving process.env untouched.
 * Variables already present in `env` win over the file.
 *
 * @param path - Path of the dotenv file
 * @param env - Variables that override the file (default: process.env)
 */
export const loadSsoConfigFromFile = (
  path: string,
  env: Readonly<Record<string, string | undefined>> = process.env
): Result<SsoConfig, AuthError> => {
  const fileVars: Record<string, string> = {};
  const loaded = loadDotenv({ path, processEnv: fileVars });

  if (loaded.error !== undefined) {
    return err(createConfigurationError(`Failed to read ${path}: ${loaded.error.message}`, loaded.error));
  }

  const merged: Record<string, string | undefined> = { ...fileVars };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  return loadSsoConfig(merged);
};
