import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import type { AuthError, SsoEndpoints } from '../types.js';
import type { HttpClient } from '../http/types.js';
import type { Cache } from '../cache/types.js';
import type { OAuthServerMetadata } from './types.js';

/** RFC 8414 metadata document of the EVE Online SSO */
export const DEFAULT_METADATA_URL =
  'https://login.eveonline.com/.well-known/oauth-authorization-server';

/** Default metadata cache TTL: 1 hour */
export const DEFAULT_METADATA_CACHE_TTL_MS = 60 * 60 * 1000;

/** Audience the EVE Online SSO puts in access tokens */
export const DEFAULT_AUDIENCE = 'EVE Online';

/**
 * EVE Online SSO endpoints, used when metadata discovery is not wanted.
 * Tokens have been seen with both issuer spellings.
 */
export const DEFAULT_SSO_ENDPOINTS: SsoEndpoints = {
  authorizationEndpoint: 'https://login.eveonline.com/v2/oauth/authorize',
  tokenEndpoint: 'https://login.eveonline.com/v2/oauth/token',
  jwksUri: 'https://login.eveonline.com/oauth/jwks',
  revocationEndpoint: 'https://login.eveonline.com/v2/oauth/revoke',
  issuers: ['login.eveonline.com', 'https://login.eveonline.com'],
  audience: DEFAULT_AUDIENCE,
};

const optionalStrings = z.array(z.string()).optional();

const metadataSchema = z.object({
  issuer: z.string().url(),
  authorization_endpoint: z.string().url(),
  token_endpoint: z.string().url(),
  jwks_uri: z.string().url(),
  revocation_endpoint: z.string().url().optional(),
  response_types_supported: optionalStrings,
  code_challenge_methods_supported: optionalStrings,
  token_endpoint_auth_methods_supported: optionalStrings,
  scopes_supported: optionalStrings,
});

/**
 * Validates that an unknown body is an RFC 8414 metadata document.
 */
export const validateServerMetadata = (body: unknown): Result<OAuthServerMetadata, AuthError> => {
  const parsed = metadataSchema.safeParse(body);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    return err({
      code: 'provider_error',
      message: `Invalid authorization server metadata: missing or invalid ${fields}`,
      cause: parsed.error,
    });
  }
  return ok(parsed.data);
};

/**
 * Fetches the authorization server metadata document.
 *
 * @example
 * ```typescript
 * const result = await fetchServerMetadata(createFetchClient(), DEFAULT_METADATA_URL);
 * if (result.isOk()) {
 *   console.log(result.value.token_endpoint);
 * }
 * ```
 */
export const fetchServerMetadata = async (
  httpClient: HttpClient,
  metadataUrl: string = DEFAULT_METADATA_URL
): Promise<Result<OAuthServerMetadata, AuthError>> => {
  const response = await httpClient.json({ url: metadataUrl, method: 'GET' });

  if (response.isErr()) {
    const { error } = response;
    return err({
      code: error.type === 'http' || error.type === 'parse' ? 'provider_error' : 'network_error',
      message: `Failed to fetch authorization server metadata from ${metadataUrl}: ${error.message}`,
      status: error.status,
      cause: error,
    });
  }

  return validateServerMetadata(response.value.body);
};

/**
 * Cached metadata fetcher.
 */
export interface CachedMetadataFetcher {
  /** Fetches (or returns cached) metadata */
  readonly fetch: () => Promise<Result<OAuthServerMetadata, AuthError>>;
  /** Drops the cached document */
  readonly clear: () => void;
}

/**
 * Creates a cached metadata fetcher. Concurrent callers share one request.
 *
 * @param httpClient - HTTP client to use for requests
 * @param cache - Cache instance for the document
 * @param metadataUrl - Metadata document URL
 * @param cacheTtlMs - Cache TTL in milliseconds
 */
export const createCachedMetadataFetcher = (
  httpClient: HttpClient,
  cache: Cache<OAuthServerMetadata>,
  metadataUrl: string = DEFAULT_METADATA_URL,
  cacheTtlMs: number = DEFAULT_METADATA_CACHE_TTL_MS
): CachedMetadataFetcher => {
  // Track in-flight fetch to deduplicate concurrent requests
  let inFlightFetch: Promise<Result<OAuthServerMetadata, AuthError>> | undefined;

  const fetch = async (): Promise<Result<OAuthServerMetadata, AuthError>> => {
    const cached = cache.get(metadataUrl);
    if (cached !== undefined) {
      return ok(cached);
    }

    if (inFlightFetch !== undefined) {
      return inFlightFetch;
    }

    inFlightFetch = fetchServerMetadata(httpClient, metadataUrl).then((result) => {
      inFlightFetch = undefined;
      if (result.isOk()) {
        cache.set(metadataUrl, result.value, cacheTtlMs);
      }
      return result;
    });

    return inFlightFetch;
  };

  const clear = (): void => {
    cache.delete(metadataUrl);
  };

  return { fetch, clear };
};

/**
 * Derives the issuer allow-list from a metadata issuer: the issuer URL
 * itself and its bare host, which is what some tokens carry in `iss`.
 */
const issuerVariants = (issuer: string): readonly string[] => {
  const host = new URL(issuer).host;
  return host === issuer ? [issuer] : [host, issuer];
};

/**
 * Turns a metadata document into SsoEndpoints.
 *
 * @param metadata - The RFC 8414 document
 * @param audience - Required `aud` value (default: "EVE Online")
 */
export const toSsoEndpoints = (
  metadata: OAuthServerMetadata,
  audience: string = DEFAULT_AUDIENCE
): SsoEndpoints => ({
  authorizationEndpoint: metadata.authorization_endpoint,
  tokenEndpoint: metadata.token_endpoint,
  jwksUri: metadata.jwks_uri,
  revocationEndpoint: metadata.revocation_endpoint,
  issuers: issuerVariants(metadata.issuer),
  audience,
});

/**
 * Checks that the server advertises S256 PKCE. Servers that do not
 * advertise any method are given the benefit of the doubt.
 */
export const supportsPkceS256 = (metadata: OAuthServerMetadata): boolean =>
  metadata.code_challenge_methods_supported === undefined ||
  metadata.code_challenge_methods_supported.includes('S256');
