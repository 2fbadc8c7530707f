import { ok, err, type Result } from 'neverthrow';
import type { AuthError, Clock } from '../types.js';
import { createConfigurationError, fromValidationError } from '../errors.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type {
  JwksResolver,
  TokenValidator,
  TokenValidatorConfig,
  ValidatedClaims,
} from './types.js';
import { createJwks, validateAccessToken } from './jwt-validation.js';

/**
 * Creates a token validator.
 *
 * The key resolver is built once, on first use, and shared by every
 * validation made through this validator, so the remote key set is fetched
 * once and then served from jose's cache.
 *
 * @param config - Audience, issuers and the key source
 * @param clock - Time source for expiry checks (default: Date.now)
 * @param logger - Logger (optional)
 *
 * @example
 * ```typescript
 * const validator = createTokenValidator({
 *   jwksUri: 'https://login.eveonline.com/oauth/jwks',
 *   audience: 'EVE Online',
 *   issuers: ['login.eveonline.com', 'https://login.eveonline.com'],
 * });
 *
 * const result = await validator.validate(accessToken);
 * if (result.isErr() && result.error.validationCode === 'EXPIRED_TOKEN') {
 *   // refresh and try again
 * }
 * ```
 */
export const createTokenValidator = (
  config: TokenValidatorConfig,
  clock: Clock = Date.now,
  logger: Logger = createLogger('token-validator')
): TokenValidator => {
  let jwks: JwksResolver | undefined = config.jwks;

  const getJwks = (): Result<JwksResolver, AuthError> => {
    if (jwks !== undefined) {
      return ok(jwks);
    }

    if (config.jwksUri === undefined) {
      return err(createConfigurationError('Token validator needs either jwks or jwksUri'));
    }

    try {
      jwks = createJwks(config.jwksUri, config.userAgent);
      return ok(jwks);
    } catch (error) {
      return err(createConfigurationError(`JWKS URI is not a valid URL: ${config.jwksUri}`, error));
    }
  };

  const validate = async (token: string): Promise<Result<ValidatedClaims, AuthError>> => {
    const jwksResult = getJwks();
    if (jwksResult.isErr()) {
      return err(jwksResult.error);
    }

    const result = await validateAccessToken(token, jwksResult.value, config, clock);

    if (result.isErr()) {
      logger.warn({ validationCode: result.error.code }, 'access token rejected');
      return err(fromValidationError(result.error));
    }

    return ok(result.value);
  };

  return { validate };
};
