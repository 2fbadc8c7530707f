import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

/** Field paths whose values are never written to the log. */
const REDACTED_PATHS = [
  'accessToken',
  'refreshToken',
  'access_token',
  'refresh_token',
  'code',
  'codeVerifier',
  'code_verifier',
  '*.accessToken',
  '*.refreshToken',
];

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const isLevel = (value: string): value is LevelWithSilent =>
  LEVELS.some((level) => level === value);

/**
 * Resolves the log level from the environment.
 * Tests run silent so vitest output stays readable.
 */
export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): LevelWithSilent => {
  if (env['NODE_ENV'] === 'test') {
    return 'silent';
  }

  const configured = env['LOG_LEVEL']?.toLowerCase();
  return configured !== undefined && isLevel(configured) ? configured : 'info';
};

let rootLogger: Logger | undefined;

const getRootLogger = (): Logger => {
  rootLogger ??= pino({
    name: 'sso-auth',
    level: resolveLogLevel(),
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
  return rootLogger;
};

/**
 * Creates a component logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger('refresh');
 * logger.info({ identityId: 98765 }, 'token refreshed');
 * ```
 */
export const createLogger = (component: string): Logger => getRootLogger().child({ component });
