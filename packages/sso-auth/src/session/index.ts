export { createSsoSession } from './sso-session.js';
export type {
  AuthenticateOptions,
  RefreshAllOptions,
  SsoSession,
  SsoSessionConfig,
} from './types.js';
