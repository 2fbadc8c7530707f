export {
  DEFAULT_REFRESH_BUFFER_MINUTES,
  MAX_REFRESH_BUFFER_MINUTES,
  isExpired,
  makeCharacterToken,
  minutesUntilExpiry,
  needsRefresh,
  tokenState,
  validateRefreshBuffer,
} from './character-token.js';
export type { CharacterToken, CharacterTokenTiming } from './character-token.js';
