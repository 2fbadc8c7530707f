export { createLogger, resolveLogLevel } from './logger.js';
export type { Logger } from './logger.js';
