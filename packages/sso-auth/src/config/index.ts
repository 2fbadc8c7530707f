export { PACKAGE_VERSION, loadSsoConfig, loadSsoConfigFromFile } from './config.js';
export type { SsoConfig } from './config.js';
