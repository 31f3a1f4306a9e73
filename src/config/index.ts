/**
 * Configuration module.
 * Loads and validates runtime config from env and config files.
 * Zod-validated; built-in defaults are merged under file values.
 */

export * from './defaults.js';
export { DEFAULT_SETTINGS, resolveSettings } from './settings.js';
export type { Settings } from './settings.js';
export {
  ConfigError,
  loadConfigFile,
  loadOptionalConfigFile,
  parseConfigText,
} from './loader.js';
