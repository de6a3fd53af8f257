/**
 * @arch lintcache.util
 *
 * Configuration exports.
 */
export {
  loadConfig,
  getDefaultConfig,
  getConfigPath,
  resolveCachePath,
  DEFAULT_CONFIG_PATH,
} from './loader.js';
export { ConfigSchema, CacheSettingsSchema, type Config, type CacheSettings } from './schema.js';
export { canonicalJson, computeConfigurationFingerprint } from './fingerprint.js';
