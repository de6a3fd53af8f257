/**
 * @arch lintcache.core.domain
 */
import * as path from 'node:path';
import { ConfigSchema, withDefaults, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.lintcache.yaml';

// An empty file parses to null and means "all defaults".
const ConfigFileSchema = withDefaults(ConfigSchema);

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = getConfigPath(projectRoot, configPath);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigFileSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Get the config file path for a project.
 */
export function getConfigPath(projectRoot: string, configPath?: string): string {
  return path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);
}

/**
 * Absolute path of the cache file configured for a project.
 */
export function resolveCachePath(projectRoot: string, config: Config): string {
  return path.resolve(projectRoot, config.cache.path);
}
