/**
 * @arch lintcache.core.domain.schema
 */
import { z } from 'zod';
import { DEFAULT_CACHE_PATH } from '../cache/types.js';

/**
 * Make an object field optional and apply the inner schema's defaults when it is missing.
 * In Zod 4, .default({}) skips the defaults of the object's own fields.
 * Both undefined and null are treated as "missing".
 */
export function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Cache settings. */
export const CacheSettingsSchema = z.object({
  /** Set to false to always analyze every file */
  enabled: z.boolean().default(true),
  /** Cache file, relative to the project root */
  path: z.string().min(1).default(DEFAULT_CACHE_PATH),
});

/** Root configuration file schema. */
export const ConfigSchema = z.object({
  cache: withDefaults(CacheSettingsSchema),
  /**
   * Analyzer rule configuration. Opaque here, but any change to it
   * changes the configuration fingerprint and invalidates the cache.
   */
  rules: z.record(z.string(), z.unknown()).default({}),
});

export type CacheSettings = z.infer<typeof CacheSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
