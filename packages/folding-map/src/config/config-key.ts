const SEPARATORS = /[\s_-]+/g

/**
 * Folds configuration key spellings together: case, underscores, hyphens
 * and whitespace are ignored, so `LOG_LEVEL`, `log-level` and `logLevel`
 * name the same setting.
 */
export function configKey<K>(key: K): K | string {
  return typeof key === "string" ? key.replace(SEPARATORS, "").toLowerCase() : key
}
