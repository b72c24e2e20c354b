export { configKey } from "./config/config-key"
export {
  createFoldingMapFromConfig,
  type CreateFoldingMapFromConfigOptions,
} from "./config/create-from-config"
export {
  type FoldingConfig,
  type FoldingConfigKey,
  foldingConfigSchema,
  type LoadedFoldingConfig,
  retentionPolicies,
} from "./config/folding-config"
export { loadFoldingConfig, type LoadFoldingConfigOptions } from "./config/load-folding-config"
export { EnvSource, type EnvSourceOptions } from "./config/sources/env-source"
export {
  ObjectSource,
  type ObjectSourceOptions,
  type ObjectSourceValues,
} from "./config/sources/object-source"
export { FoldingMap, isFoldingMap } from "./core/folding-map"
export { exact } from "./core/normalizers/exact"
export { foldCase } from "./core/normalizers/fold-case"
export {
  type NormalizerName,
  normalizerNames,
  stringNormalizers,
} from "./core/normalizers/normalizers"
export { sortElements } from "./core/normalizers/sort-elements"
export { stripWhitespace } from "./core/normalizers/strip-whitespace"
export { createCanonicalFolding } from "./core/retention/canonical"
export { createCaseFolding, createKeyFolding } from "./core/retention/create-key-folding"
export { createFirstSeenFolding } from "./core/retention/first-seen"
export type { KeyFoldingOptions } from "./core/retention/key-folding-options"
export { createMostRecentFolding } from "./core/retention/most-recent"
export { FoldingConfigError } from "./errors/folding-config-error"
export {
  type FoldingErrorCode,
  type FoldingErrorContext,
  FoldingMapError,
  type FoldingMapErrorOptions,
  type SerializedFoldingError,
  serializeFoldingError,
} from "./errors/folding-map-error"
export { KeyNotFoundError } from "./errors/key-not-found-error"
export type { ConfigSource } from "./ports/config-source"
export type { FoldFound, FoldNotFound, FoldResult } from "./ports/fold-result"
export type { FoldingMapOptions } from "./ports/folding-map-options"
export type {
  KeepRetention,
  KeyFolding,
  ReplaceRetention,
  Retention,
} from "./ports/key-folding"
export type { Normalizer } from "./ports/normalizer"
export type {
  CanonicalRetentionPolicy,
  FirstSeenRetentionPolicy,
  MostRecentRetentionPolicy,
  RetentionPolicy,
} from "./ports/retention-policy"
