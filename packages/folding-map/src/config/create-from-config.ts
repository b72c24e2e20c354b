import type { Logger } from "@keyfold/logger"
import { FoldingMap } from "../core/folding-map"
import { stringNormalizers } from "../core/normalizers/normalizers"
import { createKeyFolding } from "../core/retention/create-key-folding"
import type { FoldingConfig } from "./folding-config"

export type CreateFoldingMapFromConfigOptions<V> = {
  entries?: Iterable<readonly [string, V]>
  logger?: Logger
}

/**
 * Build a string-keyed FoldingMap from a declarative folding config, e.g.
 * the `value` of `loadFoldingConfig()`.
 */
export function createFoldingMapFromConfig<V>(
  config: Readonly<FoldingConfig>,
  options: CreateFoldingMapFromConfigOptions<V> = {},
): FoldingMap<string, V> {
  const folding = createKeyFolding(config.retention, {
    normalize: stringNormalizers[config.normalizer],
    label: config.normalizer,
  })

  return new FoldingMap<string, V>(options.entries, { folding, logger: options.logger })
}
