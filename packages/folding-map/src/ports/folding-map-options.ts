import type { Logger } from "@keyfold/logger"
import type { KeyFolding } from "./key-folding"

export type FoldingMapOptions<K> = {
  /**
   * Folding strategy.
   *
   * @default case folding with first-seen retention
   */
  folding?: KeyFolding<K>

  /**
   * Receives debug entries when a preserved key is replaced or a strict
   * operation misses.
   *
   * @default a no-op logger
   */
  logger?: Logger
}
