import { FoldingMapError } from "./folding-map-error"

export class FoldingConfigError extends FoldingMapError<"invalid_folding_config"> {
  constructor(details: string, sources: readonly string[]) {
    super(`Folding configuration validation failed:\n${details}`, {
      code: "invalid_folding_config",
      context: { sources: [...sources] },
    })
  }
}
