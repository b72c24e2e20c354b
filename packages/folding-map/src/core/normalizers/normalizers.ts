import type { Normalizer } from "../../ports/normalizer"
import { exact } from "./exact"
import { foldCase } from "./fold-case"
import { sortElements } from "./sort-elements"
import { stripWhitespace } from "./strip-whitespace"

export const normalizerNames = [
  "fold-case",
  "strip-whitespace",
  "sort-elements",
  "exact",
] as const

export type NormalizerName = (typeof normalizerNames)[number]

/**
 * Built-in normalizers by name, specialized to string keys so that each one
 * also satisfies the canonical retention policy.
 */
export const stringNormalizers: Readonly<Record<NormalizerName, Normalizer<string, string>>> =
  {
    "fold-case": foldCase,
    "strip-whitespace": stripWhitespace,
    "sort-elements": sortElements,
    exact,
  }
