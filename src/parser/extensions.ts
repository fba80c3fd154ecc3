import type { Extension, ParseCooklangOptions } from "../types"
import type { ExtensionSet } from "./internal-types"

export const ALL_EXTENSIONS: readonly Extension[] = [
  "MULTILINE_STEPS",
  "COMPONENT_MODIFIERS",
  "COMPONENT_NOTE",
  "COMPONENT_ALIAS",
  "SECTIONS",
  "ADVANCED_UNITS",
  "MODES",
  "INLINE_QUANTITIES",
  "RANGE_VALUES",
  "TIMER_REQUIRES_TIME",
  "INTERMEDIATE_PREPARATIONS",
  "TEXT_STEPS",
]

/** What the canonical Cooklang syntax supports without extensions. */
export const CANONICAL_EXTENSIONS: readonly Extension[] = [
  "MULTILINE_STEPS",
  "COMPONENT_NOTE",
  "SECTIONS",
  "TEXT_STEPS",
]

export function resolveExtensions(options?: ParseCooklangOptions): ExtensionSet {
  const preset = options?.extensions ?? "all"
  if (preset === "all") return new Set(ALL_EXTENSIONS)
  if (preset === "canonical") return new Set(CANONICAL_EXTENSIONS)
  return new Set(preset)
}
