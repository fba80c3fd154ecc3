import { z } from "zod"
import type { DefineMode, DuplicateMode } from "./internal-types"

const STANDARD_KEY_NAMES = [
  "title",
  "description",
  "tags",
  "author",
  "source",
  "servings",
  "course",
  "time",
  "prep_time",
  "cook_time",
  "difficulty",
  "cuisine",
  "diet",
  "images",
  "locale",
] as const

export type StandardKeyName = (typeof STANDARD_KEY_NAMES)[number]

interface StandardKey {
  aliases?: readonly string[]
  /** Accepted values and the type named when another is found. Unchecked when missing */
  value?: { schema: z.ZodTypeAny; expected: string }
}

const text = { schema: z.string(), expected: "string" }
const duration = { schema: z.union([z.string(), z.number()]), expected: "string" }
const person = { schema: z.union([z.string(), z.record(z.unknown())]), expected: "object" }

const STANDARD_KEYS: Record<StandardKeyName, StandardKey> = {
  title: { value: text },
  description: { aliases: ["introduction"], value: text },
  tags: { aliases: ["tag"], value: { schema: z.union([z.string(), z.array(z.unknown())]), expected: "array" } },
  author: { value: person },
  source: { value: person },
  servings: {
    aliases: ["serves", "yield"],
    value: { schema: z.unknown().refine(v => parseServings(v) !== null), expected: "number" },
  },
  course: { aliases: ["category"] },
  time: {
    aliases: ["time required", "duration"],
    value: { schema: z.union([z.string(), z.number(), z.record(z.unknown())]), expected: "string" },
  },
  prep_time: { aliases: ["prep time"], value: duration },
  cook_time: { aliases: ["cook time"], value: duration },
  difficulty: {},
  cuisine: {},
  diet: {},
  images: { aliases: ["image", "picture", "pictures"] },
  locale: { value: text },
}

const KEY_LOOKUP = new Map<string, StandardKeyName>(
  STANDARD_KEY_NAMES.flatMap(name => [name, ...(STANDARD_KEYS[name].aliases ?? [])].map(k => [k, name] as const)),
)

/** Standard key named by `key` or one of its aliases, case insensitive. */
export function resolveStdKey(key: string): StandardKeyName | null {
  return KEY_LOOKUP.get(key.toLowerCase()) ?? null
}

/** Expected and found type names when `value` is not accepted for `key`. */
export function checkStdEntry(key: StandardKeyName, value: unknown): { expected: string; got: string } | null {
  const check = STANDARD_KEYS[key].value
  if (!check || check.schema.safeParse(value).success) return null
  return { expected: check.expected, got: z.getParsedType(value) }
}

function positiveInt(value: unknown): number | null {
  const n = typeof value === "string" ? Number(value.trim()) : value
  if (typeof n !== "number" || !Number.isInteger(n) || n <= 0) return null
  return n
}

/**
 * Servings declared by a metadata value: a number, a list of numbers or
 * `"2|4|6"`. Null when the value is none of those.
 */
export function parseServings(value: unknown): number[] | null {
  const parts = typeof value === "string" ? value.split("|") : Array.isArray(value) ? value : [value]
  if (parts.length === 0) return null
  const servings: number[] = []
  for (const part of parts) {
    const n = positiveInt(part)
    if (n === null) return null
    servings.push(n)
  }
  return servings
}

/** Servings of a recipe's metadata, looked up by the standard key or its aliases. */
export function getServings(metadata: Record<string, unknown>): number[] | null {
  for (const [key, value] of Object.entries(metadata)) {
    if (resolveStdKey(key) === "servings") return parseServings(value)
  }
  return null
}

export function isSpecialDirectiveKey(key: string): boolean {
  const lower = key.toLowerCase()
  return lower === "[mode]" || lower === "[define]" || lower === "[duplicate]"
}

/** New define mode for a `[mode]`/`[define]` entry, null for an unknown value. */
export function applyDirectiveMode(key: string, rawValue: string): DefineMode | null {
  const lowerKey = key.toLowerCase()
  if (lowerKey !== "[mode]" && lowerKey !== "[define]") return null

  const value = rawValue.toLowerCase()
  if (value === "all" || value === "default") return "all"
  if (value === "components" || value === "ingredients") return "components"
  if (value === "steps") return "steps"
  if (value === "text") return "text"
  return null
}

/** New duplicate mode for a `[duplicate]` entry, null for an unknown value. */
export function applyDuplicateMode(key: string, rawValue: string): DuplicateMode | null {
  if (key.toLowerCase() !== "[duplicate]") return null
  const value = rawValue.toLowerCase()
  if (value === "new" || value === "default") return "new"
  if (value === "reference" || value === "ref") return "reference"
  return null
}
