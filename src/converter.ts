/**
 * Unit database and conversions between compatible units
 */

import { readFileSync } from "node:fs"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"
import { z } from "zod"
import { fractionOrRegular, numberToFloat, regular } from "./quantity"
import type { Quantity, ScaledRecipe, Value, NumberValue } from "./types"

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

// ---------------------------------------------------------------------------
// Unit table schema
// ---------------------------------------------------------------------------

export const PhysicalQuantitySchema = z.enum(["mass", "volume", "length", "temperature", "time"])
export const SystemSchema = z.enum(["metric", "imperial"])

export const UnitEntrySchema = z.object({
  names: z.array(z.string().min(1)).min(1),
  symbols: z.array(z.string().min(1)).default([]),
  aliases: z.array(z.string().min(1)).default([]),
  /** Factor to the base unit of the physical quantity */
  ratio: z.number().positive(),
  /** Offset added after `ratio`, for temperatures */
  difference: z.number().default(0),
  system: SystemSchema.optional(),
})

export const QuantityGroupSchema = z.object({
  quantity: PhysicalQuantitySchema,
  best: z.record(SystemSchema, z.array(z.string())).default({}),
  units: z.array(UnitEntrySchema),
})

export const UnitsConfigSchema = z.object({
  defaultSystem: SystemSchema.default("metric"),
  quantities: z.array(QuantityGroupSchema),
})

export type PhysicalQuantity = z.infer<typeof PhysicalQuantitySchema>
export type System = z.infer<typeof SystemSchema>
export type UnitsConfig = z.input<typeof UnitsConfigSchema>

export interface Unit {
  names: string[]
  symbols: string[]
  aliases: string[]
  ratio: number
  difference: number
  system: System | null
  physicalQuantity: PhysicalQuantity
}

/** Name a unit is written with: its first symbol, else its first name. */
export function unitDisplayName(unit: Unit): string {
  return unit.symbols[0] ?? unit.names[0] ?? ""
}

export type ConvertError =
  | { type: "textValue"; value: string }
  | { type: "unknownUnit"; unit: string }
  | { type: "missingUnit" }
  | { type: "mixedQuantities"; from: PhysicalQuantity; to: PhysicalQuantity }

export type ConvertResult = { ok: true; value: Quantity } | { ok: false; error: ConvertError }

// ---------------------------------------------------------------------------
// Converter
// ---------------------------------------------------------------------------

export class Converter {
  private readonly exact = new Map<string, Unit>()
  private readonly folded = new Map<string, Unit>()
  private readonly best = new Map<string, Unit[]>()

  private constructor(
    readonly units: readonly Unit[],
    private readonly system: System,
    best: ReadonlyMap<string, readonly string[]>,
  ) {
    for (const unit of units) {
      for (const name of [...unit.symbols, ...unit.names, ...unit.aliases]) {
        if (this.exact.has(name)) throw new Error(`Duplicate unit name: '${name}'`)
        this.exact.set(name, unit)
        const lower = name.toLowerCase()
        if (!this.folded.has(lower)) this.folded.set(lower, unit)
      }
    }
    for (const [key, names] of best) {
      const resolved = names.map(name => {
        const unit = this.exact.get(name)
        if (!unit) throw new Error(`Unknown best unit: '${name}'`)
        return unit
      })
      this.best.set(key, resolved.sort((a, b) => b.ratio - a.ratio))
    }
  }

  /** Build a converter from an untrusted unit table. Throws when it is invalid. */
  static fromConfig(config: unknown): Converter {
    const parsed = UnitsConfigSchema.parse(config)
    const units: Unit[] = []
    const best = new Map<string, readonly string[]>()
    for (const group of parsed.quantities) {
      for (const entry of group.units) {
        units.push({
          names: entry.names,
          symbols: entry.symbols,
          aliases: entry.aliases,
          ratio: entry.ratio,
          difference: entry.difference,
          system: entry.system ?? null,
          physicalQuantity: group.quantity,
        })
      }
      for (const system of SystemSchema.options) {
        const names = group.best[system]
        if (names) best.set(bestKey(group.quantity, system), names)
      }
    }
    return new Converter(units, parsed.defaultSystem, best)
  }

  /** Converter with the bundled unit table. */
  static bundled(): Converter {
    const raw = readFileSync(join(__dirname, "../data/units.json"), "utf-8")
    return Converter.fromConfig(JSON.parse(raw))
  }

  /** Converter that knows no units. */
  static empty(): Converter {
    return new Converter([], "metric", new Map())
  }

  isEmpty(): boolean {
    return this.units.length === 0
  }

  defaultSystem(): System {
    return this.system
  }

  /** Looks up a unit by symbol, name or alias; exact match first, then ignoring case. */
  findUnit(name: string): Unit | null {
    const trimmed = name.trim()
    return this.exact.get(trimmed) ?? this.folded.get(trimmed.toLowerCase()) ?? null
  }

  isCompatible(a: string, b: string): boolean {
    const ua = this.findUnit(a)
    const ub = this.findUnit(b)
    return ua !== null && ub !== null && ua.physicalQuantity === ub.physicalQuantity
  }

  /**
   * Factor to multiply a value in `from` to get it in `to`. Null for unknown or
   * incompatible units, and for units with an offset, which have no single factor.
   */
  conversionFactor(from: string, to: string): number | null {
    const a = this.findUnit(from)
    const b = this.findUnit(to)
    if (!a || !b || a.physicalQuantity !== b.physicalQuantity) return null
    if (a.difference !== 0 || b.difference !== 0) return null
    return a.ratio / b.ratio
  }

  convertNumber(value: number, from: Unit, to: Unit): number {
    if (from === to) return value
    const base = value * from.ratio + from.difference
    return (base - to.difference) / to.ratio
  }

  /** Converts a numeric value. Imperial targets get fractions when one is close enough. */
  convertValue(value: Value, from: Unit, to: Unit): Value {
    const convert = (n: NumberValue): NumberValue => {
      if (from === to) return n
      const converted = this.convertNumber(numberToFloat(n), from, to)
      return to.system === "imperial" ? fractionOrRegular(converted) : regular(converted)
    }
    switch (value.type) {
      case "number":
        return { type: "number", value: convert(value.value) }
      case "range":
        return { type: "range", value: { start: convert(value.value.start), end: convert(value.value.end) } }
      case "text":
        return value
    }
  }

  /** Units to fit a value into, largest first. */
  bestUnits(quantity: PhysicalQuantity, system: System): readonly Unit[] {
    return this.best.get(bestKey(quantity, system)) ?? []
  }

  /**
   * Best unit for a magnitude expressed in `unit`: the largest unit of
   * `system` in which the value is at least 1, else the smallest one. `unit`
   * itself when the system has no units for its quantity.
   */
  bestUnit(magnitude: number, unit: Unit, system: System = unit.system ?? this.system): Unit {
    const candidates = this.bestUnits(unit.physicalQuantity, system)
    const fit = candidates.find(c => this.convertNumber(magnitude, unit, c) >= 1)
    return fit ?? candidates[candidates.length - 1] ?? unit
  }
}

function bestKey(quantity: PhysicalQuantity, system: System): string {
  return `${quantity}:${system}`
}

// ---------------------------------------------------------------------------
// Quantity & recipe conversion
// ---------------------------------------------------------------------------

/** Convert a quantity into a unit, or into the best unit of a system. */
export function convertQuantity(
  quantity: Quantity,
  target: Unit | System,
  converter: Converter,
): ConvertResult {
  if (quantity.value.type === "text") {
    return { ok: false, error: { type: "textValue", value: quantity.value.value } }
  }
  if (quantity.unit === null) return { ok: false, error: { type: "missingUnit" } }
  const from = converter.findUnit(quantity.unit)
  if (!from) return { ok: false, error: { type: "unknownUnit", unit: quantity.unit } }

  let to: Unit
  if (typeof target === "string") {
    // units without a system, like time, read the same everywhere
    if (from.system === target || from.system === null) return { ok: true, value: quantity }
    to = converter.bestUnit(magnitude(quantity.value), from, target)
    if (to === from) return { ok: true, value: quantity }
  } else {
    to = target
  }

  if (from.physicalQuantity !== to.physicalQuantity) {
    return {
      ok: false,
      error: { type: "mixedQuantities", from: from.physicalQuantity, to: to.physicalQuantity },
    }
  }
  return {
    ok: true,
    value: { value: converter.convertValue(quantity.value, from, to), unit: unitDisplayName(to) },
  }
}

/** Numeric size of a value; the start of a range. */
export function magnitude(value: Value): number {
  switch (value.type) {
    case "number":
      return numberToFloat(value.value)
    case "range":
      return numberToFloat(value.value.start)
    case "text":
      return Number.NaN
  }
}

/**
 * Convert every unit of a scaled recipe into `system`. Quantities that cannot be
 * converted are kept and reported.
 */
export function convertRecipe(
  recipe: ScaledRecipe,
  system: System,
  converter: Converter,
): { recipe: ScaledRecipe; errors: ConvertError[] } {
  const errors: ConvertError[] = []
  const convert = (quantity: Quantity | null): Quantity | null => {
    if (!quantity || quantity.unit === null || quantity.value.type === "text") return quantity
    const result = convertQuantity(quantity, system, converter)
    if (result.ok) return result.value
    errors.push(result.error)
    return quantity
  }

  return {
    recipe: {
      ...recipe,
      ingredients: recipe.ingredients.map(i => ({ ...i, quantity: convert(i.quantity) })),
      timers: recipe.timers.map(t => ({ ...t, quantity: convert(t.quantity) })),
      inlineQuantities: recipe.inlineQuantities.map(q => convert(q) ?? q),
    },
    errors,
  }
}
