/**
 * Arithmetic on numbers, values and quantities
 */

import type { Converter, PhysicalQuantity } from "./converter"
import type { Fraction, NumberValue, Quantity, Value } from "./types"

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export type QuantityAddError =
  | { type: "textValue"; value: string }
  | { type: "missingUnit"; unit: string }
  | { type: "unknownUnit"; unit: string }
  | { type: "differentPhysicalQuantity"; a: PhysicalQuantity; b: PhysicalQuantity }

const FRACTION_DENOMINATORS = [2, 3, 4, 8]
const FRACTION_ACCURACY = 0.05

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

export function regular(value: number): NumberValue {
  return { type: "regular", value }
}

export function numberToFloat(n: NumberValue): number {
  if (n.type === "regular") return n.value
  const { whole, num, den, err } = n.value
  return whole + num / den + err
}

/**
 * Closest fraction to `value` with one of `denominators` within a relative
 * `accuracy`. A value that rounds to a whole number gives `num` 0 over 1,
 * so `1.9999` is 2 with its `err`. Null for whole numbers, negative values or
 * when none is close enough. Ties keep the smallest denominator.
 */
export function approxNumber(
  value: number,
  denominators: readonly number[] = FRACTION_DENOMINATORS,
  accuracy: number = FRACTION_ACCURACY,
): Fraction | null {
  if (!Number.isFinite(value) || value < 0) return null
  const whole = Math.trunc(value)
  const decimal = value - whole
  if (decimal === 0) return null

  const maxErr = accuracy * value
  let best: Fraction | null = null
  for (const den of denominators) {
    const num = Math.round(decimal * den)
    const err = value - (whole + num / den)
    if (Math.abs(err) > maxErr) continue
    if (best === null || Math.abs(err) < Math.abs(best.err)) {
      best = num === 0 || num === den ? { whole: whole + num / den, num: 0, den: 1, err } : { whole, num, den, err }
    }
  }
  return best
}

/** `value` as a fraction when one is close enough, else a regular number. */
export function fractionOrRegular(value: number): NumberValue {
  const fraction = approxNumber(value)
  if (!fraction) return regular(value)
  if (fraction.num === 0) return regular(fraction.whole)
  return { type: "fraction", value: fraction }
}

/**
 * Two fractions with the same denominator add exactly. Any other pair with a
 * fraction is added as floats and approximated back; regulars stay regular.
 */
export function addNumbers(a: NumberValue, b: NumberValue): NumberValue {
  if (a.type === "fraction" && b.type === "fraction" && a.value.den === b.value.den) {
    const den = a.value.den
    const sum = a.value.num + b.value.num
    const whole = a.value.whole + b.value.whole + Math.floor(sum / den)
    const num = sum % den
    const err = a.value.err + b.value.err
    if (num === 0) return regular(whole + err)
    return { type: "fraction", value: { whole, num, den, err } }
  }
  const total = numberToFloat(a) + numberToFloat(b)
  if (a.type === "regular" && b.type === "regular") return regular(total)
  return fractionOrRegular(total)
}

export function scaleNumber(n: NumberValue, factor: number): NumberValue {
  if (n.type === "regular") return regular(n.value * factor)
  return fractionOrRegular(numberToFloat(n) * factor)
}

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** Ranges add end by end; a number shifts both ends of a range. Text can't be added. */
export function addValues(a: Value, b: Value): Result<Value, QuantityAddError> {
  if (a.type === "text") return { ok: false, error: { type: "textValue", value: a.value } }
  if (b.type === "text") return { ok: false, error: { type: "textValue", value: b.value } }

  if (a.type === "number" && b.type === "number") {
    return { ok: true, value: { type: "number", value: addNumbers(a.value, b.value) } }
  }
  const [aStart, aEnd] = rangeEnds(a)
  const [bStart, bEnd] = rangeEnds(b)
  return {
    ok: true,
    value: { type: "range", value: { start: addNumbers(aStart, bStart), end: addNumbers(aEnd, bEnd) } },
  }
}

function rangeEnds(value: Exclude<Value, { type: "text" }>): [NumberValue, NumberValue] {
  return value.type === "range" ? [value.value.start, value.value.end] : [value.value, value.value]
}

/** Multiply a value. Null for text, which has nothing to multiply. */
export function scaleValue(value: Value, factor: number): Value | null {
  switch (value.type) {
    case "number":
      return { type: "number", value: scaleNumber(value.value, factor) }
    case "range":
      return {
        type: "range",
        value: { start: scaleNumber(value.value.start, factor), end: scaleNumber(value.value.end, factor) },
      }
    case "text":
      return null
  }
}

// ---------------------------------------------------------------------------
// Quantities
// ---------------------------------------------------------------------------

/**
 * Add two quantities. Equal units add directly; different known units of the
 * same physical quantity convert `b` into the unit of `a`.
 */
export function addQuantities(
  a: Quantity,
  b: Quantity,
  converter: Converter,
): Result<Quantity, QuantityAddError> {
  if (a.value.type === "text") return { ok: false, error: { type: "textValue", value: a.value.value } }
  if (b.value.type === "text") return { ok: false, error: { type: "textValue", value: b.value.value } }

  if (a.unit === b.unit) {
    const sum = addValues(a.value, b.value)
    return sum.ok ? { ok: true, value: { value: sum.value, unit: a.unit } } : sum
  }
  if (a.unit === null || b.unit === null) {
    return { ok: false, error: { type: "missingUnit", unit: a.unit ?? b.unit ?? "" } }
  }

  const ua = converter.findUnit(a.unit)
  if (!ua) return { ok: false, error: { type: "unknownUnit", unit: a.unit } }
  const ub = converter.findUnit(b.unit)
  if (!ub) return { ok: false, error: { type: "unknownUnit", unit: b.unit } }
  if (ua.physicalQuantity !== ub.physicalQuantity) {
    return {
      ok: false,
      error: { type: "differentPhysicalQuantity", a: ua.physicalQuantity, b: ub.physicalQuantity },
    }
  }

  const sum = addValues(a.value, converter.convertValue(b.value, ub, ua))
  return sum.ok ? { ok: true, value: { value: sum.value, unit: a.unit } } : sum
}

/**
 * Rewrite a quantity in the best unit of its system for its size, e.g.
 * `1100 g` to `1.1 kg`. Unchanged for text, unknown units or when the unit is
 * already the best one.
 */
export function fitQuantity(quantity: Quantity, converter: Converter): Quantity {
  if (quantity.unit === null || quantity.value.type === "text") return quantity
  const unit = converter.findUnit(quantity.unit)
  if (!unit) return quantity

  const size =
    quantity.value.type === "number"
      ? numberToFloat(quantity.value.value)
      : numberToFloat(quantity.value.value.start)
  const best = converter.bestUnit(size, unit)
  if (best === unit) return quantity
  return {
    value: converter.convertValue(quantity.value, unit, best),
    unit: best.symbols[0] ?? best.names[0] ?? quantity.unit,
  }
}

export type TotalQuantity =
  | { type: "none" }
  | { type: "single"; quantity: Quantity }
  | { type: "many"; quantities: Quantity[] }

/**
 * Quantities summed by compatibility
 *
 * Known units are summed per physical quantity, unknown units per unit text and
 * unitless values together. Text values, and anything that fails to add, are
 * kept apart as they are.
 */
export class GroupedQuantity {
  private readonly known = new Map<PhysicalQuantity, Quantity>()
  private readonly unknown = new Map<string, Quantity>()
  private noUnit: Quantity | null = null
  private readonly other: Quantity[] = []

  add(quantity: Quantity, converter: Converter): void {
    if (quantity.value.type === "text") {
      this.other.push(quantity)
      return
    }
    if (quantity.unit === null) {
      this.noUnit = this.merge(this.noUnit, quantity, converter)
      return
    }
    const unit = converter.findUnit(quantity.unit)
    if (unit) {
      this.known.set(
        unit.physicalQuantity,
        this.merge(this.known.get(unit.physicalQuantity) ?? null, quantity, converter),
      )
    } else {
      this.unknown.set(quantity.unit, this.merge(this.unknown.get(quantity.unit) ?? null, quantity, converter))
    }
  }

  /** Fit every quantity of a known unit. */
  fit(converter: Converter): void {
    for (const [key, quantity] of this.known) {
      this.known.set(key, fitQuantity(quantity, converter))
    }
  }

  quantities(): Quantity[] {
    const all = [...this.known.values(), ...this.unknown.values()]
    if (this.noUnit) all.push(this.noUnit)
    return [...all, ...this.other]
  }

  total(): TotalQuantity {
    const all = this.quantities()
    const [first] = all
    if (!first) return { type: "none" }
    if (all.length === 1) return { type: "single", quantity: first }
    return { type: "many", quantities: all }
  }

  isEmpty(): boolean {
    return this.quantities().length === 0
  }

  private merge(current: Quantity | null, quantity: Quantity, converter: Converter): Quantity {
    if (!current) return quantity
    const sum = addQuantities(current, quantity, converter)
    if (sum.ok) return sum.value
    this.other.push(quantity)
    return current
  }
}
