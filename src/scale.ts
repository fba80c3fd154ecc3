import { getServings } from "./parser/metadata"
import { scaleValue } from "./quantity"
import type {
  ComponentRelation,
  IngredientRelation,
  Quantity,
  ScalableRecipe,
  ScalableValue,
  ScaleOutcome,
  ScaleTarget,
  ScaledRecipe,
  Value,
} from "./types"

type Scaler = (value: ScalableValue) => [Value, ScaleOutcome]

/**
 * Scale a recipe to `targetServings`.
 *
 * The base is the first declared servings (or 1). Many-valued quantities pick
 * the entry at the position of `targetServings` in the declared servings;
 * `*` quantities are multiplied by `target / base`; the rest stay as written.
 */
export function scale(recipe: ScalableRecipe, targetServings: number): ScaledRecipe {
  const servings = getServings(recipe.metadata)
  const base = servings?.[0] ?? 1
  const position = servings?.indexOf(targetServings) ?? -1
  const target: ScaleTarget = { base, target: targetServings, index: position === -1 ? null : position }
  const factor = targetServings / base

  const scaler: Scaler = value => {
    switch (value.type) {
      case "fixed":
        return [value.value, "fixed"]
      case "linear": {
        const scaled = scaleValue(value.value, factor)
        return scaled ? [scaled, "scaled"] : [value.value, "error"]
      }
      case "byServings":
        return pickByServings(value.value, target.index)
    }
  }

  const { recipe: scaled, outcomes } = mapValues(recipe, scaler)
  return { ...scaled, data: { type: "scaled", target, ...outcomes } }
}

/** Resolve every quantity as written: many-valued quantities take their first entry. */
export function defaultScale(recipe: ScalableRecipe): ScaledRecipe {
  const scaler: Scaler = value =>
    value.type === "byServings" ? pickByServings(value.value, 0) : [value.value, "fixed"]
  const { recipe: scaled } = mapValues(recipe, scaler)
  return { ...scaled, data: { type: "defaultScaling" } }
}

function pickByServings(values: readonly Value[], index: number | null): [Value, ScaleOutcome] {
  const picked = index === null ? undefined : values[index]
  if (picked) return [picked, "scaled"]
  const first = values[0]
  if (!first) throw new Error("Many-valued quantity without values")
  return [first, "error"]
}

function mapValues(recipe: ScalableRecipe, scaler: Scaler) {
  const quantity = (q: Quantity<ScalableValue> | null): [Quantity | null, ScaleOutcome] => {
    if (!q) return [null, "noQuantity"]
    const [value, outcome] = scaler(q.value)
    return [{ value, unit: q.unit }, outcome]
  }

  const ingredients = recipe.ingredients.map(i => {
    const [q, outcome] = quantity(i.quantity)
    return { item: { ...i, modifiers: { ...i.modifiers }, relation: copyRelation(i.relation), quantity: q }, outcome }
  })
  const cookware = recipe.cookware.map(c => {
    const item = { ...c, modifiers: { ...c.modifiers }, relation: copyRelation(c.relation) }
    if (!c.quantity) return { item: { ...item, quantity: null }, outcome: "noQuantity" as const }
    const [value, outcome] = scaler(c.quantity)
    return { item: { ...item, quantity: value }, outcome }
  })
  const timers = recipe.timers.map(t => {
    const [q, outcome] = quantity(t.quantity)
    return { item: { ...t, quantity: q }, outcome }
  })

  return {
    recipe: {
      metadata: structuredClone(recipe.metadata),
      sections: structuredClone(recipe.sections),
      ingredients: ingredients.map(i => i.item),
      cookware: cookware.map(c => c.item),
      timers: timers.map(t => t.item),
      inlineQuantities: structuredClone(recipe.inlineQuantities),
    },
    outcomes: {
      ingredients: ingredients.map(i => i.outcome),
      cookware: cookware.map(c => c.outcome),
      timers: timers.map(t => t.outcome),
    },
  }
}

function copyRelation(relation: IngredientRelation): IngredientRelation
function copyRelation(relation: ComponentRelation): ComponentRelation
function copyRelation(relation: IngredientRelation | ComponentRelation): IngredientRelation | ComponentRelation {
  return relation.type === "definition" ? { ...relation, referencedFrom: [...relation.referencedFrom] } : { ...relation }
}
