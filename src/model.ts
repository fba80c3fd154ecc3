/**
 * Helpers over a parsed recipe
 */

import { parse as parsePath } from "node:path"
import type { Converter } from "./converter"
import {
  GroupedQuantity,
  addQuantities,
  addValues,
  fitQuantity,
  type QuantityAddError,
  type Result,
} from "./quantity"
import type {
  ComponentRelation,
  Content,
  Cookware,
  Ingredient,
  IngredientRelation,
  Quantity,
  Recipe,
  Section,
  Step,
  Value,
} from "./types"

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

export function isEmptySection(section: Section): boolean {
  return section.name === null && section.content.length === 0
}

export function contentStep(content: Content): Step | undefined {
  return content.type === "step" ? { items: content.items, number: content.number } : undefined
}

export function contentText(content: Content): string | undefined {
  return content.type === "text" ? content.value : undefined
}

export function referencedFrom(relation: ComponentRelation | IngredientRelation): number[] {
  return relation.type === "definition" ? relation.referencedFrom : []
}

export function referencesTo(relation: ComponentRelation | IngredientRelation): number | undefined {
  return relation.type === "reference" ? relation.referencesTo : undefined
}

/** True for references to another ingredient, false for intermediate preparations. */
export function isRegularReference(relation: IngredientRelation): boolean {
  return relation.type === "reference" && relation.referenceTarget === "ingredient"
}

export function isIntermediateReference(relation: IngredientRelation): boolean {
  return relation.type === "reference" && relation.referenceTarget !== "ingredient"
}

/** Alias if any; a recipe reference shows the file name without its path or extension. */
export function ingredientDisplayName<V>(ingredient: Ingredient<V>): string {
  if (ingredient.alias !== null) return ingredient.alias
  if (ingredient.modifiers.recipe) return parsePath(ingredient.name).name || ingredient.name
  return ingredient.name
}

export function cookwareDisplayName<V>(cookware: Cookware<V>): string {
  return cookware.alias ?? cookware.name
}

// ---------------------------------------------------------------------------
// Grouping
// ---------------------------------------------------------------------------

/** Quantity of an ingredient followed by the ones of its direct references. */
export function allQuantities(ingredient: Ingredient, all: readonly Ingredient[]): Quantity[] {
  return [ingredient, ...referencedFrom(ingredient.relation).map(i => all[i])]
    .map(i => i?.quantity ?? null)
    .filter((q): q is Quantity => q !== null)
}

export function groupQuantities(
  ingredient: Ingredient,
  all: readonly Ingredient[],
  converter: Converter,
): GroupedQuantity {
  const grouped = new GroupedQuantity()
  for (const q of allQuantities(ingredient, all)) grouped.add(q, converter)
  grouped.fit(converter)
  return grouped
}

/** Sum of all quantities of an ingredient and its references, fitted. Fails on the first one that can't be added. */
export function totalQuantity(
  ingredient: Ingredient,
  all: readonly Ingredient[],
  converter: Converter,
): Result<Quantity | null, QuantityAddError> {
  const [first, ...rest] = allQuantities(ingredient, all)
  if (!first) return { ok: true, value: null }
  let total = first
  for (const q of rest) {
    const sum = addQuantities(total, q, converter)
    if (!sum.ok) return sum
    total = sum.value
  }
  return { ok: true, value: fitQuantity(total, converter) }
}

export function allAmounts(cookware: Cookware, all: readonly Cookware[]): Value[] {
  return [cookware, ...referencedFrom(cookware.relation).map(i => all[i])]
    .map(c => c?.quantity ?? null)
    .filter((v): v is Value => v !== null)
}

/** The summed numeric amount first (if any), then the text amounts. */
export function groupAmounts(cookware: Cookware, all: readonly Cookware[]): Value[] {
  const texts: Value[] = []
  let numeric: Value | null = null
  for (const amount of allAmounts(cookware, all)) {
    if (amount.type === "text") {
      texts.push(amount)
      continue
    }
    if (numeric === null) {
      numeric = amount
      continue
    }
    const sum = addValues(numeric, amount)
    if (sum.ok) numeric = sum.value
    else texts.push(amount)
  }
  return numeric === null ? texts : [numeric, ...texts]
}

export interface IngredientListEntry {
  index: number
  ingredient: Ingredient
  quantity: GroupedQuantity
}

/** One entry per ingredient definition, with the quantities of its references. */
export function groupIngredients<D>(
  recipe: Recipe<D, Value>,
  converter: Converter,
): IngredientListEntry[] {
  return recipe.ingredients.flatMap((ingredient, index) =>
    ingredient.relation.type === "definition"
      ? [{ index, ingredient, quantity: groupQuantities(ingredient, recipe.ingredients, converter) }]
      : [],
  )
}
