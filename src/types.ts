/**
 * Shared type definitions for the Cooklang parser
 */

import type { Converter } from "./converter"

// ---------------------------------------------------------------------------
// Source locations & diagnostics
// ---------------------------------------------------------------------------

/**
 * Half-open range of offsets into the source text
 */
export interface Span {
  start: number
  end: number
}

/**
 * A value together with the source range it was parsed from
 */
export interface Located<T> {
  value: T
  span: Span
}

/**
 * Line and column of an offset in the source
 */
export interface SourcePosition {
  line: number
  column: number
  offset: number
}

export interface DiagnosticLabel {
  span: Span
  message?: string
}

/**
 * A diagnostic before it is tied to a position in the source
 */
export interface SourceDiag {
  severity: "error" | "warning"
  message: string
  labels: DiagnosticLabel[]
  hints: string[]
}

/**
 * Parse error or warning with location information
 */
export interface ParseError extends SourceDiag {
  position: SourcePosition
}

// ---------------------------------------------------------------------------
// Numbers, values & quantities
// ---------------------------------------------------------------------------

export interface Fraction {
  whole: number
  num: number
  den: number
  /** Approximation error folded in by arithmetic; 0 for parsed fractions */
  err: number
}

export type NumberValue =
  | { type: "regular"; value: number }
  | { type: "fraction"; value: Fraction }

export type Value =
  | { type: "number"; value: NumberValue }
  | { type: "range"; value: { start: NumberValue; end: NumberValue } }
  | { type: "text"; value: string }

/**
 * Value of a quantity before scaling
 *
 * - `fixed`: does not change when scaling
 * - `linear`: multiplied by the scaling factor (`*` marker)
 * - `byServings`: one value per declared servings entry (`a|b|c`)
 */
export type ScalableValue =
  | { type: "fixed"; value: Value }
  | { type: "linear"; value: Value }
  | { type: "byServings"; value: Value[] }

export interface Quantity<V = Value> {
  value: V
  unit: string | null
}

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

/**
 * Component modifiers (`@ & - ? +` after the marker)
 */
export interface RecipeModifiers {
  recipe?: boolean
  reference?: boolean
  hidden?: boolean
  optional?: boolean
  new?: boolean
}

export type ComponentRelation =
  | {
      type: "definition"
      /** Indices of the components of the same kind referencing this one */
      referencedFrom: number[]
      /** False only for components defined in components mode */
      definedInStep: boolean
    }
  | { type: "reference"; referencesTo: number }

/**
 * Where an ingredient reference points to
 *
 * | Target | `referencesTo` is an index into |
 * |--------|---------------------------------|
 * | `ingredient` | `Recipe.ingredients` |
 * | `step` | `Section.content` of the section the reference is in |
 * | `section` | `Recipe.sections` |
 */
export type IngredientReferenceTarget = "ingredient" | "step" | "section"

export type IngredientRelation =
  | { type: "definition"; referencedFrom: number[]; definedInStep: boolean }
  | { type: "reference"; referencesTo: number; referenceTarget: IngredientReferenceTarget }

export interface Ingredient<V = Value> {
  name: string
  alias: string | null
  quantity: Quantity<V> | null
  note: string | null
  modifiers: RecipeModifiers
  relation: IngredientRelation
}

export interface Cookware<V = Value> {
  name: string
  alias: string | null
  /** Amount needed. A value, not a quantity: cookware has no units */
  quantity: V | null
  note: string | null
  modifiers: RecipeModifiers
  relation: ComponentRelation
}

/**
 * A recipe timer. When created by the parser at least one field is not null.
 */
export interface Timer<V = Value> {
  name: string | null
  quantity: Quantity<V> | null
}

// ---------------------------------------------------------------------------
// Recipe structure
// ---------------------------------------------------------------------------

/**
 * Ordered item within a step. Components are indices into the recipe arrays.
 */
export type Item =
  | { type: "text"; value: string }
  | { type: "ingredient"; index: number }
  | { type: "cookware"; index: number }
  | { type: "timer"; index: number }
  | { type: "inline_quantity"; index: number }

export interface Step {
  items: Item[]
  /** Starts at 1 in each section; text paragraphs do not take a number */
  number: number
}

export type Content = ({ type: "step" } & Step) | { type: "text"; value: string }

export interface Section {
  name: string | null
  content: Content[]
}

export type ScaleOutcome = "scaled" | "fixed" | "noQuantity" | "error"

export interface ScaleTarget {
  /** Servings the recipe is written for */
  base: number
  /** Wanted servings */
  target: number
  /** Position of `target` in the declared servings, if it is one of them */
  index: number | null
}

/**
 * Scaling information carried by a scaled recipe
 */
export type Scaled =
  | { type: "defaultScaling" }
  | {
      type: "scaled"
      target: ScaleTarget
      ingredients: ScaleOutcome[]
      cookware: ScaleOutcome[]
      timers: ScaleOutcome[]
    }

/**
 * A complete recipe
 *
 * `D` records whether the recipe has been scaled and `V` the kind of value its
 * quantities hold. Component cross references are indices into the flat arrays.
 */
export interface Recipe<D, V> {
  metadata: Record<string, unknown>
  sections: Section[]
  ingredients: Ingredient<V>[]
  cookware: Cookware<V>[]
  timers: Timer<V>[]
  inlineQuantities: Quantity<Value>[]
  data: D
}

/** A recipe as returned by the parser. Only this one can be scaled. */
export type ScalableRecipe = Recipe<null, ScalableValue>

/** A recipe after scaling. Only this one can be converted. */
export type ScaledRecipe = Recipe<Scaled, Value>

// ---------------------------------------------------------------------------
// Options & results
// ---------------------------------------------------------------------------

export type Extension =
  | "MULTILINE_STEPS"
  | "COMPONENT_MODIFIERS"
  | "COMPONENT_NOTE"
  | "COMPONENT_ALIAS"
  | "SECTIONS"
  | "ADVANCED_UNITS"
  | "MODES"
  | "INLINE_QUANTITIES"
  | "RANGE_VALUES"
  | "TIMER_REQUIRES_TIME"
  | "INTERMEDIATE_PREPARATIONS"
  | "TEXT_STEPS"

export type ExtensionPreset = "all" | "canonical"

export interface ParseCooklangOptions {
  /** Defaults to `"all"` */
  extensions?: ExtensionPreset | readonly Extension[]
  /** Unit database used for unit checks and inline quantities. Defaults to the bundled one */
  converter?: Converter
}

export interface ParseResult {
  recipe: ScalableRecipe
  errors: ParseError[]
  warnings: ParseError[]
}
