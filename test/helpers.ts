import { BlockParser } from "../src/parser/block-parser"
import { ALL_EXTENSIONS } from "../src/parser/extensions"
import type { ExtensionSet, ParseEvent, ParsedQuantity } from "../src/parser/internal-types"
import { tokenize } from "../src/parser/lexer"
import { parseQuantity } from "../src/parser/quantity"
import type { NumberValue, Recipe, SourceDiag, Step, Value } from "../src/types"

/** Element at `i`, failing the test when there is none. */
export function at<T>(arr: readonly T[], i: number): T {
  const v = arr[i]
  if (v === undefined) throw new Error(`Expected element at index ${i}`)
  return v
}

/** Flat list of steps across all sections. */
export function getSteps<D, V>(recipe: Recipe<D, V>): Step[] {
  const steps: Step[] = []
  for (const section of recipe.sections) {
    for (const content of section.content) {
      if (content.type === "step") {
        steps.push({ items: content.items, number: content.number })
      }
    }
  }
  return steps
}

/** Flat list of text paragraphs across all sections. */
export function getNotes<D, V>(recipe: Recipe<D, V>): string[] {
  const notes: string[] = []
  for (const section of recipe.sections) {
    for (const content of section.content) {
      if (content.type === "text") {
        notes.push(content.value)
      }
    }
  }
  return notes
}

/** Names of the named sections. */
export function getSectionNames<D, V>(recipe: Recipe<D, V>): string[] {
  return recipe.sections.flatMap(s => (s.name === null ? [] : [s.name]))
}

// ---------------------------------------------------------------------------
// Value builders
// ---------------------------------------------------------------------------

export function num(value: number): Value {
  return { type: "number", value: { type: "regular", value } }
}

export function frac(whole: number, n: number, den: number): NumberValue {
  return { type: "fraction", value: { whole, num: n, den, err: 0 } }
}

export function text(value: string): Value {
  return { type: "text", value }
}

// ---------------------------------------------------------------------------
// Quantity parsing
// ---------------------------------------------------------------------------

export interface QuantityParse extends ParsedQuantity {
  errors: SourceDiag[]
  warnings: SourceDiag[]
}

/** Parse the contents of a component's braces on their own. */
export function parseQuantityText(
  input: string,
  extensions: ExtensionSet = new Set(ALL_EXTENSIONS),
): QuantityParse {
  const tokens = tokenize(input)
  const events: ParseEvent[] = []
  const bp = new BlockParser(tokens, input, events, extensions)
  const parsed = parseQuantity(bp, tokens)
  return {
    ...parsed,
    errors: events.flatMap(e => (e.kind === "error" ? [e.diag] : [])),
    warnings: events.flatMap(e => (e.kind === "warning" ? [e.diag] : [])),
  }
}
