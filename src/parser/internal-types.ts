import type { Extension, Located, RecipeModifiers, SourceDiag, Span, Value } from "../types"

export type ExtensionSet = ReadonlySet<Extension>

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

export type SymbolKind =
  | "@"
  | "#"
  | "~"
  | "{"
  | "}"
  | "("
  | ")"
  | "%"
  | "|"
  | "*"
  | "-"
  | "/"
  | "="
  | "&"
  | "?"
  | "+"
  | ":"
  | ">"

export type TokenKind =
  | "word"
  | "int"
  | "zeroInt"
  | "ws"
  | "newline"
  | "lineComment"
  | "blockComment"
  | "escaped"
  | "punctuation"
  | ">>"
  | SymbolKind

export interface Token {
  kind: TokenKind
  span: Span
}

/**
 * Text taken from a run of tokens. Comments are dropped, escapes resolved and
 * line breaks turned into spaces. `value` is not trimmed.
 */
export interface Text {
  value: string
  span: Span
}

// ---------------------------------------------------------------------------
// Parsed components
// ---------------------------------------------------------------------------

export type QuantityValue =
  | { type: "single"; value: Located<Value>; autoScale: Span | null }
  | { type: "many"; value: Located<Value>[] }

export interface QuantityNode {
  value: QuantityValue
  unit: Text | null
}

export interface ParsedQuantity {
  quantity: Located<QuantityNode>
  /** Span of the `%` separating value and unit, if any */
  unitSeparator: Span | null
}

/**
 * `(N)`, `(~N)`, `(=N)` or `(=~N)` after an ingredient reference
 */
export interface IntermediateData {
  refMode: "number" | "relative"
  targetKind: "step" | "section"
  value: number
}

export interface IngredientNode {
  modifiers: Located<RecipeModifiers>
  intermediateData: Located<IntermediateData> | null
  name: Text
  alias: Text | null
  quantity: Located<QuantityNode> | null
  note: Text | null
}

export interface CookwareNode {
  modifiers: Located<RecipeModifiers>
  name: Text
  alias: Text | null
  quantity: Located<QuantityNode> | null
  note: Text | null
}

export interface TimerNode {
  name: Text | null
  quantity: Located<QuantityNode> | null
}

// ---------------------------------------------------------------------------
// Events & modes
// ---------------------------------------------------------------------------

export type DefineMode = "all" | "components" | "steps" | "text"

export type DuplicateMode = "new" | "reference"

export type ParseEvent =
  | { kind: "frontmatter"; text: Text }
  | { kind: "metadata"; key: Text; value: Text }
  | { kind: "section"; name: Text | null }
  | { kind: "startStep"; isText: boolean }
  | { kind: "endStep"; isText: boolean }
  | { kind: "text"; text: Text }
  | { kind: "ingredient"; node: Located<IngredientNode> }
  | { kind: "cookware"; node: Located<CookwareNode> }
  | { kind: "timer"; node: Located<TimerNode> }
  | { kind: "error"; diag: SourceDiag }
  | { kind: "warning"; diag: SourceDiag }
