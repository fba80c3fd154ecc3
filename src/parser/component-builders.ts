import type { Located, RecipeModifiers } from "../types"
import { BlockParser, tokensSpan, trimTokens } from "./block-parser"
import type { Text, Token, TokenKind } from "./internal-types"

const INGREDIENT_MODIFIERS: ReadonlySet<TokenKind> = new Set(["@", "&", "-", "?", "+"])
const COOKWARE_MODIFIERS: ReadonlySet<TokenKind> = new Set(["&", "-", "?", "+"])

/** Trimmed text of a run of tokens, null when there is nothing left. */
export function trimmedText(bp: BlockParser, offset: number, tokens: readonly Token[]): Text | null {
  const trimmed = trimTokens(tokens)
  if (trimmed.length === 0) return null
  const text = bp.text(offset, trimmed)
  const value = text.value.trim()
  return value === "" ? null : { value, span: text.span }
}

/** Split name tokens at the first `|` into name and optional alias. */
export function splitNameAlias(
  bp: BlockParser,
  offset: number,
  tokens: readonly Token[],
): { name: Text | null; alias: Text | null } {
  const pipeIdx = bp.extension("COMPONENT_ALIAS") ? tokens.findIndex(t => t.kind === "|") : -1
  if (pipeIdx === -1) return { name: trimmedText(bp, offset, tokens), alias: null }
  const aliasTokens = tokens.slice(pipeIdx + 1)
  const pipe = tokens[pipeIdx]
  return {
    name: trimmedText(bp, offset, tokens.slice(0, pipeIdx)),
    alias: trimmedText(bp, pipe ? pipe.span.end : offset, aliasTokens),
  }
}

export function parseModifiers(mods: string): RecipeModifiers {
  const modifiers: RecipeModifiers = {}
  if (mods.includes("@")) modifiers.recipe = true
  if (mods.includes("&")) modifiers.reference = true
  if (mods.includes("-")) modifiers.hidden = true
  if (mods.includes("?")) modifiers.optional = true
  if (mods.includes("+")) modifiers.new = true
  return modifiers
}

/** Consume the modifier characters after a component marker. */
export function consumeModifiers(
  bp: BlockParser,
  kind: "ingredient" | "cookware",
): Located<RecipeModifiers> {
  const offset = bp.currentOffset()
  if (!bp.extension("COMPONENT_MODIFIERS")) {
    return { value: {}, span: { start: offset, end: offset } }
  }
  const allowed = kind === "ingredient" ? INGREDIENT_MODIFIERS : COOKWARE_MODIFIERS
  const tokens = bp.consumeWhile(k => allowed.has(k))
  if (tokens.length === 0) return { value: {}, span: { start: offset, end: offset } }
  return { value: parseModifiers(bp.sliceStr(tokens)), span: tokensSpan(tokens) }
}
