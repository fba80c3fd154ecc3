import type { Converter } from "../converter"
import { numberToFloat, regular } from "../quantity"
import type { Extension, Item, Quantity, Value } from "../types"
import { BlockParser } from "./block-parser"
import type { Token } from "./internal-types"
import { tokenize } from "./lexer"
import { numericValue } from "./quantity"

/** Merge adjacent text items into single items (e.g. across soft line breaks). */
export function mergeConsecutiveTexts(items: Item[]): Item[] {
  const result: Item[] = []
  for (const item of items) {
    const prev = result[result.length - 1]
    if (item.type === "text" && prev?.type === "text") {
      result[result.length - 1] = { type: "text", value: `${prev.value}${item.value}` }
    } else {
      result.push(item)
    }
  }
  return result
}

// "2 in the oven" and "wait 5 m" are prose, a unit after a space needs a longer name
const MIN_SPACED_UNIT_LENGTH = 3

// number shapes tried at an int, longest first: `w n/d`, `n/d` or `i.d`, `i`
const NUMBER_LENGTHS = [5, 3, 1]

/** Unit check for an empty converter: letters and degree signs only. */
function looksLikeUnit(unit: string): boolean {
  return /^[°º]?[A-Za-z°º℃]+$/u.test(unit)
}

function isInlineQuantityUnit(unit: string, converter: Converter): boolean {
  return converter.isEmpty() ? looksLikeUnit(unit) : converter.findUnit(unit) !== null
}

interface InlineMatch {
  start: number
  end: number
  quantity: Quantity
}

/** The longest number starting at token `i`, with the index of the token after it. */
function numberAt(bp: BlockParser, tokens: readonly Token[], i: number): { value: Value; next: number } | null {
  for (const length of NUMBER_LENGTHS) {
    const slice = tokens.slice(i, i + length)
    const last = slice[slice.length - 1]
    if (slice.length !== length || (last?.kind !== "int" && last?.kind !== "zeroInt")) continue
    const result = numericValue(slice, bp)
    if (result?.ok) return { value: result.value, next: i + length }
  }
  return null
}

/** Unit token right after a number, touching it or after a single space. */
function unitAt(bp: BlockParser, tokens: readonly Token[], i: number, converter: Converter): Token | null {
  const next = tokens[i]
  if (next?.kind === "word") {
    return isInlineQuantityUnit(bp.tokenStr(next), converter) ? next : null
  }
  const word = tokens[i + 1]
  if (next?.kind !== "ws" || word?.kind !== "word") return null
  const unit = bp.tokenStr(word)
  return unit.length >= MIN_SPACED_UNIT_LENGTH && isInlineQuantityUnit(unit, converter) ? word : null
}

// the `2` of `1/2` or `1.2`
function continuesNumber(bp: BlockParser, prev: Token): boolean {
  if (prev.kind === "/") return true
  return prev.kind === "punctuation" && [".", ","].includes(bp.tokenStr(prev))
}

/** A quantity starting at token `i`, with a leading `-` making it negative. */
function inlineMatchAt(
  bp: BlockParser,
  tokens: readonly Token[],
  i: number,
  converter: Converter,
): { match: InlineMatch; next: number } | null {
  const first = tokens[i]
  if (first?.kind !== "int") return null

  const prev = tokens[i - 1]
  const negative = prev?.kind === "-"
  if (negative) {
    // `10-15` is a range, not a negative number
    const beforeMinus = tokens[i - 2]
    if (beforeMinus && beforeMinus.kind !== "ws") return null
  } else if (prev && continuesNumber(bp, prev)) {
    return null
  }

  const number = numberAt(bp, tokens, i)
  if (!number) return null
  const unit = unitAt(bp, tokens, number.next, converter)
  if (!unit) return null

  const value: Value =
    negative && number.value.type === "number"
      ? { type: "number", value: regular(-numberToFloat(number.value.value)) }
      : number.value
  return {
    match: {
      start: negative && prev ? prev.span.start : first.span.start,
      end: unit.span.end,
      quantity: { value, unit: bp.tokenStr(unit) },
    },
    next: tokens.indexOf(unit) + 1,
  }
}

/** Split `20 min`, `180°C` or `1/2 cup` out of step text into inline quantity items. */
export function parseInlineQuantitiesInText(
  text: string,
  inlineQuantities: Quantity[],
  converter: Converter,
): Item[] {
  const tokens = tokenize(text)
  const bp = new BlockParser(tokens, text, [], new Set<Extension>())
  const items: Item[] = []
  let cursor = 0

  let i = 0
  while (i < tokens.length) {
    const found = inlineMatchAt(bp, tokens, i, converter)
    if (!found) {
      i += 1
      continue
    }
    const { match } = found
    if (match.start > cursor) items.push({ type: "text", value: text.slice(cursor, match.start) })
    inlineQuantities.push(match.quantity)
    items.push({ type: "inline_quantity", index: inlineQuantities.length - 1 })
    cursor = match.end
    i = found.next
  }

  if (cursor < text.length) {
    items.push({ type: "text", value: text.slice(cursor) })
  }
  return items
}

export function applyInlineQuantityExtraction(
  stepItems: Item[],
  inlineQuantities: Quantity[],
  converter: Converter,
): Item[] {
  const result: Item[] = []
  for (const item of stepItems) {
    if (item.type === "text") {
      result.push(...parseInlineQuantitiesInText(item.value, inlineQuantities, converter))
    } else {
      result.push(item)
    }
  }
  return result
}
