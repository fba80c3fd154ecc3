import { error, label, withHint, withLabel } from "../error"
import type { Located, NumberValue, SourceDiag, Span, Value } from "../types"
import { BlockParser, isWsOrComment, tokensSpan, trimTokens } from "./block-parser"
import type { ParsedQuantity, QuantityValue, Text, Token } from "./internal-types"

type NumericResult = { ok: true; value: NumberValue } | { ok: false; error: SourceDiag }
type ValueResult = { ok: true; value: Value } | { ok: false; error: SourceDiag }

const MAX_U32 = 4294967295

/** Value used in place of one that failed to parse. */
export const RECOVER_VALUE: Value = { type: "number", value: { type: "regular", value: 1 } }

/**
 * Parse the tokens inside a component's `{}`.
 *
 * `parent` is only used to share events, input and extensions; none of its
 * tokens are consumed. `tokens` must not be empty.
 */
export function parseQuantity(parent: BlockParser, tokens: readonly Token[]): ParsedQuantity {
  if (tokens.length === 0) throw new Error("parseQuantity called with no tokens")
  const bp = new BlockParser(tokens, parent.input, parent.events, parent.extensions)

  const advanced = bp.extension("ADVANCED_UNITS") ? bp.withRecover(parseAdvancedQuantity) : null
  return advanced ?? parseRegularQuantity(bp)
}

// ---------------------------------------------------------------------------
// Grammars
// ---------------------------------------------------------------------------

function parseRegularQuantity(bp: BlockParser): ParsedQuantity {
  let value = manyValues(bp)
  let unitPart: { separator: Token; unit: Text } | null = null

  const next = bp.peek()
  if (next === "%") {
    const separator = bp.bumpAny()
    unitPart = { separator, unit: bp.text(separator.span.end, bp.consumeRest()) }
  } else if (next !== "eof") {
    // values did not parse, the whole text up to the unit is one text value
    bp.consumeWhile(kind => kind !== "%")
    const text = bp.text(bp.span().start, bp.parsed())
    value = {
      type: "single",
      value: { value: { type: "text", value: text.value.trim() }, span: text.span },
      autoScale: null,
    }
    const separator = bp.consume("%")
    if (separator) {
      unitPart = { separator, unit: bp.text(separator.span.end, bp.consumeRest()) }
    }
  }

  if (unitPart && unitPart.unit.value.trim() === "") {
    bp.error(
      withLabel(
        error("Empty quantity unit", label(unitPart.unit.span, "add unit here")),
        label(unitPart.separator.span, "or remove this"),
      ),
    )
  }

  return {
    quantity: {
      value: {
        value,
        unit: unitPart ? { value: unitPart.unit.value.trim(), span: unitPart.unit.span } : null,
      },
      span: bp.span(),
    },
    unitSeparator: unitPart ? unitPart.separator.span : null,
  }
}

/** `<value> <unit>` with no `%`, `|` or `*` at all. */
function parseAdvancedQuantity(bp: BlockParser): ParsedQuantity | null {
  if (bp.allTokens().some(t => t.kind === "|" || t.kind === "*" || t.kind === "%")) return null

  bp.wsComments()
  const consumed = bp.consumeWhile(kind => kind !== "word")
  if (consumed.length === 0 || consumed[consumed.length - 1]?.kind !== "ws") return null
  const valueTokens = trimTokens(consumed)

  const unitTokens = bp.consumeRest()
  const firstUnit = unitTokens[0]
  if (firstUnit === undefined || valueTokens.length === 0) return null

  const result = rangeValue(valueTokens, bp) ?? numericValue(valueTokens, bp)
  if (result === null) return null

  let value: Value
  if (result.ok) {
    value = result.value
  } else {
    bp.error(result.error)
    value = RECOVER_VALUE
  }

  const unit = bp.text(firstUnit.span.start, unitTokens)
  return {
    quantity: {
      value: {
        value: { type: "single", value: { value, span: tokensSpan(valueTokens) }, autoScale: null },
        unit: { value: unit.value.trim(), span: unit.span },
      },
      span: bp.span(),
    },
    unitSeparator: null,
  }
}

function manyValues(bp: BlockParser): QuantityValue {
  const values: Located<Value>[] = []
  let autoScale: Span | null = null

  for (;;) {
    const valueTokens = bp.consumeWhile(kind => kind !== "|" && kind !== "*" && kind !== "%")
    values.push(parseValue(valueTokens, bp))

    const next = bp.peek()
    if (next === "|") {
      bp.bumpAny()
      continue
    }
    if (next === "*") autoScale = bp.bumpAny().span
    break
  }

  const [first] = values
  if (values.length === 1 && first) return { type: "single", value: first, autoScale }

  if (autoScale) {
    bp.error(
      withHint(
        error(
          "Invalid quantity value: auto scale is not compatible with multiple values",
          label(autoScale, "remove this"),
        ),
        "A quantity cannot have the auto scaling marker (*) and have many values at the same time",
      ),
    )
  }
  return { type: "many", value: values }
}

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

function parseValue(tokens: readonly Token[], bp: BlockParser): Located<Value> {
  const start = tokens[0]?.span.start ?? bp.currentOffset()
  const span = { start, end: bp.currentOffset() }

  const result: ValueResult = rangeValue(tokens, bp) ?? numericValue(tokens, bp) ?? {
    ok: true,
    value: textValue(tokens, start, bp),
  }

  if (result.ok) return { value: result.value, span }
  bp.error(result.error)
  return { value: RECOVER_VALUE, span }
}

function textValue(tokens: readonly Token[], offset: number, bp: BlockParser): Value {
  const text = bp.text(offset, tokens)
  const trimmed = text.value.trim()
  if (trimmed === "") {
    bp.error(error("Empty quantity value", label(text.span, "add value here")))
  }
  return { type: "text", value: trimmed }
}

/** `start-end`, split at the first `-`. Null when it is not a range. */
function rangeValue(tokens: readonly Token[], bp: BlockParser): ValueResult | null {
  if (!bp.extension("RANGE_VALUES")) return null
  const mid = tokens.findIndex(t => t.kind === "-")
  if (mid === -1) return null

  const start = numericValue(tokens.slice(0, mid), bp)
  if (start === null) return null
  if (!start.ok) return start
  const end = numericValue(tokens.slice(mid + 1), bp)
  if (end === null) return null
  if (!end.ok) return end
  if (start.value.type !== "number" || end.value.type !== "number") return null

  return {
    ok: true,
    value: { type: "range", value: { start: start.value.value, end: end.value.value } },
  }
}

/**
 * Numbers: `int`, `int.int`, `.int`, `a/b` and `w a/b`. Null when the tokens
 * are not numeric at all.
 */
export function numericValue(tokens: readonly Token[], bp: BlockParser): ValueResult | null {
  const trimmed = trimTokens(tokens)
  if (trimmed.length === 0) return null

  const simple = simpleNumber(trimmed, bp)
  if (simple) return wrapNumber(simple)

  // at most 4 significant tokens
  const filtered = trimmed.filter(t => !isWsOrComment(t.kind))
  const [a, b, c, d] = filtered
  if (filtered.length === 4 && a && b && c && d && isFracShape(b, c, d) && a.kind === "int") {
    return wrapNumber(mixedNumber(a, b, d, bp))
  }
  if (filtered.length === 3 && a && b && c && isFracShape(a, b, c)) {
    return wrapNumber(fraction(a, c, bp))
  }
  return null
}

function wrapNumber(result: NumericResult): ValueResult {
  return result.ok ? { ok: true, value: { type: "number", value: result.value } } : result
}

function isFracShape(num: Token, slash: Token, den: Token): boolean {
  return num.kind === "int" && slash.kind === "/" && den.kind === "int"
}

function simpleNumber(tokens: readonly Token[], bp: BlockParser): NumericResult | null {
  const [a, b, c] = tokens
  if (tokens.length === 1 && a?.kind === "int") return float(tokens, bp)
  if (
    tokens.length === 3 &&
    a?.kind === "int" &&
    b?.kind === "punctuation" &&
    bp.tokenStr(b) === "." &&
    (c?.kind === "int" || c?.kind === "zeroInt")
  ) {
    return float(tokens, bp)
  }
  if (
    tokens.length === 2 &&
    a?.kind === "punctuation" &&
    bp.tokenStr(a) === "." &&
    (b?.kind === "int" || b?.kind === "zeroInt")
  ) {
    return float(tokens, bp)
  }
  return null
}

function mixedNumber(whole: Token, num: Token, den: Token, bp: BlockParser): NumericResult {
  const w = int(whole, bp)
  if (!w.ok) return w
  const f = fraction(num, den, bp)
  if (!f.ok || f.value.type !== "fraction") return f
  return { ok: true, value: { type: "fraction", value: { ...f.value.value, whole: w.value } } }
}

function fraction(numTok: Token, denTok: Token, bp: BlockParser): NumericResult {
  const span = { start: numTok.span.start, end: denTok.span.end }
  const num = int(numTok, bp)
  if (!num.ok) return num
  const den = int(denTok, bp)
  if (!den.ok) return den
  if (den.value === 0) {
    return {
      ok: false,
      error: withHint(
        error("Division by zero", label(span)),
        "Change this please, we don't want an infinite amount of anything",
      ),
    }
  }
  return { ok: true, value: { type: "fraction", value: { whole: 0, num: num.value, den: den.value, err: 0 } } }
}

function int(token: Token, bp: BlockParser): { ok: true; value: number } | { ok: false; error: SourceDiag } {
  const n = Number(bp.tokenStr(token))
  if (!Number.isInteger(n) || n > MAX_U32) {
    return { ok: false, error: error("Error parsing integer number", label(token.span)) }
  }
  return { ok: true, value: n }
}

function float(tokens: readonly Token[], bp: BlockParser): NumericResult {
  const n = Number(bp.sliceStr(tokens))
  if (!Number.isFinite(n)) {
    return { ok: false, error: error("Error parsing decimal number", label(tokensSpan(tokens))) }
  }
  return { ok: true, value: { type: "regular", value: n } }
}
