import { error, label, withHint } from "../error"
import type { Located, Span } from "../types"
import { BlockParser, trimTokens } from "./block-parser"
import { consumeModifiers, splitNameAlias, trimmedText } from "./component-builders"
import type {
  IntermediateData,
  ParseEvent,
  QuantityNode,
  Text,
  Token,
  TokenKind,
} from "./internal-types"
import { parseQuantity } from "./quantity"

const SINGLE_WORD: ReadonlySet<TokenKind> = new Set(["word", "int", "zeroInt", "escaped"])

// a multi word name never crosses these
const NAME_STOP: ReadonlySet<TokenKind> = new Set(["newline", "@", "#", "~", "{", "}"])

interface ComponentBody {
  name: Text | null
  alias: Text | null
  quantity: readonly Token[] | null
}

/** Parse a step block, emitting its items between `startStep` and `endStep`. */
export function parseStep(bp: BlockParser): void {
  bp.event({ kind: "startStep", isText: false })

  let pending: Token[] = []
  const flush = () => {
    const first = pending[0]
    if (first === undefined) return
    bp.event({ kind: "text", text: bp.text(first.span.start, pending) })
    pending = []
  }

  while (bp.peek() !== "eof") {
    const component = parseComponent(bp)
    if (component) {
      flush()
      bp.event(component)
      continue
    }
    pending.push(bp.bumpAny())
  }
  flush()

  bp.event({ kind: "endStep", isText: false })
}

/** Parse a text paragraph block. The leading `>` of every line is dropped by the caller. */
export function parseTextStep(bp: BlockParser): void {
  bp.event({ kind: "startStep", isText: true })
  const tokens = bp.consumeRest()
  bp.event({ kind: "text", text: bp.text(bp.currentOffset(), tokens) })
  bp.event({ kind: "endStep", isText: true })
}

function parseComponent(bp: BlockParser): ParseEvent | null {
  switch (bp.peek()) {
    case "@":
      return bp.withRecover(ingredient)
    case "#":
      return bp.withRecover(cookware)
    case "~":
      return bp.withRecover(timer)
    default:
      return null
  }
}

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

function ingredient(bp: BlockParser): ParseEvent | null {
  const start = bp.bump("@").span.start
  const modifiers = consumeModifiers(bp, "ingredient")
  let intermediateData = parseIntermediateData(bp)
  const body = componentBody(bp, true)
  if (!body?.name) return null
  const note = parseNote(bp)
  const span = { start, end: lastEnd(bp) }

  if (modifiers.value.reference && modifiers.value.new) {
    bp.error(
      withHint(
        error("Conflicting modifiers: '&' and '+'", label(modifiers.span)),
        "A component is either a reference or a new definition",
      ),
    )
  }
  if (intermediateData && !modifiers.value.reference) {
    bp.error(
      withHint(
        error("Intermediate preparation without a reference", label(intermediateData.span)),
        "Add the '&' modifier to reference a previous step or section",
      ),
    )
    intermediateData = null
  }

  return {
    kind: "ingredient",
    node: {
      value: {
        modifiers,
        intermediateData,
        name: body.name,
        alias: body.alias,
        quantity: body.quantity ? quantity(bp, body.quantity) : null,
        note,
      },
      span,
    },
  }
}

function cookware(bp: BlockParser): ParseEvent | null {
  const start = bp.bump("#").span.start
  const modifiers = consumeModifiers(bp, "cookware")
  const body = componentBody(bp, true)
  if (!body?.name) return null
  const note = parseNote(bp)
  const span = { start, end: lastEnd(bp) }

  if (modifiers.value.reference && modifiers.value.new) {
    bp.error(
      withHint(
        error("Conflicting modifiers: '&' and '+'", label(modifiers.span)),
        "A component is either a reference or a new definition",
      ),
    )
  }

  const amount = body.quantity ? quantity(bp, body.quantity) : null
  if (amount?.value.unit) {
    bp.error(
      withHint(
        error("Invalid cookware quantity: cookware cannot have units", label(amount.value.unit.span, "remove this")),
        "Cookware amounts are plain values, the unit is ignored",
      ),
    )
  }

  return {
    kind: "cookware",
    node: {
      value: { modifiers, name: body.name, alias: body.alias, quantity: amount, note },
      span,
    },
  }
}

function timer(bp: BlockParser): ParseEvent | null {
  const start = bp.bump("~").span.start
  const body = componentBody(bp, false)
  if (!body || (!body.name && !body.quantity)) return null
  const span = { start, end: lastEnd(bp) }
  return {
    kind: "timer",
    node: {
      value: { name: body.name, quantity: body.quantity ? quantity(bp, body.quantity) : null },
      span,
    },
  }
}

function quantity(bp: BlockParser, tokens: readonly Token[]): Located<QuantityNode> {
  return parseQuantity(bp, tokens).quantity
}

// ---------------------------------------------------------------------------
// Component parts
// ---------------------------------------------------------------------------

/**
 * `name{quantity}` or a single word name. Multi word names need the braces.
 * `quantity` is null when there are no braces or only whitespace inside them.
 */
function componentBody(bp: BlockParser, allowAlias: boolean): ComponentBody | null {
  const braced = bp.withRecover(bp => {
    const offset = bp.currentOffset()
    const nameTokens = bp.consumeWhile(kind => !NAME_STOP.has(kind))
    if (!bp.consume("{")) return null
    const quantityTokens = bp.consumeWhile(kind => kind !== "}" && kind !== "newline")
    if (!bp.consume("}")) return null
    const names = allowAlias
      ? splitNameAlias(bp, offset, nameTokens)
      : { name: trimmedText(bp, offset, nameTokens), alias: null }
    return {
      ...names,
      quantity: trimTokens(quantityTokens).length > 0 ? quantityTokens : null,
    }
  })
  if (braced) return braced

  const offset = bp.currentOffset()
  const withAlias = allowAlias && bp.extension("COMPONENT_ALIAS")
  const wordTokens = bp.consumeWhile(kind => SINGLE_WORD.has(kind) || (withAlias && kind === "|"))
  if (wordTokens.length === 0) return null
  const names = allowAlias
    ? splitNameAlias(bp, offset, wordTokens)
    : { name: trimmedText(bp, offset, wordTokens), alias: null }
  return { ...names, quantity: null }
}

/** `(note)` right after the component body. */
function parseNote(bp: BlockParser): Text | null {
  if (!bp.extension("COMPONENT_NOTE") || bp.peek() !== "(") return null
  return bp.withRecover(bp => {
    const open = bp.bump("(")
    const tokens = bp.consumeWhile(kind => kind !== ")" && kind !== "newline")
    if (!bp.consume(")")) return null
    return trimmedText(bp, open.span.end, tokens) ?? { value: "", span: { start: open.span.end, end: open.span.end } }
  })
}

/**
 * `(N)`, `(~N)`, `(=N)` or `(=~N)` before an ingredient name. Malformed
 * contents are reported and ignored.
 */
function parseIntermediateData(bp: BlockParser): Located<IntermediateData> | null {
  if (!bp.extension("INTERMEDIATE_PREPARATIONS") || bp.peek() !== "(") return null

  const inner = bp.withRecover(bp => {
    const open = bp.bump("(")
    const tokens = bp.consumeWhile(kind => kind !== ")" && kind !== "newline" && kind !== "{")
    const close = bp.consume(")")
    if (!close) return null
    return { tokens, span: { start: open.span.start, end: close.span.end } }
  })
  if (!inner) return null

  const significant = inner.tokens.filter(t => t.kind !== "ws")
  let i = 0
  const targetKind = significant[i]?.kind === "=" ? "section" : "step"
  if (targetKind === "section") i += 1
  const refMode = significant[i]?.kind === "~" ? "relative" : "number"
  if (refMode === "relative") i += 1
  const numberToken = significant[i]

  if (numberToken?.kind !== "int" || i !== significant.length - 1) {
    bp.error(invalidIntermediate(inner.span))
    return null
  }
  const value = Number(bp.tokenStr(numberToken))
  return { value: { refMode, targetKind, value }, span: inner.span }
}

function invalidIntermediate(span: Span) {
  return withHint(
    error("Invalid intermediate preparation reference", label(span)),
    "Use '(N)' for step N, '(~N)' for N steps back, '(=N)' for section N or '(=~N)' for N sections back",
  )
}

function lastEnd(bp: BlockParser): number {
  const parsed = bp.parsed()
  const last = parsed[parsed.length - 1]
  return last ? last.span.end : bp.currentOffset()
}
