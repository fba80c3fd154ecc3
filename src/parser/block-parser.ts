import { error as errorDiag } from "../error"
import type { Extension, SourceDiag, Span } from "../types"
import type { ExtensionSet, ParseEvent, Text, Token, TokenKind } from "./internal-types"

export function isWsOrComment(kind: TokenKind): boolean {
  return kind === "ws" || kind === "lineComment" || kind === "blockComment"
}

/** Span covering a non empty run of tokens. */
export function tokensSpan(tokens: readonly Token[]): Span {
  const first = tokens[0]
  const last = tokens[tokens.length - 1]
  if (first === undefined || last === undefined) {
    throw new Error("tokensSpan called with no tokens")
  }
  return { start: first.span.start, end: last.span.end }
}

/** Remove whitespace and comments from both ends. */
export function trimTokens(tokens: readonly Token[]): readonly Token[] {
  const from = tokens.findIndex(t => !isWsOrComment(t.kind))
  if (from === -1) return []
  let to = tokens.length - 1
  while (to > from && isWsOrComment(tokens[to]?.kind ?? "ws")) to -= 1
  return tokens.slice(from, to + 1)
}

/** Build a `Text` from tokens of `input`, starting at `offset` when there are none. */
export function textFromTokens(input: string, offset: number, tokens: readonly Token[]): Text {
  let value = ""
  for (const token of tokens) {
    switch (token.kind) {
      case "lineComment":
      case "blockComment":
        break
      case "newline":
        value += " "
        break
      case "escaped":
        // a trailing backslash escapes nothing and stays as written
        value += token.span.end - token.span.start > 1 ? input.slice(token.span.start + 1, token.span.end) : "\\"
        break
      default:
        value += input.slice(token.span.start, token.span.end)
    }
  }
  const span = tokens.length > 0 ? tokensSpan(tokens) : { start: offset, end: offset }
  return { value, span }
}

/**
 * Cursor over the tokens of one block
 *
 * Diagnostics and parsed elements are pushed to `events`, shared by all the
 * blocks of a parse. Sub-parses that may fail run inside `withRecover` so a bad
 * construct only rolls back itself.
 */
export class BlockParser {
  private current = 0

  constructor(
    private readonly tokens: readonly Token[],
    readonly input: string,
    readonly events: ParseEvent[],
    readonly extensions: ExtensionSet,
  ) {}

  extension(ext: Extension): boolean {
    return this.extensions.has(ext)
  }

  /** Every token of the block. */
  allTokens(): readonly Token[] {
    return this.tokens
  }

  /** Tokens already consumed. */
  parsed(): readonly Token[] {
    return this.tokens.slice(0, this.current)
  }

  /** Tokens not consumed yet. */
  rest(): readonly Token[] {
    return this.tokens.slice(this.current)
  }

  span(): Span {
    if (this.tokens.length === 0) return { start: 0, end: 0 }
    return tokensSpan(this.tokens)
  }

  /** Start of the next token, or end of the block when all are consumed. */
  currentOffset(): number {
    const next = this.tokens[this.current]
    if (next) return next.span.start
    const last = this.tokens[this.tokens.length - 1]
    return last ? last.span.end : 0
  }

  peek(): TokenKind | "eof" {
    return this.tokens[this.current]?.kind ?? "eof"
  }

  bumpAny(): Token {
    const token = this.tokens[this.current]
    if (!token) throw new Error("Unexpected end of block")
    this.current += 1
    return token
  }

  bump(kind: TokenKind): Token {
    const token = this.bumpAny()
    if (token.kind !== kind) {
      throw new Error(`Expected token '${kind}', found '${token.kind}'`)
    }
    return token
  }

  /** Consume the next token only if it is of `kind`. */
  consume(kind: TokenKind): Token | null {
    if (this.peek() !== kind) return null
    return this.bumpAny()
  }

  consumeWhile(predicate: (kind: TokenKind) => boolean): readonly Token[] {
    const start = this.current
    while (this.current < this.tokens.length) {
      const token = this.tokens[this.current]
      if (!token || !predicate(token.kind)) break
      this.current += 1
    }
    return this.tokens.slice(start, this.current)
  }

  consumeRest(): readonly Token[] {
    const rest = this.tokens.slice(this.current)
    this.current = this.tokens.length
    return rest
  }

  wsComments(): readonly Token[] {
    return this.consumeWhile(isWsOrComment)
  }

  tokenStr(token: Token): string {
    return this.input.slice(token.span.start, token.span.end)
  }

  /** Raw source of a non empty run of tokens. */
  sliceStr(tokens: readonly Token[]): string {
    const span = tokensSpan(tokens)
    return this.input.slice(span.start, span.end)
  }

  text(offset: number, tokens: readonly Token[]): Text {
    return textFromTokens(this.input, offset, tokens)
  }

  event(event: ParseEvent): void {
    this.events.push(event)
  }

  error(diag: SourceDiag): void {
    this.events.push({ kind: "error", diag })
  }

  warning(diag: SourceDiag): void {
    this.events.push({ kind: "warning", diag: { ...diag, severity: "warning" } })
  }

  /**
   * Run a sub-parse that may fail
   *
   * When `f` returns `null` the cursor and the events emitted by `f` are rolled
   * back, so the caller can parse the same tokens another way.
   */
  withRecover<T>(f: (bp: BlockParser) => T | null): T | null {
    const position = this.current
    const eventCount = this.events.length
    const result = f(this)
    if (result === null) {
      this.current = position
      this.events.length = eventCount
    }
    return result
  }

  /** Checks the whole block was consumed. */
  finish(): void {
    if (this.current !== this.tokens.length) {
      const rest = this.rest()
      this.error(errorDiag("Unparsed tokens left in block", { span: tokensSpan(rest) }))
      this.current = this.tokens.length
    }
  }
}
