import { label, warning } from "../error"
import { BlockParser, isWsOrComment, textFromTokens, trimTokens } from "./block-parser"
import type { ExtensionSet, ParseEvent, Token } from "./internal-types"
import { tokenize } from "./lexer"
import { parseStep, parseTextStep } from "./step"

const FRONTMATTER_RE = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/

interface Line {
  tokens: readonly Token[]
  newline: Token | null
}

type LineKind = "blank" | "metadata" | "section" | "text" | "step"

/**
 * Turn Cooklang source into the ordered events of its blocks.
 *
 * Front matter comes first, then metadata lines, sections, text paragraphs and
 * steps in source order, with diagnostics interleaved where they were found.
 */
export function parseEvents(input: string, extensions: ExtensionSet): ParseEvent[] {
  const events: ParseEvent[] = []
  let offset = 0

  const frontmatter = FRONTMATTER_RE.exec(input)
  if (frontmatter) {
    const content = frontmatter[1] ?? ""
    const contentStart = input.indexOf("\n") + 1
    events.push({
      kind: "frontmatter",
      text: { value: content, span: { start: contentStart, end: contentStart + content.length } },
    })
    offset = frontmatter[0].length
  }

  const tokens = tokenize(input.slice(offset)).map(t => ({
    kind: t.kind,
    span: { start: t.span.start + offset, end: t.span.end + offset },
  }))

  let stepLines: Line[] = []
  let textLines: Line[] = []

  const flushStep = () => {
    if (stepLines.length === 0) return
    const bp = new BlockParser(joinLines(stepLines), input, events, extensions)
    parseStep(bp)
    bp.finish()
    stepLines = []
  }
  const flushText = () => {
    if (textLines.length === 0) return
    const bp = new BlockParser(joinLines(textLines), input, events, extensions)
    parseTextStep(bp)
    bp.finish()
    textLines = []
  }

  for (const line of splitLines(tokens)) {
    const kind = lineKind(line, extensions)
    if (kind !== "text") flushText()
    if (kind !== "step") flushStep()

    switch (kind) {
      case "blank":
        break
      case "metadata":
        if (!metadataLine(line, input, events, extensions)) stepLines.push(line)
        break
      case "section":
        sectionLine(line, input, events)
        break
      case "text":
        textLines.push(withoutMarker(line))
        break
      case "step":
        stepLines.push(line)
        break
    }
    if (!extensions.has("MULTILINE_STEPS")) flushStep()
  }
  flushText()
  flushStep()

  return events
}

function splitLines(tokens: readonly Token[]): Line[] {
  const lines: Line[] = []
  let current: Token[] = []
  for (const token of tokens) {
    if (token.kind === "newline") {
      lines.push({ tokens: current, newline: token })
      current = []
    } else {
      current.push(token)
    }
  }
  if (current.length > 0) lines.push({ tokens: current, newline: null })
  return lines
}

function lineKind(line: Line, extensions: ExtensionSet): LineKind {
  const first = line.tokens.find(t => !isWsOrComment(t.kind))
  if (!first) return "blank"
  if (first.kind === ">>") return "metadata"
  if (first.kind === "=" && extensions.has("SECTIONS")) return "section"
  if (first.kind === ">" && extensions.has("TEXT_STEPS")) return "text"
  return "step"
}

/** Lines trimmed of whitespace and comments, separated by their line breaks. */
function joinLines(lines: readonly Line[]): Token[] {
  const tokens: Token[] = []
  lines.forEach((line, i) => {
    if (i > 0) {
      const previous = lines[i - 1]?.newline
      if (previous) tokens.push(previous)
    }
    tokens.push(...trimTokens(line.tokens))
  })
  return tokens
}

function withoutMarker(line: Line): Line {
  const trimmed = trimTokens(line.tokens)
  return { tokens: trimmed.slice(1), newline: line.newline }
}

/** `>> key: value`. Returns false when the line is not a valid entry. */
function metadataLine(
  line: Line,
  input: string,
  events: ParseEvent[],
  extensions: ExtensionSet,
): boolean {
  const bp = new BlockParser(trimTokens(line.tokens), input, events, extensions)
  const entry = bp.withRecover(bp => {
    const marker = bp.bump(">>")
    const keyTokens = bp.consumeWhile(kind => kind !== ":")
    const colon = bp.consume(":")
    if (!colon) return null
    const key = textFromTokens(input, marker.span.end, trimTokens(keyTokens))
    if (key.value.trim() === "") return null
    const value = textFromTokens(input, colon.span.end, trimTokens(bp.consumeRest()))
    return { key: { value: key.value.trim(), span: key.span }, value: { value: value.value.trim(), span: value.span } }
  })
  if (!entry) {
    bp.warning(warning("Invalid metadata line, it will be parsed as a step", label(bp.span())))
    return false
  }
  events.push({ kind: "metadata", key: entry.key, value: entry.value })
  return true
}

/** `= name`, `== name ==`. An empty name is an unnamed section. */
function sectionLine(line: Line, input: string, events: ParseEvent[]): void {
  const tokens = trimTokens(line.tokens)
  let from = 0
  while (tokens[from]?.kind === "=") from += 1
  let to = tokens.length
  while (to > from && tokens[to - 1]?.kind === "=") to -= 1
  const nameTokens = trimTokens(tokens.slice(from, to))
  const offset = tokens[from]?.span.start ?? tokens[0]?.span.end ?? 0
  const name = textFromTokens(input, offset, nameTokens)
  const value = name.value.trim()
  events.push({ kind: "section", name: value === "" ? null : { value, span: name.span } })
}
