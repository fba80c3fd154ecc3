import { isSeq, parseDocument } from "yaml"
import { label, warning, withHint } from "../error"
import type { SourceDiag, Span } from "../types"
import { isRecord } from "../utils"
import type { Text } from "./internal-types"

export interface FrontMatter {
  data: Record<string, unknown>
  diag: SourceDiag | null
}

const KEY_VALUE_LINE = /^\s*([^:\s][^:]*?)\s*:\s*(.*?)\s*$/

/** `key: value` lines, null when some line is not one. */
function keyValueLines(content: string): Record<string, string> | null {
  const data: Record<string, string> = {}
  for (const line of content.split("\n")) {
    if (line.trim() === "") continue
    const match = KEY_VALUE_LINE.exec(line)
    if (!match?.[1]) return null
    data[match[1]] = match[2] ?? ""
  }
  return Object.keys(data).length > 0 ? data : null
}

function invalid(message: string, span: Span, detail: string, lines: Record<string, string> | null): FrontMatter {
  const diag = warning(`Invalid YAML frontmatter: ${message}`, label(span, detail))
  return lines
    ? { data: lines, diag: withHint(diag, "It was read as plain 'key: value' lines") }
    : { data: {}, diag }
}

/**
 * Metadata of the `---` block. YAML that does not parse, or is not a mapping,
 * falls back to plain `key: value` lines.
 */
export function parseFrontMatter(content: Text): FrontMatter {
  const doc = parseDocument(content.value)
  const base = content.span.start
  const at = (start: number, end: number): Span => ({ start: base + start, end: base + end })
  const lines = keyValueLines(content.value)

  const [yamlError] = doc.errors
  if (yamlError) {
    const [start, end] = yamlError.pos
    return invalid("syntax error", at(start, end), yamlError.code.toLowerCase().replace(/_/g, " "), lines)
  }

  const node = doc.contents
  if (node === null) return { data: lines ?? {}, diag: null }

  let data: unknown
  try {
    data = doc.toJS()
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e)
    return invalid("cannot be resolved", at(node.range[0], node.range[1]), message, lines)
  }
  if (isRecord(data)) return { data, diag: null }
  if (lines) return { data: lines, diag: null }
  return invalid(
    "expected a key/value mapping",
    at(node.range[0], node.range[1]),
    `found ${isSeq(node) ? "a sequence" : "a single value"}`,
    null,
  )
}
