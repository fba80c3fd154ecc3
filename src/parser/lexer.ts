import { readFileSync } from "node:fs"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"
import * as Ohm from "ohm-js"
import type { SymbolKind, Token, TokenKind } from "./internal-types"

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

const grammarSource = readFileSync(join(__dirname, "../../grammars/cooklang-tokens.ohm"), "utf-8")
const grammar = Ohm.grammar(grammarSource)
const semantics = grammar.createSemantics()

const RULE_KINDS: Record<string, TokenKind> = {
  blockComment: "blockComment",
  lineComment: "lineComment",
  newline: "newline",
  whitespace: "ws",
  escaped: "escaped",
  metadataMarker: ">>",
  zeroInt: "zeroInt",
  int: "int",
  word: "word",
  punctuation: "punctuation",
}

const SYMBOLS = new Set<string>([
  "@", "#", "~", "{", "}", "(", ")", "%", "|", "*", "-", "/", "=", "&", "?", "+", ":", ">",
])

function isSymbolKind(s: string): s is SymbolKind {
  return SYMBOLS.has(s)
}

semantics.addOperation<Token[]>("tokens", {
  tokens(iter) {
    return iter.children.map(token => {
      const alt = token.child(0)
      const span = { start: alt.source.startIdx, end: alt.source.endIdx }
      if (alt.ctorName === "symbol") {
        const symbol = alt.sourceString
        if (!isSymbolKind(symbol)) {
          throw new Error(`Lexer produced an unknown symbol: '${symbol}'`)
        }
        return { kind: symbol, span }
      }
      const kind = RULE_KINDS[alt.ctorName]
      if (kind === undefined) {
        throw new Error(`Lexer produced an unknown token rule: '${alt.ctorName}'`)
      }
      return { kind, span }
    })
  },
})

/** Split Cooklang source into spanned tokens. Every character belongs to exactly one token. */
export function tokenize(input: string): Token[] {
  const matchResult = grammar.match(input)
  if (matchResult.failed()) {
    // the token grammar accepts any input, a failure is a bug in the grammar
    throw new Error(`Tokenizer failed: ${matchResult.shortMessage ?? "unknown error"}`)
  }
  const tokens: Token[] = semantics(matchResult).tokens()
  return tokens
}

export { grammar as tokenGrammar }
