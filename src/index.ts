/**
 * Cooklang Parser - Main API
 *
 * Parses Cooklang recipes into a scalable model with resolved references,
 * then scales and converts their quantities.
 */

export { analyze } from "./analysis"
export {
  Converter,
  convertQuantity,
  convertRecipe,
  unitDisplayName,
  type ConvertError,
  type ConvertResult,
  type PhysicalQuantity,
  type System,
  type Unit,
  type UnitsConfig,
} from "./converter"
export { SourceReport, positionAt } from "./error"
export * from "./model"
export { parseEvents } from "./parser"
export { ALL_EXTENSIONS, CANONICAL_EXTENSIONS, resolveExtensions } from "./parser/extensions"
export type { ParseEvent, Token, TokenKind } from "./parser/internal-types"
export { tokenize, tokenGrammar } from "./parser/lexer"
export {
  GroupedQuantity,
  addNumbers,
  addQuantities,
  addValues,
  approxNumber,
  fitQuantity,
  numberToFloat,
  scaleValue,
  type QuantityAddError,
  type Result,
  type TotalQuantity,
} from "./quantity"
export { defaultScale, scale } from "./scale"
export type * from "./types"

import { analyze } from "./analysis"
import { Converter } from "./converter"
import { SourceReport } from "./error"
import { parseEvents } from "./parser"
import { resolveExtensions } from "./parser/extensions"
import type { ParseCooklangOptions, ParseResult } from "./types"

let bundledConverter: Converter | null = null

function defaultConverter(): Converter {
  bundledConverter ??= Converter.bundled()
  return bundledConverter
}

/**
 * Parse Cooklang source into a recipe
 *
 * A recipe is always returned; problems in the source are reported as errors
 * and warnings with their position.
 *
 * @example
 * ```ts
 * const { recipe, errors } = parseCooklang("Mix @flour{250%g} and @eggs{3}")
 *
 * recipe.ingredients[0]
 * // { name: "flour", quantity: { value: { type: "fixed", ... }, unit: "g" }, ... }
 * ```
 */
export function parseCooklang(source: string, options: ParseCooklangOptions = {}): ParseResult {
  const extensions = resolveExtensions(options)
  const converter = options.converter ?? defaultConverter()
  const report = new SourceReport(source)
  const events = parseEvents(source, extensions)
  const recipe = analyze(events, source, extensions, converter, report)
  return { recipe, errors: report.errors, warnings: report.warnings }
}

/**
 * Parser bound to a set of options and a converter
 */
export class CooklangParser {
  readonly converter: Converter

  constructor(private readonly options: ParseCooklangOptions = {}) {
    this.converter = options.converter ?? defaultConverter()
  }

  parse(source: string): ParseResult {
    return parseCooklang(source, { ...this.options, converter: this.converter })
  }
}
