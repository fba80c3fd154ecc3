import type { Converter } from "./converter"
import { SourceReport, error, label, warning, withHint } from "./error"
import { parseFrontMatter } from "./parser/frontmatter"
import type {
  CookwareNode,
  DefineMode,
  DuplicateMode,
  ExtensionSet,
  IngredientNode,
  IntermediateData,
  ParseEvent,
  QuantityNode,
  Text,
  TimerNode,
} from "./parser/internal-types"
import {
  applyDirectiveMode,
  applyDuplicateMode,
  checkStdEntry,
  getServings,
  isSpecialDirectiveKey,
  resolveStdKey,
} from "./parser/metadata"
import { applyInlineQuantityExtraction, mergeConsecutiveTexts } from "./parser/step-processing"
import type {
  ComponentRelation,
  Cookware,
  Ingredient,
  IngredientRelation,
  Item,
  Located,
  Quantity,
  ScalableRecipe,
  ScalableValue,
  Section,
  Span,
  Timer,
} from "./types"

interface StepState {
  isText: boolean
  items: Item[]
  /** Source-like text of the step, used when steps are read as text */
  raw: string
}

interface Named {
  name: string
  relation: ComponentRelation | IngredientRelation
}

/**
 * Builds the recipe model from parse events
 *
 * Resolves component references to indices in the flat arrays, applies the
 * `[mode]` and `[duplicate]` entries and runs the checks that need the whole
 * recipe, like servings against many-valued quantities.
 */
class RecipeBuilder {
  private readonly metadata: Record<string, unknown> = {}
  private readonly metadataSpans = new Map<string, Span>()
  private frontmatterSpan: Span | null = null
  private readonly sections: Section[] = []
  private currentSection: Section | null = null
  private stepNumber = 1
  private step: StepState | null = null

  private readonly ingredients: Ingredient<ScalableValue>[] = []
  private readonly cookware: Cookware<ScalableValue>[] = []
  private readonly timers: Timer<ScalableValue>[] = []
  private readonly inlineQuantities: Quantity[] = []

  private defineMode: DefineMode = "all"
  private duplicateMode: DuplicateMode = "new"
  private readonly byServings: { span: Span; count: number }[] = []

  constructor(
    private readonly input: string,
    private readonly extensions: ExtensionSet,
    private readonly converter: Converter,
    private readonly report: SourceReport,
  ) {}

  build(events: readonly ParseEvent[]): ScalableRecipe {
    for (const event of events) this.event(event)
    this.checkServings()
    this.checkStandardMetadata()
    return {
      metadata: this.metadata,
      sections: this.sections,
      ingredients: this.ingredients,
      cookware: this.cookware,
      timers: this.timers,
      inlineQuantities: this.inlineQuantities,
      data: null,
    }
  }

  private event(event: ParseEvent): void {
    switch (event.kind) {
      case "frontmatter": {
        const frontMatter = parseFrontMatter(event.text)
        this.frontmatterSpan = event.text.span
        Object.assign(this.metadata, frontMatter.data)
        if (frontMatter.diag) this.report.push(frontMatter.diag)
        break
      }
      case "metadata":
        this.metadataEntry(event.key, event.value)
        break
      case "section":
        this.currentSection = { name: event.name?.value ?? null, content: [] }
        this.sections.push(this.currentSection)
        this.stepNumber = 1
        break
      case "startStep":
        this.step = { isText: event.isText, items: [], raw: "" }
        break
      case "text":
        if (this.step) {
          this.step.items.push({ type: "text", value: event.text.value })
          this.step.raw += event.text.value
        }
        break
      case "ingredient":
        this.component(event.node.span, () => this.ingredient(event.node), "ingredient")
        break
      case "cookware":
        this.component(event.node.span, () => this.cookwareItem(event.node), "cookware")
        break
      case "timer":
        this.component(event.node.span, () => this.timer(event.node), "timer")
        break
      case "endStep":
        this.endStep()
        break
      case "error":
      case "warning":
        this.report.push(event.diag)
        break
    }
  }

  // -------------------------------------------------------------------------
  // Metadata
  // -------------------------------------------------------------------------

  private metadataEntry(key: Text, value: Text): void {
    if (this.extensions.has("MODES") && isSpecialDirectiveKey(key.value)) {
      const lower = key.value.toLowerCase()
      const mode = lower === "[duplicate]" ? applyDuplicateMode(key.value, value.value) : applyDirectiveMode(key.value, value.value)
      if (mode === null) {
        this.report.push(
          withHint(
            warning(`Invalid value for '${key.value}': '${value.value}'`, label(value.span)),
            lower === "[duplicate]"
              ? "Possible values are: new and reference"
              : "Possible values are: all, components, steps and text",
          ),
        )
      } else if (mode === "new" || mode === "reference") {
        this.duplicateMode = mode
      } else {
        this.defineMode = mode
      }
      return
    }
    this.metadata[key.value] = value.value
    if (!this.metadataSpans.has(key.value)) this.metadataSpans.set(key.value, key.span)
  }

  private checkStandardMetadata(): void {
    for (const [key, value] of Object.entries(this.metadata)) {
      const stdKey = resolveStdKey(key)
      if (!stdKey) continue
      const mismatch = checkStdEntry(stdKey, value)
      if (!mismatch) continue
      const span = this.metadataSpans.get(key) ?? this.frontmatterSpan ?? { start: 0, end: 0 }
      this.report.push(
        withHint(
          warning(
            `Unsupported value for key: '${key}'`,
            label(span, `expected ${mismatch.expected}, got ${mismatch.got}`),
          ),
          "It will be a regular metadata entry",
        ),
      )
    }
  }

  private checkServings(): void {
    if (this.byServings.length === 0) return
    const servings = getServings(this.metadata)
    for (const { span, count } of this.byServings) {
      if (servings === null) {
        this.report.push(
          withHint(
            error("Many values but no servings declared", label(span)),
            "Declare the servings in the metadata, e.g. 'servings: 2|4'",
          ),
        )
      } else if (servings.length !== count) {
        this.report.push(
          withHint(
            error(
              `Number of values (${count}) does not match the number of servings (${servings.length})`,
              label(span),
            ),
            "Give one value per declared servings",
          ),
        )
      }
    }
  }

  // -------------------------------------------------------------------------
  // Steps
  // -------------------------------------------------------------------------

  private section(): Section {
    if (this.currentSection) return this.currentSection
    const section: Section = { name: null, content: [] }
    this.sections.push(section)
    this.currentSection = section
    return section
  }

  private endStep(): void {
    const step = this.step
    this.step = null
    if (!step) return

    if (step.isText || this.defineMode === "text") {
      const value = step.raw.trim()
      if (value !== "") this.section().content.push({ type: "text", value })
      return
    }
    if (this.defineMode === "components") return

    let items = mergeConsecutiveTexts(step.items)
    if (this.extensions.has("INLINE_QUANTITIES")) {
      items = applyInlineQuantityExtraction(items, this.inlineQuantities, this.converter)
    }
    this.section().content.push({ type: "step", items, number: this.stepNumber })
    this.stepNumber += 1
  }

  private component(
    span: Span,
    add: () => number,
    type: "ingredient" | "cookware" | "timer",
  ): void {
    const step = this.step
    if (!step) return
    const raw = this.input.slice(span.start, span.end)
    if (this.defineMode === "text") {
      this.report.push(warning(`Ignoring ${type} in text mode`, label(span)))
      step.raw += raw
      return
    }
    step.raw += raw
    const index = add()
    step.items.push({ type, index })
  }

  // -------------------------------------------------------------------------
  // Components
  // -------------------------------------------------------------------------

  private ingredient(node: Located<IngredientNode>): number {
    const n = node.value
    const index = this.ingredients.length
    const ingredient: Ingredient<ScalableValue> = {
      name: n.name.value,
      alias: n.alias?.value ?? null,
      quantity: n.quantity ? this.quantity(n.quantity) : null,
      note: n.note?.value ?? null,
      modifiers: n.modifiers.value,
      relation: this.definitionRelation(),
    }

    if (n.intermediateData) {
      const target = this.intermediateTarget(n.intermediateData)
      if (target) ingredient.relation = { type: "reference", ...target }
    } else if (this.isReference(n.modifiers.value, n.name.value, this.ingredients)) {
      const definition = this.resolveReference(n.name.value, this.ingredients, node.span, "ingredient")
      if (definition !== null) {
        ingredient.relation = { type: "reference", referencesTo: definition, referenceTarget: "ingredient" }
        this.referencedFrom(this.ingredients[definition], index)
      }
    }

    this.ingredients.push(ingredient)
    return index
  }

  private cookwareItem(node: Located<CookwareNode>): number {
    const n = node.value
    const index = this.cookware.length
    const item: Cookware<ScalableValue> = {
      name: n.name.value,
      alias: n.alias?.value ?? null,
      quantity: n.quantity ? this.scalableValue(n.quantity) : null,
      note: n.note?.value ?? null,
      modifiers: n.modifiers.value,
      relation: this.definitionRelation(),
    }

    if (this.isReference(n.modifiers.value, n.name.value, this.cookware)) {
      const definition = this.resolveReference(n.name.value, this.cookware, node.span, "cookware")
      if (definition !== null) {
        item.relation = { type: "reference", referencesTo: definition }
        this.referencedFrom(this.cookware[definition], index)
      }
    }

    this.cookware.push(item)
    return index
  }

  private timer(node: Located<TimerNode>): number {
    const n = node.value
    const quantity = n.quantity ? this.quantity(n.quantity) : null

    if (n.quantity === null) {
      if (this.extensions.has("TIMER_REQUIRES_TIME")) {
        this.report.push(
          withHint(
            error("Invalid timer: missing quantity", label(node.span)),
            "Add a duration like '~{10%min}'",
          ),
        )
      }
    } else if (quantity?.unit === null) {
      this.report.push(
        withHint(
          warning("Invalid timer quantity: missing unit", label(n.quantity.span)),
          "A timer needs a unit to know the duration",
        ),
      )
    } else if (quantity?.unit && this.extensions.has("ADVANCED_UNITS")) {
      const unit = this.converter.findUnit(quantity.unit)
      if (unit && unit.physicalQuantity !== "time") {
        this.report.push(
          withHint(
            error(`Invalid timer unit: '${quantity.unit}' is not a unit of time`, label(n.quantity.span)),
            "Use a time unit like 'min' or 'h'",
          ),
        )
      }
    }

    this.timers.push({ name: n.name?.value ?? null, quantity })
    return this.timers.length - 1
  }

  private definitionRelation(): { type: "definition"; referencedFrom: number[]; definedInStep: boolean } {
    return { type: "definition", referencedFrom: [], definedInStep: this.defineMode !== "components" }
  }

  private isReference(
    modifiers: { reference?: boolean; new?: boolean },
    name: string,
    all: readonly Named[],
  ): boolean {
    // `&` with `+` is reported by the parser and read as a definition
    if (modifiers.new) return false
    if (modifiers.reference) return true
    if (this.defineMode === "steps") return true
    return this.duplicateMode === "reference" && findDefinition(name, all) !== null
  }

  private resolveReference(
    name: string,
    all: readonly Named[],
    span: Span,
    type: "ingredient" | "cookware",
  ): number | null {
    const definition = findDefinition(name, all)
    if (definition === null) {
      this.report.push(
        withHint(
          error(`Reference not found: ${name}`, label(span)),
          `A non reference ${type} with the same name defined before cannot be found`,
        ),
      )
    }
    return definition
  }

  private referencedFrom(definition: Named | undefined, index: number): void {
    if (definition?.relation.type === "definition") definition.relation.referencedFrom.push(index)
  }

  /** Index of the step or section an intermediate preparation points to. */
  private intermediateTarget(
    data: Located<IntermediateData>,
  ): { referencesTo: number; referenceTarget: "step" | "section" } | null {
    const { refMode, targetKind, value } = data.value
    const invalid = (message: string) => {
      this.report.push(
        withHint(
          error(`Invalid intermediate preparation reference: ${message}`, label(data.span)),
          "The target must be before the current step or section",
        ),
      )
      return null
    }

    if (targetKind === "step") {
      const current = this.stepNumber
      const target = refMode === "relative" ? current - value : value
      if (target < 1 || target >= current) return invalid(`step ${target} does not come before this one`)
      const content = this.currentSection?.content ?? []
      const index = content.findIndex(c => c.type === "step" && c.number === target)
      if (index === -1) return invalid(`step ${target} not found`)
      return { referencesTo: index, referenceTarget: "step" }
    }

    const current = this.currentSection ? this.sections.length - 1 : this.sections.length
    const target = refMode === "relative" ? current - value : value - 1
    if (target < 0 || target >= current) return invalid(`section ${target + 1} does not come before this one`)
    return { referencesTo: target, referenceTarget: "section" }
  }

  // -------------------------------------------------------------------------
  // Quantities
  // -------------------------------------------------------------------------

  private quantity(node: Located<QuantityNode>): Quantity<ScalableValue> {
    const unit = node.value.unit?.value ?? ""
    return { value: this.scalableValue(node), unit: unit === "" ? null : unit }
  }

  private scalableValue(node: Located<QuantityNode>): ScalableValue {
    const value = node.value.value
    if (value.type === "many") {
      this.byServings.push({ span: node.span, count: value.value.length })
      return { type: "byServings", value: value.value.map(v => v.value) }
    }
    return { type: value.autoScale ? "linear" : "fixed", value: value.value.value }
  }
}

/** Last definition before now with the same name, ignoring case. */
function findDefinition(name: string, all: readonly Named[]): number | null {
  const lower = name.toLowerCase()
  for (let i = all.length - 1; i >= 0; i -= 1) {
    const item = all[i]
    if (item && item.relation.type === "definition" && item.name.toLowerCase() === lower) return i
  }
  return null
}

/** Build the recipe of a list of parse events. Diagnostics go to `report`. */
export function analyze(
  events: readonly ParseEvent[],
  input: string,
  extensions: ExtensionSet,
  converter: Converter,
  report: SourceReport,
): ScalableRecipe {
  return new RecipeBuilder(input, extensions, converter, report).build(events)
}
