import type { DiagnosticLabel, ParseError, SourceDiag, SourcePosition, Span } from "./types"

export function label(span: Span, message?: string): DiagnosticLabel {
  return message === undefined ? { span } : { span, message }
}

export function error(message: string, ...labels: DiagnosticLabel[]): SourceDiag {
  return { severity: "error", message, labels, hints: [] }
}

export function warning(message: string, ...labels: DiagnosticLabel[]): SourceDiag {
  return { severity: "warning", message, labels, hints: [] }
}

export function withHint(diag: SourceDiag, hint: string): SourceDiag {
  return { ...diag, hints: [...diag.hints, hint] }
}

export function withLabel(diag: SourceDiag, extra: DiagnosticLabel): SourceDiag {
  return { ...diag, labels: [...diag.labels, extra] }
}

/** 1-based line and column of an offset in `input`. */
export function positionAt(input: string, offset: number): SourcePosition {
  const clamped = Math.max(0, Math.min(offset, input.length))
  let line = 1
  let lineStart = 0
  for (let i = 0; i < clamped; i += 1) {
    if (input[i] === "\n") {
      line += 1
      lineStart = i + 1
    }
  }
  return { line, column: clamped - lineStart + 1, offset: clamped }
}

/** Attach the position of the first label to a diagnostic. */
export function locate(input: string, diag: SourceDiag): ParseError {
  const offset = diag.labels[0]?.span.start ?? 0
  return { ...diag, position: positionAt(input, offset) }
}

/**
 * Ordered errors and warnings of a pass
 */
export class SourceReport {
  readonly errors: ParseError[] = []
  readonly warnings: ParseError[] = []

  constructor(private readonly input: string) {}

  push(diag: SourceDiag): void {
    const located = locate(this.input, diag)
    if (diag.severity === "error") {
      this.errors.push(located)
    } else {
      this.warnings.push(located)
    }
  }
}
