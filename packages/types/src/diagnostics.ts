// ─── Diagnostics ─────────────────────────────────────────────────────────────

/**
 * Conditions the engine absorbs instead of throwing. The returned curve is the
 * best-effort result either way; these only describe what happened.
 */
export type DiagnosticCode =
  | 'insufficient-data'
  | 'degenerate-fit'
  | 'invalid-selection'
  | 'parameter-out-of-range'
  | 'method-fallback'

export interface Diagnostic {
  code: DiagnosticCode
  /** Operation that emitted the diagnostic, e.g. `smooth.gaussian` */
  operation: string
  message: string
  index?: number
  frame?: number
}
