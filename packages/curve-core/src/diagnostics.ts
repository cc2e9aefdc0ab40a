// ---------------------------------------------------------------------------
// Diagnostics collector
// ---------------------------------------------------------------------------
// Engine operations never throw for short windows, degenerate fits or bad
// selections; they return the best-effort curve. A caller that wants to know
// what was absorbed passes a DiagnosticLog and inspects it afterwards.

import type { Diagnostic, DiagnosticCode } from '@curvekit/types';
import type { LogFields, Logger } from './logging/logger.js';

export type DiagnosticSeverity = 'debug' | 'warn';

export class DiagnosticLog {
  private readonly entries: Diagnostic[] = [];

  constructor(private readonly logger?: Logger) {}

  /**
   * Record a diagnostic. `warn` is for whole-call fallbacks and no-ops,
   * `debug` for per-point skips, which can be numerous.
   */
  report(diagnostic: Diagnostic, severity: DiagnosticSeverity = 'warn'): void {
    this.entries.push(diagnostic);
    if (!this.logger) return;
    const fields: LogFields = {
      code: diagnostic.code,
      operation: diagnostic.operation,
      index: diagnostic.index,
      frame: diagnostic.frame,
    };
    if (severity === 'warn') this.logger.warn(diagnostic.message, fields);
    else this.logger.debug(diagnostic.message, fields);
  }

  /** Log an operation summary without recording a diagnostic. */
  trace(msg: string, fields?: LogFields): void {
    this.logger?.debug(msg, fields);
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  has(code: DiagnosticCode): boolean {
    return this.entries.some((d) => d.code === code);
  }

  byCode(code: DiagnosticCode): Diagnostic[] {
    return this.entries.filter((d) => d.code === code);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
