import type { Diagnostic, DiagnosticSink } from './types.js';

/**
 * In-memory sink that keeps diagnostics in arrival order.
 */
export class DiagnosticCollector implements DiagnosticSink {
  private readonly diagnostics: Diagnostic[] = [];

  accept(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  get size(): number {
    return this.diagnostics.length;
  }

  /**
   * Diagnostics ordered by offset, then rule name.
   */
  sorted(): Diagnostic[] {
    return [...this.diagnostics].sort(
      (a, b) => a.offset - b.offset || a.ruleName.localeCompare(b.ruleName)
    );
  }

  clear(): void {
    this.diagnostics.length = 0;
  }
}
