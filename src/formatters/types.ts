/**
 * Formatter type definitions.
 */
import type { LintResult } from '../core/lint/types.js';

export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Include correction hints */
  showCorrections: boolean;
}

export interface IFormatter {
  formatResult(result: LintResult): string;
  formatResults(results: LintResult[]): string;
}
