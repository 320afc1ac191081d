import chalk from 'chalk';
import type { Diagnostic, LintResult, LintSeverity } from '../core/lint/types.js';
import type { FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'yellow' | 'blue' | 'dim';

const SEVERITY_COLORS: Record<LintSeverity, Color> = {
  error: 'red',
  warning: 'yellow',
  info: 'blue',
};

/**
 * Human-readable output formatter, one line per diagnostic:
 * `path:line:column • message • code • severity`
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      showCorrections: options.showCorrections ?? true,
    };
  }

  formatResult(result: LintResult): string {
    const lines: string[] = [];
    const location = result.filePath ?? '<unit>';

    for (const diagnostic of result.diagnostics) {
      lines.push(...this.formatDiagnostic(location, diagnostic));
    }
    for (const failure of result.exceptions) {
      lines.push(`${location} • ${this.colorize(failure.message, 'red')}`);
    }

    return lines.join('\n');
  }

  formatResults(results: LintResult[]): string {
    const body = results
      .map((result) => this.formatResult(result))
      .filter((text) => text.length > 0);
    const count = results.reduce((sum, result) => sum + result.diagnostics.length, 0);
    const summary = count === 0
      ? 'No issues found!'
      : `${count} ${count === 1 ? 'issue' : 'issues'} found.`;

    return [...body, summary].join('\n');
  }

  private formatDiagnostic(location: string, diagnostic: Diagnostic): string[] {
    const severity = this.colorize(diagnostic.severity, SEVERITY_COLORS[diagnostic.severity]);
    const lines = [
      `${location}:${diagnostic.line}:${diagnostic.column} • ${diagnostic.message} • ${diagnostic.code} • ${severity}`,
    ];
    if (this.options.showCorrections && diagnostic.correctionMessage) {
      lines.push(`  ${this.colorize(diagnostic.correctionMessage, 'dim')}`);
    }
    return lines;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) return text;
    return chalk[color](text);
  }
}
