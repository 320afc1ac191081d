import type { LintResult } from '../core/lint/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter. Exceptions are reduced to their JSON form.
 */
export class JsonFormatter implements IFormatter {
  formatResult(result: LintResult): string {
    return JSON.stringify(toJson(result), null, 2);
  }

  formatResults(results: LintResult[]): string {
    return JSON.stringify(
      {
        summary: {
          files: results.length,
          diagnostics: results.reduce((sum, result) => sum + result.diagnostics.length, 0),
        },
        results: results.map(toJson),
      },
      null,
      2
    );
  }
}

function toJson(result: LintResult): Record<string, unknown> {
  return {
    filePath: result.filePath,
    diagnostics: result.diagnostics,
    exceptions: result.exceptions.map((failure) => failure.toJSON()),
  };
}
