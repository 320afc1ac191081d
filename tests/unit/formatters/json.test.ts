import { describe, it, expect } from 'vitest';
import { JsonFormatter } from '../../../src/formatters/json.js';
import type { LintResult } from '../../../src/core/lint/types.js';
import { RuleExecutionError } from '../../../src/utils/errors.js';

describe('JsonFormatter', () => {
  const failing: LintResult = {
    filePath: 'lib/a.dart',
    diagnostics: [
      {
        ruleName: 'unnecessary_final',
        code: 'unnecessary_final',
        message: "Local variables should not be marked as 'final'.",
        correctionMessage: "Remove the 'final'.",
        severity: 'info',
        offset: 0,
        length: 5,
        line: 1,
        column: 1,
      },
    ],
    exceptions: [new RuleExecutionError('other', 'Block', 'bad state')],
  };

  it('should serialize a result with its exceptions', () => {
    const parsed = JSON.parse(new JsonFormatter().formatResult(failing));

    expect(parsed.filePath).toBe('lib/a.dart');
    expect(parsed.diagnostics).toEqual(failing.diagnostics);
    expect(parsed.exceptions).toEqual([
      {
        name: 'RuleExecutionError',
        code: 'RULE_EXECUTION_FAILED',
        message: "Rule 'other' failed on Block: bad state",
        details: { ruleName: 'other', nodeKind: 'Block' },
      },
    ]);
  });

  it('should summarize several results', () => {
    const parsed = JSON.parse(
      new JsonFormatter().formatResults([failing, { filePath: null, diagnostics: [], exceptions: [] }])
    );

    expect(parsed.summary).toEqual({ files: 2, diagnostics: 1 });
    expect(parsed.results).toHaveLength(2);
  });
});
