/**
 * Tests for rule registry lookup and rule-set resolution.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as ast from '../../../../src/ast/factory.js';
import { LintRule } from '../../../../src/core/lint/rule.js';
import type { LintCode } from '../../../../src/core/lint/types.js';
import { getAllRuleNames, getRule, hasRule } from '../../../../src/core/rules/registry.js';
import {
  createLinter,
  findIncompatibleRules,
  resolveRuleSet,
} from '../../../../src/core/rules/rule-set.js';
import { UnnecessaryFinalRule } from '../../../../src/core/rules/unnecessary-final.js';
import { getDefaultOptions, parseAnalysisOptions } from '../../../../src/core/config/loader.js';

class StubRule extends LintRule {
  readonly description = 'stub';
  readonly details = '';
  readonly group = 'style' as const;

  constructor(
    readonly name: string,
    private readonly opposites: string[]
  ) {
    super();
  }

  get incompatibleRules(): readonly string[] {
    return this.opposites;
  }

  get lintCodes(): readonly LintCode[] {
    return [];
  }

  registerNodeProcessors(): void {}
}

describe('rule registry', () => {
  it('should create a fresh unnecessary_final rule per lookup', () => {
    const first = getRule('unnecessary_final');
    const second = getRule('unnecessary_final');

    expect(first).toBeInstanceOf(UnnecessaryFinalRule);
    expect(first).not.toBe(second);
  });

  it('should report unknown rules', () => {
    expect(getRule('prefer_final_locals')).toBeUndefined();
    expect(hasRule('prefer_final_locals')).toBe(false);
    expect(hasRule('unnecessary_final')).toBe(true);
  });

  it('should list rule names', () => {
    expect(getAllRuleNames()).toEqual(['unnecessary_final']);
  });
});

describe('findIncompatibleRules', () => {
  it('should report each contradicting pair once', () => {
    const rules = [new StubRule('a', ['b']), new StubRule('b', ['a']), new StubRule('c', [])];

    expect(findIncompatibleRules(rules)).toEqual([{ rule: 'a', incompatibleWith: 'b' }]);
  });

  it('should count enabled names without an implementation', () => {
    const conflicts = findIncompatibleRules(
      [new UnnecessaryFinalRule()],
      ['unnecessary_final', 'prefer_final_parameters']
    );

    expect(conflicts).toEqual([
      { rule: 'unnecessary_final', incompatibleWith: 'prefer_final_parameters' },
    ]);
  });

  it('should find nothing when no opposite rule is enabled', () => {
    expect(findIncompatibleRules([new UnnecessaryFinalRule()])).toEqual([]);
  });
});

describe('resolveRuleSet', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should instantiate known rules and log unknown and conflicting ones', () => {
    const options = parseAnalysisOptions(
      ['linter:', '  rules:', '    - unnecessary_final', '    - prefer_final_locals', '    - made_up'].join('\n')
    );

    const resolved = resolveRuleSet(options);

    expect(resolved.rules.map((rule) => rule.name)).toEqual(['unnecessary_final']);
    expect(resolved.unknown).toEqual(['prefer_final_locals', 'made_up']);
    expect(resolved.conflicts).toEqual([
      { rule: 'unnecessary_final', incompatibleWith: 'prefer_final_locals' },
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining(
        "The rule 'unnecessary_final' is incompatible with the rule 'prefer_final_locals'"
      )
    );
  });

  it('should resolve nothing from default options', () => {
    expect(resolveRuleSet(getDefaultOptions())).toEqual({ rules: [], unknown: [], conflicts: [] });
  });
});

describe('createLinter', () => {
  it('should apply configured severities', () => {
    const options = parseAnalysisOptions(
      ['linter:', '  rules:', '    - unnecessary_final', 'analyzer:', '  errors:', '    unnecessary_final: error'].join('\n')
    );
    const unit = ast.compilationUnit([
      ast.functionDeclaration(
        'main',
        ast.formalParameterList(),
        ast.block([
          ast.variableDeclarationStatement(
            ast.variableDeclarationList({
              keyword: ast.token('final', 14),
              variables: [ast.variableDeclaration('x', '1')],
            })
          ),
        ])
      ),
    ]);

    const result = createLinter(options).lint(unit);

    expect(result.diagnostics.map((d) => [d.severity, d.offset])).toEqual([['error', 14]]);
  });
});
