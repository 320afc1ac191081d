/**
 * Runs a set of lint rules over a syntax tree.
 */
import type { AstNode } from '../../ast/types.js';
import { walkTree } from '../../ast/walker.js';
import { RuleExecutionError } from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { DiagnosticCollector } from './collector.js';
import { NodeLintRegistry, dispatchNode } from './node-registry.js';
import type { LintRule } from './rule.js';
import type { LinterContext, LintResult, SeverityOverride } from './types.js';

const logger = rootLogger.child('lint');

export interface LinterOptions {
  /** Per-rule severity; rules default to `info`, `ignore` disables them */
  severities?: Readonly<Record<string, SeverityOverride>>;
}

export interface LintRunOptions {
  filePath?: string;
}

export class Linter {
  private readonly rules: readonly LintRule[];
  private readonly severities: Readonly<Record<string, SeverityOverride>>;

  constructor(rules: readonly LintRule[], options: LinterOptions = {}) {
    this.rules = rules;
    this.severities = options.severities ?? {};
  }

  /**
   * Rules that will run, i.e. those not configured as `ignore`.
   */
  get activeRules(): LintRule[] {
    return this.rules.filter((rule) => this.severities[rule.name] !== 'ignore');
  }

  /**
   * Lint one unit. Processor failures are collected on the result and the
   * walk continues with the next processor.
   */
  lint(root: AstNode, options: LintRunOptions = {}): LintResult {
    const context: LinterContext = { filePath: options.filePath ?? null };
    const registry = new NodeLintRegistry();
    const collector = new DiagnosticCollector();
    const exceptions: RuleExecutionError[] = [];
    const active = this.activeRules;

    try {
      for (const rule of active) {
        const severity = this.severities[rule.name];
        rule.bind(collector, severity === undefined || severity === 'ignore' ? 'info' : severity);
        rule.registerNodeProcessors(registry, context);
      }

      walkTree(root, (node) => {
        dispatchNode(registry, node, (rule, error) => {
          const failure = new RuleExecutionError(rule.name, node.kind, error);
          exceptions.push(failure);
          logger.warn(failure.message, { filePath: context.filePath });
        });
      });
    } finally {
      for (const rule of active) {
        rule.unbind();
      }
    }

    logger.debug(`Linted ${context.filePath ?? '<unit>'}`, {
      rules: active.length,
      diagnostics: collector.size,
      exceptions: exceptions.length,
    });

    return {
      filePath: context.filePath,
      diagnostics: collector.sorted(),
      exceptions,
    };
  }
}
