/**
 * Base class for lint rules.
 */
import type { Token } from '../../ast/types.js';
import { LintError, ErrorCodes } from '../../utils/errors.js';
import type { NodeLintRegistry } from './node-registry.js';
import type {
  DiagnosticSink,
  LintCode,
  LinterContext,
  LintSeverity,
  RuleGroup,
  RuleMeta,
} from './types.js';

/**
 * A lint rule registers node processors with the registry and reports
 * findings through `reportLintForToken`. The linter binds a sink for the
 * duration of each run.
 */
export abstract class LintRule implements RuleMeta {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly details: string;
  abstract readonly group: RuleGroup;

  private sink: DiagnosticSink | null = null;
  private severity: LintSeverity = 'info';

  /**
   * Names of rules that enforce the opposite convention.
   */
  get incompatibleRules(): readonly string[] {
    return [];
  }

  /**
   * Every code this rule can report.
   */
  abstract get lintCodes(): readonly LintCode[];

  abstract registerNodeProcessors(registry: NodeLintRegistry, context: LinterContext): void;

  bind(sink: DiagnosticSink, severity: LintSeverity = 'info'): void {
    this.sink = sink;
    this.severity = severity;
  }

  unbind(): void {
    this.sink = null;
  }

  /**
   * Report a finding covering `token`. A null token reports nothing.
   */
  reportLintForToken(token: Token | null, code: LintCode): void {
    if (token === null) return;
    if (!this.sink) {
      throw new LintError(
        ErrorCodes.RULE_NOT_BOUND,
        `Rule '${this.name}' reported outside of a lint run`,
        { rule: this.name }
      );
    }

    this.sink.accept({
      ruleName: this.name,
      code: code.name,
      message: code.problemMessage,
      correctionMessage: code.correctionMessage ?? null,
      severity: this.severity,
      offset: token.offset,
      length: token.length,
      line: token.line,
      column: token.column,
    });
  }
}
