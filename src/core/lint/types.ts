/**
 * Lint framework type definitions.
 */
import type { RuleExecutionError } from '../../utils/errors.js';

export type LintSeverity = 'info' | 'warning' | 'error';

/** Configured severity; `ignore` suppresses the rule's diagnostics. */
export type SeverityOverride = LintSeverity | 'ignore';

/** Rule grouping used in rule documentation. */
export type RuleGroup = 'errors' | 'style' | 'pub';

/**
 * One fixed diagnostic a rule can emit.
 * Several codes may share a `name` and differ only in their correction.
 */
export interface LintCode {
  readonly name: string;
  readonly problemMessage: string;
  readonly correctionMessage?: string;
}

/**
 * Create a frozen lint code.
 */
export function lintCode(
  name: string,
  problemMessage: string,
  options: { correctionMessage?: string } = {}
): LintCode {
  return Object.freeze({ name, problemMessage, correctionMessage: options.correctionMessage });
}

/**
 * Static description of a rule, consumed by documentation and the rule-set
 * consistency check.
 */
export interface RuleMeta {
  /** Stable identifier, e.g. `unnecessary_final` */
  readonly name: string;
  /** One-line description */
  readonly description: string;
  /** Long-form markdown documentation */
  readonly details: string;
  readonly group: RuleGroup;
}

/**
 * A single finding.
 */
export interface Diagnostic {
  /** Rule that produced the finding */
  ruleName: string;
  /** Lint code name */
  code: string;
  message: string;
  correctionMessage: string | null;
  severity: LintSeverity;
  offset: number;
  length: number;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

/**
 * Where reported diagnostics go. Owned by the host, never by a rule.
 */
export interface DiagnosticSink {
  accept(diagnostic: Diagnostic): void;
}

/**
 * Per-run information handed to rules when they register.
 */
export interface LinterContext {
  /** Path of the unit being linted, when known */
  filePath: string | null;
}

/**
 * Result of linting one compilation unit.
 */
export interface LintResult {
  filePath: string | null;
  diagnostics: Diagnostic[];
  /** Processors that threw; the walk continued past them */
  exceptions: RuleExecutionError[];
}
