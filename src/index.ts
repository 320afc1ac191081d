/**
 * Lint rules for Dart local variable style, with the framework that runs them.
 */

// Syntax tree
export type * from './ast/types.js';
export * as ast from './ast/factory.js';
export { childrenOf, walkTree, findNodesOfKind } from './ast/walker.js';

// Lint framework
export type {
  Diagnostic,
  DiagnosticSink,
  LintCode,
  LinterContext,
  LintResult,
  LintSeverity,
  RuleGroup,
  RuleMeta,
  SeverityOverride,
} from './core/lint/types.js';
export { lintCode } from './core/lint/types.js';
export { LintRule } from './core/lint/rule.js';
export { NodeLintRegistry, dispatchNode, type NodeProcessor } from './core/lint/node-registry.js';
export { DiagnosticCollector } from './core/lint/collector.js';
export { Linter, type LinterOptions, type LintRunOptions } from './core/lint/linter.js';

// Rules
export {
  UnnecessaryFinalRule,
  extractParameter,
  extractLoopVariable,
  extractVariableList,
  type CandidateDeclaration,
} from './core/rules/unnecessary-final.js';
export { getRule, hasRule, getAllRuleNames, type RuleFactory } from './core/rules/registry.js';
export {
  findIncompatibleRules,
  resolveRuleSet,
  createLinter,
  type RuleConflict,
  type ResolvedRuleSet,
} from './core/rules/rule-set.js';
export { renderRuleDoc } from './core/docs/rule-doc.js';

// Configuration
export { AnalysisOptionsSchema, type AnalysisOptions } from './core/config/schema.js';
export {
  loadAnalysisOptions,
  parseAnalysisOptions,
  getDefaultOptions,
  DEFAULT_OPTIONS_PATH,
} from './core/config/loader.js';

// Output
export { HumanFormatter } from './formatters/human.js';
export { JsonFormatter } from './formatters/json.js';
export type { FormatOptions, IFormatter, OutputFormat } from './formatters/types.js';

// Utilities
export { logger, Logger, type LogLevel } from './utils/logger.js';
export {
  LintKitError,
  ConfigError,
  LintError,
  RuleExecutionError,
  SystemError,
  ErrorCodes,
  type ErrorCode,
} from './utils/errors.js';
