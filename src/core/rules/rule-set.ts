/**
 * Resolves configured rule names into rule instances and checks the set for
 * rules that enforce opposite conventions.
 */
import type { AnalysisOptions } from '../config/schema.js';
import { Linter } from '../lint/linter.js';
import type { LintRule } from '../lint/rule.js';
import { ErrorCodes } from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { getRule } from './registry.js';

const logger = rootLogger.child('rules');

/**
 * Two enabled rules that contradict each other.
 */
export interface RuleConflict {
  /** Rule declaring the incompatibility */
  rule: string;
  incompatibleWith: string;
}

export interface ResolvedRuleSet {
  rules: LintRule[];
  /** Configured names with no registered rule */
  unknown: string[];
  conflicts: RuleConflict[];
}

/**
 * Find enabled rules listed in another enabled rule's `incompatibleRules`.
 * `enabledNames` may include rules that have no implementation here; they
 * still count as enabled. Each unordered pair is reported once.
 */
export function findIncompatibleRules(
  rules: readonly LintRule[],
  enabledNames: readonly string[] = rules.map((rule) => rule.name)
): RuleConflict[] {
  const enabled = new Set(enabledNames);
  const seen = new Set<string>();
  const conflicts: RuleConflict[] = [];

  for (const rule of rules) {
    for (const other of rule.incompatibleRules) {
      if (!enabled.has(other)) continue;
      const key = [rule.name, other].sort().join('\u0000');
      if (seen.has(key)) continue;
      seen.add(key);
      conflicts.push({ rule: rule.name, incompatibleWith: other });
    }
  }

  return conflicts;
}

/**
 * Instantiate the rules enabled by the analysis options.
 * Unknown names and conflicting pairs are logged, not fatal.
 */
export function resolveRuleSet(options: AnalysisOptions): ResolvedRuleSet {
  const enabledNames = options.linter.rules;
  const rules: LintRule[] = [];
  const unknown: string[] = [];

  for (const name of enabledNames) {
    const rule = getRule(name);
    if (rule) {
      rules.push(rule);
    } else {
      unknown.push(name);
      logger.warn(`'${name}' is not a recognized lint rule`, { code: ErrorCodes.UNKNOWN_RULE });
    }
  }

  const conflicts = findIncompatibleRules(rules, enabledNames);
  for (const conflict of conflicts) {
    logger.warn(`The rule '${conflict.rule}' is incompatible with the rule '${conflict.incompatibleWith}'`);
  }

  return { rules, unknown, conflicts };
}

/**
 * Build a linter for the analysis options.
 */
export function createLinter(options: AnalysisOptions): Linter {
  const { rules } = resolveRuleSet(options);
  return new Linter(rules, { severities: options.analyzer.errors });
}
