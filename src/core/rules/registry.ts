/**
 * Registry of built-in lint rules, keyed by rule name.
 */
import type { LintRule } from '../lint/rule.js';
import { UnnecessaryFinalRule } from './unnecessary-final.js';

export type RuleFactory = () => LintRule;

const ruleRegistry = new Map<string, RuleFactory>();

ruleRegistry.set('unnecessary_final', () => new UnnecessaryFinalRule());

/**
 * Create a fresh instance of a rule, or undefined for an unknown name.
 */
export function getRule(name: string): LintRule | undefined {
  const factory = ruleRegistry.get(name);
  return factory?.();
}

export function hasRule(name: string): boolean {
  return ruleRegistry.has(name);
}

export function getAllRuleNames(): string[] {
  return Array.from(ruleRegistry.keys()).sort();
}
