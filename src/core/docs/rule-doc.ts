/**
 * Renders a rule's metadata as a markdown documentation page.
 */
import type { LintRule } from '../lint/rule.js';

export function renderRuleDoc(rule: LintRule): string {
  const lines: string[] = [`# ${rule.name}`, '', rule.description, '', `**Group:** ${rule.group}`];

  if (rule.incompatibleRules.length > 0) {
    lines.push('', `**Incompatible rules:** ${rule.incompatibleRules.map((name) => `\`${name}\``).join(', ')}`);
  }

  lines.push('', rule.details.trim(), '');
  return lines.join('\n');
}
