/**
 * Flags `final` on local variables and parameters, enforcing the `var` style.
 */
import type {
  DeclaredIdentifier,
  FormalParameter,
  FormalParameterList,
  ForStatement,
  Token,
  TypeAnnotation,
  VariableDeclarationList,
  VariableDeclarationStatement,
} from '../../ast/types.js';
import { LintRule } from '../lint/rule.js';
import type { NodeLintRegistry } from '../lint/node-registry.js';
import { lintCode, type LintCode, type LinterContext } from '../lint/types.js';

const DESCRIPTION = "Don't use `final` for local variables.";

const DETAILS = `
Use \`var\`, not \`final\`, when declaring local variables.

There are two styles in wide use for local variables. This rule enforces the
\`var\` style. For the alternative style that prefers \`final\`, enable
\`prefer_final_locals\` and \`prefer_final_in_for_each\` instead.

For fields, \`final\` is always recommended; see the rule \`prefer_final_fields\`.

**BAD:**
\`\`\`dart
void badMethod() {
  final label = 'Final or var?';
  for (final char in ['v', 'a', 'r']) {
    print(char);
  }
}
\`\`\`

**GOOD:**
\`\`\`dart
void goodMethod() {
  var label = 'Final or var?';
  for (var char in ['v', 'a', 'r']) {
    print(char);
  }
}
\`\`\`
`;

/**
 * What a declaration says about its `final` qualifier.
 */
export interface CandidateDeclaration {
  hasQualifier: boolean;
  /** Null when no token can be located; nothing is reported then. */
  qualifierToken: Token | null;
  hasExplicitType: boolean;
}

const NOT_A_CANDIDATE: Readonly<CandidateDeclaration> = Object.freeze({
  hasQualifier: false,
  qualifierToken: null,
  hasExplicitType: false,
});

/**
 * Extract the qualifier of a formal parameter, looking through one level of
 * default-value wrapping.
 */
export function extractParameter(node: FormalParameter): CandidateDeclaration {
  const parameter = node.kind === 'DefaultFormalParameter' ? node.parameter : node;
  switch (parameter.kind) {
    case 'SimpleFormalParameter':
    case 'FieldFormalParameter':
    case 'SuperFormalParameter':
      return fromDeclaration(parameter);
    case 'FunctionTypedFormalParameter':
      return NOT_A_CANDIDATE;
    default: {
      const unreachable: never = parameter;
      return unreachable;
    }
  }
}

/**
 * Extract the qualifier of a for-each loop's inline-declared variable.
 */
export function extractLoopVariable(loopVariable: DeclaredIdentifier): CandidateDeclaration {
  return fromDeclaration(loopVariable);
}

/**
 * Extract the qualifier shared by every variable of a declaration list.
 */
export function extractVariableList(variables: VariableDeclarationList): CandidateDeclaration {
  return fromDeclaration(variables);
}

function fromDeclaration(node: {
  readonly isFinal: boolean;
  readonly keyword: Token | null;
  readonly type: TypeAnnotation | null;
}): CandidateDeclaration {
  if (!node.isFinal) return NOT_A_CANDIDATE;
  return {
    hasQualifier: true,
    qualifierToken: node.keyword,
    hasExplicitType: node.type !== null,
  };
}

export class UnnecessaryFinalRule extends LintRule {
  static readonly withType: LintCode = lintCode(
    'unnecessary_final',
    "Local variables should not be marked as 'final'.",
    { correctionMessage: "Remove the 'final'." }
  );

  static readonly withoutType: LintCode = lintCode(
    'unnecessary_final',
    "Local variables should not be marked as 'final'.",
    { correctionMessage: "Replace 'final' with 'var'." }
  );

  readonly name = 'unnecessary_final';
  readonly description = DESCRIPTION;
  readonly details = DETAILS;
  readonly group = 'style' as const;

  /**
   * With a type the keyword can simply go; without one it becomes `var`.
   */
  static classify(hasExplicitType: boolean): LintCode {
    return hasExplicitType ? UnnecessaryFinalRule.withType : UnnecessaryFinalRule.withoutType;
  }

  get incompatibleRules(): readonly string[] {
    return INCOMPATIBLE_RULES;
  }

  get lintCodes(): readonly LintCode[] {
    return [UnnecessaryFinalRule.withType, UnnecessaryFinalRule.withoutType];
  }

  registerNodeProcessors(registry: NodeLintRegistry, _context: LinterContext): void {
    registry
      .addFormalParameterList(this, (node) => this.visitFormalParameterList(node))
      .addForStatement(this, (node) => this.visitForStatement(node))
      .addVariableDeclarationStatement(this, (node) => this.visitVariableDeclarationStatement(node));
  }

  visitFormalParameterList(node: FormalParameterList): void {
    for (const parameter of node.parameters) {
      this.reportCandidate(extractParameter(parameter));
    }
  }

  visitForStatement(node: ForStatement): void {
    const parts = node.forLoopParts;
    // `for (x in xs)` iterates into a variable declared outside the loop,
    // and C-style loops are not for-each loops at all.
    if (parts.kind !== 'ForEachPartsWithDeclaration') return;
    this.reportCandidate(extractLoopVariable(parts.loopVariable));
  }

  visitVariableDeclarationStatement(node: VariableDeclarationStatement): void {
    this.reportCandidate(extractVariableList(node.variables));
  }

  private reportCandidate(candidate: CandidateDeclaration): void {
    if (!candidate.hasQualifier || candidate.qualifierToken === null) return;
    this.reportLintForToken(
      candidate.qualifierToken,
      UnnecessaryFinalRule.classify(candidate.hasExplicitType)
    );
  }
}

const INCOMPATIBLE_RULES: readonly string[] = Object.freeze([
  'prefer_final_locals',
  'prefer_final_parameters',
]);
