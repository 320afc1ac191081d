/**
 * Maps node kinds to the rule processors interested in them.
 */
import type {
  AstNode,
  AstNodeKind,
  AstNodeOfKind,
  FormalParameterList,
  ForStatement,
  VariableDeclarationStatement,
} from '../../ast/types.js';
import type { LintRule } from './rule.js';

export type NodeProcessor<K extends AstNodeKind> = (node: AstNodeOfKind<K>) => void;

export interface RegisteredProcessor<K extends AstNodeKind> {
  rule: LintRule;
  process: NodeProcessor<K>;
}

type ProcessorTable = { [K in AstNodeKind]?: Array<RegisteredProcessor<K>> };

/**
 * Registry filled by rules during registration and consulted by the linter
 * for every node it visits.
 */
export class NodeLintRegistry {
  private readonly table: ProcessorTable = {};
  private readonly kinds: AstNodeKind[] = [];

  add<K extends AstNodeKind>(kind: K, rule: LintRule, process: NodeProcessor<K>): this {
    const entry: RegisteredProcessor<K> = { rule, process };
    const existing: Array<RegisteredProcessor<K>> | undefined = this.table[kind];
    if (existing) {
      existing.push(entry);
    } else {
      const created: Array<RegisteredProcessor<K>> = [entry];
      this.table[kind] = created;
      this.kinds.push(kind);
    }
    return this;
  }

  addFormalParameterList(rule: LintRule, process: (node: FormalParameterList) => void): this {
    return this.add('FormalParameterList', rule, process);
  }

  addForStatement(rule: LintRule, process: (node: ForStatement) => void): this {
    return this.add('ForStatement', rule, process);
  }

  addVariableDeclarationStatement(
    rule: LintRule,
    process: (node: VariableDeclarationStatement) => void
  ): this {
    return this.add('VariableDeclarationStatement', rule, process);
  }

  /**
   * Processors registered for a kind, in registration order.
   */
  processorsFor<K extends AstNodeKind>(kind: K): ReadonlyArray<RegisteredProcessor<K>> {
    return this.table[kind] ?? [];
  }

  /**
   * Kinds that have at least one processor, in first-registration order.
   */
  registeredKinds(): AstNodeKind[] {
    return [...this.kinds];
  }

  /**
   * Run every processor registered for the node's kind.
   * `onError` receives processor failures; without it they propagate.
   */
  dispatch<K extends AstNodeKind>(
    kind: K,
    node: AstNodeOfKind<K>,
    onError?: (rule: LintRule, error: unknown) => void
  ): void {
    for (const { rule, process: run } of this.processorsFor(kind)) {
      if (!onError) {
        run(node);
        continue;
      }
      try {
        run(node);
      } catch (error) {
        onError(rule, error);
      }
    }
  }
}

/**
 * Convenience wrapper so callers holding a plain `AstNode` need not name its kind.
 */
export function dispatchNode(
  registry: NodeLintRegistry,
  node: AstNode,
  onError?: (rule: LintRule, error: unknown) => void
): void {
  registry.dispatch(node.kind, node, onError);
}
