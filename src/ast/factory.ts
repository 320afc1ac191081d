/**
 * Builders for well-formed syntax-tree nodes.
 *
 * Front ends and tests use these instead of writing node literals; each
 * builder derives `isFinal` from the keyword token the same way the parser
 * would.
 */
import type {
  Block,
  ClassDeclaration,
  ClassMember,
  CompilationUnit,
  CompilationUnitMember,
  ConstructorDeclaration,
  DeclaredIdentifier,
  DefaultFormalParameter,
  Expression,
  ExpressionStatement,
  FieldFormalParameter,
  ForEachPartsWithDeclaration,
  ForEachPartsWithIdentifier,
  FormalParameter,
  FormalParameterList,
  ForLoopParts,
  ForPartsWithDeclarations,
  ForPartsWithExpression,
  ForStatement,
  FunctionDeclaration,
  FunctionTypedFormalParameter,
  MethodDeclaration,
  NamedType,
  NormalFormalParameter,
  ReturnStatement,
  SimpleFormalParameter,
  Statement,
  SuperFormalParameter,
  Token,
  TypeAnnotation,
  VariableDeclaration,
  VariableDeclarationList,
  VariableDeclarationStatement,
} from './types.js';

export interface TokenPosition {
  line: number;
  column: number;
}

/**
 * Create a token. Without a position the token sits on line 1 at `offset`.
 */
export function token(lexeme: string, offset = 0, position?: TokenPosition): Token {
  return {
    lexeme,
    offset,
    length: lexeme.length,
    line: position?.line ?? 1,
    column: position?.column ?? offset + 1,
  };
}

function toToken(name: Token | string): Token {
  return typeof name === 'string' ? token(name) : name;
}

function isFinalKeyword(keyword: Token | null): boolean {
  return keyword?.lexeme === 'final';
}

export function namedType(
  name: Token | string,
  options: { typeArguments?: NamedType[]; nullable?: boolean } = {}
): NamedType {
  return {
    kind: 'NamedType',
    name: toToken(name),
    typeArguments: options.typeArguments ?? [],
    nullable: options.nullable ?? false,
  };
}

export function expression(text: string, offset = 0): Expression {
  return { kind: 'Expression', text, offset };
}

function toExpression(value: Expression | string | null | undefined): Expression | null {
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? expression(value) : value;
}

/**
 * Keyword, type and name shared by every declaration-like node.
 */
export interface DeclarationParts {
  keyword?: Token | null;
  type?: TypeAnnotation | null;
  name: Token | string;
}

// ---------------------------------------------------------------------------
// Variables and statements
// ---------------------------------------------------------------------------

export function variableDeclaration(
  name: Token | string,
  initializer?: Expression | string | null
): VariableDeclaration {
  return {
    kind: 'VariableDeclaration',
    name: toToken(name),
    initializer: toExpression(initializer),
  };
}

export function variableDeclarationList(parts: {
  keyword?: Token | null;
  type?: TypeAnnotation | null;
  variables: VariableDeclaration[];
}): VariableDeclarationList {
  const keyword = parts.keyword ?? null;
  return {
    kind: 'VariableDeclarationList',
    keyword,
    isFinal: isFinalKeyword(keyword),
    type: parts.type ?? null,
    variables: parts.variables,
  };
}

export function variableDeclarationStatement(
  variables: VariableDeclarationList
): VariableDeclarationStatement {
  return { kind: 'VariableDeclarationStatement', variables };
}

export function block(statements: Statement[] = []): Block {
  return { kind: 'Block', statements };
}

export function expressionStatement(value: Expression | string): ExpressionStatement {
  return { kind: 'ExpressionStatement', expression: typeof value === 'string' ? expression(value) : value };
}

export function returnStatement(value?: Expression | string | null): ReturnStatement {
  return { kind: 'ReturnStatement', expression: toExpression(value) };
}

// ---------------------------------------------------------------------------
// Loops
// ---------------------------------------------------------------------------

export function declaredIdentifier(parts: DeclarationParts): DeclaredIdentifier {
  const keyword = parts.keyword ?? null;
  return {
    kind: 'DeclaredIdentifier',
    keyword,
    isFinal: isFinalKeyword(keyword),
    type: parts.type ?? null,
    name: toToken(parts.name),
  };
}

export function forEachPartsWithDeclaration(
  loopVariable: DeclaredIdentifier,
  iterable: Expression | string
): ForEachPartsWithDeclaration {
  return {
    kind: 'ForEachPartsWithDeclaration',
    loopVariable,
    iterable: typeof iterable === 'string' ? expression(iterable) : iterable,
  };
}

export function forEachPartsWithIdentifier(
  identifier: Token | string,
  iterable: Expression | string
): ForEachPartsWithIdentifier {
  return {
    kind: 'ForEachPartsWithIdentifier',
    identifier: toToken(identifier),
    iterable: typeof iterable === 'string' ? expression(iterable) : iterable,
  };
}

export function forPartsWithDeclarations(
  variables: VariableDeclarationList,
  condition?: Expression | string | null,
  updaters: Expression[] = []
): ForPartsWithDeclarations {
  return {
    kind: 'ForPartsWithDeclarations',
    variables,
    condition: toExpression(condition),
    updaters,
  };
}

export function forPartsWithExpression(
  initialization?: Expression | string | null,
  condition?: Expression | string | null,
  updaters: Expression[] = []
): ForPartsWithExpression {
  return {
    kind: 'ForPartsWithExpression',
    initialization: toExpression(initialization),
    condition: toExpression(condition),
    updaters,
  };
}

export function forStatement(forLoopParts: ForLoopParts, body: Statement = block()): ForStatement {
  return { kind: 'ForStatement', forLoopParts, body };
}

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

export function simpleFormalParameter(parts: DeclarationParts): SimpleFormalParameter {
  const keyword = parts.keyword ?? null;
  return {
    kind: 'SimpleFormalParameter',
    keyword,
    isFinal: isFinalKeyword(keyword),
    type: parts.type ?? null,
    name: toToken(parts.name),
  };
}

export function fieldFormalParameter(parts: DeclarationParts): FieldFormalParameter {
  const keyword = parts.keyword ?? null;
  return {
    kind: 'FieldFormalParameter',
    keyword,
    isFinal: isFinalKeyword(keyword),
    type: parts.type ?? null,
    name: toToken(parts.name),
  };
}

export function superFormalParameter(parts: DeclarationParts): SuperFormalParameter {
  const keyword = parts.keyword ?? null;
  return {
    kind: 'SuperFormalParameter',
    keyword,
    isFinal: isFinalKeyword(keyword),
    type: parts.type ?? null,
    name: toToken(parts.name),
  };
}

export function functionTypedFormalParameter(
  name: Token | string,
  parameters: FormalParameterList,
  returnType: TypeAnnotation | null = null
): FunctionTypedFormalParameter {
  return {
    kind: 'FunctionTypedFormalParameter',
    returnType,
    name: toToken(name),
    parameters,
  };
}

export function defaultFormalParameter(
  parameter: NormalFormalParameter,
  defaultValue?: Expression | string | null,
  isNamed = false
): DefaultFormalParameter {
  return {
    kind: 'DefaultFormalParameter',
    parameter,
    defaultValue: toExpression(defaultValue),
    isNamed,
  };
}

export function formalParameterList(parameters: FormalParameter[] = []): FormalParameterList {
  return { kind: 'FormalParameterList', parameters };
}

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

export function functionDeclaration(
  name: Token | string,
  parameters: FormalParameterList = formalParameterList(),
  body: Block = block(),
  returnType: TypeAnnotation | null = null
): FunctionDeclaration {
  return { kind: 'FunctionDeclaration', returnType, name: toToken(name), parameters, body };
}

export function methodDeclaration(
  name: Token | string,
  parameters: FormalParameterList = formalParameterList(),
  body: Block = block(),
  returnType: TypeAnnotation | null = null
): MethodDeclaration {
  return { kind: 'MethodDeclaration', returnType, name: toToken(name), parameters, body };
}

export function constructorDeclaration(
  parameters: FormalParameterList = formalParameterList(),
  body: Block | null = null,
  name: Token | string | null = null
): ConstructorDeclaration {
  return {
    kind: 'ConstructorDeclaration',
    name: name === null ? null : toToken(name),
    parameters,
    body,
  };
}

export function classDeclaration(name: Token | string, members: ClassMember[] = []): ClassDeclaration {
  return { kind: 'ClassDeclaration', name: toToken(name), members };
}

export function compilationUnit(declarations: CompilationUnitMember[] = []): CompilationUnit {
  return { kind: 'CompilationUnit', declarations };
}
