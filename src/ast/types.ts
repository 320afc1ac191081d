/**
 * Syntax-tree shapes the lint rules walk.
 *
 * This is the subset of the Dart syntax tree the rule set needs, supplied by
 * whatever front end parsed the source. Nodes are plain readonly records
 * discriminated on `kind`; expressions are opaque.
 */

/**
 * A lexical token. Line and column are 1-based.
 */
export interface Token {
  readonly lexeme: string;
  readonly offset: number;
  readonly length: number;
  readonly line: number;
  readonly column: number;
}

/** A written type annotation, e.g. `List<int>?`. */
export interface NamedType {
  readonly kind: 'NamedType';
  readonly name: Token;
  readonly typeArguments: readonly NamedType[];
  readonly nullable: boolean;
}

export type TypeAnnotation = NamedType;

/** An expression whose structure the rules never inspect. */
export interface Expression {
  readonly kind: 'Expression';
  readonly text: string;
  readonly offset: number;
}

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

export interface CompilationUnit {
  readonly kind: 'CompilationUnit';
  readonly declarations: readonly CompilationUnitMember[];
}

export type CompilationUnitMember = FunctionDeclaration | ClassDeclaration;

export interface FunctionDeclaration {
  readonly kind: 'FunctionDeclaration';
  readonly returnType: TypeAnnotation | null;
  readonly name: Token;
  readonly parameters: FormalParameterList;
  readonly body: Block;
}

export interface ClassDeclaration {
  readonly kind: 'ClassDeclaration';
  readonly name: Token;
  readonly members: readonly ClassMember[];
}

export type ClassMember = ConstructorDeclaration | MethodDeclaration;

export interface ConstructorDeclaration {
  readonly kind: 'ConstructorDeclaration';
  /** Named constructor suffix (`Point.origin`), or null for the unnamed one. */
  readonly name: Token | null;
  readonly parameters: FormalParameterList;
  readonly body: Block | null;
}

export interface MethodDeclaration {
  readonly kind: 'MethodDeclaration';
  readonly returnType: TypeAnnotation | null;
  readonly name: Token;
  readonly parameters: FormalParameterList;
  readonly body: Block;
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export type Statement =
  | Block
  | ExpressionStatement
  | ReturnStatement
  | VariableDeclarationStatement
  | ForStatement;

export interface Block {
  readonly kind: 'Block';
  readonly statements: readonly Statement[];
}

export interface ExpressionStatement {
  readonly kind: 'ExpressionStatement';
  readonly expression: Expression;
}

export interface ReturnStatement {
  readonly kind: 'ReturnStatement';
  readonly expression: Expression | null;
}

export interface VariableDeclarationStatement {
  readonly kind: 'VariableDeclarationStatement';
  readonly variables: VariableDeclarationList;
}

/**
 * One or more variables sharing a keyword and type: `final int a = 1, b = 2;`
 */
export interface VariableDeclarationList {
  readonly kind: 'VariableDeclarationList';
  /** `final`, `var`, `const`, or null when only a type is written. */
  readonly keyword: Token | null;
  readonly isFinal: boolean;
  readonly type: TypeAnnotation | null;
  readonly variables: readonly VariableDeclaration[];
}

export interface VariableDeclaration {
  readonly kind: 'VariableDeclaration';
  readonly name: Token;
  readonly initializer: Expression | null;
}

export interface ForStatement {
  readonly kind: 'ForStatement';
  readonly forLoopParts: ForLoopParts;
  readonly body: Statement;
}

export type ForLoopParts =
  | ForEachPartsWithDeclaration
  | ForEachPartsWithIdentifier
  | ForPartsWithDeclarations
  | ForPartsWithExpression;

/** `for (final x in xs)` */
export interface ForEachPartsWithDeclaration {
  readonly kind: 'ForEachPartsWithDeclaration';
  readonly loopVariable: DeclaredIdentifier;
  readonly iterable: Expression;
}

/** `for (x in xs)`, where `x` is declared outside the loop. */
export interface ForEachPartsWithIdentifier {
  readonly kind: 'ForEachPartsWithIdentifier';
  readonly identifier: Token;
  readonly iterable: Expression;
}

/** `for (var i = 0; i < n; i++)` */
export interface ForPartsWithDeclarations {
  readonly kind: 'ForPartsWithDeclarations';
  readonly variables: VariableDeclarationList;
  readonly condition: Expression | null;
  readonly updaters: readonly Expression[];
}

/** `for (i = 0; i < n; i++)` */
export interface ForPartsWithExpression {
  readonly kind: 'ForPartsWithExpression';
  readonly initialization: Expression | null;
  readonly condition: Expression | null;
  readonly updaters: readonly Expression[];
}

export interface DeclaredIdentifier {
  readonly kind: 'DeclaredIdentifier';
  readonly keyword: Token | null;
  readonly isFinal: boolean;
  readonly type: TypeAnnotation | null;
  readonly name: Token;
}

// ---------------------------------------------------------------------------
// Formal parameters
// ---------------------------------------------------------------------------

export interface FormalParameterList {
  readonly kind: 'FormalParameterList';
  readonly parameters: readonly FormalParameter[];
}

export type FormalParameter = NormalFormalParameter | DefaultFormalParameter;

export type NormalFormalParameter =
  | SimpleFormalParameter
  | FieldFormalParameter
  | SuperFormalParameter
  | FunctionTypedFormalParameter;

/** `final int x` */
export interface SimpleFormalParameter {
  readonly kind: 'SimpleFormalParameter';
  readonly keyword: Token | null;
  readonly isFinal: boolean;
  readonly type: TypeAnnotation | null;
  readonly name: Token;
}

/** `final int this.x` */
export interface FieldFormalParameter {
  readonly kind: 'FieldFormalParameter';
  readonly keyword: Token | null;
  readonly isFinal: boolean;
  readonly type: TypeAnnotation | null;
  readonly name: Token;
}

/** `final int super.x` */
export interface SuperFormalParameter {
  readonly kind: 'SuperFormalParameter';
  readonly keyword: Token | null;
  readonly isFinal: boolean;
  readonly type: TypeAnnotation | null;
  readonly name: Token;
}

/** `int compare(a, b)` */
export interface FunctionTypedFormalParameter {
  readonly kind: 'FunctionTypedFormalParameter';
  readonly returnType: TypeAnnotation | null;
  readonly name: Token;
  readonly parameters: FormalParameterList;
}

/** An optional positional or named parameter with its default value. */
export interface DefaultFormalParameter {
  readonly kind: 'DefaultFormalParameter';
  readonly parameter: NormalFormalParameter;
  readonly defaultValue: Expression | null;
  readonly isNamed: boolean;
}

export type AstNode =
  | NamedType
  | Expression
  | CompilationUnit
  | FunctionDeclaration
  | ClassDeclaration
  | ConstructorDeclaration
  | MethodDeclaration
  | Statement
  | VariableDeclarationList
  | VariableDeclaration
  | ForLoopParts
  | DeclaredIdentifier
  | FormalParameterList
  | FormalParameter;

export type AstNodeKind = AstNode['kind'];

export type AstNodeOfKind<K extends AstNodeKind> = Extract<AstNode, { kind: K }>;
