import { describe, it, expect } from 'vitest';
import * as ast from '../../../src/ast/factory.js';

describe('ast factory', () => {
  describe('token', () => {
    it('should place a token on line 1 by default', () => {
      expect(ast.token('final', 7)).toEqual({
        lexeme: 'final',
        offset: 7,
        length: 5,
        line: 1,
        column: 8,
      });
    });

    it('should accept an explicit position', () => {
      expect(ast.token('var', 40, { line: 3, column: 5 })).toMatchObject({ line: 3, column: 5 });
    });
  });

  describe('isFinal', () => {
    it('should be derived from a final keyword', () => {
      const list = ast.variableDeclarationList({
        keyword: ast.token('final'),
        variables: [ast.variableDeclaration('x')],
      });

      expect(list.isFinal).toBe(true);
    });

    it('should be false for var, const and no keyword', () => {
      expect(ast.declaredIdentifier({ keyword: ast.token('var'), name: 'x' }).isFinal).toBe(false);
      expect(ast.simpleFormalParameter({ keyword: ast.token('const'), name: 'x' }).isFinal).toBe(false);
      expect(ast.fieldFormalParameter({ name: 'x' }).isFinal).toBe(false);
    });
  });

  it('should turn strings into tokens and expressions', () => {
    const declaration = ast.variableDeclaration('count', '0');

    expect(declaration.name.lexeme).toBe('count');
    expect(declaration.initializer).toEqual({ kind: 'Expression', text: '0', offset: 0 });
    expect(ast.variableDeclaration('x').initializer).toBeNull();
  });

  it('should build a default parameter around a normal one', () => {
    const inner = ast.superFormalParameter({ keyword: ast.token('final'), name: 'x' });

    const parameter = ast.defaultFormalParameter(inner, '1', true);

    expect(parameter).toEqual({
      kind: 'DefaultFormalParameter',
      parameter: inner,
      defaultValue: { kind: 'Expression', text: '1', offset: 0 },
      isNamed: true,
    });
  });

  it('should build named types with arguments', () => {
    const type = ast.namedType('Map', {
      typeArguments: [ast.namedType('String'), ast.namedType('int', { nullable: true })],
    });

    expect(type.typeArguments.map((arg) => [arg.name.lexeme, arg.nullable])).toEqual([
      ['String', false],
      ['int', true],
    ]);
  });
});
