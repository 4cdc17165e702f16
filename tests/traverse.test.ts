import { describe, it, expect } from 'vitest';
import { parse } from '@typescript-eslint/typescript-estree';
import type { TSESTree } from '@typescript-eslint/typescript-estree';
import { childNodes, traverse } from '../src/traverse';
import { parseCode } from './helpers';

describe('traverse', () => {
  it('visits all nodes in source order, pre-order', () => {
    const ast = parse('const a = 1; let b = 2;', { jsx: true, loc: true, range: true });
    const types: string[] = [];
    traverse(ast, (node) => types.push(node.type));

    expect(types).toEqual([
      'Program',
      'VariableDeclaration',
      'VariableDeclarator',
      'Identifier',
      'Literal',
      'VariableDeclaration',
      'VariableDeclarator',
      'Identifier',
      'Literal',
    ]);
  });
});

describe('childNodes', () => {
  it('returns direct children only', () => {
    const ast = parseCode('x + y * z;');
    const [statement] = ast.body;
    if (statement.type !== 'ExpressionStatement') throw new Error('expected an expression');

    const children = childNodes(statement.expression);
    expect(children.map((c) => c.type)).toEqual(['Identifier', 'BinaryExpression']);
  });

  it('skips empty array slots', () => {
    const ast = parseCode('const [, second] = pair;');
    const patterns: TSESTree.Node[] = [];
    traverse(ast, (node) => {
      if (node.type === 'ArrayPattern') patterns.push(node);
    });

    expect(childNodes(patterns[0]).map((c) => c.type)).toEqual(['Identifier']);
  });
});
