import { describe, it, expect } from 'vitest';
import { dottedName, isConstantName, lastSegment, parameterNames, splitWords } from '../src/syntax';
import { parseCode } from './helpers';

describe('splitWords', () => {
  it('splits at case boundaries, separators and digits', () => {
    expect(splitWords('XMLHttpRequest')).toEqual(['xml', 'http', 'request']);
    expect(splitWords('get_user')).toEqual(['get', 'user']);
    expect(splitWords('v2Name')).toEqual(['v', '2', 'name']);
  });
});

describe('isConstantName', () => {
  it('requires a letter and no lower case', () => {
    expect(isConstantName('MAX_SIZE')).toBe(true);
    expect(isConstantName('Max')).toBe(false);
    expect(isConstantName('_')).toBe(false);
  });
});

describe('dottedName', () => {
  it('joins identifier and receiver chains', () => {
    const [statement] = parseCode('this.store.items;').body;
    if (statement.type !== 'ExpressionStatement') throw new Error('expected an expression');

    expect(dottedName(statement.expression)).toBe('this.store.items');
    expect(lastSegment('this.store.items')).toBe('items');
  });

  it('has no name for computed access', () => {
    const [statement] = parseCode('a[key].b;').body;
    if (statement.type !== 'ExpressionStatement') throw new Error('expected an expression');

    expect(dottedName(statement.expression)).toBe(null);
  });
});

describe('parameterNames', () => {
  it('binds every identifier a parameter list introduces', () => {
    const [statement] = parseCode('function f(a, b = 1, { c, d: [e] }, ...rest) {}').body;
    if (statement.type !== 'FunctionDeclaration') throw new Error('expected a function');

    expect([...parameterNames(statement.params)]).toEqual(['a', 'b', 'c', 'e', 'rest']);
  });
});
