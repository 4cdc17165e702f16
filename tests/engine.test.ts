import { describe, it, expect } from 'vitest';
import { analyze, isCodeEnabled } from '../src/engine';
import { lint, messagesFor, parseCode } from './helpers';

describe('analyze', () => {
  it('reports an -er class name once, at the class', () => {
    const diagnostics = lint('class Manager {}');

    expect(diagnostics).toEqual([
      {
        line: 1,
        column: 0,
        code: 'EO001',
        message: "EO001 Class name 'Manager' violates -er principle (describes what it does, not what it is)",
        ruleId: 'no-er-names',
        category: 'naming',
      },
    ]);
  });

  it('reports a value type that is not frozen', () => {
    const diagnostics = lint('@ValueObject class Point {}');

    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].message).toBe("EO008 Mutable object violation: 'Point' should be immutable");
  });

  it('accepts a frozen value type', () => {
    expect(lint('@ValueObject({ frozen: true }) class Point {}')).toEqual([]);
  });

  it('reports each accessor-style method', () => {
    const diagnostics = lint(`
class Account implements Ledger {
  get_name() { return 1; }
  set_name(v: number) {}
  getName() { return 1; }
  getter() { return 1; }
}
`);

    expect(messagesFor(diagnostics, 'EO007')).toEqual([
      "EO007 Getter/setter method 'get_name' violates EO principle (avoid getters/setters)",
      "EO007 Getter/setter method 'set_name' violates EO principle (avoid getters/setters)",
      "EO007 Getter/setter method 'getName' violates EO principle (avoid getters/setters)",
    ]);
  });

  it('reports every reflection call', () => {
    const diagnostics = lint(`
Reflect.get(o, 'k');
Reflect.has(o, 'k');
Reflect.ownKeys(o);
Object.getPrototypeOf(o);
Object.defineProperty(o, 'k', {});
`);

    expect(messagesFor(diagnostics, 'EO010')).toHaveLength(5);
    expect(diagnostics.filter((d) => d.code === 'EO010').map((d) => d.line)).toEqual([2, 3, 4, 5, 6]);
  });

  it('reports implementation inheritance once per class', () => {
    const diagnostics = lint(`
class Stack extends Array {}
class Queue extends Array {}
`);

    expect(messagesFor(diagnostics, 'EO014')).toEqual([
      "EO014 Implementation inheritance violates EO principle (class 'Stack' inherits from non-abstract class)",
      "EO014 Implementation inheritance violates EO principle (class 'Queue' inherits from non-abstract class)",
    ]);
  });

  it('restores the outer class after a nested one', () => {
    const diagnostics = lint(`
class Outer implements Shape {
  area() {
    class Inner {
      size() { return 1; }
    }
    return 1;
  }
  perimeter() { return 2; }
}
`);

    expect(messagesFor(diagnostics, 'EO011')).toEqual([
      "EO011 Public method 'size' without contract (interface or abstract member) violates EO principle",
    ]);
  });

  it('returns the same sequence for the same tree', () => {
    const program = parseCode(`
class Manager {
  items = [];
  static create() { return null; }
}
`);

    expect(analyze(program)).toEqual(analyze(program));
  });

  it('orders diagnostics by visitation', () => {
    const diagnostics = lint('class Manager { x = null; }');
    expect(diagnostics.map((d) => d.code)).toEqual(['EO001', 'EO005']);
  });

  it('filters by selected and ignored code prefixes', () => {
    const code = 'class Manager { x = null; }';

    expect(lint(code, { select: ['EO001'] }).map((d) => d.code)).toEqual(['EO001']);
    expect(lint(code, { ignore: ['EO005'] }).map((d) => d.code)).toEqual(['EO001']);
    expect(lint(code, { select: ['EO00'] }).map((d) => d.code)).toEqual(['EO001', 'EO005']);
    expect(lint(code, { select: ['EO01'] })).toEqual([]);
  });

  it('runs only the rules it is given', () => {
    expect(lint('class Manager { x = null; }', { rules: [] })).toEqual([]);
  });
});

describe('isCodeEnabled', () => {
  it('enables everything without filters', () => {
    expect(isCodeEnabled('EO013')).toBe(true);
  });

  it('applies ignore after select', () => {
    expect(isCodeEnabled('EO013', ['EO01'], ['EO013'])).toBe(false);
    expect(isCodeEnabled('EO012', ['EO01'], ['EO013'])).toBe(true);
  });

  it('rejects codes outside the selection', () => {
    expect(isCodeEnabled('EO005', ['EO01'])).toBe(false);
  });
});
