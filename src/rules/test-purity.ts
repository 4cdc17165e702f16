import type { TSESTree } from '@typescript-eslint/typescript-estree';
import type { Catalog } from '../catalog';
import { propertyName } from '../syntax';
import { MESSAGES, report } from './report';
import type { Diagnostic, Rule } from './types';

type Callback = TSESTree.ArrowFunctionExpression | TSESTree.FunctionExpression;

interface TestBody {
  name: string;
  statements: TSESTree.Statement[];
  /** Body of an expression-bodied callback */
  expression: TSESTree.Expression | null;
}

/** `test`, `test_sum`, `testSum`; not `testimony` */
function hasTestPrefix(name: string, prefix: string): boolean {
  if (!name.startsWith(prefix)) return false;
  const next = name.charAt(prefix.length);
  return next === '' || next === '_' || next !== next.toLowerCase();
}

function calleeRoot(callee: TSESTree.Node): TSESTree.Node {
  let current = callee;
  while (current.type === 'MemberExpression') current = current.object;
  return current;
}

/** `it(...)`, `test.only(...)`, `it.each(table)(...)` */
function isTestRegistration(call: TSESTree.CallExpression, catalog: Catalog): boolean {
  let root = calleeRoot(call.callee);
  while (root.type === 'CallExpression') root = calleeRoot(root.callee);
  return root.type === 'Identifier' && catalog.testCalls.has(root.name);
}

function testBody(node: TSESTree.Node, catalog: Catalog): TestBody | null {
  if (node.type === 'FunctionDeclaration' && node.id) {
    const name = node.id.name;
    return hasTestPrefix(name, catalog.testPrefix) ? { name, statements: node.body.body, expression: null } : null;
  }

  if (node.type === 'MethodDefinition' && node.value.body) {
    const name = propertyName(node.key, node.computed);
    if (name !== null && hasTestPrefix(name, catalog.testPrefix)) {
      return { name, statements: node.value.body.body, expression: null };
    }
  }

  if (node.type === 'CallExpression' && isTestRegistration(node, catalog)) {
    const callback = node.arguments.find(
      (arg): arg is Callback => arg.type === 'ArrowFunctionExpression' || arg.type === 'FunctionExpression'
    );
    if (!callback) return null;

    const title = node.arguments[0];
    const name = title?.type === 'Literal' && typeof title.value === 'string' ? title.value : 'anonymous';
    return callback.body.type === 'BlockStatement'
      ? { name, statements: callback.body.body, expression: null }
      : { name, statements: [], expression: callback.body };
  }

  return null;
}

/**
 * `expect(x).toBe(1)`, `assertThat(x, y)`, `hamcrest.assertThat(x, y)`:
 * the call itself, a method of that name, or a chain started by one.
 */
function isAssertionCall(expr: TSESTree.Expression, catalog: Catalog): boolean {
  if (expr.type !== 'CallExpression') return false;

  const callee = expr.callee;
  if (callee.type === 'Identifier') return catalog.assertions.has(callee.name);
  if (callee.type !== 'MemberExpression') return false;

  const method = propertyName(callee.property, callee.computed);
  if (method && catalog.assertions.has(method)) return true;

  const root = calleeRoot(callee);
  return root.type === 'CallExpression' && isAssertionCall(root, catalog);
}

function isAssertion(expr: TSESTree.Expression, catalog: Catalog): boolean {
  return isAssertionCall(expr.type === 'AwaitExpression' ? expr.argument : expr, catalog);
}

function isAllowed(stmt: TSESTree.Statement, catalog: Catalog): boolean {
  if (stmt.type === 'EmptyStatement') return true;
  return stmt.type === 'ExpressionStatement' && isAssertion(stmt.expression, catalog);
}

const rule: Rule = {
  id: 'test-purity',
  codes: ['EO012'],
  category: 'contract',
  description: 'Test bodies contain assertions only',

  check(node, context): Diagnostic[] {
    const { catalog } = context;
    const test = testBody(node, catalog);
    if (!test) return [];

    const assertions = [...catalog.assertions].join('/');
    const offending: TSESTree.Node[] = test.statements.filter((stmt) => !isAllowed(stmt, catalog));
    if (test.expression && !isAssertion(test.expression, catalog)) offending.push(test.expression);

    return offending.flatMap((stmt) => report(rule, stmt, 'EO012', MESSAGES.EO012(test.name, assertions)));
  },
};

export default rule;
