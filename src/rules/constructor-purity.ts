import type { TSESTree } from '@typescript-eslint/typescript-estree';
import { parameterNames } from '../syntax';
import { MESSAGES, report } from './report';
import type { Diagnostic, Rule } from './types';

function isParameterReference(node: TSESTree.Node, params: ReadonlySet<string>): boolean {
  return node.type === 'Identifier' && params.has(node.name);
}

/** `this.field = param` */
function isFieldAssignment(expr: TSESTree.Expression, params: ReadonlySet<string>): boolean {
  return (
    expr.type === 'AssignmentExpression' &&
    expr.operator === '=' &&
    expr.left.type === 'MemberExpression' &&
    expr.left.object.type === 'ThisExpression' &&
    isParameterReference(expr.right, params)
  );
}

/** `super(a, b)` forwarding parameters unchanged */
function isSuperForwarding(expr: TSESTree.Expression, params: ReadonlySet<string>): boolean {
  return (
    expr.type === 'CallExpression' &&
    expr.callee.type === 'Super' &&
    expr.arguments.every((arg) => isParameterReference(arg, params))
  );
}

function isAllowed(stmt: TSESTree.Statement, params: ReadonlySet<string>): boolean {
  if (stmt.type === 'EmptyStatement') return true;
  if (stmt.type !== 'ExpressionStatement') return false;
  return isFieldAssignment(stmt.expression, params) || isSuperForwarding(stmt.expression, params);
}

const rule: Rule = {
  id: 'constructor-purity',
  codes: ['EO006'],
  category: 'purity',
  description: 'Constructors only assign parameters to fields',

  check(node): Diagnostic[] {
    if (node.type !== 'MethodDefinition' || node.kind !== 'constructor') return [];

    const body = node.value.body;
    if (!body) return [];

    const params = parameterNames(node.value.params);
    const offending = body.body.find((stmt) => !isAllowed(stmt, params));

    return offending ? report(rule, offending, 'EO006', MESSAGES.EO006()) : [];
  },
};

export default rule;
