import type { TSESTree } from '@typescript-eslint/typescript-estree';
import type { Catalog } from '../catalog';
import { memberName } from '../syntax';
import { MESSAGES, report } from './report';
import type { Diagnostic, Rule } from './types';

// Receivers whose methods merely share a name with a persistence operation:
// `[1, 2].filter(...)`, `'a,b'.split(',')`, `new Map().get(k)`, `Object.create(p)`.
// The list is configurable data and known to be incomplete: any other
// container (`users.filter(...)`) is still reported.
function isBuiltinReceiver(receiver: TSESTree.Expression, catalog: Catalog): boolean {
  switch (receiver.type) {
    case 'Literal':
    case 'TemplateLiteral':
    case 'ArrayExpression':
    case 'ObjectExpression':
      return true;
    case 'Identifier':
      return catalog.builtinReceivers.has(receiver.name);
    case 'CallExpression':
    case 'NewExpression':
      return receiver.callee.type === 'Identifier' && catalog.builtinReceivers.has(receiver.callee.name);
    default:
      return false;
  }
}

const rule: Rule = {
  id: 'no-orm-patterns',
  codes: ['EO013'],
  category: 'contract',
  description: 'No ActiveRecord or query-builder style calls',

  check(node, context): Diagnostic[] {
    if (node.type !== 'CallExpression' || node.callee.type !== 'MemberExpression') return [];

    const method = memberName(node.callee);
    if (!method || !context.catalog.persistenceMethods.has(method)) return [];
    if (isBuiltinReceiver(node.callee.object, context.catalog)) return [];

    return report(rule, node, 'EO013', MESSAGES.EO013(method));
  },
};

export default rule;
