import { isClassNode } from '../context';
import { dottedName, lastSegment } from '../syntax';
import { MESSAGES, report } from './report';
import type { Diagnostic, Rule } from './types';

const rule: Rule = {
  id: 'no-implementation-inheritance',
  codes: ['EO014'],
  category: 'contract',
  description: 'Classes extend only abstract classes, Error types or Object',

  check(node, context): Diagnostic[] {
    if (!isClassNode(node) || !node.superClass) return [];

    const { catalog, scope } = context;
    // mixin calls and other computed bases have no name and are never allowed
    const base = dottedName(node.superClass);
    if (base !== null) {
      if (catalog.allowedBases.has(lastSegment(base))) return [];
      if (scope.abstractClasses.has(base)) return [];
    }

    return report(rule, node, 'EO014', MESSAGES.EO014(node.id?.name ?? '(anonymous)'));
  },
};

export default rule;
