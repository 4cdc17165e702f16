import { dottedName } from '../syntax';
import { MESSAGES, report } from './report';
import type { Diagnostic, Rule } from './types';

const rule: Rule = {
  id: 'no-reflection',
  codes: ['EO010'],
  category: 'contract',
  description: 'No reflection primitives, typeof or instanceof',

  check(node, context): Diagnostic[] {
    const { catalog } = context;

    switch (node.type) {
      case 'CallExpression': {
        const callee = dottedName(node.callee);
        if (!callee || !catalog.reflectionCalls.has(callee)) return [];
        return report(rule, node, 'EO010', MESSAGES.EO010(callee));
      }
      case 'UnaryExpression':
      case 'BinaryExpression':
        if (!catalog.reflectionOperators.has(node.operator)) return [];
        return report(rule, node, 'EO010', MESSAGES.EO010(node.operator));
      default:
        return [];
    }
  },
};

export default rule;
