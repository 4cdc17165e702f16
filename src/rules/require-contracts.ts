import { hasContract } from '../context';
import { isOverloadSignature, isPublicMethod, propertyName } from '../syntax';
import { MESSAGES, report } from './report';
import type { Diagnostic, Rule } from './types';

const rule: Rule = {
  id: 'require-contracts',
  codes: ['EO011'],
  category: 'contract',
  description: 'Public methods implement an interface or are abstract',

  check(node, context): Diagnostic[] {
    // abstract members parse as TSAbstractMethodDefinition and are contracts themselves
    if (node.type !== 'MethodDefinition') return [];
    if (node.kind !== 'method' || node.static || !isPublicMethod(node) || isOverloadSignature(node)) return [];

    const { enclosing, scope } = context;
    if (!enclosing || hasContract(enclosing, scope)) return [];

    const name = propertyName(node.key, node.computed) ?? '(computed)';
    return report(rule, node, 'EO011', MESSAGES.EO011(name));
  },
};

export default rule;
