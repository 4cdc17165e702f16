import { isOverloadSignature, propertyName } from '../syntax';
import { MESSAGES, report } from './report';
import type { Diagnostic, Rule } from './types';

const rule: Rule = {
  id: 'no-static-methods',
  codes: ['EO009'],
  category: 'contract',
  description: 'No static methods, static accessors or static function fields',

  check(node): Diagnostic[] {
    if (node.type === 'MethodDefinition' || node.type === 'TSAbstractMethodDefinition') {
      if (!node.static || isOverloadSignature(node)) return [];
      const name = propertyName(node.key, node.computed) ?? '(computed)';
      return report(rule, node, 'EO009', MESSAGES.EO009(name));
    }

    if (node.type === 'PropertyDefinition' && node.static && node.value) {
      const holdsFunction =
        node.value.type === 'ArrowFunctionExpression' || node.value.type === 'FunctionExpression';
      if (!holdsFunction) return [];
      const name = propertyName(node.key, node.computed) ?? '(computed)';
      return report(rule, node, 'EO009', MESSAGES.EO009(name));
    }

    return [];
  },
};

export default rule;
