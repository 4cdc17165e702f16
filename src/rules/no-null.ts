import { MESSAGES, report } from './report';
import type { Diagnostic, Rule } from './types';

const rule: Rule = {
  id: 'no-null',
  codes: ['EO005'],
  category: 'purity',
  description: 'No null literals and no null in type annotations',

  check(node): Diagnostic[] {
    const isNull =
      (node.type === 'Literal' && node.value === null && node.raw === 'null') ||
      node.type === 'TSNullKeyword';

    return isNull ? report(rule, node, 'EO005', MESSAGES.EO005()) : [];
  },
};

export default rule;
