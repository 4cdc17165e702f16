import { isOverloadSignature, isPublicMethod, propertyName } from '../syntax';
import { MESSAGES, report } from './report';
import type { Diagnostic, Rule } from './types';

/** `get`, `get_name`, `getName`; `getter` and `geta` are not accessors. */
function hasAccessorPrefix(name: string, prefix: 'get' | 'set'): boolean {
  const lower = name.toLowerCase();
  if (lower === prefix || lower.startsWith(`${prefix}_`)) return true;

  const boundary = name.charAt(3);
  return lower.startsWith(prefix) && boundary !== '' && boundary !== boundary.toLowerCase();
}

const rule: Rule = {
  id: 'no-getters-setters',
  codes: ['EO007'],
  category: 'purity',
  description: 'No getX/setX style accessor methods',

  check(node): Diagnostic[] {
    if (node.type !== 'MethodDefinition' && node.type !== 'TSAbstractMethodDefinition') return [];
    if (node.kind !== 'method' || node.static || !isPublicMethod(node) || isOverloadSignature(node)) return [];

    const name = propertyName(node.key, node.computed);
    if (!name) return [];

    const diagnostics: Diagnostic[] = [];
    if (hasAccessorPrefix(name, 'get')) {
      diagnostics.push(...report(rule, node, 'EO007', MESSAGES.EO007(name)));
    }
    if (hasAccessorPrefix(name, 'set')) {
      diagnostics.push(...report(rule, node, 'EO007', MESSAGES.EO007(name)));
    }
    return diagnostics;
  },
};

export default rule;
