import type { TSESTree } from '@typescript-eslint/typescript-estree';
import type { Catalog } from '../catalog';
import { isConstantName, isOverloadSignature, isPrivateName, propertyName, splitWords } from '../syntax';
import { MESSAGES, report } from './report';
import type { Diagnostic, ErrorCode, Rule } from './types';

type Position = 'type' | 'method' | 'variable' | 'function';

const CODES: Record<Position, ErrorCode> = {
  type: 'EO001',
  method: 'EO002',
  variable: 'EO003',
  function: 'EO004',
};

interface NamedNode {
  name: string;
  position: Position;
  target: TSESTree.Node;
}

function namedMember(
  node: TSESTree.MethodDefinition | TSESTree.TSAbstractMethodDefinition | TSESTree.TSMethodSignature
): NamedNode | null {
  if (node.kind === 'constructor') return null;
  const name = propertyName(node.key, node.computed);
  return name ? { name, position: 'method', target: node } : null;
}

function namedNode(node: TSESTree.Node): NamedNode | null {
  switch (node.type) {
    case 'ClassDeclaration':
    case 'ClassExpression':
    case 'TSInterfaceDeclaration':
      return node.id ? { name: node.id.name, position: 'type', target: node } : null;

    case 'MethodDefinition':
    case 'TSAbstractMethodDefinition':
      if (isOverloadSignature(node)) return null;
      return namedMember(node);

    case 'TSMethodSignature':
      return namedMember(node);

    case 'FunctionDeclaration':
      return node.id ? { name: node.id.name, position: 'function', target: node } : null;

    case 'VariableDeclarator':
      return node.id.type === 'Identifier'
        ? { name: node.id.name, position: 'variable', target: node.id }
        : null;

    case 'AssignmentExpression':
      return node.operator === '=' && node.left.type === 'Identifier'
        ? { name: node.left.name, position: 'variable', target: node.left }
        : null;

    case 'PropertyDefinition': {
      const name = propertyName(node.key, node.computed);
      return name ? { name, position: 'variable', target: node } : null;
    }

    default:
      return null;
  }
}

/**
 * Agent-noun suffixes are checked for every position; beyond that, type names
 * are checked word by word against the suffixes and everything else on its
 * leading verb.
 */
export function violatesErPrinciple(name: string, position: Position, catalog: Catalog): boolean {
  if (isPrivateName(name) || isConstantName(name)) return false;

  const lower = name.toLowerCase();
  if (catalog.allowedNames.has(lower)) return false;

  for (const suffix of catalog.erSuffixes) {
    if (lower.endsWith(suffix)) return true;
  }

  const words = splitWords(name);
  if (position === 'type') {
    return words.some((word) => catalog.erSuffixes.has(word));
  }
  return words.length > 0 && catalog.proceduralVerbs.has(words[0]);
}

function message(position: Position, name: string): string {
  switch (position) {
    case 'type':     return MESSAGES.EO001(name);
    case 'method':   return MESSAGES.EO002(name);
    case 'variable': return MESSAGES.EO003(name);
    case 'function': return MESSAGES.EO004(name);
  }
}

const rule: Rule = {
  id: 'no-er-names',
  codes: ['EO001', 'EO002', 'EO003', 'EO004'],
  category: 'naming',
  description: 'Names say what a thing is, not what it does: no -er suffixes, no leading verbs',

  check(node, context): Diagnostic[] {
    const named = namedNode(node);
    if (!named || !violatesErPrinciple(named.name, named.position, context.catalog)) return [];

    return report(rule, named.target, CODES[named.position], message(named.position, named.name));
  },
};

export default rule;
