import type { TSESTree } from '@typescript-eslint/typescript-estree';
import type { Catalog } from '../catalog';
import { isClassNode } from '../context';
import { dottedName, lastSegment, propertyName } from '../syntax';
import { MESSAGES, report } from './report';
import type { Diagnostic, Rule } from './types';

function isFrozenOption(prop: TSESTree.ObjectLiteralElement): boolean {
  return (
    prop.type === 'Property' &&
    propertyName(prop.key, prop.computed) === 'frozen' &&
    prop.value.type === 'Literal' &&
    prop.value.value === true
  );
}

/**
 * `@ValueObject` and `@ValueObject()` are mutable value types;
 * `@ValueObject({ frozen: true })` is not.
 */
function valueTypeMarker(decorator: TSESTree.Decorator, catalog: Catalog): { frozen: boolean } | null {
  const expr = decorator.expression;
  const callee = expr.type === 'CallExpression' ? expr.callee : expr;
  const name = dottedName(callee);
  if (!name || !catalog.valueTypeDecorators.has(lastSegment(name))) return null;

  if (expr.type !== 'CallExpression') return { frozen: false };

  const options = expr.arguments[0];
  const frozen = options?.type === 'ObjectExpression' && options.properties.some(isFrozenOption);
  return { frozen };
}

export function isMutableInitializer(value: TSESTree.Expression, catalog: Catalog): boolean {
  if (value.type === 'ArrayExpression' || value.type === 'ObjectExpression') return true;

  if (value.type === 'NewExpression' || value.type === 'CallExpression') {
    return value.callee.type === 'Identifier' && catalog.mutableConstructors.has(value.callee.name);
  }

  return false;
}

const rule: Rule = {
  id: 'immutable-declaration',
  codes: ['EO008'],
  category: 'purity',
  description: 'Value types are frozen and fields do not start out as mutable containers',

  check(node, context): Diagnostic[] {
    if (!isClassNode(node)) return [];

    const diagnostics: Diagnostic[] = [];
    const markers = node.decorators
      .map((d) => valueTypeMarker(d, context.catalog))
      .filter((m): m is { frozen: boolean } => m !== null);

    if (markers.length > 0 && !markers.some((m) => m.frozen)) {
      diagnostics.push(...report(rule, node, 'EO008', MESSAGES.EO008(node.id?.name ?? '(anonymous)')));
    }

    for (const member of node.body.body) {
      if (member.type !== 'PropertyDefinition' || !member.value) continue;
      if (!isMutableInitializer(member.value, context.catalog)) continue;

      const name = propertyName(member.key, member.computed) ?? '(computed)';
      diagnostics.push(...report(rule, member, 'EO008', MESSAGES.EO008(name)));
    }

    return diagnostics;
  },
};

export default rule;
