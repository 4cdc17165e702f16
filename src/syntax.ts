import type { TSESTree } from '@typescript-eslint/typescript-estree';

export type MethodNode = TSESTree.MethodDefinition | TSESTree.TSAbstractMethodDefinition;

export type FunctionNode =
  | TSESTree.FunctionDeclaration
  | TSESTree.FunctionExpression
  | TSESTree.ArrowFunctionExpression;

export function isMethodNode(node: TSESTree.Node): node is MethodNode {
  return node.type === 'MethodDefinition' || node.type === 'TSAbstractMethodDefinition';
}

export function isFunctionNode(node: TSESTree.Node): node is FunctionNode {
  return (
    node.type === 'FunctionDeclaration' ||
    node.type === 'FunctionExpression' ||
    node.type === 'ArrowFunctionExpression'
  );
}

/**
 * Static name of a class member or object key. `#field` keeps its hash so it
 * reads as private; computed keys other than string literals have no name.
 */
export function propertyName(key: TSESTree.Node, computed: boolean): string | null {
  if (key.type === 'PrivateIdentifier') return `#${key.name}`;
  if (key.type === 'Identifier' && !computed) return key.name;
  if (key.type === 'Literal' && typeof key.value === 'string') return key.value;
  return null;
}

export function memberName(node: TSESTree.MemberExpression): string | null {
  return propertyName(node.property, node.computed);
}

/** `a.b.c` for identifier chains, `this.x` for receiver chains, else null. */
export function dottedName(node: TSESTree.Node): string | null {
  switch (node.type) {
    case 'Identifier':
      return node.name;
    case 'ThisExpression':
      return 'this';
    case 'MemberExpression': {
      const object = dottedName(node.object);
      const property = memberName(node);
      return object !== null && property !== null ? `${object}.${property}` : null;
    }
    default:
      return null;
  }
}

export function lastSegment(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot === -1 ? name : name.slice(dot + 1);
}

export function isPrivateName(name: string): boolean {
  return name.startsWith('_') || name.startsWith('#');
}

/** `MAX_SIZE`, `API_URL`: at least one letter and nothing lower-case. */
export function isConstantName(name: string): boolean {
  return /[A-Z]/.test(name) && name === name.toUpperCase();
}

/** `getName(): string;` ahead of the implementation of an overloaded method. */
export function isOverloadSignature(node: MethodNode): boolean {
  return node.type === 'MethodDefinition' && node.value.type === 'TSEmptyBodyFunctionExpression';
}

/** Public in the TypeScript sense and by naming convention. */
export function isPublicMethod(node: MethodNode): boolean {
  if (node.accessibility === 'private' || node.accessibility === 'protected') return false;
  const name = propertyName(node.key, node.computed);
  return name !== null && !isPrivateName(name);
}

/**
 * Lower-case word fragments of an identifier, split at separators and case
 * boundaries: `XMLHttpRequest` → xml, http, request; `get_user` → get, user.
 */
export function splitWords(name: string): string[] {
  const words = name.match(/[A-Z]+(?![a-z])|[A-Z]?[a-z]+|\d+/g) ?? [];
  return words.map((w) => w.toLowerCase());
}

export function decoratorName(decorator: TSESTree.Decorator): string | null {
  const expr = decorator.expression;
  if (expr.type === 'CallExpression') return dottedName(expr.callee);
  return dottedName(expr);
}

/** Identifiers bound by a parameter list, including TS parameter properties. */
export function parameterNames(params: readonly TSESTree.Parameter[]): Set<string> {
  const bound = new Set<string>();

  function bind(param: TSESTree.Node): void {
    switch (param.type) {
      case 'Identifier':
        bound.add(param.name);
        break;
      case 'AssignmentPattern':
        bind(param.left);
        break;
      case 'RestElement':
        bind(param.argument);
        break;
      case 'TSParameterProperty':
        bind(param.parameter);
        break;
      case 'ArrayPattern':
        for (const element of param.elements) {
          if (element) bind(element);
        }
        break;
      case 'ObjectPattern':
        for (const prop of param.properties) {
          bind(prop.type === 'RestElement' ? prop : prop.value);
        }
        break;
      default:
        break;
    }
  }

  for (const param of params) bind(param);
  return bound;
}
