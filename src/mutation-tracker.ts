import type { TSESTree } from '@typescript-eslint/typescript-estree';
import type { Catalog } from './catalog';
import { isClassNode, type ClassNode } from './context';
import { MESSAGES, report } from './rules/report';
import type { Diagnostic, Rule } from './rules/types';
import { memberName, parameterNames, propertyName } from './syntax';
import { childNodes } from './traverse';

export const trackedRule: Omit<Rule, 'check'> = {
  id: 'immutable-fields',
  codes: ['EO008'],
  category: 'purity',
  description: 'Fields set up at construction are never reassigned or mutated afterwards',
};

interface FieldReference {
  name: string;
  node: TSESTree.MemberExpression;
}

/** `this.items.sort()` → path ['items'], method 'sort' */
interface ReceiverCall {
  path: string[];
  method: string;
}

type InstanceMember = TSESTree.ClassElement;

/**
 * Visit `node` and everything below it where `this` is still the instance:
 * arrow functions keep the receiver, nested functions and classes rebind it.
 */
function walkReceiverScope(node: TSESTree.Node, visit: (node: TSESTree.Node) => void): void {
  visit(node);

  for (const child of childNodes(node)) {
    if (isClassNode(child) || child.type === 'FunctionExpression' || child.type === 'FunctionDeclaration') {
      continue;
    }
    walkReceiverScope(child, visit);
  }
}

function unwrap(node: TSESTree.Node): TSESTree.Node {
  return node.type === 'TSNonNullExpression' ? unwrap(node.expression) : node;
}

/** `this.x` targets of an assignment, destructuring included. */
function receiverFields(target: TSESTree.Node): FieldReference[] {
  const node = unwrap(target);

  switch (node.type) {
    case 'MemberExpression': {
      if (node.object.type !== 'ThisExpression') return [];
      const name = memberName(node);
      return name ? [{ name, node }] : [];
    }
    case 'ArrayPattern':
      return node.elements.flatMap((element) => (element ? receiverFields(element) : []));
    case 'ObjectPattern':
      return node.properties.flatMap((prop) =>
        receiverFields(prop.type === 'RestElement' ? prop : prop.value)
      );
    case 'RestElement':
      return receiverFields(node.argument);
    case 'AssignmentPattern':
      return receiverFields(node.left);
    default:
      return [];
  }
}

function writtenTarget(node: TSESTree.Node): TSESTree.Node | null {
  switch (node.type) {
    case 'AssignmentExpression':
      return node.left;
    case 'UpdateExpression':
      return node.argument;
    default:
      return null;
  }
}

function receiverCall(call: TSESTree.CallExpression): ReceiverCall | null {
  const callee = unwrap(call.callee);
  if (callee.type !== 'MemberExpression') return null;

  const method = memberName(callee);
  if (!method) return null;

  const path: string[] = [];
  let current = unwrap(callee.object);
  while (current.type === 'MemberExpression') {
    const segment = memberName(current);
    if (!segment) return null;
    path.unshift(segment);
    current = unwrap(current.object);
  }

  return current.type === 'ThisExpression' ? { path, method } : null;
}

function isConstructor(member: InstanceMember): member is TSESTree.MethodDefinition {
  return member.type === 'MethodDefinition' && member.kind === 'constructor';
}

/**
 * Fields the instance owns once construction finishes: `this.x` written in
 * the constructor, constructor parameter properties, and initialized fields.
 */
export function establishedFields(node: ClassNode): Set<string> {
  const fields = new Set<string>();

  for (const member of node.body.body) {
    if ((member.type === 'PropertyDefinition' || member.type === 'AccessorProperty') && !member.static) {
      const name = propertyName(member.key, member.computed);
      if (name && member.value) fields.add(name);
      continue;
    }

    if (!isConstructor(member)) continue;

    const parameterProperties = member.value.params.filter((p) => p.type === 'TSParameterProperty');
    for (const name of parameterNames(parameterProperties)) fields.add(name);

    if (!member.value.body) continue;
    walkReceiverScope(member.value.body, (child) => {
      const target = writtenTarget(child);
      if (!target) return;
      for (const field of receiverFields(target)) fields.add(field.name);
    });
  }

  return fields;
}

/** Code of an instance member that runs after construction, if any. */
function postConstructionBody(member: InstanceMember): TSESTree.Node | null {
  switch (member.type) {
    case 'MethodDefinition':
      if (member.static || member.kind === 'constructor') return null;
      return member.value.body ?? null;
    case 'PropertyDefinition':
    case 'AccessorProperty':
      // other initializers run during construction; function expressions rebind `this`
      return !member.static && member.value?.type === 'ArrowFunctionExpression' ? member.value : null;
    default:
      return null;
  }
}

/**
 * EO008 for one class: reassignment of an established field, or a mutating
 * method called through it, anywhere outside the constructor. Nested classes
 * are not entered; each gets its own pass.
 */
export function trackMutations(node: ClassNode, catalog: Catalog): Diagnostic[] {
  const established = establishedFields(node);
  const diagnostics: Diagnostic[] = [];
  if (established.size === 0) return diagnostics;

  function inspect(child: TSESTree.Node): void {
    const target =
      writtenTarget(child) ??
      (child.type === 'UnaryExpression' && child.operator === 'delete' ? child.argument : null);

    if (target) {
      for (const field of receiverFields(target)) {
        if (!established.has(field.name)) continue;
        diagnostics.push(...report(trackedRule, field.node, 'EO008', MESSAGES.EO008_REASSIGNED(field.name)));
      }
      return;
    }

    if (child.type !== 'CallExpression') return;

    const call = receiverCall(child);
    if (!call || call.path.length === 0) return;
    if (!established.has(call.path[0]) || !catalog.mutatingMethods.has(call.method)) return;

    diagnostics.push(
      ...report(trackedRule, child, 'EO008', MESSAGES.EO008_MUTATING_CALL(call.method, call.path.join('.')))
    );
  }

  for (const member of node.body.body) {
    const body = postConstructionBody(member);
    if (body) walkReceiverScope(body, inspect);
  }

  return diagnostics;
}
