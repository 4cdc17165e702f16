import type { TSESTree } from '@typescript-eslint/typescript-estree';
import { decoratorName, dottedName } from './syntax';
import { traverse } from './traverse';

export type ClassNode = TSESTree.ClassDeclaration | TSESTree.ClassExpression;

/**
 * The class lexically around the node being visited. A nested class gets its
 * own value whose `parent` is the outer one; nothing is shared between them.
 */
export interface EnclosingClass {
  readonly node: ClassNode;
  readonly name: string | null;
  /** Dotted name of the `extends` target, `null` when absent or not a plain reference */
  readonly superClass: string | null;
  readonly hasSuperClass: boolean;
  readonly implements: readonly string[];
  readonly decorators: readonly string[];
  readonly abstract: boolean;
  readonly parent: EnclosingClass | null;
}

/** Facts about the whole file that rules may consult. */
export interface FileScope {
  /** Names of classes declared `abstract` in this file */
  readonly abstractClasses: ReadonlySet<string>;
}

export function isClassNode(node: TSESTree.Node): node is ClassNode {
  return node.type === 'ClassDeclaration' || node.type === 'ClassExpression';
}

export function enterClass(node: ClassNode, parent: EnclosingClass | null): EnclosingClass {
  const implemented: string[] = [];
  for (const clause of node.implements) {
    implemented.push(dottedName(clause.expression) ?? '(expression)');
  }

  const decorators: string[] = [];
  for (const decorator of node.decorators) {
    const name = decoratorName(decorator);
    if (name) decorators.push(name);
  }

  return {
    node,
    name: node.id?.name ?? null,
    superClass: node.superClass ? dottedName(node.superClass) : null,
    hasSuperClass: node.superClass !== null,
    implements: implemented,
    decorators,
    abstract: node.abstract,
    parent,
  };
}

export function collectScope(program: TSESTree.Program): FileScope {
  const abstractClasses = new Set<string>();

  traverse(program, (node) => {
    if (node.type === 'ClassDeclaration' && node.abstract && node.id) {
      abstractClasses.add(node.id.name);
    }
  });

  return { abstractClasses };
}

/**
 * A class carries a contract when it implements an interface or extends an
 * abstract class declared in the same file.
 */
export function hasContract(enclosing: EnclosingClass, scope: FileScope): boolean {
  if (enclosing.implements.length > 0) return true;
  return enclosing.superClass !== null && scope.abstractClasses.has(enclosing.superClass);
}
