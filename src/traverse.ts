import type { TSESTree } from '@typescript-eslint/typescript-estree';
import { visitorKeys } from '@typescript-eslint/visitor-keys';

const SKIP_KEYS = new Set(['parent', 'loc', 'range', 'tokens', 'comments']);

type Visitor = (node: TSESTree.Node) => void;

function isNode(value: unknown): value is TSESTree.Node {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

/**
 * Direct children of `node` in source order. Node types the visitor-key table
 * does not know (trees from a newer parser) fall back to scanning every field.
 */
export function childNodes(node: TSESTree.Node): TSESTree.Node[] {
  const fields = new Map<string, unknown>(Object.entries(node));
  const keys = visitorKeys[node.type] ?? [...fields.keys()].filter((key) => !SKIP_KEYS.has(key));
  const children: TSESTree.Node[] = [];

  for (const key of keys) {
    const child = fields.get(key);
    if (Array.isArray(child)) {
      const items: unknown[] = child;
      for (const c of items) {
        if (isNode(c)) children.push(c);
      }
    } else if (isNode(child)) {
      children.push(child);
    }
  }

  return children;
}

export function traverse(node: TSESTree.Node, visitor: Visitor): void {
  visitor(node);

  for (const child of childNodes(node)) {
    traverse(child, visitor);
  }
}
