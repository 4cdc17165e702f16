import type { TSESTree } from '@typescript-eslint/typescript-estree';
import type { Catalog } from '../catalog';
import type { EnclosingClass, FileScope } from '../context';

export type ErrorCode =
  | 'EO001'
  | 'EO002'
  | 'EO003'
  | 'EO004'
  | 'EO005'
  | 'EO006'
  | 'EO007'
  | 'EO008'
  | 'EO009'
  | 'EO010'
  | 'EO011'
  | 'EO012'
  | 'EO013'
  | 'EO014';

export type Category = 'naming' | 'purity' | 'contract';

export interface Diagnostic {
  readonly line: number;
  readonly column: number;
  readonly code: ErrorCode;
  readonly message: string;
  readonly ruleId: string;
  readonly category: Category;
}

export interface RuleContext {
  /** Innermost class around the node being checked, if any. */
  readonly enclosing: EnclosingClass | null;
  readonly catalog: Catalog;
  readonly scope: FileScope;
}

export interface Rule {
  id: string;
  codes: readonly ErrorCode[];
  category: Category;
  description: string;
  check(node: TSESTree.Node, context: RuleContext): Diagnostic[];
}
