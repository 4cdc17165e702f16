import { parse } from '@typescript-eslint/typescript-estree';
import type { TSESTree } from '@typescript-eslint/typescript-estree';
import { isClassNode, type ClassNode } from '../src/context';
import { analyze, type AnalyzeOptions } from '../src/engine';
import type { Diagnostic, ErrorCode } from '../src/rules/types';
import { traverse } from '../src/traverse';

export function parseCode(code: string): TSESTree.Program {
  return parse(code, { jsx: true, loc: true, range: true });
}

export function lint(code: string, options?: AnalyzeOptions): Diagnostic[] {
  return analyze(parseCode(code), options);
}

export function messagesFor(diagnostics: Diagnostic[], code: ErrorCode): string[] {
  return diagnostics.filter((d) => d.code === code).map((d) => d.message);
}

export function firstClass(program: TSESTree.Program): ClassNode {
  const classes: ClassNode[] = [];
  traverse(program, (node) => {
    if (isClassNode(node)) classes.push(node);
  });

  const [first] = classes;
  if (!first) throw new Error('fixture has no class');
  return first;
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
