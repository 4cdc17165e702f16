import type { TSESTree } from '@typescript-eslint/typescript-estree';
import { defaultCatalog, type Catalog } from './catalog';
import { collectScope, enterClass, isClassNode, type EnclosingClass } from './context';
import { trackMutations } from './mutation-tracker';
import { allRules } from './rules';
import type { Diagnostic, Rule, RuleContext } from './rules/types';
import { childNodes } from './traverse';

export interface AnalyzeOptions {
  catalog?: Catalog;
  rules?: readonly Rule[];
  /** Code prefixes to report (`EO00` keeps EO001–EO009); empty keeps all */
  select?: readonly string[];
  /** Code prefixes to drop, applied after `select` */
  ignore?: readonly string[];
}

export function isCodeEnabled(
  code: string,
  select: readonly string[] = [],
  ignore: readonly string[] = []
): boolean {
  const selected = select.length === 0 || select.some((prefix) => code.startsWith(prefix));
  return selected && !ignore.some((prefix) => code.startsWith(prefix));
}

/**
 * Run every rule over every node of `program`, pre-order, and the mutation
 * pass over every class. Diagnostics come back in visitation order; the same
 * tree always yields the same sequence.
 */
export function analyze(program: TSESTree.Program, options: AnalyzeOptions = {}): Diagnostic[] {
  const catalog = options.catalog ?? defaultCatalog;
  const rules = options.rules ?? allRules;
  const scope = collectScope(program);
  const diagnostics: Diagnostic[] = [];

  function visit(node: TSESTree.Node, enclosing: EnclosingClass | null): void {
    const active = isClassNode(node) ? enterClass(node, enclosing) : enclosing;
    const context: RuleContext = { enclosing: active, catalog, scope };

    for (const rule of rules) {
      diagnostics.push(...rule.check(node, context));
    }

    if (isClassNode(node)) {
      diagnostics.push(...trackMutations(node, catalog));
    }

    for (const child of childNodes(node)) {
      visit(child, active);
    }
  }

  visit(program, null);

  return diagnostics.filter((d) => isCodeEnabled(d.code, options.select, options.ignore));
}
