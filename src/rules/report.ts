import type { TSESTree } from '@typescript-eslint/typescript-estree';
import type { Diagnostic, ErrorCode, Rule } from './types';

export const MESSAGES = {
  EO001: (name: string) =>
    `EO001 Class name '${name}' violates -er principle (describes what it does, not what it is)`,
  EO002: (name: string) => `EO002 Method name '${name}' violates -er principle (should be noun, not verb)`,
  EO003: (name: string) => `EO003 Variable name '${name}' violates -er principle (should be noun, not verb)`,
  EO004: (name: string) => `EO004 Function name '${name}' violates -er principle (should be noun, not verb)`,
  EO005: () => 'EO005 Null usage violates EO principle (avoid null)',
  EO006: () => 'EO006 Code in constructor violates EO principle (constructors should only assign parameters)',
  EO007: (name: string) => `EO007 Getter/setter method '${name}' violates EO principle (avoid getters/setters)`,
  EO008: (name: string) => `EO008 Mutable object violation: '${name}' should be immutable`,
  EO008_REASSIGNED: (field: string) => `EO008 Attribute '${field}' mutated outside constructor`,
  EO008_MUTATING_CALL: (method: string, path: string) =>
    `EO008 Mutating method '${method}' called on attribute '${path}'`,
  EO009: (name: string) => `EO009 Static method '${name}' violates EO principle (no static methods allowed)`,
  EO010: (name: string) =>
    `EO010 Type discrimination '${name}' violates EO principle (avoid reflection and type checks)`,
  EO011: (name: string) =>
    `EO011 Public method '${name}' without contract (interface or abstract member) violates EO principle`,
  EO012: (name: string, assertions: string) =>
    `EO012 Test method '${name}' contains non-assertion statements (only ${assertions} allowed)`,
  EO013: (name: string) => `EO013 ORM/ActiveRecord pattern '${name}' violates EO principle`,
  EO014: (name: string) =>
    `EO014 Implementation inheritance violates EO principle (class '${name}' inherits from non-abstract class)`,
} as const;

interface Positioned {
  loc?: TSESTree.SourceLocation | null;
}

/**
 * One diagnostic at the start of `node`, or none when the node carries no
 * position (trees built by hand rather than by the parser).
 */
export function report(
  rule: Pick<Rule, 'id' | 'category'>,
  node: Positioned,
  code: ErrorCode,
  message: string
): Diagnostic[] {
  if (!node.loc) return [];

  return [
    {
      line: node.loc.start.line,
      column: node.loc.start.column,
      code,
      message,
      ruleId: rule.id,
      category: rule.category,
    },
  ];
}
