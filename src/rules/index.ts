import type { Rule } from './types';

import noErNames from './no-er-names';

import noNull from './no-null';
import constructorPurity from './constructor-purity';
import noGettersSetters from './no-getters-setters';
import immutableDeclaration from './immutable-declaration';

import noStaticMethods from './no-static-methods';
import requireContracts from './require-contracts';
import testPurity from './test-purity';
import noReflection from './no-reflection';
import noOrmPatterns from './no-orm-patterns';
import noImplementationInheritance from './no-implementation-inheritance';

export const allRules: Rule[] = [
  noErNames,
  noNull,
  constructorPurity,
  noGettersSetters,
  immutableDeclaration,
  noStaticMethods,
  requireContracts,
  testPurity,
  noReflection,
  noOrmPatterns,
  noImplementationInheritance,
];

export const ruleMap = new Map<string, Rule>(
  allRules.map((r) => [r.id, r])
);

export { type Rule, type Diagnostic, type ErrorCode, type Category, type RuleContext } from './types';
