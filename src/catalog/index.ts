import { z } from 'zod';
import defaults from './defaults.json';
import { ConfigError } from '../errors';

const names = z.array(z.string().min(1));

/** Every configurable table of the rule catalog, as stored on disk. */
export const CatalogTablesSchema = z.object({
  /** Agent-noun suffixes ("...Manager", "...Handler") banned in names */
  erSuffixes: names,
  /** Imperative verbs banned as the first word of callables and variables */
  proceduralVerbs: names,
  /** Whole names (lower-cased) that override both lists above */
  allowedNames: names,
  /** Methods that change the container they are called on */
  mutatingMethods: names,
  /** Persistence-style operation names (ActiveRecord, query builders) */
  persistenceMethods: names,
  /** Built-in receivers whose methods share names with persistence operations */
  builtinReceivers: names,
  /** Dotted callee names of introspection primitives */
  reflectionCalls: names,
  /** Operators that discriminate on runtime type */
  reflectionOperators: z.array(z.enum(['typeof', 'instanceof'])),
  /** Base classes a class may extend */
  allowedBases: names,
  /** Constructors that build mutable containers */
  mutableConstructors: names,
  /** Class decorators marking an immutable value type */
  valueTypeDecorators: names,
  /** Name prefix of test functions */
  testPrefix: z.string().min(1),
  /** Test-registration calls whose callbacks are test bodies */
  testCalls: names,
  /** Assertion call names allowed in test bodies */
  assertions: names,
});

export type CatalogTables = z.infer<typeof CatalogTablesSchema>;

export const CatalogOverridesSchema = CatalogTablesSchema.partial().strict();

export type CatalogOverrides = z.infer<typeof CatalogOverridesSchema>;

export interface Catalog {
  readonly erSuffixes: ReadonlySet<string>;
  readonly proceduralVerbs: ReadonlySet<string>;
  readonly allowedNames: ReadonlySet<string>;
  readonly mutatingMethods: ReadonlySet<string>;
  readonly persistenceMethods: ReadonlySet<string>;
  readonly builtinReceivers: ReadonlySet<string>;
  readonly reflectionCalls: ReadonlySet<string>;
  readonly reflectionOperators: ReadonlySet<string>;
  readonly allowedBases: ReadonlySet<string>;
  readonly mutableConstructors: ReadonlySet<string>;
  readonly valueTypeDecorators: ReadonlySet<string>;
  readonly testPrefix: string;
  readonly testCalls: ReadonlySet<string>;
  readonly assertions: ReadonlySet<string>;
}

export const DEFAULT_TABLES: CatalogTables = CatalogTablesSchema.parse(defaults);

function lowered(values: string[]): ReadonlySet<string> {
  return new Set(values.map((v) => v.toLowerCase()));
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Build a catalog from the shipped defaults, replacing any table present in
 * `overrides`. Naming tables are compared case-insensitively and are stored
 * lower-cased.
 */
export function createCatalog(overrides: unknown = {}): Catalog {
  const parsed = CatalogOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(
      'CATALOG_INVALID',
      `Invalid rule catalog: ${formatIssues(parsed.error)}`,
      { issues: parsed.error.issues }
    );
  }

  const given = parsed.data;
  // an explicit `undefined` keeps the default table
  const tables: CatalogTables = {
    erSuffixes: given.erSuffixes ?? DEFAULT_TABLES.erSuffixes,
    proceduralVerbs: given.proceduralVerbs ?? DEFAULT_TABLES.proceduralVerbs,
    allowedNames: given.allowedNames ?? DEFAULT_TABLES.allowedNames,
    mutatingMethods: given.mutatingMethods ?? DEFAULT_TABLES.mutatingMethods,
    persistenceMethods: given.persistenceMethods ?? DEFAULT_TABLES.persistenceMethods,
    builtinReceivers: given.builtinReceivers ?? DEFAULT_TABLES.builtinReceivers,
    reflectionCalls: given.reflectionCalls ?? DEFAULT_TABLES.reflectionCalls,
    reflectionOperators: given.reflectionOperators ?? DEFAULT_TABLES.reflectionOperators,
    allowedBases: given.allowedBases ?? DEFAULT_TABLES.allowedBases,
    mutableConstructors: given.mutableConstructors ?? DEFAULT_TABLES.mutableConstructors,
    valueTypeDecorators: given.valueTypeDecorators ?? DEFAULT_TABLES.valueTypeDecorators,
    testPrefix: given.testPrefix ?? DEFAULT_TABLES.testPrefix,
    testCalls: given.testCalls ?? DEFAULT_TABLES.testCalls,
    assertions: given.assertions ?? DEFAULT_TABLES.assertions,
  };

  return {
    erSuffixes: lowered(tables.erSuffixes),
    proceduralVerbs: lowered(tables.proceduralVerbs),
    allowedNames: lowered(tables.allowedNames),
    mutatingMethods: new Set(tables.mutatingMethods),
    persistenceMethods: new Set(tables.persistenceMethods),
    builtinReceivers: new Set(tables.builtinReceivers),
    reflectionCalls: new Set(tables.reflectionCalls),
    reflectionOperators: new Set(tables.reflectionOperators),
    allowedBases: new Set(tables.allowedBases),
    mutableConstructors: new Set(tables.mutableConstructors),
    valueTypeDecorators: new Set(tables.valueTypeDecorators),
    testPrefix: tables.testPrefix,
    testCalls: new Set(tables.testCalls),
    assertions: new Set(tables.assertions),
  };
}

export const defaultCatalog: Catalog = createCatalog();
