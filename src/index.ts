export { analyze, isCodeEnabled } from './engine';
export { parseSource, parseFile, isParseFailure } from './parser';
export { scan, scanFile, collectFiles, isFileFailure } from './scanner';
export { allRules, ruleMap } from './rules';
export { trackedRule, trackMutations, establishedFields } from './mutation-tracker';
export { createCatalog, defaultCatalog, DEFAULT_TABLES } from './catalog';
export { loadConfig, resolveConfig, DEFAULT_CONFIG_FILE } from './config';
export { EolintError, ConfigError } from './errors';
export { formatDiagnostic, formatFooter, sourceContext } from './reporter';
export type { Diagnostic, Rule, RuleContext, ErrorCode, Category } from './rules/types';
export type { EnclosingClass, FileScope } from './context';
export type { Catalog, CatalogTables, CatalogOverrides } from './catalog';
export type { Config } from './config';
export type { AnalyzeOptions } from './engine';
export type { ParseResult, ParseFailure } from './parser';
export type { ScanOptions, FileReport, FileDiagnostics } from './scanner';
