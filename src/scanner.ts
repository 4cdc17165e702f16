import fg from 'fast-glob';
import * as fs from 'fs';
import * as path from 'path';
import { defaultCatalog, type Catalog } from './catalog';
import { analyze } from './engine';
import { logger } from './logger';
import { parseFile, isParseFailure, type ParseFailure } from './parser';
import type { Diagnostic } from './rules/types';

const SOURCE_EXTENSIONS = /\.(ts|tsx|mts|cts)$/;
const GLOB_PATTERNS = ['**/*.ts', '**/*.tsx', '**/*.mts', '**/*.cts'];
const IGNORE_PATTERNS = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/coverage/**',
  '**/*.d.ts',
];

export interface ScanOptions {
  paths: string[];
  catalog?: Catalog;
  select?: string[];
  ignore?: string[];
  exclude?: string[];
}

export interface FileDiagnostics {
  filePath: string;
  diagnostics: Diagnostic[];
  sourceLines: string[];
}

export type FileReport = FileDiagnostics | (ParseFailure & { filePath: string });

export function isFileFailure(report: FileReport): report is ParseFailure & { filePath: string } {
  return 'parseError' in report;
}

/**
 * Expand directories into the TypeScript sources below them. Explicit file
 * arguments are kept in the order given when they have a TypeScript
 * extension; anything else is skipped.
 */
export async function collectFiles(paths: string[], exclude: string[] = []): Promise<string[]> {
  const files: string[] = [];

  for (const target of paths) {
    const resolved = path.resolve(target);
    const isDirectory = fs.existsSync(resolved) && fs.statSync(resolved).isDirectory();

    if (isDirectory) {
      const found = await fg(GLOB_PATTERNS, {
        cwd: resolved,
        absolute: true,
        ignore: [...IGNORE_PATTERNS, ...exclude],
      });
      files.push(...found.sort());
    } else if (SOURCE_EXTENSIONS.test(target) && !target.endsWith('.d.ts')) {
      files.push(target);
    } else {
      logger.debug('Skipping non-TypeScript file', { path: target });
    }
  }

  return [...new Set(files)];
}

export function scanFile(filePath: string, options: Omit<ScanOptions, 'paths'> = {}): FileReport {
  const result = parseFile(filePath);

  if (isParseFailure(result)) {
    logger.debug('Parse failed', { path: filePath, line: result.parseError.line });
    return { filePath, parseError: result.parseError };
  }

  const diagnostics = analyze(result.ast, {
    catalog: options.catalog ?? defaultCatalog,
    select: options.select,
    ignore: options.ignore,
  });
  logger.debug('Analyzed file', { path: filePath, diagnostics: diagnostics.length });

  return { filePath, diagnostics, sourceLines: result.sourceLines };
}

/** One report per file; a file that fails to parse never stops the batch. */
export async function scan(options: ScanOptions): Promise<FileReport[]> {
  const files = await collectFiles(options.paths, options.exclude);
  return files.map((filePath) => scanFile(filePath, options));
}
