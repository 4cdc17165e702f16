import * as path from 'path';

import { parse, TSError } from '@typescript-eslint/typescript-estree';
import type { TSESTree } from '@typescript-eslint/typescript-estree';
import * as fs from 'fs';

export interface ParseResult {
  ast: TSESTree.Program;
  sourceLines: string[];
}

export interface ParseFailure {
  parseError: {
    filePath: string;
    message: string;
    line: number;
  };
}

export function isParseFailure(result: ParseResult | ParseFailure): result is ParseFailure {
  return 'parseError' in result;
}

export function parseSource(source: string, filePath = 'input.ts'): ParseResult | ParseFailure {
  const sourceLines = source.split('\n');
  const ext = path.extname(filePath);
  const isJsx = ext === '.tsx' || ext === '.jsx';

  try {
    const ast = parse(source, {
      jsx: isJsx,
      loc: true,
      range: true,
      comment: false,
      tokens: false,
      filePath,
    });

    return { ast, sourceLines };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    const line = err instanceof TSError ? err.lineNumber : 1;
    return { parseError: { filePath, message: msg, line } };
  }
}

export function parseFile(filePath: string): ParseResult | ParseFailure {
  let source: string;
  try {
    source = fs.readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { parseError: { filePath, message: msg, line: 1 } };
  }

  return parseSource(source, filePath);
}
