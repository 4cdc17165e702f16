import pc from 'picocolors';
import type { Category, Diagnostic, Rule } from './rules/types';
import type { FileReport } from './scanner';
import { isFileFailure } from './scanner';

const CONTEXT_BEFORE = 3;
const CONTEXT_AFTER = 1;

function categoryColor(cat: Category): (s: string) => string {
  switch (cat) {
    case 'naming':   return pc.cyan;
    case 'purity':   return pc.yellow;
    case 'contract': return pc.magenta;
  }
}

export function formatDiagnostic(filePath: string, diag: Diagnostic): string {
  return `${filePath}:${diag.line}:${diag.column}: ${diag.message}`;
}

/**
 * Source lines around a diagnostic, `▶` on the reported one. `line` is
 * 1-based; lines past either end of the file are left out.
 */
export function sourceContext(sourceLines: string[], line: number): string[] {
  const index = line - 1;
  if (index < 0 || index >= sourceLines.length) return [];

  const start = Math.max(0, index - CONTEXT_BEFORE);
  const end = Math.min(sourceLines.length - 1, index + CONTEXT_AFTER);

  const snippet: string[] = [];
  for (let i = start; i <= end; i++) {
    const prefix = i === index ? '▶' : ' ';
    snippet.push(`${prefix} ${String(i + 1).padStart(3)} │  ${sourceLines[i]}`);
  }
  return snippet;
}

export function formatClean(filePath: string): string {
  return `${filePath}: No violations found ✓`;
}

export function formatFailure(filePath: string, message: string): string {
  return `Error processing ${filePath}: ${message}`;
}

export function formatFooter(total: number): string {
  return total === 0
    ? 'All files comply with Elegant Objects principles! ✓'
    : `Total violations found: ${total}`;
}

export function formatRuleList(rules: readonly Pick<Rule, 'id' | 'codes' | 'category' | 'description'>[]): string[] {
  return rules.map(
    (rule) => `  ${rule.codes.join(',').padEnd(12)} ${rule.id.padEnd(30)} [${categoryColor(rule.category)(rule.category)}]  ${rule.description}`
  );
}

export interface PrintOptions {
  showSource?: boolean;
  /** Omit the per-file "No violations found" lines */
  quiet?: boolean;
}

/**
 * Write one report to stdout (failures to stderr) and return the number of
 * diagnostics it carried.
 */
export function printReport(report: FileReport, options: PrintOptions = {}): number {
  if (isFileFailure(report)) {
    console.error(pc.red(formatFailure(report.filePath, report.parseError.message)));
    return 0;
  }

  if (report.diagnostics.length === 0) {
    if (!options.quiet) console.log(formatClean(report.filePath));
    return 0;
  }

  for (const diag of report.diagnostics) {
    console.log(formatDiagnostic(report.filePath, diag));
    if (!options.showSource) continue;

    for (const line of sourceContext(report.sourceLines, diag.line)) {
      console.log('    ' + (line.startsWith('▶') ? pc.yellow(line) : pc.dim(line)));
    }
    console.log('');
  }
  return report.diagnostics.length;
}

export function printFooter(total: number): void {
  const footer = formatFooter(total);
  console.log('');
  console.log(total === 0 ? pc.green(footer) : pc.bold(footer));
}
