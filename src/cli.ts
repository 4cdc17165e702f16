#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig, type Config } from './config';
import { EolintError } from './errors';
import { logger } from './logger';
import { trackedRule } from './mutation-tracker';
import { formatRuleList, printFooter, printReport } from './reporter';
import { allRules } from './rules';
import { scan } from './scanner';

const program = new Command();

interface CliOptions {
  showSource?: boolean;
  config?: string;
  select?: string;
  ignore?: string;
  exclude: string[];
  listRules?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

function splitCodes(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map((code) => code.trim()).filter((code) => code.length > 0);
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

program
  .name('eolint')
  .description('Check TypeScript sources against Elegant Objects principles')
  .version('1.0.0')
  .argument('[paths...]', 'Files or directories to check', ['.'])
  .option('-s, --show-source', 'Print the source lines around each violation')
  .option('-c, --config <file>', 'Path to a config file (default: .eolintrc.json)')
  .option('--select <codes>', 'Comma-separated code prefixes to report, e.g. EO001,EO01')
  .option('--ignore <codes>', 'Comma-separated code prefixes to drop')
  .option('--exclude <pattern>', 'Glob pattern excluded from directory scans (can be repeated)', collect, [])
  .option('--list-rules', 'List all rules and exit')
  .option('-v, --verbose', 'Log debug output to stderr')
  .option('-q, --quiet', 'Only print violations and errors')
  .action(async (paths: string[], options: CliOptions) => {
    if (options.verbose) logger.setLevel('debug');
    else if (options.quiet) logger.setLevel('warn');

    if (options.listRules) {
      console.log('\nAvailable rules:\n');
      for (const line of formatRuleList([...allRules, trackedRule])) console.log(line);
      console.log('');
      return;
    }

    let config: Config;
    try {
      config = loadConfig(process.cwd(), options.config);
    } catch (error) {
      if (error instanceof EolintError) {
        logger.error(error.message);
        process.exitCode = 2;
        return;
      }
      throw error;
    }

    const select = options.select ? splitCodes(options.select) : config.select;
    const ignore = [...config.ignore, ...splitCodes(options.ignore)];

    logger.debug('Scanning', { paths, select, ignore });

    const reports = await scan({
      paths,
      catalog: config.catalog,
      select,
      ignore,
      exclude: [...config.exclude, ...options.exclude],
    });

    let total = 0;
    for (const report of reports) {
      total += printReport(report, { showSource: options.showSource, quiet: options.quiet });
    }

    printFooter(total);

    if (total > 0) process.exitCode = 1;
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 2;
});
