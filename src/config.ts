import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CatalogOverridesSchema, createCatalog, formatIssues, type Catalog } from './catalog';
import { ConfigError } from './errors';

export const DEFAULT_CONFIG_FILE = '.eolintrc.json';

const codePrefix = z.string().regex(/^EO\d{0,3}$/, 'expected an EO code or prefix such as EO008');

export const ConfigSchema = z
  .object({
    /** Code prefixes to report; empty reports everything */
    select: z.array(codePrefix).default([]),
    /** Code prefixes to drop */
    ignore: z.array(codePrefix).default([]),
    /** Extra glob patterns excluded from directory scans */
    exclude: z.array(z.string()).default([]),
    /** Replacement tables for the rule catalog */
    catalog: CatalogOverridesSchema.default({}),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigSchema>;

export interface Config {
  select: string[];
  ignore: string[];
  exclude: string[];
  catalog: Catalog;
}

export function resolveConfig(raw: unknown, source = '(inline)'): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('CONFIG_INVALID', `Invalid config in ${source}: ${formatIssues(parsed.error)}`, {
      path: source,
    });
  }

  return {
    select: parsed.data.select,
    ignore: parsed.data.ignore,
    exclude: parsed.data.exclude,
    catalog: createCatalog(parsed.data.catalog),
  };
}

/**
 * Load `.eolintrc.json` from `projectRoot`, or `configPath` when given.
 * A missing default file means defaults; a missing explicit file is an error.
 */
export function loadConfig(projectRoot: string, configPath?: string): Config {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(fullPath)) {
    if (configPath) {
      throw new ConfigError('CONFIG_NOT_FOUND', `Config file not found: ${fullPath}`, { path: fullPath });
    }
    return resolveConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError('CONFIG_READ_ERROR', `Failed to load config from ${fullPath}: ${reason}`, {
      path: fullPath,
      originalError: reason,
    });
  }

  return resolveConfig(raw, fullPath);
}
