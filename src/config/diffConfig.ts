/**
 * Comparison settings
 *
 * Read from a JSON file with snake_case keys and validated with zod. Only the
 * two catalog locations are required; everything else has a default.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export const DEFAULT_CONFIG_FILE = 'config.json';

const stringList = z.array(z.string()).default([]);

export const DiffConfigSchema = z.object({
  master_file: z.string().min(1, 'staging catalog location is required'),
  comparison_file: z.string().min(1, 'production catalog location is required'),
  key_field: z.string().min(1).default('sku'),
  csv_delimiter: z.string().length(1, 'delimiter must be a single character').default(','),
  attr_separator: z.string().min(1).default('§'),
  exclude_columns: stringList,
  exclude_additional_attributes: stringList,
  html_fields: stringList,
  special_field: z.string().min(1).default('additional_attributes'),
  output_file: z.string().min(1).default('output/diff_report.csv'),
});

export type DiffConfigInput = z.input<typeof DiffConfigSchema>;

export interface DiffSettings {
  stagingFile: string;
  productionFile: string;
  outputFile: string;
  keyField: string;
  delimiter: string;
  attributeSeparator: string;
  freeTextField: string;
  excludedColumns: ReadonlySet<string>;
  excludedAttributes: ReadonlySet<string>;
  htmlFields: ReadonlySet<string>;
}

export function parseDiffConfig(raw: unknown): DiffSettings {
  const result = DiffConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${issues.length} issue${issues.length === 1 ? '' : 's'})`, issues);
  }

  const config = result.data;
  return {
    stagingFile: config.master_file,
    productionFile: config.comparison_file,
    outputFile: config.output_file,
    keyField: config.key_field,
    delimiter: config.csv_delimiter,
    attributeSeparator: config.attr_separator,
    freeTextField: config.special_field,
    excludedColumns: new Set(config.exclude_columns),
    excludedAttributes: new Set(config.exclude_additional_attributes),
    htmlFields: new Set(config.html_fields),
  };
}

export function loadDiffConfig(configPath: string): DiffSettings {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file is not valid JSON: ${configPath} (${reason})`);
  }

  return parseDiffConfig(raw);
}
