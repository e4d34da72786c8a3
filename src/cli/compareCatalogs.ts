#!/usr/bin/env node
/**
 * COMPARE CATALOGS
 * Diff a staging catalog export against production and write a per-SKU report
 *
 * Usage:
 *   npx tsx src/cli/compareCatalogs.ts
 *   npx tsx src/cli/compareCatalogs.ts --config=configs/store.json --output=output/store_diff.csv
 *
 * The config path falls back to CATALOG_DIFF_CONFIG (.env), then config.json.
 */

import 'dotenv/config';
import { DEFAULT_CONFIG_FILE, loadDiffConfig } from '../config/diffConfig.js';
import { runCatalogDiff } from '../pipeline/runCatalogDiff.js';
import { ConfigError, describeError } from '../utils/errors.js';

const args = process.argv.slice(2);

function argValue(name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find(a => a.startsWith(prefix))?.slice(prefix.length);
}

async function main() {
  console.log('═'.repeat(60));
  console.log('🔍 CATALOG DIFF: staging vs production');
  console.log('═'.repeat(60) + '\n');

  const configPath = argValue('config') || process.env.CATALOG_DIFF_CONFIG || DEFAULT_CONFIG_FILE;
  const settings = loadDiffConfig(configPath);

  const outputOverride = argValue('output');
  if (outputOverride) settings.outputFile = outputOverride;

  runCatalogDiff(settings);
}

main().catch((err) => {
  console.error(`❌ ${describeError(err)}`);
  if (err instanceof ConfigError) {
    for (const issue of err.issues) {
      console.error(`   - ${issue}`);
    }
  }
  process.exit(1);
});
