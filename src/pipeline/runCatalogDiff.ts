import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import path from 'path';
import type { DiffSettings } from '../config/diffConfig.js';
import type { Catalog, DiffSummary } from '../types/Catalog.js';
import { loadCatalog } from '../catalog/loadCatalog.js';
import { compareCatalogs, summarizeDiffs } from '../audit/compareCatalogs.js';
import { NO_DIFFERENCES_NOTICE, writeReport, type ReportSink } from '../report/diffReport.js';
import { formatCsv } from '../utils/csvWrite.js';
import { CatalogReadError, ReportWriteError, type CatalogRole } from '../utils/errors.js';

export type LogFn = (message: string) => void;

export interface RunResult {
  stagingCount: number;
  productionCount: number;
  summary: DiffSummary;
  /** Absolute report path, null when there was nothing to report */
  reportPath: string | null;
}

function readCatalogFile(filePath: string, role: CatalogRole): string {
  if (!existsSync(filePath)) {
    throw new CatalogReadError(role, filePath, { cause: new Error('file not found') });
  }
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new CatalogReadError(role, filePath, { cause: err });
  }
}

export function createFileReportSink(outputFile: string, log: LogFn): ReportSink {
  return {
    noDifferences() {
      log(NO_DIFFERENCES_NOTICE);
    },
    writeRows(headers, rows) {
      try {
        mkdirSync(path.dirname(outputFile), { recursive: true });
        writeFileSync(outputFile, formatCsv(headers, rows), 'utf-8');
      } catch (err) {
        throw new ReportWriteError(outputFile, { cause: err });
      }
      log(`📄 Report written: ${outputFile}`);
    },
  };
}

function loadSide(settings: DiffSettings, role: CatalogRole, log: LogFn): Catalog {
  const filePath = path.resolve(role === 'staging' ? settings.stagingFile : settings.productionFile);
  log(`📂 Loading ${role} catalog: ${filePath}`);

  const catalog = loadCatalog(readCatalogFile(filePath, role), {
    delimiter: settings.delimiter,
    freeTextField: settings.freeTextField,
    keyField: settings.keyField,
  });

  if (catalog.size === 0) {
    log(`⚠️  No ${role} rows with a "${settings.keyField}" value`);
  } else {
    log(`   ${catalog.size} products`);
  }
  return catalog;
}

/**
 * Load both catalogs, compare them and write the grouped report.
 */
export function runCatalogDiff(settings: DiffSettings, log: LogFn = console.log): RunResult {
  const staging = loadSide(settings, 'staging', log);
  const production = loadSide(settings, 'production', log);

  const diffs = compareCatalogs(staging, production, {
    ignoredColumns: settings.excludedColumns,
    freeTextField: settings.freeTextField,
    attributeSeparator: settings.attributeSeparator,
    ignoredAttributes: settings.excludedAttributes,
  });

  const reportPath = path.resolve(settings.outputFile);
  const outcome = writeReport(
    diffs,
    staging,
    { keyField: settings.keyField, htmlFields: settings.htmlFields },
    createFileReportSink(reportPath, log),
  );

  const summary = summarizeDiffs(diffs);
  if (outcome.written) {
    log(`\nTotal differences: ${summary.total} across ${summary.affectedKeys} products`);
    log(`   Missing in production: ${summary.byKind.missing_in_production}`);
    log(`   Extra in production: ${summary.byKind.extra_in_production}`);
    log(`   Different values: ${summary.byKind.different_value}`);
    log(`   Different attributes: ${summary.byKind['different_value (additional_attribute)']}`);
  }

  return {
    stagingCount: staging.size,
    productionCount: production.size,
    summary,
    reportPath: outcome.written ? reportPath : null,
  };
}
