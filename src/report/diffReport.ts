/**
 * Diff report
 *
 * Groups diff entries per key and renders them as one line per product:
 *   sku, product_websites, "color [red → blue]; additional_attributes:size [M → L]"
 */

import type { Catalog, DiffEntry, ReportRow } from '../types/Catalog.js';

/** Staging column shown next to every key in the report */
export const EXTRA_INFO_FIELD = 'product_websites';

export const NO_DIFFERENCES_NOTICE = '✅ No differences found between the two catalogs.';

export interface ReportOptions {
  keyField: string;
  /** Columns (and `column:` attribute prefixes) whose values are HTML-escaped */
  htmlFields: ReadonlySet<string>;
}

export interface ReportSink {
  noDifferences(): void;
  writeRows(headers: readonly string[], rows: readonly (readonly string[])[]): void;
}

export type ReportOutcome =
  | { written: false }
  | { written: true; rows: number };

/**
 * Escape markup the same way earlier reports did (`'` → `&#x27;`)
 */
export function escapeMarkup(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

export function needsEscaping(field: string, htmlFields: ReadonlySet<string>): boolean {
  for (const htmlField of htmlFields) {
    if (field === htmlField || field.startsWith(`${htmlField}:`)) return true;
  }
  return false;
}

export function renderDiff(diff: DiffEntry, htmlFields: ReadonlySet<string>): string {
  if (diff.kind === 'missing_in_production' || diff.kind === 'extra_in_production') {
    return diff.kind;
  }

  let { stagingValue, productionValue } = diff;
  if (needsEscaping(diff.field, htmlFields)) {
    stagingValue = escapeMarkup(stagingValue);
    productionValue = escapeMarkup(productionValue);
  }
  return `${diff.field} [${stagingValue} → ${productionValue}]`;
}

/**
 * One row per affected key, in order of first appearance
 */
export function groupDiffs(diffs: readonly DiffEntry[], staging: Catalog, htmlFields: ReadonlySet<string>): ReportRow[] {
  const grouped = new Map<string, ReportRow>();

  for (const diff of diffs) {
    let row = grouped.get(diff.key);
    if (!row) {
      row = {
        key: diff.key,
        extraInfo: staging.get(diff.key)?.[EXTRA_INFO_FIELD] ?? '',
        differences: [],
      };
      grouped.set(diff.key, row);
    }
    row.differences.push(renderDiff(diff, htmlFields));
  }

  return Array.from(grouped.values());
}

export function reportHeaders(keyField: string): string[] {
  return [keyField, EXTRA_INFO_FIELD, 'differences'];
}

export function writeReport(
  diffs: readonly DiffEntry[],
  staging: Catalog,
  options: ReportOptions,
  sink: ReportSink,
): ReportOutcome {
  if (diffs.length === 0) {
    sink.noDifferences();
    return { written: false };
  }

  const rows = groupDiffs(diffs, staging, options.htmlFields)
    .map(row => [row.key, row.extraInfo, row.differences.join('; ')]);

  sink.writeRows(reportHeaders(options.keyField), rows);
  return { written: true, rows: rows.length };
}
