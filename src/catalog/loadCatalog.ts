/**
 * Catalog loading
 *
 * Three phases per document:
 * 1. protect the free-text column of every record (rowParser)
 * 2. parse the protected records as ordinary delimited rows (csv-parse)
 * 3. restore the placeholders in the free-text value
 */

import { parse } from 'csv-parse/sync';
import type { Catalog, CatalogRecord } from '../types/Catalog.js';
import { protectFreeTextField, restoreFreeText, splitLogicalLines } from './rowParser.js';

export interface LoadCatalogOptions {
  delimiter: string;
  /** Column whose value may contain the delimiter and line breaks */
  freeTextField: string;
  keyField: string;
}

function toFieldRows(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) return [];
  return parsed.map((row: unknown) => (Array.isArray(row) ? row.map(value => String(value)) : []));
}

function parseRows(text: string, delimiter: string): string[][] {
  if (!text) return [];
  return toFieldRows(parse(text, {
    delimiter,
    relax_quotes: true,
    relax_column_count: true,
    skip_empty_lines: true,
    skip_records_with_error: true,
  }));
}

/**
 * Column names from the header line
 */
export function parseHeader(headerLine: string, delimiter: string): string[] {
  return parseRows(headerLine, delimiter)[0] ?? [];
}

function toRecord(headers: string[], fields: string[]): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((header, idx) => {
    record[header] = fields[idx] ?? '';
  });
  return record;
}

/**
 * Build a catalog from a full delimited document.
 *
 * Rows with an empty key are skipped; when a key repeats, the last row wins.
 */
export function loadCatalog(text: string, options: LoadCatalogOptions): Catalog {
  const { delimiter, freeTextField, keyField } = options;
  const catalog = new Map<string, CatalogRecord>();

  // Remove BOM if present
  const content = text.charCodeAt(0) === 0xFEFF ? text.slice(1) : text;

  const lines = splitLogicalLines(content, delimiter);
  if (lines.length === 0) return catalog;

  const [headerLine, ...dataLines] = lines;
  const headers = parseHeader(headerLine, delimiter);
  const freeTextIndex = headers.indexOf(freeTextField);

  const guardedLines = dataLines.map(line => protectFreeTextField(line, delimiter, freeTextIndex));

  for (const fields of parseRows(guardedLines.join('\n'), delimiter)) {
    const record = toRecord(headers, fields);
    if (freeTextIndex >= 0) {
      record[freeTextField] = restoreFreeText(record[freeTextField], delimiter);
    }

    const key = (record[keyField] ?? '').trim();
    if (!key) continue;
    catalog.set(key, record);
  }

  return catalog;
}
