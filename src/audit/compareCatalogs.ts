import type { AttributeDiff, Catalog, DiffEntry, DiffKind, DiffSummary } from '../types/Catalog.js';
import { parseAttributes } from '../catalog/attributeCodec.js';

export interface CompareOptions {
  /** Columns never compared */
  ignoredColumns: ReadonlySet<string>;
  /** Column holding the `key=value` attribute list */
  freeTextField: string;
  attributeSeparator: string;
  /** Sub-attribute keys never compared */
  ignoredAttributes: ReadonlySet<string>;
}

/**
 * Compare two attribute lists key by key.
 *
 * A sub-key is reported when it exists on one side only or when the trimmed
 * values differ. Staging sub-keys come first, then production-only ones.
 */
export function diffAttributes(
  stagingRaw: string,
  productionRaw: string,
  separator: string,
  ignored: ReadonlySet<string>,
): AttributeDiff[] {
  const staging = parseAttributes(stagingRaw, separator);
  const production = parseAttributes(productionRaw, separator);
  const diffs: AttributeDiff[] = [];

  for (const [subKey, stagingValue] of staging) {
    if (ignored.has(subKey)) continue;
    const productionValue = production.get(subKey);
    if (productionValue === undefined || productionValue.trim() !== stagingValue.trim()) {
      diffs.push({ subKey, stagingValue, productionValue: productionValue ?? '' });
    }
  }

  for (const [subKey, productionValue] of production) {
    if (ignored.has(subKey) || staging.has(subKey)) continue;
    diffs.push({ subKey, stagingValue: '', productionValue });
  }

  return diffs;
}

function recordOnly(key: string, kind: DiffKind): DiffEntry {
  return { key, kind, field: '', stagingValue: '', productionValue: '' };
}

export function compareCatalogs(staging: Catalog, production: Catalog, options: CompareOptions): DiffEntry[] {
  const { ignoredColumns, freeTextField, attributeSeparator, ignoredAttributes } = options;
  const diffs: DiffEntry[] = [];

  for (const [key, stagingRecord] of staging) {
    const productionRecord = production.get(key);
    if (!productionRecord) {
      diffs.push(recordOnly(key, 'missing_in_production'));
      continue;
    }

    for (const field of Object.keys(stagingRecord)) {
      if (ignoredColumns.has(field)) continue;

      const stagingValue = (stagingRecord[field] ?? '').trim();
      const productionValue = (productionRecord[field] ?? '').trim();

      if (field === freeTextField) {
        for (const attr of diffAttributes(stagingValue, productionValue, attributeSeparator, ignoredAttributes)) {
          diffs.push({
            key,
            kind: 'different_value (additional_attribute)',
            field: `${freeTextField}:${attr.subKey}`,
            stagingValue: attr.stagingValue,
            productionValue: attr.productionValue,
          });
        }
        continue;
      }

      if (stagingValue !== productionValue) {
        diffs.push({ key, kind: 'different_value', field, stagingValue, productionValue });
      }
    }
  }

  for (const key of production.keys()) {
    if (!staging.has(key)) {
      diffs.push(recordOnly(key, 'extra_in_production'));
    }
  }

  return diffs;
}

export function summarizeDiffs(diffs: readonly DiffEntry[]): DiffSummary {
  const byKind: Record<DiffKind, number> = {
    missing_in_production: 0,
    extra_in_production: 0,
    different_value: 0,
    'different_value (additional_attribute)': 0,
  };
  const keys = new Set<string>();

  for (const diff of diffs) {
    byKind[diff.kind] += 1;
    keys.add(diff.key);
  }

  return { total: diffs.length, affectedKeys: keys.size, byKind };
}
