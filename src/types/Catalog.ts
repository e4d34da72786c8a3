/** One catalog row: column name → raw field value. */
export type CatalogRecord = Readonly<Record<string, string>>;

/** Trimmed key value → record. */
export type Catalog = ReadonlyMap<string, CatalogRecord>;

/** Sub-key → sub-value decoded from the free-text column. */
export type AttributeMap = ReadonlyMap<string, string>;

export type DiffKind =
  | 'missing_in_production'
  | 'extra_in_production'
  | 'different_value'
  | 'different_value (additional_attribute)';

export interface DiffEntry {
  key: string;
  kind: DiffKind;
  /** Empty for missing/extra, `column` or `column:subkey` otherwise */
  field: string;
  stagingValue: string;
  productionValue: string;
}

export interface AttributeDiff {
  subKey: string;
  stagingValue: string;
  productionValue: string;
}

export interface DiffSummary {
  total: number;
  affectedKeys: number;
  byKind: Record<DiffKind, number>;
}

export interface ReportRow {
  key: string;
  extraInfo: string;
  differences: string[];
}
