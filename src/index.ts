export type {
  AttributeDiff,
  AttributeMap,
  Catalog,
  CatalogRecord,
  DiffEntry,
  DiffKind,
  DiffSummary,
  ReportRow,
} from './types/Catalog.js';
export {
  SECTION_MARKER,
  splitLogicalLines,
  splitRow,
  stripMatchingQuotes,
  protectFreeText,
  protectFreeTextField,
  restoreFreeText,
} from './catalog/rowParser.js';
export { loadCatalog, parseHeader, type LoadCatalogOptions } from './catalog/loadCatalog.js';
export { parseAttributes } from './catalog/attributeCodec.js';
export { compareCatalogs, diffAttributes, summarizeDiffs, type CompareOptions } from './audit/compareCatalogs.js';
export {
  EXTRA_INFO_FIELD,
  NO_DIFFERENCES_NOTICE,
  escapeMarkup,
  groupDiffs,
  needsEscaping,
  renderDiff,
  reportHeaders,
  writeReport,
  type ReportOptions,
  type ReportOutcome,
  type ReportSink,
} from './report/diffReport.js';
export {
  DEFAULT_CONFIG_FILE,
  DiffConfigSchema,
  loadDiffConfig,
  parseDiffConfig,
  type DiffConfigInput,
  type DiffSettings,
} from './config/diffConfig.js';
export { createFileReportSink, runCatalogDiff, type LogFn, type RunResult } from './pipeline/runCatalogDiff.js';
export { escapeCsvField, formatCsv } from './utils/csvWrite.js';
export { CatalogReadError, ConfigError, ReportWriteError, describeError, type CatalogRole } from './utils/errors.js';
