import { describe, it, expect, vi } from 'vitest';
import { escapeMarkup, groupDiffs, needsEscaping, renderDiff, writeReport, type ReportSink } from '../report/diffReport.js';
import { formatCsv } from '../utils/csvWrite.js';
import type { Catalog, DiffEntry } from '../types/Catalog.js';

const noEscaping = new Set<string>();

const staging: Catalog = new Map([
  ['A1', { sku: 'A1', product_websites: 'base,b2b', color: 'red' }],
  ['B2', { sku: 'B2', product_websites: 'base', color: 'blue' }],
]);

const diffs: DiffEntry[] = [
  { key: 'A1', kind: 'different_value', field: 'color', stagingValue: 'red', productionValue: 'blue' },
  { key: 'B2', kind: 'missing_in_production', field: '', stagingValue: '', productionValue: '' },
  { key: 'A1', kind: 'different_value (additional_attribute)', field: 'additional_attributes:size', stagingValue: 'M', productionValue: 'L' },
  { key: 'C3', kind: 'extra_in_production', field: '', stagingValue: '', productionValue: '' },
];

function memorySink() {
  return {
    noDifferences: vi.fn(),
    writeRows: vi.fn(),
  } satisfies ReportSink;
}

describe('renderDiff', () => {
  it('renders missing and extra records as fixed tokens', () => {
    expect(renderDiff(diffs[1], noEscaping)).toBe('missing_in_production');
    expect(renderDiff(diffs[3], noEscaping)).toBe('extra_in_production');
  });

  it('renders value changes with an arrow', () => {
    expect(renderDiff(diffs[0], noEscaping)).toBe('color [red → blue]');
  });

  it('escapes markup for configured fields', () => {
    const diff: DiffEntry = {
      key: 'A1',
      kind: 'different_value',
      field: 'description',
      stagingValue: '<p>Hi & bye</p>',
      productionValue: '<p>Hi</p>',
    };

    expect(renderDiff(diff, new Set(['description']))).toBe(
      'description [&lt;p&gt;Hi &amp; bye&lt;/p&gt; → &lt;p&gt;Hi&lt;/p&gt;]',
    );
  });

  it('escapes apostrophes as numeric references', () => {
    const diff: DiffEntry = {
      key: 'A1',
      kind: 'different_value',
      field: 'description',
      stagingValue: "Men's tee",
      productionValue: 'Tee',
    };

    expect(renderDiff(diff, new Set(['description']))).toBe('description [Men&#x27;s tee → Tee]');
  });

  it('escapes attribute sub-fields of a configured column', () => {
    const diff: DiffEntry = {
      key: 'A1',
      kind: 'different_value (additional_attribute)',
      field: 'additional_attributes:care',
      stagingValue: '<b>wash</b>',
      productionValue: '',
    };

    expect(renderDiff(diff, new Set(['additional_attributes']))).toBe(
      'additional_attributes:care [&lt;b&gt;wash&lt;/b&gt; → ]',
    );
  });
});

describe('escapeMarkup', () => {
  it('escapes ampersands, angle brackets and both quote characters', () => {
    expect(escapeMarkup(`<a title="Men's">Tee & Cap</a>`)).toBe(
      '&lt;a title=&quot;Men&#x27;s&quot;&gt;Tee &amp; Cap&lt;/a&gt;',
    );
  });

  it('leaves plain text alone', () => {
    expect(escapeMarkup('size M §')).toBe('size M §');
  });
});

describe('needsEscaping', () => {
  const htmlFields = new Set(['additional_attributes', 'description']);

  it('matches exact names and colon prefixes only', () => {
    expect(needsEscaping('description', htmlFields)).toBe(true);
    expect(needsEscaping('additional_attributes:care', htmlFields)).toBe(true);
    expect(needsEscaping('additional_attributes_extra', htmlFields)).toBe(false);
    expect(needsEscaping('short_description', htmlFields)).toBe(false);
  });
});

describe('groupDiffs', () => {
  it('groups per key in order of first appearance with the staging extra info', () => {
    expect(groupDiffs(diffs, staging, noEscaping)).toEqual([
      { key: 'A1', extraInfo: 'base,b2b', differences: ['color [red → blue]', 'additional_attributes:size [M → L]'] },
      { key: 'B2', extraInfo: 'base', differences: ['missing_in_production'] },
      { key: 'C3', extraInfo: '', differences: ['extra_in_production'] },
    ]);
  });
});

describe('writeReport', () => {
  it('emits the notice and nothing else when there are no differences', () => {
    const sink = memorySink();

    const outcome = writeReport([], staging, { keyField: 'sku', htmlFields: noEscaping }, sink);

    expect(outcome).toEqual({ written: false });
    expect(sink.noDifferences).toHaveBeenCalledTimes(1);
    expect(sink.writeRows).not.toHaveBeenCalled();
  });

  it('writes one row per key with joined differences', () => {
    const sink = memorySink();

    const outcome = writeReport(diffs, staging, { keyField: 'sku', htmlFields: noEscaping }, sink);

    expect(outcome).toEqual({ written: true, rows: 3 });
    expect(sink.noDifferences).not.toHaveBeenCalled();
    expect(sink.writeRows).toHaveBeenCalledWith(
      ['sku', 'product_websites', 'differences'],
      [
        ['A1', 'base,b2b', 'color [red → blue]; additional_attributes:size [M → L]'],
        ['B2', 'base', 'missing_in_production'],
        ['C3', '', 'extra_in_production'],
      ],
    );
  });
});

describe('formatCsv', () => {
  it('quotes only fields that need it', () => {
    const csv = formatCsv(
      ['sku', 'product_websites', 'differences'],
      [['A1', 'base,b2b', 'note [say "hi" → ]'], ['B2', 'base', 'missing_in_production']],
    );

    expect(csv).toBe(
      'sku,product_websites,differences\n' +
      'A1,"base,b2b","note [say ""hi"" → ]"\n' +
      'B2,base,missing_in_production\n',
    );
  });
});
