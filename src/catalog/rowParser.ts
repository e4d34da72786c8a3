/**
 * Row scanning for catalog exports
 *
 * Handles:
 * - A free-text column that contains the delimiter, quotes and line breaks
 * - Single- and double-quoted fields
 * - Logical records spanning several physical lines
 *
 * The free-text column is protected with placeholders before the generic
 * parse and restored afterwards (see loadCatalog).
 */

type QuoteChar = '"' | "'";

export const SECTION_MARKER = '§';

// Unicode private-use code points never occur in exported catalog text
const PLACEHOLDER = {
  delimiter: '\uE000',
  comma: '\uE001',
  carriageReturn: '\uE002',
  lineFeed: '\uE003',
  section: '\uE004',
  quote: '\uE005',
} as const;

function isQuoteChar(char: string): char is QuoteChar {
  return char === '"' || char === "'";
}

function replaceEvery(value: string, search: string, replacement: string): string {
  return value.split(search).join(replacement);
}

/**
 * Split a document into logical records.
 *
 * A line break ends the record unless it sits inside a double-quoted field
 * (opened by a `"` at the start of a field, `""` being an escaped quote).
 */
export function splitLogicalLines(text: string, delimiter: string): string[] {
  const lines: string[] = [];
  let current = '';
  let inQuotes = false;
  let atFieldStart = true;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      current += char;
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      }
      continue;
    }

    if (char === '\r' || char === '\n') {
      lines.push(current);
      current = '';
      atFieldStart = true;
      if (char === '\r' && text[i + 1] === '\n') i++;
      continue;
    }

    if (char === '"' && atFieldStart) inQuotes = true;
    atFieldStart = char === delimiter;
    current += char;
  }

  if (current !== '') lines.push(current);
  return lines;
}

/**
 * Split one record into raw fields. Quote characters are kept in the output.
 */
export function splitRow(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = '';
  let openQuote: QuoteChar | null = null;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (isQuoteChar(char)) {
      if (openQuote === null) {
        openQuote = char;
      } else if (openQuote === char) {
        openQuote = null;
      }
      current += char;
    } else if (char === delimiter && openQuote === null) {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current);
  return fields;
}

/**
 * Remove one layer of surrounding quotes when both ends carry the same one.
 */
export function stripMatchingQuotes(value: string): string {
  if (value.length < 2) return value;
  const first = value[0];
  if (isQuoteChar(first) && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
}

function unquoteFreeText(raw: string): string {
  const stripped = stripMatchingQuotes(raw);
  // A double-quoted CSV value carries its literal quotes doubled
  if (stripped !== raw && raw.startsWith('"')) {
    return stripped.replace(/""/g, '"');
  }
  return stripped;
}

export function protectFreeText(value: string, delimiter: string): string {
  const guarded = delimiter === ',' ? value : replaceEvery(value, delimiter, PLACEHOLDER.delimiter);
  return guarded
    .replace(/,/g, PLACEHOLDER.comma)
    .replace(/\r/g, PLACEHOLDER.carriageReturn)
    .replace(/\n/g, PLACEHOLDER.lineFeed)
    .replace(/§/g, PLACEHOLDER.section)
    .replace(/"/g, PLACEHOLDER.quote);
}

export function restoreFreeText(value: string, delimiter: string): string {
  let restored = value;
  restored = replaceEvery(restored, PLACEHOLDER.quote, '"');
  restored = replaceEvery(restored, PLACEHOLDER.section, SECTION_MARKER);
  restored = replaceEvery(restored, PLACEHOLDER.lineFeed, '\n');
  restored = replaceEvery(restored, PLACEHOLDER.carriageReturn, '\r');
  restored = replaceEvery(restored, PLACEHOLDER.comma, ',');
  return replaceEvery(restored, PLACEHOLDER.delimiter, delimiter);
}

/**
 * Rewrite a record so that its free-text field survives a generic delimited
 * parse. `freeTextIndex` is -1 when the header has no such column, in which
 * case the line is returned untouched.
 */
export function protectFreeTextField(line: string, delimiter: string, freeTextIndex: number): string {
  if (freeTextIndex < 0) return line;

  const fields = splitRow(line, delimiter);
  if (freeTextIndex >= fields.length) return line;

  fields[freeTextIndex] = protectFreeText(unquoteFreeText(fields[freeTextIndex]), delimiter);
  return fields.join(delimiter);
}
