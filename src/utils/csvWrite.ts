/**
 * Minimal CSV writer for report output (comma-delimited, quotes only when needed)
 */

export function escapeCsvField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

export function formatCsv(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const headerLine = headers.map(escapeCsvField).join(',');
  const dataLines = rows.map(row => row.map(escapeCsvField).join(','));
  return [headerLine, ...dataLines].join('\n') + '\n';
}
