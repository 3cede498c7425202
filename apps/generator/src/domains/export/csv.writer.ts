// ============================================================================
// Export — CSV encoding and files
// ============================================================================

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { formatTimestamp } from '../../lib/time.js';

/** Anything a record column can hold once it reaches the export layer. */
export type CsvValue = string | number | boolean | Date | null;

/**
 * Escape a value for CSV output. Wraps in quotes if it contains commas,
 * quotes, or newlines. Doubles internal quotes.
 */
export function escapeCsvValue(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Null is an empty field; timestamps are UTC `YYYY-MM-DD HH:MM:SS`. */
export function formatCsvValue(value: CsvValue): string {
  if (value === null) return '';
  if (value instanceof Date) return formatTimestamp(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return escapeCsvValue(String(value));
}

export function toCsv(header: readonly string[], rows: readonly (readonly CsvValue[])[]): string {
  const lines = [header.join(',')];
  for (const row of rows) {
    lines.push(row.map(formatCsvValue).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/** Writes `<dir>/<table>.csv` and returns its path. */
export async function writeCsvFile(
  dir: string,
  table: string,
  header: readonly string[],
  rows: readonly (readonly CsvValue[])[],
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `${table}.csv`);
  await writeFile(filePath, toCsv(header, rows), 'utf8');
  return filePath;
}
