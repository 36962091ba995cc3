import { Readable } from 'node:stream';
import csvParser from 'csv-parser';

export type CsvRow = Record<string, string>;

function isCsvRow(row: unknown): row is CsvRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    Object.values(row).every((value) => typeof value === 'string')
  );
}

/**
 * Pick ';' for semicolon exports (common from European-locale spreadsheets),
 * ',' otherwise
 */
export function detectSeparator(snippet: string): ',' | ';' {
  const firstLine = snippet.split(/\r?\n/, 1)[0] ?? '';
  const semicolons = firstLine.split(';').length - 1;
  const commas = firstLine.split(',').length - 1;
  return semicolons > commas ? ';' : ',';
}

/**
 * Read CSV rows from buffer using csv-parser.
 * Header names are trimmed and stripped of a UTF-8 BOM.
 */
export async function readCsvRows(fileBuffer: Buffer): Promise<CsvRow[]> {
  const separator = detectSeparator(fileBuffer.toString('utf-8', 0, 2048));
  const rows: CsvRow[] = [];

  const stream = Readable.from(fileBuffer).pipe(
    csvParser({
      separator,
      mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim(),
    }),
  );

  for await (const row of stream) {
    if (isCsvRow(row)) {
      rows.push(row);
    }
  }

  return rows;
}
