// ──────────────────────────────────────────
// Reporting: Flat table (CSV) exporter
// ──────────────────────────────────────────

import { stringify } from 'csv-stringify/sync';
import { CellValue, ExportOptions, ExportResult, ReportTable } from '../../../shared/types';
import { EmptyInputError, FormatMismatchError } from '../../../shared/errors';
import { renderCell } from './cells';
import { reportFilename } from './filename';

export const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';

export function exportFlatTable(tables: readonly ReportTable[], options: ExportOptions): ExportResult {
  if (tables.length === 0) {
    throw new EmptyInputError('No report tables to export', { format: 'flat_table', kind: options.kind });
  }
  if (tables.length !== 1) {
    throw new FormatMismatchError(
      `Flat table export takes exactly one table, got ${tables.length}; use the workbook format for "${options.kind}"`,
      { format: 'flat_table', kind: options.kind, tables: tables.map((t) => t.kind) }
    );
  }

  const [table] = tables;
  const rows: ReadonlyArray<readonly CellValue[]> = table.rows;
  const records: string[][] = [table.columns.map((c) => c.header)];
  rows.forEach((row, i) => {
    records.push(
      table.columns.map((column, j) => renderCell(row[j] ?? null, column, { table: table.kind, row: i + 1, column: column.header }))
    );
  });

  // RFC 4180: CRLF records; fields with delimiter, quote or line breaks are quoted
  const text = stringify(records, { record_delimiter: 'windows', quoted_match: /[\r\n]/ });

  return {
    payload: Buffer.from(text, 'utf-8'),
    filename: reportFilename(options.kind, options.now, 'csv'),
    contentType: CSV_CONTENT_TYPE,
  };
}
