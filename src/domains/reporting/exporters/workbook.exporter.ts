// ──────────────────────────────────────────
// Reporting: Workbook (XLSX) exporter
// ──────────────────────────────────────────

import { Workbook, Worksheet } from 'exceljs';
import { CellValue, ColumnType, ExportOptions, ExportResult, ReportTable } from '../../../shared/types';
import { EmptyInputError } from '../../../shared/errors';
import { renderCell, toWorkbookValue } from './cells';
import { reportFilename } from './filename';

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const DEFAULT_MAX_COLUMN_WIDTH = 60;

const SHEET_NAME_MAX = 31;
const COLUMN_PADDING = 2;

const NUMBER_FORMATS: Partial<Record<ColumnType, string>> = {
  money: '0.00',
  ratio: '0.00',
  date: 'yyyy-mm-dd',
};

export async function exportWorkbook(tables: readonly ReportTable[], options: ExportOptions): Promise<ExportResult> {
  if (tables.length === 0) {
    throw new EmptyInputError('No report tables to export', { format: 'workbook', kind: options.kind });
  }

  const workbook = new Workbook();
  workbook.creator = 'creator-payments';
  workbook.created = options.now;
  workbook.modified = options.now;

  const maxWidth = options.maxColumnWidth ?? DEFAULT_MAX_COLUMN_WIDTH;
  const usedNames = new Set<string>();
  for (const table of tables) {
    const sheet = workbook.addWorksheet(sheetName(table.kind, usedNames));
    writeTable(sheet, table, maxWidth);
  }

  const buffer = await workbook.xlsx.writeBuffer();
  return {
    payload: Buffer.from(buffer),
    filename: reportFilename(options.kind, options.now, 'xlsx'),
    contentType: XLSX_CONTENT_TYPE,
  };
}

function writeTable(sheet: Worksheet, table: ReportTable, maxWidth: number): void {
  const widths = table.columns.map((c) => c.header.length);
  const rows: ReadonlyArray<readonly CellValue[]> = table.rows;

  sheet.columns = table.columns.map((c) => ({ header: c.header, key: c.key }));
  sheet.getRow(1).font = { bold: true };

  rows.forEach((values, i) => {
    const cells = table.columns.map((column, j) => {
      const at = { table: table.kind, row: i + 1, column: column.header };
      const value = values[j] ?? null;
      widths[j] = Math.max(widths[j], renderCell(value, column, at).length);
      return toWorkbookValue(value, column, at);
    });

    const row = sheet.addRow(cells);
    table.columns.forEach((column, j) => {
      const numFmt = NUMBER_FORMATS[column.type];
      if (numFmt) row.getCell(j + 1).numFmt = numFmt;
    });
  });

  table.columns.forEach((_column, j) => {
    sheet.getColumn(j + 1).width = Math.min(widths[j] + COLUMN_PADDING, maxWidth);
  });
}

/**
 * Excel sheet names: at most 31 characters, none of `[ ] : * ? / \`, no
 * leading or trailing apostrophe, unique case-insensitively.
 */
export function sheetName(name: string, used: Set<string>): string {
  const base =
    name
      .replace(/[[\]:*?/\\]/g, '_')
      .replace(/^'+|'+$/g, '')
      .trim()
      .slice(0, SHEET_NAME_MAX) || 'Sheet';

  let candidate = base;
  for (let n = 2; used.has(candidate.toLowerCase()); n++) {
    const suffix = ` (${n})`;
    candidate = base.slice(0, SHEET_NAME_MAX - suffix.length) + suffix;
  }
  used.add(candidate.toLowerCase());
  return candidate;
}
