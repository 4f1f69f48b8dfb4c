// ──────────────────────────────────────────
// Reporting: Exporter dispatch
// ──────────────────────────────────────────

import { ExportFormat, ExportOptions, ExportResult, ReportTable } from '../../../shared/types';
import { exportFlatTable } from './flat-table.exporter';
import { exportWorkbook } from './workbook.exporter';

export async function exportTables(
  format: ExportFormat,
  tables: readonly ReportTable[],
  options: ExportOptions
): Promise<ExportResult> {
  switch (format) {
    case 'flat_table':
      return exportFlatTable(tables, options);
    case 'workbook':
      return exportWorkbook(tables, options);
  }
}

export { exportFlatTable, CSV_CONTENT_TYPE } from './flat-table.exporter';
export { exportWorkbook, sheetName, XLSX_CONTENT_TYPE, DEFAULT_MAX_COLUMN_WIDTH } from './workbook.exporter';
