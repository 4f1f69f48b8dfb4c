// ──────────────────────────────────────────
// Reporting: Cell rendering shared by the exporters
// ──────────────────────────────────────────

import { CellValue, ReportColumn, TableKind } from '../../../shared/types';
import { SerializationError } from '../../../shared/errors';
import { centsToUnits, formatCents } from '../../../shared/money';
import { parseCalendarDate } from '../../../shared/calendar';

export interface CellLocation {
  table: TableKind;
  /** 1-based data row, header excluded */
  row: number;
  column: string;
}

// C0 controls other than TAB, LF, CR, plus DEL; XML 1.0 cannot carry them either
const UNREPRESENTABLE_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/;

/** Render a cell as text: what a CSV field holds and what sizes a workbook column. */
export function renderCell(value: CellValue, column: ReportColumn, at: CellLocation): string {
  if (value === null) return '';

  switch (column.type) {
    case 'text':
      return checkText(value, at);
    case 'date':
      return checkDate(value, at);
    case 'money':
      return formatCents(checkCents(value, at));
    case 'count':
      return String(checkCount(value, at));
    case 'ratio':
      return checkRatio(value, at).toFixed(2);
  }
}

export type WorkbookValue = string | number | Date | null;

export function toWorkbookValue(value: CellValue, column: ReportColumn, at: CellLocation): WorkbookValue {
  if (value === null) return null;

  switch (column.type) {
    case 'text':
      return checkText(value, at);
    case 'date': {
      const date = parseCalendarDate(checkDate(value, at));
      return date && new Date(Date.UTC(date.year, date.month - 1, date.day));
    }
    case 'money':
      return centsToUnits(checkCents(value, at));
    case 'count':
      return checkCount(value, at);
    case 'ratio':
      return checkRatio(value, at);
  }
}

function checkText(value: CellValue, at: CellLocation): string {
  if (typeof value !== 'string') {
    throw fail(at, `expected text, got ${typeof value}`);
  }
  const bad = UNREPRESENTABLE_CHARS.exec(value);
  if (bad) {
    const code = bad[0].charCodeAt(0).toString(16).padStart(4, '0');
    throw fail(at, `control character U+${code.toUpperCase()} cannot be serialized`);
  }
  return value;
}

function checkDate(value: CellValue, at: CellLocation): string {
  if (typeof value !== 'string' || !parseCalendarDate(value)) {
    throw fail(at, `expected a YYYY-MM-DD date, got "${String(value)}"`);
  }
  return value;
}

function checkCents(value: CellValue, at: CellLocation): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw fail(at, `expected an amount in whole cents, got ${String(value)}`);
  }
  return value;
}

function checkCount(value: CellValue, at: CellLocation): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw fail(at, `expected a whole count, got ${String(value)}`);
  }
  return value;
}

function checkRatio(value: CellValue, at: CellLocation): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw fail(at, `expected a finite ratio, got ${String(value)}`);
  }
  return value;
}

function fail(at: CellLocation, reason: string): SerializationError {
  return new SerializationError(
    `Cannot serialize ${at.table} row ${at.row}, column "${at.column}": ${reason}`,
    { table: at.table, row: at.row, column: at.column }
  );
}
