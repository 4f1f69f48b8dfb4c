// ──────────────────────────────────────────
// Reporting: Download filename hint
// ──────────────────────────────────────────

import { ReportKind } from '../../../shared/types';
import { toCalendarDate } from '../../../shared/calendar';

/** `<kind>_export_<YYYY-MM-DD>.<ext>`, ASCII letters, digits, `_ . -` only. */
export function reportFilename(kind: ReportKind, now: Date, extension: string): string {
  return `${kind}_export_${toCalendarDate(now)}.${extension}`.replace(/[^A-Za-z0-9._-]/g, '_');
}
