// ──────────────────────────────────────────
// Reporting domain — barrel export
// ──────────────────────────────────────────

export {
  aggregate,
  indexCreators,
  completionRatio,
  totalsOf,
  fillTrendGaps,
  lastMonths,
} from './aggregator';
export { buildReportTables, COLUMN_SCHEMAS } from './report-builder';
export { exportTables } from './exporters';
export { ReportService } from './report.service';
export type { ReportServiceOptions } from './report.service';
export { createReportRoutes } from './routes';
