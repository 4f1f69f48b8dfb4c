// ──────────────────────────────────────────
// Shared type definitions for Creator Payments
// ──────────────────────────────────────────

import { Cents } from './money';

export const PAYMENT_STATUSES = ['pending', 'paid'] as const;
export const REPORT_KINDS = ['creators', 'videos', 'payments', 'combined'] as const;
export const EXPORT_FORMATS = ['flat_table', 'workbook'] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];
export type ReportKind = (typeof REPORT_KINDS)[number];
export type TableKind = Exclude<ReportKind, 'combined'>;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

// ── Records (owned by the Record Source) ──

export interface Creator {
  id: string;
  name: string;
  channel_link: string | null;
  category: string | null;
  contact: string | null;
  notes: string | null;
  created_at: Date;
}

export interface Video {
  id: string;
  creator_id: string;
  title: string;
  /** Calendar date, `YYYY-MM-DD`, no time zone. */
  upload_date: string | null;
  payment_status: PaymentStatus;
  amount_cents: Cents;
  link: string | null;
  description: string | null;
  created_at: Date;
}

export interface VideoFilter {
  creatorId?: string;
  paymentStatus?: PaymentStatus;
}

// ── Aggregation ──

export interface PaymentSummary {
  creator_id: string;
  creator_name: string;
  contact: string | null;
  video_count: number;
  paid_cents: Cents;
  pending_cents: Cents;
}

export interface MonthlyTrendPoint {
  /** `YYYY-MM` */
  bucket: string;
  year: number;
  month: number;
  video_count: number;
  paid_cents: Cents;
  pending_cents: Cents;
}

export type IntegrityReason = 'unknown_creator' | 'invalid_amount' | 'invalid_upload_date';

export interface DataIntegrityIssue {
  video_id: string;
  creator_id: string;
  reason: IntegrityReason;
  message: string;
}

export interface AggregationDiagnostics {
  skipped: number;
  issues: DataIntegrityIssue[];
}

export interface AggregationResult {
  summaries: PaymentSummary[];
  trends: MonthlyTrendPoint[];
  diagnostics: AggregationDiagnostics;
}

export interface AggregateOptions {
  includeZeroVideoCreators?: boolean;
}

export interface PaymentTotals {
  video_count: number;
  paid_cents: Cents;
  pending_cents: Cents;
  total_cents: Cents;
}

// ── Report tables ──

export type ColumnType = 'text' | 'date' | 'money' | 'count' | 'ratio';

export interface ReportColumn {
  key: string;
  header: string;
  type: ColumnType;
}

export type CellValue = string | number | null;

export type CreatorRow = [
  name: string,
  channel: string | null,
  category: string | null,
  contact: string | null,
  notes: string | null,
  created: string,
];

export type VideoRow = [
  title: string,
  creator: string,
  uploadDate: string | null,
  paymentStatus: PaymentStatus,
  amount: Cents,
  link: string | null,
  description: string | null,
];

export type PaymentRow = [
  creator: string,
  contact: string | null,
  videos: number,
  paid: Cents,
  pending: Cents,
  completionRatio: number,
];

interface TableOf<K extends TableKind, R extends CellValue[]> {
  kind: K;
  columns: readonly ReportColumn[];
  rows: R[];
}

export type CreatorsTable = TableOf<'creators', CreatorRow>;
export type VideosTable = TableOf<'videos', VideoRow>;
export type PaymentsTable = TableOf<'payments', PaymentRow>;
export type ReportTable = CreatorsTable | VideosTable | PaymentsTable;

export interface ReportInput {
  creators: readonly Creator[];
  videos: readonly Video[];
  aggregation: AggregationResult;
}

// ── Export ──

export interface ExportOptions {
  kind: ReportKind;
  now: Date;
  maxColumnWidth?: number;
}

export interface ExportResult {
  payload: Buffer;
  filename: string;
  contentType: string;
}

export interface ReportArtifact extends ExportResult {
  diagnostics: AggregationDiagnostics;
}

// ── Dashboard ──

export interface StatusBreakdown {
  payment_status: PaymentStatus;
  count: number;
  total: string;
}

export interface SummaryDTO {
  creator_id: string;
  creator_name: string;
  contact: string | null;
  video_count: number;
  paid_total: string;
  pending_total: string;
  completion_ratio: number;
}

export interface TrendPointDTO {
  month: string;
  video_count: number;
  paid: string;
  pending: string;
}

export interface RecentVideoDTO {
  id: string;
  title: string;
  creator_name: string;
  amount: string;
  payment_status: PaymentStatus;
  upload_date: string | null;
}

export interface Overview {
  totals: {
    creators: number;
    videos: number;
    total_paid: string;
    pending_payments: string;
    total_amount: string;
  };
  status_breakdown: StatusBreakdown[];
  summaries: SummaryDTO[];
  trends: TrendPointDTO[];
  recent_videos: RecentVideoDTO[];
  diagnostics: AggregationDiagnostics;
}
