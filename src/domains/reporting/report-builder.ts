// ──────────────────────────────────────────
// Reporting: Report model builder
// ──────────────────────────────────────────

import {
  CreatorRow,
  CreatorsTable,
  PaymentRow,
  PaymentsTable,
  ReportColumn,
  ReportInput,
  ReportKind,
  ReportTable,
  TableKind,
  Video,
  VideoRow,
  VideosTable,
} from '../../shared/types';
import { toCalendarDate } from '../../shared/calendar';
import { compareByName, completionRatio } from './aggregator';

/** Fixed column schema per table kind. Order here is the export order. */
export const COLUMN_SCHEMAS: Readonly<Record<TableKind, readonly ReportColumn[]>> = {
  creators: [
    { key: 'name', header: 'Name', type: 'text' },
    { key: 'channel_link', header: 'Channel', type: 'text' },
    { key: 'category', header: 'Category', type: 'text' },
    { key: 'contact', header: 'Contact', type: 'text' },
    { key: 'notes', header: 'Notes', type: 'text' },
    { key: 'created_at', header: 'Created', type: 'date' },
  ],
  videos: [
    { key: 'title', header: 'Title', type: 'text' },
    { key: 'creator_name', header: 'Creator', type: 'text' },
    { key: 'upload_date', header: 'Upload Date', type: 'date' },
    { key: 'payment_status', header: 'Payment Status', type: 'text' },
    { key: 'amount', header: 'Amount', type: 'money' },
    { key: 'link', header: 'Link', type: 'text' },
    { key: 'description', header: 'Description', type: 'text' },
  ],
  payments: [
    { key: 'creator_name', header: 'Creator', type: 'text' },
    { key: 'contact', header: 'Contact', type: 'text' },
    { key: 'video_count', header: 'Videos', type: 'count' },
    { key: 'paid_total', header: 'Paid Total', type: 'money' },
    { key: 'pending_total', header: 'Pending Total', type: 'money' },
    { key: 'completion_ratio', header: 'Completion Ratio', type: 'ratio' },
  ],
};

export function buildReportTables(kind: ReportKind, input: ReportInput): ReportTable[] {
  switch (kind) {
    case 'creators':
      return [buildCreatorsTable(input)];
    case 'videos':
      return [buildVideosTable(input)];
    case 'payments':
      return [buildPaymentsTable(input)];
    case 'combined':
      return [buildCreatorsTable(input), buildVideosTable(input), buildPaymentsTable(input)];
  }
}

export function buildCreatorsTable(input: ReportInput): CreatorsTable {
  const rows = [...input.creators].sort(compareByName).map(
    (c): CreatorRow => [c.name, c.channel_link, c.category, c.contact, c.notes, toCalendarDate(c.created_at)]
  );
  return { kind: 'creators', columns: COLUMN_SCHEMAS.creators, rows };
}

/**
 * Only videos the aggregator accepted are listed; the rest are already in
 * its diagnostics.
 */
export function buildVideosTable(input: ReportInput): VideosTable {
  const names = new Map(input.creators.map((c) => [c.id, c.name]));
  const skipped = new Set(input.aggregation.diagnostics.issues.map((i) => i.video_id));
  const rows: VideoRow[] = [];

  for (const video of [...input.videos].sort(byUploadDateDesc)) {
    const creatorName = names.get(video.creator_id);
    if (creatorName === undefined || skipped.has(video.id)) continue;
    rows.push([
      video.title,
      creatorName,
      video.upload_date,
      video.payment_status,
      video.amount_cents,
      video.link,
      video.description,
    ]);
  }
  return { kind: 'videos', columns: COLUMN_SCHEMAS.videos, rows };
}

export function buildPaymentsTable(input: ReportInput): PaymentsTable {
  const rows = input.aggregation.summaries.map(
    (s): PaymentRow => [s.creator_name, s.contact, s.video_count, s.paid_cents, s.pending_cents, completionRatio(s)]
  );
  return { kind: 'payments', columns: COLUMN_SCHEMAS.payments, rows };
}

// Upload date descending, undated last; Array#sort is stable so ties keep input order
function byUploadDateDesc(a: Video, b: Video): number {
  if (a.upload_date === b.upload_date) return 0;
  if (a.upload_date === null) return 1;
  if (b.upload_date === null) return -1;
  return a.upload_date < b.upload_date ? 1 : -1;
}
