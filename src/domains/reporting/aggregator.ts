// ──────────────────────────────────────────
// Reporting: Aggregator — per-creator and per-month payment rollups
// ──────────────────────────────────────────
// Pure: no clock, no I/O, inputs are never mutated.

import {
  AggregateOptions,
  AggregationResult,
  Creator,
  DataIntegrityIssue,
  MonthlyTrendPoint,
  PaymentSummary,
  PaymentTotals,
  Video,
} from '../../shared/types';
import { DataIntegrityError } from '../../shared/errors';
import { isValidCents } from '../../shared/money';
import { monthBucket, parseCalendarDate } from '../../shared/calendar';

const nameCollator = new Intl.Collator('en', { sensitivity: 'base' });

/** Creator name ascending, case-insensitive; exact name then id break ties. */
export function compareByName(a: { name: string; id: string }, b: { name: string; id: string }): number {
  return (
    nameCollator.compare(a.name, b.name) ||
    compareStrings(a.name, b.name) ||
    compareStrings(a.id, b.id)
  );
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function indexCreators(creators: readonly Creator[]): Map<string, Creator> {
  return new Map(creators.map((c) => [c.id, c]));
}

export function aggregate(
  videos: readonly Video[],
  creators: ReadonlyMap<string, Creator>,
  options: AggregateOptions = {}
): AggregationResult {
  const summaries = new Map<string, PaymentSummary>();
  const trends = new Map<string, MonthlyTrendPoint>();
  const issues: DataIntegrityIssue[] = [];

  for (const video of videos) {
    const checked = checkVideo(video, creators);
    if (checked instanceof DataIntegrityError) {
      issues.push(checked.issue);
      continue;
    }

    const { creator, month } = checked;
    let summary = summaries.get(creator.id);
    if (!summary) {
      summary = emptySummary(creator);
      summaries.set(creator.id, summary);
    }
    summary.video_count += 1;
    addAmount(summary, video);

    // Undated videos count towards the creator but not towards any month
    if (month) {
      const key = monthBucket(month.year, month.month);
      let point = trends.get(key);
      if (!point) {
        point = { bucket: key, year: month.year, month: month.month, video_count: 0, paid_cents: 0, pending_cents: 0 };
        trends.set(key, point);
      }
      point.video_count += 1;
      addAmount(point, video);
    }
  }

  if (options.includeZeroVideoCreators) {
    for (const creator of creators.values()) {
      if (!summaries.has(creator.id)) {
        summaries.set(creator.id, emptySummary(creator));
      }
    }
  }

  return {
    summaries: Array.from(summaries.values()).sort((a, b) =>
      compareByName({ name: a.creator_name, id: a.creator_id }, { name: b.creator_name, id: b.creator_id })
    ),
    trends: Array.from(trends.values()).sort((a, b) => a.year - b.year || a.month - b.month),
    diagnostics: { skipped: issues.length, issues },
  };
}

interface AcceptedVideo {
  creator: Creator;
  month: { year: number; month: number } | null;
}

function checkVideo(video: Video, creators: ReadonlyMap<string, Creator>): AcceptedVideo | DataIntegrityError {
  const creator = creators.get(video.creator_id);
  if (!creator) {
    return new DataIntegrityError(
      video,
      'unknown_creator',
      `Video ${video.id} references unknown creator ${video.creator_id}`
    );
  }

  if (!isValidCents(video.amount_cents)) {
    return new DataIntegrityError(
      video,
      'invalid_amount',
      `Video ${video.id} has an invalid amount (${video.amount_cents} cents)`
    );
  }

  if (video.upload_date === null) {
    return { creator, month: null };
  }

  const date = parseCalendarDate(video.upload_date);
  if (!date) {
    return new DataIntegrityError(
      video,
      'invalid_upload_date',
      `Video ${video.id} has a malformed upload date "${video.upload_date}"`
    );
  }
  return { creator, month: { year: date.year, month: date.month } };
}

function emptySummary(creator: Creator): PaymentSummary {
  return {
    creator_id: creator.id,
    creator_name: creator.name,
    contact: creator.contact,
    video_count: 0,
    paid_cents: 0,
    pending_cents: 0,
  };
}

function addAmount(target: { paid_cents: number; pending_cents: number }, video: Video): void {
  if (video.payment_status === 'paid') {
    target.paid_cents += video.amount_cents;
  } else {
    target.pending_cents += video.amount_cents;
  }
}

// ── Derived figures for dashboard consumers ──

/** paid / (paid + pending); 0 when nothing is owed at all. */
export function completionRatio(summary: Pick<PaymentSummary, 'paid_cents' | 'pending_cents'>): number {
  const total = summary.paid_cents + summary.pending_cents;
  return total > 0 ? summary.paid_cents / total : 0;
}

export function totalsOf(summaries: readonly PaymentSummary[]): PaymentTotals {
  const totals = summaries.reduce(
    (acc, s) => ({
      video_count: acc.video_count + s.video_count,
      paid_cents: acc.paid_cents + s.paid_cents,
      pending_cents: acc.pending_cents + s.pending_cents,
    }),
    { video_count: 0, paid_cents: 0, pending_cents: 0 }
  );
  return { ...totals, total_cents: totals.paid_cents + totals.pending_cents };
}

/**
 * Insert zero points for months missing between the first and last bucket.
 * Expects chronologically ordered, duplicate-free points (as `aggregate`
 * returns them).
 */
export function fillTrendGaps(points: readonly MonthlyTrendPoint[]): MonthlyTrendPoint[] {
  if (points.length === 0) return [];

  const byBucket = new Map(points.map((p) => [p.bucket, p]));
  const first = points[0];
  const last = points[points.length - 1];
  const filled: MonthlyTrendPoint[] = [];

  let year = first.year;
  let month = first.month;
  while (year < last.year || (year === last.year && month <= last.month)) {
    const bucket = monthBucket(year, month);
    filled.push(byBucket.get(bucket) ?? { bucket, year, month, video_count: 0, paid_cents: 0, pending_cents: 0 });
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }
  return filled;
}

export function lastMonths(points: readonly MonthlyTrendPoint[], count: number): MonthlyTrendPoint[] {
  return count > 0 ? points.slice(-count) : [];
}
