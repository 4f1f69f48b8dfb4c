// ──────────────────────────────────────────
// Reporting: Report service — record snapshot → aggregate → tables → bytes
// ──────────────────────────────────────────

import { RecordSourceContract } from '../../shared/contracts';
import {
  AggregationResult,
  Creator,
  ExportFormat,
  Overview,
  PAYMENT_STATUSES,
  RecentVideoDTO,
  ReportArtifact,
  ReportKind,
  Video,
  VideoFilter,
} from '../../shared/types';
import { formatCents } from '../../shared/money';
import {
  aggregate,
  completionRatio,
  fillTrendGaps,
  indexCreators,
  lastMonths,
  totalsOf,
} from './aggregator';
import { buildReportTables } from './report-builder';
import { exportTables } from './exporters';

export interface ReportServiceOptions {
  includeZeroVideoCreators: boolean;
  maxColumnWidth: number;
  trendMonths: number;
  /** Most recently created videos listed in the overview */
  recentVideos: number;
  now?: () => Date;
}

interface Snapshot {
  creators: Creator[];
  videos: Video[];
  aggregation: AggregationResult;
}

export class ReportService {
  private now: () => Date;

  constructor(
    private recordSource: RecordSourceContract,
    private options: ReportServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async buildReport(kind: ReportKind, format: ExportFormat): Promise<ReportArtifact> {
    const { creators, videos, aggregation } = await this.snapshot();
    console.log(`[Reports] Building ${kind} report as ${format} (${creators.length} creators, ${videos.length} videos)`);

    const tables = buildReportTables(kind, { creators, videos, aggregation });
    const result = await exportTables(format, tables, {
      kind,
      now: this.now(),
      maxColumnWidth: this.options.maxColumnWidth,
    });

    console.log(`[Reports] Built ${result.filename} (${result.payload.length} bytes)`);
    return { ...result, diagnostics: aggregation.diagnostics };
  }

  async aggregate(filter: VideoFilter = {}): Promise<AggregationResult> {
    const { aggregation } = await this.snapshot(filter);
    return aggregation;
  }

  async getOverview(filter: VideoFilter = {}): Promise<Overview> {
    const { creators, videos, aggregation } = await this.snapshot(filter);
    const { summaries, trends, diagnostics } = aggregation;
    const totals = totalsOf(summaries);

    const skipped = new Set(diagnostics.issues.map((i) => i.video_id));
    const accepted = videos.filter((v) => !skipped.has(v.id));
    const names = new Map(creators.map((c) => [c.id, c.name]));

    return {
      totals: {
        creators: creators.length,
        videos: totals.video_count,
        total_paid: formatCents(totals.paid_cents),
        pending_payments: formatCents(totals.pending_cents),
        total_amount: formatCents(totals.total_cents),
      },
      status_breakdown: PAYMENT_STATUSES.map((status) => {
        const matching = accepted.filter((v) => v.payment_status === status);
        return {
          payment_status: status,
          count: matching.length,
          total: formatCents(matching.reduce((sum, v) => sum + v.amount_cents, 0)),
        };
      }),
      summaries: summaries.map((s) => ({
        creator_id: s.creator_id,
        creator_name: s.creator_name,
        contact: s.contact,
        video_count: s.video_count,
        paid_total: formatCents(s.paid_cents),
        pending_total: formatCents(s.pending_cents),
        completion_ratio: Math.round(completionRatio(s) * 10000) / 10000,
      })),
      trends: lastMonths(fillTrendGaps(trends), this.options.trendMonths).map((p) => ({
        month: p.bucket,
        video_count: p.video_count,
        paid: formatCents(p.paid_cents),
        pending: formatCents(p.pending_cents),
      })),
      recent_videos: this.recentVideos(accepted, names),
      diagnostics,
    };
  }

  // Newest first by creation time; ties keep the record source order (id)
  private recentVideos(accepted: readonly Video[], names: ReadonlyMap<string, string>): RecentVideoDTO[] {
    return [...accepted]
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .slice(0, this.options.recentVideos)
      .map((v) => ({
        id: v.id,
        title: v.title,
        creator_name: names.get(v.creator_id) ?? '',
        amount: formatCents(v.amount_cents),
        payment_status: v.payment_status,
        upload_date: v.upload_date,
      }));
  }

  // Both reads finish before aggregation; the result is treated as one snapshot.
  // A creator filter narrows the creators too, so totals and zero-video
  // summaries cover that creator alone.
  private async snapshot(filter: VideoFilter = {}): Promise<Snapshot> {
    const [allCreators, videos] = await Promise.all([
      this.recordSource.listCreators(),
      this.recordSource.listVideos(filter),
    ]);
    const creators =
      filter.creatorId === undefined ? allCreators : allCreators.filter((c) => c.id === filter.creatorId);
    const aggregation = aggregate(videos, indexCreators(creators), {
      includeZeroVideoCreators: this.options.includeZeroVideoCreators,
    });
    this.logDiagnostics(aggregation);
    return { creators, videos, aggregation };
  }

  private logDiagnostics(aggregation: AggregationResult): void {
    const { skipped, issues } = aggregation.diagnostics;
    if (skipped === 0) return;

    console.warn(`[Reports] Skipped ${skipped} video(s) with data integrity problems`);
    for (const issue of issues) {
      console.warn(`[Reports]   ${issue.reason}: ${issue.message}`);
    }
  }
}
