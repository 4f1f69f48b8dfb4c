import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import express from 'express';
import { Server } from 'http';
import { createReportRoutes } from '../routes';
import { ReportService } from '../report.service';
import { InMemoryRecordSource, makeCreator, makeVideo } from '../../../test/factories';

describe('report routes', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const source = new InMemoryRecordSource(
      [makeCreator({ id: 'c-a', name: 'Amy' })],
      [
        makeVideo({ id: 'v1', creator_id: 'c-a', payment_status: 'paid', amount_cents: 1250, upload_date: '2024-02-01' }),
        makeVideo({ id: 'v2', creator_id: 'c-gone', amount_cents: 100 }),
      ]
    );
    const service = new ReportService(source, {
      includeZeroVideoCreators: false,
      maxColumnWidth: 60,
      trendMonths: 12,
      recentVideos: 5,
      now: () => new Date('2024-06-30T10:00:00Z'),
    });

    const app = express();
    app.use('/api/v1/reports', createReportRoutes(service));

    await new Promise<void>((resolve) => {
      server = app.listen(0, () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server is not listening on a TCP port');
    baseUrl = `http://127.0.0.1:${address.port}/api/v1/reports`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it('downloads a CSV export', async () => {
    const res = await fetch(`${baseUrl}/export?kind=payments&format=flat_table`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/csv; charset=utf-8');
    expect(res.headers.get('content-disposition')).toBe('attachment; filename="payments_export_2024-06-30.csv"');
    expect(res.headers.get('x-skipped-records')).toBe('1');
    expect(await res.text()).toBe(
      'Creator,Contact,Videos,Paid Total,Pending Total,Completion Ratio\r\nAmy,,1,12.50,0.00,1.00\r\n'
    );
  });

  it('defaults to a combined workbook', async () => {
    const res = await fetch(`${baseUrl}/export`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-disposition')).toBe('attachment; filename="combined_export_2024-06-30.xlsx"');
  });

  it('answers 422 when the format cannot hold the report', async () => {
    const res = await fetch(`${baseUrl}/export?kind=combined&format=flat_table`);

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ code: 'FORMAT_MISMATCH' });
  });

  it('answers 400 for unknown report kinds', async () => {
    const res = await fetch(`${baseUrl}/export?kind=invoices`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid query parameters',
      code: 'VALIDATION_ERROR',
      details: { issues: { kind: [expect.any(String)] } },
    });
  });

  it('returns the dashboard summary', async () => {
    const res = await fetch(`${baseUrl}/summary?creator_id=c-a`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      totals: { creators: 1, videos: 1, total_paid: '12.50' },
      trends: [{ month: '2024-02', video_count: 1, paid: '12.50', pending: '0.00' }],
      diagnostics: { skipped: 0, issues: [] },
    });
  });
});
