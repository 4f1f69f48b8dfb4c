import { describe, it, expect } from 'vitest';
import { aggregate, indexCreators } from '../aggregator';
import { buildReportTables, COLUMN_SCHEMAS } from '../report-builder';
import { ReportInput } from '../../../shared/types';
import { makeCreator, makeVideo } from '../../../test/factories';

function inputOf(creators: ReportInput['creators'], videos: ReportInput['videos']): ReportInput {
  return { creators, videos, aggregation: aggregate(videos, indexCreators(creators), { includeZeroVideoCreators: true }) };
}

const zed = makeCreator({ id: 'c-z', name: 'Zed', created_at: new Date('2024-05-01T23:59:59Z') });
const amy = makeCreator({ id: 'c-a', name: 'amy', channel_link: 'https://example.com/amy', category: 'Food' });

describe('buildReportTables', () => {
  it('returns one table per single kind and three for combined', () => {
    const input = inputOf([], []);
    expect(buildReportTables('creators', input).map((t) => t.kind)).toEqual(['creators']);
    expect(buildReportTables('payments', input).map((t) => t.kind)).toEqual(['payments']);
    expect(buildReportTables('combined', input).map((t) => t.kind)).toEqual(['creators', 'videos', 'payments']);
  });

  it('keeps the fixed column schema even with no rows', () => {
    const [table] = buildReportTables('videos', inputOf([], []));
    expect(table.rows).toEqual([]);
    expect(table.columns.map((c) => c.header)).toEqual([
      'Title',
      'Creator',
      'Upload Date',
      'Payment Status',
      'Amount',
      'Link',
      'Description',
    ]);
  });

  it('builds creator rows sorted by name', () => {
    const [table] = buildReportTables('creators', inputOf([zed, amy], []));
    expect(table.rows).toEqual([
      ['amy', 'https://example.com/amy', 'Food', null, null, '2024-01-15'],
      ['Zed', null, null, null, null, '2024-05-01'],
    ]);
  });

  it('orders videos by upload date, newest first, undated last', () => {
    const videos = [
      makeVideo({ id: 'v1', creator_id: 'c-a', title: 'Old', upload_date: '2023-06-01' }),
      makeVideo({ id: 'v2', creator_id: 'c-z', title: 'Undated' }),
      makeVideo({ id: 'v3', creator_id: 'c-a', title: 'New', upload_date: '2024-06-01', payment_status: 'paid', amount_cents: 2500 }),
      makeVideo({ id: 'v4', creator_id: 'c-missing', title: 'Orphan', upload_date: '2024-07-01' }),
    ];

    const [table] = buildReportTables('videos', inputOf([zed, amy], videos));

    expect(table.rows.map((r) => r[0])).toEqual(['New', 'Old', 'Undated']);
    expect(table.rows[0]).toEqual(['New', 'amy', '2024-06-01', 'paid', 2500, null, null]);
  });

  it('derives payment rows from the aggregation', () => {
    const videos = [
      makeVideo({ id: 'v1', creator_id: 'c-a', payment_status: 'paid', amount_cents: 10000 }),
      makeVideo({ id: 'v2', creator_id: 'c-a', payment_status: 'pending', amount_cents: 5000 }),
    ];

    const [table] = buildReportTables('payments', inputOf([zed, amy], videos));

    expect(table.columns).toBe(COLUMN_SCHEMAS.payments);
    expect(table.rows).toEqual([
      ['amy', null, 2, 10000, 5000, 10000 / 15000],
      ['Zed', null, 0, 0, 0, 0],
    ]);
  });

  it('leaves out videos the aggregator skipped', () => {
    const videos = [
      makeVideo({ id: 'v1', creator_id: 'c-a', title: 'Kept', upload_date: '2024-01-10', amount_cents: 100 }),
      makeVideo({ id: 'v2', creator_id: 'c-a', title: 'Bad date', upload_date: '2024-02-30', amount_cents: 100 }),
      makeVideo({ id: 'v3', creator_id: 'c-z', title: 'Bad amount', amount_cents: 1.5 }),
    ];
    const input = inputOf([zed, amy], videos);

    const [table] = buildReportTables('videos', input);

    expect(input.aggregation.diagnostics.skipped).toBe(2);
    expect(table.rows).toEqual([['Kept', 'amy', '2024-01-10', 'pending', 100, null, null]]);
  });
});
