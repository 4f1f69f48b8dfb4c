import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({ DATABASE_URL: 'postgres://localhost/test' })).toEqual({
      port: 3000,
      databaseUrl: 'postgres://localhost/test',
      pool: { min: 2, max: 10 },
      reports: { includeZeroVideoCreators: false, maxColumnWidth: 60, trendMonths: 12, recentVideos: 5 },
    });
  });

  it('parses overrides', () => {
    const config = loadConfig({
      DATABASE_URL: 'postgres://localhost/test',
      PORT: '8080',
      REPORT_INCLUDE_ZERO_VIDEO_CREATORS: '1',
      REPORT_TREND_MONTHS: '6',
      REPORT_RECENT_VIDEOS: '0',
    });
    expect(config.port).toBe(8080);
    expect(config.reports.includeZeroVideoCreators).toBe(true);
    expect(config.reports.trendMonths).toBe(6);
    expect(config.reports.recentVideos).toBe(0);
  });

  it('requires a database URL', () => {
    expect(() => loadConfig({})).toThrow('DATABASE_URL');
  });
});
