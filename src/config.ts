// ──────────────────────────────────────────
// Configuration — environment variables, validated
// ──────────────────────────────────────────

import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

export const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  REPORT_INCLUDE_ZERO_VIDEO_CREATORS: flag,
  REPORT_MAX_COLUMN_WIDTH: z.coerce.number().int().min(10).max(255).default(60),
  REPORT_TREND_MONTHS: z.coerce.number().int().positive().default(12),
  REPORT_RECENT_VIDEOS: z.coerce.number().int().min(0).default(5),
});

export interface AppConfig {
  port: number;
  databaseUrl: string;
  pool: { min: number; max: number };
  reports: {
    includeZeroVideoCreators: boolean;
    maxColumnWidth: number;
    trendMonths: number;
    recentVideos: number;
  };
}

/**
 * Load configuration from the environment (call `dotenv.config()` first).
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.parse(env);
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    pool: { min: parsed.DB_POOL_MIN, max: parsed.DB_POOL_MAX },
    reports: {
      includeZeroVideoCreators: parsed.REPORT_INCLUDE_ZERO_VIDEO_CREATORS,
      maxColumnWidth: parsed.REPORT_MAX_COLUMN_WIDTH,
      trendMonths: parsed.REPORT_TREND_MONTHS,
      recentVideos: parsed.REPORT_RECENT_VIDEOS,
    },
  };
}
