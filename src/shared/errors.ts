// ──────────────────────────────────────────
// Shared: Error taxonomy
// ──────────────────────────────────────────

import { DataIntegrityIssue, IntegrityReason, Video } from './types';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'DATA_INTEGRITY'
  | 'EMPTY_INPUT'
  | 'FORMAT_MISMATCH'
  | 'SERIALIZATION';

export interface ErrorBody {
  error: string;
  code: ErrorCode;
  details?: Record<string, unknown>;
}

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly status: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): ErrorBody {
    return this.details
      ? { error: this.message, code: this.code, details: this.details }
      : { error: this.message, code: this.code };
  }
}

/** Bad request input (query string, body). */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/** Failures of a single report request. Deterministic, never worth retrying. */
export class ReportError extends AppError {
  constructor(message: string, code: Exclude<ErrorCode, 'VALIDATION_ERROR'>, details?: Record<string, unknown>) {
    super(message, code, 422, details);
  }
}

/**
 * A record that cannot be aggregated (e.g. a video pointing at an unknown
 * creator). The aggregator returns these as values and recovers by
 * excluding the record; `issue` is what ends up in the diagnostics.
 */
export class DataIntegrityError extends ReportError {
  readonly issue: DataIntegrityIssue;

  constructor(video: Pick<Video, 'id' | 'creator_id'>, reason: IntegrityReason, message: string) {
    super(message, 'DATA_INTEGRITY', { video_id: video.id, creator_id: video.creator_id, reason });
    this.issue = { video_id: video.id, creator_id: video.creator_id, reason, message };
  }
}

export class EmptyInputError extends ReportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EMPTY_INPUT', details);
  }
}

export class FormatMismatchError extends ReportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FORMAT_MISMATCH', details);
  }
}

export class SerializationError extends ReportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SERIALIZATION', details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
