// ──────────────────────────────────────────
// Domain contracts — typed interfaces between domains
// ──────────────────────────────────────────

import { Creator, Video, VideoFilter } from './types';

/**
 * Record source contract — exposed to the Reporting domain.
 * Read-only; every call returns a complete snapshot taken at call time.
 */
export interface RecordSourceContract {
  listCreators(): Promise<Creator[]>;
  listVideos(filter?: VideoFilter): Promise<Video[]>;
}
