// ──────────────────────────────────────────
// Records domain — barrel export
// ──────────────────────────────────────────

export { CreatorRepo } from './creator.repo';
export { VideoRepo } from './video.repo';
export { PgRecordSource } from './record-source';
