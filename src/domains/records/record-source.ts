// ──────────────────────────────────────────
// Records: Postgres-backed record source
// ──────────────────────────────────────────

import { RecordSourceContract } from '../../shared/contracts';
import { Creator, Video, VideoFilter } from '../../shared/types';
import { CreatorRepo } from './creator.repo';
import { VideoRepo } from './video.repo';

export class PgRecordSource implements RecordSourceContract {
  constructor(
    private creatorRepo: CreatorRepo,
    private videoRepo: VideoRepo
  ) {}

  async listCreators(): Promise<Creator[]> {
    return this.creatorRepo.findAll();
  }

  async listVideos(filter?: VideoFilter): Promise<Video[]> {
    return this.videoRepo.find(filter);
  }
}
