import { Creator, Video, VideoFilter } from '../shared/types';
import { RecordSourceContract } from '../shared/contracts';

export function makeCreator(overrides: Partial<Creator> & Pick<Creator, 'id' | 'name'>): Creator {
  return {
    channel_link: null,
    category: null,
    contact: null,
    notes: null,
    created_at: new Date('2024-01-15T12:00:00Z'),
    ...overrides,
  };
}

export function makeVideo(overrides: Partial<Video> & Pick<Video, 'id' | 'creator_id'>): Video {
  return {
    title: `Video ${overrides.id}`,
    upload_date: null,
    payment_status: 'pending',
    amount_cents: 0,
    link: null,
    description: null,
    created_at: new Date('2024-01-15T12:00:00Z'),
    ...overrides,
  };
}

/** In-memory record source, filtering the way the Postgres one does. */
export class InMemoryRecordSource implements RecordSourceContract {
  constructor(
    public creators: Creator[] = [],
    public videos: Video[] = []
  ) {}

  async listCreators(): Promise<Creator[]> {
    return [...this.creators];
  }

  async listVideos(filter: VideoFilter = {}): Promise<Video[]> {
    return this.videos.filter(
      (v) =>
        (filter.creatorId === undefined || v.creator_id === filter.creatorId) &&
        (filter.paymentStatus === undefined || v.payment_status === filter.paymentStatus)
    );
  }
}
