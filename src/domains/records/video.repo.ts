// ──────────────────────────────────────────
// Records: Video repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { PaymentStatus, Video, VideoFilter } from '../../shared/types';
import { formatCents, toCents } from '../../shared/money';

export interface VideoDbRow {
  id: string;
  creator_id: string;
  title: string;
  upload_date: string | null;
  payment_status: PaymentStatus;
  /** pg returns NUMERIC as a string */
  amount: string;
  link: string | null;
  description: string | null;
  created_at: Date;
  updated_at: Date;
}

export type NewVideo = Omit<Video, 'id' | 'created_at'>;

export class VideoRepo {
  constructor(private db: Knex) {}

  async find(filter: VideoFilter = {}): Promise<Video[]> {
    let query = this.db('videos')
      .select('*')
      .orderBy([{ column: 'created_at' }, { column: 'id' }]);

    if (filter.creatorId) {
      query = query.where('creator_id', filter.creatorId);
    }
    if (filter.paymentStatus) {
      query = query.where('payment_status', filter.paymentStatus);
    }

    const rows: VideoDbRow[] = await query;
    return rows.map(toVideo);
  }

  async create(video: NewVideo): Promise<Video> {
    const { amount_cents, ...rest } = video;
    const [row] = await this.db('videos')
      .insert({ ...rest, amount: formatCents(amount_cents) })
      .returning('*');
    return toVideo(row);
  }
}

/**
 * Amounts that do not parse are kept as NaN cents so the aggregator
 * reports the record instead of the whole snapshot failing here.
 */
export function toVideo(row: VideoDbRow): Video {
  let amountCents: number;
  try {
    amountCents = toCents(row.amount);
  } catch {
    amountCents = Number.NaN;
  }

  return {
    id: row.id,
    creator_id: row.creator_id,
    title: row.title,
    upload_date: row.upload_date,
    payment_status: row.payment_status,
    amount_cents: amountCents,
    link: row.link,
    description: row.description,
    created_at: new Date(row.created_at),
  };
}
