// ──────────────────────────────────────────
// Records: Creator repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { Creator } from '../../shared/types';

export interface CreatorDbRow {
  id: string;
  name: string;
  channel_link: string | null;
  category: string | null;
  contact: string | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

export class CreatorRepo {
  constructor(private db: Knex) {}

  async findAll(): Promise<Creator[]> {
    const rows: CreatorDbRow[] = await this.db('creators')
      .select('*')
      .orderBy([{ column: 'name' }, { column: 'id' }]);
    return rows.map(toCreator);
  }

  async create(creator: Omit<Creator, 'id' | 'created_at'>): Promise<Creator> {
    const [row] = await this.db('creators').insert(creator).returning('*');
    return toCreator(row);
  }
}

export function toCreator(row: CreatorDbRow): Creator {
  return {
    id: row.id,
    name: row.name,
    channel_link: row.channel_link,
    category: row.category,
    contact: row.contact,
    notes: row.notes,
    created_at: new Date(row.created_at),
  };
}
