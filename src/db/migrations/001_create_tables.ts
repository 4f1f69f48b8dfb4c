// ──────────────────────────────────────────
// Migration: create creator + video tables
// ──────────────────────────────────────────

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('creators', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.string('name', 100).notNullable();
    t.string('channel_link', 500);
    t.string('category', 50);
    t.string('contact', 100);
    t.text('notes');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.index(['name'], 'idx_creators_name');
    t.index(['category'], 'idx_creators_category');
  });

  await knex.schema.createTable('videos', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('creator_id').notNullable().references('id').inTable('creators').onDelete('CASCADE');
    t.string('title', 200).notNullable();
    t.date('upload_date');
    t.string('payment_status', 20).notNullable().defaultTo('pending');
    t.decimal('amount', 10, 2).notNullable().defaultTo(0);
    t.string('link', 500);
    t.text('description');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.index(['creator_id'], 'idx_videos_creator_id');
    t.index(['payment_status'], 'idx_videos_payment_status');
    t.index(['upload_date'], 'idx_videos_upload_date');
  });

  await knex.schema.raw(`
    ALTER TABLE videos ADD CONSTRAINT videos_payment_status_check CHECK (payment_status IN ('pending', 'paid'));
    ALTER TABLE videos ADD CONSTRAINT videos_amount_check CHECK (amount >= 0);
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('videos');
  await knex.schema.dropTableIfExists('creators');
}
