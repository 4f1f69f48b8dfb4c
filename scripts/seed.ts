// ──────────────────────────────────────────
// Script: Seed — sample creators and ~6 months of videos
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getDb, closeDb } from '../src/db/connection';
import { migrateLatest } from '../src/db/migrate';
import { CreatorRepo } from '../src/domains/records/creator.repo';
import { VideoRepo } from '../src/domains/records/video.repo';
import { toCalendarDate } from '../src/shared/calendar';

const creators = [
  { name: 'Circuit Bench', channel_link: 'https://youtube.com/@circuitbench', category: 'Technology', contact: 'circuit@example.com', notes: 'Hardware teardowns and repair walkthroughs.' },
  { name: 'Pixel Quest', channel_link: 'https://youtube.com/@pixelquest', category: 'Gaming', contact: 'pixel@example.com', notes: 'Indie game reviews, weekly uploads.' },
  { name: 'Slow Mornings', channel_link: 'https://youtube.com/@slowmornings', category: 'Lifestyle', contact: 'mornings@example.com', notes: null },
  { name: 'Pan & Pantry', channel_link: 'https://youtube.com/@panandpantry', category: 'Food', contact: 'pantry@example.com', notes: 'Budget recipes; prefers "sponsor, then content" ordering.' },
  { name: 'Trail Legs', channel_link: 'https://youtube.com/@traillegs', category: 'Fitness', contact: null, notes: 'Hiking and mobility routines.' },
  { name: 'Far Platform', channel_link: null, category: 'Travel', contact: 'far@example.com', notes: 'New partner, no videos yet.' },
];

const topics = ['Review', 'Deep Dive', 'Q&A', 'Behind the Scenes', 'Sponsored Segment', 'Shorts Compilation'];
const amounts = [7500, 12000, 25000, 40000, 55050, 100000];

async function seed() {
  const db = getDb();
  console.log('[Seed] Starting...');

  console.log('[Seed] Running migrations...');
  await migrateLatest(db);

  console.log('[Seed] Clearing existing data...');
  await db.raw('TRUNCATE TABLE videos, creators CASCADE');

  const creatorRepo = new CreatorRepo(db);
  const videoRepo = new VideoRepo(db);
  const now = new Date();
  let videoCount = 0;

  // Last creator stays without videos
  for (const [i, input] of creators.entries()) {
    const creator = await creatorRepo.create(input);
    if (i === creators.length - 1) continue;

    const perCreator = 3 + Math.floor(Math.random() * 4);
    for (let j = 0; j < perCreator; j++) {
      const uploaded = new Date(now);
      uploaded.setUTCDate(uploaded.getUTCDate() - Math.floor(Math.random() * 180));
      const dated = Math.random() > 0.1;

      await videoRepo.create({
        creator_id: creator.id,
        title: `${creator.name}: ${topics[(i + j) % topics.length]} #${j + 1}`,
        upload_date: dated ? toCalendarDate(uploaded) : null,
        payment_status: Math.random() < 0.6 ? 'paid' : 'pending',
        amount_cents: amounts[Math.floor(Math.random() * amounts.length)],
        link: `https://youtube.com/watch?v=sample${i}${j}`,
        description: j === 0 ? 'Launch video, see brief for talking points.' : null,
      });
      videoCount++;
    }
  }

  console.log(`\n[Seed] ✅ Done!`);
  console.log(`  Creators: ${creators.length}`);
  console.log(`  Videos:   ${videoCount}`);
  console.log(`\n  Try:`);
  console.log(`  curl "localhost:3000/api/v1/reports/summary"`);
  console.log(`  curl -OJ "localhost:3000/api/v1/reports/export?kind=payments&format=flat_table"\n`);

  await closeDb();
}

seed()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error('[Seed] Error:', err);
    process.exit(1);
  });
