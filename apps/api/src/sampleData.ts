import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { subDays } from 'date-fns';
import { z } from 'zod';
import { toIsoDate } from './dates.js';
import type { TransactionStore } from './transactions.js';

const SampleSchema = z.array(
  z.object({
    description: z.string(),
    amount: z.string(),
    type: z.enum(['income', 'expense']),
    daysAgo: z.number().int().min(0),
    category: z.string().optional(),
    tags: z.array(z.string()).default([]),
  })
);

export type SampleTransaction = z.infer<typeof SampleSchema>[number];

const SAMPLE_PATH = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  'fixtures',
  'sample_transactions.json'
);

export function loadSampleTransactions(file: string = SAMPLE_PATH): SampleTransaction[] {
  const raw = fs.readFileSync(file, 'utf-8');
  return SampleSchema.parse(JSON.parse(raw));
}

/** Inserts the sample set with dates counted back from `now`. Returns the number added. */
export function populateSampleData(
  store: TransactionStore,
  now: Date = new Date(),
  samples: SampleTransaction[] = loadSampleTransactions()
): number {
  for (const s of samples) {
    store.create({
      description: s.description,
      amount: s.amount,
      type: s.type,
      date: toIsoDate(subDays(now, s.daysAgo)),
      category: s.category,
      tags: s.tags,
    });
  }
  return samples.length;
}
