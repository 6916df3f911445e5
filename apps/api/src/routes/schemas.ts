import { z } from 'zod';
import { splitList } from '../labels.js';

const nameList = z.union([z.string(), z.array(z.string())]).optional();

// A repeated or malformed value falls back to no value, which parseTimeRange reads as 'all'.
const rangeField = z.string().optional().catch(undefined);

export const FilterQuerySchema = z.object({
  categories: nameList,
  tags: nameList,
  range: rangeField,
  start_date: rangeField,
  end_date: rangeField,
  page: z.coerce.number().int().min(1).catch(1),
});

export const IdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const NameParamsSchema = z.object({
  name: z.string().min(1),
});

export const TransactionBodySchema = z.object({
  description: z.string(),
  amount: z.union([z.string(), z.number()]),
  type: z.enum(['income', 'expense']),
  date: z.string(),
  category: z.string().nullish(),
  tags: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform(v => (Array.isArray(v) ? v : splitList(v))),
});

export const NameBodySchema = z.object({ name: z.string() });

export const MergeBodySchema = z.object({ target: z.string() });
