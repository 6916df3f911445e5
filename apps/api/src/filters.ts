import { endOfMonth, startOfMonth, subDays, subMonths } from 'date-fns';
import type { TimeRangeKey } from '@tallybook/shared';
import { isIsoDate, toIsoDate } from './dates.js';
import { splitList } from './labels.js';

export type TimeRange =
  | { kind: 'all' }
  | { kind: 'current_month' }
  | { kind: 'days'; days: number }
  | { kind: 'months'; months: number }
  | { kind: 'custom'; start: string; end: string };

export type TransactionFilter = {
  categories: string[]; // empty = all
  tags: string[]; // empty = all
  range: TimeRange;
};

export type DateBounds = { from?: string; to?: string };

export type SqlPredicate = { clause: string; params: string[] };

export type FilterQuery = {
  categories?: string | string[];
  tags?: string | string[];
  range?: string;
  start_date?: string;
  end_date?: string;
};

export const NO_FILTER: TransactionFilter = { categories: [], tags: [], range: { kind: 'all' } };

const RANGES: Record<Exclude<TimeRangeKey, 'custom'>, TimeRange> = {
  all: { kind: 'all' },
  current_month: { kind: 'current_month' },
  '7d': { kind: 'days', days: 7 },
  '30d': { kind: 'days', days: 30 },
  '90d': { kind: 'days', days: 90 },
  '3m': { kind: 'months', months: 3 },
  '6m': { kind: 'months', months: 6 },
  '12m': { kind: 'months', months: 12 },
};

function isRangeKey(value: string): value is keyof typeof RANGES {
  return Object.prototype.hasOwnProperty.call(RANGES, value);
}

function nameList(value: string | string[] | undefined): string[] {
  const parts = Array.isArray(value) ? value.flatMap(v => splitList(v)) : splitList(value);
  return Array.from(new Set(parts.map(p => p.toLowerCase())));
}

/**
 * Any start/end date signals a custom range. Only a complete, ordered pair of
 * valid dates is honoured; anything else selects everything.
 */
export function parseTimeRange(range?: string, startDate?: string, endDate?: string): TimeRange {
  const start = startDate?.trim();
  const end = endDate?.trim();

  if (start || end || range === 'custom') {
    if (start && end && isIsoDate(start) && isIsoDate(end) && start <= end) {
      return { kind: 'custom', start, end };
    }
    return { kind: 'all' };
  }

  const key = range?.trim().toLowerCase() ?? '';
  return isRangeKey(key) ? RANGES[key] : { kind: 'all' };
}

export function parseFilter(q: FilterQuery): TransactionFilter {
  return {
    categories: nameList(q.categories),
    tags: nameList(q.tags),
    range: parseTimeRange(q.range, q.start_date, q.end_date),
  };
}

/** Inclusive YYYY-MM-DD bounds for a range, relative to `now`. */
export function resolveDateBounds(range: TimeRange, now: Date = new Date()): DateBounds {
  switch (range.kind) {
    case 'all':
      return {};
    case 'current_month':
      return { from: toIsoDate(startOfMonth(now)), to: toIsoDate(endOfMonth(now)) };
    case 'days':
      return { from: toIsoDate(subDays(now, range.days)) };
    case 'months':
      return { from: toIsoDate(startOfMonth(subMonths(now, range.months - 1))) };
    case 'custom':
      return { from: range.start, to: range.end };
  }
}

/**
 * Builds the WHERE clause for a filter over `transactions t`.
 * Dimensions are ANDed; names within a dimension are ORed.
 */
export function composeFilter(filter: TransactionFilter, now: Date = new Date()): SqlPredicate {
  const where: string[] = [];
  const params: string[] = [];

  if (filter.categories.length) {
    where.push(
      `t.category_id IN (SELECT c.id FROM categories c WHERE c.name IN (${placeholders(filter.categories)}))`
    );
    params.push(...filter.categories);
  }

  if (filter.tags.length) {
    where.push(
      `EXISTS (SELECT 1 FROM transaction_tags tt JOIN tags g ON g.id = tt.tag_id
               WHERE tt.transaction_id = t.id AND g.name IN (${placeholders(filter.tags)}))`
    );
    params.push(...filter.tags);
  }

  const { from, to } = resolveDateBounds(filter.range, now);
  if (from) {
    where.push('t.date >= ?');
    params.push(from);
  }
  if (to) {
    where.push('t.date <= ?');
    params.push(to);
  }

  return { clause: where.length ? `WHERE ${where.join(' AND ')}` : '', params };
}

function placeholders(values: readonly unknown[]): string {
  return values.map(() => '?').join(', ');
}
